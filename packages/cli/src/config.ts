/**
 * Configuration file support for the tracemark CLI.
 *
 * Reads and writes `tracemark.config.json`. The file is looked up from the
 * working directory towards the filesystem root; fields it leaves out take
 * the values of {@link defaultConfig}.
 *
 * @packageDocumentation
 */

import { existsSync } from 'fs';
import { dirname, join, resolve } from 'path';

import type { RiskConfig, ToolPolicy } from '@tracemark/checks';
import { readJsonFile, toPrettyJson, writeFileAtomic } from '@tracemark/store';
import {
  InputError,
  TracemarkErrorCode,
  formatSchemaErrors,
  isLogLevelName,
  isPlainObject,
  validateSchema,
  type FieldSchema,
  type LogLevelName,
} from '@tracemark/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** A named behavioural principle. Informational; the checks implement them. */
export interface Principle {
  name: string;
  description: string;
}

/** Escalation rule. Carried for operators, not evaluated. */
export interface EscalationRule {
  name: string;
  when: string;
  action: string;
}

export interface RiskThresholds {
  overall_deny: number;
  overall_escalate: number;
  overconfidence: number;
  sensitive_data: number;
  manipulation: number;
}

/** Shape of a `tracemark.config.json` file after defaults are applied. */
export interface TracemarkConfig {
  principles: Principle[];
  require_uncertainty: boolean;
  risk_thresholds: RiskThresholds;
  escalation: EscalationRule[];
  tool_policies: ToolPolicy[];
  /** Key file paths, relative to the directory holding the config file. */
  keys: { private: string; public: string };
  log_level: LogLevelName;
}

/** A loaded configuration and where it came from. */
export interface LoadedConfig {
  config: TracemarkConfig;
  /** Absolute path of the file read, or undefined when defaults were used. */
  filePath: string | undefined;
  /** Directory relative paths in the config resolve against. */
  baseDir: string;
}

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'tracemark.config.json';

// ─── Defaults ─────────────────────────────────────────────────────────────────

/** The configuration `init` writes and the values missing fields take. */
export function defaultConfig(): TracemarkConfig {
  return {
    principles: [
      { name: 'Evidence-based claims', description: 'Avoid certainty when evidence or citations are absent.' },
      { name: 'Privacy preservation', description: 'Detect and prevent sensitive data leakage.' },
      { name: 'Non-manipulation', description: 'Disallow coercive or manipulative language.' },
    ],
    require_uncertainty: true,
    risk_thresholds: {
      overall_deny: 0.8,
      overall_escalate: 0.6,
      overconfidence: 0.5,
      sensitive_data: 0.5,
      manipulation: 0.5,
    },
    escalation: [
      {
        name: 'high_overall_risk',
        when: 'overall_risk_score >= overall_escalate',
        action: 'require_human_approval',
      },
    ],
    tool_policies: [
      { tool_name: 'shell', allow: true, conditions: 'overall_risk_score < overall_deny' },
      { tool_name: 'web_search', allow: true, conditions: 'overall_risk_score < overall_deny' },
      { tool_name: 'delete_files', allow: false, conditions: 'always' },
    ],
    keys: { private: 'sig.key', public: 'sig.pub' },
    log_level: 'warn',
  };
}

// ─── Validation ───────────────────────────────────────────────────────────────

const threshold: FieldSchema = { type: 'number', minimum: 0, maximum: 1 };
const text: FieldSchema = { type: 'string' };

export const CONFIG_SCHEMA: FieldSchema = {
  type: 'object',
  properties: {
    principles: {
      type: 'array',
      items: { type: 'object', required: ['name'], properties: { name: text, description: text } },
    },
    require_uncertainty: { type: 'boolean' },
    risk_thresholds: {
      type: 'object',
      properties: {
        overall_deny: threshold,
        overall_escalate: threshold,
        overconfidence: threshold,
        sensitive_data: threshold,
        manipulation: threshold,
      },
    },
    escalation: {
      type: 'array',
      items: { type: 'object', required: ['name'], properties: { name: text, when: text, action: text } },
    },
    tool_policies: {
      type: 'array',
      items: {
        type: 'object',
        required: ['tool_name', 'allow'],
        properties: { tool_name: { type: 'string', minLength: 1 }, allow: { type: 'boolean' }, conditions: text },
      },
    },
    keys: {
      type: 'object',
      properties: { private: { type: 'string', minLength: 1 }, public: { type: 'string', minLength: 1 } },
    },
    log_level: { type: 'string', pattern: /^(debug|info|warn|error|silent)$/ },
  },
};

function str(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function num(value: unknown, fallback: number): number {
  return typeof value === 'number' ? value : fallback;
}

function objects(value: unknown): Record<string, unknown>[] | undefined {
  return Array.isArray(value) ? value.filter(isPlainObject) : undefined;
}

/**
 * Validate raw config JSON and fill in defaults.
 *
 * @throws {InputError} `INPUT_INVALID_CONFIG` listing every invalid field.
 */
export function parseConfig(raw: unknown, source = CONFIG_FILE_NAME): TracemarkConfig {
  const result = validateSchema(raw, CONFIG_SCHEMA);
  if (!result.valid || !isPlainObject(raw)) {
    throw new InputError(
      TracemarkErrorCode.INPUT_INVALID_CONFIG,
      `Invalid ${source}: ${formatSchemaErrors(result.errors)}`,
      { hint: 'Fix the listed fields, or delete the file and run "tracemark init".', context: { source } },
    );
  }

  const defaults = defaultConfig();
  const thresholds: Record<string, unknown> = isPlainObject(raw.risk_thresholds) ? raw.risk_thresholds : {};
  const keys: Record<string, unknown> = isPlainObject(raw.keys) ? raw.keys : {};

  return {
    principles:
      objects(raw.principles)?.map((p) => ({ name: str(p.name, ''), description: str(p.description, '') })) ??
      defaults.principles,
    require_uncertainty:
      typeof raw.require_uncertainty === 'boolean' ? raw.require_uncertainty : defaults.require_uncertainty,
    risk_thresholds: {
      overall_deny: num(thresholds.overall_deny, defaults.risk_thresholds.overall_deny),
      overall_escalate: num(thresholds.overall_escalate, defaults.risk_thresholds.overall_escalate),
      overconfidence: num(thresholds.overconfidence, defaults.risk_thresholds.overconfidence),
      sensitive_data: num(thresholds.sensitive_data, defaults.risk_thresholds.sensitive_data),
      manipulation: num(thresholds.manipulation, defaults.risk_thresholds.manipulation),
    },
    escalation:
      objects(raw.escalation)?.map((e) => ({
        name: str(e.name, ''),
        when: str(e.when, ''),
        action: str(e.action, ''),
      })) ?? defaults.escalation,
    tool_policies:
      objects(raw.tool_policies)?.map((p) => ({
        tool_name: str(p.tool_name, ''),
        allow: p.allow === true,
        ...(typeof p.conditions === 'string' ? { conditions: p.conditions } : {}),
      })) ?? defaults.tool_policies,
    keys: {
      private: str(keys.private, defaults.keys.private),
      public: str(keys.public, defaults.keys.public),
    },
    log_level: isLogLevelName(raw.log_level) ? raw.log_level : defaults.log_level,
  };
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Search for a `tracemark.config.json` starting from `cwd` and walking up to
 * the filesystem root. Returns the absolute path if found, or `undefined`.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');

  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = resolve(dir, '..');
    if (parent === dir) break;
    dir = parent;
  }

  return undefined;
}

/**
 * Load the configuration that applies to `cwd`. Without a config file the
 * defaults apply and relative paths resolve against `cwd`.
 *
 * @throws {InputError} When the file exists but is not valid JSON or has an invalid shape.
 */
export async function loadConfig(cwd?: string): Promise<LoadedConfig> {
  const filePath = findConfigFile(cwd);
  if (filePath === undefined) {
    return { config: defaultConfig(), filePath: undefined, baseDir: resolve(cwd ?? '.') };
  }
  return {
    config: parseConfig(await readJsonFile(filePath), filePath),
    filePath,
    baseDir: dirname(filePath),
  };
}

/**
 * Write `tracemark.config.json` into `dir`.
 *
 * @throws {PersistenceError} `PERSIST_FILE_EXISTS` when a config is already there and `overwrite` is not set.
 */
export async function saveConfig(
  config: TracemarkConfig,
  dir: string,
  options?: { overwrite?: boolean },
): Promise<string> {
  const filePath = join(resolve(dir), CONFIG_FILE_NAME);
  await writeFileAtomic(filePath, toPrettyJson(config), { overwrite: options?.overwrite ?? false });
  return filePath;
}

/** Absolute key paths for a loaded configuration. */
export function resolveKeyPaths(loaded: LoadedConfig): { privateKey: string; publicKey: string } {
  return {
    privateKey: resolve(loaded.baseDir, loaded.config.keys.private),
    publicKey: resolve(loaded.baseDir, loaded.config.keys.public),
  };
}

/** The part of the configuration the decision layer reads. */
export function toRiskConfig(config: TracemarkConfig): RiskConfig {
  return {
    requireUncertainty: config.require_uncertainty,
    overallDeny: config.risk_thresholds.overall_deny,
    toolPolicies: config.tool_policies,
  };
}
