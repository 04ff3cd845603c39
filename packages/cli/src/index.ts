/**
 * tracemark CLI: builds integrity graphs from agent transcripts, signs them
 * and verifies signatures.
 *
 * `run()` is the whole program minus the process: it takes the user's
 * arguments and returns the exit code and both output streams, so tests can
 * drive it in-process. `bin.ts` wires it to the real process.
 *
 * @packageDocumentation
 */

import { join, resolve } from 'path';

import { assessText, assessToolCall } from '@tracemark/checks';
import { KeyManager, encodePublicKeyPem, keyPairFromPrivateKey, type KeyPair } from '@tracemark/crypto';
import { buildGraph, readTranscriptFile, transcriptText, writeBuildResult } from '@tracemark/graph';
import { signGraphFile, verifyGraphFiles } from '@tracemark/sig';
import { pathExists, readJsonFile, writeFileAtomic } from '@tracemark/store';
import {
  HASH_ALGORITHM,
  Logger,
  LogLevel,
  SIGNATURE_ALGORITHM,
  TRACEMARK_VERSION,
  TracemarkError,
  describeError,
  formatError,
  logLevelFromName,
} from '@tracemark/types';

import {
  CONFIG_FILE_NAME,
  defaultConfig,
  loadConfig,
  resolveKeyPaths,
  saveConfig,
  toRiskConfig,
  type LoadedConfig,
} from './config';
import {
  bold,
  cyan,
  dim,
  failure,
  getColorsEnabled,
  header,
  info,
  keyValue,
  setColorsEnabled,
  success,
} from './format';

export {
  CONFIG_FILE_NAME,
  defaultConfig,
  findConfigFile,
  loadConfig,
  parseConfig,
  saveConfig,
  resolveKeyPaths,
  toRiskConfig,
} from './config';
export type { TracemarkConfig, LoadedConfig, Principle, EscalationRule, RiskThresholds } from './config';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Outcome of one CLI invocation. */
export interface RunResult {
  exitCode: number;
  /** Everything printed to stdout, lines joined with `\n`. */
  stdout: string;
  /** Log entries and error messages, lines joined with `\n`. */
  stderr: string;
}

type Flags = Record<string, string | boolean>;

interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Flags;
}

interface CommandContext {
  cwd: string;
  flags: Flags;
  positional: string[];
  logger: Logger;
  print(line?: string): void;
  /** The configuration for `cwd`, loaded once per invocation. */
  config(): Promise<LoadedConfig>;
}

interface CommandSpec {
  name: string;
  usage: string;
  summary: string;
  options: ReadonlyArray<readonly [string, string]>;
  run(ctx: CommandContext): Promise<number>;
}

/** A mistake in the command line itself, rendered as `Error: ...`. */
class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ─── Argument parsing ─────────────────────────────────────────────────────────

/** Flags that never take a value. */
const BOOLEAN_FLAGS = new Set(['no-color', 'verbose', 'quiet', 'help', 'force', 'require-ts', 'json']);

function parseArgs(args: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: Flags = {};
  let command = '';

  let i = 0;
  while (i < args.length) {
    const arg = args[i]!;

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i += 2;
      } else {
        flags[key] = true;
        i += 1;
      }
    } else if (command === '') {
      command = arg;
      i += 1;
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { command, positional, flags };
}

function getFlag(flags: Flags, key: string): string | undefined {
  const val = flags[key];
  if (val === undefined || typeof val === 'boolean') return undefined;
  return val;
}

function requireFlag(flags: Flags, key: string, description: string): string {
  const val = getFlag(flags, key);
  if (val === undefined || val.length === 0) {
    throw new UsageError(`Missing required option: --${key} <${description}>`);
  }
  return val;
}

function pathFlag(ctx: CommandContext, key: string, description: string): string {
  return resolve(ctx.cwd, requireFlag(ctx.flags, key, description));
}

function printKeyPair(ctx: CommandContext, keyPair: KeyPair, privatePath: string, publicPath: string): void {
  ctx.print(success('Generated Ed25519 key pair.'));
  ctx.print(
    keyValue([
      ['Private key', privatePath],
      ['Public key', publicPath],
      ['Public key hex', keyPair.publicKeyHex],
    ]),
  );
}

// ─── Command: init ────────────────────────────────────────────────────────────

async function cmdInit(ctx: CommandContext): Promise<number> {
  const force = ctx.flags['force'] === true;
  const configPath = join(ctx.cwd, CONFIG_FILE_NAME);

  if (force || !(await pathExists(configPath))) {
    await saveConfig(defaultConfig(), ctx.cwd, { overwrite: force });
    ctx.print(success(`Wrote ${configPath}`));
  } else {
    ctx.print(info(`Keeping existing ${configPath}`));
  }

  const { privateKey, publicKey } = resolveKeyPaths(await ctx.config());
  const keys = new KeyManager({ logger: ctx.logger.child('keys') });
  const havePrivate = await pathExists(privateKey);
  const havePublic = await pathExists(publicKey);

  if (!force && havePrivate && havePublic) {
    ctx.print(info(`Keeping existing key pair ${privateKey} and ${publicKey}`));
    return 0;
  }

  if (!force && havePrivate) {
    const keyPair = await keyPairFromPrivateKey(await keys.loadPrivateKey(privateKey));
    await writeFileAtomic(publicKey, encodePublicKeyPem(keyPair.publicKey));
    ctx.print(success(`Derived ${publicKey} from ${privateKey}`));
    return 0;
  }

  // No private key: a fresh pair replaces any orphaned public key.
  const keyPair = await keys.generate();
  await keys.persist(keyPair, privateKey, publicKey, { overwrite: force || havePublic });
  printKeyPair(ctx, keyPair, privateKey, publicKey);
  return 0;
}

// ─── Command: keygen ──────────────────────────────────────────────────────────

async function cmdKeygen(ctx: CommandContext): Promise<number> {
  const privatePath = pathFlag(ctx, 'private', 'path');
  const publicPath = pathFlag(ctx, 'public', 'path');

  const keys = new KeyManager({ logger: ctx.logger.child('keys') });
  const keyPair = await keys.generate();
  await keys.persist(keyPair, privatePath, publicPath, { overwrite: ctx.flags['force'] === true });
  printKeyPair(ctx, keyPair, privatePath, publicPath);
  return 0;
}

// ─── Command: check ───────────────────────────────────────────────────────────

async function cmdCheck(ctx: CommandContext): Promise<number> {
  const file = pathFlag(ctx, 'file', 'transcript.jsonl');
  const { config } = await ctx.config();

  const events = await readTranscriptFile(file);
  const summary = assessText(transcriptText(events), { config: toRiskConfig(config) });
  ctx.logger.debug('checked transcript', { file, events: events.length, overall: summary.overall_risk_score });
  ctx.print(JSON.stringify(summary, null, 2));
  return 0;
}

// ─── Command: gate ────────────────────────────────────────────────────────────

async function cmdGate(ctx: CommandContext): Promise<number> {
  const tool = requireFlag(ctx.flags, 'tool', 'name');
  const payloadPath = pathFlag(ctx, 'payload', 'file');
  const { config } = await ctx.config();

  const payload = await readJsonFile(payloadPath);
  const summary = assessToolCall(tool, JSON.stringify(payload), { config: toRiskConfig(config) });
  for (const decision of summary.tool_decisions) {
    if (decision.decision === 'deny') {
      ctx.logger.info('tool call denied', { tool: decision.tool_name, reason: decision.reason });
    }
  }
  ctx.print(JSON.stringify(summary, null, 2));
  return 0;
}

// ─── Command: run ─────────────────────────────────────────────────────────────

async function cmdRun(ctx: CommandContext): Promise<number> {
  const agent = requireFlag(ctx.flags, 'agent', 'id');
  const input = pathFlag(ctx, 'input', 'transcript.jsonl');
  const outDir = pathFlag(ctx, 'out', 'dir');
  const { config } = await ctx.config();

  const events = await readTranscriptFile(input);
  const result = buildGraph(events, {
    agent,
    requireTimestamps: ctx.flags['require-ts'] === true,
    config: toRiskConfig(config),
    logger: ctx.logger.child('graph'),
  });
  const { graphPath, summaryPath } = await writeBuildResult(outDir, result, {
    overwrite: ctx.flags['force'] === true,
  });
  ctx.print(success(`Wrote ${graphPath} and ${summaryPath}`));
  return 0;
}

// ─── Command: sign ────────────────────────────────────────────────────────────

async function cmdSign(ctx: CommandContext): Promise<number> {
  const graphPath = pathFlag(ctx, 'in', 'graph.json');
  const signaturePath = pathFlag(ctx, 'out', 'signature.json');
  const loaded = await ctx.config();
  const keyFlag = getFlag(ctx.flags, 'key');
  const keyPath = keyFlag !== undefined ? resolve(ctx.cwd, keyFlag) : resolveKeyPaths(loaded).privateKey;

  if (!(await pathExists(keyPath))) {
    throw new UsageError(`Private key not found: ${keyPath}. Run 'tracemark init' or pass --key <path>.`);
  }

  const document = await signGraphFile(graphPath, keyPath, signaturePath, {
    overwrite: ctx.flags['force'] === true,
    logger: ctx.logger.child('sig'),
  });
  ctx.print(success(`Wrote signature to ${signaturePath}`));
  ctx.print(keyValue([['Graph SHA-256', document.graph_sha256]]));
  return 0;
}

// ─── Command: verify ──────────────────────────────────────────────────────────

async function cmdVerify(ctx: CommandContext): Promise<number> {
  const signaturePath = pathFlag(ctx, 'sig', 'signature.json');
  const graphPath = pathFlag(ctx, 'in', 'graph.json');
  const pubFlag = getFlag(ctx.flags, 'pub');
  const publicKeyPath =
    pubFlag !== undefined ? resolve(ctx.cwd, pubFlag) : resolveKeyPaths(await ctx.config()).publicKey;

  const result = await verifyGraphFiles(signaturePath, graphPath, publicKeyPath, {
    logger: ctx.logger.child('sig'),
  });
  if (result.valid) {
    ctx.print(success(result.reason));
    return 0;
  }
  ctx.print(failure(result.reason));
  return 1;
}

// ─── Command: version ─────────────────────────────────────────────────────────

async function cmdVersion(ctx: CommandContext): Promise<number> {
  if (ctx.flags['json'] === true) {
    ctx.print(
      JSON.stringify({ version: TRACEMARK_VERSION, signature: SIGNATURE_ALGORITHM, hash: HASH_ALGORITHM }, null, 2),
    );
  } else {
    ctx.print(TRACEMARK_VERSION);
  }
  return 0;
}

// ─── Command: help ────────────────────────────────────────────────────────────

const GLOBAL_OPTIONS: ReadonlyArray<readonly [string, string]> = [
  ['--no-color', 'Disable ANSI colors'],
  ['--verbose', 'Log at debug level'],
  ['--quiet', 'Suppress log output'],
  ['--help', 'Show help for a command'],
];

function printOptions(ctx: CommandContext, options: ReadonlyArray<readonly [string, string]>): void {
  const width = Math.max(...options.map(([flag]) => flag.length));
  for (const [flag, description] of options) {
    ctx.print(`  ${cyan(flag.padEnd(width))}  ${description}`);
  }
}

function printCommandHelp(ctx: CommandContext, spec: CommandSpec): void {
  ctx.print(`${bold('Usage:')} tracemark ${spec.usage}`);
  ctx.print('');
  ctx.print(spec.summary);
  if (spec.options.length > 0) {
    ctx.print('');
    ctx.print(bold('Options:'));
    printOptions(ctx, spec.options);
  }
}

function printHelp(ctx: CommandContext): void {
  ctx.print(`${header('tracemark')} ${dim(`v${TRACEMARK_VERSION}`)}`);
  ctx.print('Signed integrity graphs for agent transcripts.');
  ctx.print('');
  ctx.print(`${bold('Usage:')} tracemark <command> [options]`);
  ctx.print('');
  ctx.print(bold('Commands:'));
  const width = Math.max(...COMMANDS.map((c) => c.name.length));
  for (const spec of COMMANDS) {
    ctx.print(`  ${cyan(spec.name.padEnd(width))}  ${spec.summary}`);
  }
  ctx.print('');
  ctx.print(bold('Global options:'));
  printOptions(ctx, GLOBAL_OPTIONS);
}

async function cmdHelp(ctx: CommandContext): Promise<number> {
  const topic = ctx.positional[0];
  if (topic === undefined) {
    printHelp(ctx);
    return 0;
  }
  const spec = findCommand(topic);
  if (spec === undefined) {
    throw new UsageError(`Unknown command: '${topic}'. Run 'tracemark help' for usage.`);
  }
  printCommandHelp(ctx, spec);
  return 0;
}

// ─── Command table ────────────────────────────────────────────────────────────

const COMMANDS: readonly CommandSpec[] = [
  {
    name: 'init',
    usage: 'init [--force]',
    summary: 'Write tracemark.config.json and a signing key pair where missing',
    options: [['--force', 'Replace the config file and key pair']],
    run: cmdInit,
  },
  {
    name: 'keygen',
    usage: 'keygen --private <path> --public <path> [--force]',
    summary: 'Generate an Ed25519 key pair as PEM files',
    options: [
      ['--private <path>', 'PKCS#8 private key file, written with mode 0600'],
      ['--public <path>', 'SPKI public key file'],
      ['--force', 'Replace existing key files'],
    ],
    run: cmdKeygen,
  },
  {
    name: 'check',
    usage: 'check --file <transcript.jsonl>',
    summary: 'Score a transcript and print its risk summary',
    options: [['--file <path>', 'JSON Lines transcript']],
    run: cmdCheck,
  },
  {
    name: 'gate',
    usage: 'gate --tool <name> --payload <file>',
    summary: 'Decide whether a tool call may run',
    options: [
      ['--tool <name>', 'Name of the tool being called'],
      ['--payload <file>', 'JSON file holding the call payload'],
    ],
    run: cmdGate,
  },
  {
    name: 'run',
    usage: 'run --agent <id> --input <transcript.jsonl> --out <dir> [--require-ts] [--force]',
    summary: 'Build the integrity graph and risk summary for a transcript',
    options: [
      ['--agent <id>', 'Agent identifier recorded in every node'],
      ['--input <path>', 'JSON Lines transcript'],
      ['--out <dir>', 'Directory for sig.graph.json and sig.summary.json'],
      ['--require-ts', 'Reject events without a "ts" timestamp'],
      ['--force', 'Replace existing output files'],
    ],
    run: cmdRun,
  },
  {
    name: 'sign',
    usage: 'sign --in <graph.json> --out <signature.json> [--key <path>] [--force]',
    summary: 'Sign the canonical form of a graph',
    options: [
      ['--in <path>', 'Graph to sign'],
      ['--out <path>', 'Signature document to write'],
      ['--key <path>', 'PEM private key (default: keys.private from the config)'],
      ['--force', 'Replace an existing signature document'],
    ],
    run: cmdSign,
  },
  {
    name: 'verify',
    usage: 'verify --sig <signature.json> --in <graph.json> [--pub <path>]',
    summary: 'Verify a graph against its signature; exits 1 on failure',
    options: [
      ['--sig <path>', 'Signature document'],
      ['--in <path>', 'Graph to verify'],
      ['--pub <path>', 'PEM public key (default: keys.public from the config)'],
    ],
    run: cmdVerify,
  },
  {
    name: 'version',
    usage: 'version [--json]',
    summary: 'Print the version',
    options: [['--json', 'Print version and algorithms as JSON']],
    run: cmdVersion,
  },
  {
    name: 'help',
    usage: 'help [command]',
    summary: 'Show help for tracemark or one command',
    options: [],
    run: cmdHelp,
  },
];

function findCommand(name: string): CommandSpec | undefined {
  return COMMANDS.find((c) => c.name === name);
}

// ─── Entry point ──────────────────────────────────────────────────────────────

function renderError(err: unknown): string {
  if (err instanceof UsageError) return `Error: ${err.message}`;
  if (err instanceof TracemarkError) return formatError(err);
  return `Error: ${describeError(err)}`;
}

async function dispatch(parsed: ParsedArgs, ctx: CommandContext): Promise<number> {
  if (parsed.command === '') {
    printHelp(ctx);
    return 0;
  }

  const spec = findCommand(parsed.command);
  if (spec === undefined) {
    throw new UsageError(`Unknown command: '${parsed.command}'. Run 'tracemark help' for usage.`);
  }
  if (parsed.flags['help'] === true) {
    printCommandHelp(ctx, spec);
    return 0;
  }
  if (spec.name !== 'help' && parsed.positional.length > 0) {
    throw new UsageError(`Unexpected argument: '${parsed.positional[0]}'`);
  }
  return spec.run(ctx);
}

/**
 * Run the CLI with the user's arguments (without `node` and the script path).
 *
 * @param argv - Arguments, e.g. `['verify', '--sig', 'sig.json', '--in', 'graph.json']`.
 * @param cwd  - Directory relative paths and the config lookup start from.
 */
export async function run(argv: readonly string[], cwd: string = process.cwd()): Promise<RunResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const parsed = parseArgs(argv);

  const forcedLevel =
    parsed.flags['verbose'] === true ? LogLevel.DEBUG : parsed.flags['quiet'] === true ? LogLevel.SILENT : undefined;
  const logger = new Logger({
    level: forcedLevel ?? LogLevel.WARN,
    component: 'cli',
    output: (entry) => stderr.push(JSON.stringify(entry)),
  });

  let configPromise: Promise<LoadedConfig> | undefined;
  const ctx: CommandContext = {
    cwd: resolve(cwd),
    flags: parsed.flags,
    positional: parsed.positional,
    logger,
    print: (line = '') => {
      stdout.push(line);
    },
    config: () => {
      if (configPromise === undefined) {
        configPromise = loadConfig(cwd).then((loaded) => {
          if (forcedLevel === undefined) {
            logger.setLevel(logLevelFromName(loaded.config.log_level));
          }
          logger.debug('loaded configuration', { path: loaded.filePath ?? '(defaults)' });
          return loaded;
        });
      }
      return configPromise;
    },
  };

  const previousColors = getColorsEnabled();
  if (parsed.flags['no-color'] === true) {
    setColorsEnabled(false);
  }
  try {
    const exitCode = await dispatch(parsed, ctx);
    return { exitCode, stdout: stdout.join('\n'), stderr: stderr.join('\n') };
  } catch (err) {
    stderr.push(renderError(err));
    return { exitCode: 1, stdout: stdout.join('\n'), stderr: stderr.join('\n') };
  } finally {
    setColorsEnabled(previousColors);
  }
}
