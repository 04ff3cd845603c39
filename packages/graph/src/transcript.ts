/**
 * JSON Lines transcript reading.
 */

import { InputError, TracemarkErrorCode, isJsonValue, isPlainObject, parseJson } from '@tracemark/types';

import type { TranscriptEvent } from './types';

const STRING_FIELDS = ['type', 'ts'] as const;
const NULLABLE_STRING_FIELDS = ['role', 'tool_name'] as const;

function invalidLine(label: string, message: string, line: number): InputError {
  return new InputError(TracemarkErrorCode.INPUT_INVALID_TRANSCRIPT, `${label} ${message}`, {
    hint: 'Transcripts are JSON Lines: one JSON object per line.',
    context: { line },
  });
}

/**
 * Turn one parsed JSON value into an event, checking the interpreted fields.
 *
 * @throws {InputError} `INPUT_INVALID_TRANSCRIPT` naming `label`.
 */
export function toTranscriptEvent(value: unknown, label: string, line = 0): TranscriptEvent {
  if (!isPlainObject(value)) {
    throw invalidLine(label, 'must be a JSON object', line);
  }
  const event: TranscriptEvent = {};
  for (const [key, member] of Object.entries(value)) {
    if (!isJsonValue(member)) {
      throw invalidLine(label, `has a non-JSON value in "${key}"`, line);
    }
    event[key] = member;
  }
  for (const field of STRING_FIELDS) {
    const member = event[field];
    if (member !== undefined && typeof member !== 'string') {
      throw invalidLine(label, `field "${field}" must be a string`, line);
    }
  }
  for (const field of NULLABLE_STRING_FIELDS) {
    const member = event[field];
    if (member !== undefined && member !== null && typeof member !== 'string') {
      throw invalidLine(label, `field "${field}" must be a string or null`, line);
    }
  }
  return event;
}

/**
 * Parse a JSON Lines transcript. Blank lines are skipped; line numbers in
 * errors are 1-based and count blank lines.
 *
 * @param source - Name used in error messages, usually the file path.
 * @throws {InputError} `INPUT_INVALID_JSON` or `INPUT_INVALID_TRANSCRIPT`.
 *
 * @example
 * ```typescript
 * parseTranscript('{"type":"event"}\n\n{"type":"tool_call","tool_name":"shell"}\n');
 * // [{ type: 'event' }, { type: 'tool_call', tool_name: 'shell' }]
 * ```
 */
export function parseTranscript(text: string, source = 'transcript'): TranscriptEvent[] {
  const events: TranscriptEvent[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim() ?? '';
    if (line.length === 0) {
      continue;
    }
    const label = `${source} line ${i + 1}`;
    events.push(toTranscriptEvent(parseJson(line, label), label, i + 1));
  }
  return events;
}
