import { describe, it, expect } from 'vitest';
import { InputError, TracemarkErrorCode } from '@tracemark/types';
import { parseTranscript, toTranscriptEvent } from './transcript';

describe('parseTranscript', () => {
  it('reads one event per line and skips blank lines', () => {
    const text = '{"type":"event","role":"user"}\n\n  \r\n{"type":"tool_call","tool_name":"shell","payload":{"cmd":"ls"}}\n';
    expect(parseTranscript(text)).toEqual([
      { type: 'event', role: 'user' },
      { type: 'tool_call', tool_name: 'shell', payload: { cmd: 'ls' } },
    ]);
  });

  it('keeps unknown fields', () => {
    expect(parseTranscript('{"type":"event","extra":[1,{"k":null}]}')).toEqual([
      { type: 'event', extra: [1, { k: null }] },
    ]);
  });

  it('returns no events for empty input', () => {
    expect(parseTranscript('')).toEqual([]);
    expect(parseTranscript('\n\n')).toEqual([]);
  });

  it('names the line of malformed JSON', () => {
    expect(() => parseTranscript('{"type":"event"}\n\n{broken', 'run.jsonl')).toThrow(
      expect.objectContaining({ code: TracemarkErrorCode.INPUT_INVALID_JSON }),
    );
    expect(() => parseTranscript('{"type":"event"}\n\n{broken', 'run.jsonl')).toThrow(/^run\.jsonl line 3 is not valid JSON/);
  });

  it('reads events whose role and tool_name are null', () => {
    expect(parseTranscript('{"type":"tool_call","role":null,"tool_name":"shell","payload":{}}')).toEqual([
      { type: 'tool_call', role: null, tool_name: 'shell', payload: {} },
    ]);
  });

  it('rejects lines that are not objects', () => {
    expect(() => parseTranscript('{"type":"event"}\n[1,2]')).toThrow('transcript line 2 must be a JSON object');
  });

  it('rejects non-string interpreted fields', () => {
    try {
      parseTranscript('{"ts": 17}');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InputError);
      expect(err).toMatchObject({
        code: TracemarkErrorCode.INPUT_INVALID_TRANSCRIPT,
        message: 'transcript line 1 field "ts" must be a string',
        context: { line: 1 },
      });
    }
  });
});

describe('toTranscriptEvent', () => {
  it('accepts null role and tool_name', () => {
    expect(toTranscriptEvent({ type: 'tool_call', role: null, tool_name: null, payload: {} }, 'event 1')).toEqual({
      type: 'tool_call',
      role: null,
      tool_name: null,
      payload: {},
    });
  });

  it('rejects a role that is neither a string nor null', () => {
    expect(() => toTranscriptEvent({ role: 3 }, 'event 2')).toThrow('event 2 field "role" must be a string or null');
  });

  it('still requires type and ts to be strings when present', () => {
    expect(() => toTranscriptEvent({ type: null }, 'event 3')).toThrow('event 3 field "type" must be a string');
  });


  it('rejects values JSON cannot carry', () => {
    expect(() => toTranscriptEvent({ when: new Date(0) }, 'event 1')).toThrow('event 1 has a non-JSON value in "when"');
  });
});
