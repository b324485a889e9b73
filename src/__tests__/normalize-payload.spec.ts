import { describe, it, expect } from 'vitest';
import { detectShape, formatFrames, normalizePayload } from '../usecases/normalize-payload';

const nestedCreated = {
  action: 'created',
  data: {
    project: { slug: 'my-project' },
    issue: { id: '42', title: 'Issue title', level: 'warning', project: { slug: 'issue-proj' } },
    event: {
      event_id: 'ev-1',
      title: 'ValueError: boom',
      level: 'error',
      timestamp: 1700000000,
      exceptions: [{ type: 'ValueError', value: 'boom' }, { type: 'KeyError', value: 'later' }],
      stacktrace: {
        frames: [
          { filename: 'app.py', function: 'main', lineno: 10 },
          { filename: 'lib.py', function: 'run', lineno: 3 },
        ],
      },
    },
  },
};

describe('detectShape', () => {
  it('treats an object with action as nested', () => {
    expect(detectShape({ action: 'resolved' })).toMatchObject({ kind: 'nested', hasAction: true, action: 'resolved' });
  });

  it('treats data.event without action as nested, without an action', () => {
    expect(detectShape({ data: { event: {} } })).toMatchObject({ kind: 'nested', hasAction: false, action: null });
  });

  it('prefers legacy fields over attachments', () => {
    expect(detectShape({ message: 'm', attachments: [{ title: 't' }] }).kind).toBe('legacy');
    expect(detectShape({ attachments: [{ title: 't' }] }).kind).toBe('attachments');
  });

  it('marks non-objects as unrecognized', () => {
    for (const v of [[], 'str', 1, null, true]) {
      expect(detectShape(v).kind).toBe('unrecognized');
    }
  });
});

describe('normalizePayload: nested shape', () => {
  it('extracts every field from a created event', () => {
    const result = normalizePayload(nestedCreated);
    expect(result).toEqual({
      kind: 'record',
      record: {
        eventId: 'ev-1',
        project: 'my-project',
        message: 'ValueError: boom',
        exceptionType: 'ValueError',
        exceptionValue: 'boom',
        stacktrace: 'app.py:main:10\nlib.py:run:3',
        level: 'error',
        occurredAt: '2023-11-14T22:13:20.000Z',
        shape: 'nested',
        rawPayload: JSON.stringify(nestedCreated),
      },
    });
  });

  it('falls back to issue fields when event data is missing', () => {
    const payload = {
      action: 'created',
      data: { issue: { id: '42', title: 'Issue title', level: 'warning', project: { slug: 'issue-proj' } } },
    };
    const result = normalizePayload(payload);
    expect(result.kind).toBe('record');
    if (result.kind !== 'record') return;
    expect(result.record).toMatchObject({
      eventId: '42',
      project: 'issue-proj',
      message: 'Issue title',
      level: 'warning',
      exceptionType: null,
      stacktrace: null,
    });
  });

  it('uses event.project and event.message as last resorts', () => {
    const result = normalizePayload({ action: 'created', data: { event: { project: 'ev-proj', message: 'plain message' } } });
    expect(result).toMatchObject({ kind: 'record', record: { project: 'ev-proj', message: 'plain message' } });
  });

  it('takes the stack trace from the first exception when the event has none', () => {
    const payload = {
      action: 'created',
      data: {
        event: {
          exception: {
            values: [{ type: 'TypeError', value: 'x is undefined', stacktrace: { frames: [{ filename: 'a.js', function: 'f', lineno: 1 }] } }],
          },
        },
      },
    };
    expect(normalizePayload(payload)).toMatchObject({
      kind: 'record',
      record: { exceptionType: 'TypeError', exceptionValue: 'x is undefined', stacktrace: 'a.js:f:1' },
    });
  });

  it('skips actions other than created', () => {
    const payload = { action: 'resolved', data: { issue: { title: 'gone' } } };
    expect(normalizePayload(payload, '{"action":"resolved"}')).toEqual({
      kind: 'skip',
      reason: 'action_not_created',
      action: 'resolved',
      rawPayload: '{"action":"resolved"}',
    });
  });

  it('skips a present but null action', () => {
    expect(normalizePayload({ action: null })).toMatchObject({ kind: 'skip', reason: 'action_not_created', action: null });
  });

  it('does not skip nested data without an action', () => {
    const result = normalizePayload({ data: { event: { title: 'no action here' } } });
    expect(result).toMatchObject({ kind: 'record', record: { message: 'no action here', shape: 'nested' } });
  });

  it('degrades deep nulls and wrong types to null', () => {
    const result = normalizePayload({
      action: 'created',
      data: { project: null, issue: null, event: { exceptions: [null], stacktrace: { frames: 'nope' }, level: {} } },
    });
    expect(result).toMatchObject({
      kind: 'record',
      record: {
        eventId: null,
        project: null,
        message: '',
        exceptionType: null,
        exceptionValue: null,
        stacktrace: null,
        level: null,
        occurredAt: null,
      },
    });
  });
});

describe('normalizePayload: legacy shape', () => {
  it('maps the flat format field by field', () => {
    const payload = { event_id: 'e1', project: 'p1', message: 'm', exception: { type: 'T', value: 'V' } };
    const raw = JSON.stringify(payload);
    expect(normalizePayload(payload, raw)).toEqual({
      kind: 'record',
      record: {
        eventId: 'e1',
        project: 'p1',
        message: 'm',
        exceptionType: 'T',
        exceptionValue: 'V',
        stacktrace: null,
        level: null,
        occurredAt: null,
        shape: 'legacy',
        rawPayload: raw,
      },
    });
  });

  it('keeps a string stack trace as is and reads level and timestamp', () => {
    const trace = 'Traceback (most recent call last):\n  File "app.py", line 3';
    const result = normalizePayload({ message: 'm', level: 'warning', timestamp: '2024-05-01T10:00:00Z', exception: { stacktrace: trace } });
    expect(result).toMatchObject({
      kind: 'record',
      record: { stacktrace: trace, level: 'warning', occurredAt: '2024-05-01T10:00:00.000Z' },
    });
  });

  it('stringifies scalars and drops structured values', () => {
    const result = normalizePayload({ project: { slug: 'x' }, message: null, exception: 'oops', level: 3, event_id: 17 });
    expect(result).toMatchObject({
      kind: 'record',
      record: {
        project: null,
        message: '',
        exceptionType: null,
        exceptionValue: null,
        stacktrace: null,
        level: '3',
        eventId: '17',
      },
    });
  });

  it('never skips an object without an action', () => {
    const odd: unknown[] = [
      {},
      { data: null },
      { data: { event: [] } },
      { exception: 'x' },
      { message: 42 },
      { attachments: [] },
      { attachments: [{ title: 'A' }] },
      { action_type: 'resolved' },
    ];
    for (const payload of odd) {
      expect(normalizePayload(payload).kind).toBe('record');
    }
  });

  it('keeps the received text as raw payload', () => {
    const text = '{ "message" : "spaced",\n  "project": "p1" }';
    const result = normalizePayload(JSON.parse(text), text);
    expect(result).toMatchObject({ kind: 'record', record: { rawPayload: text, message: 'spaced' } });
  });
});

describe('normalizePayload: attachments shape', () => {
  it('reads title, project field and issue link', () => {
    const payload = {
      alias: 'alerts',
      attachments: [
        {
          title: 'TypeError: x is undefined',
          title_link: 'https://tracker.example.test/acme/issues/77',
          fields: [{ title: 'Environment', value: 'prod' }, { title: 'Project', value: 'web' }],
        },
      ],
    };
    expect(normalizePayload(payload)).toMatchObject({
      kind: 'record',
      record: {
        eventId: '77',
        project: 'web',
        message: 'TypeError: x is undefined',
        exceptionType: 'TypeError',
        exceptionValue: 'x is undefined',
        shape: 'attachments',
      },
    });
  });

  it('leaves exception fields empty when the title has no type prefix', () => {
    expect(normalizePayload({ attachments: [{ title: 'Something broke' }] })).toMatchObject({
      kind: 'record',
      record: { message: 'Something broke', exceptionType: null, exceptionValue: null, project: null, eventId: null },
    });
  });
});

describe('normalizePayload: unrecognized', () => {
  it('skips JSON values that are not objects', () => {
    expect(normalizePayload([1, 2])).toEqual({
      kind: 'skip',
      reason: 'unrecognized_payload',
      action: null,
      rawPayload: '[1,2]',
    });
    expect(normalizePayload(null)).toMatchObject({ kind: 'skip', rawPayload: 'null' });
  });
});

describe('formatFrames', () => {
  it('writes unknown parts as ? and ignores non-object frames', () => {
    expect(formatFrames([{ filename: 'a.js' }, 'junk', { function: 'f', lineno: 0 }])).toBe('a.js:?:?\n?:f:0');
  });

  it('returns null for empty or missing frames', () => {
    expect(formatFrames([])).toBeNull();
    expect(formatFrames(undefined)).toBeNull();
  });
});
