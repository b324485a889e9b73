import type { ErrorDraft } from '../domain/ErrorRecord';
import type { PayloadShape } from '../domain/PayloadShape';
import {
  asIsoTimestamp,
  asText,
  firstElement,
  firstText,
  getObject,
  getPath,
  isObject,
  type JsonObject,
} from '../libs/probe';

export type SkipReason = 'action_not_created' | 'unrecognized_payload';

export type NormalizeResult =
  | { kind: 'record'; record: ErrorDraft }
  | { kind: 'skip'; reason: SkipReason; action: string | null; rawPayload: string };

type ExtractedFields = Omit<ErrorDraft, 'shape' | 'rawPayload'>;

const INGESTED_ACTION = 'created';

export function detectShape(payload: unknown): PayloadShape {
  if (!isObject(payload)) return { kind: 'unrecognized', value: payload };

  const data = getObject(payload, 'data') ?? {};
  const hasAction = Object.prototype.hasOwnProperty.call(payload, 'action');

  if (hasAction || isObject(data.issue) || isObject(data.event)) {
    return { kind: 'nested', hasAction, action: asText(payload.action), data };
  }

  const attachment = firstElement(payload.attachments);
  const hasLegacyFields = payload.message !== undefined || payload.exception !== undefined;
  if (!hasLegacyFields && isObject(attachment)) {
    return { kind: 'attachments', body: payload, attachment };
  }

  return { kind: 'legacy', body: payload };
}

/**
 * Maps any parsed webhook body to a draft record, or to a skip decision.
 * Never throws: missing or oddly typed fields come out as null (message as "").
 */
export function normalizePayload(payload: unknown, rawPayload = serialize(payload)): NormalizeResult {
  const shape = detectShape(payload);

  switch (shape.kind) {
    case 'unrecognized':
      return { kind: 'skip', reason: 'unrecognized_payload', action: null, rawPayload };
    case 'nested':
      if (shape.hasAction && shape.action !== INGESTED_ACTION) {
        return { kind: 'skip', reason: 'action_not_created', action: shape.action, rawPayload };
      }
      return toRecord('nested', extractNested(shape.data), rawPayload);
    case 'attachments':
      return toRecord('attachments', extractAttachments(shape.attachment), rawPayload);
    case 'legacy':
      return toRecord('legacy', extractLegacy(shape.body), rawPayload);
  }
}

function toRecord(shape: ErrorDraft['shape'], fields: ExtractedFields, rawPayload: string): NormalizeResult {
  return { kind: 'record', record: { ...fields, shape, rawPayload } };
}

function extractNested(data: JsonObject): ExtractedFields {
  const event = getObject(data, 'event');
  const issue = getObject(data, 'issue');

  const firstException =
    firstElement(getPath(event, 'exceptions')) ?? firstElement(getPath(event, 'exception', 'values'));

  return {
    eventId: firstText(getPath(event, 'event_id'), getPath(issue, 'id')),
    project: firstText(
      getPath(data, 'project', 'slug'),
      getPath(data, 'project', 'name'),
      getPath(issue, 'project', 'slug'),
      getPath(event, 'project'),
    ),
    message:
      firstText(
        getPath(event, 'title'),
        getPath(issue, 'title'),
        getPath(event, 'message'),
        getPath(issue, 'culprit'),
      ) ?? '',
    exceptionType: asText(getPath(firstException, 'type')),
    exceptionValue: asText(getPath(firstException, 'value')),
    stacktrace:
      formatFrames(getPath(event, 'stacktrace', 'frames')) ??
      formatFrames(getPath(firstException, 'stacktrace', 'frames')),
    level: firstText(getPath(event, 'level'), getPath(issue, 'level')),
    occurredAt: asIsoTimestamp(getPath(event, 'timestamp')),
  };
}

function extractLegacy(body: JsonObject): ExtractedFields {
  const exception = getObject(body, 'exception');
  const stacktrace = exception?.stacktrace;

  return {
    eventId: asText(body.event_id),
    project: asText(body.project),
    message: asText(body.message) ?? '',
    exceptionType: asText(exception?.type),
    exceptionValue: asText(exception?.value),
    stacktrace: typeof stacktrace === 'string' ? asText(stacktrace) : formatFrames(getPath(stacktrace, 'frames')),
    level: asText(body.level),
    occurredAt: asIsoTimestamp(body.timestamp),
  };
}

function extractAttachments(attachment: JsonObject): ExtractedFields {
  const message = firstText(attachment.title, attachment.text) ?? '';

  let project: string | null = null;
  if (Array.isArray(attachment.fields)) {
    const field = attachment.fields.find(f => asText(getPath(f, 'title'))?.toLowerCase() === 'project');
    project = asText(getPath(field, 'value'));
  }

  // "TypeError: x is undefined" -> type + value
  let exceptionType: string | null = null;
  let exceptionValue: string | null = null;
  const sep = message.indexOf(':');
  if (sep > 0) {
    const type = message.slice(0, sep).trim();
    const value = message.slice(sep + 1).trim();
    if (type && value) {
      exceptionType = type;
      exceptionValue = value;
    }
  }

  const link = asText(attachment.title_link);
  const issueId = link ? /\/issues\/(\d+)/.exec(link)?.[1] ?? null : null;

  return {
    eventId: issueId,
    project,
    message,
    exceptionType,
    exceptionValue,
    stacktrace: null,
    level: null,
    occurredAt: null,
  };
}

/** One `filename:function:lineno` line per frame; unknown parts are written as `?`. */
export function formatFrames(frames: unknown): string | null {
  if (!Array.isArray(frames)) return null;

  const lines = frames
    .filter(isObject)
    .map(f => [f.filename, f.function, f.lineno].map(part => asText(part) ?? '?').join(':'));

  return lines.length > 0 ? lines.join('\n') : null;
}

function serialize(payload: unknown): string {
  try {
    return JSON.stringify(payload) ?? String(payload);
  } catch {
    return String(payload);
  }
}
