import type { AppConfig } from '../config/env';
import type { ErrorRecord } from '../domain/ErrorRecord';
import type { ErrorWriter } from '../domain/ports/ErrorWriter';
import { MalformedPayloadError, errorMessage } from '../libs/errors';
import type { Logger } from '../libs/logger';
import { withTimeout } from '../libs/timeout';
import { normalizePayload, type SkipReason } from './normalize-payload';

export type HandlerResult =
  | { kind: 'stored'; id: number; record: ErrorRecord }
  | { kind: 'ignored'; reason: SkipReason; action: string | null }
  | { kind: 'rejected'; project: string; allowedProject: string }
  | { kind: 'malformed'; error: string }
  | { kind: 'storage_error'; error: string };

export type ProjectFilter = Pick<AppConfig, 'filterByProject' | 'allowedProject'>;

export type IngestDeps = {
  writer: ErrorWriter;
  config: ProjectFilter & Pick<AppConfig, 'storageTimeoutMs'>;
  logger: Logger;
  now?: () => Date;
};

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Exact text of the body; bytes that are not valid UTF-8 make it malformed. */
export function decodeWebhookBody(rawBody: string | Buffer): string {
  if (typeof rawBody === 'string') return rawBody;
  try {
    return utf8.decode(rawBody);
  } catch (err) {
    throw new MalformedPayloadError('Body is not valid UTF-8', { cause: err });
  }
}

/** Parses the body, ignoring a leading byte order mark. */
export function parseWebhookBody(text: string): unknown {
  try {
    return JSON.parse(text.startsWith('\uFEFF') ? text.slice(1) : text);
  } catch (err) {
    throw new MalformedPayloadError(`Invalid JSON: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Rejects only when filtering is on, an allowed slug is configured and the record
 * names a different project (case-sensitive). Records without a project pass.
 */
export function projectRejection(
  project: string | null,
  filter: ProjectFilter,
): { project: string; allowedProject: string } | null {
  const allowedProject = filter.allowedProject;
  if (!filter.filterByProject || allowedProject === null || project === null) return null;
  return project === allowedProject ? null : { project, allowedProject };
}

export function makeIngestWebhook({ writer, config, logger, now = () => new Date() }: IngestDeps) {
  return async (rawBody: string | Buffer): Promise<HandlerResult> => {
    const payloadBytes = typeof rawBody === 'string' ? Buffer.byteLength(rawBody) : rawBody.length;

    let text: string;
    let payload: unknown;
    try {
      text = decodeWebhookBody(rawBody);
      payload = parseWebhookBody(text);
    } catch (err) {
      if (!(err instanceof MalformedPayloadError)) throw err;
      logger.warn({ payloadBytes, reason: err.message }, 'malformed webhook payload');
      return { kind: 'malformed', error: err.message };
    }

    const result = normalizePayload(payload, text);
    if (result.kind === 'skip') {
      logger.info({ reason: result.reason, action: result.action, payloadBytes }, 'webhook ignored');
      return { kind: 'ignored', reason: result.reason, action: result.action };
    }

    const draft = result.record;
    const rejection = projectRejection(draft.project, config);
    if (rejection) {
      logger.info({ ...rejection, eventId: draft.eventId }, 'webhook rejected by project filter');
      return { kind: 'rejected', ...rejection };
    }

    const record = { ...draft, receivedAt: now().toISOString() };
    try {
      const id = await withTimeout(writer.insert(record), config.storageTimeoutMs, 'error record insert');
      logger.info({ id, eventId: record.eventId, project: record.project, shape: record.shape }, 'error record stored');
      return { kind: 'stored', id, record: { id, ...record } };
    } catch (err) {
      logger.error({ err, payloadBytes, eventId: record.eventId, project: record.project }, 'failed to store error record');
      return { kind: 'storage_error', error: errorMessage(err) };
    }
  };
}

export type IngestWebhook = ReturnType<typeof makeIngestWebhook>;
