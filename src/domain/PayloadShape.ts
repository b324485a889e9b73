import type { JsonObject } from '../libs/probe';

/**
 * Webhook bodies as they come in, sorted by structure:
 *
 * - `nested`: `{ action, data: { project, issue, event } }`
 * - `legacy`: flat `{ event_id, project, message, exception: { type, value, stacktrace } }`
 * - `attachments`: Slack-compatible alert `{ alias, attachments: [{ title, title_link, fields }] }`
 * - `unrecognized`: any JSON value that is not an object
 */
export type PayloadShape =
  | {
      kind: 'nested';
      /** False when the body has no `action` key at all. */
      hasAction: boolean;
      action: string | null;
      data: JsonObject;
    }
  | { kind: 'legacy'; body: JsonObject }
  | { kind: 'attachments'; body: JsonObject; attachment: JsonObject }
  | { kind: 'unrecognized'; value: unknown };
