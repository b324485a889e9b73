export type PayloadShapeKind = 'legacy' | 'nested' | 'attachments';

export type ErrorRecord = {
  id: number;
  eventId: string | null;
  project: string | null;
  message: string;
  exceptionType: string | null;
  exceptionValue: string | null;
  stacktrace: string | null;
  level: string | null;
  occurredAt: string | null;   // as reported by the sender, informational
  shape: PayloadShapeKind;
  rawPayload: string;
  receivedAt: string;          // ISO, UTC, set on ingest
};

/** What the normalizer produces: a record before storage assigns id and ingest time. */
export type ErrorDraft = Omit<ErrorRecord, 'id' | 'receivedAt'>;

export type NewErrorRecord = Omit<ErrorRecord, 'id'>;
