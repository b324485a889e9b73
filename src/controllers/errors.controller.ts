import type { NextFunction, Request, Response } from 'express';
import type { ErrorRecord } from '../domain/ErrorRecord';
import { validateListQuery } from '../libs/validation';

export function toErrorResponse(r: ErrorRecord) {
  return {
    id: r.id,
    event_id: r.eventId,
    project: r.project,
    message: r.message,
    exception_type: r.exceptionType,
    exception_value: r.exceptionValue,
    stacktrace: r.stacktrace,
    level: r.level,
    occurred_at: r.occurredAt,
    shape: r.shape,
    raw_payload: r.rawPayload,
    received_at: r.receivedAt,
  };
}

export function errorsController(deps: {
  getLatest: () => Promise<ErrorRecord | null>;
  list: (limit?: number) => Promise<ErrorRecord[]>;
}) {
  return {
    latest: async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const record = await deps.getLatest();
        if (!record) {
          res.json({ error: 'not_found' });
          return;
        }
        res.json(toErrorResponse(record));
      } catch (err) {
        next(err);
      }
    },
    list: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { limit } = validateListQuery(req.query);
        const records = await deps.list(limit);
        res.json(records.map(toErrorResponse));
      } catch (err) {
        next(err);
      }
    },
  };
}
