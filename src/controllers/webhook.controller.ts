import type { NextFunction, Request, Response } from 'express';
import type { HandlerResult, IngestWebhook } from '../usecases/ingest-webhook';

function rawBodyOf(req: Request): string | Buffer {
  const body: unknown = req.body;
  if (Buffer.isBuffer(body) || typeof body === 'string') return body;
  return '';
}

export function sendHandlerResult(res: Response, result: HandlerResult) {
  switch (result.kind) {
    case 'stored':
      res.status(201).json({ status: 'stored', id: result.id, event_id: result.record.eventId });
      return;
    case 'ignored':
      // senders retry on anything but 2xx
      res.status(200).json({ status: 'ignored', reason: result.reason, action: result.action });
      return;
    case 'rejected':
      res.status(403).json({ status: 'rejected', error: 'project_not_allowed', project: result.project });
      return;
    case 'malformed':
      res.status(400).json({ status: 'error', error: 'malformed_payload', detail: result.error });
      return;
    case 'storage_error':
      res.status(500).json({ status: 'error', error: 'storage_error' });
      return;
  }
}

export function webhookController(deps: { ingest: IngestWebhook }) {
  return {
    receive: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const result = await deps.ingest(rawBodyOf(req));
        sendHandlerResult(res, result);
      } catch (err) {
        next(err);
      }
    },
  };
}
