import express, { Router } from 'express';
import type { webhookController } from '../controllers/webhook.controller';

export function webhookRoutes(ctrl: ReturnType<typeof webhookController>, opts: { bodyLimit: string }) {
  const r = Router();
  // raw bytes for any content type: the body is stored verbatim and parsed by the handler
  const rawBody = express.raw({ type: () => true, limit: opts.bodyLimit });

  r.post(['/webhook', '/sentry/webhook'], rawBody, ctrl.receive);

  return r;
}
