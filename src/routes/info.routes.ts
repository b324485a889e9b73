import { Router } from 'express';
import type { infoController } from '../controllers/info.controller';

export function infoRoutes(ctrl: ReturnType<typeof infoController>) {
  const r = Router();
  r.get('/', ctrl.root);
  r.get('/health', ctrl.health);
  r.get('/config', ctrl.config);

  return r;
}
