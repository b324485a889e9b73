import { Router } from 'express';
import type { errorsController } from '../controllers/errors.controller';

export function errorsRoutes(ctrl: ReturnType<typeof errorsController>) {
  const r = Router();
  r.get('/errors/latest', ctrl.latest);
  r.get('/errors', ctrl.list);

  return r;
}
