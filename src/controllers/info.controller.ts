import type { Request, Response } from 'express';
import type { AppConfig } from '../config/env';
import { publicConfig, serviceInfo } from '../services/info.service';

export function infoController(config: AppConfig) {
  return {
    root: (_req: Request, res: Response) => {
      res.json(serviceInfo(config));
    },
    health: (_req: Request, res: Response) => {
      res.json({ status: 'healthy' });
    },
    config: (_req: Request, res: Response) => {
      res.json(publicConfig(config));
    },
  };
}
