import { Router } from 'express';

export const SERVICE_NAME = 'tictactoe-rooms';

export function createHealthRouter(startedAt = Date.now()) {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: SERVICE_NAME,
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  return router;
}
