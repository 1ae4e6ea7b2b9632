import express from 'express';
import cors from 'cors';
import { createHealthRouter } from './routes/health';
import { createRoomsRouter, type StatusDeps } from './routes/rooms';

export function createStatusApp(deps: StatusDeps, corsOrigin = '*') {
  const app = express();
  app.use(cors({ origin: corsOrigin }));
  app.use('/', createHealthRouter());
  app.use('/', createRoomsRouter(deps));
  return app;
}
