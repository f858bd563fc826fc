import express from 'express';
import cors from 'cors';
import type { ServerConfig } from './config.js';
import { georeference } from './routes/georeference.js';

export function createApp(config: ServerConfig) {
  const app = express();

  app.use(cors({
    origin: config.corsOrigins,
    credentials: true,
  }));

  app.use('/api', georeference);

  return app;
}
