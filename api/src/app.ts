import express from 'express';
import cors from 'cors';
import type { AppConfig } from './config';
import { errorHandler, notFound } from './middleware/errorHandler';
import { createPriceListsRouter } from './routes/price.lists';

const API_PREFIX = '/api';

export function createApp(config: AppConfig) {
  const app = express();

  // CORS para Vite / localhost
  app.use(cors({
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    exposedHeaders: ['Content-Disposition'],
    credentials: false,
  }));

  app.get(`${API_PREFIX}/health`, (_req, res) => res.json({ ok: true }));
  app.get(`${API_PREFIX}/version`, (_req, res) => res.json({ version: '1.0.0' }));

  app.use(API_PREFIX, createPriceListsRouter({ maxUploadBytes: config.maxUploadBytes }));

  app.use(API_PREFIX, notFound);
  app.use(errorHandler);

  return app;
}
