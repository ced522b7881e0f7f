import express from 'express';
import multer from 'multer';
import request from 'supertest';
import { z } from 'zod';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { WorkbookReadError } from '../services/priceLists/errors';
import { errorHandler } from './errorHandler';

function appThrowing(err: unknown) {
  const app = express();
  app.get('/boom', (_req, _res, next) => next(err));
  app.use(errorHandler);
  return app;
}

describe('errorHandler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('responde 400 para errores de validación', async () => {
    const parsed = z.object({ name: z.string() }).safeParse({});
    const err = parsed.success ? new Error('sin error') : parsed.error;
    const res = await request(appThrowing(err)).get('/boom');
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Validación');
    expect(res.body.issues[0].path).toEqual(['name']);
  });

  it('responde 422 para errores de lista de precios', async () => {
    const res = await request(appThrowing(new WorkbookReadError('archivo dañado', 'A'))).get('/boom');
    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      error: 'No se pudo leer el archivo Excel: archivo dañado',
      code: 'WORKBOOK_READ',
      file: 'A',
    });
  });

  it('responde 413 cuando el archivo excede el límite', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const res = await request(appThrowing(new multer.MulterError('LIMIT_FILE_SIZE', 'fileA'))).get('/boom');
    expect(res.status).toBe(413);
    expect(res.body).toEqual({ error: 'El archivo excede el tamaño permitido' });
  });

  it('responde 500 sin exponer el detalle', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const res = await request(appThrowing(new Error('detalle interno'))).get('/boom');
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'Error interno' });
    expect(spy).toHaveBeenCalledTimes(1);
  });
});
