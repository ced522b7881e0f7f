import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { PriceListError } from '../services/priceLists/errors';

export const notFound = (_req: Request, res: Response) => {
  res.status(404).json({ error: 'Not found' });
};

// Handler global de errores
export const errorHandler = (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof ZodError) {
    return res.status(400).json({ error: 'Validación', issues: err.issues });
  }
  if (err instanceof PriceListError) {
    return res.status(422).json({ error: err.message, code: err.code, file: err.list ?? null });
  }
  if (err instanceof multer.MulterError) {
    console.warn('Carga rechazada:', err.code, err.field ?? '');
    if (err.code === 'LIMIT_FILE_SIZE') {
      return res.status(413).json({ error: 'El archivo excede el tamaño permitido' });
    }
    return res.status(400).json({ error: `Carga inválida: ${err.message}` });
  }
  console.error('Unhandled error:', err);
  res.status(500).json({ error: 'Error interno' });
};
