import path from 'path';
import multer from 'multer';
import { Request, Router } from 'express';
import { z } from 'zod';
import { comparePriceLists } from '../services/priceLists/comparator';
import { tagWithList } from '../services/priceLists/errors';
import { parsePriceListWorkbook } from '../services/priceLists/excelImporter';
import { REPORT_FILENAME, REPORT_MIME, writeComparisonReport } from '../services/priceLists/report';
import type { ComparisonResult, ListLabel, PriceList } from '../services/priceLists/types';

const ALLOWED_EXTENSIONS = ['.xlsx', '.xls'];

const CompareSchema = z.object({
  sheetName: z.string().trim().min(1).optional(),
});

type ComparePayload = z.infer<typeof CompareSchema>;

class UploadError extends Error {}

export interface PriceListsRouterOptions {
  maxUploadBytes: number;
}

function pickFile(req: Request, field: string): Express.Multer.File | undefined {
  const files = req.files;
  if (!files || Array.isArray(files)) return undefined;
  return files[field]?.[0];
}

function loadList(file: Express.Multer.File, list: ListLabel, payload: ComparePayload): PriceList {
  const ext = path.extname(file.originalname).toLowerCase();
  if (!ALLOWED_EXTENSIONS.includes(ext)) {
    throw new UploadError(`Archivo ${list}: solo se aceptan archivos .xlsx o .xls`);
  }
  try {
    return parsePriceListWorkbook(file.buffer, { sheetName: payload.sheetName });
  } catch (err) {
    throw tagWithList(err, list);
  }
}

function compareUploads(req: Request): ComparisonResult {
  const payload = CompareSchema.parse(req.body ?? {});
  const fileA = pickFile(req, 'fileA');
  const fileB = pickFile(req, 'fileB');
  if (!fileA || !fileB) {
    throw new UploadError('Adjunta los dos archivos Excel (fileA y fileB)');
  }
  const listA = loadList(fileA, 'A', payload);
  const listB = loadList(fileB, 'B', payload);
  return comparePriceLists(listA.rows, listB.rows);
}

export function createPriceListsRouter(options: PriceListsRouterOptions) {
  const router = Router();

  // Los archivos viven solo en memoria durante la petición
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes, files: 2 },
  });
  const uploadPair = upload.fields([
    { name: 'fileA', maxCount: 1 },
    { name: 'fileB', maxCount: 1 },
  ]);

  router.post('/price-lists/compare', uploadPair, (req, res, next) => {
    try {
      const result = compareUploads(req);
      res.json(result);
    } catch (err) {
      if (err instanceof UploadError) {
        return res.status(400).json({ error: err.message });
      }
      next(err);
    }
  });

  router.post('/price-lists/compare/report', uploadPair, (req, res, next) => {
    try {
      const result = compareUploads(req);
      const buffer = writeComparisonReport(result);
      res
        .status(200)
        .type(REPORT_MIME)
        .attachment(REPORT_FILENAME)
        .send(buffer);
    } catch (err) {
      if (err instanceof UploadError) {
        return res.status(400).json({ error: err.message });
      }
      next(err);
    }
  });

  return router;
}
