import { promises as fsPromises } from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { comparePriceLists } from './comparator';
import { tagWithList } from './errors';
import { parsePriceListWorkbook } from './excelImporter';
import { summaryRows, toDisplayRows, writeComparisonReport } from './report';
import type { ComparisonResult, ListLabel } from './types';

export interface CompareArgs {
  fileA: string;
  fileB: string;
  out?: string;
  sheet?: string;
}

export interface CompareOutput {
  table: (rows: object[]) => void;
  log: (message: string) => void;
}

const consoleOutput: CompareOutput = {
  table: rows => console.table(rows),
  log: message => console.log(message),
};

export function parseCompareArgs(argv: string[]): CompareArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      sheet: { type: 'string', short: 's' },
    },
  });
  const [fileA, fileB] = positionals;
  if (!fileA || !fileB) {
    throw new Error('Indica el Archivo A (original) y el Archivo B (nuevo)');
  }
  return { fileA, fileB, out: values.out, sheet: values.sheet };
}

function load(filePath: string, list: ListLabel, cwd: string, sheetName?: string) {
  try {
    return parsePriceListWorkbook(path.resolve(cwd, filePath), { sheetName });
  } catch (err) {
    throw tagWithList(err, list);
  }
}

/**
 * Compara dos archivos en disco. Sin `out` imprime resumen y tabla; con `out`
 * imprime el resumen y escribe el reporte Excel.
 */
export async function runCompare(
  args: CompareArgs,
  output: CompareOutput = consoleOutput,
  cwd = process.cwd(),
): Promise<ComparisonResult> {
  const listA = load(args.fileA, 'A', cwd, args.sheet);
  const listB = load(args.fileB, 'B', cwd, args.sheet);
  const result = comparePriceLists(listA.rows, listB.rows);

  output.table(summaryRows(result));
  if (args.out) {
    const target = path.resolve(cwd, args.out);
    await fsPromises.writeFile(target, writeComparisonReport(result));
    output.log(`OK: reporte escrito en ${target}`);
  } else {
    output.table(toDisplayRows(result));
  }
  return result;
}
