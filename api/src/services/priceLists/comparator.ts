import { EmptyInputError, InvalidRowError } from './errors';
import { descriptionSimilarity } from './similarity';
import type {
  ComparisonResult,
  ComparisonRow,
  ComparisonSummary,
  ListLabel,
  PriceListRow,
} from './types';

interface KeyedList {
  byKey: Map<string, PriceListRow>;
  order: string[];
  duplicates: string[];
}

// Redondeo simétrico: roundTo(-x) === -roundTo(x)
export function roundTo(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  const rounded = Math.sign(value) * Math.round(Math.abs(value) * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

function describeRow(row: PriceListRow, index: number): string {
  return row.rowNumber !== undefined ? `fila ${row.rowNumber}` : `posición ${index + 1}`;
}

function validateRow(row: PriceListRow, index: number, list: ListLabel) {
  if (typeof row.key !== 'string' || !row.key.trim()) {
    throw new InvalidRowError(`Lista ${list}, ${describeRow(row, index)}: falta la Clave`, index, list);
  }
  if (typeof row.price !== 'number' || !Number.isFinite(row.price)) {
    throw new InvalidRowError(
      `Lista ${list}, ${describeRow(row, index)}: el precio de ${row.key} no es numérico`,
      index,
      list,
    );
  }
  if (row.price < 0) {
    throw new InvalidRowError(
      `Lista ${list}, ${describeRow(row, index)}: el precio de ${row.key} es negativo`,
      index,
      list,
    );
  }
}

// Última aparición gana; la clave conserva la posición de su primera aparición.
function indexByKey(rows: ReadonlyArray<PriceListRow>, list: ListLabel): KeyedList {
  const byKey = new Map<string, PriceListRow>();
  const order: string[] = [];
  const duplicates = new Set<string>();
  rows.forEach((row, index) => {
    validateRow(row, index, list);
    if (byKey.has(row.key)) {
      duplicates.add(row.key);
    } else {
      order.push(row.key);
    }
    byKey.set(row.key, row);
  });
  return { byKey, order, duplicates: Array.from(duplicates) };
}

// Se calcula sobre la diferencia sin redondear.
function computeDeltaPercent(priceA: number, priceB: number): number | null {
  if (priceA === 0) {
    return priceB === 0 ? 0 : null;
  }
  return roundTo(((priceB - priceA) / priceA) * 100);
}

function buildRow(key: string, rowA?: PriceListRow, rowB?: PriceListRow): ComparisonRow {
  if (rowA && rowB) {
    const delta = roundTo(rowB.price - rowA.price);
    return {
      key,
      description: rowA.description,
      descriptionA: rowA.description,
      descriptionB: rowB.description,
      priceA: rowA.price,
      priceB: rowB.price,
      delta,
      deltaPercent: computeDeltaPercent(rowA.price, rowB.price),
      descriptionSimilarity: descriptionSimilarity(rowA.description, rowB.description),
      presence: 'BothLists',
    };
  }
  const only = rowA ?? rowB;
  if (!only) {
    throw new Error(`Clave ${key} sin fila en ninguna lista`);
  }
  return {
    key,
    description: only.description,
    descriptionA: rowA ? rowA.description : null,
    descriptionB: rowB ? rowB.description : null,
    priceA: rowA ? rowA.price : null,
    priceB: rowB ? rowB.price : null,
    delta: null,
    deltaPercent: null,
    descriptionSimilarity: null,
    presence: rowA ? 'OnlyA' : 'OnlyB',
  };
}

/**
 * Une dos listas por Clave. Cada clave de cualquiera de las dos listas aparece
 * una sola vez: primero en el orden de A, luego las que solo están en B.
 */
export function compare(
  listA: ReadonlyArray<PriceListRow>,
  listB: ReadonlyArray<PriceListRow>,
): ComparisonRow[] {
  return comparePriceLists(listA, listB).rows;
}

export function comparePriceLists(
  listA: ReadonlyArray<PriceListRow>,
  listB: ReadonlyArray<PriceListRow>,
): ComparisonResult {
  const a = indexByKey(listA, 'A');
  const b = indexByKey(listB, 'B');
  if (!a.order.length && !b.order.length) {
    throw new EmptyInputError();
  }

  const keys = [...a.order, ...b.order.filter(key => !a.byKey.has(key))];
  const rows = keys.map(key => buildRow(key, a.byKey.get(key), b.byKey.get(key)));

  return { rows, summary: summarize(rows, a, b) };
}

function summarize(rows: ComparisonRow[], a: KeyedList, b: KeyedList): ComparisonSummary {
  let common = 0;
  let onlyA = 0;
  let onlyB = 0;
  let changed = 0;
  rows.forEach(row => {
    if (row.presence === 'OnlyA') onlyA += 1;
    else if (row.presence === 'OnlyB') onlyB += 1;
    else {
      common += 1;
      if (row.priceA !== row.priceB) changed += 1;
    }
  });
  return {
    totalA: a.order.length,
    totalB: b.order.length,
    common,
    onlyA,
    onlyB,
    changed,
    unchanged: common - changed,
    duplicateKeysA: a.duplicates,
    duplicateKeysB: b.duplicates,
  };
}
