export const REQUIRED_COLUMNS = ['Clave', 'Descripción', 'Precio'] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export type ListLabel = 'A' | 'B';

export interface PriceListRow {
  readonly key: string;
  readonly description: string;
  readonly price: number;
  /** Fila de la hoja (1-based). Solo existe cuando la fila viene de un Excel. */
  readonly rowNumber?: number;
}

export interface PriceList {
  sheetName: string;
  rows: ReadonlyArray<PriceListRow>;
}

export type Presence = 'BothLists' | 'OnlyA' | 'OnlyB';

export interface ComparisonRow {
  key: string;
  description: string;
  descriptionA: string | null;
  descriptionB: string | null;
  priceA: number | null;
  priceB: number | null;
  delta: number | null;
  deltaPercent: number | null;
  descriptionSimilarity: number | null;
  presence: Presence;
}

export interface ComparisonSummary {
  totalA: number;
  totalB: number;
  common: number;
  onlyA: number;
  onlyB: number;
  changed: number;
  unchanged: number;
  duplicateKeysA: string[];
  duplicateKeysB: string[];
}

export interface ComparisonResult {
  rows: ComparisonRow[];
  summary: ComparisonSummary;
}
