import type { DateRange } from './dateRange.js';

export interface OrderBy {
  dimension?: { dimensionName: string };
  metric?: { metricName: string };
  desc: boolean;
}

/**
 * One Data API call. `realtime` requests never carry a date range.
 */
export interface QueryRequest {
  readonly kind: 'report' | 'realtime';
  readonly propertyId: string;
  readonly metrics: readonly string[];
  readonly dimensions: readonly string[];
  readonly dateRange?: DateRange;
  readonly limit: number;
  readonly orderBys: readonly OrderBy[];
}

export type CellValue = string | number;

export type ResultRow = Record<string, CellValue>;

/**
 * Uniform tabular result. `columns` is kept separately from the rows so an
 * empty result still knows its header.
 */
export interface ResultTable {
  columns: string[];
  rows: ResultRow[];
  /** Total matching rows reported by the provider, when it reports one. */
  rowCount?: number;
}
