/**
 * GA4 Report Builder
 *
 * Fluent builder for constructing GA4 query requests, and the mapping from a
 * catalog report to the request it issues.
 */

import type { DateRange } from '../reports/dateRange.js';
import type { OrderBy, QueryRequest } from '../reports/types.js';
import type {
  CustomReportSpec,
  FixedReportSpec,
  Ordering,
  ReportFields,
} from '../reports/catalog.js';
import { InvalidArgumentError } from '../errors.js';

export class GA4ReportBuilder {
  private readonly metricNames: string[] = [];
  private readonly dimensionNames: string[] = [];
  private readonly orderBys: OrderBy[] = [];
  private range?: DateRange;
  private rowLimit?: number;
  private isRealtime = false;

  constructor(private readonly propertyId: string) {}

  /**
   * Set the inclusive date range
   */
  dateRange(startDate: string, endDate: string): this {
    this.range = { startDate, endDate };
    return this;
  }

  /**
   * Target the realtime endpoint (last 30 minutes, no date range)
   */
  realtime(): this {
    this.isRealtime = true;
    return this;
  }

  dimensions(...names: string[]): this {
    this.dimensionNames.push(...names);
    return this;
  }

  metrics(...names: string[]): this {
    this.metricNames.push(...names);
    return this;
  }

  orderByMetric(metricName: string, desc = true): this {
    this.orderBys.push({ metric: { metricName }, desc });
    return this;
  }

  orderByDimension(dimensionName: string, desc = false): this {
    this.orderBys.push({ dimension: { dimensionName }, desc });
    return this;
  }

  orderBy(ordering: Ordering): this {
    return ordering.type === 'metric'
      ? this.orderByMetric(ordering.field, ordering.desc)
      : this.orderByDimension(ordering.field, ordering.desc);
  }

  /**
   * Set result limit. Only positivity is checked here; the provider enforces
   * its own ceiling.
   */
  limit(n: number): this {
    if (!Number.isInteger(n) || n <= 0) {
      throw new InvalidArgumentError(`--limit must be a positive integer, got ${n}`);
    }
    this.rowLimit = n;
    return this;
  }

  /**
   * Build the final request object
   */
  build(): QueryRequest {
    if (!this.propertyId) {
      throw new Error('Property ID is required');
    }
    if (this.metricNames.length === 0) {
      throw new InvalidArgumentError('At least one metric is required');
    }
    if (this.rowLimit === undefined) {
      throw new Error('Row limit is required');
    }

    if (this.isRealtime) {
      const request: QueryRequest = {
        kind: 'realtime',
        propertyId: this.propertyId,
        metrics: [...this.metricNames],
        dimensions: [...this.dimensionNames],
        limit: this.rowLimit,
        orderBys: [...this.orderBys],
      };
      return Object.freeze(request);
    }

    if (!this.range) {
      throw new Error('A date range is required');
    }

    const request: QueryRequest = {
      kind: 'report',
      propertyId: this.propertyId,
      metrics: [...this.metricNames],
      dimensions: [...this.dimensionNames],
      dateRange: { ...this.range },
      limit: this.rowLimit,
      orderBys: [...this.orderBys],
    };
    return Object.freeze(request);
  }
}

/**
 * Factory function for creating GA4 report builder
 */
export function ga4Report(propertyId: string): GA4ReportBuilder {
  return new GA4ReportBuilder(propertyId);
}

export interface BuildQueryOptions {
  spec: FixedReportSpec | CustomReportSpec;
  propertyId: string;
  fields: ReportFields;
  /** Ignored for realtime reports. */
  range?: DateRange;
  limit: number;
  ordering?: Ordering;
}

/**
 * Map a catalog report to the request it issues. Without an explicit or
 * catalog ordering, rows are sorted by the first metric, descending.
 */
export function buildQueryRequest(options: BuildQueryOptions): QueryRequest {
  const { spec, propertyId, fields, range, limit } = options;
  const [firstMetric] = fields.metrics;
  const catalogOrdering = spec.kind === 'standard' ? spec.ordering : undefined;

  const builder = ga4Report(propertyId)
    .metrics(...fields.metrics)
    .dimensions(...fields.dimensions)
    .limit(limit);

  const ordering =
    options.ordering ??
    catalogOrdering ??
    (firstMetric !== undefined
      ? { field: firstMetric, type: 'metric' as const, desc: true }
      : undefined);
  if (ordering) {
    builder.orderBy(ordering);
  }

  if (spec.kind === 'realtime') {
    return builder.realtime().build();
  }
  if (!range) {
    throw new Error(`Report "${spec.name}" needs a date range`);
  }
  return builder.dateRange(range.startDate, range.endDate).build();
}
