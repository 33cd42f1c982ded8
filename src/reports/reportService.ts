/**
 * Report Service
 *
 * The pipeline shared by the CLI and the MCP server: validate the caller's
 * parameters, build the request, and run it against the analytics backend.
 * All local checks happen in `prepare`, before a backend is created.
 */

import type { AppConfig } from '../config/index.js';
import type { AnalyticsBackend } from '../mcp/ga4Client.js';
import { buildQueryRequest } from '../mcp/ga4ReportBuilder.js';
import { InvalidArgumentError, MissingPropertyError } from '../errors.js';
import { logger } from '../utils/logger.js';
import {
  lookupReport,
  resolveReportFields,
  type Ordering,
  type ReportFields,
  type ReportSpec,
  type RowLimitPolicy,
} from './catalog.js';
import { rangeLength, resolveDateRange, type DateRange } from './dateRange.js';
import type { QueryRequest, ResultTable } from './types.js';

export interface ReportParams {
  report: string;
  propertyId?: string;
  days?: number;
  start?: string;
  end?: string;
  limit?: number;
  /** Comma-separated; custom report only. */
  metrics?: string;
  /** Comma-separated; custom report only. */
  dimensions?: string;
  orderBy?: string;
  ascending?: boolean;
}

export type PreparedReport =
  | { kind: 'properties'; spec: ReportSpec }
  | { kind: 'query'; spec: ReportSpec; request: QueryRequest };

const PROPERTY_ID = /^\d+$/;

export function normalizePropertyId(raw: string): string {
  const id = raw.trim().replace(/^properties\//, '');
  if (!PROPERTY_ID.test(id)) {
    throw new InvalidArgumentError(
      `Invalid property ID "${raw}": expected a numeric GA4 property ID`
    );
  }
  return id;
}

function checkLimit(limit: number | undefined): void {
  if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
    throw new InvalidArgumentError(`--limit must be a positive integer, got ${limit}`);
  }
}

function rowLimitFor(
  policy: RowLimitPolicy,
  requested: number | undefined,
  range?: DateRange
): number {
  switch (policy.kind) {
    case 'fixed':
      return policy.value;
    case 'caller':
      return requested ?? policy.default;
    case 'range': {
      if (!range) {
        throw new Error('Row limit by range needs a resolved date range');
      }
      return rangeLength(range);
    }
  }
}

function orderingFor(
  fields: ReportFields,
  orderBy: string | undefined,
  ascending: boolean | undefined
): Ordering | undefined {
  if (orderBy === undefined) {
    return undefined;
  }
  const field = orderBy.trim();
  if (field === '') {
    throw new InvalidArgumentError('--order-by needs a metric or dimension name');
  }
  return {
    field,
    type: fields.dimensions.includes(field) ? 'dimension' : 'metric',
    desc: !ascending,
  };
}

export class ReportService {
  constructor(
    private readonly config: AppConfig,
    private readonly createBackend: () => AnalyticsBackend,
    private readonly now: () => Date = () => new Date()
  ) {}

  resolvePropertyId(override?: string): string {
    const raw = override?.trim() || this.config.defaultPropertyId;
    if (!raw) {
      throw new MissingPropertyError();
    }
    return normalizePropertyId(raw);
  }

  /**
   * Validate parameters and build the request without touching the network.
   */
  prepare(params: ReportParams): PreparedReport {
    const spec = lookupReport(params.report);
    if (spec.kind === 'properties') {
      return { kind: 'properties', spec };
    }

    const log = logger.child({ report: spec.name });
    const fields = resolveReportFields(spec, params);
    if (spec.kind !== 'custom' && (params.metrics || params.dimensions)) {
      log.warn('--metrics/--dimensions only apply to the custom report; ignoring');
    }
    // checked for every report, including those whose row limit is fixed
    checkLimit(params.limit);

    const propertyId = this.resolvePropertyId(params.propertyId);
    const range =
      spec.kind === 'realtime'
        ? undefined
        : resolveDateRange(
            {
              days: params.days ?? this.config.defaults.days,
              start: params.start,
              end: params.end,
            },
            this.now()
          );

    const request = buildQueryRequest({
      spec,
      propertyId,
      fields,
      range,
      limit: rowLimitFor(spec.rowLimit, params.limit, range),
      ordering: orderingFor(fields, params.orderBy, params.ascending),
    });

    return { kind: 'query', spec, request };
  }

  async run(params: ReportParams): Promise<ResultTable> {
    const prepared = this.prepare(params);
    const backend = this.createBackend();

    logger.child({ report: prepared.spec.name }).debug('Running report');

    return prepared.kind === 'properties'
      ? backend.listProperties()
      : backend.runQuery(prepared.request);
  }
}
