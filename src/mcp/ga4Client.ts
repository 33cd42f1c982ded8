/**
 * GA4 Client
 *
 * Adapter over the Google Analytics Data and Admin APIs. Requests go out as
 * built by the report builder; responses come back as uniform result tables.
 * Every provider failure is rethrown as a ProviderError with its message kept.
 */

import { BetaAnalyticsDataClient, protos } from '@google-analytics/data';
import { AnalyticsAdminServiceClient } from '@google-analytics/admin';
import type { CellValue, QueryRequest, ResultRow, ResultTable } from '../reports/types.js';
import { ProviderError } from '../errors.js';
import { logger } from '../utils/logger.js';

type RunReportRequest = protos.google.analytics.data.v1beta.IRunReportRequest;
type RunRealtimeReportRequest = protos.google.analytics.data.v1beta.IRunRealtimeReportRequest;

/** The parts of a report or realtime response the table mapping reads. */
export interface ReportResponseLike {
  dimensionHeaders?: { name?: string | null }[] | null;
  metricHeaders?: { name?: string | null }[] | null;
  rows?:
    | {
        dimensionValues?: { value?: string | null }[] | null;
        metricValues?: { value?: string | null }[] | null;
      }[]
    | null;
  rowCount?: number | null;
}

export interface AccountSummaryLike {
  name?: string | null;
  account?: string | null;
  displayName?: string | null;
  propertySummaries?: { property?: string | null; displayName?: string | null }[] | null;
}

/** Structural view of BetaAnalyticsDataClient, so tests can pass a fake. */
export interface DataApi {
  runReport(request: RunReportRequest): Promise<[ReportResponseLike, ...unknown[]]>;
  runRealtimeReport(
    request: RunRealtimeReportRequest
  ): Promise<[ReportResponseLike, ...unknown[]]>;
}

/** Structural view of AnalyticsAdminServiceClient. */
export interface AdminApi {
  listAccountSummaries(request: {
    pageSize?: number;
  }): Promise<[AccountSummaryLike[], ...unknown[]]>;
}

/**
 * What the report service needs from the provider.
 */
export interface AnalyticsBackend {
  runQuery(request: QueryRequest): Promise<ResultTable>;
  listProperties(): Promise<ResultTable>;
}

export const PROPERTY_COLUMNS = ['Account', 'Account ID', 'Property', 'Property ID'];

function propertyResource(propertyId: string): string {
  return `properties/${propertyId}`;
}

function lastSegment(resource: string | null | undefined): string {
  return resource ? (resource.split('/').pop() ?? '') : '';
}

export function toRunReportRequest(request: QueryRequest): RunReportRequest {
  return {
    property: propertyResource(request.propertyId),
    metrics: request.metrics.map((name) => ({ name })),
    dimensions: request.dimensions.map((name) => ({ name })),
    dateRanges: request.dateRange ? [{ ...request.dateRange }] : [],
    limit: request.limit,
    orderBys: request.orderBys.map((o) => ({ ...o })),
  };
}

export function toRunRealtimeReportRequest(request: QueryRequest): RunRealtimeReportRequest {
  return {
    property: propertyResource(request.propertyId),
    metrics: request.metrics.map((name) => ({ name })),
    dimensions: request.dimensions.map((name) => ({ name })),
    limit: request.limit,
    orderBys: request.orderBys.map((o) => ({ ...o })),
  };
}

const INTEGER = /^-?\d+$/;

/**
 * Metric values arrive as strings; integers and decimals become numbers.
 */
export function parseMetricValue(raw: string): CellValue {
  if (INTEGER.test(raw)) {
    return Number.parseInt(raw, 10);
  }
  const value = Number(raw);
  return raw.trim() !== '' && Number.isFinite(value) ? value : raw;
}

export function toResultTable(response: ReportResponseLike): ResultTable {
  const dimensionNames = (response.dimensionHeaders ?? []).map((h) => h.name ?? '');
  const metricNames = (response.metricHeaders ?? []).map((h) => h.name ?? '');

  const rows = (response.rows ?? []).map((row) => {
    const result: ResultRow = {};
    const dimensionValues = row.dimensionValues ?? [];
    const metricValues = row.metricValues ?? [];

    dimensionNames.forEach((name, i) => {
      result[name] = dimensionValues[i]?.value ?? '';
    });
    metricNames.forEach((name, i) => {
      result[name] = parseMetricValue(metricValues[i]?.value ?? '');
    });

    return result;
  });

  return {
    columns: [...dimensionNames, ...metricNames],
    rows,
    ...(typeof response.rowCount === 'number' && { rowCount: response.rowCount }),
  };
}

export function accountSummariesToTable(accounts: AccountSummaryLike[]): ResultTable {
  const rows: ResultRow[] = [];

  for (const account of accounts) {
    for (const property of account.propertySummaries ?? []) {
      rows.push({
        Account: account.displayName || account.name || '',
        'Account ID': lastSegment(account.account),
        Property: property.displayName || property.property || '',
        'Property ID': lastSegment(property.property),
      });
    }
  }

  return { columns: [...PROPERTY_COLUMNS], rows };
}

export class GA4Client implements AnalyticsBackend {
  constructor(
    private readonly data: DataApi,
    private readonly admin: AdminApi
  ) {}

  async runQuery(request: QueryRequest): Promise<ResultTable> {
    logger.debug('Running GA4 report', {
      kind: request.kind,
      propertyId: request.propertyId,
      dimensions: request.dimensions,
      metrics: request.metrics,
      limit: request.limit,
    });

    let response: ReportResponseLike;
    try {
      [response] =
        request.kind === 'realtime'
          ? await this.data.runRealtimeReport(toRunRealtimeReportRequest(request))
          : await this.data.runReport(toRunReportRequest(request));
    } catch (error) {
      logger.error('GA4 report failed', { error: String(error) });
      throw new ProviderError(error);
    }

    const table = toResultTable(response);
    logger.debug('GA4 report completed', { rowCount: table.rows.length });
    return table;
  }

  async listProperties(): Promise<ResultTable> {
    let accounts: AccountSummaryLike[];
    try {
      [accounts] = await this.admin.listAccountSummaries({});
    } catch (error) {
      logger.error('Listing account summaries failed', { error: String(error) });
      throw new ProviderError(error);
    }
    return accountSummariesToTable(accounts);
  }
}

/**
 * Create a client authenticated with a service-account key file.
 */
export function createGA4Client(keyFilename: string): GA4Client {
  return new GA4Client(
    new BetaAnalyticsDataClient({ keyFilename }),
    new AnalyticsAdminServiceClient({ keyFilename })
  );
}
