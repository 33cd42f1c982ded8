/**
 * Shared fixtures for unit tests
 */

import type { AppConfig } from '../src/config/index.js';
import type { AnalyticsBackend } from '../src/mcp/ga4Client.js';
import type { QueryRequest, ResultTable } from '../src/reports/types.js';
import { logger } from '../src/utils/logger.js';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    credentialsPath: '/tmp/test-credentials.json',
    defaultPropertyId: '123456789',
    logLevel: 'info',
    defaults: { days: 30, limit: 10, output: 'table' },
    server: { name: 'ga4-query-mcp', version: '1.0.0' },
    ...overrides,
  };
}

export const PAGES_TABLE: ResultTable = {
  columns: ['pagePath', 'screenPageViews'],
  rows: [
    { pagePath: '/a', screenPageViews: 10 },
    { pagePath: '/b', screenPageViews: 3 },
  ],
  rowCount: 2,
};

export class FakeBackend implements AnalyticsBackend {
  readonly queries: QueryRequest[] = [];
  propertyListings = 0;

  constructor(
    private readonly table: ResultTable = PAGES_TABLE,
    private readonly failure?: Error
  ) {}

  async runQuery(request: QueryRequest): Promise<ResultTable> {
    this.queries.push(request);
    if (this.failure) throw this.failure;
    return this.table;
  }

  async listProperties(): Promise<ResultTable> {
    this.propertyListings += 1;
    if (this.failure) throw this.failure;
    return this.table;
  }
}

/** Route log lines into an array instead of stderr. */
export function captureLogs(): string[] {
  const lines: string[] = [];
  logger.setSink((line) => lines.push(line));
  return lines;
}
