/**
 * GA4 query library
 *
 * Transport-agnostic pieces shared by the ga4-query CLI and MCP server.
 */

export { logger } from './utils/logger.js';
export * from './errors.js';
export { loadConfig, requireCredentials, type AppConfig } from './config/index.js';
export {
  REPORT_CATALOG,
  REPORT_NAMES,
  lookupReport,
  parseFieldList,
  type ReportName,
  type ReportSpec,
} from './reports/catalog.js';
export { resolveDateRange, type DateRange } from './reports/dateRange.js';
export type { QueryRequest, ResultRow, ResultTable } from './reports/types.js';
export { ReportService, type ReportParams } from './reports/reportService.js';
export { ga4Report, buildQueryRequest, GA4ReportBuilder } from './mcp/ga4ReportBuilder.js';
export { GA4Client, createGA4Client, type AnalyticsBackend } from './mcp/ga4Client.js';
export { formatResult, OUTPUT_MODES, type OutputMode } from './format/resultFormatter.js';
export { runCli } from './cli.js';
export { createServer, startServer } from './server/index.js';
export { createReportTools } from './server/tools.js';
