/**
 * GA4 report tools for the MCP server
 *
 * One tool per catalog report. Each tool validates its input, runs the report
 * through the shared service, and returns the rows as structured content.
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { AppConfig } from '../config/index.js';
import { errorMessage, GA4QueryError } from '../errors.js';
import { formatResult } from '../format/resultFormatter.js';
import { REPORT_CATALOG, type ReportName } from '../reports/catalog.js';
import type { ReportParams, ReportService } from '../reports/reportService.js';
import type { ResultTable } from '../reports/types.js';
import { logger } from '../utils/logger.js';

export interface ToolDefinition {
  name: string;
  report: ReportName;
  description: string;
  inputSchema: z.AnyZodObject;
  execute: (params: unknown) => Promise<CallToolResult>;
}

export function toolName(report: ReportName): string {
  return `ga_${report}`;
}

export function toToolResult(table: ResultTable): CallToolResult {
  return {
    content: [{ type: 'text', text: formatResult(table, 'json') }],
    structuredContent: {
      columns: table.columns,
      rows: table.rows,
      rowCount: table.rowCount ?? table.rows.length,
    },
  };
}

export function toErrorResult(error: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: `Error: ${errorMessage(error)}` }],
    isError: true,
  };
}

function defineTool<S extends z.AnyZodObject>(
  service: ReportService,
  report: ReportName,
  inputSchema: S,
  toParams: (input: z.infer<S>) => Omit<ReportParams, 'report'>
): ToolDefinition {
  const name = toolName(report);
  const log = logger.child({ tool: name });

  return {
    name,
    report,
    description: REPORT_CATALOG[report].description,
    inputSchema,
    execute: async (params) => {
      try {
        const input = inputSchema.parse(params ?? {});
        const table = await service.run({ report, ...toParams(input) });
        log.info('Tool call completed', { rows: table.rows.length });
        return toToolResult(table);
      } catch (error) {
        const code = error instanceof GA4QueryError ? error.code : undefined;
        log.warn('Tool call failed', { code, error: errorMessage(error) });
        return toErrorResult(error);
      }
    },
  };
}

/**
 * Create the report tools, mirroring the report catalog one-to-one
 */
export function createReportTools(service: ReportService, config: AppConfig): ToolDefinition[] {
  const days = z
    .number()
    .int()
    .default(config.defaults.days)
    .describe('Lookback period in days, ending today');
  const limitOf = (report: ReportName) => {
    const spec = REPORT_CATALOG[report];
    const policy = 'rowLimit' in spec ? spec.rowLimit : undefined;
    return z
      .number()
      .int()
      .default(policy?.kind === 'caller' ? policy.default : config.defaults.limit)
      .describe('Maximum rows to return');
  };
  const propertyId = z
    .string()
    .default('')
    .describe('GA4 property ID (uses GA4_PROPERTY_ID when empty)');

  // an empty string from the host means "not given"
  const optional = (value: string) => (value.trim() === '' ? undefined : value);

  const rangeOnly = (report: ReportName) =>
    defineTool(service, report, z.object({ days, property_id: propertyId }), (input) => ({
      days: input.days,
      propertyId: optional(input.property_id),
    }));

  const ranked = (report: ReportName) =>
    defineTool(
      service,
      report,
      z.object({ days, limit: limitOf(report), property_id: propertyId }),
      (input) => ({
        days: input.days,
        limit: input.limit,
        propertyId: optional(input.property_id),
      })
    );

  return [
    defineTool(service, 'properties', z.object({}), () => ({})),
    rangeOnly('overview'),
    ranked('pages'),
    ranked('sources'),
    ranked('countries'),
    rangeOnly('devices'),
    rangeOnly('daily'),
    defineTool(
      service,
      'realtime',
      z.object({ limit: limitOf('realtime'), property_id: propertyId }),
      (input) => ({ limit: input.limit, propertyId: optional(input.property_id) })
    ),
    defineTool(
      service,
      'custom',
      z.object({
        metrics: z.string().describe('Comma-separated metric names, e.g. "sessions,totalUsers"'),
        dimensions: z.string().default('').describe('Comma-separated dimension names'),
        days,
        limit: limitOf('custom'),
        property_id: propertyId,
      }),
      (input) => ({
        metrics: input.metrics,
        dimensions: optional(input.dimensions),
        days: input.days,
        limit: input.limit,
        propertyId: optional(input.property_id),
      })
    ),
  ];
}
