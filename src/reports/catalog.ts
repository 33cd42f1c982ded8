/**
 * Report catalog
 *
 * The closed set of reports the CLI and MCP server understand. Each entry is
 * keyed by its name and checked against the `ReportName` union, so adding a
 * name without a definition (or the reverse) fails to compile.
 */

import { InvalidArgumentError, UnknownReportError } from '../errors.js';

export const REPORT_NAMES = [
  'properties',
  'overview',
  'pages',
  'sources',
  'countries',
  'devices',
  'daily',
  'realtime',
  'custom',
] as const;

export type ReportName = (typeof REPORT_NAMES)[number];

export interface Ordering {
  field: string;
  type: 'metric' | 'dimension';
  desc: boolean;
}

export type RowLimitPolicy =
  /** The caller's limit applies; `default` is used when none is given. */
  | { kind: 'caller'; default: number }
  | { kind: 'fixed'; value: number }
  /** One row per day of the resolved date range. */
  | { kind: 'range' };

interface ReportBase {
  name: ReportName;
  description: string;
}

export interface PropertiesReportSpec extends ReportBase {
  kind: 'properties';
  name: 'properties';
}

export interface StandardReportSpec extends ReportBase {
  kind: 'standard';
  metrics: readonly string[];
  dimensions: readonly string[];
  ordering?: Ordering;
  rowLimit: RowLimitPolicy;
}

export interface RealtimeReportSpec extends ReportBase {
  kind: 'realtime';
  name: 'realtime';
  metrics: readonly string[];
  dimensions: readonly string[];
  rowLimit: RowLimitPolicy;
}

export interface CustomReportSpec extends ReportBase {
  kind: 'custom';
  name: 'custom';
  rowLimit: RowLimitPolicy;
}

export type ReportSpec =
  | PropertiesReportSpec
  | StandardReportSpec
  | RealtimeReportSpec
  | CustomReportSpec;

/** Reports whose metric and dimension lists are fixed by the catalog. */
export type FixedReportSpec = StandardReportSpec | RealtimeReportSpec;

export const REPORT_CATALOG = {
  properties: {
    kind: 'properties',
    name: 'properties',
    description: 'List all GA4 accounts and properties the service account can access.',
  },
  overview: {
    kind: 'standard',
    name: 'overview',
    description: 'High-level GA4 summary: users, sessions, page views, bounce rate.',
    metrics: [
      'totalUsers',
      'newUsers',
      'sessions',
      'screenPageViews',
      'averageSessionDuration',
      'engagementRate',
      'bounceRate',
    ],
    dimensions: [],
    rowLimit: { kind: 'fixed', value: 1 },
  },
  pages: {
    kind: 'standard',
    name: 'pages',
    description: 'Top pages by views with page path, title, views, users.',
    metrics: ['screenPageViews', 'totalUsers', 'averageSessionDuration'],
    dimensions: ['pagePath', 'pageTitle'],
    ordering: { field: 'screenPageViews', type: 'metric', desc: true },
    rowLimit: { kind: 'caller', default: 20 },
  },
  sources: {
    kind: 'standard',
    name: 'sources',
    description: 'Traffic sources breakdown by source/medium.',
    metrics: ['sessions', 'totalUsers', 'engagementRate', 'conversions'],
    dimensions: ['sessionSource', 'sessionMedium'],
    ordering: { field: 'sessions', type: 'metric', desc: true },
    rowLimit: { kind: 'caller', default: 20 },
  },
  countries: {
    kind: 'standard',
    name: 'countries',
    description: 'Geographic breakdown of sessions and users by country.',
    metrics: ['sessions', 'totalUsers', 'engagementRate'],
    dimensions: ['country'],
    ordering: { field: 'sessions', type: 'metric', desc: true },
    rowLimit: { kind: 'caller', default: 20 },
  },
  devices: {
    kind: 'standard',
    name: 'devices',
    description: 'Device category breakdown (desktop, mobile, tablet).',
    metrics: ['sessions', 'totalUsers', 'engagementRate'],
    dimensions: ['deviceCategory'],
    ordering: { field: 'sessions', type: 'metric', desc: true },
    rowLimit: { kind: 'caller', default: 10 },
  },
  daily: {
    kind: 'standard',
    name: 'daily',
    description: 'Day-by-day trend of users, sessions, and page views.',
    metrics: ['totalUsers', 'sessions', 'screenPageViews'],
    dimensions: ['date'],
    ordering: { field: 'date', type: 'dimension', desc: false },
    rowLimit: { kind: 'range' },
  },
  realtime: {
    kind: 'realtime',
    name: 'realtime',
    description: 'Active users right now (last 30 minutes).',
    metrics: ['activeUsers'],
    dimensions: ['unifiedScreenName'],
    rowLimit: { kind: 'caller', default: 10 },
  },
  custom: {
    kind: 'custom',
    name: 'custom',
    description: 'Custom GA4 query with any metrics and dimensions (comma-separated).',
    rowLimit: { kind: 'caller', default: 10 },
  },
} as const satisfies { readonly [N in ReportName]: ReportSpec & { name: N } };

export function isReportName(value: string): value is ReportName {
  return (REPORT_NAMES as readonly string[]).includes(value);
}

export function lookupReport(name: string): ReportSpec {
  if (!isReportName(name)) {
    throw new UnknownReportError(name, REPORT_NAMES);
  }
  return REPORT_CATALOG[name];
}

// API names, plus `customEvent:foo` style names for custom definitions
const FIELD_NAME = /^[A-Za-z][A-Za-z0-9_]*(:[A-Za-z0-9_]+)?$/;

/**
 * Parse a comma-separated list of metric or dimension names, keeping order.
 */
export function parseFieldList(raw: string, label: 'metrics' | 'dimensions'): string[] {
  const fields = raw.split(',').map((f) => f.trim());

  for (const field of fields) {
    if (field === '') {
      throw new InvalidArgumentError(`Empty entry in --${label} list: "${raw}"`);
    }
    if (!FIELD_NAME.test(field)) {
      throw new InvalidArgumentError(`Invalid ${label} name: "${field}"`);
    }
  }

  return fields;
}

export interface ReportFields {
  metrics: readonly string[];
  dimensions: readonly string[];
}

/**
 * Metric and dimension lists for a report. Only `custom` reads the caller's
 * lists; metrics are required there, dimensions are optional.
 */
export function resolveReportFields(
  spec: FixedReportSpec | CustomReportSpec,
  input: { metrics?: string; dimensions?: string }
): ReportFields {
  if (spec.kind !== 'custom') {
    return { metrics: spec.metrics, dimensions: spec.dimensions };
  }

  if (input.metrics === undefined || input.metrics.trim() === '') {
    throw new InvalidArgumentError('--metrics required for custom report (comma-separated)');
  }

  const dimensions =
    input.dimensions === undefined || input.dimensions.trim() === ''
      ? []
      : parseFieldList(input.dimensions, 'dimensions');

  return { metrics: parseFieldList(input.metrics, 'metrics'), dimensions };
}
