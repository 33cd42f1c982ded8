/**
 * Unit Tests for the ga4-query command line
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { runCli } from '../../src/cli.js';
import { ReportService } from '../../src/reports/reportService.js';
import { FakeBackend, captureLogs, testConfig } from '../helpers.js';
import type { AppConfig } from '../../src/config/index.js';

const NOW = new Date(2024, 2, 10, 12, 0, 0);

describe('runCli', () => {
  let backend: FakeBackend;
  let backendsCreated: number;
  let out: string;
  let err: string;

  const run = (argv: string[], config: AppConfig = testConfig()) => {
    const service = new ReportService(
      config,
      () => {
        backendsCreated += 1;
        return backend;
      },
      () => NOW
    );
    return runCli(argv, {
      config,
      service,
      stdout: (text) => {
        out += text;
      },
      stderr: (text) => {
        err += text;
      },
    });
  };

  beforeEach(() => {
    backend = new FakeBackend();
    backendsCreated = 0;
    out = '';
    err = '';
    captureLogs();
  });

  it('prints the report as a table by default', async () => {
    const code = await run(['--report', 'pages', '--days', '7']);

    expect(code).toBe(0);
    expect(err).toBe('');
    expect(out).toBe(
      [
        '+----------+-----------------+',
        '| pagePath | screenPageViews |',
        '+----------+-----------------+',
        '| /a       | 10              |',
        '| /b       | 3               |',
        '+----------+-----------------+',
        '',
        'Total rows: 2',
        '',
      ].join('\n')
    );
    expect(backend.queries[0].dateRange).toEqual({
      startDate: '2024-03-04',
      endDate: '2024-03-10',
    });
  });

  it('prints CSV and JSON', async () => {
    await run(['--report', 'pages', '--output', 'csv']);
    expect(out).toBe('pagePath,screenPageViews\n/a,10\n/b,3\n');

    out = '';
    await run(['--report=pages', '--output=json']);
    expect(JSON.parse(out)).toEqual([
      { pagePath: '/a', screenPageViews: 10 },
      { pagePath: '/b', screenPageViews: 3 },
    ]);
  });

  it('prints only the header line for an empty CSV result', async () => {
    backend = new FakeBackend({ columns: ['pagePath', 'screenPageViews'], rows: [] });

    expect(await run(['--report', 'pages', '--output', 'csv'])).toBe(0);
    expect(out).toBe('pagePath,screenPageViews\n');
  });

  it('passes every option through to the request', async () => {
    const code = await run([
      '--report',
      'custom',
      '--property-id',
      '42',
      '--start',
      '2024-01-01',
      '--end',
      '2024-01-31',
      '--limit',
      '5',
      '--metrics',
      'sessions,totalUsers',
      '--dimensions',
      'city',
      '--order-by',
      'city',
      '--ascending',
    ]);

    expect(code).toBe(0);
    expect(backend.queries).toEqual([
      {
        kind: 'report',
        propertyId: '42',
        metrics: ['sessions', 'totalUsers'],
        dimensions: ['city'],
        dateRange: { startDate: '2024-01-01', endDate: '2024-01-31' },
        limit: 5,
        orderBys: [{ dimension: { dimensionName: 'city' }, desc: false }],
      },
    ]);
  });

  it('takes --days and --limit defaults from the config', async () => {
    await run(
      ['--report', 'custom', '--metrics', 'sessions'],
      testConfig({ defaults: { days: 2, limit: 3, output: 'table' } })
    );

    expect(backend.queries[0]).toMatchObject({
      dateRange: { startDate: '2024-03-09', endDate: '2024-03-10' },
      limit: 3,
    });
  });

  it('reports unknown reports with the list of valid names', async () => {
    const code = await run(['--report', 'bogus']);

    expect(code).toBe(1);
    expect(out).toBe('');
    expect(err).toBe(
      'Error: Unknown report "bogus". Expected one of: ' +
        'properties, overview, pages, sources, countries, devices, daily, realtime, custom\n'
    );
    expect(backendsCreated).toBe(0);
  });

  it('reports a missing property before contacting the provider', async () => {
    const code = await run(['--report', 'overview'], testConfig({ defaultPropertyId: undefined }));

    expect(code).toBe(1);
    expect(err).toBe(
      'Error: No property ID provided. Use --property-id or set GA4_PROPERTY_ID env var.\n'
    );
    expect(backendsCreated).toBe(0);
  });

  it('rejects a non-positive --days', async () => {
    const code = await run(['--report', 'pages', '--days', '0']);

    expect(code).toBe(1);
    expect(err).toBe('Error: --days must be a positive integer, got 0\n');
  });

  it('reports provider failures without printing a result', async () => {
    backend = new FakeBackend(undefined, new Error('7 PERMISSION_DENIED: User does not have access'));

    const code = await run(['--report', 'sources']);

    expect(code).toBe(1);
    expect(out).toBe('');
    expect(err).toBe('Error: 7 PERMISSION_DENIED: User does not have access\n');
  });

  it('leaves usage errors to commander', async () => {
    expect(await run([])).toBe(1);
    expect(err).toContain("required option '--report <name>' not specified");

    err = '';
    expect(await run(['--report', 'pages', '--days', 'seven'])).toBe(1);
    expect(err).toContain('Not an integer.');

    err = '';
    expect(await run(['--report', 'pages', '--output', 'xml'])).toBe(1);
    expect(err).toContain('Allowed choices are table, json, csv.');
    expect(backendsCreated).toBe(0);
  });
});
