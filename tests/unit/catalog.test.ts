/**
 * Unit Tests for the report catalog
 */

import { describe, it, expect } from '@jest/globals';
import {
  REPORT_CATALOG,
  REPORT_NAMES,
  isReportName,
  lookupReport,
  parseFieldList,
  resolveReportFields,
} from '../../src/reports/catalog.js';
import { InvalidArgumentError, UnknownReportError } from '../../src/errors.js';

describe('Report catalog', () => {
  it('has one entry per report name', () => {
    expect(Object.keys(REPORT_CATALOG).sort()).toEqual([...REPORT_NAMES].sort());
    expect(REPORT_NAMES).toHaveLength(9);
  });

  it('returns the same overview definition on every lookup', () => {
    const first = lookupReport('overview');
    const second = lookupReport('overview');

    expect(second).toBe(first);
    expect(first).toMatchObject({
      kind: 'standard',
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
    });
  });

  it('defines pages ordered by views', () => {
    expect(lookupReport('pages')).toMatchObject({
      dimensions: ['pagePath', 'pageTitle'],
      ordering: { field: 'screenPageViews', type: 'metric', desc: true },
    });
  });

  it('defines daily ordered by date ascending with one row per day', () => {
    expect(lookupReport('daily')).toMatchObject({
      dimensions: ['date'],
      ordering: { field: 'date', type: 'dimension', desc: false },
      rowLimit: { kind: 'range' },
    });
  });

  it('rejects unknown report names', () => {
    expect(() => lookupReport('bogus')).toThrow(UnknownReportError);
    expect(() => lookupReport('bogus')).toThrow(
      'Unknown report "bogus". Expected one of: properties, overview, pages, sources, countries, devices, daily, realtime, custom'
    );
    expect(isReportName('Overview')).toBe(false);
    expect(isReportName('realtime')).toBe(true);
  });
});

describe('parseFieldList', () => {
  it('keeps order and trims whitespace', () => {
    expect(parseFieldList(' sessions , totalUsers', 'metrics')).toEqual(['sessions', 'totalUsers']);
  });

  it('accepts custom definition names', () => {
    expect(parseFieldList('customEvent:plan_tier', 'dimensions')).toEqual([
      'customEvent:plan_tier',
    ]);
  });

  it('rejects empty entries', () => {
    expect(() => parseFieldList('sessions,,totalUsers', 'metrics')).toThrow(
      'Empty entry in --metrics list: "sessions,,totalUsers"'
    );
  });

  it('rejects names that are not identifiers', () => {
    expect(() => parseFieldList('page path', 'dimensions')).toThrow(InvalidArgumentError);
  });
});

describe('resolveReportFields', () => {
  it('uses the catalog lists for fixed reports', () => {
    const spec = REPORT_CATALOG.countries;
    expect(resolveReportFields(spec, { metrics: 'ignored' })).toEqual({
      metrics: ['sessions', 'totalUsers', 'engagementRate'],
      dimensions: ['country'],
    });
  });

  it('uses the caller lists for custom', () => {
    expect(
      resolveReportFields(REPORT_CATALOG.custom, {
        metrics: 'sessions,totalUsers',
        dimensions: 'city',
      })
    ).toEqual({ metrics: ['sessions', 'totalUsers'], dimensions: ['city'] });
  });

  it('allows custom without dimensions', () => {
    expect(resolveReportFields(REPORT_CATALOG.custom, { metrics: 'sessions' })).toEqual({
      metrics: ['sessions'],
      dimensions: [],
    });
  });

  it('requires metrics for custom', () => {
    expect(() => resolveReportFields(REPORT_CATALOG.custom, { dimensions: 'city' })).toThrow(
      '--metrics required for custom report (comma-separated)'
    );
  });
});
