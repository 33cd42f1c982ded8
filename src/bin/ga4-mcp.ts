#!/usr/bin/env node

import 'dotenv/config';
import { loadConfig, requireCredentials } from '../config/index.js';
import { createGA4Client, type GA4Client } from '../mcp/ga4Client.js';
import { ReportService } from '../reports/reportService.js';
import { startServer } from '../server/index.js';
import { logger } from '../utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  // created on the first call that passes local validation, then reused
  let client: GA4Client | undefined;
  const service = new ReportService(config, () => {
    if (!client) {
      client = createGA4Client(requireCredentials(config));
    }
    return client;
  });

  await startServer(config, service);
}

main().catch((error: unknown) => {
  logger.error('MCP server failed to start', { error: String(error) });
  process.exit(1);
});
