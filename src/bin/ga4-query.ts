#!/usr/bin/env node

import 'dotenv/config';
import { runCli } from '../cli.js';
import { loadConfig, requireCredentials } from '../config/index.js';
import { errorMessage } from '../errors.js';
import { createGA4Client } from '../mcp/ga4Client.js';
import { ReportService } from '../reports/reportService.js';
import { logger } from '../utils/logger.js';

async function main(): Promise<number> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const service = new ReportService(config, () => createGA4Client(requireCredentials(config)));

  return runCli(process.argv.slice(2), {
    config,
    service,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Error: ${errorMessage(error)}\n`);
    process.exitCode = 1;
  });
