#!/usr/bin/env node
import { loadConfig } from './config';
import { createConsoleLogger } from './logger';
import { runQuery } from './run_query';
import { configureTelemetry } from './telemetry';

function main(): number {
  configureTelemetry({ enabled: false });
  return runQuery(process.argv[2], loadConfig(), process.stdout, createConsoleLogger('tagstream-query'));
}

if (require.main === module) {
  process.exitCode = main();
}
