#!/usr/bin/env node
import { runCli } from '../cli';
import { toError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('city-distance');

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch(error => {
  logger.error('Fatal error:', toError(error));
  process.exit(1);
});
