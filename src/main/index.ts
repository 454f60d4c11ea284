#!/usr/bin/env node
import { runCli } from './cli.js';
import { createContainer } from './container.js';
import debugLogger from '../services/debugLogger.js';

const main = async (): Promise<void> => {
  debugLogger.setConsoleEnabled(false);
  debugLogger.debug('Main', 'xenray starting', { argv: process.argv.slice(2), platform: process.platform });
  const container = createContainer();
  process.exitCode = await runCli(process.argv.slice(2), { container });
};

void main().catch((error: unknown) => {
  debugLogger.error('Main', 'Unhandled error', { error: error instanceof Error ? error.stack : String(error) });
  console.error(`✗ Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
