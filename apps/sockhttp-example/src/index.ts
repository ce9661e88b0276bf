/**
 * sockhttp example
 *
 * Sends one request described by environment variables and prints the
 * response. Exits non-zero on configuration or request errors.
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import { configure, getConsoleSink } from '@logtape/logtape';
import { LOGGER_CATEGORY } from 'sockhttp';
import { loadConfig } from './config.js';
import { runExample } from './run.js';

/** Exit code for invalid configuration */
const EXIT_INVALID_CONFIG = 2;

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  if (config.isErr()) {
    console.error(config.error.message);
    process.exitCode = EXIT_INVALID_CONFIG;
    return;
  }

  await configure({
    sinks: { console: getConsoleSink() },
    loggers: [
      { category: LOGGER_CATEGORY, lowestLevel: config.value.logLevel, sinks: ['console'] },
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['console'] },
    ],
  });

  process.exitCode = await runExample(config.value, {
    out: (text) => console.log(text),
    error: (text) => console.error(text),
  });
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
