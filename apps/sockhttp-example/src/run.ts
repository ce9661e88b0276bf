import type { Connector } from 'sockhttp';
import type { ExampleConfig } from './config.js';
import { formatResponse, sendConfiguredRequest } from './request.js';

/**
 * Where the example writes its output.
 */
export interface ExampleIo {
  readonly out: (text: string) => void;
  readonly error: (text: string) => void;
  /** Transport factory; defaults to real sockets */
  readonly connector?: Connector;
}

/** Exit code for a request that failed */
export const EXIT_REQUEST_FAILED = 1;

/**
 * Sends the configured request and prints the outcome.
 *
 * @returns The process exit code
 */
export async function runExample(config: ExampleConfig, io: ExampleIo): Promise<number> {
  const response = await sendConfiguredRequest(config, io.connector);
  if (response.isErr()) {
    io.error(`Request failed (${response.error.code}): ${response.error.message}`);
    return EXIT_REQUEST_FAILED;
  }

  io.out(formatResponse(response.value));
  return 0;
}
