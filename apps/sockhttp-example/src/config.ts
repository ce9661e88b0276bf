/**
 * Example configuration module.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

export class ConfigValidationError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    const message = issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    super(`Configuration validation failed with the following issues:\n${message}`);
    this.name = 'ConfigValidationError';
  }
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  SOCKHTTP_URL: z.string().regex(/^https?:\/\//i, 'must be an http:// or https:// URL'),
  SOCKHTTP_METHOD: z
    .string()
    .regex(/^[A-Za-z]+$/, 'must be a method name such as GET')
    .default('GET')
    .transform((method) => method.toUpperCase()),
  SOCKHTTP_PROXY: z.string().min(1).optional(),
  SOCKHTTP_BODY: z.string().optional(),
  SOCKHTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SOCKHTTP_INSECURE: booleanFlag,
  LOG_LEVEL: z.enum(['debug', 'info', 'warning', 'error', 'fatal']).default('info'),
});

/**
 * Settings for one request made by the example.
 */
export interface ExampleConfig {
  /** Target URL */
  readonly url: string;
  /** Request method, uppercased */
  readonly method: string;
  /** HTTP proxy to tunnel through */
  readonly proxy: string | undefined;
  /** Request body */
  readonly body: string | undefined;
  readonly timeoutMs: number;
  /** Skip certificate verification for https targets */
  readonly insecure: boolean;
  readonly logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

/**
 * Reads the example configuration from environment variables.
 *
 * Required env vars:
 * - SOCKHTTP_URL: URL to request
 *
 * Optional env vars:
 * - SOCKHTTP_METHOD: request method (default: GET)
 * - SOCKHTTP_PROXY: HTTP proxy URL, e.g. http://127.0.0.1:3128
 * - SOCKHTTP_BODY: request body, sent as UTF-8
 * - SOCKHTTP_TIMEOUT_MS: socket idle timeout (default: 30000)
 * - SOCKHTTP_INSECURE: "true" to skip certificate verification
 * - LOG_LEVEL: debug | info | warning | error | fatal (default: info)
 */
export function loadConfig(
  env: Record<string, string | undefined>
): Result<ExampleConfig, ConfigValidationError> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return err(new ConfigValidationError(parsed.error.issues));
  }

  const data = parsed.data;
  return ok({
    url: data.SOCKHTTP_URL,
    method: data.SOCKHTTP_METHOD,
    proxy: data.SOCKHTTP_PROXY,
    body: data.SOCKHTTP_BODY,
    timeoutMs: data.SOCKHTTP_TIMEOUT_MS,
    insecure: data.SOCKHTTP_INSECURE,
    logLevel: data.LOG_LEVEL,
  });
}
