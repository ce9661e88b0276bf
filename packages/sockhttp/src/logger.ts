import { getLogger } from '@logtape/logtape';

/**
 * Root logging category. Applications enable the client's diagnostics with
 * LogTape's `configure()`:
 *
 * - sockhttp
 *   - transport (socket open/close, TLS)
 *   - proxy (CONNECT handshakes)
 *   - client (request/response lifecycle)
 *
 * Without configuration every record is dropped.
 */
export const LOGGER_CATEGORY = 'sockhttp';

export const transportLogger = getLogger([LOGGER_CATEGORY, 'transport']);
export const proxyLogger = getLogger([LOGGER_CATEGORY, 'proxy']);
export const clientLogger = getLogger([LOGGER_CATEGORY, 'client']);
