import path from 'node:path';
import pino from 'pino';
import { isTestEnv } from '../util/env.js';
import { normalizeError } from '../utils/errors.js';

type Data = Record<string, unknown>;

const level = process.env.LOG_LEVEL || 'info';

function createBase() {
  // Jest runs stay quiet and leave no open file handles behind
  if (isTestEnv()) return pino({ level: 'silent', base: undefined });
  const dest = process.env.LOG_FILE || path.resolve('logs', 'blackjack.ndjson');
  const stream = pino.destination({ dest, mkdir: true, sync: false });
  return pino({ level, base: undefined }, stream);
}

const logger = createBase();

function info(msg: string, scope?: string, data?: Data) {
  logger.info({ msg, scope, data });
}
function warn(msg: string, scope?: string, data?: Data) {
  logger.warn({ msg, scope, data });
}
function error(msg: string, scope?: string, err?: unknown) {
  logger.error({ msg, scope, error: err === undefined ? undefined : normalizeError(err) });
}
function debug(msg: string, scope?: string, data?: Data) {
  logger.debug({ msg, scope, data });
}

function withScope(scope: string) {
  return {
    info: (msg: string, data?: Data) => info(msg, scope, data),
    warn: (msg: string, data?: Data) => warn(msg, scope, data),
    error: (msg: string, err?: unknown) => error(msg, scope, err),
    debug: (msg: string, data?: Data) => debug(msg, scope, data),
  };
}

export type ScopedLogger = ReturnType<typeof withScope>;

/** Flush buffered lines before the process exits. */
function flush(): void {
  logger.flush();
}

export const log = { info, warn, error, debug, withScope, flush };
export default log;
