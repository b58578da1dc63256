// src/utils/errors.ts
import type { Phase } from '../games/blackjack/types.js';

export type EngineErrorCode = 'ERR_PHASE' | 'ERR_CONFIG';

/** Raised when a round transition is driven out of order. A caller bug, never a game outcome. */
export class RoundStateError extends Error {
  readonly code: EngineErrorCode = 'ERR_PHASE';

  constructor(readonly expected: readonly Phase[], readonly actual: Phase) {
    super(`expected phase ${expected.join(' | ')}, round is in ${actual}`);
    this.name = 'RoundStateError';
  }
}

export class ConfigError extends Error {
  readonly code: EngineErrorCode = 'ERR_CONFIG';

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}
