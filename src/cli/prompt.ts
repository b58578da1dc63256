import logSymbols from 'log-symbols';
import type { Decision, DecisionRequest, InputProvider } from '../games/blackjack/session.js';
import type { PlayerAction } from '../games/blackjack/types.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

const QUIT_WORDS = ['quit', 'q', 'exit'];
const ACTION_KEYS: Record<string, PlayerAction> = {
  h: 'hit',
  hit: 'hit',
  s: 'stand',
  stand: 'stand',
  d: 'double',
  double: 'double',
};

export function isQuit(raw: string): boolean {
  return QUIT_WORDS.includes(raw.trim().toLowerCase());
}

export function parseBetInput(raw: string, balance: number): ParseResult<number> {
  const s = raw.trim().replace(/_/g, '');
  if (!/^-?\d+$/.test(s)) return { ok: false, error: 'Please enter a valid number.' };
  const n = parseInt(s, 10);
  if (n <= 0) return { ok: false, error: 'Please enter a positive bet amount.' };
  if (n > balance) return { ok: false, error: `You don't have enough rocks. You have ${balance} rocks.` };
  return { ok: true, value: n };
}

export function parseYesNo(raw: string): ParseResult<boolean> {
  const s = raw.trim().toLowerCase();
  if (s === 'y' || s === 'yes') return { ok: true, value: true };
  if (s === 'n' || s === 'no') return { ok: true, value: false };
  return { ok: false, error: "Please enter 'y' or 'n'." };
}

export function parseAction(raw: string, available: readonly PlayerAction[]): ParseResult<PlayerAction> {
  const action = ACTION_KEYS[raw.trim().toLowerCase()];
  if (!action || !available.includes(action)) {
    const keys = available.map((a) => a[0]).join('/');
    return { ok: false, error: `Invalid choice. Please enter ${keys}.` };
  }
  return { ok: true, value: action };
}

export function promptFor(request: DecisionRequest): string {
  switch (request.kind) {
    case 'bet':
      return `You have ${request.balance} rocks. How much would you like to bet? `;
    case 'insurance':
      return `Take insurance for ${request.stake} rocks? (y/n): `;
    case 'split':
      return `Split your hand for another ${request.bet} rocks? (y/n): `;
    case 'action':
      return request.actions.includes('double') ? 'Hit, Stand, or Double Down? (h/s/d): ' : 'Hit or Stand? (h/s): ';
    case 'playAgain':
      return 'Play again? (y/n): ';
    case 'confirmQuit':
      return 'Confirm quit? (y/n): ';
  }
}

/** Validates one line of input against the question it answers. */
export function parseDecision(request: DecisionRequest, raw: string): ParseResult<Decision> {
  if (request.kind !== 'confirmQuit' && isQuit(raw)) return { ok: true, value: { type: 'cancel' } };
  switch (request.kind) {
    case 'bet': {
      const r = parseBetInput(raw, request.balance);
      return r.ok ? { ok: true, value: { type: 'bet', amount: r.value } } : r;
    }
    case 'action': {
      const r = parseAction(raw, request.actions);
      return r.ok ? { ok: true, value: { type: 'action', action: r.value } } : r;
    }
    case 'insurance': {
      const r = parseYesNo(raw);
      return r.ok ? { ok: true, value: { type: 'insurance', take: r.value } } : r;
    }
    case 'split': {
      const r = parseYesNo(raw);
      return r.ok ? { ok: true, value: { type: 'split', accept: r.value } } : r;
    }
    case 'playAgain': {
      const r = parseYesNo(raw);
      return r.ok ? { ok: true, value: { type: 'playAgain', again: r.value } } : r;
    }
    case 'confirmQuit': {
      const r = parseYesNo(raw);
      return r.ok ? { ok: true, value: { type: 'confirmQuit', confirm: r.value } } : r;
    }
  }
}

export interface LineReader {
  question(query: string): Promise<string>;
}

/** Asks until the line parses; bad input never reaches the engine. */
export function createTerminalInput(
  reader: LineReader,
  write: (line: string) => void = (line) => console.log(line),
): InputProvider {
  return {
    async next(request) {
      for (;;) {
        const raw = await reader.question(promptFor(request));
        const parsed = parseDecision(request, raw);
        if (parsed.ok) return parsed.value;
        write(`${logSymbols.warning} ${parsed.error}`);
      }
    },
  };
}
