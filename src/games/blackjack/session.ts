import log, { type ScopedLogger } from '../../cli/logger.js';
import { RoundStateError } from '../../utils/errors.js';
import {
  applyAction,
  availableActions,
  cancelRound,
  createRound,
  pendingDecision,
  placeBet,
  resolveInsurance,
  resolveSplit,
} from './engine.js';
import { handTotal } from './hand.js';
import { insuranceStake } from './payout.js';
import type { ReshuffleReason, Shoe } from './shoe.js';
import type { Card, PlayerAction, RoundEvent, RoundResult, RoundState, TableRules } from './types.js';

export type DecisionRequest =
  | { kind: 'bet'; balance: number }
  | { kind: 'insurance'; stake: number; balance: number }
  | { kind: 'split'; bet: number; balance: number }
  | { kind: 'action'; hand: number; cards: Card[]; value: number; actions: PlayerAction[] }
  | { kind: 'playAgain'; balance: number }
  | { kind: 'confirmQuit' };

export type Decision =
  | { type: 'bet'; amount: number }
  | { type: 'insurance'; take: boolean }
  | { type: 'split'; accept: boolean }
  | { type: 'action'; action: PlayerAction }
  | { type: 'playAgain'; again: boolean }
  | { type: 'confirmQuit'; confirm: boolean }
  | { type: 'cancel' };

export type RequestKind = DecisionRequest['kind'];
export type DecisionFor<K extends RequestKind> = Extract<Decision, { type: K }>;

export interface InputProvider {
  next(request: DecisionRequest): Decision | Promise<Decision>;
}

export type SessionEvent =
  | RoundEvent
  | { type: 'roundStarted'; round: number; balance: number }
  | { type: 'shoeReshuffled'; reason: ReshuffleReason; size: number }
  | { type: 'balanceToppedUp'; balance: number }
  | { type: 'rejected'; kind: RequestKind; reason: string }
  | { type: 'sessionEnded'; balance: number; rounds: number; quit: boolean };

export interface OutputSink {
  emit(event: SessionEvent): void;
}

export const QUIT = Symbol('quit');
export type Ask = <R extends DecisionRequest>(request: R) => Promise<DecisionFor<R['kind']> | typeof QUIT>;

function answers<K extends RequestKind>(kind: K, decision: Decision): decision is DecisionFor<K> {
  return decision.type === kind;
}

/**
 * Wraps an input provider so every question can be cancelled. A cancel is
 * only honoured once confirmed; a declined confirmation asks the question again.
 */
export function createAsker(input: InputProvider, output: OutputSink): Ask {
  async function confirmQuit(): Promise<boolean> {
    for (;;) {
      const decision = await input.next({ kind: 'confirmQuit' });
      if (decision.type === 'cancel') return true;
      if (answers('confirmQuit', decision)) return decision.confirm;
      output.emit({ type: 'rejected', kind: 'confirmQuit', reason: "Please enter 'y' or 'n'." });
    }
  }

  return async function ask<R extends DecisionRequest>(request: R): Promise<DecisionFor<R['kind']> | typeof QUIT> {
    for (;;) {
      const decision = await input.next(request);
      if (decision.type === 'cancel') {
        if (await confirmQuit()) return QUIT;
        continue;
      }
      const kind: R['kind'] = request.kind;
      if (answers(kind, decision)) return decision;
      output.emit({ type: 'rejected', kind, reason: `Expected a ${kind} decision, got ${decision.type}.` });
    }
  };
}

/** Drives one round from Betting to Complete. */
export async function playRound(state: RoundState, ask: Ask, output: OutputSink): Promise<RoundState> {
  while (state.phase !== 'Complete') {
    switch (pendingDecision(state)) {
      case 'bet': {
        const d = await ask({ kind: 'bet', balance: state.balance });
        if (d === QUIT) {
          cancelRound(state);
          break;
        }
        const res = placeBet(state, d.amount);
        if (!res.ok) output.emit({ type: 'rejected', kind: 'bet', reason: res.reason });
        break;
      }
      case 'insurance': {
        const d = await ask({ kind: 'insurance', stake: insuranceStake(state.bet), balance: state.balance });
        if (d === QUIT) cancelRound(state);
        else resolveInsurance(state, d.take);
        break;
      }
      case 'split': {
        const d = await ask({ kind: 'split', bet: state.bet, balance: state.balance });
        if (d === QUIT) cancelRound(state);
        else resolveSplit(state, d.accept);
        break;
      }
      case 'action': {
        const hand = state.playerHands[state.activeIndex];
        const d = await ask({
          kind: 'action',
          hand: state.activeIndex,
          cards: hand.cards.slice(),
          value: handTotal(hand.cards).total,
          actions: availableActions(state),
        });
        if (d === QUIT) {
          cancelRound(state);
          break;
        }
        const res = applyAction(state, d.action);
        if (!res.ok) output.emit({ type: 'rejected', kind: 'action', reason: res.reason });
        break;
      }
      case 'none':
        // automatic phases run inside the transitions, so the loop never waits on one
        throw new RoundStateError(['Betting', 'InsuranceOffer', 'SplitOffer', 'PlayerTurn'], state.phase);
    }
  }
  return state;
}

export interface SessionOptions {
  shoe: Shoe;
  balance: number;
  input: InputProvider;
  output: OutputSink;
  topUp: number;
  rules?: Partial<TableRules>;
  logger?: ScopedLogger;
}

export interface SessionSummary {
  balance: number;
  rounds: number;
  results: RoundResult[];
  quit: boolean;
}

export async function runSession(opts: SessionOptions): Promise<SessionSummary> {
  const { shoe, input, output, topUp, rules } = opts;
  const logger = opts.logger ?? log.withScope('session');
  const ask = createAsker(input, output);
  const results: RoundResult[] = [];
  let balance = opts.balance;
  let rounds = 0;
  let quit = false;

  shoe.setReshuffleListener((reason, size) => {
    logger.info('shoe reshuffled', { reason, size });
    output.emit({ type: 'shoeReshuffled', reason, size });
  });

  try {
    for (;;) {
      // only between rounds; a mid-round shortage is covered by draw()
      if (shoe.needsReshuffle()) shoe.reshuffle('threshold');

      if (balance <= 0) {
        balance = topUp;
        logger.info('balance topped up', { balance });
        output.emit({ type: 'balanceToppedUp', balance });
      }

      rounds++;
      output.emit({ type: 'roundStarted', round: rounds, balance });
      const round = createRound({ shoe, balance, rules, listener: (e) => output.emit(e) });
      await playRound(round, ask, output);
      balance = round.balance;

      if (round.cancelled) {
        logger.info('round cancelled', { round: rounds, balance });
        quit = true;
        break;
      }
      if (round.result) {
        results.push(round.result);
        logger.info('round settled', {
          round: rounds,
          net: round.result.net,
          balance,
          outcomes: round.result.hands.map((h) => h.outcome),
        });
      }

      const again = await ask({ kind: 'playAgain', balance });
      if (again === QUIT) {
        quit = true;
        break;
      }
      if (!again.again) break;
    }
  } finally {
    shoe.setReshuffleListener(undefined);
  }

  output.emit({ type: 'sessionEnded', balance, rounds, quit });
  return { balance, rounds, results, quit };
}
