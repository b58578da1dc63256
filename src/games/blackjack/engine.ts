import log from '../../cli/logger.js';
import { RoundStateError } from '../../utils/errors.js';
import { handTotal, handValue, isBlackjack, isBust, isPair } from './hand.js';
import { compareHands, creditFor, insuranceStake, settle } from './payout.js';
import type { Shoe } from './shoe.js';
import type {
  Card,
  HandResult,
  HandState,
  Phase,
  PlayerAction,
  RoundEvent,
  RoundListener,
  RoundState,
  TableRules,
} from './types.js';

const logger = log.withScope('blackjack');

export const DEFAULT_RULES: TableRules = { dealerStandsOn: 17 };

export type BetRejection = 'BET_NOT_POSITIVE' | 'BET_NOT_INTEGER' | 'INSUFFICIENT_FUNDS';
export type ActionRejection = 'ACTION_UNAVAILABLE';
export type TransitionResult<C extends string = never> = { ok: true } | { ok: false; code: C; reason: string };

export type PendingDecision = 'bet' | 'insurance' | 'split' | 'action' | 'none';

export interface NewRound {
  shoe: Shoe;
  balance: number;
  rules?: Partial<TableRules>;
  listener?: RoundListener;
}

export function createRound({ shoe, balance, rules, listener }: NewRound): RoundState {
  return {
    phase: 'Betting',
    shoe,
    dealer: [],
    playerHands: [],
    activeIndex: 0,
    bet: 0,
    insurance: 0,
    balance,
    startingBalance: balance,
    rules: { ...DEFAULT_RULES, ...rules },
    log: [],
    cancelled: false,
    listener,
  };
}

function emit(state: RoundState, event: RoundEvent): void {
  state.log.push(event);
  state.listener?.(event);
}

function enter(state: RoundState, phase: Phase): void {
  logger.debug('phase', { from: state.phase, to: phase });
  state.phase = phase;
}

function assertPhase(state: RoundState, ...expected: Phase[]): void {
  if (!expected.includes(state.phase)) throw new RoundStateError(expected, state.phase);
}

function newHand(cards: Card[], bet: number, fromSplit: boolean): HandState {
  return { cards, bet, doubled: false, fromSplit, done: false };
}

function dealToPlayer(state: RoundState, hand: number): Card {
  const card = state.shoe.draw();
  state.playerHands[hand].cards.push(card);
  emit(state, { type: 'cardDealt', to: 'player', hand, card, faceDown: false });
  return card;
}

function dealToDealer(state: RoundState, faceDown: boolean): Card {
  const card = state.shoe.draw();
  state.dealer.push(card);
  emit(state, { type: 'cardDealt', to: 'dealer', hand: 0, card, faceDown });
  return card;
}

function emitHandValue(state: RoundState, hand: number): void {
  const { total, soft } = handTotal(state.playerHands[hand].cards);
  emit(state, { type: 'handValue', hand, value: total, soft });
}

export function pendingDecision(state: RoundState): PendingDecision {
  switch (state.phase) {
    case 'Betting':
      return 'bet';
    case 'InsuranceOffer':
      return 'insurance';
    case 'SplitOffer':
      return 'split';
    case 'PlayerTurn':
      return 'action';
    default:
      return 'none';
  }
}

export function activeHand(state: RoundState): HandState | undefined {
  return state.phase === 'PlayerTurn' ? state.playerHands[state.activeIndex] : undefined;
}

export function dealerUpCard(state: RoundState): Card | undefined {
  return state.dealer[0];
}

export function roundNet(state: RoundState): number {
  return state.balance - state.startingBalance;
}

export function validateBet(amount: number, balance: number): TransitionResult<BetRejection> {
  if (!Number.isInteger(amount)) return { ok: false, code: 'BET_NOT_INTEGER', reason: 'Bet must be a whole number.' };
  if (amount <= 0) return { ok: false, code: 'BET_NOT_POSITIVE', reason: 'Please enter a positive bet amount.' };
  if (amount > balance) {
    return { ok: false, code: 'INSUFFICIENT_FUNDS', reason: `You don't have enough rocks. You have ${balance} rocks.` };
  }
  return { ok: true };
}

/** Betting → InitialDeal → InsuranceOffer | ImmediateSettlement → ... */
export function placeBet(state: RoundState, amount: number): TransitionResult<BetRejection> {
  assertPhase(state, 'Betting');
  const valid = validateBet(amount, state.balance);
  if (!valid.ok) return valid;

  state.bet = amount;
  state.balance -= amount;
  state.playerHands = [newHand([], amount, false)];
  emit(state, { type: 'betPlaced', amount, balance: state.balance });
  enter(state, 'InitialDeal');
  initialDeal(state);
  return { ok: true };
}

function initialDeal(state: RoundState): void {
  dealToPlayer(state, 0);
  dealToDealer(state, false);
  dealToPlayer(state, 0);
  dealToDealer(state, true);
  emitHandValue(state, 0);

  const stake = insuranceStake(state.bet);
  if (state.dealer[0].r === 'A' && stake > 0 && state.balance >= stake) {
    enter(state, 'InsuranceOffer');
    emit(state, { type: 'insuranceOffered', stake });
    return;
  }
  immediateSettlement(state);
}

export function resolveInsurance(state: RoundState, take: boolean): void {
  assertPhase(state, 'InsuranceOffer');
  if (take) {
    const stake = insuranceStake(state.bet);
    state.insurance = stake;
    state.balance -= stake;
    emit(state, { type: 'insuranceTaken', stake, balance: state.balance });
  } else {
    emit(state, { type: 'insuranceDeclined' });
  }
  immediateSettlement(state);
}

function immediateSettlement(state: RoundState): void {
  enter(state, 'ImmediateSettlement');
  const hand = state.playerHands[0];
  const playerBJ = isBlackjack(hand.cards);
  const dealerBJ = isBlackjack(state.dealer);

  if (state.insurance > 0) {
    const outcome = dealerBJ ? 'insuranceWin' : 'insuranceLose';
    const delta = settle(outcome, state.insurance);
    state.balance += creditFor(outcome, state.insurance);
    state.insuranceResult = { outcome, stake: state.insurance, delta };
    emit(state, { type: 'insuranceSettled', outcome, stake: state.insurance, delta });
  }

  if (playerBJ || dealerBJ) {
    hand.outcome = playerBJ && dealerBJ ? 'push' : playerBJ ? 'blackjack' : 'lose';
    hand.done = true;
    revealDealer(state);
    settleRound(state);
    return;
  }

  if (isPair(hand.cards) && state.balance >= state.bet) {
    enter(state, 'SplitOffer');
    emit(state, { type: 'splitOffered' });
    return;
  }
  startPlayerTurn(state);
}

export function resolveSplit(state: RoundState, accept: boolean): void {
  assertPhase(state, 'SplitOffer');
  if (accept) {
    const [first, second] = state.playerHands[0].cards;
    state.balance -= state.bet;
    state.playerHands = [newHand([first], state.bet, true), newHand([second], state.bet, true)];
    emit(state, { type: 'split', bet: state.bet, balance: state.balance, heads: [first, second] });
    dealToPlayer(state, 0);
    dealToPlayer(state, 1);
  }
  startPlayerTurn(state);
}

function startPlayerTurn(state: RoundState): void {
  enter(state, 'PlayerTurn');
  state.activeIndex = 0;
  emitHandValue(state, 0);
}

export function availableActions(state: RoundState): PlayerAction[] {
  const hand = activeHand(state);
  if (!hand || hand.done) return [];
  const actions: PlayerAction[] = ['hit', 'stand'];
  if (hand.cards.length === 2 && !hand.doubled && state.balance >= hand.bet) actions.push('double');
  return actions;
}

export function applyAction(state: RoundState, action: PlayerAction): TransitionResult<ActionRejection> {
  assertPhase(state, 'PlayerTurn');
  if (!availableActions(state).includes(action)) {
    return { ok: false, code: 'ACTION_UNAVAILABLE', reason: `You can't ${action} now.` };
  }
  const index = state.activeIndex;
  const hand = state.playerHands[index];

  switch (action) {
    case 'hit':
      dealToPlayer(state, index);
      emitHandValue(state, index);
      if (isBust(hand.cards)) {
        markBust(state, index);
        finishHand(state);
      }
      break;
    case 'stand':
      finishHand(state);
      break;
    case 'double':
      state.balance -= hand.bet;
      hand.bet *= 2;
      hand.doubled = true;
      emit(state, { type: 'doubled', hand: index, bet: hand.bet, balance: state.balance });
      dealToPlayer(state, index);
      emitHandValue(state, index);
      // one card only, then the hand stands whatever it made
      if (isBust(hand.cards)) markBust(state, index);
      finishHand(state);
      break;
  }
  return { ok: true };
}

function markBust(state: RoundState, index: number): void {
  const hand = state.playerHands[index];
  hand.outcome = 'bust';
  emit(state, { type: 'bust', hand: index, value: handValue(hand.cards) });
}

function finishHand(state: RoundState): void {
  state.playerHands[state.activeIndex].done = true;
  const next = state.activeIndex + 1;
  if (next < state.playerHands.length) {
    state.activeIndex = next;
    emitHandValue(state, next);
    return;
  }
  if (state.playerHands.some((h) => h.outcome !== 'bust')) {
    dealerTurn(state);
  } else {
    revealDealer(state);
  }
  settleRound(state);
}

export function dealerShouldDraw(cards: readonly Card[], standsOn = DEFAULT_RULES.dealerStandsOn): boolean {
  // no soft 17 distinction: a soft 17 stands like a hard one
  return handValue(cards) < standsOn;
}

function revealDealer(state: RoundState): void {
  emit(state, { type: 'dealerReveal', cards: state.dealer.slice(), value: handValue(state.dealer) });
}

function dealerTurn(state: RoundState): void {
  enter(state, 'DealerTurn');
  revealDealer(state);
  while (dealerShouldDraw(state.dealer, state.rules.dealerStandsOn)) {
    const card = dealToDealer(state, false);
    emit(state, { type: 'dealerDraw', card, value: handValue(state.dealer) });
  }
}

function settleRound(state: RoundState): void {
  enter(state, 'Settlement');
  const dealerValue = handValue(state.dealer);
  const hands: HandResult[] = state.playerHands.map((hand, i) => {
    const value = handValue(hand.cards);
    const outcome = hand.outcome ?? compareHands(value, dealerValue);
    hand.outcome = outcome;
    const delta = settle(outcome, hand.bet);
    state.balance += creditFor(outcome, hand.bet);
    emit(state, { type: 'handSettled', hand: i, outcome, bet: hand.bet, delta });
    return { outcome, bet: hand.bet, delta, value };
  });
  complete(state, hands, dealerValue);
}

function complete(state: RoundState, hands: HandResult[], dealerValue: number): void {
  enter(state, 'Complete');
  const net = roundNet(state);
  state.result = {
    hands,
    insurance: state.insuranceResult,
    dealerValue,
    net,
    balance: state.balance,
    cancelled: state.cancelled,
  };
  emit(state, { type: 'roundComplete', net, balance: state.balance, cancelled: state.cancelled });
  logger.debug('round complete', { net, balance: state.balance, cancelled: state.cancelled });
}

/**
 * Abandons the round. Stakes already taken from the balance stay taken;
 * nothing further is charged or paid.
 */
export function cancelRound(state: RoundState): void {
  if (state.phase === 'Complete') throw new RoundStateError(['Betting', 'InsuranceOffer', 'SplitOffer', 'PlayerTurn'], state.phase);
  state.cancelled = true;
  complete(state, [], handValue(state.dealer));
}
