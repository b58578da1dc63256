import { describe, test, expect } from '@jest/globals';
import { RoundStateError } from '../../../utils/errors.js';
import {
  activeHand,
  applyAction,
  availableActions,
  cancelRound,
  createRound,
  dealerShouldDraw,
  dealerUpCard,
  pendingDecision,
  placeBet,
  roundNet,
  resolveInsurance,
  resolveSplit,
} from '../engine.js';
import type { RoundEvent } from '../types.js';
import { c, hand, stacked } from './helpers.js';

describe('betting', () => {
  test('rejects a bet of zero without changing state', () => {
    const s = createRound({ shoe: stacked('10', '9', '7', '8'), balance: 100 });
    const res = placeBet(s, 0);
    expect(res).toEqual({ ok: false, code: 'BET_NOT_POSITIVE', reason: 'Please enter a positive bet amount.' });
    expect(s.phase).toBe('Betting');
    expect(s.balance).toBe(100);
    expect(s.log).toEqual([]);
  });

  test('rejects a bet above the balance', () => {
    const s = createRound({ shoe: stacked('10', '9', '7', '8'), balance: 100 });
    const res = placeBet(s, 101);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.code).toBe('INSUFFICIENT_FUNDS');
    expect(s.phase).toBe('Betting');
  });

  test('rejects fractional bets', () => {
    const s = createRound({ shoe: stacked('10', '9', '7', '8'), balance: 100 });
    const res = placeBet(s, 2.5);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.code).toBe('BET_NOT_INTEGER');
  });

  test('deals player, dealer, player, dealer and deducts the stake', () => {
    const s = createRound({ shoe: stacked('10', '9', '7', '8'), balance: 100 });
    expect(placeBet(s, 10)).toEqual({ ok: true });
    expect(s.playerHands[0].cards).toEqual(hand('10', '7'));
    expect(s.dealer).toEqual(hand('9', '8'));
    expect(s.balance).toBe(90);
    expect(s.phase).toBe('PlayerTurn');
    expect(pendingDecision(s)).toBe('action');
  });
});

describe('immediate settlement', () => {
  test('player blackjack pays 3:2 and the dealer does not draw', () => {
    const s = createRound({ shoe: stacked('A', '9', 'K', '7'), balance: 100 });
    placeBet(s, 10);
    expect(s.phase).toBe('Complete');
    expect(s.balance).toBe(115);
    expect(s.result?.net).toBe(15);
    expect(s.result?.hands[0].outcome).toBe('blackjack');
    expect(s.dealer).toHaveLength(2);
  });

  test('blackjack on an odd bet truncates', () => {
    const s = createRound({ shoe: stacked('A', '9', 'K', '7'), balance: 100 });
    placeBet(s, 11);
    expect(s.result?.net).toBe(16);
    expect(s.balance).toBe(116);
  });

  test('dealer blackjack takes the bet', () => {
    const s = createRound({ shoe: stacked('10', 'K', '9', 'A'), balance: 100 });
    placeBet(s, 10);
    expect(s.phase).toBe('Complete');
    expect(s.result?.hands[0].outcome).toBe('lose');
    expect(s.balance).toBe(90);
  });

  test('both blackjack is a push', () => {
    const s = createRound({ shoe: stacked('A', 'K', 'Q', 'A'), balance: 100 });
    placeBet(s, 10);
    expect(s.result?.hands[0].outcome).toBe('push');
    expect(s.balance).toBe(100);
  });
});

describe('insurance', () => {
  test('is offered when the dealer shows an Ace', () => {
    const s = createRound({ shoe: stacked('10', 'A', '7', 'K'), balance: 100 });
    placeBet(s, 20);
    expect(s.phase).toBe('InsuranceOffer');
    expect(pendingDecision(s)).toBe('insurance');
  });

  test('pays 2x its stake against a dealer blackjack, main bet lost', () => {
    const s = createRound({ shoe: stacked('10', 'A', '7', 'K'), balance: 100 });
    placeBet(s, 20);
    resolveInsurance(s, true);
    expect(s.insuranceResult).toEqual({ outcome: 'insuranceWin', stake: 10, delta: 10 });
    expect(s.result?.hands[0]).toEqual({ outcome: 'lose', bet: 20, delta: -20, value: 17 });
    expect(s.balance).toBe(90);
    expect(s.result?.net).toBe(-10);
  });

  test('declined insurance against a dealer blackjack loses the main bet only', () => {
    const s = createRound({ shoe: stacked('10', 'A', '7', 'K'), balance: 100 });
    placeBet(s, 20);
    resolveInsurance(s, false);
    expect(s.balance).toBe(80);
    expect(s.insuranceResult).toBeUndefined();
  });

  test('with both holding blackjack the main bet pushes and insurance still pays', () => {
    const s = createRound({ shoe: stacked('A', 'A', 'K', 'K'), balance: 100 });
    placeBet(s, 20);
    resolveInsurance(s, true);
    expect(s.result?.hands[0].outcome).toBe('push');
    expect(s.balance).toBe(110);
  });

  test('is lost when the dealer has no blackjack and play continues', () => {
    const s = createRound({ shoe: stacked('10', 'A', '7', '5', '2'), balance: 100 });
    placeBet(s, 20);
    resolveInsurance(s, true);
    expect(s.balance).toBe(70);
    expect(s.insuranceResult?.outcome).toBe('insuranceLose');
    expect(s.phase).toBe('PlayerTurn');
    applyAction(s, 'stand');
    // dealer A,5 draws a 2 to 18 and beats 17
    expect(s.dealer).toHaveLength(3);
    expect(s.result?.hands[0].outcome).toBe('lose');
    expect(s.balance).toBe(70);
    expect(s.result?.net).toBe(-30);
  });

  test('is not offered when the balance cannot cover it', () => {
    const s = createRound({ shoe: stacked('10', 'A', '7', '5'), balance: 100 });
    placeBet(s, 100);
    expect(s.phase).toBe('PlayerTurn');
  });
});

describe('player turn', () => {
  test('stand on a tie is a push', () => {
    const s = createRound({ shoe: stacked('10', '10', '8', '8'), balance: 100 });
    placeBet(s, 10);
    applyAction(s, 'stand');
    expect(s.result?.hands[0].outcome).toBe('push');
    expect(s.balance).toBe(100);
  });

  test('dealer bust pays even money', () => {
    const s = createRound({ shoe: stacked('10', '10', '8', '6', '9'), balance: 100 });
    placeBet(s, 10);
    applyAction(s, 'stand');
    expect(s.dealer).toEqual(hand('10', '6', '9'));
    expect(s.result?.dealerValue).toBe(25);
    expect(s.balance).toBe(110);
  });

  test('a bust loses without a dealer turn', () => {
    const s = createRound({ shoe: stacked('10', '9', '6', '8', 'K'), balance: 100 });
    placeBet(s, 10);
    applyAction(s, 'hit');
    expect(s.playerHands[0].outcome).toBe('bust');
    expect(s.phase).toBe('Complete');
    expect(s.dealer).toHaveLength(2);
    expect(s.balance).toBe(90);
    expect(s.log.some((e) => e.type === 'dealerDraw')).toBe(false);
  });

  test('double down doubles the bet, takes one card and stands', () => {
    const s = createRound({ shoe: stacked('5', '10', '6', '7', '10'), balance: 100 });
    placeBet(s, 10);
    expect(availableActions(s)).toEqual(['hit', 'stand', 'double']);
    applyAction(s, 'double');
    const h = s.playerHands[0];
    expect(h.doubled).toBe(true);
    expect(h.bet).toBe(20);
    expect(h.cards).toHaveLength(3);
    expect(s.result?.hands[0]).toEqual({ outcome: 'win', bet: 20, delta: 20, value: 21 });
    expect(s.balance).toBe(120);
  });

  test('double down stands even when the card busts the hand', () => {
    const s = createRound({ shoe: stacked('10', '10', '6', '7', '9'), balance: 100 });
    placeBet(s, 10);
    applyAction(s, 'double');
    expect(s.playerHands[0].cards).toHaveLength(3);
    expect(s.playerHands[0].outcome).toBe('bust');
    expect(s.phase).toBe('Complete');
    expect(s.balance).toBe(80);
  });

  test('double is unavailable after a hit', () => {
    const s = createRound({ shoe: stacked('2', '10', '3', '7', '4'), balance: 100 });
    placeBet(s, 10);
    applyAction(s, 'hit');
    expect(availableActions(s)).toEqual(['hit', 'stand']);
    const res = applyAction(s, 'double');
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.code).toBe('ACTION_UNAVAILABLE');
    expect(s.playerHands[0].cards).toHaveLength(3);
  });

  test('double is unavailable without funds for a second stake', () => {
    const s = createRound({ shoe: stacked('5', '10', '6', '7'), balance: 100 });
    placeBet(s, 100);
    expect(availableActions(s)).toEqual(['hit', 'stand']);
  });

  test('the player may keep hitting at 21', () => {
    const s = createRound({ shoe: stacked('10', '10', '5', '7', '6'), balance: 100 });
    placeBet(s, 10);
    applyAction(s, 'hit');
    expect(s.phase).toBe('PlayerTurn');
    expect(availableActions(s)).toEqual(['hit', 'stand']);
  });
});

describe('split', () => {
  test('a pair of eights splits into two hands sharing one dealer turn', () => {
    const s = createRound({ shoe: stacked('8', '10', '8', '9', '3', '10', 'K'), balance: 100 });
    placeBet(s, 10);
    expect(s.phase).toBe('SplitOffer');
    resolveSplit(s, true);
    expect(s.balance).toBe(80);
    expect(s.playerHands.map((h) => h.cards)).toEqual([hand('8', '3'), hand('8', '10')]);
    expect(s.playerHands.map((h) => h.bet)).toEqual([10, 10]);

    applyAction(s, 'hit'); // 8,3,K = 21
    applyAction(s, 'stand');
    expect(s.activeIndex).toBe(1);
    applyAction(s, 'stand');

    expect(s.result?.dealerValue).toBe(19);
    expect(s.result?.hands.map((h) => h.outcome)).toEqual(['win', 'lose']);
    expect(s.balance).toBe(100);
    expect(s.log.filter((e) => e.type === 'dealerReveal')).toHaveLength(1);
  });

  test('21 on two cards after a split pays even money', () => {
    const s = createRound({ shoe: stacked('A', '10', 'A', '9', 'K', '5'), balance: 100 });
    placeBet(s, 10);
    resolveSplit(s, true);
    applyAction(s, 'stand');
    applyAction(s, 'stand');
    expect(s.result?.hands[0]).toEqual({ outcome: 'win', bet: 10, delta: 10, value: 21 });
    expect(s.result?.hands[1].outcome).toBe('lose');
    expect(s.balance).toBe(100);
  });

  test('declining keeps the original hand', () => {
    const s = createRound({ shoe: stacked('8', '10', '8', '9'), balance: 100 });
    placeBet(s, 10);
    resolveSplit(s, false);
    expect(s.phase).toBe('PlayerTurn');
    expect(s.playerHands).toHaveLength(1);
    expect(s.balance).toBe(90);
  });

  test('is not offered for different ranks of equal value', () => {
    const s = createRound({ shoe: stacked('K', '10', 'Q', '7'), balance: 100 });
    placeBet(s, 10);
    expect(s.phase).toBe('PlayerTurn');
  });

  test('is not offered without funds for the second hand', () => {
    const s = createRound({ shoe: stacked('8', '10', '8', '7'), balance: 100 });
    placeBet(s, 60);
    expect(s.phase).toBe('PlayerTurn');
  });

  test('dealer skips the turn when both split hands bust', () => {
    const s = createRound({ shoe: stacked('8', '10', '8', '6', '6', '6', 'K', 'K'), balance: 100 });
    placeBet(s, 10);
    resolveSplit(s, true);
    applyAction(s, 'hit'); // 8,6,K
    applyAction(s, 'hit'); // 8,6,K
    expect(s.playerHands.map((h) => h.outcome)).toEqual(['bust', 'bust']);
    expect(s.dealer).toHaveLength(2);
    expect(s.balance).toBe(80);
  });
});

describe('dealer policy', () => {
  test('draws on 16 and stands on 17', () => {
    expect(dealerShouldDraw(hand('10', '6'))).toBe(true);
    expect(dealerShouldDraw(hand('10', '7'))).toBe(false);
    expect(dealerShouldDraw(hand('A', '6'))).toBe(false); // soft 17 stands too
  });

  test('dealer at 16 takes exactly one card', () => {
    const s = createRound({ shoe: stacked('10', '10', '9', '6', '5', '5'), balance: 100 });
    placeBet(s, 10);
    applyAction(s, 'stand');
    expect(s.dealer).toEqual(hand('10', '6', '5'));
  });

  test('dealer at 17 takes none', () => {
    const s = createRound({ shoe: stacked('10', '10', '9', '7', '5'), balance: 100 });
    placeBet(s, 10);
    applyAction(s, 'stand');
    expect(s.dealer).toEqual(hand('10', '7'));
    expect(s.result?.hands[0].outcome).toBe('win');
  });

  test('dealerStandsOn is configurable per round', () => {
    const s = createRound({ shoe: stacked('10', '10', '9', '7', '2'), balance: 100, rules: { dealerStandsOn: 18 } });
    placeBet(s, 10);
    applyAction(s, 'stand');
    expect(s.dealer).toEqual(hand('10', '7', '2'));
  });
});

describe('round lifecycle', () => {
  test('exposes the up card and the hand being played', () => {
    const s = createRound({ shoe: stacked('10', '9', '7', '8'), balance: 100 });
    expect(dealerUpCard(s)).toBeUndefined();
    expect(activeHand(s)).toBeUndefined();
    placeBet(s, 10);
    expect(dealerUpCard(s)).toEqual(c('9'));
    expect(activeHand(s)?.cards).toEqual(hand('10', '7'));
    expect(roundNet(s)).toBe(-10);
    applyAction(s, 'stand');
    expect(activeHand(s)).toBeUndefined();
    expect(pendingDecision(s)).toBe('none');
  });

  test('cancel keeps stakes already taken', () => {
    const s = createRound({ shoe: stacked('10', '9', '7', '8'), balance: 100 });
    placeBet(s, 10);
    cancelRound(s);
    expect(s.phase).toBe('Complete');
    expect(s.cancelled).toBe(true);
    expect(s.balance).toBe(90);
    expect(s.result?.net).toBe(-10);
  });

  test('transitions called out of order throw RoundStateError', () => {
    const s = createRound({ shoe: stacked('10', '9', '7', '8'), balance: 100 });
    expect(() => resolveInsurance(s, true)).toThrow(RoundStateError);
    expect(() => applyAction(s, 'hit')).toThrow(RoundStateError);
    placeBet(s, 10);
    expect(() => placeBet(s, 10)).toThrow(RoundStateError);
  });

  test('listener sees every logged event, ending with roundComplete', () => {
    const seen: RoundEvent[] = [];
    const s = createRound({ shoe: stacked('A', '9', 'K', '7'), balance: 100, listener: (e) => seen.push(e) });
    placeBet(s, 10);
    expect(seen).toEqual(s.log);
    expect(seen[seen.length - 1]).toEqual({ type: 'roundComplete', net: 15, balance: 115, cancelled: false });
    expect(seen.filter((e) => e.type === 'cardDealt')).toHaveLength(4);
  });
});
