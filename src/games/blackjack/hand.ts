import type { Card, Rank } from './types.js';

export const BLACKJACK = 21;

export function valueOfCard(r: Rank): number {
  if (r === 'A') return 11; // can be 1 later
  if (r === 'K' || r === 'Q' || r === 'J' || r === '10') return 10;
  return parseInt(r, 10);
}

export function handTotal(cards: readonly Card[]): { total: number; soft: boolean } {
  let total = 0;
  let aces = 0;
  for (const c of cards) {
    total += valueOfCard(c.r);
    if (c.r === 'A') aces++;
  }
  while (total > BLACKJACK && aces > 0) {
    total -= 10; // count one Ace as 1 instead of 11
    aces--;
  }
  // aces left over are still counted as 11
  return { total, soft: aces > 0 };
}

export function handValue(cards: readonly Card[]): number {
  return handTotal(cards).total;
}

export function isBlackjack(cards: readonly Card[]): boolean {
  return cards.length === 2 && handValue(cards) === BLACKJACK;
}

export function isBust(cards: readonly Card[]): boolean {
  return handValue(cards) > BLACKJACK;
}

/** Same rank, not merely same value: K+Q is not a pair. */
export function isPair(cards: readonly Card[]): boolean {
  return cards.length === 2 && cards[0].r === cards[1].r;
}
