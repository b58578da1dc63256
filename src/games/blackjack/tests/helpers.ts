import { seededRNG } from '../../../util/rng.js';
import { Shoe } from '../shoe.js';
import type { Card, Rank, Suit } from '../types.js';

export const c = (r: Rank, s: Suit = 'S'): Card => ({ r, s });

export const hand = (...ranks: Rank[]): Card[] => ranks.map((r) => c(r));

/**
 * Deal order for a round is player, dealer (up), player, dealer (hole),
 * then whatever the round draws next.
 */
export function stacked(...ranks: Rank[]): Shoe {
  return Shoe.fromCards(hand(...ranks), { rng: seededRNG(1) });
}
