import type { HandOutcome, Outcome } from './types.js';

/**
 * Net balance change for one settled stake, measured against the balance
 * before the stake was placed.
 *
 * Blackjack pays 3:2 truncated toward zero, so a bet of 11 wins 16.
 * Insurance pays 2x its stake back, a net gain of one stake.
 */
export function settle(outcome: Outcome, bet: number): number {
  switch (outcome) {
    case 'blackjack':
      return Math.trunc(bet * 1.5);
    case 'win':
    case 'insuranceWin':
      return bet;
    case 'push':
      return 0;
    case 'lose':
    case 'bust':
    case 'insuranceLose':
      return -bet;
  }
}

// What goes back to the balance for a stake that was deducted when placed
export function creditFor(outcome: Outcome, bet: number): number {
  return Math.max(0, bet + settle(outcome, bet));
}

export function insuranceStake(bet: number): number {
  return Math.floor(bet / 2);
}

export function compareHands(playerValue: number, dealerValue: number): Exclude<HandOutcome, 'blackjack'> {
  if (playerValue > 21) return 'bust';
  if (dealerValue > 21) return 'win';
  if (playerValue > dealerValue) return 'win';
  if (playerValue < dealerValue) return 'lose';
  return 'push';
}
