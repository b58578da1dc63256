import { type RNG, cryptoRNG, shuffleInPlace } from '../../util/rng.js';
import type { Card, Rank, Suit } from './types.js';

export const RANKS: readonly Rank[] = ['A', 'K', 'Q', 'J', '10', '9', '8', '7', '6', '5', '4', '3', '2'];
export const SUITS: readonly Suit[] = ['S', 'H', 'D', 'C'];
export const DEFAULT_RESHUFFLE_THRESHOLD = 0.2;

export type ReshuffleReason = 'exhausted' | 'threshold';
export type ReshuffleListener = (reason: ReshuffleReason, size: number) => void;

export interface ShoeOptions {
  rng?: RNG;
  reshuffleThreshold?: number;
}

export function makeDecks(decks: number): Card[] {
  const cards: Card[] = [];
  for (let d = 0; d < decks; d++) {
    for (const s of SUITS) {
      for (const r of RANKS) {
        cards.push({ r, s });
      }
    }
  }
  return cards;
}

/**
 * The card supply shared by every round of a session.
 *
 * Cards are taken from the end of the internal array. A draw on an empty shoe
 * rebuilds it from `numDecks` fresh decks first, so callers never see it empty.
 */
export class Shoe {
  private cards: Card[] = [];
  private _capacity = 0;
  private _reshuffles = 0;
  private listener: ReshuffleListener | undefined;
  private readonly rng: RNG;
  readonly reshuffleThreshold: number;

  private constructor(readonly numDecks: number, opts: ShoeOptions = {}) {
    if (!Number.isInteger(numDecks) || numDecks < 1) throw new RangeError('numDecks must be a positive integer');
    this.rng = opts.rng ?? cryptoRNG;
    this.reshuffleThreshold = opts.reshuffleThreshold ?? DEFAULT_RESHUFFLE_THRESHOLD;
  }

  static create(numDecks: number, opts: ShoeOptions = {}): Shoe {
    const shoe = new Shoe(numDecks, opts);
    shoe.fill();
    return shoe;
  }

  /**
   * A shoe stacked with known cards, `cards[0]` drawn first. Once they run out
   * it behaves like any other shoe of `numDecks` decks.
   */
  static fromCards(cards: readonly Card[], opts: ShoeOptions & { numDecks?: number } = {}): Shoe {
    const shoe = new Shoe(opts.numDecks ?? 1, opts);
    shoe.cards = cards.slice().reverse();
    shoe._capacity = cards.length;
    return shoe;
  }

  get size(): number {
    return this.cards.length;
  }

  get capacity(): number {
    return this._capacity;
  }

  get reshuffles(): number {
    return this._reshuffles;
  }

  setReshuffleListener(listener: ReshuffleListener | undefined): void {
    this.listener = listener;
  }

  draw(): Card {
    if (this.cards.length === 0) this.reshuffle('exhausted');
    const card = this.cards.pop();
    if (!card) throw new Error('shoe is empty after reshuffle'); // unreachable with numDecks >= 1
    return card;
  }

  needsReshuffle(): boolean {
    return this.cards.length < this._capacity * this.reshuffleThreshold;
  }

  reshuffle(reason: ReshuffleReason = 'threshold'): void {
    this.fill();
    this._reshuffles++;
    this.listener?.(reason, this.cards.length);
  }

  private fill(): void {
    this.cards = shuffleInPlace(makeDecks(this.numDecks), this.rng);
    this._capacity = this.cards.length;
  }
}
