import type { Shoe } from './shoe.js';

export type Suit = 'S' | 'H' | 'D' | 'C';
export type Rank = 'A' | 'K' | 'Q' | 'J' | '10' | '9' | '8' | '7' | '6' | '5' | '4' | '3' | '2';
export interface Card { readonly r: Rank; readonly s: Suit }

export type HandOutcome = 'blackjack' | 'win' | 'push' | 'lose' | 'bust';
export type InsuranceOutcome = 'insuranceWin' | 'insuranceLose';
export type Outcome = HandOutcome | InsuranceOutcome;

export type PlayerAction = 'hit' | 'stand' | 'double';

export interface HandState {
  cards: Card[];
  bet: number;
  doubled: boolean;
  fromSplit: boolean;
  done: boolean;
  outcome?: HandOutcome;
}

export type Phase =
  | 'Betting'
  | 'InitialDeal'
  | 'InsuranceOffer'
  | 'ImmediateSettlement'
  | 'SplitOffer'
  | 'PlayerTurn'
  | 'DealerTurn'
  | 'Settlement'
  | 'Complete';

export interface TableRules {
  dealerStandsOn: number;
}

export type RoundEvent =
  | { type: 'betPlaced'; amount: number; balance: number }
  | { type: 'cardDealt'; to: 'player' | 'dealer'; hand: number; card: Card; faceDown: boolean }
  | { type: 'handValue'; hand: number; value: number; soft: boolean }
  | { type: 'insuranceOffered'; stake: number }
  | { type: 'insuranceTaken'; stake: number; balance: number }
  | { type: 'insuranceDeclined' }
  | { type: 'insuranceSettled'; outcome: InsuranceOutcome; stake: number; delta: number }
  | { type: 'splitOffered' }
  | { type: 'split'; bet: number; balance: number; heads: [Card, Card] }
  | { type: 'doubled'; hand: number; bet: number; balance: number }
  | { type: 'bust'; hand: number; value: number }
  | { type: 'dealerReveal'; cards: Card[]; value: number }
  | { type: 'dealerDraw'; card: Card; value: number }
  | { type: 'handSettled'; hand: number; outcome: HandOutcome; bet: number; delta: number }
  | { type: 'roundComplete'; net: number; balance: number; cancelled: boolean };

export type RoundListener = (event: RoundEvent) => void;

export interface RoundState {
  phase: Phase;
  shoe: Shoe;
  dealer: Card[];
  playerHands: HandState[];
  activeIndex: number; // which player hand is active
  bet: number; // original main bet
  insurance: number; // 0 when not taken
  balance: number;
  startingBalance: number;
  rules: TableRules;
  log: RoundEvent[];
  cancelled: boolean;
  insuranceResult?: InsuranceResult;
  result?: RoundResult;
  listener?: RoundListener;
}

export interface InsuranceResult {
  outcome: InsuranceOutcome;
  stake: number;
  delta: number;
}

export interface HandResult {
  outcome: HandOutcome;
  bet: number;
  delta: number;
  value: number;
}

export interface RoundResult {
  hands: HandResult[];
  insurance?: InsuranceResult;
  dealerValue: number;
  net: number;
  balance: number;
  cancelled: boolean;
}
