import type { OutputSink, SessionEvent } from '../games/blackjack/session.js';
import type { Card, HandOutcome, Suit } from '../games/blackjack/types.js';
import { getPalette, type Palette } from './theme.js';

const SUIT_SYMBOL: Record<Suit, string> = { S: '♠', H: '♥', D: '♦', C: '♣' };

export const ROCK = 'rocks';

export function formatCard(card: Card, palette?: Palette): string {
  const text = `${card.r}${SUIT_SYMBOL[card.s]}`;
  const red = card.s === 'H' || card.s === 'D';
  return red && palette ? palette.red(text) : text;
}

export function formatCards(cards: readonly Card[], palette?: Palette): string {
  return cards.map((c) => formatCard(c, palette)).join(' ');
}

export function deltaBadge(n: number): string {
  const sign = n >= 0 ? '+' : '−';
  return `${sign}${Math.abs(n)} ${ROCK}`;
}

const OUTCOME_LABEL: Record<HandOutcome, string> = {
  blackjack: 'Blackjack! Pays 3:2',
  win: 'You win',
  push: 'Push, bet returned',
  lose: 'Dealer wins',
  bust: 'Bust',
};

/**
 * Turns engine and session events into terminal lines. Keeps just enough
 * table state (cards per hand) to print whole hands.
 */
export class TerminalRenderer implements OutputSink {
  private hands: Card[][] = [];
  private dealerDealt = 0;

  constructor(
    private readonly write: (line: string) => void = (line) => console.log(line),
    private readonly palette: Palette = getPalette(),
  ) {}

  emit(event: SessionEvent): void {
    const line = this.describe(event);
    if (line !== undefined) this.write(line);
  }

  describe(event: SessionEvent): string | undefined {
    const p = this.palette;
    switch (event.type) {
      case 'roundStarted':
        this.hands = [];
        this.dealerDealt = 0;
        return p.bold(`\n--- Round ${event.round} --- You have ${event.balance} ${ROCK}.`);
      case 'betPlaced':
        return `Bet ${event.amount} ${ROCK}. ${event.balance} left.`;
      case 'cardDealt':
        if (event.to === 'dealer') {
          this.dealerDealt++;
          if (this.dealerDealt === 1) return `Dealer showing: ${formatCard(event.card, p)}`;
          return undefined;
        }
        if (!this.hands[event.hand]) this.hands[event.hand] = [];
        this.hands[event.hand].push(event.card);
        return undefined;
      case 'handValue': {
        const cards = this.hands[event.hand] ?? [];
        const label = this.hands.length > 1 ? `Hand ${event.hand + 1}` : 'Your hand';
        const value = event.soft ? `soft ${event.value}` : String(event.value);
        return `${label}: ${formatCards(cards, p)} (${value})`;
      }
      case 'insuranceOffered':
        return p.info(`Dealer is showing an Ace. Insurance costs ${event.stake} ${ROCK}.`);
      case 'insuranceTaken':
        return `Insurance bet placed: ${event.stake} ${ROCK}.`;
      case 'insuranceDeclined':
        return 'No insurance taken.';
      case 'insuranceSettled':
        return event.outcome === 'insuranceWin'
          ? p.success(`Dealer has Blackjack! Insurance pays ${event.stake * 2} ${ROCK}.`)
          : p.warn("Dealer doesn't have Blackjack. Insurance lost.");
      case 'splitOffered':
        return p.info('You have a pair. You may split it.');
      case 'split':
        this.hands = [[event.heads[0]], [event.heads[1]]];
        return `Split! Another ${event.bet} ${ROCK} on the second hand.`;
      case 'doubled':
        return `Doubling down! Bet is now ${event.bet} ${ROCK}.`;
      case 'bust':
        return p.error(`Bust with ${event.value}!`);
      case 'dealerReveal':
        return `Dealer's hand: ${formatCards(event.cards, p)} (${event.value})`;
      case 'dealerDraw':
        return `Dealer draws ${formatCard(event.card, p)} (${event.value})`;
      case 'handSettled': {
        const head = this.hands.length > 1 ? `Hand ${event.hand + 1}: ` : '';
        const text = `${head}${OUTCOME_LABEL[event.outcome]} (${deltaBadge(event.delta)})`;
        return event.delta > 0 ? p.success(text) : event.delta < 0 ? p.error(text) : text;
      }
      case 'roundComplete':
        if (event.cancelled) return p.warn(`Round abandoned. You have ${event.balance} ${ROCK}.`);
        return p.bold(`Net ${deltaBadge(event.net)}. You have ${event.balance} ${ROCK}.`);
      case 'shoeReshuffled':
        return p.dim(
          event.reason === 'threshold'
            ? `Shoe is getting low. Reshuffled ${event.size} cards.`
            : `Shoe ran out. A fresh ${event.size}-card shoe was shuffled.`,
        );
      case 'balanceToppedUp':
        return p.warn(`You're out of ${ROCK}! Here's ${event.balance} more to keep playing.`);
      case 'rejected':
        return p.warn(event.reason);
      case 'sessionEnded':
        return p.bold(`Thanks for playing! You finished with ${event.balance} ${ROCK}.`);
    }
  }
}
