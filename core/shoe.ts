import { RESHUFFLE_THRESHOLD } from "./config";
import { InvariantError } from "./errors";
import { randomIndex } from "./rng";
import type { RNG } from "./rng";
import type { Card, CardSource, Rank, Suit } from "./types";

export const RANKS: Rank[] = ["2", "3", "4", "5", "6", "7", "8", "9", "10", "J", "Q", "K", "A"];
export const SUITS: Suit[] = ["♠", "♥", "♦", "♣"];

export function buildDeck(): Card[] {
  const deck: Card[] = [];
  for (const rank of RANKS) {
    for (const suit of SUITS) {
      deck.push({ rank, suit });
    }
  }
  return deck;
}

/**
 * Several decks shuffled together. Cards are dealt from the end of the pool.
 *
 * `draw()` checks the pool before serving: with fewer than
 * {@link RESHUFFLE_THRESHOLD} cards left it rebuilds all `numDecks` decks and
 * reshuffles, so a draw never fails. Use `setShuffleCallback` to observe when
 * that happens.
 */
export class Shoe implements CardSource {
  private cards: Card[] = [];
  private shuffles = 0;
  private readonly numDecks: number;
  private readonly rng: RNG;
  private onShuffle?: () => void;

  constructor(numDecks: number, rng: RNG, onShuffle?: () => void) {
    this.numDecks = numDecks;
    this.rng = rng;
    this.onShuffle = onShuffle;
    this.shuffle();
  }

  setShuffleCallback(cb: (() => void) | undefined) {
    this.onShuffle = cb;
  }

  get size(): number {
    return 52 * this.numDecks;
  }

  get shuffleCount(): number {
    return this.shuffles;
  }

  private shuffle() {
    this.cards = [];
    for (let d = 0; d < this.numDecks; d += 1) {
      this.cards.push(...buildDeck());
    }
    for (let i = this.cards.length - 1; i > 0; i -= 1) {
      const j = randomIndex(this.rng, i + 1);
      [this.cards[i], this.cards[j]] = [this.cards[j], this.cards[i]];
    }
    this.shuffles += 1;
    if (this.onShuffle) {
      this.onShuffle();
    }
  }

  draw(): Card {
    if (this.cards.length < RESHUFFLE_THRESHOLD) {
      this.shuffle();
    }
    const card = this.cards.pop();
    if (card === undefined) {
      throw new InvariantError("Shoe is empty after reshuffle");
    }
    return card;
  }

  remaining(): number {
    return this.cards.length;
  }
}
