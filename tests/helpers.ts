import type { Card, CardSource, Rank, Suit, TrialConfig } from "../core";

export const card = (rank: Rank, suit: Suit = "♠"): Card => ({ rank, suit });

export const cards = (ranks: Rank[]): Card[] => ranks.map((rank) => card(rank));

/** Deals a fixed card list in order and fails loudly when it runs out. */
export class ScriptedShoe implements CardSource {
  drawn = 0;
  constructor(private readonly cards: Card[]) {}

  draw(): Card {
    const next = this.cards[this.drawn];
    if (next === undefined) {
      throw new Error("Out of cards");
    }
    this.drawn += 1;
    return next;
  }
}

export const makeShoe = (ranks: Rank[]): ScriptedShoe => new ScriptedShoe(cards(ranks));

export const baseConfig: TrialConfig = {
  startBankroll: 100,
  baseBet: 10,
  multiplier: 2,
  numDecks: 6,
  numPlayers: 1,
  numHands: 50,
  dealerHitsSoft17: false,
  seed: 7,
};
