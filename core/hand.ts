import type { Card, Hand } from "./types";

export function createHand(cards: Card[] = []): Hand {
  return { cards: [...cards] };
}

export function addCard(hand: Hand, card: Card): void {
  hand.cards.push(card);
}

export function cardValue(card: Card): number {
  if (card.rank === "A") return 11;
  if (card.rank === "K" || card.rank === "Q" || card.rank === "J" || card.rank === "10") {
    return 10;
  }
  return Number(card.rank);
}

function hardTotal(hand: Hand): { total: number; aces: number } {
  let total = 0;
  let aces = 0;
  for (const card of hand.cards) {
    total += cardValue(card);
    if (card.rank === "A") aces += 1;
  }
  return { total, aces };
}

/**
 * Best blackjack total. Aces start at 11 and are dropped to 1 one at a time
 * while the hand is over 21, so the result is either at most 21 or the
 * all-aces-as-one total.
 */
export function handValue(hand: Hand): number {
  let { total, aces } = hardTotal(hand);
  while (total > 21 && aces > 0) {
    total -= 10;
    aces -= 1;
  }
  return total;
}

export function isBlackjack(hand: Hand): boolean {
  return hand.cards.length === 2 && handValue(hand) === 21;
}

export function isBust(hand: Hand): boolean {
  return handValue(hand) > 21;
}

// Uses the unreduced total: A-A-5 counts 27 here, not soft 17.
export function isSoft17(hand: Hand): boolean {
  const { total, aces } = hardTotal(hand);
  return aces > 0 && total === 17;
}

export function renderCard(card: Card): string {
  return `${card.rank}${card.suit}`;
}

export function renderHand(hand: Hand): string {
  return hand.cards.map(renderCard).join(" ");
}
