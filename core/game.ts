import { BLACKJACK_PAYOUT, DEALER_STAND_TOTAL, PLAYER_STAND_TOTAL } from "./config";
import { addCard, createHand, handValue, isBlackjack, isBust, isSoft17, renderHand } from "./hand";
import type { CardSource, Hand, HandOutcome, HandResultTag, TableRules } from "./types";

function dealerShouldHit(hand: Hand, rules: TableRules): boolean {
  const total = handValue(hand);
  if (total < DEALER_STAND_TOTAL) return true;
  if (total === DEALER_STAND_TOTAL && rules.dealerHitsSoft17 && isSoft17(hand)) {
    return true;
  }
  return false;
}

function snapshot(player: Hand, dealer: Hand): HandOutcome["snapshot"] {
  return {
    playerHand: renderHand(player),
    dealerHand: renderHand(dealer),
    playerValue: handValue(player),
    dealerValue: handValue(dealer),
  };
}

function settle(result: HandResultTag, payout: number, player: Hand, dealer: Hand): HandOutcome {
  return { result, payout, snapshot: snapshot(player, dealer) };
}

function compareTotals(player: Hand, dealer: Hand, bet: number): HandOutcome {
  const playerTotal = handValue(player);
  const dealerTotal = handValue(dealer);
  if (isBust(dealer)) {
    return settle("win", bet, player, dealer);
  }
  if (playerTotal > dealerTotal) {
    return settle("win", bet, player, dealer);
  }
  if (playerTotal < dealerTotal) {
    return settle("lose", 0, player, dealer);
  }
  return settle("push", 0, player, dealer);
}

/**
 * Plays one hand for the tracked seat against the dealer.
 *
 * Cards come off `source` as dealer, dealer, player, player and then two for
 * every other seat. Those seats are never played out, but their cards still
 * leave the shoe, which moves reshuffle timing for everyone after them.
 */
export function playHand(source: CardSource, rules: TableRules): HandOutcome {
  const { bet } = rules;
  const dealer = createHand();
  const player = createHand();

  addCard(dealer, source.draw());
  addCard(dealer, source.draw());
  addCard(player, source.draw());
  addCard(player, source.draw());
  for (let seat = 1; seat < rules.numPlayers; seat += 1) {
    source.draw();
    source.draw();
  }

  const playerBlackjack = isBlackjack(player);
  const dealerBlackjack = isBlackjack(dealer);
  if (playerBlackjack && !dealerBlackjack) {
    return settle("win", bet * BLACKJACK_PAYOUT, player, dealer);
  }
  if (dealerBlackjack && !playerBlackjack) {
    return settle("lose", 0, player, dealer);
  }
  if (playerBlackjack && dealerBlackjack) {
    return settle("push", 0, player, dealer);
  }

  while (handValue(player) < PLAYER_STAND_TOTAL) {
    addCard(player, source.draw());
  }
  if (isBust(player)) {
    return settle("lose", 0, player, dealer);
  }

  while (dealerShouldHit(dealer, rules)) {
    addCard(dealer, source.draw());
  }

  return compareTotals(player, dealer, bet);
}
