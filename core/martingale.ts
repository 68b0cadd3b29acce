import { validateTrialConfig } from "./config";
import { InvariantError } from "./errors";
import { playHand } from "./game";
import { createRng } from "./rng";
import { Shoe } from "./shoe";
import type { CardSource, HandOutcome, LedgerEntry, TrialConfig, TrialSummary } from "./types";

export function betForStreak(baseBet: number, multiplier: number, streak: number): number {
  return baseBet * multiplier ** streak;
}

interface Settlement {
  bankroll: number;
  streak: number;
}

function settleBet(outcome: HandOutcome, bet: number, bankroll: number, streak: number): Settlement {
  const result = outcome.result;
  switch (result) {
    case "win":
      return { bankroll: bankroll + outcome.payout, streak: 0 };
    case "push":
      return { bankroll, streak };
    case "lose":
      return { bankroll: bankroll - bet, streak: streak + 1 };
    default: {
      const unknown: never = result;
      throw new InvariantError(`Unknown hand result: ${String(unknown)}`);
    }
  }
}

/**
 * Runs the betting progression for one trial against `source`.
 *
 * Stops early on a BUST row (the next bet is larger than the bankroll) or
 * once the bankroll drops to zero or below. `config` is trusted as valid.
 */
export function playMartingale(config: TrialConfig, source: CardSource): LedgerEntry[] {
  const ledger: LedgerEntry[] = [];
  let bankroll = config.startBankroll;
  let streak = 0;

  for (let hand = 1; hand <= config.numHands; hand += 1) {
    const bet = betForStreak(config.baseBet, config.multiplier, streak);

    if (bet > bankroll) {
      ledger.push({
        hand,
        result: "BUST",
        playerHand: "",
        dealerHand: "",
        playerValue: null,
        dealerValue: null,
        bet,
        bankroll,
        profit: bankroll - config.startBankroll,
        streakLosses: streak,
      });
      break;
    }

    const outcome = playHand(source, {
      bet,
      numPlayers: config.numPlayers,
      dealerHitsSoft17: config.dealerHitsSoft17,
    });
    ({ bankroll, streak } = settleBet(outcome, bet, bankroll, streak));

    ledger.push({
      hand,
      result: outcome.result,
      playerHand: outcome.snapshot.playerHand,
      dealerHand: outcome.snapshot.dealerHand,
      playerValue: outcome.snapshot.playerValue,
      dealerValue: outcome.snapshot.dealerValue,
      bet,
      bankroll,
      profit: bankroll - config.startBankroll,
      streakLosses: streak,
    });

    if (bankroll <= 0) {
      break;
    }
  }

  return ledger;
}

export function runTrial(config: TrialConfig): LedgerEntry[] {
  const valid = validateTrialConfig(config);
  const shoe = new Shoe(valid.numDecks, createRng(valid.seed));
  return playMartingale(valid, shoe);
}

export function summarizeTrial(ledger: LedgerEntry[], trial: number): TrialSummary {
  const last = ledger[ledger.length - 1];
  if (last === undefined) {
    throw new InvariantError(`Trial ${trial} produced an empty ledger`);
  }
  const bust = ledger.some((entry) => entry.result === "BUST");
  const profit = last.profit;
  return {
    trial,
    bust,
    finalBankroll: last.bankroll,
    profit,
    handsPlayed: ledger.length,
    maxLossStreak: ledger.reduce((max, entry) => Math.max(max, entry.streakLosses), 0),
    won: !bust && profit >= 0,
  };
}
