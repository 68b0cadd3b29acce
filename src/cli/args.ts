import { parseArgs } from "node:util";
import { DEFAULT_ITERATIONS, DEFAULT_TRIAL_CONFIG } from "../../core";
import type { ShoePolicy, TrialConfig } from "../../core";

export interface CliOptions {
  config: TrialConfig;
  iterations: number;
  shoePolicy: ShoePolicy;
  showLedger: boolean;
  help: boolean;
}

export const USAGE = `Usage: martingale-sim [options]

Options:
  --bankroll <n>     Starting bankroll (default ${DEFAULT_TRIAL_CONFIG.startBankroll})
  --base-bet <n>     Base bet (default ${DEFAULT_TRIAL_CONFIG.baseBet})
  --multiplier <n>   Bet multiplier after a loss (default ${DEFAULT_TRIAL_CONFIG.multiplier})
  --decks <n>        Number of decks, 1-8 (default ${DEFAULT_TRIAL_CONFIG.numDecks})
  --players <n>      Seats at the table (default ${DEFAULT_TRIAL_CONFIG.numPlayers})
  --hands <n>        Hands per trial (default ${DEFAULT_TRIAL_CONFIG.numHands})
  --h17              Dealer hits soft 17
  --iterations <n>   Monte Carlo trials (default ${DEFAULT_ITERATIONS})
  --seed <n>         Random seed (default ${DEFAULT_TRIAL_CONFIG.seed})
  --shared-shoe      Keep one shoe across all trials (needs --iterations > 1)
  --ledger           Print the hand history of a single run
  -h, --help         Show this message`;

function numberOption(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : Number(value);
}

/** Converts raw arguments; range checks are left to the core validators. */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      bankroll: { type: "string" },
      "base-bet": { type: "string" },
      multiplier: { type: "string" },
      decks: { type: "string" },
      players: { type: "string" },
      hands: { type: "string" },
      h17: { type: "boolean", default: false },
      iterations: { type: "string" },
      seed: { type: "string" },
      "shared-shoe": { type: "boolean", default: false },
      ledger: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const defaults = DEFAULT_TRIAL_CONFIG;
  return {
    config: {
      startBankroll: numberOption(values.bankroll, defaults.startBankroll),
      baseBet: numberOption(values["base-bet"], defaults.baseBet),
      multiplier: numberOption(values.multiplier, defaults.multiplier),
      numDecks: numberOption(values.decks, defaults.numDecks),
      numPlayers: numberOption(values.players, defaults.numPlayers),
      numHands: numberOption(values.hands, defaults.numHands),
      dealerHitsSoft17: values.h17 === true,
      seed: numberOption(values.seed, defaults.seed),
    },
    iterations: numberOption(values.iterations, DEFAULT_ITERATIONS),
    shoePolicy: values["shared-shoe"] === true ? "shared" : "fresh",
    showLedger: values.ledger === true,
    help: values.help === true,
  };
}
