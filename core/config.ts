import { z } from "zod";
import { ConfigValidationError } from "./errors";
import type { MonteCarloOptions, ShoePolicy, TrialConfig } from "./types";

export const DEFAULT_TRIAL_CONFIG: TrialConfig = {
  startBankroll: 6000,
  baseBet: 25,
  multiplier: 2,
  numDecks: 6,
  numPlayers: 3,
  numHands: 200,
  dealerHitsSoft17: false,
  seed: 42,
};

export const DEFAULT_ITERATIONS = 1;
export const TRAJECTORY_SAMPLE_SIZE = 10;

// A draw with fewer cards than this left rebuilds the shoe first.
export const RESHUFFLE_THRESHOLD = 15;
export const MIN_DECKS = 1;
export const MAX_DECKS = 8;

// Seeds feed a 32-bit generator; anything wider would wrap onto another seed.
export const MAX_SEED = 0xffffffff;

export const BLACKJACK_PAYOUT = 1.5;
export const PLAYER_STAND_TOTAL = 17;
export const DEALER_STAND_TOTAL = 17;

export const trialConfigSchema = z.object({
  startBankroll: z.number().finite().positive(),
  baseBet: z.number().finite().positive(),
  multiplier: z.number().finite().min(1),
  numDecks: z.number().int().min(MIN_DECKS).max(MAX_DECKS),
  numPlayers: z.number().int().min(1),
  numHands: z.number().int().positive(),
  dealerHitsSoft17: z.boolean(),
  seed: z.number().int().min(0).max(MAX_SEED),
});

export const shoePolicySchema = z.enum(["fresh", "shared"]);

export const monteCarloOptionsSchema = z
  .object({
    numIterations: z.number().int().min(1),
    baseSeed: z.number().int().min(0).max(MAX_SEED),
    shoePolicy: shoePolicySchema.default("fresh"),
    sampleSize: z.number().int().min(TRAJECTORY_SAMPLE_SIZE).default(TRAJECTORY_SAMPLE_SIZE),
  })
  .superRefine((options, ctx) => {
    const lastSeed = options.baseSeed + options.numIterations - 1;
    if (lastSeed > MAX_SEED) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["baseSeed"],
        message: `Trial seeds run up to ${lastSeed}, above ${MAX_SEED}`,
      });
    }
  });

export interface ResolvedMonteCarloOptions {
  numIterations: number;
  baseSeed: number;
  shoePolicy: ShoePolicy;
  sampleSize: number;
}

export function validateTrialConfig(input: unknown): TrialConfig {
  const parsed = trialConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigValidationError.fromZodIssues(parsed.error.issues);
  }
  return parsed.data;
}

export function validateMonteCarloOptions(
  numIterations: number,
  baseSeed: number,
  options: MonteCarloOptions = {}
): ResolvedMonteCarloOptions {
  const parsed = monteCarloOptionsSchema.safeParse({ ...options, numIterations, baseSeed });
  if (!parsed.success) {
    throw ConfigValidationError.fromZodIssues(parsed.error.issues);
  }
  return parsed.data;
}
