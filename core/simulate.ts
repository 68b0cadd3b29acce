import { validateMonteCarloOptions, validateTrialConfig } from "./config";
import { playMartingale, summarizeTrial } from "./martingale";
import { createRng } from "./rng";
import { Shoe } from "./shoe";
import {
  buildHistogram,
  confidenceInterval,
  createRunningStats,
  histogramBinCount,
  median,
  profitBand,
  push,
  stdev,
} from "./stats";
import type {
  LedgerEntry,
  MonteCarloOptions,
  MonteCarloResult,
  MonteCarloStats,
  Trajectory,
  TrialConfig,
  TrialSummary,
} from "./types";

export function trialSeed(baseSeed: number, index: number): number {
  return baseSeed + index;
}

export function toTrajectory(ledger: LedgerEntry[], trial: number): Trajectory {
  return {
    trial,
    points: ledger.map((entry) => ({ hand: entry.hand, bankroll: entry.bankroll })),
  };
}

/**
 * Trial-level statistics. Input order does not matter, so summaries may be
 * collected from trials that finished in any order.
 */
export function aggregateSummaries(summaries: TrialSummary[]): MonteCarloStats {
  const profitStats = createRunningStats();
  const profits: number[] = [];
  let bustCount = 0;
  let winCount = 0;
  let bankrollTotal = 0;
  let handsTotal = 0;
  let streakTotal = 0;
  let maxLossStreak = 0;

  for (const summary of summaries) {
    push(profitStats, summary.profit);
    profits.push(summary.profit);
    if (summary.bust) bustCount += 1;
    if (summary.won) winCount += 1;
    bankrollTotal += summary.finalBankroll;
    handsTotal += summary.handsPlayed;
    streakTotal += summary.maxLossStreak;
    maxLossStreak = Math.max(maxLossStreak, summary.maxLossStreak);
  }

  const iterations = summaries.length;
  const meanProfit = iterations > 0 ? profitStats.mean : 0;
  const stdevProfit = stdev(profitStats);
  const withinTwoSigma = profitBand(profits, meanProfit, stdevProfit, 2);

  return {
    iterations,
    bustCount,
    bustRate: iterations > 0 ? bustCount / iterations : 0,
    winCount,
    winRate: iterations > 0 ? winCount / iterations : 0,
    meanProfit,
    medianProfit: median(profits),
    stdevProfit,
    minProfit: iterations > 0 ? Math.min(...profits) : 0,
    maxProfit: iterations > 0 ? Math.max(...profits) : 0,
    meanFinalBankroll: iterations > 0 ? bankrollTotal / iterations : 0,
    ci95: confidenceInterval(meanProfit, stdevProfit, iterations),
    meanHandsPlayed: iterations > 0 ? handsTotal / iterations : 0,
    meanMaxLossStreak: iterations > 0 ? streakTotal / iterations : 0,
    maxLossStreak,
    withinOneSigma: profitBand(profits, meanProfit, stdevProfit, 1),
    withinTwoSigma,
    outliers: iterations - withinTwoSigma.count,
  };
}

/**
 * Runs `numIterations` Martingale trials.
 *
 * With the default `"fresh"` shoe policy, trial `i` (zero-based) gets its own
 * shoe seeded with `baseSeed + i`, so any single trial can be replayed through
 * `runTrial` with that seed. `"shared"` seeds one shoe with `baseSeed` and
 * carries it through every trial in order.
 */
export function runMonteCarlo(
  config: TrialConfig,
  numIterations: number,
  baseSeed: number,
  options: MonteCarloOptions = {}
): MonteCarloResult {
  const valid = validateTrialConfig(config);
  const { shoePolicy, sampleSize } = validateMonteCarloOptions(numIterations, baseSeed, options);
  const sharedShoe = shoePolicy === "shared" ? new Shoe(valid.numDecks, createRng(baseSeed)) : undefined;

  const summaries: TrialSummary[] = [];
  const trajectories: Trajectory[] = [];

  for (let i = 0; i < numIterations; i += 1) {
    const seed = trialSeed(baseSeed, i);
    const shoe = sharedShoe ?? new Shoe(valid.numDecks, createRng(seed));
    const ledger = playMartingale({ ...valid, seed }, shoe);
    summaries.push(summarizeTrial(ledger, i + 1));
    if (i < sampleSize) {
      trajectories.push(toTrajectory(ledger, i + 1));
    }
  }

  const profits = summaries.map((s) => s.profit);
  return {
    summaries,
    trajectories,
    stats: aggregateSummaries(summaries),
    histogram: buildHistogram(profits, histogramBinCount(numIterations)),
  };
}
