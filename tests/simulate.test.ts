import { describe, expect, it } from "vitest";
import {
  aggregateSummaries,
  ConfigValidationError,
  histogramBinCount,
  runMonteCarlo,
  runTrial,
  summarizeTrial,
  toTrajectory,
} from "../core";
import type { TrialSummary } from "../core";
import { baseConfig } from "./helpers";

const summary = (overrides: Partial<TrialSummary>): TrialSummary => ({
  trial: 1,
  bust: false,
  finalBankroll: 100,
  profit: 0,
  handsPlayed: 50,
  maxLossStreak: 0,
  won: true,
  ...overrides,
});

describe("runMonteCarlo", () => {
  it("derives trial seeds from the base seed", () => {
    const result = runMonteCarlo(baseConfig, 5, 100);
    expect(result.summaries).toHaveLength(5);
    expect(result.summaries.map((s) => s.trial)).toEqual([1, 2, 3, 4, 5]);
    expect(result.summaries[3]).toEqual(summarizeTrial(runTrial({ ...baseConfig, seed: 103 }), 4));
  });

  it("ignores the seed in the trial config", () => {
    const a = runMonteCarlo({ ...baseConfig, seed: 1 }, 3, 500);
    const b = runMonteCarlo({ ...baseConfig, seed: 2 }, 3, 500);
    expect(a).toEqual(b);
  });

  it("samples trajectories for the first ten trials", () => {
    const small = runMonteCarlo(baseConfig, 3, 1);
    expect(small.trajectories.map((t) => t.trial)).toEqual([1, 2, 3]);

    const large = runMonteCarlo(baseConfig, 25, 1);
    expect(large.trajectories.map((t) => t.trial)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(large.trajectories[0]).toEqual(toTrajectory(runTrial({ ...baseConfig, seed: 1 }), 1));
  });

  it("only widens the trajectory sample", () => {
    const config = { ...baseConfig, numHands: 5 };
    expect(runMonteCarlo(config, 15, 1, { sampleSize: 12 }).trajectories).toHaveLength(12);
    expect(runMonteCarlo(config, 4, 1, { sampleSize: 12 }).trajectories).toHaveLength(4);
    expect(() => runMonteCarlo(config, 4, 1, { sampleSize: 2 })).toThrow(ConfigValidationError);
  });

  it("aggregates the trial summaries it returns", () => {
    const result = runMonteCarlo(baseConfig, 40, 11);
    const busts = result.summaries.filter((s) => s.bust).length;
    const wins = result.summaries.filter((s) => !s.bust && s.profit >= 0).length;
    expect(result.stats.iterations).toBe(40);
    expect(result.stats.bustCount).toBe(busts);
    expect(result.stats.bustRate).toBe(busts / 40);
    expect(result.stats.winCount).toBe(wins);
    expect(result.stats.meanProfit).toBeCloseTo(
      result.summaries.reduce((acc, s) => acc + s.profit, 0) / 40,
      9
    );
    expect(result.histogram.counts).toHaveLength(histogramBinCount(40));
    expect(result.histogram.counts.reduce((a, b) => a + b, 0)).toBe(40);
  });

  it("gives every trial its own seed up to the top of the seed range", () => {
    const result = runMonteCarlo({ ...baseConfig, numHands: 5 }, 2, 0xffffffff - 1);
    expect(result.summaries[1]).toEqual(summarizeTrial(runTrial({ ...baseConfig, numHands: 5, seed: 0xffffffff }), 2));
  });

  it("carries one shoe through every trial with the shared policy", () => {
    const shared = runMonteCarlo(baseConfig, 6, 21, { shoePolicy: "shared" });
    const again = runMonteCarlo(baseConfig, 6, 21, { shoePolicy: "shared" });
    const fresh = runMonteCarlo(baseConfig, 6, 21);
    expect(shared).toEqual(again);
    // both policies seed the first shoe with the base seed
    expect(shared.summaries[0]).toEqual(fresh.summaries[0]);
  });

  it("rejects invalid run options", () => {
    expect(() => runMonteCarlo(baseConfig, 0, 1)).toThrow(ConfigValidationError);
    expect(() => runMonteCarlo(baseConfig, 2, 1.5)).toThrow(ConfigValidationError);
    expect(() => runMonteCarlo(baseConfig, 3, 1e20)).toThrow(ConfigValidationError);
    expect(() => runMonteCarlo(baseConfig, 3, 0xffffffff - 1)).toThrow(ConfigValidationError);
    expect(() => runMonteCarlo({ ...baseConfig, startBankroll: -1 }, 2, 1)).toThrow(ConfigValidationError);
  });

  it("never lowers the bust rate when more hands are played", () => {
    const config = { ...baseConfig, numPlayers: 1, numDecks: 6 };
    const handCounts = [10, 25, 50, 100];
    const runs = handCounts.map((numHands) => runMonteCarlo({ ...config, numHands }, 1000, 2024));

    for (let i = 1; i < runs.length; i += 1) {
      expect(runs[i].stats.bustRate).toBeGreaterThanOrEqual(runs[i - 1].stats.bustRate);
      runs[i - 1].summaries.forEach((s, trial) => {
        if (s.bust) expect(runs[i].summaries[trial].bust).toBe(true);
      });
    }
  });
});

describe("aggregateSummaries", () => {
  const summaries = [
    summary({ trial: 1, bust: true, won: false, profit: -60, finalBankroll: 40, handsPlayed: 5, maxLossStreak: 3 }),
    summary({ trial: 2, profit: 0, finalBankroll: 100, handsPlayed: 50, maxLossStreak: 2 }),
    summary({ trial: 3, profit: 20, finalBankroll: 120, handsPlayed: 50, maxLossStreak: 4 }),
    summary({ trial: 4, profit: 40, finalBankroll: 140, handsPlayed: 50, maxLossStreak: 1 }),
  ];

  it("computes rates and profit statistics", () => {
    const stats = aggregateSummaries(summaries);
    expect(stats.iterations).toBe(4);
    expect(stats.bustCount).toBe(1);
    expect(stats.bustRate).toBe(0.25);
    expect(stats.winCount).toBe(3);
    expect(stats.winRate).toBe(0.75);
    expect(stats.meanProfit).toBeCloseTo(0, 9);
    expect(stats.medianProfit).toBe(10);
    expect(stats.stdevProfit).toBeCloseTo(Math.sqrt(5600 / 3), 9);
    expect(stats.minProfit).toBe(-60);
    expect(stats.maxProfit).toBe(40);
    expect(stats.meanFinalBankroll).toBe(100);
    expect(stats.meanHandsPlayed).toBe(38.75);
    expect(stats.meanMaxLossStreak).toBe(2.5);
    expect(stats.maxLossStreak).toBe(4);
  });

  it("reports the sigma bands", () => {
    const stats = aggregateSummaries(summaries);
    expect(stats.withinOneSigma).toEqual({ count: 3, share: 0.75, mean: 20, min: 0, max: 40 });
    expect(stats.withinTwoSigma.count).toBe(4);
    expect(stats.outliers).toBe(0);
  });

  it("does not depend on summary order", () => {
    const forward = aggregateSummaries(summaries);
    const reversed = aggregateSummaries([...summaries].reverse());
    expect(reversed.bustCount).toBe(forward.bustCount);
    expect(reversed.medianProfit).toBe(forward.medianProfit);
    expect(reversed.meanProfit).toBeCloseTo(forward.meanProfit, 9);
    expect(reversed.stdevProfit).toBeCloseTo(forward.stdevProfit, 9);
    expect(reversed.withinOneSigma).toEqual(forward.withinOneSigma);
  });

  it("returns zeros for no trials", () => {
    const stats = aggregateSummaries([]);
    expect(stats.iterations).toBe(0);
    expect(stats.bustRate).toBe(0);
    expect(stats.meanProfit).toBe(0);
    expect(stats.withinOneSigma.mean).toBeNull();
  });
});
