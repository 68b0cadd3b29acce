import type { Histogram, LedgerEntry, MonteCarloResult, ProfitBand, TrialSummary } from "../../core";

const numberFormatter = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
});

const percentFormatter = new Intl.NumberFormat("en-US", {
  style: "percent",
  minimumFractionDigits: 1,
  maximumFractionDigits: 1,
});

const HISTOGRAM_WIDTH = 40;

export function formatMoney(value: number): string {
  return numberFormatter.format(value);
}

export function formatPercent(rate: number): string {
  return percentFormatter.format(rate);
}

export interface LedgerRow {
  hand: number;
  result: string;
  player: string;
  dealer: string;
  playerValue: number | string;
  dealerValue: number | string;
  bet: string;
  bankroll: string;
  profit: string;
  streak: number;
}

export function toLedgerRow(entry: LedgerEntry): LedgerRow {
  return {
    hand: entry.hand,
    result: entry.result,
    player: entry.playerHand,
    dealer: entry.dealerHand,
    playerValue: entry.playerValue ?? "",
    dealerValue: entry.dealerValue ?? "",
    bet: formatMoney(entry.bet),
    bankroll: formatMoney(entry.bankroll),
    profit: formatMoney(entry.profit),
    streak: entry.streakLosses,
  };
}

export function formatSingleRun(summary: TrialSummary): string[] {
  return [
    "Simulation Results",
    `Final Bankroll: ${formatMoney(summary.finalBankroll)}`,
    `Total Profit: ${formatMoney(summary.profit)}`,
    `Bust Occurred? ${summary.bust ? "Yes" : "No"}`,
    `Hands Played: ${summary.handsPlayed}`,
    `Max Loss Streak: ${summary.maxLossStreak}`,
  ];
}

function formatBand(label: string, band: ProfitBand): string[] {
  const header = `${label} (${formatPercent(band.share)} of data):`;
  if (band.mean === null || band.min === null || band.max === null) {
    return [header, "  - No data"];
  }
  return [
    header,
    `  - Avg: ${formatMoney(band.mean)}`,
    `  - Range: ${formatMoney(band.min)} to ${formatMoney(band.max)}`,
  ];
}

export function formatHistogram(histogram: Histogram): string[] {
  const maxCount = Math.max(0, ...histogram.counts);
  if (maxCount === 0) return [];
  return histogram.bins.map((center, i) => {
    const count = histogram.counts[i];
    const bar = "#".repeat(Math.round((count / maxCount) * HISTOGRAM_WIDTH));
    return `${formatMoney(center).padStart(14)} | ${bar} ${count}`;
  });
}

export function formatMonteCarlo(result: MonteCarloResult): string[] {
  const { stats } = result;
  const oneSigma = [stats.meanProfit - stats.stdevProfit, stats.meanProfit + stats.stdevProfit];
  const twoSigma = [stats.meanProfit - 2 * stats.stdevProfit, stats.meanProfit + 2 * stats.stdevProfit];

  return [
    "Monte Carlo Simulation Results",
    `${stats.iterations} iterations completed`,
    `Win Rate: ${formatPercent(stats.winRate)}`,
    `Bust Rate: ${formatPercent(stats.bustRate)}`,
    `Avg Final Bankroll: ${formatMoney(stats.meanFinalBankroll)}`,
    `Avg Profit: ${formatMoney(stats.meanProfit)}`,
    "",
    "Profit Distribution",
    `Mean Profit: ${formatMoney(stats.meanProfit)}`,
    `Median Profit: ${formatMoney(stats.medianProfit)}`,
    `Std Deviation: ${formatMoney(stats.stdevProfit)}`,
    `95% CI of Mean: ${formatMoney(stats.ci95[0])} to ${formatMoney(stats.ci95[1])}`,
    `1σ Range: ${formatMoney(oneSigma[0])} to ${formatMoney(oneSigma[1])}`,
    `2σ Range: ${formatMoney(twoSigma[0])} to ${formatMoney(twoSigma[1])}`,
    `Min Profit: ${formatMoney(stats.minProfit)}`,
    `Max Profit: ${formatMoney(stats.maxProfit)}`,
    ...formatBand("Within 1σ", stats.withinOneSigma),
    ...formatBand("Within 2σ", stats.withinTwoSigma),
    "",
    "Game Statistics",
    `Avg Hands Played: ${stats.meanHandsPlayed.toFixed(1)}`,
    `Avg Max Loss Streak: ${stats.meanMaxLossStreak.toFixed(1)}`,
    `Max Loss Streak (all): ${stats.maxLossStreak}`,
    `Busts: ${stats.bustCount} / ${stats.iterations}`,
    `Outliers (>2σ): ${stats.outliers}`,
    "",
    "Profit Histogram",
    ...formatHistogram(result.histogram),
    "",
    "Sample Bankroll Trajectories",
    ...result.trajectories.map((t) => {
      const last = t.points[t.points.length - 1];
      const final = last === undefined ? "-" : formatMoney(last.bankroll);
      return `Trial ${t.trial}: ${t.points.length} hands, final ${final}`;
    }),
  ];
}
