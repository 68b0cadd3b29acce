export type Rank =
  | "2"
  | "3"
  | "4"
  | "5"
  | "6"
  | "7"
  | "8"
  | "9"
  | "10"
  | "J"
  | "Q"
  | "K"
  | "A";

export type Suit = "♠" | "♥" | "♦" | "♣";

export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

export interface Hand {
  cards: Card[];
}

export interface CardSource {
  draw(): Card;
}

export type HandResultTag = "win" | "lose" | "push";

export type LedgerResult = HandResultTag | "BUST";

export interface HandSnapshot {
  playerHand: string;
  dealerHand: string;
  playerValue: number;
  dealerValue: number;
}

export interface HandOutcome {
  result: HandResultTag;
  payout: number;
  snapshot: HandSnapshot;
}

export interface TableRules {
  bet: number;
  numPlayers: number;
  dealerHitsSoft17: boolean;
}

export interface TrialConfig {
  startBankroll: number;
  baseBet: number;
  multiplier: number;
  numDecks: number;
  numPlayers: number;
  numHands: number;
  dealerHitsSoft17: boolean;
  seed: number;
}

export interface LedgerEntry {
  hand: number;
  result: LedgerResult;
  playerHand: string;
  dealerHand: string;
  playerValue: number | null;
  dealerValue: number | null;
  bet: number;
  bankroll: number;
  profit: number;
  streakLosses: number;
}

export interface TrialSummary {
  trial: number;
  bust: boolean;
  finalBankroll: number;
  profit: number;
  handsPlayed: number;
  maxLossStreak: number;
  won: boolean;
}

export interface TrajectoryPoint {
  hand: number;
  bankroll: number;
}

export interface Trajectory {
  trial: number;
  points: TrajectoryPoint[];
}

export type ShoePolicy = "fresh" | "shared";

export interface MonteCarloOptions {
  shoePolicy?: ShoePolicy;
  sampleSize?: number;
}

export interface ProfitBand {
  count: number;
  share: number;
  mean: number | null;
  min: number | null;
  max: number | null;
}

export interface MonteCarloStats {
  iterations: number;
  bustCount: number;
  bustRate: number;
  winCount: number;
  winRate: number;
  meanProfit: number;
  medianProfit: number;
  stdevProfit: number;
  minProfit: number;
  maxProfit: number;
  meanFinalBankroll: number;
  ci95: [number, number];
  meanHandsPlayed: number;
  meanMaxLossStreak: number;
  maxLossStreak: number;
  withinOneSigma: ProfitBand;
  withinTwoSigma: ProfitBand;
  outliers: number;
}

export interface Histogram {
  bins: number[];
  counts: number[];
}

export interface MonteCarloResult {
  summaries: TrialSummary[];
  trajectories: Trajectory[];
  stats: MonteCarloStats;
  histogram: Histogram;
}
