export type RankedRecord = {
  recordId: number;
  title: string | null;
  value: number;
};

export type RankingName =
  | "highestRevenue"
  | "highestBudget"
  | "highestProfit"
  | "lowestProfit"
  | "highestRoi"
  | "lowestRoi"
  | "mostVoted"
  | "highestRated"
  | "lowestRated"
  | "mostPopular";

export type RankMetric =
  | "revenueMusd"
  | "budgetMusd"
  | "profit"
  | "roi"
  | "voteCount"
  | "voteAverage"
  | "popularity";

export type RankDirection = "asc" | "desc";

export type ReleaseType = "franchise" | "standalone";

export type GroupComparison = {
  group: ReleaseType;
  count: number;
  meanRevenueMusd: number | null;
  totalBudgetMusd: number;
  meanBudgetMusd: number | null;
  medianRoi: number | null;
  meanPopularity: number | null;
  meanVoteAverage: number | null;
};

export type FranchiseStats = {
  collection: string;
  movieCount: number;
  totalBudgetMusd: number;
  meanBudgetMusd: number | null;
  totalRevenueMusd: number;
  meanRevenueMusd: number | null;
  meanVoteAverage: number | null;
};

export type DirectorStats = {
  director: string;
  movieCount: number;
  totalRevenueMusd: number;
  meanVoteAverage: number | null;
};

export type MetricCoverage = {
  recordCount: number;
  withProfit: number;
  withRoi: number;
  meanRoi: number | null;
};

export type ScatterPoint = {
  recordId: number;
  title: string | null;
  x: number;
  y: number;
};

export type GenreRoi = {
  genre: string;
  count: number;
  medianRoi: number | null;
  rois: number[];
};

export type YearlyTrend = {
  year: number;
  count: number;
  totalRevenueMusd: number;
  totalBudgetMusd: number;
  meanRevenueMusd: number | null;
};

/**
 * Numeric series a rendering collaborator turns into charts.
 */
export type ChartSeries = {
  revenueVsBudget: ScatterPoint[];
  popularityVsRating: ScatterPoint[];
  roiByGenre: GenreRoi[];
  yearlyTrends: YearlyTrend[];
};

export type AnalysisReport = {
  coverage: MetricCoverage;
  rankings: Record<RankingName, RankedRecord[]>;
  releaseTypeComparison: GroupComparison[];
  topFranchises: FranchiseStats[];
  topDirectors: DirectorStats[];
  charts: ChartSeries;
};
