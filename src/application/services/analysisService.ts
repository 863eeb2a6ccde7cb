import type {
  AnalysisReport,
  ChartSeries,
  DirectorStats,
  FranchiseStats,
  GenreRoi,
  GroupComparison,
  MetricCoverage,
  RankDirection,
  RankedRecord,
  RankingName,
  RankMetric,
  ReleaseType,
  ScatterPoint,
  YearlyTrend,
} from "../../core/entities/analysis";
import type {
  HeadlineRecord,
  PipelineHeadline,
} from "../../core/entities/pipeline";
import { splitList, type MetricRecord } from "../../core/entities/record";
import { mean, median, round, sum } from "../../shared/utils/statistics";

type RankingRule = {
  metric: RankMetric;
  direction: RankDirection;
  minVotes?: number;
};

export const MIN_VOTES_FOR_RATING = 10;

const rankingRules: Record<RankingName, RankingRule> = {
  highestRevenue: { metric: "revenueMusd", direction: "desc" },
  highestBudget: { metric: "budgetMusd", direction: "desc" },
  highestProfit: { metric: "profit", direction: "desc" },
  lowestProfit: { metric: "profit", direction: "asc" },
  highestRoi: { metric: "roi", direction: "desc" },
  lowestRoi: { metric: "roi", direction: "asc" },
  mostVoted: { metric: "voteCount", direction: "desc" },
  highestRated: {
    metric: "voteAverage",
    direction: "desc",
    minVotes: MIN_VOTES_FOR_RATING,
  },
  lowestRated: {
    metric: "voteAverage",
    direction: "asc",
    minVotes: MIN_VOTES_FOR_RATING,
  },
  mostPopular: { metric: "popularity", direction: "desc" },
};

export type GenreCastQuery = {
  genres: string[];
  actor: string;
  limit?: number;
};

export type CastDirectorQuery = {
  actor: string;
  director: string;
  limit?: number;
};

const optionalRound = (value: number | null): number | null =>
  value === null ? null : round(value);

const present = (values: Array<number | null>): number[] =>
  values.filter((value): value is number => value !== null);

const includesName = (list: string | null, name: string): boolean => {
  const needle = name.trim().toLowerCase();
  return splitList(list).some((item) => item.toLowerCase() === needle);
};

/**
 * Nulls sort last in either direction; ties fall back to record id.
 */
const compareNullable = (
  left: number | null,
  right: number | null,
  direction: RankDirection,
): number => {
  if (left === right) {
    return 0;
  }
  if (left === null) {
    return 1;
  }
  if (right === null) {
    return -1;
  }
  return direction === "asc" ? left - right : right - left;
};

const groupBy = <T>(
  items: T[],
  keysOf: (item: T) => string[],
): Map<string, T[]> => {
  const groups = new Map<string, T[]>();
  items.forEach((item) => {
    keysOf(item).forEach((key) => {
      const group = groups.get(key) ?? [];
      group.push(item);
      groups.set(key, group);
    });
  });
  return groups;
};

/**
 * Read-only projections over a metric table. Output is deterministic for a
 * given input so persisted reports are reproducible.
 */
export class AnalysisService {
  constructor(private readonly topN: number) {}

  analyze(records: MetricRecord[]): AnalysisReport {
    const rank = (rule: RankingRule) =>
      this.rankBy(records, rule.metric, rule.direction, this.topN, rule.minVotes);

    return {
      coverage: this.coverage(records),
      rankings: {
        highestRevenue: rank(rankingRules.highestRevenue),
        highestBudget: rank(rankingRules.highestBudget),
        highestProfit: rank(rankingRules.highestProfit),
        lowestProfit: rank(rankingRules.lowestProfit),
        highestRoi: rank(rankingRules.highestRoi),
        lowestRoi: rank(rankingRules.lowestRoi),
        mostVoted: rank(rankingRules.mostVoted),
        highestRated: rank(rankingRules.highestRated),
        lowestRated: rank(rankingRules.lowestRated),
        mostPopular: rank(rankingRules.mostPopular),
      },
      releaseTypeComparison: this.compareReleaseTypes(records),
      topFranchises: this.topFranchises(records, this.topN),
      topDirectors: this.topDirectors(records, this.topN),
      charts: this.chartSeries(records),
    };
  }

  rankBy(
    records: MetricRecord[],
    metric: RankMetric,
    direction: RankDirection,
    limit: number,
    minVotes = 0,
  ): RankedRecord[] {
    return records
      .flatMap((record) => {
        const value = record[metric];
        if (value === null) {
          return [];
        }
        if (minVotes > 0 && (record.voteCount ?? 0) < minVotes) {
          return [];
        }
        return [{ recordId: record.id, title: record.title, value }];
      })
      .sort(
        (left, right) =>
          compareNullable(left.value, right.value, direction) ||
          left.recordId - right.recordId,
      )
      .slice(0, Math.max(0, limit));
  }

  headline(records: MetricRecord[]): PipelineHeadline {
    const top = (metric: RankMetric): HeadlineRecord | null =>
      this.rankBy(records, metric, "desc", 1).at(0) ?? null;

    return {
      highestRevenue: top("revenueMusd"),
      highestRoi: top("roi"),
    };
  }

  coverage(records: MetricRecord[]): MetricCoverage {
    const rois = present(records.map((record) => record.roi));
    return {
      recordCount: records.length,
      withProfit: records.filter((record) => record.profit !== null).length,
      withRoi: rois.length,
      meanRoi: optionalRound(mean(rois)),
    };
  }

  compareReleaseTypes(records: MetricRecord[]): GroupComparison[] {
    const summarize = (group: ReleaseType): GroupComparison => {
      const members = records.filter((record) =>
        group === "franchise"
          ? record.collection !== null
          : record.collection === null,
      );
      const budgets = present(members.map((record) => record.budgetMusd));

      return {
        group,
        count: members.length,
        meanRevenueMusd: optionalRound(
          mean(present(members.map((record) => record.revenueMusd))),
        ),
        totalBudgetMusd: round(sum(budgets)),
        meanBudgetMusd: optionalRound(mean(budgets)),
        medianRoi: optionalRound(
          median(present(members.map((record) => record.roi))),
        ),
        meanPopularity: optionalRound(
          mean(present(members.map((record) => record.popularity))),
        ),
        meanVoteAverage: optionalRound(
          mean(present(members.map((record) => record.voteAverage))),
        ),
      };
    };

    return [summarize("franchise"), summarize("standalone")];
  }

  topFranchises(records: MetricRecord[], limit = this.topN): FranchiseStats[] {
    const groups = groupBy(records, (record) =>
      record.collection === null ? [] : [record.collection],
    );

    return [...groups.entries()]
      .map(([collection, members]) => {
        const budgets = present(members.map((record) => record.budgetMusd));
        const revenues = present(members.map((record) => record.revenueMusd));
        return {
          collection,
          movieCount: members.length,
          totalBudgetMusd: round(sum(budgets)),
          meanBudgetMusd: optionalRound(mean(budgets)),
          totalRevenueMusd: round(sum(revenues)),
          meanRevenueMusd: optionalRound(mean(revenues)),
          meanVoteAverage: optionalRound(
            mean(present(members.map((record) => record.voteAverage))),
          ),
        };
      })
      .sort(
        (left, right) =>
          right.totalRevenueMusd - left.totalRevenueMusd ||
          right.movieCount - left.movieCount ||
          left.collection.localeCompare(right.collection),
      )
      .slice(0, limit);
  }

  topDirectors(records: MetricRecord[], limit = this.topN): DirectorStats[] {
    const groups = groupBy(records, (record) => splitList(record.directors));

    return [...groups.entries()]
      .map(([director, members]) => ({
        director,
        movieCount: members.length,
        totalRevenueMusd: round(
          sum(present(members.map((record) => record.revenueMusd))),
        ),
        meanVoteAverage: optionalRound(
          mean(present(members.map((record) => record.voteAverage))),
        ),
      }))
      .sort(
        (left, right) =>
          right.totalRevenueMusd - left.totalRevenueMusd ||
          right.movieCount - left.movieCount ||
          left.director.localeCompare(right.director),
      )
      .slice(0, limit);
  }

  /**
   * Records tagged with every requested genre and featuring the actor, most
   * voted first.
   */
  searchByGenreAndCast(
    records: MetricRecord[],
    query: GenreCastQuery,
  ): MetricRecord[] {
    return records
      .filter(
        (record) =>
          query.genres.every((genre) => includesName(record.genres, genre)) &&
          includesName(record.cast, query.actor),
      )
      .sort(
        (left, right) =>
          compareNullable(left.voteCount, right.voteCount, "desc") ||
          left.id - right.id,
      )
      .slice(0, query.limit ?? records.length);
  }

  /**
   * Records featuring the actor under the given director, longest first.
   */
  searchByCastAndDirector(
    records: MetricRecord[],
    query: CastDirectorQuery,
  ): MetricRecord[] {
    return records
      .filter(
        (record) =>
          includesName(record.cast, query.actor) &&
          includesName(record.directors, query.director),
      )
      .sort(
        (left, right) =>
          compareNullable(left.runtime, right.runtime, "desc") ||
          left.id - right.id,
      )
      .slice(0, query.limit ?? records.length);
  }

  chartSeries(records: MetricRecord[]): ChartSeries {
    const scatter = (
      x: (record: MetricRecord) => number | null,
      y: (record: MetricRecord) => number | null,
    ): ScatterPoint[] =>
      records.flatMap((record) => {
        const xValue = x(record);
        const yValue = y(record);
        return xValue === null || yValue === null
          ? []
          : [{ recordId: record.id, title: record.title, x: xValue, y: yValue }];
      });

    const roiByGenre: GenreRoi[] = [
      ...groupBy(
        records.filter((record) => record.roi !== null),
        (record) => splitList(record.genres),
      ).entries(),
    ]
      .map(([genre, members]) => {
        const rois = present(members.map((record) => record.roi));
        return {
          genre,
          count: rois.length,
          medianRoi: optionalRound(median(rois)),
          rois,
        };
      })
      .sort((left, right) => left.genre.localeCompare(right.genre));

    const yearlyTrends: YearlyTrend[] = [
      ...groupBy(records, (record) =>
        record.releaseDate === null ? [] : [record.releaseDate.slice(0, 4)],
      ).entries(),
    ]
      .map(([year, members]) => {
        const revenues = present(members.map((record) => record.revenueMusd));
        return {
          year: Number(year),
          count: members.length,
          totalRevenueMusd: round(sum(revenues)),
          totalBudgetMusd: round(
            sum(present(members.map((record) => record.budgetMusd))),
          ),
          meanRevenueMusd: optionalRound(mean(revenues)),
        };
      })
      .sort((left, right) => left.year - right.year);

    return {
      revenueVsBudget: scatter(
        (record) => record.budgetMusd,
        (record) => record.revenueMusd,
      ),
      popularityVsRating: scatter(
        (record) => record.voteAverage,
        (record) => record.popularity,
      ),
      roiByGenre,
      yearlyTrends,
    };
  }
}
