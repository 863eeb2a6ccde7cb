import { describe, expect, it } from "vitest";
import { AnalysisService } from "./analysisService";
import { metricRecord } from "../../__tests__/support/fakes";

const records = [
  metricRecord({
    id: 1,
    title: "Alpha",
    collection: "Saga",
    budgetMusd: 200,
    revenueMusd: 1000,
    profit: 800,
    roi: 5,
    voteCount: 5000,
    voteAverage: 8,
    popularity: 90,
    genres: "Action|Science Fiction",
    cast: "Bruce Willis|Actor Two",
    directors: "Dir A",
    runtime: 130,
    releaseDate: "2012-05-04",
  }),
  metricRecord({
    id: 2,
    title: "Beta",
    collection: "Saga",
    budgetMusd: 100,
    revenueMusd: 400,
    profit: 300,
    roi: 4,
    voteCount: 3000,
    voteAverage: 7,
    popularity: 60,
    genres: "Action",
    cast: "Actor Two",
    directors: "Dir A",
    runtime: 100,
    releaseDate: "2015-01-01",
  }),
  metricRecord({
    id: 3,
    title: "Gamma",
    collection: null,
    budgetMusd: 5,
    revenueMusd: 50,
    profit: 45,
    roi: null,
    voteCount: 8,
    voteAverage: 9.5,
    popularity: 10,
    genres: "Drama|Science Fiction",
    cast: "Bruce Willis",
    directors: "Dir B",
    runtime: 90,
    releaseDate: "2012-10-10",
  }),
  metricRecord({
    id: 4,
    title: "Delta",
    collection: null,
    budgetMusd: 50,
    revenueMusd: 25,
    profit: -25,
    roi: 0.5,
    voteCount: 800,
    voteAverage: 5,
    popularity: 30,
    genres: "Action|Science Fiction",
    cast: "Bruce Willis",
    directors: "Dir B",
    runtime: 95,
    releaseDate: null,
  }),
];

const service = new AnalysisService(2);

describe("AnalysisService", () => {
  it("ranks records in both directions and ignores missing values", () => {
    const report = service.analyze(records);

    expect(report.rankings.highestRevenue).toEqual([
      { recordId: 1, title: "Alpha", value: 1000 },
      { recordId: 2, title: "Beta", value: 400 },
    ]);
    expect(report.rankings.lowestProfit.map((entry) => entry.recordId)).toEqual([
      4, 3,
    ]);
    expect(report.rankings.highestRoi.map((entry) => entry.recordId)).toEqual([
      1, 2,
    ]);
    expect(report.rankings.lowestRoi.map((entry) => entry.value)).toEqual([
      0.5, 4,
    ]);
  });

  it("requires a minimum vote count for rating rankings", () => {
    const report = service.analyze(records);

    expect(report.rankings.highestRated.map((entry) => entry.recordId)).toEqual(
      [1, 2],
    );
    expect(report.rankings.lowestRated.map((entry) => entry.recordId)).toEqual([
      4, 2,
    ]);
  });

  it("summarizes metric coverage", () => {
    expect(service.coverage(records)).toEqual({
      recordCount: 4,
      withProfit: 4,
      withRoi: 3,
      meanRoi: 3.1667,
    });
  });

  it("compares franchise and standalone releases", () => {
    expect(service.compareReleaseTypes(records)).toEqual([
      {
        group: "franchise",
        count: 2,
        meanRevenueMusd: 700,
        totalBudgetMusd: 300,
        meanBudgetMusd: 150,
        medianRoi: 4.5,
        meanPopularity: 75,
        meanVoteAverage: 7.5,
      },
      {
        group: "standalone",
        count: 2,
        meanRevenueMusd: 37.5,
        totalBudgetMusd: 55,
        meanBudgetMusd: 27.5,
        medianRoi: 0.5,
        meanPopularity: 20,
        meanVoteAverage: 7.25,
      },
    ]);
  });

  it("aggregates franchises and directors by total revenue", () => {
    expect(service.topFranchises(records)).toEqual([
      {
        collection: "Saga",
        movieCount: 2,
        totalBudgetMusd: 300,
        meanBudgetMusd: 150,
        totalRevenueMusd: 1400,
        meanRevenueMusd: 700,
        meanVoteAverage: 7.5,
      },
    ]);
    expect(service.topDirectors(records)).toEqual([
      {
        director: "Dir A",
        movieCount: 2,
        totalRevenueMusd: 1400,
        meanVoteAverage: 7.5,
      },
      {
        director: "Dir B",
        movieCount: 2,
        totalRevenueMusd: 75,
        meanVoteAverage: 7.25,
      },
    ]);
  });

  it("searches by genres and cast member, most voted first", () => {
    const found = service.searchByGenreAndCast(records, {
      genres: ["Science Fiction", "action"],
      actor: "bruce willis",
    });

    expect(found.map((record) => record.id)).toEqual([1, 4]);
  });

  it("searches by cast member and director, longest first", () => {
    const found = service.searchByCastAndDirector(records, {
      actor: "Bruce Willis",
      director: "Dir B",
    });

    expect(found.map((record) => record.id)).toEqual([4, 3]);
  });

  it("builds chart series for rendering", () => {
    const charts = service.chartSeries(records);

    expect(charts.revenueVsBudget).toHaveLength(4);
    expect(charts.revenueVsBudget[0]).toEqual({
      recordId: 1,
      title: "Alpha",
      x: 200,
      y: 1000,
    });
    expect(charts.roiByGenre).toEqual([
      { genre: "Action", count: 3, medianRoi: 4, rois: [5, 4, 0.5] },
      { genre: "Science Fiction", count: 2, medianRoi: 2.75, rois: [5, 0.5] },
    ]);
    expect(charts.yearlyTrends).toEqual([
      {
        year: 2012,
        count: 2,
        totalRevenueMusd: 1050,
        totalBudgetMusd: 205,
        meanRevenueMusd: 525,
      },
      {
        year: 2015,
        count: 1,
        totalRevenueMusd: 400,
        totalBudgetMusd: 100,
        meanRevenueMusd: 400,
      },
    ]);
  });

  it("picks headline records", () => {
    expect(service.headline(records)).toEqual({
      highestRevenue: { recordId: 1, title: "Alpha", value: 1000 },
      highestRoi: { recordId: 1, title: "Alpha", value: 5 },
    });
    expect(service.headline([])).toEqual({
      highestRevenue: null,
      highestRoi: null,
    });
  });
});
