import { describe, expect, it } from "vitest";
import { MetricService } from "./metricService";
import { ValidationService } from "./validationService";
import { cleanRecord, metricRecord } from "../../__tests__/support/fakes";

const service = new MetricService(new ValidationService(1.5), 10);

describe("MetricService", () => {
  it("computes profit and ROI for reliable budgets", () => {
    const [record] = service.compute([
      cleanRecord({ id: 1, budgetMusd: 100, revenueMusd: 300 }),
    ]);

    expect(record?.profit).toBe(200);
    expect(record?.roi).toBe(3);
  });

  it("leaves both metrics missing when budget is zero", () => {
    const [record] = service.compute([
      cleanRecord({ id: 1, budgetMusd: 0, revenueMusd: 500 }),
    ]);

    expect(record?.profit).toBeNull();
    expect(record?.roi).toBeNull();
  });

  it("keeps profit but drops ROI below the reliability threshold", () => {
    const [record] = service.compute([
      cleanRecord({ id: 1, budgetMusd: 5, revenueMusd: 50 }),
    ]);

    expect(record?.profit).toBe(45);
    expect(record?.roi).toBeNull();
  });

  it("computes ROI exactly at the threshold", () => {
    const [record] = service.compute([
      cleanRecord({ id: 1, budgetMusd: 10, revenueMusd: 25 }),
    ]);

    expect(record?.roi).toBe(2.5);
  });

  it("never yields non-finite values", () => {
    const computed = service.compute([
      cleanRecord({ id: 1, budgetMusd: null, revenueMusd: 80 }),
      cleanRecord({ id: 2, budgetMusd: 40, revenueMusd: null }),
      cleanRecord({ id: 3, budgetMusd: 12, revenueMusd: 0 }),
    ]);

    computed.forEach((record) => {
      expect(record.profit).toBeNull();
      expect(record.roi).toBeNull();
    });
  });

  it("keeps losses as negative profit", () => {
    const [record] = service.compute([
      cleanRecord({ id: 1, budgetMusd: 150, revenueMusd: 60 }),
    ]);

    expect(record?.profit).toBe(-90);
    expect(record?.roi).toBe(0.4);
  });

  it("assesses metric tables and flags ROI outliers", () => {
    const result = service.assess(
      [1, 2, 3, 4, 100].map((roi, index) =>
        metricRecord({ id: index + 1, roi }),
      ),
    );

    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value.qualityScore).toBe(100);
    expect(result.value.outliers.map((flag) => flag.recordId)).toEqual([5]);
  });
});
