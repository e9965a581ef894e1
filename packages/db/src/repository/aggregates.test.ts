import { describe, expect, it } from "vitest";

import {
  averageBy,
  countBy,
  dayKey,
  groupSum,
  monthKey,
  roundCurrency,
  sumBy,
  toMinorUnits
} from "./aggregates";

describe("aggregates", () => {
  it("sums currency without floating point drift", () => {
    const amounts = [0.1, 0.2, 0.3, 19.99, 0.01];
    expect(sumBy(amounts, (amount) => amount)).toBe(20.6);
    expect(sumBy([{ v: 1.5 }, { v: null }, { v: undefined }], (item) => item.v)).toBe(1.5);
    expect(sumBy([], (amount: number) => amount)).toBe(0);
  });

  it("rounds to cents", () => {
    expect(roundCurrency(10 / 3)).toBe(3.33);
    expect(roundCurrency(-2.5)).toBe(-2.5);
    expect(() => toMinorUnits(Number.NaN)).toThrowError("Invalid currency amount: NaN");
  });

  it("counts and sums per bucket in first-seen order", () => {
    const rows = [
      { status: "Pending", amount: 10.1 },
      { status: "Delivered", amount: 5 },
      { status: "Pending", amount: 0.2 }
    ];

    expect([...countBy(rows, (row) => row.status).entries()]).toEqual([
      ["Pending", 2],
      ["Delivered", 1]
    ]);
    expect([...groupSum(rows, (row) => row.status, (row) => row.amount).entries()]).toEqual([
      ["Pending", 10.3],
      ["Delivered", 5]
    ]);
  });

  it("averages present values only", () => {
    expect(averageBy([{ s: 7 }, { s: null }, { s: 9 }], (row) => row.s)).toBe(8);
    expect(averageBy([{ s: null }], (row) => row.s)).toBeNull();
  });

  it("keys dates by month and day", () => {
    expect(monthKey("2026-04-01T10:00:00.000Z")).toBe("2026-04");
    expect(dayKey("2026-04-01T10:00:00.000Z")).toBe("2026-04-01");
    expect(dayKey("2026-04-01")).toBe("2026-04-01");
  });
});
