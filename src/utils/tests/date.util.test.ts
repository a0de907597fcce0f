import { addDays, addMonths } from "../date.util";

describe("addMonths", () => {
  test("keeps the day of month", () => {
    expect(addMonths(new Date("2024-01-15T10:00:00.000Z"), 1).toISOString()).toBe(
      "2024-02-15T10:00:00.000Z"
    );
  });

  test("clamps to the end of shorter months", () => {
    expect(addMonths(new Date("2024-01-31T00:00:00.000Z"), 1).toISOString()).toBe(
      "2024-02-29T00:00:00.000Z"
    );
    expect(addMonths(new Date("2023-01-31T00:00:00.000Z"), 1).toISOString()).toBe(
      "2023-02-28T00:00:00.000Z"
    );
    expect(addMonths(new Date("2024-01-31T00:00:00.000Z"), 3).toISOString()).toBe(
      "2024-04-30T00:00:00.000Z"
    );
  });

  test("rolls over the year", () => {
    expect(addMonths(new Date("2024-11-30T00:00:00.000Z"), 3).toISOString()).toBe(
      "2025-02-28T00:00:00.000Z"
    );
    expect(addMonths(new Date("2024-01-15T00:00:00.000Z"), 360).toISOString()).toBe(
      "2054-01-15T00:00:00.000Z"
    );
  });
});

describe("addDays", () => {
  test("adds whole days", () => {
    expect(addDays(new Date("2024-02-28T12:00:00.000Z"), 2).toISOString()).toBe(
      "2024-03-01T12:00:00.000Z"
    );
  });
});
