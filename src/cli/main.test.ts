import { describe, expect, it } from "vitest";
import { buildCli, formatQuoteTable } from "./main";

describe("formatQuoteTable", () => {
  it("prints the newest rows up to the limit", () => {
    const table = formatQuoteTable(
      {
        symbol: "MSFT",
        metadata: { lastRefreshed: "2026-03-09" },
        records: [
          {
            date: "2026-03-09",
            open: 410,
            high: 412.3,
            low: 407.75,
            close: 411.8,
            volume: 980000,
          },
          {
            date: "2026-03-06",
            open: 401,
            high: 402,
            low: 399,
            close: 400,
            volume: 1000,
          },
        ],
      },
      1,
    );

    expect(table.split("\n")).toEqual([
      "Daily prices for MSFT (last refreshed 2026-03-09)",
      "date        open      high      low       close     volume",
      "2026-03-09    410.00    412.30    407.75    411.80     980000",
    ]);
  });

  it("says so when there are no rows", () => {
    expect(
      formatQuoteTable({ symbol: "XYZ", metadata: {}, records: [] }, 5),
    ).toBe(
      "Daily prices for XYZ\ndate        open      high      low       close     volume\n- none",
    );
  });
});

describe("buildCli", () => {
  it("registers every command", () => {
    expect(buildCli().commands.map((command) => command.name())).toEqual([
      "advise",
      "news",
      "quote",
      "insights:add",
      "status",
    ]);
  });
});
