import { describe, it, expect } from "vitest";
import { rankInstruments, rankRegimes } from "../regime-ranking.ts";
import type { ConditionalStat } from "../regime-conditioning.ts";

describe("rankInstruments", () => {
  it("ranks by mean return and by least negative drawdown", () => {
    const ranking = rankInstruments(
      { A: 0.02, B: -0.01, C: 0.05 },
      { A: -0.1, B: -0.02, C: -0.3 },
      2,
    );

    expect(ranking).toEqual({
      favoritesByReturn: ["C", "A"],
      unfavoritesByReturn: ["A", "B"],
      favoritesByDrawdown: ["B", "A"],
      unfavoritesByDrawdown: ["A", "C"],
    });
  });

  it("returns shorter lists when fewer instruments have statistics", () => {
    const ranking = rankInstruments({ A: 0.01, B: null, C: 0.03 }, { A: null, B: null, C: -0.2 }, 4);

    expect(ranking.favoritesByReturn).toEqual(["C", "A"]);
    expect(ranking.unfavoritesByReturn).toEqual(["C", "A"]);
    expect(ranking.favoritesByDrawdown).toEqual(["C"]);
    expect(ranking.unfavoritesByDrawdown).toEqual(["C"]);
  });

  it("orders equal values by symbol", () => {
    const ranking = rankInstruments({ XLF: 0.01, XLE: 0.01, XLB: 0.01, XLK: 0.02 }, {}, 3);
    expect(ranking.favoritesByReturn).toEqual(["XLK", "XLB", "XLE"]);
    expect(ranking.unfavoritesByReturn).toEqual(["XLB", "XLE", "XLF"]);
  });

  it("never lists more than the breadth", () => {
    const values = Object.fromEntries(["A", "B", "C", "D", "E", "F"].map((s, i) => [s, i / 100]));
    const ranking = rankInstruments(values, values, 4);
    for (const list of Object.values(ranking)) {
      expect(list).toHaveLength(4);
    }
  });
});

describe("rankRegimes", () => {
  it("produces one ranking per regime with statistics", () => {
    const stats: ConditionalStat[] = [
      {
        regime: "Low_Easy",
        regimeName: "Stable expansion (Risk-on)",
        count: 5,
        meanReturn: { A: 0.01, B: 0.02 },
        meanDrawdown: { A: -0.05, B: -0.01 },
        maxDrawdown: { A: -0.1, B: -0.03 },
      },
      {
        regime: "High_Tight",
        regimeName: "Structural stress (Capital preservation)",
        count: 3,
        meanReturn: { A: -0.02, B: -0.04 },
        meanDrawdown: { A: -0.08, B: -0.2 },
        maxDrawdown: { A: -0.15, B: -0.35 },
      },
    ];

    const rankings = rankRegimes(stats, 1);
    expect(rankings).toEqual([
      {
        regime: "Low_Easy",
        favoritesByReturn: ["B"],
        unfavoritesByReturn: ["A"],
        favoritesByDrawdown: ["B"],
        unfavoritesByDrawdown: ["A"],
      },
      {
        regime: "High_Tight",
        favoritesByReturn: ["A"],
        unfavoritesByReturn: ["B"],
        favoritesByDrawdown: ["A"],
        unfavoritesByDrawdown: ["B"],
      },
    ]);
  });
});
