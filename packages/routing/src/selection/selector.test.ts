import { describe, it, expect } from "vitest";
import type { CandidateRoute } from "@transfer-planner/types";
import { compareCandidates, rankCandidates, selectBest } from "./selector.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function makeCandidate(label: string, transferCount: number, stationCount: number): CandidateRoute {
  const stations = Array.from({ length: stationCount }, (_, i) => `${label}-${i}`);
  return {
    kind: transferCount === 0 ? "direct" : "transfer",
    lines: label.split(" → "),
    label,
    stations,
    transferCount,
    stationCount,
    legs: [],
  };
}

// ─── selectBest ─────────────────────────────────────────────────────────────

describe("selectBest", () => {
  it("returns null for no candidates", () => {
    expect(selectBest([])).toBeNull();
  });

  it("returns the only candidate", () => {
    const only = makeCandidate("H72", 0, 3);
    expect(selectBest([only])).toBe(only);
  });

  it("prefers zero transfers even with more stations", () => {
    const transfer = makeCandidate("A → B", 1, 3);
    const direct = makeCandidate("C", 0, 12);

    expect(selectBest([transfer, direct])).toBe(direct);
    expect(selectBest([direct, transfer])).toBe(direct);
  });

  it("breaks transfer-count ties by fewer stations", () => {
    const long = makeCandidate("A → B", 1, 9);
    const short = makeCandidate("C → D", 1, 5);

    expect(selectBest([long, short])).toBe(short);
  });

  it("keeps the first of exactly tied candidates", () => {
    const first = makeCandidate("A", 0, 4);
    const second = makeCandidate("B", 0, 4);

    expect(selectBest([first, second])).toBe(first);
    expect(selectBest([second, first])).toBe(second);
  });
});

// ─── rankCandidates ─────────────────────────────────────────────────────────

describe("rankCandidates", () => {
  it("orders by transfers, then stations, keeping input order on ties", () => {
    const input = [
      makeCandidate("A → B", 1, 4),
      makeCandidate("C", 0, 6),
      makeCandidate("D → E", 1, 3),
      makeCandidate("F", 0, 6),
      makeCandidate("G", 0, 2),
    ];

    expect(rankCandidates(input).map((c) => c.label)).toEqual(["G", "C", "F", "D → E", "A → B"]);
  });

  it("does not reorder its input", () => {
    const input = [makeCandidate("A → B", 1, 4), makeCandidate("C", 0, 6)];
    rankCandidates(input);
    expect(input.map((c) => c.label)).toEqual(["A → B", "C"]);
  });

  it("agrees with selectBest on the winner", () => {
    const input = [makeCandidate("A → B", 1, 2), makeCandidate("C", 0, 8), makeCandidate("D", 0, 5)];
    expect(rankCandidates(input)[0]).toBe(selectBest(input));
  });
});

// ─── compareCandidates ──────────────────────────────────────────────────────

describe("compareCandidates", () => {
  it("is zero for equal keys", () => {
    expect(compareCandidates(makeCandidate("A", 0, 3), makeCandidate("B", 0, 3))).toBe(0);
  });

  it("is negative when the first has fewer transfers", () => {
    expect(compareCandidates(makeCandidate("A", 0, 9), makeCandidate("B → C", 1, 2))).toBeLessThan(0);
  });
});
