import { describe, it, expect } from "vitest";
import { always, intersection, matches, negate, never, union } from "../schedule.ts";
import type { Schedule } from "../schedule.ts";
import { randomSchedule, seededRandom, timeGrid } from "./helpers.ts";

const GRID = timeGrid();
const SAMPLES = 40;

function triples(seed: number): Array<[Schedule, Schedule, Schedule]> {
  const random = seededRandom(seed);
  const out: Array<[Schedule, Schedule, Schedule]> = [];
  for (let i = 0; i < SAMPLES; i++) {
    out.push([
      randomSchedule(random, { depth: 3 }),
      randomSchedule(random, { depth: 3 }),
      randomSchedule(random, { depth: 3 }),
    ]);
  }
  return out;
}

/** Count grid points where the two schedules disagree. */
function disagreements(x: Schedule, y: Schedule): number {
  return GRID.filter((t) => matches(x, t) !== matches(y, t)).length;
}

describe("schedule algebra", () => {
  it("union is logical or", () => {
    for (const [a, b] of triples(1)) {
      const ab = union(a, b);
      for (const t of GRID) {
        expect(matches(ab, t)).toBe(matches(a, t) || matches(b, t));
      }
    }
  });

  it("intersection is logical and", () => {
    for (const [a, b] of triples(2)) {
      const ab = intersection(a, b);
      for (const t of GRID) {
        expect(matches(ab, t)).toBe(matches(a, t) && matches(b, t));
      }
    }
  });

  it("negate is logical not and cancels itself", () => {
    for (const [a] of triples(3)) {
      for (const t of GRID) {
        expect(matches(negate(a), t)).toBe(!matches(a, t));
      }
      expect(negate(negate(a))).toEqual(a);
    }
  });

  it("obeys De Morgan's laws", () => {
    for (const [a, b] of triples(4)) {
      expect(disagreements(negate(union(a, b)), intersection(negate(a), negate(b)))).toBe(0);
      expect(disagreements(negate(intersection(a, b)), union(negate(a), negate(b)))).toBe(0);
    }
  });

  it("is commutative and associative", () => {
    for (const [a, b, c] of triples(5)) {
      expect(disagreements(union(a, b), union(b, a))).toBe(0);
      expect(disagreements(intersection(a, b), intersection(b, a))).toBe(0);
      expect(disagreements(union(union(a, b), c), union(a, union(b, c)))).toBe(0);
      expect(
        disagreements(intersection(intersection(a, b), c), intersection(a, intersection(b, c))),
      ).toBe(0);
    }
  });

  it("distributes each operation over the other", () => {
    for (const [a, b, c] of triples(6)) {
      expect(
        disagreements(intersection(a, union(b, c)), union(intersection(a, b), intersection(a, c))),
      ).toBe(0);
      expect(
        disagreements(union(a, intersection(b, c)), intersection(union(a, b), union(a, c))),
      ).toBe(0);
    }
  });

  it("has always and never as identities and annihilators", () => {
    for (const [a] of triples(7)) {
      expect(disagreements(union(a, never()), a)).toBe(0);
      expect(disagreements(intersection(a, always()), a)).toBe(0);
      expect(disagreements(union(a, always()), always())).toBe(0);
      expect(disagreements(intersection(a, never()), never())).toBe(0);
      expect(disagreements(union(a, negate(a)), always())).toBe(0);
      expect(disagreements(intersection(a, negate(a)), never())).toBe(0);
    }
  });
});
