import type { TimePoint } from "../types/time.ts";
import { collectNodes, evaluateNode } from "./schedule.ts";
import type { Schedule, TimesResolver, TimesSchedule } from "./schedule.ts";
import { timePointKey } from "./time-point.ts";

// ── Schedule Evaluator ───────────────────────────────────────────────────────

/**
 * Evaluates one schedule tree over a sequence of time points, keeping the
 * occurrence counters that give `times(inner, n)` its meaning: the node
 * matches on the first `n` time points at which `inner` matched, counted
 * from construction or the last `reset()`.
 *
 * Counters belong to this evaluator only. Two evaluators over the same tree
 * count independently; give each consumer its own.
 */
export class ScheduleEvaluator {
  private readonly counts = new Map<TimesSchedule, number>();
  private readonly timesNodes: readonly TimesSchedule[];
  private lastKey: string | null = null;
  private lastResult = false;

  constructor(readonly schedule: Schedule) {
    this.timesNodes = collectNodes(schedule).filter(
      (node): node is TimesSchedule => node.kind === "times",
    );
  }

  /**
   * Evaluate at `time` and advance the counters. Evaluating the same time
   * point twice in a row returns the previous answer without counting again.
   */
  evaluate(time: TimePoint): boolean {
    const key = timePointKey(time);
    if (key === this.lastKey) return this.lastResult;

    const resolve: TimesResolver = (node, innerMatched) => {
      if (!innerMatched) return false;
      const seen = this.counts.get(node) ?? 0;
      this.counts.set(node, seen + 1);
      return seen < node.n;
    };

    const result = evaluateNode(this.schedule, time, resolve, new Map());
    this.lastKey = key;
    this.lastResult = result;
    return result;
  }

  /** Occurrences of the inner schedule counted so far by a `times` node. */
  occurrences(node: TimesSchedule): number {
    return this.counts.get(node) ?? 0;
  }

  hasTimesNodes(): boolean {
    return this.timesNodes.length > 0;
  }

  /** True when the tree has `times` nodes and every one has used up its count. */
  isExhausted(): boolean {
    if (this.timesNodes.length === 0) return false;
    return this.timesNodes.every((node) => this.occurrences(node) >= node.n);
  }

  /** An evaluator at the same point, whose counters then advance independently. */
  clone(): ScheduleEvaluator {
    const copy = new ScheduleEvaluator(this.schedule);
    for (const [node, count] of this.counts) {
      copy.counts.set(node, count);
    }
    copy.lastKey = this.lastKey;
    copy.lastResult = this.lastResult;
    return copy;
  }

  reset(): void {
    this.counts.clear();
    this.lastKey = null;
    this.lastResult = false;
  }
}
