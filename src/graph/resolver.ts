import { AggregationInconsistencyError } from "../errors.js";
import type { TaskGraph } from "./task-graph.js";

/** Insert into an ascending array, keeping it sorted. */
export function insertSorted(list: number[], value: number): void {
  let lo = 0, hi = list.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (list[mid] < value) lo = mid + 1;
    else hi = mid;
  }
  list.splice(lo, 0, value);
}

/**
 * Topological ordering over a subset of a validated graph. Dependencies that
 * fall outside the subset are ignored.
 */
export class DependencyResolver {
  constructor(private readonly graph: TaskGraph) {}

  /**
   * Dependencies first. Each step takes the earliest-declared task whose
   * in-set dependencies have all been placed.
   */
  order(taskSet: ReadonlySet<number>): number[] {
    const remaining = this.inDegrees(taskSet);
    const available = [...taskSet].filter((i) => remaining.get(i) === 0).sort((a, b) => a - b);
    const ordered: number[] = [];

    for (let index = available.shift(); index !== undefined; index = available.shift()) {
      ordered.push(index);
      for (const dependent of this.graph.dependentsOf(index)) {
        const count = remaining.get(dependent);
        if (count === undefined) continue;
        remaining.set(dependent, count - 1);
        if (count === 1) insertSorted(available, dependent);
      }
    }

    this.assertComplete(ordered.length, taskSet.size);
    return ordered;
  }

  /**
   * The same set grouped into waves: every task in a wave depends only on
   * tasks in earlier waves. Within a wave, tasks keep declaration order.
   */
  levels(taskSet: ReadonlySet<number>): number[][] {
    const remaining = this.inDegrees(taskSet);
    let wave = [...taskSet].filter((i) => remaining.get(i) === 0).sort((a, b) => a - b);
    const levels: number[][] = [];
    let placed = 0;

    while (wave.length > 0) {
      levels.push(wave);
      placed += wave.length;
      const next: number[] = [];
      for (const index of wave) {
        for (const dependent of this.graph.dependentsOf(index)) {
          const count = remaining.get(dependent);
          if (count === undefined) continue;
          remaining.set(dependent, count - 1);
          if (count === 1) next.push(dependent);
        }
      }
      wave = next.sort((a, b) => a - b);
    }

    this.assertComplete(placed, taskSet.size);
    return levels;
  }

  /** Order the closure of the requested ids, returned as ids. */
  resolve(names: Iterable<string>): string[] {
    return this.order(this.graph.transitiveClosure(names)).map((i) => this.graph.node(i).id);
  }

  private inDegrees(taskSet: ReadonlySet<number>): Map<number, number> {
    const remaining = new Map<number, number>();
    for (const index of taskSet) {
      remaining.set(index, this.graph.node(index).dependsOn.filter((d) => taskSet.has(d)).length);
    }
    return remaining;
  }

  // Cycles were rejected when the graph was built.
  private assertComplete(placed: number, total: number): void {
    if (placed !== total) {
      throw new AggregationInconsistencyError(`Ordered ${placed} of ${total} tasks`);
    }
  }
}
