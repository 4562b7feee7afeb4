import { describe, expect, it } from "vitest";
import { DependencyResolver, insertSorted } from "../src/graph/resolver.js";
import { TaskGraph } from "../src/graph/task-graph.js";

const chain = TaskGraph.build({
  Types: [],
  Utils: ["Types"],
  Safety: ["Utils"],
  Liveness: ["Safety"],
  Resilience: ["Liveness"],
  Theorems: ["Resilience"],
});

function all(graph: TaskGraph): Set<number> {
  return new Set(graph.ids().map((id) => graph.indexOf(id)));
}

describe("DependencyResolver.order", () => {
  it("schedules only the closure of the request, dependencies first", () => {
    expect(new DependencyResolver(chain).resolve(["Safety"])).toEqual(["Types", "Utils", "Safety"]);
  });

  it("orders the whole chain", () => {
    expect(new DependencyResolver(chain).resolve(chain.ids())).toEqual([
      "Types",
      "Utils",
      "Safety",
      "Liveness",
      "Resilience",
      "Theorems",
    ]);
  });

  it("breaks ties by declaration order", () => {
    const graph = TaskGraph.build({ c: [], a: [], b: [], d: ["a", "c"] });
    expect(new DependencyResolver(graph).resolve(["d", "b"])).toEqual(["c", "a", "b", "d"]);
  });

  it("places a newly freed task by declaration position, not discovery time", () => {
    // "late" is declared before "b" but only becomes available after "a".
    const graph = TaskGraph.build([
      { id: "a", dependsOn: [] },
      { id: "late", dependsOn: ["a"] },
      { id: "b", dependsOn: [] },
    ]);
    expect(new DependencyResolver(graph).resolve(graph.ids())).toEqual(["a", "late", "b"]);
  });

  it("produces a valid linearisation of a diamond", () => {
    const graph = TaskGraph.build({ top: [], left: ["top"], right: ["top"], bottom: ["left", "right"] });
    const order = new DependencyResolver(graph).resolve(["bottom"]);

    expect(order).toEqual(["top", "left", "right", "bottom"]);
    for (const id of order) {
      const node = graph.get(id);
      for (const dep of node ? graph.dependencyIds(node.index) : []) {
        expect(order.indexOf(dep)).toBeLessThan(order.indexOf(id));
      }
    }
  });

  it("ignores dependencies outside the given set", () => {
    const resolver = new DependencyResolver(chain);
    expect(resolver.order(new Set([2, 3]))).toEqual([2, 3]);
  });

  it("returns nothing for an empty set", () => {
    expect(new DependencyResolver(chain).order(new Set())).toEqual([]);
  });
});

describe("DependencyResolver.levels", () => {
  it("groups tasks into waves", () => {
    const graph = TaskGraph.build({ a: [], b: [], c: ["a"], d: ["a", "b"], e: ["c", "d"] });
    const levels = new DependencyResolver(graph).levels(all(graph)).map((wave) => wave.map((i) => graph.node(i).id));
    expect(levels).toEqual([["a", "b"], ["c", "d"], ["e"]]);
  });

  it("puts a chain one task per wave", () => {
    expect(new DependencyResolver(chain).levels(new Set([0, 1, 2]))).toEqual([[0], [1], [2]]);
  });
});

describe("insertSorted", () => {
  it("keeps the array ascending", () => {
    const list = [1, 4, 9];
    insertSorted(list, 5);
    insertSorted(list, 0);
    insertSorted(list, 10);
    expect(list).toEqual([0, 1, 4, 5, 9, 10]);
  });
});
