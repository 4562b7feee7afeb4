import { ConfigurationError, CycleDetectedError, UnknownDependencyError } from "../errors.js";
import type { TaskDeclaration, TaskDeclarations, TaskNode } from "./types.js";

function isDeclarationList(declarations: TaskDeclarations): declarations is readonly TaskDeclaration[] {
  return Array.isArray(declarations);
}

function normalize(declarations: TaskDeclarations): TaskDeclaration[] {
  if (isDeclarationList(declarations)) return [...declarations];
  return Object.entries(declarations).map(([id, deps]) => ({ id, dependsOn: [...deps] }));
}

/**
 * Validated dependency graph. Nodes live in an array in declaration order and
 * refer to each other by index; ids are resolved once, at build time.
 */
export class TaskGraph {
  private readonly nodes: readonly TaskNode[];
  private readonly byId: ReadonlyMap<string, number>;
  private readonly dependents: readonly (readonly number[])[];

  private constructor(nodes: TaskNode[], byId: Map<string, number>) {
    this.nodes = nodes;
    this.byId = byId;

    const dependents: number[][] = nodes.map(() => []);
    for (const node of nodes) {
      for (const dep of node.dependsOn) dependents[dep].push(node.index);
    }
    this.dependents = dependents;
  }

  /** Build a graph from declarations; rejects unknown dependencies and cycles. */
  static build(declarations: TaskDeclarations): TaskGraph {
    const decls = normalize(declarations);
    const byId = new Map<string, number>();

    decls.forEach((decl, index) => {
      if (byId.has(decl.id)) {
        throw new ConfigurationError("DUPLICATE_TASK", `Task "${decl.id}" is declared more than once`);
      }
      byId.set(decl.id, index);
    });

    const nodes = decls.map((decl, index): TaskNode => {
      const dependsOn = decl.dependsOn.map((dep) => {
        const depIndex = byId.get(dep);
        if (depIndex === undefined) throw new UnknownDependencyError(decl.id, dep);
        return depIndex;
      });
      return {
        index,
        id: decl.id,
        kind: decl.kind ?? "test-harness",
        target: decl.target ?? decl.id,
        timeoutSeconds: decl.timeoutSeconds,
        dependsOn: [...new Set(dependsOn)],
      };
    });

    const cycle = findCycle(nodes);
    if (cycle) throw new CycleDetectedError(cycle.map((i) => nodes[i].id));

    return new TaskGraph(nodes, byId);
  }

  get size(): number {
    return this.nodes.length;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** Task ids in declaration order. */
  ids(): string[] {
    return this.nodes.map((n) => n.id);
  }

  node(index: number): TaskNode {
    const node = this.nodes[index];
    if (!node) throw new RangeError(`No task at index ${index}`);
    return node;
  }

  get(id: string): TaskNode | undefined {
    const index = this.byId.get(id);
    return index === undefined ? undefined : this.nodes[index];
  }

  indexOf(id: string): number {
    const index = this.byId.get(id);
    if (index === undefined) throw new ConfigurationError("UNKNOWN_TASK", `Unknown task "${id}"`);
    return index;
  }

  /** Indices of the tasks that list `index` as a direct dependency. */
  dependentsOf(index: number): readonly number[] {
    return this.dependents[index] ?? [];
  }

  dependencyIds(index: number): string[] {
    return this.node(index).dependsOn.map((d) => this.nodes[d].id);
  }

  /**
   * The requested tasks plus everything they transitively depend on, as a
   * set of indices. Throws `UNKNOWN_TASK` for an undeclared name.
   */
  transitiveClosure(names: Iterable<string>): Set<number> {
    const closure = new Set<number>();
    const stack: number[] = [];
    for (const name of names) stack.push(this.indexOf(name));

    while (stack.length > 0) {
      const index = stack.pop();
      if (index === undefined || closure.has(index)) continue;
      closure.add(index);
      for (const dep of this.nodes[index].dependsOn) {
        if (!closure.has(dep)) stack.push(dep);
      }
    }
    return closure;
  }
}

const WHITE = 0, GRAY = 1, BLACK = 2;

/** Three-colour DFS over dependency edges; returns the first cycle found, closed on its start. */
function findCycle(nodes: readonly TaskNode[]): number[] | undefined {
  const color = new Array<number>(nodes.length).fill(WHITE);
  const path: number[] = [];

  function dfs(index: number): number[] | undefined {
    color[index] = GRAY;
    path.push(index);
    for (const dep of nodes[index].dependsOn) {
      if (color[dep] === GRAY) {
        // back edge
        return [...path.slice(path.indexOf(dep)), dep];
      }
      if (color[dep] === WHITE) {
        const found = dfs(dep);
        if (found) return found;
      }
    }
    path.pop();
    color[index] = BLACK;
    return undefined;
  }

  for (const node of nodes) {
    if (color[node.index] !== WHITE) continue;
    const found = dfs(node.index);
    if (found) return found;
  }
  return undefined;
}
