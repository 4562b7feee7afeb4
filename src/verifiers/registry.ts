import { ConfigurationError } from "../errors.js";
import type { TaskKind } from "../graph/types.js";
import type { Verifier } from "./verifier.js";

/** Routes tasks to verifiers by kind. */
export class VerifierRegistry {
  private verifiers = new Map<string, Verifier>();

  add(verifier: Verifier): void {
    if (this.verifiers.has(verifier.name)) {
      throw new ConfigurationError("DUPLICATE_REGISTRATION", `Verifier "${verifier.name}" already registered`);
    }
    this.verifiers.set(verifier.name, verifier);
  }

  remove(name: string): boolean {
    return this.verifiers.delete(name);
  }

  get(name: string): Verifier | undefined {
    return this.verifiers.get(name);
  }

  list(): Verifier[] {
    return [...this.verifiers.values()];
  }

  names(): string[] {
    return [...this.verifiers.keys()];
  }

  /** Verifiers that declare the kind explicitly. */
  forKind(kind: TaskKind): Verifier[] {
    return this.list().filter((v) => v.kinds?.includes(kind));
  }

  /**
   * A verifier declaring the kind, else the first one that accepts any kind,
   * else nothing.
   */
  pick(kind: TaskKind): Verifier | undefined {
    return this.forKind(kind)[0] ?? this.list().find((v) => !v.kinds || v.kinds.length === 0);
  }
}
