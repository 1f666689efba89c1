import type { LayoutError } from "#checker";
import type { Packedness, Type } from "#types";

import type { Derived } from "./derived.js";

export enum State {
  Undeclared = "undeclared",
  Classifying = "classifying",
  Classified = "classified",
  Resolving = "resolving",
  Resolved = "resolved",
  Rejected = "rejected",
}

export type Entry =
  | { state: State.Classifying; type: Type.Composite }
  | { state: State.Classified; type: Type.Composite; packedness: Packedness }
  | { state: State.Resolving; type: Type.Composite; packedness: Packedness }
  | { state: State.Resolved; type: Type.Composite; derived: Derived }
  | { state: State.Rejected; type: Type.Composite; errors: LayoutError[] };

const transitions: Record<State, readonly State[]> = {
  [State.Undeclared]: [State.Classifying],
  [State.Classifying]: [State.Classified, State.Rejected],
  [State.Classified]: [State.Resolving],
  [State.Resolving]: [State.Resolved, State.Rejected],
  [State.Resolved]: [],
  [State.Rejected]: [],
};

/**
 * Derivation state of every type, by name.
 *
 * Append-only: a type enters once and moves forward through its states;
 * resolved and rejected types never change again.
 */
export class Registry {
  private readonly entries = new Map<string, Entry>();
  private readonly order: string[] = [];

  state(name: string): State {
    return this.entries.get(name)?.state ?? State.Undeclared;
  }

  get(name: string): Entry | undefined {
    return this.entries.get(name);
  }

  /**
   * Moves a type to its next state
   *
   * @throws Error when the move is not allowed
   */
  advance(name: string, entry: Entry): void {
    const from = this.state(name);
    if (!transitions[from].includes(entry.state)) {
      throw new Error(
        `Type \`${name}\` cannot move from ${from} to ${entry.state}`,
      );
    }
    if (entry.state === State.Resolved) {
      this.order.push(name);
    }
    this.entries.set(name, entry);
  }

  derived(name: string): Derived | undefined {
    const entry = this.entries.get(name);
    return entry?.state === State.Resolved ? entry.derived : undefined;
  }

  /**
   * Resolved types, dependencies before dependents
   */
  resolved(): Derived[] {
    return this.order.flatMap((name) => {
      const derived = this.derived(name);
      return derived ? [derived] : [];
    });
  }

  rejected(): Map<string, LayoutError[]> {
    const rejected = new Map<string, LayoutError[]>();
    for (const [name, entry] of this.entries) {
      if (entry.state === State.Rejected) {
        rejected.set(name, entry.errors);
      }
    }
    return rejected;
  }
}
