/**
 * ## defineFSM - Lifecycle Machine Factory
 *
 * Compiles an `FSMDefinition` into an `FSM` whose lookups are O(1): the
 * state set and the step distance of every state are computed once here.
 *
 * @example
 * ```typescript
 * type Stage = "minted" | "ready" | "bidded";
 *
 * const stageFSM = defineFSM<Stage>({
 *   initial: "minted",
 *   transitions: { minted: ["ready"], ready: ["bidded"], bidded: [] },
 * });
 *
 * stageFSM.canTransition("minted", "bidded"); // false
 * stageFSM.rank("bidded"); // 2
 * ```
 */

import type { FSM, FSMDefinition } from "./types.js";

function computeRanks<TState extends string>(definition: FSMDefinition<TState>): Map<TState, number> {
  const ranks = new Map<TState, number>([[definition.initial, 0]]);
  const queue: TState[] = [definition.initial];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    const currentRank = ranks.get(current) ?? 0;
    for (const next of definition.transitions[current] ?? []) {
      if (!ranks.has(next)) {
        ranks.set(next, currentRank + 1);
        queue.push(next);
      }
    }
  }

  return ranks;
}

export function defineFSM<TState extends string>(definition: FSMDefinition<TState>): FSM<TState> {
  const states = new Set<string>(Object.keys(definition.transitions));
  const ranks = computeRanks(definition);

  const allowedFrom = (from: TState): readonly TState[] => definition.transitions[from] ?? [];

  return {
    definition,
    initial: definition.initial,

    canTransition(from, to) {
      return allowedFrom(from).includes(to);
    },

    validTransitions(from) {
      return allowedFrom(from);
    },

    isTerminal(state) {
      return allowedFrom(state).length === 0;
    },

    isValidState(state: string): state is TState {
      return states.has(state);
    },

    rank(state) {
      return ranks.get(state) ?? -1;
    },
  };
}
