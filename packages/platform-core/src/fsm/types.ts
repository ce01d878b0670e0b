/**
 * ## FSM Types
 *
 * A lifecycle is declared once as a map of `state → allowed next states`.
 * Deciders ask the machine before they emit anything, so an illegal step
 * (selling an item that never received a bid) is rejected up front instead
 * of being discovered in the counters later.
 *
 * | Type | Purpose |
 * |------|---------|
 * | `FSMDefinition<TState>` | Initial state + transition map |
 * | `FSM<TState>` | Compiled machine with query helpers |
 */

/**
 * Declarative machine description.
 *
 * A state mapped to an empty list is terminal.
 */
export interface FSMDefinition<TState extends string> {
  initial: TState;
  transitions: Record<TState, readonly TState[]>;
}

/**
 * Compiled machine returned by `defineFSM()`.
 */
export interface FSM<TState extends string> {
  readonly definition: FSMDefinition<TState>;
  readonly initial: TState;

  canTransition(from: TState, to: TState): boolean;

  validTransitions(from: TState): readonly TState[];

  isTerminal(state: TState): boolean;

  isValidState(state: string): state is TState;

  /**
   * Number of steps from the initial state (initial = 0, unreachable = -1).
   * Lets callers ask "has this entity gone past X?".
   */
  rank(state: TState): number;
}
