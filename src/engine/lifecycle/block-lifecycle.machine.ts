/**
 * Block lifecycle as a robot3 machine.
 *
 * The machine is the single declaration of which state changes a block may
 * make. The engine owns timers and positions; it asks the machine for the
 * next state and treats a refused event as an invariant violation.
 *
 * robot3 notes:
 * - state(...transitions) declares a state; state() with no transitions is final
 * - interpret(machine, onChange) runs a service; onChange fires only on a change
 * - one machine is kept per starting state, services are created per query
 */

import { createMachine, interpret, state, transition } from "robot3";

import type { BlockState } from "../core/types";
import type {
  Machine,
  MachineState,
  MachineStates,
  Service,
  Transition,
} from "robot3";

// Final state: the block leaves the arena and the grid
export type LifecycleState = BlockState | "Destroyed";

export type LifecycleEvent =
  | "SPAWN_SETTLED"
  | "SUPPORT_LOST"
  | "SUPPORT_RETURNED"
  | "PREPARE_ELAPSED"
  | "HOVER_ELAPSED"
  | "LANDED"
  | "SETTLED"
  | "SWAP_REQUESTED"
  | "SWAP_STARTED"
  | "SWAP_FINISHED"
  | "MATCHED"
  | "TELEGRAPH_ELAPSED"
  | "DESPAWN_ELAPSED";

type LifecycleContext = Record<string, never>;
type LifecycleStatesObject = Record<LifecycleState, MachineState<LifecycleEvent>>;
export type LifecycleMachine = Machine<
  LifecycleStatesObject,
  LifecycleContext,
  LifecycleState,
  LifecycleEvent
>;
type LifecycleService = Service<LifecycleMachine>;

const spawningState = (): MachineState<LifecycleEvent> =>
  state(transition("SPAWN_SETTLED", "Fixed"));

const fixedState = (): MachineState<LifecycleEvent> =>
  state<Transition<LifecycleEvent>>(
    transition("SUPPORT_LOST", "FloatingPrepare"),
    transition("SWAP_REQUESTED", "Move"),
    transition("MATCHED", "Matched"),
  );

// The only state a fall can be called off from
const floatingPrepareState = (): MachineState<LifecycleEvent> =>
  state<Transition<LifecycleEvent>>(
    transition("SUPPORT_RETURNED", "Fixed"),
    transition("PREPARE_ELAPSED", "Floating"),
  );

const floatingState = (): MachineState<LifecycleEvent> =>
  state(transition("HOVER_ELAPSED", "Fall"));

const fallState = (): MachineState<LifecycleEvent> =>
  state(transition("LANDED", "FixedPrepare"));

const fixedPrepareState = (): MachineState<LifecycleEvent> =>
  state(transition("SETTLED", "Fixed"));

const moveState = (): MachineState<LifecycleEvent> =>
  state(transition("SWAP_STARTED", "Moving"));

const movingState = (): MachineState<LifecycleEvent> =>
  state(transition("SWAP_FINISHED", "Fixed"));

const matchedState = (): MachineState<LifecycleEvent> =>
  state(transition("TELEGRAPH_ELAPSED", "Despawning"));

const despawningState = (): MachineState<LifecycleEvent> =>
  state(transition("DESPAWN_ELAPSED", "Destroyed"));

export const createLifecycleMachine = (
  initial: LifecycleState,
): LifecycleMachine => {
  const states = {
    Despawning: despawningState(),
    Destroyed: state(),
    Fall: fallState(),
    Fixed: fixedState(),
    FixedPrepare: fixedPrepareState(),
    FloatingPrepare: floatingPrepareState(),
    Floating: floatingState(),
    Matched: matchedState(),
    Move: moveState(),
    Moving: movingState(),
    Spawning: spawningState(),
  } as const;

  // robot3's return type widens the event type to string; cast back to the
  // precise machine type at this boundary.
  return createMachine(
    initial,
    states as unknown as MachineStates<LifecycleStatesObject, LifecycleEvent>,
    (): LifecycleContext => ({}),
  ) as unknown as LifecycleMachine;
};

const machines = new Map<LifecycleState, LifecycleMachine>();

function machineFor(from: LifecycleState): LifecycleMachine {
  const cached = machines.get(from);
  if (cached !== undefined) return cached;
  const machine = createLifecycleMachine(from);
  machines.set(from, machine);
  return machine;
}

/**
 * Runs `event` through the machine starting at `from` and returns the state
 * reached. Throws when the machine has no such edge.
 */
export function nextLifecycleState(
  from: BlockState,
  event: LifecycleEvent,
): LifecycleState {
  const seen: { state: LifecycleState | null } = { state: null };
  const service: LifecycleService = interpret(machineFor(from), (s) => {
    seen.state = s.machine.state.name;
  });
  service.send({ type: event });
  if (seen.state === null) {
    throw new Error(`Illegal lifecycle transition: ${event} from ${from}`);
  }
  return seen.state;
}
