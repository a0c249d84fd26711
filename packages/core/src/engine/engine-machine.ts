/**
 * engine-machine.ts: xstate v5 machine for the engine's run status.
 *
 * Tracks running/stopped, counts restarts and explicit resets, and keeps the last stop
 * reason. The engine's step() drives flow; this machine records where it stands so the
 * status survives a checkpoint.
 */

import { setup, assign } from "xstate";
import type { StopReason } from "../convergence/monitor.js";

export type EngineStatus = "running" | "stopped";

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------
interface EngineContext {
  /** Status requested at startup (used by init state routing only). */
  initialStatus: EngineStatus;
  restarts: number;
  resets: number;
  stopReason: StopReason | null;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------
type EngineEvent =
  | { type: "STOP"; reason: StopReason }
  | { type: "RESTART" }
  | { type: "RESET" };

// ---------------------------------------------------------------------------
// Input (restores a checkpointed status)
// ---------------------------------------------------------------------------
export interface EngineMachineInput {
  status?: EngineStatus;
  restarts?: number;
  resets?: number;
  stopReason?: StopReason | null;
}

export const engineMachine = setup({
  types: {
    context: {} as EngineContext,
    events: {} as EngineEvent,
    input: {} as EngineMachineInput,
  },
  guards: {
    isInitialStopped: ({ context }) => context.initialStatus === "stopped",
  },
  actions: {
    incrementRestarts: assign({
      restarts: ({ context }) => context.restarts + 1,
    }),
    recordReset: assign({
      resets: ({ context }) => context.resets + 1,
      stopReason: null,
    }),
    setStopReason: assign({
      stopReason: ({ event }) => (event.type === "STOP" ? event.reason : null),
    }),
  },
}).createMachine({
  id: "engine",
  context: ({ input }) => ({
    initialStatus: input?.status ?? "running",
    restarts: input?.restarts ?? 0,
    resets: input?.resets ?? 0,
    stopReason: input?.stopReason ?? null,
  }),
  initial: "init",
  states: {
    // Transient routing state: immediately transitions to the restored status
    init: {
      always: [
        { target: "stopped", guard: "isInitialStopped" },
        { target: "running" },
      ],
    },

    running: {
      on: {
        STOP: { target: "stopped", actions: "setStopReason" },
        RESTART: { target: "restarting" },
        RESET: { target: "running", reenter: true, actions: "recordReset" },
      },
    },

    // Archive-and-reset happened; the step continues in a fresh experiment
    restarting: {
      entry: "incrementRestarts",
      always: { target: "running" },
    },

    stopped: {
      on: {
        RESET: { target: "running", actions: "recordReset" },
      },
    },
  },
});
