/**
 * src/extractors/convergence.ts
 *
 * Convergence detection for "reveal more" listings.
 *
 *   Growing ──same count──▶ Stalled ──same count──▶ Converged
 *      ▲                       │
 *      └──────new count────────┘
 *
 * A count equal to the previous one twice in a row means the listing has
 * stopped growing. Other stop conditions (no control, deadline, …) jump
 * straight to Converged through `halt()`.
 */

export type StopReason =
    | 'stable'
    | 'no-control'
    | 'empty-listing'
    | 'page-not-ready'
    | 'click-failed'
    | 'driver-error'
    | 'deadline'
    | 'iteration-cap';

export type ConvergenceState =
    | { phase: 'growing'; count: number }
    | { phase: 'stalled'; count: number }
    | { phase: 'converged'; count: number; reason: StopReason };

export type ConvergedState = Extract<ConvergenceState, { phase: 'converged' }>;

export const INITIAL_CONVERGENCE: ConvergenceState = { phase: 'growing', count: -1 };

/** Feed the latest visible-row count into the state machine. */
export function observeRowCount(state: ConvergenceState, count: number): ConvergenceState {
    if (state.phase === 'converged') return state;
    if (count !== state.count) return { phase: 'growing', count };
    if (state.phase === 'stalled') return { phase: 'converged', count, reason: 'stable' };
    return { phase: 'stalled', count };
}

export function halt(state: ConvergenceState, reason: StopReason): ConvergedState {
    if (state.phase === 'converged') return state;
    return { phase: 'converged', count: Math.max(0, state.count), reason };
}
