/**
 * POKE ARENA - Phase Schedule
 *
 * A match and each trainer in it move through the same phases:
 *   IDLE      -> Seated, nothing running yet.
 *   CATCHING  -> Trainers walk the grid and catch targets. Fuel gates catches.
 *   SHOPPING  -> One shop visit per trainer: coins become elixirs.
 *   BATTLING  -> One decision per tick until a side is defeated.
 *   DONE      -> Winner decided; every tick is a no-op.
 *
 * Tick budgets come from EngineConfig.timings:
 *   CATCHING  catchTicks  (default 240)
 *   SHOPPING  1
 *   BATTLING  battleTicks (default 185)
 *
 * Each battle tick stands for battle.decisionInterval seconds of game time.
 *
 * All functions are pure with no side effects.
 */

import type { EngineConfig } from '../config/engine-config';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ArenaPhase = 'IDLE' | 'CATCHING' | 'SHOPPING' | 'BATTLING' | 'DONE';

/** A timed phase within a match. */
export interface PhaseEntry {
  name: ArenaPhase;
  /** Most ticks the phase may run before the match moves on. */
  maxTicks: number;
}

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

/** All phase names in order. */
export const PHASE_ORDER: readonly ArenaPhase[] = ['IDLE', 'CATCHING', 'SHOPPING', 'BATTLING', 'DONE'];

/** The phase after `phase`. DONE is terminal. */
export function nextPhase(phase: ArenaPhase): ArenaPhase {
  const index = PHASE_ORDER.indexOf(phase);
  return PHASE_ORDER[Math.min(index + 1, PHASE_ORDER.length - 1)];
}

/**
 * Whether `from -> to` is a legal step. Only forward single steps are
 * allowed, plus skipping straight to DONE (a match can end early).
 */
export function canTransition(from: ArenaPhase, to: ArenaPhase): boolean {
  if (from === 'DONE') return false;
  if (to === 'DONE') return true;
  return nextPhase(from) === to;
}

// ---------------------------------------------------------------------------
// Schedule
// ---------------------------------------------------------------------------

/** Timed phases of a match, in order. */
export function computePhaseSchedule(config: Pick<EngineConfig, 'timings'>): PhaseEntry[] {
  return [
    { name: 'CATCHING', maxTicks: config.timings.catchTicks },
    { name: 'SHOPPING', maxTicks: 1 },
    { name: 'BATTLING', maxTicks: config.timings.battleTicks },
  ];
}

/**
 * Tick budget for a phase. IDLE and DONE have none.
 */
export function phaseBudget(phase: ArenaPhase, config: Pick<EngineConfig, 'timings'>): number {
  return computePhaseSchedule(config).find(p => p.name === phase)?.maxTicks ?? 0;
}

/** Game seconds elapsed after `turns` battle decision ticks. */
export function battleSeconds(turns: number, config: Pick<EngineConfig, 'battle'>): number {
  return turns * config.battle.decisionInterval;
}
