/**
 * POKE ARENA - Match Manager
 *
 * Runs a full match between the two trainers, one tick at a time:
 *
 *   IDLE -> CATCHING -> SHOPPING -> BATTLING -> DONE
 *
 * The manager owns the grid, the battle snapshot and the match RNG. Trainers
 * own their own inventories and make every decision; the manager only
 * sequences them and resolves battle turns.
 *
 * Nothing here renders. Each tick returns a MatchEvent list for whatever
 * front end is attached (see scripts/run-match.ts).
 */

import { TrainerAgent, type CatchTickResult } from '../agents/trainer-agent';
import { speciesNames } from '../agents/rosters';
import {
  ElementTypeSchema,
  type Action,
  type BattleSnapshot,
  type ElementType,
  type PurchasePlan,
  type SideId,
} from '../agents/schemas';
import type { EngineConfig } from '../config/engine-config';
import { SIDES, isBattleOver, isDefeated, totalHp } from './battle-state';
import { resolveTurn, type TurnEvent } from './combat';
import { generateObstacleGrid, spawnCatchTargets } from './grid';
import { battleSeconds, phaseBudget, type ArenaPhase } from './phases';
import { createRng, pickOne, type RandomSource } from './rng';
import type { Cell, GridState } from './types/grid';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type MatchWinner = SideId | 'DRAW';

export type MatchEndReason = 'KNOCKOUT' | 'TIMEOUT';

export type MatchEvent =
  | { type: 'PHASE'; from: ArenaPhase; to: ArenaPhase }
  | { type: 'CATCH'; side: SideId; result: CatchTickResult }
  | { type: 'SHOP'; side: SideId; plan: PurchasePlan }
  | { type: 'DECISION'; side: SideId; action: Action; score: number }
  | { type: 'TURN'; turn: number; event: TurnEvent }
  | { type: 'RESULT'; winner: MatchWinner; reason: MatchEndReason };

export interface MatchOptions {
  /** Label used in logs. Defaults to `match-<seed>`. */
  id?: string;
  /** Suppress console output from the match and its trainers. */
  silent?: boolean;
}

/** Serializable view for front ends. */
export interface MatchState {
  matchId: string;
  seed: string;
  phase: ArenaPhase;
  phaseTick: number;
  paused: boolean;
  fieldType: ElementType;
  positions: Record<SideId, Cell>;
  caught: Record<SideId, string[]>;
  snapshot: BattleSnapshot | null;
  /** Game time spent battling, in seconds. */
  battleSeconds: number;
  winner: MatchWinner | null;
}

interface MatchWorld {
  rng: RandomSource;
  grid: GridState;
  fieldType: ElementType;
  trainers: Record<SideId, TrainerAgent>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Trainer start cells: ASH bottom-left, ROCKET top-right. */
export function startCells(config: Pick<EngineConfig, 'grid'>): Record<SideId, Cell> {
  const { rows, cols } = config.grid;
  return {
    ASH: { row: rows - 2, col: 1 },
    ROCKET: { row: 1, col: cols - 2 },
  };
}

/**
 * Winner of a finished battle. A side still standing beats a defeated one;
 * otherwise the higher total HP wins and equal HP is a draw.
 */
export function decideWinner(snapshot: BattleSnapshot): MatchWinner {
  const ashDown = isDefeated(snapshot.sides.ASH);
  const rocketDown = isDefeated(snapshot.sides.ROCKET);
  if (ashDown !== rocketDown) return ashDown ? 'ROCKET' : 'ASH';

  const ashHp = totalHp(snapshot.sides.ASH);
  const rocketHp = totalHp(snapshot.sides.ROCKET);
  if (ashHp > rocketHp) return 'ASH';
  if (rocketHp > ashHp) return 'ROCKET';
  return 'DRAW';
}

// ---------------------------------------------------------------------------
// MatchManager
// ---------------------------------------------------------------------------

export class MatchManager {
  public readonly matchId: string;
  public readonly config: EngineConfig;

  public seed: string;
  public phase: ArenaPhase = 'IDLE';
  /** Ticks spent in the current phase. */
  public phaseTick = 0;
  public paused = false;

  public snapshot: BattleSnapshot | null = null;
  public winner: MatchWinner | null = null;

  private world: MatchWorld;
  private readonly silent: boolean;

  constructor(config: EngineConfig, seed: string | number, options: MatchOptions = {}) {
    this.config = config;
    this.seed = String(seed);
    this.matchId = options.id ?? `match-${this.seed}`;
    this.silent = options.silent ?? false;
    this.world = this.buildWorld();
  }

  get grid(): GridState {
    return this.world.grid;
  }

  get fieldType(): ElementType {
    return this.world.fieldType;
  }

  get trainers(): Record<SideId, TrainerAgent> {
    return this.world.trainers;
  }

  private get rng(): RandomSource {
    return this.world.rng;
  }

  // -------------------------------------------------------------------------
  // Setup
  // -------------------------------------------------------------------------

  /** Grid, field and trainers for the current seed. Draw order is fixed per seed. */
  private buildWorld(): MatchWorld {
    const { rows, cols, obstacleDensity } = this.config.grid;
    const starts = startCells(this.config);

    const rng = createRng(this.seed);
    const grid = generateObstacleGrid(rows, cols, obstacleDensity, rng, [starts.ASH, starts.ROCKET]);
    const fieldType = pickOne(rng, ElementTypeSchema.options);

    const trainers: Record<SideId, TrainerAgent> = {
      ASH: new TrainerAgent('ASH', this.config, {
        start: starts.ASH,
        targets: spawnCatchTargets(speciesNames('ASH'), grid, rng),
        silent: this.silent,
      }),
      ROCKET: new TrainerAgent('ROCKET', this.config, {
        start: starts.ROCKET,
        targets: spawnCatchTargets(speciesNames('ROCKET'), grid, rng),
        silent: this.silent,
      }),
    };

    this.log(`Set up ${cols}x${rows} grid, ${grid.blocked.size} obstacles, field ${fieldType}`);
    return { rng, grid, fieldType, trainers };
  }

  // -------------------------------------------------------------------------
  // Operator controls
  // -------------------------------------------------------------------------

  pause(): void {
    if (this.phase === 'DONE') return;
    this.paused = true;
    this.log('Paused');
  }

  resume(): void {
    if (!this.paused) return;
    this.paused = false;
    this.log('Resumed');
  }

  /** Throw away all progress and set up again, on a new seed if given. */
  restart(seed?: string | number): void {
    if (seed !== undefined) this.seed = String(seed);
    this.log(`Restarting with seed ${this.seed}`);
    this.world = this.buildWorld();
    this.phase = 'IDLE';
    this.phaseTick = 0;
    this.snapshot = null;
    this.winner = null;
    this.paused = false;
  }

  // -------------------------------------------------------------------------
  // Ticking
  // -------------------------------------------------------------------------

  /** Advance one step of the current phase. A paused or finished match does nothing. */
  tick(): MatchEvent[] {
    const phase = this.phase;
    if (this.paused || phase === 'DONE') return [];

    switch (phase) {
      case 'IDLE':
        return this.transition('CATCHING');
      case 'CATCHING':
        return this.catchingTick();
      case 'SHOPPING':
        return this.shoppingTick();
      case 'BATTLING':
        return this.battleTick();
    }
  }

  /**
   * Tick until DONE. Throws if paused, since a paused match never finishes.
   */
  runToCompletion(): MatchWinner {
    if (this.paused) {
      throw new Error(`Cannot run match ${this.matchId}: match is paused`);
    }
    while (this.phase !== 'DONE') {
      this.tick();
    }
    if (this.winner === null) {
      throw new Error(`Match ${this.matchId} finished without a winner`);
    }
    return this.winner;
  }

  private transition(to: ArenaPhase): MatchEvent[] {
    const from = this.phase;
    for (const side of SIDES) {
      this.trainers[side].enterPhase(to);
    }
    this.phase = to;
    this.phaseTick = 0;
    this.log(`${from} -> ${to}`);
    return [{ type: 'PHASE', from, to }];
  }

  private catchingTick(): MatchEvent[] {
    const events: MatchEvent[] = SIDES.map(side => ({
      type: 'CATCH' as const,
      side,
      result: this.trainers[side].catchTick(this.grid),
    }));
    this.phaseTick += 1;

    const allCaught = SIDES.every(side => this.trainers[side].isCatchComplete());
    if (allCaught || this.phaseTick >= phaseBudget('CATCHING', this.config)) {
      events.push(...this.transition('SHOPPING'));
    }
    return events;
  }

  private shoppingTick(): MatchEvent[] {
    const events: MatchEvent[] = SIDES.map(side => ({
      type: 'SHOP' as const,
      side,
      plan: this.trainers[side].shop(),
    }));

    this.snapshot = {
      sides: {
        ASH: this.trainers.ASH.sideState(),
        ROCKET: this.trainers.ROCKET.sideState(),
      },
      fieldType: this.fieldType,
      toMove: 'ASH',
      turn: 0,
    };

    events.push(...this.transition('BATTLING'));
    return events;
  }

  private battleTick(): MatchEvent[] {
    const snapshot = this.snapshot;
    if (snapshot === null) {
      throw new Error(`Cannot run a battle tick: match ${this.matchId} has no battle snapshot`);
    }

    // Both decisions see the same snapshot
    const ash = this.trainers.ASH.battleTick(snapshot, this.rng);
    const rocket = this.trainers.ROCKET.battleTick(snapshot, this.rng);
    const events: MatchEvent[] = [
      { type: 'DECISION', side: 'ASH', action: ash.action, score: ash.score },
      { type: 'DECISION', side: 'ROCKET', action: rocket.action, score: rocket.score },
    ];

    const resolution = resolveTurn(snapshot, { ASH: ash.action, ROCKET: rocket.action }, this.config, this.rng);
    this.snapshot = resolution.snapshot;
    for (const side of SIDES) {
      this.trainers[side].absorb(resolution.snapshot);
    }
    for (const event of resolution.events) {
      events.push({ type: 'TURN', turn: resolution.snapshot.turn, event });
    }
    this.phaseTick += 1;

    const knockout = isBattleOver(resolution.snapshot);
    if (knockout || this.phaseTick >= phaseBudget('BATTLING', this.config)) {
      const winner = decideWinner(resolution.snapshot);
      const reason: MatchEndReason = knockout ? 'KNOCKOUT' : 'TIMEOUT';
      this.winner = winner;
      events.push(...this.transition('DONE'));
      events.push({ type: 'RESULT', winner, reason });
      const seconds = battleSeconds(resolution.snapshot.turn, this.config);
      this.log(`Winner: ${winner} (${reason}) after ${resolution.snapshot.turn} turns (${seconds.toFixed(1)}s)`);
    }
    return events;
  }

  // -------------------------------------------------------------------------
  // State
  // -------------------------------------------------------------------------

  getState(): MatchState {
    return {
      matchId: this.matchId,
      seed: this.seed,
      phase: this.phase,
      phaseTick: this.phaseTick,
      paused: this.paused,
      fieldType: this.fieldType,
      positions: { ASH: this.trainers.ASH.position, ROCKET: this.trainers.ROCKET.position },
      caught: { ASH: [...this.trainers.ASH.caught], ROCKET: [...this.trainers.ROCKET.caught] },
      snapshot: this.snapshot,
      battleSeconds: battleSeconds(this.snapshot?.turn ?? 0, this.config),
      winner: this.winner,
    };
  }

  private log(message: string): void {
    if (!this.silent) console.log(`[MATCH:${this.matchId}] ${message}`);
  }
}

/** Build a match for a config and seed. */
export function createMatch(config: EngineConfig, seed: string | number, options: MatchOptions = {}): MatchManager {
  return new MatchManager(config, seed, options);
}
