/**
 * POKE ARENA - Trainer Agent
 *
 * One façade per side. Holds everything a trainer owns across a match
 * (position, route, targets, fuel, coins, elixirs, roster) and exposes one
 * call per phase:
 *
 *   catchTick(grid)          CATCHING  walk toward the nearest target, catch it
 *   shop()                   SHOPPING  spend coins on elixirs, once
 *   battleTick(snapshot)     BATTLING  advise, then search, return an action
 *
 * Calling a phase method outside its phase throws. In DONE every tick is a
 * no-op.
 */

import type { EngineConfig } from '../config/engine-config';
import { cellEquals, nearestTarget } from '../arena/grid';
import { findPath } from '../arena/pathfinder';
import { canTransition, type ArenaPhase } from '../arena/phases';
import type { RandomSource } from '../arena/rng';
import { NO_OP, decide, type SearchResult } from '../arena/search';
import { advise } from '../arena/fuzzy';
import { describeAction, isDefeated } from '../arena/battle-state';
import { planCost, planPurchases } from '../arena/shop';
import type { Cell, CatchTarget, GridState } from '../arena/types/grid';
import { buildRoster } from './rosters';
import type {
  BattleSnapshot,
  ElixirCounts,
  PurchasePlan,
  Roster,
  SideId,
  SideState,
} from './schemas';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TrainerOptions {
  /** Starting cell on the catching grid. */
  start: Cell;
  /** Targets this trainer hunts, in spawn order. */
  targets: readonly CatchTarget[];
  /** Defaults to the side's standard roster. */
  roster?: Roster;
  /** Suppress console output (tests). */
  silent?: boolean;
}

/** Outcome of one catching tick. */
export type CatchTickResult =
  | { type: 'MOVED'; from: Cell; to: Cell }
  | { type: 'CAUGHT'; species: string; cell: Cell }
  | { type: 'WAITING'; reason: 'NO_FUEL'; species: string }
  | { type: 'BLOCKED'; species: string }
  | { type: 'IDLE' };

// ---------------------------------------------------------------------------
// TrainerAgent
// ---------------------------------------------------------------------------

export class TrainerAgent {
  public readonly side: SideId;
  public phase: ArenaPhase = 'IDLE';

  public position: Cell;
  public path: Cell[] = [];
  public pathIndex = 0;
  public readonly targets: readonly CatchTarget[];
  public readonly caught: string[] = [];

  public fuel: number;
  public coins: number;
  public elixirs: ElixirCounts = { Small: 0, Medium: 0, Large: 0 };
  public roster: Roster;

  private readonly config: EngineConfig;
  private readonly silent: boolean;
  private shopped = false;

  constructor(side: SideId, config: EngineConfig, options: TrainerOptions) {
    this.side = side;
    this.config = config;
    this.position = options.start;
    this.targets = options.targets;
    this.roster = options.roster ?? buildRoster(side);
    this.fuel = config.economy.startFuel;
    this.coins = config.economy.coinsPerSide;
    this.silent = options.silent ?? false;
  }

  // -------------------------------------------------------------------------
  // Phase control
  // -------------------------------------------------------------------------

  enterPhase(phase: ArenaPhase): void {
    if (!canTransition(this.phase, phase)) {
      throw new Error(`Cannot enter ${phase}: trainer ${this.side} is ${this.phase}`);
    }
    this.log(`${this.phase} -> ${phase}`);
    this.phase = phase;
    this.path = [];
    this.pathIndex = 0;
  }

  private requirePhase(expected: ArenaPhase, operation: string): void {
    if (this.phase !== expected) {
      throw new Error(`Cannot ${operation}: trainer ${this.side} is ${this.phase}, expected ${expected}`);
    }
  }

  // -------------------------------------------------------------------------
  // Catching
  // -------------------------------------------------------------------------

  remainingTargets(): CatchTarget[] {
    return this.targets.filter(t => !this.caught.includes(t.species));
  }

  isCatchComplete(): boolean {
    return this.remainingTargets().length === 0;
  }

  /** Whether a planned route still has steps left. */
  private hasRoute(): boolean {
    return this.path.length > 0 && this.pathIndex < this.path.length - 1;
  }

  /**
   * One movement tick. Plans a fresh A* route only when the current one is
   * used up, then steps one cell. Standing on the target, a catch costs
   * fuelPerCatch; without enough fuel the trainer waits.
   */
  catchTick(grid: GridState): CatchTickResult {
    if (this.phase === 'DONE') return { type: 'IDLE' };
    this.requirePhase('CATCHING', 'run a catching tick');

    if (!this.hasRoute()) {
      const target = nearestTarget(this.position, this.remainingTargets());
      if (target === null) return { type: 'IDLE' };

      if (cellEquals(target.cell, this.position)) {
        return this.tryCatch(target);
      }

      const result = findPath(grid, this.position, target.cell);
      if (!result.ok) {
        this.path = [];
        this.pathIndex = 0;
        this.warn(`No path to ${target.species} at (${target.cell.row},${target.cell.col}), holding`);
        return { type: 'BLOCKED', species: target.species };
      }
      this.path = result.path;
      this.pathIndex = 0;
    }

    const from = this.position;
    this.pathIndex += 1;
    this.position = this.path[this.pathIndex];
    return { type: 'MOVED', from, to: this.position };
  }

  private tryCatch(target: CatchTarget): CatchTickResult {
    const cost = this.config.economy.fuelPerCatch;
    if (this.fuel < cost) {
      return { type: 'WAITING', reason: 'NO_FUEL', species: target.species };
    }
    this.fuel -= cost;
    this.caught.push(target.species);
    this.path = [];
    this.pathIndex = 0;
    this.log(`Caught ${target.species} (fuel ${this.fuel})`);
    return { type: 'CAUGHT', species: target.species, cell: target.cell };
  }

  // -------------------------------------------------------------------------
  // Shopping
  // -------------------------------------------------------------------------

  /**
   * Buy elixirs with every coin the plan can use. The plan replaces the
   * current inventory. One visit per match.
   */
  shop(): PurchasePlan {
    this.requirePhase('SHOPPING', 'shop');
    if (this.shopped) {
      throw new Error(`Cannot shop: trainer ${this.side} already shopped`);
    }

    const { prices, heals } = this.config.economy;
    const plan = planPurchases(this.coins, prices, heals, this.config.shopStrategy);
    this.coins -= planCost(plan, prices);
    this.elixirs = { ...plan };
    this.shopped = true;

    this.log(`Bought S:${plan.Small} M:${plan.Medium} L:${plan.Large}, ${this.coins} coins left`);
    return plan;
  }

  // -------------------------------------------------------------------------
  // Battling
  // -------------------------------------------------------------------------

  /** This trainer's half of a battle snapshot. */
  sideState(): SideState {
    return {
      roster: {
        combatants: this.roster.combatants.map(c => ({ ...c })),
        activeIndex: this.roster.activeIndex,
      },
      resources: { elixirs: { ...this.elixirs }, coins: this.coins, fuel: this.fuel },
      defending: false,
    };
  }

  /** Take roster and elixirs back from a resolved snapshot. */
  absorb(snapshot: BattleSnapshot): void {
    const state = snapshot.sides[this.side];
    this.roster = {
      combatants: state.roster.combatants.map(c => ({ ...c })),
      activeIndex: state.roster.activeIndex,
    };
    this.elixirs = { ...state.resources.elixirs };
  }

  /**
   * One decision tick: fuzzy advice, then alpha-beta search. A defeated
   * side answers DEFEND without searching.
   */
  battleTick(snapshot: BattleSnapshot, rng?: RandomSource): SearchResult {
    if (this.phase === 'DONE') return idleResult();
    this.requirePhase('BATTLING', 'run a battle tick');

    if (isDefeated(snapshot.sides[this.side])) return idleResult();

    const advice = advise(snapshot, this.side, this.config);
    const result = decide(snapshot, this.side, this.config, { advice, rng });
    this.log(
      `${describeAction(result.action)} (score ${result.score.toFixed(1)}, ` +
      `${result.nodesVisited} nodes, heal ${advice.HEAL} swap ${advice.SWAP})`,
    );
    return result;
  }

  // -------------------------------------------------------------------------
  // Logging
  // -------------------------------------------------------------------------

  private log(message: string): void {
    if (!this.silent) console.log(`[TRAINER:${this.side}] ${message}`);
  }

  private warn(message: string): void {
    if (!this.silent) console.warn(`[TRAINER:${this.side}] ${message}`);
  }
}

function idleResult(): SearchResult {
  return { action: NO_OP, score: 0, candidates: [NO_OP], nodesVisited: 0, advice: { HEAL: 0, SWAP: 0 } };
}
