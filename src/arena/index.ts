/**
 * POKE ARENA - Arena Module
 *
 * Catching grid, pathfinding, battle model, advisor, search, shop, turn
 * resolution and the match driver.
 */

// Match driver (lifecycle)
export { MatchManager, createMatch, decideWinner, startCells } from './match';
export type { MatchEvent, MatchEndReason, MatchOptions, MatchState, MatchWinner } from './match';

// Phases
export { PHASE_ORDER, battleSeconds, canTransition, computePhaseSchedule, nextPhase, phaseBudget } from './phases';
export type { ArenaPhase, PhaseEntry } from './phases';

// Catching grid
export {
  DIRECTION_LIST,
  DIRECTION_OFFSETS,
  cellEquals,
  cellKey,
  createGrid,
  generateObstacleGrid,
  getNeighbors,
  inBounds,
  isPassable,
  manhattan,
  nearestTarget,
  randomSpawnCell,
  renderGrid,
  spawnCatchTargets,
} from './grid';
export type { Cell, CatchTarget, Direction, GridState, PathResult } from './types/grid';

// Pathfinding
export { findPath, pathLength } from './pathfinder';

// Battle model
export {
  SIDES,
  actionEquals,
  activeCombatant,
  aliveCount,
  applyAction,
  describeAction,
  hpRatio,
  isBattleOver,
  isDefeated,
  isLegal,
  legalActions,
  otherSide,
  parseSnapshot,
  totalHp,
} from './battle-state';
export { expectedDamage, hasTypeAdvantage, rawDamage, rollDamage } from './damage';

// Fuzzy advisor
export { FUZZY_RULES, HIGH_THRESHOLD, LOW_THRESHOLD, NO_ADVICE, advise, evaluateRules, extractFacts, hpBand } from './fuzzy';
export type { FuzzyFacts, FuzzyRule, HpBand } from './fuzzy';

// Adversarial search
export { NO_OP, branchBias, decide, evaluate } from './search';
export type { SearchConfig, SearchOptions, SearchResult } from './search';

// Shop
export { emptyPlan, planCost, planHealing, planPurchases, rankTiers } from './shop';

// Turn resolution
export { resolveTurn } from './combat';
export type { TurnActions, TurnEvent, TurnResolution } from './combat';

// Randomness
export { createRng, defaultRandom, hashSeed, pickOne, randomInt, randomRange } from './rng';
export type { RandomSource } from './rng';

// Errors
export { EmptyRosterError, EngineError, IllegalActionError } from './errors';
export type { EngineErrorCode } from './errors';
