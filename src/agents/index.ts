/**
 * POKE ARENA - Agent Module
 *
 * Trainer façades, starting rosters and the boundary schemas.
 */

// ---------------------------------------------------------------------------
// Zod schemas + inferred types (single source of truth)
// ---------------------------------------------------------------------------
export {
  ElementTypeSchema,
  SideIdSchema,
  ElixirTierSchema,
  CombatantSchema,
  RosterSchema,
  ElixirCountsSchema,
  ResourcesSchema,
  SideStateSchema,
  BattleSnapshotSchema,
  ActionSchema,
  AdviceSchema,
  PriceTableSchema,
  HealTableSchema,
} from './schemas';

export type {
  ElementType,
  SideId,
  ElixirTier,
  Combatant,
  Roster,
  ElixirCounts,
  Resources,
  SideState,
  BattleSnapshot,
  BattleSnapshotInput,
  Action,
  ActionKind,
  Advice,
  AdvisedAction,
  PriceTable,
  HealTable,
  PurchasePlan,
} from './schemas';

// ---------------------------------------------------------------------------
// Rosters
// ---------------------------------------------------------------------------
export { BASE_STATS, SIDE_SPECIES, buildRoster, createCombatant, speciesNames } from './rosters';
export type { SpeciesEntry } from './rosters';

// ---------------------------------------------------------------------------
// Trainer façade
// ---------------------------------------------------------------------------
export { TrainerAgent } from './trainer-agent';
export type { CatchTickResult, TrainerOptions } from './trainer-agent';
