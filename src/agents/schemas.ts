/**
 * POKE ARENA - Zod Schemas
 *
 * Runtime validation schemas for everything the engine accepts from its
 * collaborators (battle snapshots, price/heal tables, actions).
 * These enforce correctness at the boundary between the game loop and the
 * decision engine. Unknown keys are stripped, so callers may decorate
 * snapshots with rendering data without affecting decisions.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Enums / Primitives
// ---------------------------------------------------------------------------

export const ElementTypeSchema = z.enum(['Fire', 'Water', 'Electric']);
export type ElementType = z.infer<typeof ElementTypeSchema>;

export const SideIdSchema = z.enum(['ASH', 'ROCKET']);
export type SideId = z.infer<typeof SideIdSchema>;

export const ElixirTierSchema = z.enum(['Small', 'Medium', 'Large']);
export type ElixirTier = z.infer<typeof ElixirTierSchema>;

const CountSchema = z.number().int().nonnegative();

// ---------------------------------------------------------------------------
// Combatant - One Pokemon in a roster
// ---------------------------------------------------------------------------

export const CombatantSchema = z
  .object({
    species: z.string().min(1),
    type: ElementTypeSchema,
    hp: z.number(),
    maxHp: z.number().positive(),
    attack: z.number().nonnegative(),
    defense: z.number().nonnegative(),
  })
  // HP clamps to [0, maxHp] instead of rejecting
  .transform(c => ({ ...c, hp: Math.min(c.maxHp, Math.max(0, c.hp)) }));
export type Combatant = z.infer<typeof CombatantSchema>;

// ---------------------------------------------------------------------------
// Roster + Resources - One side's team and inventory
// ---------------------------------------------------------------------------

export const RosterSchema = z.object({
  combatants: z.array(CombatantSchema),
  activeIndex: CountSchema,
});
export type Roster = z.infer<typeof RosterSchema>;

export const ElixirCountsSchema = z.object({
  Small: CountSchema.default(0),
  Medium: CountSchema.default(0),
  Large: CountSchema.default(0),
});
export type ElixirCounts = z.infer<typeof ElixirCountsSchema>;

export const ResourcesSchema = z.object({
  elixirs: ElixirCountsSchema,
  coins: CountSchema.default(0),
  fuel: CountSchema.default(0),
});
export type Resources = z.infer<typeof ResourcesSchema>;

export const SideStateSchema = z.object({
  roster: RosterSchema,
  resources: ResourcesSchema,
  /** Set by DEFEND; halves incoming attacks until this side acts again. */
  defending: z.boolean().default(false),
});
export type SideState = z.infer<typeof SideStateSchema>;

// ---------------------------------------------------------------------------
// BattleSnapshot - The sole battle input to the engine
// ---------------------------------------------------------------------------

export const BattleSnapshotSchema = z.object({
  sides: z.object({
    ASH: SideStateSchema,
    ROCKET: SideStateSchema,
  }),
  fieldType: ElementTypeSchema,
  /** Side whose ply it is. Search overrides this at the root. */
  toMove: SideIdSchema.default('ASH'),
  /** Real battle turns resolved so far. */
  turn: CountSchema.default(0),
});
export type BattleSnapshot = z.infer<typeof BattleSnapshotSchema>;
export type BattleSnapshotInput = z.input<typeof BattleSnapshotSchema>;

// ---------------------------------------------------------------------------
// Action - What one side does in one ply
// ---------------------------------------------------------------------------

export const ActionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ATTACK') }),
  z.object({ kind: z.literal('DEFEND') }),
  z.object({ kind: z.literal('HEAL'), tier: ElixirTierSchema }),
  z.object({ kind: z.literal('SWAP'), target: CountSchema }),
]);
export type Action = z.infer<typeof ActionSchema>;
export type ActionKind = Action['kind'];

// ---------------------------------------------------------------------------
// Advice - Fuzzy advisor output
// ---------------------------------------------------------------------------

export const AdviceSchema = z.object({
  HEAL: z.number().min(0).max(1),
  SWAP: z.number().min(0).max(1),
});
export type Advice = z.infer<typeof AdviceSchema>;
export type AdvisedAction = keyof Advice;

// ---------------------------------------------------------------------------
// Shop tables
// ---------------------------------------------------------------------------

export const PriceTableSchema = z.object({
  Small: z.number().int().positive(),
  Medium: z.number().int().positive(),
  Large: z.number().int().positive(),
});
export type PriceTable = z.infer<typeof PriceTableSchema>;

export const HealTableSchema = z.object({
  Small: z.number().nonnegative(),
  Medium: z.number().nonnegative(),
  Large: z.number().nonnegative(),
});
export type HealTable = z.infer<typeof HealTableSchema>;

/** Elixirs to buy per tier. */
export type PurchasePlan = ElixirCounts;
