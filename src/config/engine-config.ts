/**
 * POKE ARENA - Engine Configuration
 *
 * One immutable configuration object is built per match and handed to the
 * trainers, the search and the match driver at construction. Nothing reads
 * these numbers from module-level globals at decision time.
 *
 * Defaults are the standard arena rules.
 */

import { z } from 'zod';
import {
  ElementTypeSchema,
  HealTableSchema,
  PriceTableSchema,
} from '../agents/schemas';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const GridConfigSchema = z.object({
  rows: z.number().int().min(3).default(11),
  cols: z.number().int().min(3).default(24),
  /** Chance that an interior cell is an obstacle. */
  obstacleDensity: z.number().min(0).max(1).default(0.08),
});

const EconomyConfigSchema = z.object({
  startFuel: z.number().int().nonnegative().default(45),
  fuelPerCatch: z.number().int().nonnegative().default(15),
  coinsPerSide: z.number().int().nonnegative().default(100),
  prices: PriceTableSchema.default({ Small: 15, Medium: 30, Large: 50 }),
  heals: HealTableSchema.default({ Small: 25, Medium: 50, Large: 80 }),
});

const BattleConfigSchema = z
  .object({
    /** Plies explored per decision. */
    searchDepth: z.number().int().min(1).max(6).default(3),
    /** Multiplier when the attacker's type beats the defender's. */
    typeAdvantage: z.number().positive().default(1.3),
    /** Multiplier when the attacker's type matches the field. */
    fieldBoost: z.number().positive().default(1.2),
    /** Minimum base damage before multipliers. */
    damageFloor: z.number().nonnegative().default(5),
    defendMultiplier: z.number().min(0).max(1).default(0.5),
    jitterMin: z.number().positive().default(0.8),
    jitterMax: z.number().positive().default(1.2),
    /** Evaluation weight per living combatant. */
    aliveWeight: z.number().default(30),
    /** Scale applied to fuzzy HEAL/SWAP weights in leaf evaluation. */
    fuzzyBiasScale: z.number().nonnegative().default(10),
    /** Seconds of game time between battle decision ticks. */
    decisionInterval: z.number().positive().default(0.7),
  })
  .refine(b => b.jitterMin <= b.jitterMax, {
    message: 'jitterMin must not exceed jitterMax',
  });

const TimingConfigSchema = z.object({
  /** Movement ticks before the catching phase ends regardless. */
  catchTicks: z.number().int().positive().default(240),
  /** Decision ticks before the battle ends on HP. */
  battleTicks: z.number().int().positive().default(185),
});

export const ShopStrategySchema = z.enum(['max-heal', 'ratio-greedy']);
export type ShopStrategy = z.infer<typeof ShopStrategySchema>;

/** (attacker type, defender type) pairs where the attacker has the edge. */
const TypeAdvantageListSchema = z.array(z.tuple([ElementTypeSchema, ElementTypeSchema]));

export const EngineConfigSchema = z.object({
  grid: GridConfigSchema.default({}),
  economy: EconomyConfigSchema.default({}),
  battle: BattleConfigSchema.default({}),
  timings: TimingConfigSchema.default({}),
  shopStrategy: ShopStrategySchema.default('max-heal'),
  typeAdvantages: TypeAdvantageListSchema.default([
    ['Fire', 'Electric'],
    ['Electric', 'Water'],
    ['Water', 'Fire'],
  ]),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type BattleConfig = EngineConfig['battle'];

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate overrides and fill defaults. The result is deep-frozen.
 * Throws a ZodError on invalid input.
 */
export function createConfig(overrides: EngineConfigInput = {}): EngineConfig {
  return deepFreeze(EngineConfigSchema.parse(overrides));
}

export const DEFAULT_CONFIG: EngineConfig = createConfig();

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

/** Environment variables understood by loadConfig. All optional. */
export interface EngineEnv {
  ARENA_SEED?: string;
  SEARCH_DEPTH?: string;
  OBSTACLE_DENSITY?: string;
  CATCH_TICKS?: string;
  BATTLE_TICKS?: string;
  SHOP_STRATEGY?: string;
}

export interface LoadedConfig {
  config: EngineConfig;
  /** Seed for the match RNG; falls back to the current time. */
  seed: string;
}

/**
 * Build the engine configuration from environment variables.
 * Unset variables keep their defaults; malformed ones throw a ZodError.
 */
export function loadConfig(env: EngineEnv = process.env): LoadedConfig {
  const config = createConfig({
    grid: {
      obstacleDensity: env.OBSTACLE_DENSITY ? parseFloat(env.OBSTACLE_DENSITY) : undefined,
    },
    battle: {
      searchDepth: env.SEARCH_DEPTH ? parseInt(env.SEARCH_DEPTH, 10) : undefined,
    },
    timings: {
      catchTicks: env.CATCH_TICKS ? parseInt(env.CATCH_TICKS, 10) : undefined,
      battleTicks: env.BATTLE_TICKS ? parseInt(env.BATTLE_TICKS, 10) : undefined,
    },
    shopStrategy: env.SHOP_STRATEGY ? ShopStrategySchema.parse(env.SHOP_STRATEGY) : undefined,
  });

  return {
    config,
    seed: env.ARENA_SEED ?? String(Date.now()),
  };
}
