/**
 * POKE ARENA - Decision Engine
 * Package Entry Point
 *
 * Three calls cover the engine's contract with a game loop:
 *   findPath(grid, start, goal)                       -> PathResult
 *   chooseAction(snapshot, side, options?)            -> Action
 *   planPurchases(budget, priceTable, healTable)      -> PurchasePlan
 *
 * Everything else (trainers, the match driver, the individual algorithms)
 * is re-exported for callers that want to drive the pieces themselves.
 */

import { SideIdSchema, type Action, type SideId } from './agents/schemas';
import { isDefeated, parseSnapshot } from './arena/battle-state';
import { advise } from './arena/fuzzy';
import type { RandomSource } from './arena/rng';
import { NO_OP, decide } from './arena/search';
import { DEFAULT_CONFIG, type EngineConfig } from './config/engine-config';

export interface ChooseActionOptions {
  config?: EngineConfig;
  /** Overrides config.battle.searchDepth. */
  depth?: number;
  /** Tie-break source; Math.random when omitted. */
  rng?: RandomSource;
}

/**
 * Validate a raw snapshot, then pick `side`'s action: fuzzy advice, then
 * alpha-beta search. A defeated side gets DEFEND without a search.
 *
 * @throws ZodError on malformed input
 * @throws EmptyRosterError when either roster is empty
 */
export function chooseAction(snapshotInput: unknown, side: SideId, options: ChooseActionOptions = {}): Action {
  const config = options.config ?? DEFAULT_CONFIG;
  const mover = SideIdSchema.parse(side);
  const snapshot = parseSnapshot(snapshotInput);

  if (isDefeated(snapshot.sides[mover])) return NO_OP;

  const advice = advise(snapshot, mover, config);
  return decide(snapshot, mover, config, { advice, depth: options.depth, rng: options.rng }).action;
}

export { findPath } from './arena/pathfinder';
export { planPurchases } from './arena/shop';

export * from './arena';
export * from './agents';
export {
  DEFAULT_CONFIG,
  EngineConfigSchema,
  ShopStrategySchema,
  createConfig,
  loadConfig,
} from './config/engine-config';
export type {
  BattleConfig,
  EngineConfig,
  EngineConfigInput,
  EngineEnv,
  LoadedConfig,
  ShopStrategy,
} from './config/engine-config';
