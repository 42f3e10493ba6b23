/**
 * POKE ARENA - Damage Formula
 *
 *   base  = max(damageFloor, attack - floor(defense / 2))
 *   mult  = typeAdvantage  (attacker type beats defender type)
 *         x fieldBoost     (attacker type matches the field)
 *         x jitter         (live turns only, U(jitterMin, jitterMax))
 *   dmg   = round(base * mult), then floor(dmg * defendMultiplier) if defending
 *
 * Search uses the expected value (jitter = 1.0) so the tree is deterministic;
 * the live resolver rolls the jitter.
 */

import type { Combatant, ElementType } from '../agents/schemas';
import type { EngineConfig } from '../config/engine-config';
import type { RandomSource } from './rng';
import { randomRange } from './rng';

type DamageConfig = Pick<EngineConfig, 'battle' | 'typeAdvantages'>;

/** True when `attacker` beats `defender` in the type triangle. */
export function hasTypeAdvantage(
  attacker: ElementType,
  defender: ElementType,
  config: Pick<EngineConfig, 'typeAdvantages'>,
): boolean {
  return config.typeAdvantages.some(([a, d]) => a === attacker && d === defender);
}

/** Damage before jitter, rounding and defend. */
export function rawDamage(
  attacker: Combatant,
  defender: Combatant,
  fieldType: ElementType,
  config: DamageConfig,
): number {
  const { damageFloor, typeAdvantage, fieldBoost } = config.battle;
  const base = Math.max(damageFloor, attacker.attack - Math.floor(defender.defense / 2));

  let mult = 1;
  if (hasTypeAdvantage(attacker.type, defender.type, config)) mult *= typeAdvantage;
  if (attacker.type === fieldType) mult *= fieldBoost;

  return base * mult;
}

function finish(raw: number, defending: boolean, config: DamageConfig): number {
  const dmg = Math.round(raw);
  return defending ? Math.floor(dmg * config.battle.defendMultiplier) : dmg;
}

/** Deterministic damage used while searching. */
export function expectedDamage(
  attacker: Combatant,
  defender: Combatant,
  fieldType: ElementType,
  defending: boolean,
  config: DamageConfig,
): number {
  return finish(rawDamage(attacker, defender, fieldType, config), defending, config);
}

/** Jittered damage used when a real turn is resolved. */
export function rollDamage(
  attacker: Combatant,
  defender: Combatant,
  fieldType: ElementType,
  defending: boolean,
  config: DamageConfig,
  rng: RandomSource,
): number {
  const jitter = randomRange(rng, config.battle.jitterMin, config.battle.jitterMax);
  return finish(rawDamage(attacker, defender, fieldType, config) * jitter, defending, config);
}
