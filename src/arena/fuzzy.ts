/**
 * POKE ARENA - Fuzzy Advisor
 *
 * Maps a battle snapshot to HEAL / SWAP weights in [0, 1] for one side.
 *
 * HP ratio bands (crisp):
 *   LOW     r < 0.30
 *   MEDIUM  0.30 <= r <= 0.70
 *   HIGH    r > 0.70
 *
 * The rule base is a fixed table. Every rule whose conditions hold fires;
 * per action the strongest firing rule wins (max, never sum).
 *
 * The weights only bias the search's leaf scores. They never force a move.
 */

import type { Advice, AdvisedAction, BattleSnapshot, SideId } from '../agents/schemas';
import type { EngineConfig } from '../config/engine-config';
import { activeCombatant, hpRatio, isDefeated, otherSide } from './battle-state';
import { hasTypeAdvantage } from './damage';

// ---------------------------------------------------------------------------
// Membership
// ---------------------------------------------------------------------------

export type HpBand = 'LOW' | 'MEDIUM' | 'HIGH';

export const LOW_THRESHOLD = 0.3;
export const HIGH_THRESHOLD = 0.7;

export function hpBand(ratio: number): HpBand {
  if (ratio < LOW_THRESHOLD) return 'LOW';
  if (ratio > HIGH_THRESHOLD) return 'HIGH';
  return 'MEDIUM';
}

// ---------------------------------------------------------------------------
// Rule table
// ---------------------------------------------------------------------------

/** Facts a rule can test. Absent conditions always hold. */
export interface FuzzyFacts {
  own: HpBand;
  enemy: HpBand;
  /** Enemy active's type beats ours. */
  typeDisadvantaged: boolean;
}

export interface FuzzyRule {
  when: Partial<FuzzyFacts>;
  recommend: AdvisedAction;
  weight: number;
}

export const FUZZY_RULES: readonly FuzzyRule[] = [
  { when: { own: 'LOW', enemy: 'HIGH' }, recommend: 'HEAL', weight: 0.9 },
  { when: { own: 'MEDIUM', enemy: 'HIGH' }, recommend: 'HEAL', weight: 0.6 },
  { when: { own: 'LOW', typeDisadvantaged: true }, recommend: 'SWAP', weight: 0.95 },
];

function fires(rule: FuzzyRule, facts: FuzzyFacts): boolean {
  const { own, enemy, typeDisadvantaged } = rule.when;
  if (own !== undefined && own !== facts.own) return false;
  if (enemy !== undefined && enemy !== facts.enemy) return false;
  if (typeDisadvantaged !== undefined && typeDisadvantaged !== facts.typeDisadvantaged) return false;
  return true;
}

/** Max-combine the weights of every firing rule. */
export function evaluateRules(facts: FuzzyFacts, rules: readonly FuzzyRule[] = FUZZY_RULES): Advice {
  const advice: Advice = { HEAL: 0, SWAP: 0 };
  for (const rule of rules) {
    if (fires(rule, facts)) {
      advice[rule.recommend] = Math.max(advice[rule.recommend], rule.weight);
    }
  }
  return advice;
}

// ---------------------------------------------------------------------------
// Advisor
// ---------------------------------------------------------------------------

export const NO_ADVICE: Readonly<Advice> = Object.freeze({ HEAL: 0, SWAP: 0 });

/** Read the rule facts for `side` off a snapshot. */
export function extractFacts(
  snapshot: BattleSnapshot,
  side: SideId,
  config: Pick<EngineConfig, 'typeAdvantages'>,
): FuzzyFacts {
  const own = activeCombatant(snapshot.sides[side]);
  const enemy = activeCombatant(snapshot.sides[otherSide(side)]);
  return {
    own: hpBand(hpRatio(own)),
    enemy: hpBand(hpRatio(enemy)),
    typeDisadvantaged: hasTypeAdvantage(enemy.type, own.type, config),
  };
}

/**
 * HEAL / SWAP weights for `side`. All zero once either side is defeated.
 */
export function advise(
  snapshot: BattleSnapshot,
  side: SideId,
  config: Pick<EngineConfig, 'typeAdvantages'>,
): Advice {
  if (isDefeated(snapshot.sides[side]) || isDefeated(snapshot.sides[otherSide(side)])) {
    return { ...NO_ADVICE };
  }
  return evaluateRules(extractFacts(snapshot, side, config));
}
