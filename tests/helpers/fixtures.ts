/**
 * POKE ARENA - Test Fixtures
 *
 * Builders for battle snapshots. Every combatant uses base stats
 * (100 HP, 22 attack, 10 defense) unless overridden.
 */

import type {
  BattleSnapshot,
  Combatant,
  ElementType,
  ElixirCounts,
  SideState,
} from '../../src/agents/schemas';
import { createRng, pickOne, randomInt, type RandomSource } from '../../src/arena/rng';

export function mon(species: string, type: ElementType, hp = 100, overrides: Partial<Combatant> = {}): Combatant {
  return { species, type, hp, maxHp: 100, attack: 22, defense: 10, ...overrides };
}

export function side(
  combatants: Combatant[],
  elixirs: Partial<ElixirCounts> = {},
  activeIndex = 0,
): SideState {
  return {
    roster: { combatants, activeIndex },
    resources: { elixirs: { Small: 0, Medium: 0, Large: 0, ...elixirs }, coins: 0, fuel: 0 },
    defending: false,
  };
}

export function snapshot(ash: SideState, rocket: SideState, fieldType: ElementType = 'Water'): BattleSnapshot {
  return { sides: { ASH: ash, ROCKET: rocket }, fieldType, toMove: 'ASH', turn: 0 };
}

const TYPES: readonly ElementType[] = ['Fire', 'Water', 'Electric'];

function randomSide(rng: RandomSource, prefix: string): SideState {
  const size = randomInt(rng, 1, 4);
  const combatants: Combatant[] = [];
  for (let i = 0; i < size; i++) {
    // One in four benched combatants starts fainted
    const hp = rng.next() < 0.25 && i > 0 ? 0 : randomInt(rng, 1, 101);
    combatants.push(mon(`${prefix}${i}`, pickOne(rng, TYPES), hp));
  }
  return side(combatants, {
    Small: randomInt(rng, 0, 3),
    Medium: randomInt(rng, 0, 2),
    Large: randomInt(rng, 0, 2),
  });
}

/** A varied, valid snapshot where both actives are alive. */
export function randomSnapshot(seed: number | string): BattleSnapshot {
  const rng = createRng(seed);
  return snapshot(randomSide(rng, 'a'), randomSide(rng, 'r'), pickOne(rng, TYPES));
}
