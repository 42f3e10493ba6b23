/**
 * POKE ARENA - Starting Rosters
 *
 * Each side fields one combatant of every element type. All combatants share
 * the same base stats; only the type triangle sets them apart.
 */

import type { Combatant, ElementType, Roster, SideId } from './schemas';

// ---------------------------------------------------------------------------
// Base stats
// ---------------------------------------------------------------------------

export const BASE_STATS = {
  maxHp: 100,
  attack: 22,
  defense: 10,
} as const;

export interface SpeciesEntry {
  species: string;
  type: ElementType;
}

export const SIDE_SPECIES: Readonly<Record<SideId, readonly SpeciesEntry[]>> = {
  ASH: [
    { species: 'Pikachu', type: 'Electric' },
    { species: 'Charmander', type: 'Fire' },
    { species: 'Squirtle', type: 'Water' },
  ],
  ROCKET: [
    { species: 'Meowth', type: 'Electric' },
    { species: 'Weezing', type: 'Fire' },
    { species: 'Wobbuffet', type: 'Water' },
  ],
};

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

/** A combatant at full HP with base stats. */
export function createCombatant(entry: SpeciesEntry): Combatant {
  return {
    species: entry.species,
    type: entry.type,
    hp: BASE_STATS.maxHp,
    maxHp: BASE_STATS.maxHp,
    attack: BASE_STATS.attack,
    defense: BASE_STATS.defense,
  };
}

/** Fresh roster for a side, first species active. */
export function buildRoster(side: SideId): Roster {
  return {
    combatants: SIDE_SPECIES[side].map(createCombatant),
    activeIndex: 0,
  };
}

export function speciesNames(side: SideId): string[] {
  return SIDE_SPECIES[side].map(e => e.species);
}
