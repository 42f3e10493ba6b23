/**
 * POKE ARENA - Elixir Shop
 *
 * Turns a coin budget into elixirs. Two strategies:
 *
 *   max-heal      Most total healing the budget can buy (unbounded knapsack
 *                 over coins, with large budgets spent on the best-ratio
 *                 tier first). Equal-heal plans prefer spending fewer coins,
 *                 then the tier with the better heal-per-coin ratio.
 *   ratio-greedy  Rank tiers by heal-per-coin and buy as many as affordable
 *                 of each in turn.
 *
 * With the standard tables (15->25, 30->50, 50->80) and 100 coins, max-heal
 * buys two Large (160 HP); ratio-greedy buys six Small (150 HP).
 *
 * Neither strategy ever plans past the budget.
 */

import {
  ElixirTierSchema,
  HealTableSchema,
  PriceTableSchema,
  type ElixirTier,
  type HealTable,
  type PriceTable,
  type PurchasePlan,
} from '../agents/schemas';
import type { ShopStrategy } from '../config/engine-config';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function emptyPlan(): PurchasePlan {
  return { Small: 0, Medium: 0, Large: 0 };
}

/**
 * Tiers by heal-per-coin, best first. Equal ratios keep declaration order
 * (Array.prototype.sort is stable).
 */
export function rankTiers(prices: PriceTable, heals: HealTable): ElixirTier[] {
  return [...ElixirTierSchema.options].sort(
    (a, b) => heals[b] / prices[b] - heals[a] / prices[a],
  );
}

export function planCost(plan: PurchasePlan, prices: PriceTable): number {
  return ElixirTierSchema.options.reduce((sum, tier) => sum + plan[tier] * prices[tier], 0);
}

export function planHealing(plan: PurchasePlan, heals: HealTable): number {
  return ElixirTierSchema.options.reduce((sum, tier) => sum + plan[tier] * heals[tier], 0);
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

function ratioGreedy(budget: number, prices: PriceTable, heals: HealTable): PurchasePlan {
  const plan = emptyPlan();
  let coins = budget;
  for (const tier of rankTiers(prices, heals)) {
    const count = Math.floor(coins / prices[tier]);
    plan[tier] = count;
    coins -= count * prices[tier];
  }
  return plan;
}

/**
 * Some optimal plan buys fewer than price(top) elixirs of the other tiers
 * (any price(top) of them hold a subset whose cost is a multiple of
 * price(top), which `top` heals at least as well) and leaves fewer than
 * price(top) coins unspent. So all but price(top) * (maxPrice + 1) coins
 * can go to `top` up front, and the knapsack only runs on the rest.
 */
function maxHeal(budget: number, prices: PriceTable, heals: HealTable): PurchasePlan {
  const ranked = rankTiers(prices, heals);
  const top = ranked[0];
  if (heals[top] === 0) return emptyPlan();

  const maxPrice = Math.max(...ranked.map(tier => prices[tier]));
  const bound = prices[top] * (maxPrice + 1);
  const bulk = budget > bound ? Math.floor((budget - bound) / prices[top]) : 0;
  const rest = budget - bulk * prices[top];

  // best[c]: most healing for at most c coins; pick[c]: last tier bought, or null to spend c-1
  const best = new Array<number>(rest + 1).fill(0);
  const pick = new Array<ElixirTier | null>(rest + 1).fill(null);

  for (let c = 1; c <= rest; c++) {
    best[c] = best[c - 1];
    pick[c] = null;
    for (const tier of ranked) {
      const price = prices[tier];
      if (price > c) continue;
      const value = best[c - price] + heals[tier];
      // Strictly better only: ties keep the cheaper plan / higher-ranked tier
      if (value > best[c]) {
        best[c] = value;
        pick[c] = tier;
      }
    }
  }

  const plan = emptyPlan();
  plan[top] = bulk;
  let c = rest;
  while (c > 0) {
    const tier = pick[c];
    if (tier === null) {
      c -= 1;
    } else {
      plan[tier] += 1;
      c -= prices[tier];
    }
  }
  return plan;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Plan elixir purchases for a coin budget.
 *
 * Negative or fractional budgets are floored to a whole, non-negative
 * number of coins. Throws a ZodError if a price is not a positive integer
 * or a heal amount is negative.
 */
export function planPurchases(
  budget: number,
  priceTable: PriceTable,
  healTable: HealTable,
  strategy: ShopStrategy = 'max-heal',
): PurchasePlan {
  const prices = PriceTableSchema.parse(priceTable);
  const heals = HealTableSchema.parse(healTable);
  const coins = Number.isFinite(budget) ? Math.max(0, Math.floor(budget)) : 0;

  return strategy === 'ratio-greedy'
    ? ratioGreedy(coins, prices, heals)
    : maxHeal(coins, prices, heals);
}
