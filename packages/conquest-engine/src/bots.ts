import type { RegionId } from "./types.js";
import type { DecisionPolicy, PolicyView } from "./policy.js";
import { attackableNeighbors, canFortifyBetween, regionsOwnedBy } from "./map.js";
import { findBestTradeableSet } from "./cards.js";
import type { Rng } from "./rng.js";

function garrisonOf(view: PolicyView, regionId: RegionId): number {
  return view.state.regions[regionId]?.garrison ?? 0;
}

/** First region with the largest garrison, in map order. */
function strongest(view: PolicyView, regionIds: readonly RegionId[]): RegionId | null {
  let best: RegionId | null = null;
  for (const id of regionIds) {
    if (best === null || garrisonOf(view, id) > garrisonOf(view, best)) best = id;
  }
  return best;
}

function weakest(view: PolicyView, regionIds: readonly RegionId[]): RegionId | null {
  let best: RegionId | null = null;
  for (const id of regionIds) {
    if (best === null || garrisonOf(view, id) < garrisonOf(view, best)) best = id;
  }
  return best;
}

function canAttackFrom(view: PolicyView, regionId: RegionId): boolean {
  return attackableNeighbors(view.state, view.map, regionId).length > 0;
}

function ownHand(view: PolicyView) {
  return view.state.hands[view.playerId] ?? [];
}

/**
 * Greedy, no lookahead. Masses everything on its strongest front,
 * attacks the weakest neighbour it clearly outnumbers and pulls idle
 * troops from the interior to the front.
 */
export function createGreedyBot(): DecisionPolicy {
  return {
    draft(view) {
      const owned = regionsOwnedBy(view.state, view.playerId);
      const front = owned.filter((id) => canAttackFrom(view, id));
      const target = strongest(view, front.length > 0 ? front : owned);
      if (target === null) {
        throw new RangeError(`${view.playerId} owns no regions to draft into`);
      }
      return { regionId: target, amount: view.state.allowance };
    },

    attack(view) {
      const candidates = regionsOwnedBy(view.state, view.playerId).filter(
        (id) => garrisonOf(view, id) > 2 && canAttackFrom(view, id),
      );
      const from = strongest(view, candidates);
      if (from === null) return null;

      const strength = garrisonOf(view, from);
      const targets = attackableNeighbors(view.state, view.map, from).filter(
        (id) => garrisonOf(view, id) < strength - 1,
      );
      const to = weakest(view, targets);
      if (to === null) return null;

      return { from, to, troops: strength - 1 };
    },

    occupy(_view, capture) {
      return capture.maxMove;
    },

    fortify(view) {
      const owned = regionsOwnedBy(view.state, view.playerId);
      const from = strongest(view, owned.filter((id) => !canAttackFrom(view, id)));
      if (from === null || garrisonOf(view, from) <= 1) return null;

      const fronts = owned.filter(
        (id) =>
          id !== from &&
          canAttackFrom(view, id) &&
          canFortifyBetween(view.state, view.map, view.ruleset.fortify, view.playerId, from, id),
      );
      const to = strongest(view, fronts);
      if (to === null) return null;

      return { from, to, amount: garrisonOf(view, from) - 1 };
    },

    trade(view) {
      return findBestTradeableSet(ownHand(view), view.state.cardsById, view.ruleset.cards);
    },
  };
}

/**
 * Never attacks or regroups. Spreads reinforcements one at a time over
 * random regions and trades only when forced to.
 */
export function createPassiveBot(rng: Rng): DecisionPolicy {
  return {
    draft(view) {
      const owned = regionsOwnedBy(view.state, view.playerId);
      return { regionId: rng.pick(owned), amount: 1 };
    },

    attack() {
      return null;
    },

    occupy(_view, capture) {
      return capture.minMove;
    },

    fortify() {
      return null;
    },

    trade(view) {
      const hand = ownHand(view);
      if (hand.length < view.ruleset.cards.forcedTradeHandSize) return null;
      return findBestTradeableSet(hand, view.state.cardsById, view.ruleset.cards);
    },
  };
}
