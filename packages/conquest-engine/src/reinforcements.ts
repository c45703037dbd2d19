import type { GameState, GroupId, PlayerId } from "./types.js";
import type { WorldMap } from "./map.js";
import { countRegionsOwnedBy, groupOwner } from "./map.js";
import type { ReinforcementConfig } from "./config.js";
import { defaultRuleset } from "./config.js";

export interface ReinforcementResult {
  readonly total: number;
  readonly sources: Record<string, number>;
}

/**
 * Calculate a player's draft allowance.
 *
 * - Base: max(3, floor(ownedRegionCount / 3))
 * - Group bonus: for each group the player fully owns, add its bonus
 */
export function calculateReinforcements(
  state: GameState,
  playerId: PlayerId,
  map: WorldMap,
  config: ReinforcementConfig = defaultRuleset.reinforcements,
): ReinforcementResult {
  const regionCount = countRegionsOwnedBy(state, playerId);
  const base = Math.max(config.minimum, Math.floor(regionCount / config.regionsPerArmy));

  const sources: Record<string, number> = { regions: base };
  let total = base;

  for (const [gid, group] of Object.entries(map.groups)) {
    if (groupOwner(state, map, gid as GroupId) === playerId) {
      sources[gid] = group.bonus;
      total += group.bonus;
    }
  }

  return { total, sources };
}
