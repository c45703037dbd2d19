import type { GameState, GroupId, PlayerId, RegionId } from "./types.js";
import type { FortifyConfig } from "./config.js";

// ── WorldMap type ─────────────────────────────────────────────────────

export interface RegionInfo {
  readonly name: string;
  readonly groupId: GroupId;
}

export interface GroupInfo {
  readonly regionIds: readonly RegionId[];
  readonly bonus: number;
}

/** Static part of the world: built once from a map document, never mutated. */
export interface WorldMap {
  readonly regions: Record<string, RegionInfo>;
  readonly adjacency: Record<string, readonly RegionId[]>;
  readonly groups: Record<string, GroupInfo>;
}

// ── Validation ────────────────────────────────────────────────────────

export interface MapValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}

export function validateMap(map: WorldMap): MapValidationResult {
  const errors: string[] = [];
  const regionIds = new Set(Object.keys(map.regions));

  if (regionIds.size === 0) {
    errors.push("Map has no regions");
  }

  for (const id of Object.keys(map.adjacency)) {
    if (!regionIds.has(id)) {
      errors.push(`Adjacency references unknown region "${id}"`);
    }
  }

  for (const id of regionIds) {
    if (!(id in map.adjacency)) {
      errors.push(`Region "${id}" has no adjacency entry`);
    }
  }

  // All adjacency targets exist, and adjacency is symmetric
  for (const [id, neighbors] of Object.entries(map.adjacency)) {
    for (const neighbor of neighbors) {
      if (!regionIds.has(neighbor)) {
        errors.push(`Region "${id}" is adjacent to unknown region "${neighbor}"`);
        continue;
      }
      if (neighbor === id) {
        errors.push(`Region "${id}" lists itself as a neighbor`);
        continue;
      }
      const reverse = map.adjacency[neighbor];
      if (!reverse || !reverse.some((r) => r === id)) {
        errors.push(
          `Adjacency is not symmetric: "${id}" -> "${neighbor}" but not "${neighbor}" -> "${id}"`,
        );
      }
    }
  }

  for (const [groupId, info] of Object.entries(map.groups)) {
    for (const rid of info.regionIds) {
      if (!regionIds.has(rid)) {
        errors.push(`Group "${groupId}" references unknown region "${rid}"`);
      }
    }
  }

  for (const [id, info] of Object.entries(map.regions)) {
    const group = map.groups[info.groupId];
    if (!group) {
      errors.push(`Region "${id}" belongs to unknown group "${info.groupId}"`);
    } else if (!group.regionIds.some((r) => r === id)) {
      errors.push(`Group "${info.groupId}" does not list its member "${id}"`);
    }
  }

  return { valid: errors.length === 0, errors };
}

// ── Queries ───────────────────────────────────────────────────────────

export function regionIdsOf(map: WorldMap): RegionId[] {
  return Object.keys(map.regions).map((id) => id as RegionId);
}

export function neighborsOf(map: WorldMap, regionId: RegionId): readonly RegionId[] {
  return map.adjacency[regionId] ?? [];
}

export function isAdjacent(map: WorldMap, from: RegionId, to: RegionId): boolean {
  return neighborsOf(map, from).includes(to);
}

/** Regions owned by a player, in map order. Derived from the owner-by-region map. */
export function regionsOwnedBy(state: GameState, playerId: PlayerId): RegionId[] {
  const owned: RegionId[] = [];
  for (const [id, region] of Object.entries(state.regions)) {
    if (region.ownerId === playerId) owned.push(id as RegionId);
  }
  return owned;
}

export function countRegionsOwnedBy(state: GameState, playerId: PlayerId): number {
  let count = 0;
  for (const region of Object.values(state.regions)) {
    if (region.ownerId === playerId) count++;
  }
  return count;
}

/** Sum of garrisons over a player's regions. */
export function totalArmies(state: GameState, playerId: PlayerId): number {
  let total = 0;
  for (const region of Object.values(state.regions)) {
    if (region.ownerId === playerId) total += region.garrison;
  }
  return total;
}

/** Neighbours of `regionId` owned by someone other than its owner. */
export function attackableNeighbors(
  state: GameState,
  map: WorldMap,
  regionId: RegionId,
): RegionId[] {
  const ownerId = state.regions[regionId]?.ownerId;
  if (!ownerId) return [];
  return neighborsOf(map, regionId).filter((n) => {
    const neighbor = state.regions[n];
    return neighbor !== undefined && neighbor.ownerId !== null && neighbor.ownerId !== ownerId;
  });
}

/** The player owning every region of the group, or null. */
export function groupOwner(state: GameState, map: WorldMap, groupId: GroupId): PlayerId | null {
  const group = map.groups[groupId];
  if (!group || group.regionIds.length === 0) return null;
  const first = state.regions[group.regionIds[0]!]?.ownerId ?? null;
  if (first === null) return null;
  return group.regionIds.every((rid) => state.regions[rid]?.ownerId === first) ? first : null;
}

export function computeGroupOwners(
  state: GameState,
  map: WorldMap,
): Record<string, PlayerId | null> {
  const owners: Record<string, PlayerId | null> = {};
  for (const groupId of Object.keys(map.groups)) {
    owners[groupId] = groupOwner(state, map, groupId as GroupId);
  }
  return owners;
}

// ── Paths ─────────────────────────────────────────────────────────────

function isConnected(
  from: RegionId,
  to: RegionId,
  playerId: PlayerId,
  state: GameState,
  map: WorldMap,
): boolean {
  const visited = new Set<string>([from]);
  const queue: RegionId[] = [from];

  while (queue.length > 0) {
    const current = queue.shift()!;
    if (current === to) return true;

    for (const neighbor of neighborsOf(map, current)) {
      if (visited.has(neighbor)) continue;
      if (state.regions[neighbor]?.ownerId === playerId) {
        visited.add(neighbor);
        queue.push(neighbor);
      }
    }
  }
  return false;
}

/** Whether troops may be regrouped from `from` to `to` under the fortify mode. */
export function canFortifyBetween(
  state: GameState,
  map: WorldMap,
  fortify: FortifyConfig,
  playerId: PlayerId,
  from: RegionId,
  to: RegionId,
): boolean {
  switch (fortify.fortifyMode) {
    case "anywhere":
      return true;
    case "adjacent":
      return isAdjacent(map, from, to);
    case "connected":
      return isConnected(from, to, playerId, state, map);
  }
}
