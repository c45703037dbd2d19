import type {
  GameEvent,
  GameStarted,
  GameState,
  PlayerId,
  RegionAssigned,
  RegionId,
  RegionState,
  StartingArmiesPlaced,
} from "./types.js";
import type { WorldMap } from "./map.js";
import { computeGroupOwners, regionIdsOf, totalArmies } from "./map.js";
import type { RulesetConfig } from "./config.js";
import { defaultRuleset, resolveInitialArmies } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { createDeck } from "./cards.js";
import type { Rng } from "./rng.js";

export interface SetupResult {
  readonly state: GameState;
  readonly events: readonly GameEvent[];
}

/**
 * How many regions each seat receives: an even share, with the remainder
 * going one each to the first players in turn order.
 */
export function regionShares(regionCount: number, playerCount: number): number[] {
  const base = Math.floor(regionCount / playerCount);
  const remainder = regionCount % playerCount;
  return Array.from({ length: playerCount }, (_, i) => (i < remainder ? base + 1 : base));
}

/**
 * Deal a new game: regions are shuffled and split between players, each
 * region starts with one troop, and the rest of every player's starting
 * armies lands on random regions they own.
 */
export function createGame(
  map: WorldMap,
  playerIds: readonly PlayerId[],
  rng: Rng,
  ruleset: RulesetConfig = defaultRuleset,
): SetupResult {
  if (new Set(playerIds).size !== playerIds.length) {
    throw new ConfigurationError(`Duplicate player ids in ${playerIds.join(", ")}`);
  }
  const startingArmies = resolveInitialArmies(ruleset.setup, playerIds.length);

  const allRegions = regionIdsOf(map);
  if (allRegions.length < playerIds.length) {
    throw new ConfigurationError(
      `Map has ${allRegions.length} regions, fewer than ${playerIds.length} players`,
    );
  }

  const events: GameEvent[] = [];
  const started: GameStarted = { type: "GameStarted", roster: playerIds };
  events.push(started);

  const shuffled = rng.shuffle(allRegions);
  const shares = regionShares(shuffled.length, playerIds.length);
  const regions: Record<string, RegionState> = {};
  const owned = new Map<PlayerId, RegionId[]>();

  let cursor = 0;
  playerIds.forEach((playerId, seat) => {
    const mine: RegionId[] = [];
    for (let n = 0; n < shares[seat]!; n++) {
      const regionId = shuffled[cursor++]!;
      regions[regionId] = { ownerId: playerId, garrison: 1 };
      mine.push(regionId);
      const assigned: RegionAssigned = { type: "RegionAssigned", playerId, regionId };
      events.push(assigned);
    }
    owned.set(playerId, mine);
  });

  for (const playerId of playerIds) {
    const mine = owned.get(playerId) ?? [];
    for (let n = mine.length; n < startingArmies; n++) {
      const regionId = rng.pick(mine);
      const region = regions[regionId]!;
      regions[regionId] = { ...region, garrison: region.garrison + 1 };
    }
  }

  const { deck, cardsById } = createDeck(allRegions, rng);

  const base: GameState = {
    roster: playerIds,
    regions,
    groupOwners: {},
    cardsById,
    hands: Object.fromEntries(playerIds.map((id) => [id, []])),
    armies: {},
    deck,
    turn: { round: 1, activeIndex: 0, phase: "Draft" },
    allowance: 0,
    capturedThisTurn: false,
  };

  const armies: Record<string, number> = {};
  for (const playerId of playerIds) {
    const total = totalArmies(base, playerId);
    armies[playerId] = total;
    const placed: StartingArmiesPlaced = {
      type: "StartingArmiesPlaced",
      playerId,
      armies: total,
      regionCount: owned.get(playerId)?.length ?? 0,
    };
    events.push(placed);
  }

  const state: GameState = { ...base, armies, groupOwners: computeGroupOwners(base, map) };
  return { state, events };
}
