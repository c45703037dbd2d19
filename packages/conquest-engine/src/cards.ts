import type {
  CardId,
  CardKind,
  CardState,
  CardsTraded,
  DeckState,
  GameEvent,
  GameState,
  MatchedKind,
  PlayerId,
  RegionId,
} from "./types.js";
import { MATCHED_KINDS } from "./types.js";
import type { CardsConfig } from "./config.js";
import { CardSetError } from "./errors.js";
import type { Rng } from "./rng.js";

// ── Set classification ───────────────────────────────────────────────

export type SetComposition = MatchedKind | "Mixed";

export interface TradeSet {
  readonly composition: SetComposition;
  readonly value: number;
}

/**
 * Classify three card kinds. Wilds fill any gap; when a set reads both as
 * three-of-a-kind and as one-of-each, the more valuable reading wins.
 */
export function classifySet(kinds: readonly CardKind[], config: CardsConfig): TradeSet | null {
  if (kinds.length !== 3) return null;

  const nonWild = kinds.filter((k): k is MatchedKind => k !== "Wild");
  const distinct = new Set(nonWild);
  let best: TradeSet | null = null;

  if (distinct.size <= 1) {
    const candidates: readonly MatchedKind[] = distinct.size === 1 ? [...distinct] : MATCHED_KINDS;
    for (const kind of candidates) {
      const value = config.threeOfAKindValues[kind];
      if (!best || value > best.value) best = { composition: kind, value };
    }
  }

  if (distinct.size === nonWild.length) {
    const value = config.oneOfEachValue;
    if (!best || value > best.value) best = { composition: "Mixed", value };
  }

  return best;
}

function kindsOf(cardIds: readonly CardId[], cardsById: Record<string, CardState>): CardKind[] {
  return cardIds.map((id) => {
    const card = cardsById[id];
    if (!card) throw new CardSetError(`Unknown card ${id}`);
    return card.kind;
  });
}

/**
 * Highest-value valid 3-card subset of `hand`. Subsets are visited in
 * lexicographic index order and ties keep the first one found.
 */
export function findBestTradeableSet(
  hand: readonly CardId[],
  cardsById: Record<string, CardState>,
  config: CardsConfig,
): CardId[] | null {
  let best: CardId[] | null = null;
  let bestValue = -1;

  for (let i = 0; i < hand.length; i++) {
    for (let j = i + 1; j < hand.length; j++) {
      for (let k = j + 1; k < hand.length; k++) {
        const ids = [hand[i]!, hand[j]!, hand[k]!];
        const set = classifySet(kindsOf(ids, cardsById), config);
        if (set && set.value > bestValue) {
          best = ids;
          bestValue = set.value;
        }
      }
    }
  }

  return best;
}

/** Five cards always hold a valid set; smaller hands are searched. */
export function hasAnyValidSet(
  hand: readonly CardId[],
  cardsById: Record<string, CardState>,
  config: CardsConfig,
): boolean {
  if (hand.length >= 5) return true;
  return findBestTradeableSet(hand, cardsById, config) !== null;
}

// ── Trade-in ─────────────────────────────────────────────────────────

export interface TradeInResult {
  readonly state: GameState;
  readonly events: readonly GameEvent[];
  readonly value: number;
}

/**
 * Trade three cards from `playerId`'s hand. The table value goes to the
 * draft allowance; the first card (in the given order) bound to a region
 * the player owns puts the region bonus straight onto that region.
 */
export function applyTradeIn(
  state: GameState,
  playerId: PlayerId,
  cardIds: readonly CardId[],
  config: CardsConfig,
): TradeInResult {
  if (cardIds.length !== 3) {
    throw new CardSetError(`Must trade exactly 3 cards, got ${cardIds.length}`);
  }
  if (new Set(cardIds).size !== cardIds.length) {
    throw new CardSetError("Duplicate card IDs in trade");
  }

  const hand = state.hands[playerId] ?? [];
  for (const cardId of cardIds) {
    if (!hand.includes(cardId)) {
      throw new CardSetError(`Card ${cardId} is not in ${playerId}'s hand`);
    }
  }

  const set = classifySet(kindsOf(cardIds, state.cardsById), config);
  if (!set) {
    throw new CardSetError(`Cards ${cardIds.join(", ")} do not form a valid set`);
  }

  let bonusRegionId: RegionId | undefined;
  for (const cardId of cardIds) {
    const regionId = state.cardsById[cardId]?.regionId;
    if (regionId && state.regions[regionId]?.ownerId === playerId) {
      bonusRegionId = regionId;
      break;
    }
  }

  let regions = state.regions;
  if (bonusRegionId) {
    const region = regions[bonusRegionId]!;
    regions = {
      ...regions,
      [bonusRegionId]: { ...region, garrison: region.garrison + config.regionTradeBonus },
    };
  }

  const traded = new Set<string>(cardIds);
  const newState: GameState = {
    ...state,
    regions,
    hands: { ...state.hands, [playerId]: hand.filter((id) => !traded.has(id)) },
    deck: { ...state.deck, discard: [...state.deck.discard, ...cardIds] },
    allowance: state.allowance + set.value,
  };

  const event: CardsTraded = {
    type: "CardsTraded",
    playerId,
    cardIds,
    value: set.value,
    bonusArmies: bonusRegionId ? config.regionTradeBonus : 0,
    ...(bonusRegionId ? { bonusRegionId } : {}),
  };

  return { state: newState, events: [event], value: set.value };
}

// ── Deck creation ────────────────────────────────────────────────────

export interface DeckCreationResult {
  readonly deck: DeckState;
  readonly cardsById: Record<string, CardState>;
}

/** One card per region, each of a uniformly random matched kind, shuffled. */
export function createDeck(regionIds: readonly RegionId[], rng: Rng): DeckCreationResult {
  const cardsById: Record<string, CardState> = {};
  const cardIds: CardId[] = [];

  for (let i = 0; i < regionIds.length; i++) {
    const id = `card_${i}` as CardId;
    cardIds.push(id);
    cardsById[id] = { kind: rng.pick(MATCHED_KINDS), regionId: regionIds[i]! };
  }

  return {
    deck: { draw: rng.shuffle(cardIds), discard: [] },
    cardsById,
  };
}

// ── Reshuffle + draw ─────────────────────────────────────────────────

export interface ReshuffleResult {
  readonly deck: DeckState;
  readonly cardsById: Record<string, CardState>;
  readonly wildsAdded: readonly CardId[];
}

/** Merge the discard pile back into the deck together with fresh wildcards. */
export function reshuffleDeck(
  deck: DeckState,
  cardsById: Record<string, CardState>,
  rng: Rng,
  config: CardsConfig,
): ReshuffleResult {
  const existingWilds = Object.values(cardsById).filter((c) => c.kind === "Wild").length;
  const newCards = { ...cardsById };
  const wildsAdded: CardId[] = [];
  for (let i = 0; i < config.wildsPerReshuffle; i++) {
    const id = `card_w${existingWilds + i}` as CardId;
    newCards[id] = { kind: "Wild" };
    wildsAdded.push(id);
  }

  return {
    deck: { draw: rng.shuffle([...deck.draw, ...deck.discard, ...wildsAdded]), discard: [] },
    cardsById: newCards,
    wildsAdded,
  };
}

export interface DrawResult {
  readonly cardId: CardId;
  readonly deck: DeckState;
  readonly cardsById: Record<string, CardState>;
  /** Set when the draw pile was empty and had to be rebuilt first. */
  readonly reshuffle?: ReshuffleResult;
}

/**
 * Draw the top card. An empty draw pile is rebuilt from the discard pile
 * plus new wildcards first. Returns null only when even that leaves nothing
 * to draw (a ruleset without reshuffle wilds).
 */
export function drawCard(
  deck: DeckState,
  cardsById: Record<string, CardState>,
  rng: Rng,
  config: CardsConfig,
): DrawResult | null {
  let reshuffle: ReshuffleResult | undefined;
  let current = deck;
  let cards = cardsById;

  if (current.draw.length === 0) {
    reshuffle = reshuffleDeck(current, cards, rng, config);
    current = reshuffle.deck;
    cards = reshuffle.cardsById;
  }

  const cardId = current.draw[0];
  if (cardId === undefined) return null;

  return {
    cardId,
    deck: { draw: current.draw.slice(1), discard: current.discard },
    cardsById: cards,
    ...(reshuffle ? { reshuffle } : {}),
  };
}
