import type {
  AttackMove,
  AttackResolved,
  CardDrawn,
  CardId,
  DeckReshuffled,
  DraftMove,
  FortifyMove,
  FortifyResolved,
  FortifySkipped,
  GameEnded,
  GameEvent,
  GameState,
  OccupyResolved,
  PendingCapture,
  Phase,
  PlayerEliminated,
  PlayerId,
  RegionCaptured,
  RegionId,
  RegionState,
  ReinforcementsForfeited,
  ReinforcementsGranted,
  ReinforcementsPlaced,
  TurnEnded,
  TurnStarted,
} from "./types.js";
import type { WorldMap } from "./map.js";
import {
  canFortifyBetween,
  computeGroupOwners,
  countRegionsOwnedBy,
  isAdjacent,
  totalArmies,
} from "./map.js";
import type { CardsConfig, CombatConfig, FortifyConfig, RulesetConfig } from "./config.js";
import type { BattleResult } from "./combat.js";
import { resolveBattle } from "./combat.js";
import { applyTradeIn, classifySet, drawCard } from "./cards.js";
import { calculateReinforcements } from "./reinforcements.js";
import { InvalidMoveError } from "./errors.js";
import type { Rng } from "./rng.js";

// ── Action result ─────────────────────────────────────────────────────

export interface ActionResult {
  readonly state: GameState;
  readonly events: readonly GameEvent[];
}

export interface AttackResult extends ActionResult {
  readonly battle: BattleResult;
  /** Set when the target fell and now waits for the mandatory troop move. */
  readonly capture?: PendingCapture;
}

// ── Shared checks ─────────────────────────────────────────────────────

export function activePlayer(state: GameState): PlayerId {
  const playerId = state.roster[state.turn.activeIndex];
  if (playerId === undefined) {
    throw new RangeError(`Active index ${state.turn.activeIndex} is outside the roster`);
  }
  return playerId;
}

function assertTurn(state: GameState, playerId: PlayerId, phases: readonly Phase[]): void {
  const { phase } = state.turn;
  if (!phases.includes(phase)) {
    throw new InvalidMoveError(phase, `Move not allowed in phase ${phase}`);
  }
  const current = activePlayer(state);
  if (current !== playerId) {
    throw new InvalidMoveError(phase, `Not your turn: current player is ${current}`);
  }
}

function ownedRegion(
  state: GameState,
  playerId: PlayerId,
  regionId: RegionId,
): RegionState {
  const region = state.regions[regionId];
  if (!region) {
    throw new InvalidMoveError(state.turn.phase, `Region ${regionId} does not exist`);
  }
  if (region.ownerId !== playerId) {
    throw new InvalidMoveError(state.turn.phase, `Region ${regionId} is not owned by ${playerId}`);
  }
  return region;
}

function assertCount(phase: Phase, label: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidMoveError(phase, `Invalid ${label}: must be a positive integer, got ${value}`);
  }
  if (value > max) {
    throw new InvalidMoveError(phase, `Invalid ${label}: ${value} exceeds the maximum of ${max}`);
  }
}

// ── Troop-move primitive ──────────────────────────────────────────────

/**
 * Subtract `amount` from one region and add it to another. Performs no
 * checks; callers validate first.
 */
export function moveTroops(
  regions: Record<string, RegionState>,
  from: RegionId,
  to: RegionId,
  amount: number,
): Record<string, RegionState> {
  const source = regions[from]!;
  const destination = regions[to]!;
  return {
    ...regions,
    [from]: { ...source, garrison: source.garrison - amount },
    [to]: { ...destination, garrison: destination.garrison + amount },
  };
}

export function setPhase(state: GameState, phase: Phase): GameState {
  return { ...state, turn: { ...state.turn, phase } };
}

// ── Turn start ────────────────────────────────────────────────────────

/** Refresh group owners and grant the active player's draft allowance. */
export function beginTurn(state: GameState, map: WorldMap, ruleset: RulesetConfig): ActionResult {
  const playerId = activePlayer(state);
  const reinforcements = calculateReinforcements(state, playerId, map, ruleset.reinforcements);

  const started: TurnStarted = { type: "TurnStarted", playerId, round: state.turn.round };
  const granted: ReinforcementsGranted = {
    type: "ReinforcementsGranted",
    playerId,
    amount: reinforcements.total,
    sources: reinforcements.sources,
  };

  return {
    state: {
      ...state,
      groupOwners: computeGroupOwners(state, map),
      allowance: reinforcements.total,
      capturedThisTurn: false,
      turn: { ...state.turn, phase: "Draft" },
    },
    events: [started, granted],
  };
}

// ── Draft ─────────────────────────────────────────────────────────────

export function validateDraft(state: GameState, playerId: PlayerId, move: DraftMove): void {
  // Attack is allowed for reinforcements earned from a trade forced mid-attack.
  assertTurn(state, playerId, ["Draft", "Attack"]);
  ownedRegion(state, playerId, move.regionId);
  if (state.allowance < 1) {
    throw new InvalidMoveError(state.turn.phase, "No reinforcements left to place");
  }
  assertCount(state.turn.phase, "amount", move.amount, state.allowance);
}

export function applyDraft(state: GameState, playerId: PlayerId, move: DraftMove): ActionResult {
  validateDraft(state, playerId, move);

  const region = state.regions[move.regionId]!;
  const event: ReinforcementsPlaced = {
    type: "ReinforcementsPlaced",
    playerId,
    regionId: move.regionId,
    count: move.amount,
  };

  return {
    state: {
      ...state,
      regions: {
        ...state.regions,
        [move.regionId]: { ...region, garrison: region.garrison + move.amount },
      },
      allowance: state.allowance - move.amount,
    },
    events: [event],
  };
}

/** Drop whatever allowance is left, after a policy failed to place it. */
export function forfeitAllowance(state: GameState, playerId: PlayerId): ActionResult {
  const event: ReinforcementsForfeited = {
    type: "ReinforcementsForfeited",
    playerId,
    count: state.allowance,
  };
  return { state: { ...state, allowance: 0 }, events: [event] };
}

// ── Trade ─────────────────────────────────────────────────────────────

export function validateTrade(
  state: GameState,
  playerId: PlayerId,
  cardIds: readonly CardId[],
  cards: CardsConfig,
): void {
  assertTurn(state, playerId, ["Draft", "Attack"]);
  const { phase } = state.turn;

  if (cardIds.length !== 3) {
    throw new InvalidMoveError(phase, `Must trade exactly 3 cards, got ${cardIds.length}`);
  }
  if (new Set(cardIds).size !== cardIds.length) {
    throw new InvalidMoveError(phase, "Duplicate card IDs in trade");
  }
  const hand = state.hands[playerId] ?? [];
  const kinds = cardIds.map((id) => {
    const card = state.cardsById[id];
    if (!card || !hand.includes(id)) {
      throw new InvalidMoveError(phase, `Card ${id} is not in your hand`);
    }
    return card.kind;
  });
  if (!classifySet(kinds, cards)) {
    throw new InvalidMoveError(phase, "Invalid trade set");
  }
}

export function applyTrade(
  state: GameState,
  playerId: PlayerId,
  cardIds: readonly CardId[],
  cards: CardsConfig,
): ActionResult {
  validateTrade(state, playerId, cardIds, cards);
  const { state: newState, events } = applyTradeIn(state, playerId, cardIds, cards);
  return { state: newState, events };
}

// ── Attack ────────────────────────────────────────────────────────────

export function validateAttack(
  state: GameState,
  map: WorldMap,
  playerId: PlayerId,
  move: AttackMove,
): { from: RegionState; to: RegionState; defenderId: PlayerId } {
  assertTurn(state, playerId, ["Attack"]);
  const from = ownedRegion(state, playerId, move.from);

  const to = state.regions[move.to];
  if (!to) {
    throw new InvalidMoveError("Attack", `Region ${move.to} does not exist`);
  }
  if (to.ownerId === playerId) {
    throw new InvalidMoveError("Attack", `Cannot attack your own region ${move.to}`);
  }
  const defenderId = to.ownerId;
  if (defenderId === null) {
    throw new InvalidMoveError("Attack", `Region ${move.to} has no owner`);
  }
  if (!isAdjacent(map, move.from, move.to)) {
    throw new InvalidMoveError("Attack", `Region ${move.from} is not adjacent to ${move.to}`);
  }
  if (from.garrison < 2) {
    throw new InvalidMoveError(
      "Attack",
      `Region ${move.from} must have at least 2 troops to attack, has ${from.garrison}`,
    );
  }
  assertCount("Attack", "troops", move.troops, from.garrison - 1);
  return { from, to, defenderId };
}

/** Troops that may follow a capture from `from`, given what is left there. */
export function occupyBounds(
  state: GameState,
  from: RegionId,
  to: RegionId,
  combat: CombatConfig,
): PendingCapture {
  const available = (state.regions[from]?.garrison ?? 1) - 1;
  const minMove = available <= combat.occupyMinimum ? available : combat.occupyMinimum;
  return { from, to, minMove, maxMove: available };
}

function eliminate(
  state: GameState,
  eliminatedId: PlayerId,
  byId: PlayerId,
): ActionResult {
  const removedIndex = state.roster.indexOf(eliminatedId);
  const roster = state.roster.filter((id) => id !== eliminatedId);
  const activeIndex =
    removedIndex !== -1 && removedIndex < state.turn.activeIndex
      ? state.turn.activeIndex - 1
      : state.turn.activeIndex;

  const transferred = state.hands[eliminatedId] ?? [];
  const event: PlayerEliminated = {
    type: "PlayerEliminated",
    eliminatedId,
    byId,
    cardsTransferred: transferred,
  };

  return {
    state: {
      ...state,
      roster,
      turn: { ...state.turn, activeIndex },
      hands: {
        ...state.hands,
        [eliminatedId]: [],
        [byId]: [...(state.hands[byId] ?? []), ...transferred],
      },
      armies: { ...state.armies, [eliminatedId]: 0 },
    },
    events: [event],
  };
}

/**
 * Resolve one attack to the end. On a capture the region changes hands
 * with an empty garrison, the defender is eliminated if that was their
 * last region, and the game ends when a single player is left.
 */
export function applyAttack(
  state: GameState,
  map: WorldMap,
  playerId: PlayerId,
  move: AttackMove,
  rng: Rng,
  combat: CombatConfig,
): AttackResult {
  const { from, to, defenderId } = validateAttack(state, map, playerId, move);

  const battle = resolveBattle(move.troops, to.garrison, rng, combat);
  const attackerLosses = move.troops - battle.attackers;
  const defenderLosses = to.garrison - battle.defenders;

  const events: GameEvent[] = [];
  const resolved: AttackResolved = {
    type: "AttackResolved",
    playerId,
    from: move.from,
    to: move.to,
    committed: move.troops,
    rounds: battle.rounds.length,
    attackerLosses,
    defenderLosses,
  };
  events.push(resolved);

  let next: GameState = {
    ...state,
    regions: {
      ...state.regions,
      [move.from]: { ...from, garrison: from.garrison - attackerLosses },
      [move.to]: { ...to, garrison: battle.defenders },
    },
  };

  if (battle.defenders > 0) {
    return { state: next, events, battle };
  }

  next = {
    ...next,
    regions: { ...next.regions, [move.to]: { ownerId: playerId, garrison: 0 } },
    capturedThisTurn: true,
  };
  const captured: RegionCaptured = {
    type: "RegionCaptured",
    from: move.from,
    to: move.to,
    newOwnerId: playerId,
    previousOwnerId: defenderId,
  };
  events.push(captured);

  if (countRegionsOwnedBy(next, defenderId) === 0) {
    const elimination = eliminate(next, defenderId, playerId);
    next = elimination.state;
    events.push(...elimination.events);

    if (next.roster.length === 1) {
      const ended: GameEnded = {
        type: "GameEnded",
        winningPlayerId: playerId,
        round: next.turn.round,
      };
      events.push(ended);
      next = { ...next, winnerId: playerId, turn: { ...next.turn, phase: "GameOver" } };
    }
  }

  return {
    state: next,
    events,
    battle,
    capture: occupyBounds(next, move.from, move.to, combat),
  };
}

// ── Occupy ────────────────────────────────────────────────────────────

/** The mandatory move into a freshly captured region. */
export function applyOccupy(
  state: GameState,
  playerId: PlayerId,
  capture: PendingCapture,
  amount: number,
): ActionResult {
  const current = activePlayer(state);
  if (current !== playerId) {
    throw new InvalidMoveError("Attack", `Not your turn: current player is ${current}`);
  }
  if (!Number.isInteger(amount) || amount < capture.minMove) {
    throw new InvalidMoveError("Attack", `Must move at least ${capture.minMove} troops, got ${amount}`);
  }
  if (amount > capture.maxMove) {
    throw new InvalidMoveError("Attack", `Cannot move more than ${capture.maxMove} troops, got ${amount}`);
  }

  const event: OccupyResolved = {
    type: "OccupyResolved",
    playerId,
    from: capture.from,
    to: capture.to,
    moved: amount,
  };

  return {
    state: { ...state, regions: moveTroops(state.regions, capture.from, capture.to, amount) },
    events: [event],
  };
}

// ── Fortify ──────────────────────────────────────────────────────────

export function validateFortify(
  state: GameState,
  map: WorldMap,
  playerId: PlayerId,
  move: FortifyMove,
  fortify: FortifyConfig,
): void {
  assertTurn(state, playerId, ["Fortify"]);
  const from = ownedRegion(state, playerId, move.from);
  ownedRegion(state, playerId, move.to);

  if (move.from === move.to) {
    throw new InvalidMoveError("Fortify", "Cannot fortify from a region to itself");
  }
  if (from.garrison < 2) {
    throw new InvalidMoveError(
      "Fortify",
      `Region ${move.from} has no troops to spare (has ${from.garrison})`,
    );
  }
  assertCount("Fortify", "amount", move.amount, from.garrison - 1);

  if (!canFortifyBetween(state, map, fortify, playerId, move.from, move.to)) {
    throw new InvalidMoveError(
      "Fortify",
      `Region ${move.to} cannot be reached from ${move.from} (${fortify.fortifyMode})`,
    );
  }
}

export function applyFortify(
  state: GameState,
  map: WorldMap,
  playerId: PlayerId,
  move: FortifyMove,
  fortify: FortifyConfig,
): ActionResult {
  validateFortify(state, map, playerId, move, fortify);

  const event: FortifyResolved = {
    type: "FortifyResolved",
    playerId,
    from: move.from,
    to: move.to,
    moved: move.amount,
  };

  return {
    state: { ...state, regions: moveTroops(state.regions, move.from, move.to, move.amount) },
    events: [event],
  };
}

export function skipFortify(state: GameState, playerId: PlayerId): ActionResult {
  const event: FortifySkipped = { type: "FortifySkipped", playerId };
  return { state, events: [event] };
}

// ── Turn end ──────────────────────────────────────────────────────────

/**
 * Refresh cached army totals, hand out the card earned by a capture (one
 * per turn at most) and pass the turn to the next player in the roster.
 */
export function finishTurn(state: GameState, rng: Rng, cards: CardsConfig): ActionResult {
  const playerId = activePlayer(state);
  const events: GameEvent[] = [];

  const armies: Record<string, number> = { ...state.armies };
  for (const id of state.roster) {
    armies[id] = totalArmies(state, id);
  }

  let { deck, cardsById, hands } = state;
  if (state.capturedThisTurn) {
    const draw = drawCard(deck, cardsById, rng, cards);
    if (draw) {
      if (draw.reshuffle) {
        const reshuffled: DeckReshuffled = {
          type: "DeckReshuffled",
          deckSize: draw.reshuffle.deck.draw.length,
          wildsAdded: draw.reshuffle.wildsAdded,
        };
        events.push(reshuffled);
      }
      deck = draw.deck;
      cardsById = draw.cardsById;
      hands = { ...hands, [playerId]: [...(hands[playerId] ?? []), draw.cardId] };
      const drawn: CardDrawn = { type: "CardDrawn", playerId, cardId: draw.cardId };
      events.push(drawn);
    }
  }

  const ended: TurnEnded = { type: "TurnEnded", playerId, armies: armies[playerId] ?? 0 };
  events.push(ended);

  const wraps = state.turn.activeIndex + 1 >= state.roster.length;
  return {
    state: {
      ...state,
      armies,
      deck,
      cardsById,
      hands,
      allowance: 0,
      capturedThisTurn: false,
      turn: {
        round: wraps ? state.turn.round + 1 : state.turn.round,
        activeIndex: wraps ? 0 : state.turn.activeIndex + 1,
        phase: "Draft",
      },
    },
    events,
  };
}
