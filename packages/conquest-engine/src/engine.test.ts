import { describe, expect, test } from "vitest";
import {
  activePlayer,
  applyAttack,
  applyDraft,
  applyFortify,
  applyOccupy,
  applyTrade,
  beginTurn,
  finishTurn,
  occupyBounds,
  skipFortify,
  validateAttack,
} from "./engine.js";
import { defaultRuleset } from "./config.js";
import { InvalidMoveError } from "./errors.js";
import type { WorldMap } from "./map.js";
import { createRng, createSequenceRng } from "./rng.js";
import type {
  CardId,
  GameState,
  GroupId,
  Phase,
  PlayerId,
  RegionId,
  RegionState,
} from "./types.js";

// ── Helpers ────────────────────────────────────────────────────────────

const P1 = "p1" as PlayerId;
const P2 = "p2" as PlayerId;
const P3 = "p3" as PlayerId;
const A = "A" as RegionId;
const B = "B" as RegionId;
const C = "C" as RegionId;
const D = "D" as RegionId;
const E = "E" as RegionId;
const K1 = "k1" as CardId;
const K2 = "k2" as CardId;
const K3 = "k3" as CardId;
const K4 = "k4" as CardId;

const combat = defaultRuleset.combat;
const cards = defaultRuleset.cards;

// A - B - C - D - E
const lineMap: WorldMap = {
  regions: {
    A: { name: "A", groupId: "West" as GroupId },
    B: { name: "B", groupId: "West" as GroupId },
    C: { name: "C", groupId: "East" as GroupId },
    D: { name: "D", groupId: "East" as GroupId },
    E: { name: "E", groupId: "East" as GroupId },
  },
  adjacency: { A: [B], B: [A, C], C: [B, D], D: [C, E], E: [D] },
  groups: {
    West: { regionIds: [A, B], bonus: 2 },
    East: { regionIds: [C, D, E], bonus: 3 },
  },
};

function owned(ownerId: PlayerId, garrison: number): RegionState {
  return { ownerId, garrison };
}

function makeState(
  regions: Record<string, RegionState>,
  overrides?: Partial<GameState>,
): GameState {
  return {
    roster: [P1, P2, P3],
    regions,
    groupOwners: {},
    cardsById: {
      k1: { kind: "Infantry", regionId: A },
      k2: { kind: "Infantry", regionId: C },
      k3: { kind: "Infantry" },
      k4: { kind: "Cavalry" },
    },
    hands: { p1: [], p2: [], p3: [] },
    armies: {},
    deck: { draw: [], discard: [] },
    turn: { round: 1, activeIndex: 0, phase: "Draft" },
    allowance: 0,
    capturedThisTurn: false,
    ...overrides,
  };
}

function inPhase(state: GameState, phase: Phase): GameState {
  return { ...state, turn: { ...state.turn, phase } };
}

function expectInvalid(fn: () => unknown, message: string): void {
  expect(fn).toThrow(InvalidMoveError);
  expect(fn).toThrow(message);
}

/** Attacker rolls 6,5,4 and the lone defender rolls 1. */
const sweep = () => createSequenceRng([6, 5, 4, 1]);

const baseRegions = {
  A: owned(P1, 1),
  B: owned(P1, 5),
  C: owned(P2, 1),
  D: owned(P2, 2),
  E: owned(P3, 3),
};

// ── Turn start ─────────────────────────────────────────────────────────

describe("beginTurn", () => {
  test("grants the allowance and refreshes group owners", () => {
    const state = makeState(baseRegions, { turn: { round: 2, activeIndex: 0, phase: "End" } });
    const result = beginTurn(state, lineMap, defaultRuleset);

    expect(result.state.allowance).toBe(5);
    expect(result.state.turn.phase).toBe("Draft");
    expect(result.state.groupOwners).toEqual({ West: P1, East: null });
    expect(result.events).toEqual([
      { type: "TurnStarted", playerId: P1, round: 2 },
      { type: "ReinforcementsGranted", playerId: P1, amount: 5, sources: { regions: 3, West: 2 } },
    ]);
  });
});

describe("activePlayer", () => {
  test("reads the roster at the active index", () => {
    const state = makeState(baseRegions, { turn: { round: 1, activeIndex: 2, phase: "Draft" } });
    expect(activePlayer(state)).toBe(P3);
  });
});

// ── Draft ──────────────────────────────────────────────────────────────

describe("applyDraft", () => {
  const state = makeState(baseRegions, { allowance: 4 });

  test("places troops and lowers the allowance", () => {
    const result = applyDraft(state, P1, { regionId: A, amount: 3 });
    expect(result.state.regions["A"]?.garrison).toBe(4);
    expect(result.state.allowance).toBe(1);
    expect(result.events).toEqual([{ type: "ReinforcementsPlaced", playerId: P1, regionId: A, count: 3 }]);
  });

  test("rejects regions owned by someone else", () => {
    expectInvalid(() => applyDraft(state, P1, { regionId: C, amount: 1 }), "Region C is not owned by p1");
  });

  test("rejects amounts above the allowance", () => {
    expectInvalid(
      () => applyDraft(state, P1, { regionId: A, amount: 5 }),
      "Invalid amount: 5 exceeds the maximum of 4",
    );
  });

  test("rejects non-positive amounts", () => {
    expectInvalid(
      () => applyDraft(state, P1, { regionId: A, amount: 0 }),
      "Invalid amount: must be a positive integer, got 0",
    );
  });

  test("rejects moves out of turn", () => {
    expectInvalid(() => applyDraft(state, P2, { regionId: C, amount: 1 }), "Not your turn: current player is p1");
  });

  test("rejects moves in the wrong phase", () => {
    expectInvalid(
      () => applyDraft(inPhase(state, "Fortify"), P1, { regionId: A, amount: 1 }),
      "Move not allowed in phase Fortify",
    );
  });

  test("is allowed during the attack phase after a forced trade", () => {
    const result = applyDraft(inPhase(state, "Attack"), P1, { regionId: B, amount: 4 });
    expect(result.state.regions["B"]?.garrison).toBe(9);
  });
});

// ── Trade ──────────────────────────────────────────────────────────────

describe("applyTrade", () => {
  test("trades a set from the active player's hand", () => {
    const state = makeState(baseRegions, {
      allowance: 3,
      hands: { p1: [K1, K2, K3, K4], p2: [], p3: [] },
    });
    const result = applyTrade(state, P1, [K1, K2, K3], cards);
    // k1 is bound to A, which p1 owns
    expect(result.state.allowance).toBe(7);
    expect(result.state.regions["A"]?.garrison).toBe(3);
    expect(result.state.hands["p1"]).toEqual([K4]);
  });

  test("rejects an invalid set as an invalid move", () => {
    const state = makeState(baseRegions, { hands: { p1: [K1, K2, K4], p2: [], p3: [] } });
    expectInvalid(() => applyTrade(state, P1, [K1, K2, K4], cards), "Invalid trade set");
  });

  test("rejects cards held by another player", () => {
    const state = makeState(baseRegions, { hands: { p1: [K1, K2], p2: [K3], p3: [] } });
    expectInvalid(() => applyTrade(state, P1, [K1, K2, K3], cards), "Card k3 is not in your hand");
  });
});

// ── Attack ─────────────────────────────────────────────────────────────

describe("validateAttack", () => {
  const state = inPhase(makeState(baseRegions), "Attack");

  test("rejects attacks on own regions", () => {
    expectInvalid(() => validateAttack(state, lineMap, P1, { from: B, to: A, troops: 1 }), "Cannot attack your own region A");
  });

  test("rejects attacks on regions that are not adjacent", () => {
    expectInvalid(
      () => validateAttack(state, lineMap, P1, { from: B, to: D, troops: 1 }),
      "Region B is not adjacent to D",
    );
  });

  test("requires two troops in the attacking region", () => {
    const weak = inPhase(makeState({ ...baseRegions, B: owned(P1, 1) }), "Attack");
    expectInvalid(
      () => validateAttack(weak, lineMap, P1, { from: B, to: C, troops: 1 }),
      "Region B must have at least 2 troops to attack, has 1",
    );
  });

  test("keeps one troop behind", () => {
    expectInvalid(
      () => validateAttack(state, lineMap, P1, { from: B, to: C, troops: 5 }),
      "Invalid troops: 5 exceeds the maximum of 4",
    );
  });

  test("is only allowed in the attack phase", () => {
    expectInvalid(
      () => validateAttack(inPhase(state, "Draft"), lineMap, P1, { from: B, to: C, troops: 1 }),
      "Move not allowed in phase Draft",
    );
  });
});

describe("applyAttack", () => {
  test("a repelled attack only costs troops", () => {
    const state = inPhase(makeState({ ...baseRegions, C: owned(P2, 2) }), "Attack");
    // R1: [1,1,1] vs [6,6]; R2: [1] vs [6,6]
    const rng = createSequenceRng([1, 1, 1, 6, 6, 1, 6, 6]);

    const result = applyAttack(state, lineMap, P1, { from: B, to: C, troops: 3 }, rng, combat);

    expect(result.capture).toBeUndefined();
    expect(result.state.regions["B"]).toEqual(owned(P1, 2));
    expect(result.state.regions["C"]).toEqual(owned(P2, 2));
    expect(result.state.capturedThisTurn).toBe(false);
    expect(result.events).toEqual([
      {
        type: "AttackResolved",
        playerId: P1,
        from: B,
        to: C,
        committed: 3,
        rounds: 2,
        attackerLosses: 3,
        defenderLosses: 0,
      },
    ]);
  });

  test("a capture empties the region and waits for the occupy", () => {
    const state = inPhase(makeState(baseRegions), "Attack");

    const result = applyAttack(state, lineMap, P1, { from: B, to: C, troops: 4 }, sweep(), combat);

    expect(result.state.regions["C"]).toEqual(owned(P1, 0));
    expect(result.state.regions["B"]).toEqual(owned(P1, 5));
    expect(result.state.capturedThisTurn).toBe(true);
    expect(result.capture).toEqual({ from: B, to: C, minMove: 3, maxMove: 4 });
    expect(result.events.map((e) => e.type)).toEqual(["AttackResolved", "RegionCaptured"]);
    expect(result.events[1]).toEqual({
      type: "RegionCaptured",
      from: B,
      to: C,
      newOwnerId: P1,
      previousOwnerId: P2,
    });
  });

  test("eliminating a later seat hands over its cards", () => {
    const state = inPhase(
      makeState(
        { A: owned(P1, 1), B: owned(P1, 1), C: owned(P2, 1), D: owned(P1, 4), E: owned(P3, 1) },
        { hands: { p1: [K3], p2: [], p3: [K1, K2] } },
      ),
      "Attack",
    );

    const result = applyAttack(state, lineMap, P1, { from: D, to: E, troops: 3 }, sweep(), combat);

    expect(result.state.roster).toEqual([P1, P2]);
    expect(result.state.turn.activeIndex).toBe(0);
    expect(result.state.hands["p1"]).toEqual([K3, K1, K2]);
    expect(result.state.hands["p3"]).toEqual([]);
    expect(result.state.armies["p3"]).toBe(0);
    expect(result.events[2]).toEqual({
      type: "PlayerEliminated",
      eliminatedId: P3,
      byId: P1,
      cardsTransferred: [K1, K2],
    });
    expect(result.state.winnerId).toBeUndefined();
  });

  test("eliminating an earlier seat keeps the active player", () => {
    const state = makeState(
      { A: owned(P1, 1), B: owned(P3, 4), C: owned(P2, 1), D: owned(P2, 1), E: owned(P2, 1) },
      { turn: { round: 3, activeIndex: 2, phase: "Attack" } },
    );

    const result = applyAttack(state, lineMap, P3, { from: B, to: A, troops: 3 }, sweep(), combat);

    expect(result.state.roster).toEqual([P2, P3]);
    expect(result.state.turn.activeIndex).toBe(1);
    expect(activePlayer(result.state)).toBe(P3);
  });

  test("taking the last enemy region ends the game", () => {
    const state = makeState(
      { A: owned(P1, 1), B: owned(P1, 1), C: owned(P1, 1), D: owned(P1, 4), E: owned(P2, 1) },
      { roster: [P1, P2], hands: { p1: [], p2: [] }, turn: { round: 7, activeIndex: 0, phase: "Attack" } },
    );

    const result = applyAttack(state, lineMap, P1, { from: D, to: E, troops: 3 }, sweep(), combat);

    expect(result.state.winnerId).toBe(P1);
    expect(result.state.turn.phase).toBe("GameOver");
    expect(result.state.roster).toEqual([P1]);
    expect(result.events.at(-1)).toEqual({ type: "GameEnded", winningPlayerId: P1, round: 7 });
    expect(result.capture).toEqual({ from: D, to: E, minMove: 3, maxMove: 3 });
  });
});

// ── Occupy ─────────────────────────────────────────────────────────────

describe("occupyBounds", () => {
  test("requires three troops when more are available", () => {
    const state = makeState(baseRegions);
    expect(occupyBounds(state, B, C, combat)).toEqual({ from: B, to: C, minMove: 3, maxMove: 4 });
  });

  test("requires everything that can move when fewer remain", () => {
    const state = makeState({ ...baseRegions, B: owned(P1, 3) });
    expect(occupyBounds(state, B, C, combat)).toEqual({ from: B, to: C, minMove: 2, maxMove: 2 });
  });
});

describe("applyOccupy", () => {
  const captured = inPhase(makeState({ ...baseRegions, C: owned(P1, 0) }), "Attack");
  const capture = { from: B, to: C, minMove: 3, maxMove: 4 };

  test("moves troops into the captured region", () => {
    const result = applyOccupy(captured, P1, capture, 4);
    expect(result.state.regions["B"]).toEqual(owned(P1, 1));
    expect(result.state.regions["C"]).toEqual(owned(P1, 4));
    expect(result.events).toEqual([{ type: "OccupyResolved", playerId: P1, from: B, to: C, moved: 4 }]);
  });

  test("enforces the minimum", () => {
    expectInvalid(() => applyOccupy(captured, P1, capture, 2), "Must move at least 3 troops, got 2");
  });

  test("enforces the maximum", () => {
    expectInvalid(() => applyOccupy(captured, P1, capture, 5), "Cannot move more than 4 troops, got 5");
  });
});

// ── Fortify ────────────────────────────────────────────────────────────

describe("applyFortify", () => {
  const regions = { A: owned(P1, 1), B: owned(P1, 5), C: owned(P2, 1), D: owned(P1, 2), E: owned(P3, 3) };
  const state = inPhase(makeState(regions), "Fortify");

  test("moves troops between owned regions", () => {
    const result = applyFortify(state, lineMap, P1, { from: B, to: D, amount: 4 }, { fortifyMode: "anywhere" });
    expect(result.state.regions["B"]).toEqual(owned(P1, 1));
    expect(result.state.regions["D"]).toEqual(owned(P1, 6));
    expect(result.events).toEqual([{ type: "FortifyResolved", playerId: P1, from: B, to: D, moved: 4 }]);
  });

  test("keeps one troop behind", () => {
    expectInvalid(
      () => applyFortify(state, lineMap, P1, { from: B, to: A, amount: 5 }, { fortifyMode: "anywhere" }),
      "Invalid amount: 5 exceeds the maximum of 4",
    );
  });

  test("rejects a region with nothing to spare", () => {
    expectInvalid(
      () => applyFortify(state, lineMap, P1, { from: A, to: B, amount: 1 }, { fortifyMode: "anywhere" }),
      "Region A has no troops to spare (has 1)",
    );
  });

  test("rejects moving into an enemy region", () => {
    expectInvalid(
      () => applyFortify(state, lineMap, P1, { from: B, to: C, amount: 1 }, { fortifyMode: "anywhere" }),
      "Region C is not owned by p1",
    );
  });

  test("rejects the same region twice", () => {
    expectInvalid(
      () => applyFortify(state, lineMap, P1, { from: B, to: B, amount: 1 }, { fortifyMode: "anywhere" }),
      "Cannot fortify from a region to itself",
    );
  });

  test("connected mode needs an owned path", () => {
    expectInvalid(
      () => applyFortify(state, lineMap, P1, { from: B, to: D, amount: 1 }, { fortifyMode: "connected" }),
      "Region D cannot be reached from B (connected)",
    );
  });

  test("skipping leaves the state alone", () => {
    const result = skipFortify(state, P1);
    expect(result.state).toBe(state);
    expect(result.events).toEqual([{ type: "FortifySkipped", playerId: P1 }]);
  });
});

// ── Turn end ───────────────────────────────────────────────────────────

describe("finishTurn", () => {
  test("passes the turn without a card when nothing was captured", () => {
    const state = inPhase(makeState(baseRegions, { deck: { draw: [K4], discard: [] } }), "End");
    const result = finishTurn(state, createRng("end"), cards);

    expect(result.state.turn).toEqual({ round: 1, activeIndex: 1, phase: "Draft" });
    expect(result.state.hands["p1"]).toEqual([]);
    expect(result.state.armies).toEqual({ p1: 6, p2: 3, p3: 3 });
    expect(result.events).toEqual([{ type: "TurnEnded", playerId: P1, armies: 6 }]);
  });

  test("draws one card after a capture", () => {
    const state = inPhase(
      makeState(baseRegions, { deck: { draw: [K4, K3], discard: [] }, capturedThisTurn: true }),
      "End",
    );
    const result = finishTurn(state, createRng("end"), cards);

    expect(result.state.hands["p1"]).toEqual([K4]);
    expect(result.state.deck.draw).toEqual([K3]);
    expect(result.state.capturedThisTurn).toBe(false);
    expect(result.events.map((e) => e.type)).toEqual(["CardDrawn", "TurnEnded"]);
  });

  test("reshuffles the discard pile when the deck runs out", () => {
    const state = inPhase(
      makeState(baseRegions, { deck: { draw: [], discard: [K1] }, capturedThisTurn: true }),
      "End",
    );
    const result = finishTurn(state, createRng("reshuffle"), cards);

    expect(result.events[0]).toEqual({ type: "DeckReshuffled", deckSize: 3, wildsAdded: ["card_w0", "card_w1"] });
    expect(result.state.hands["p1"]).toHaveLength(1);
    expect(result.state.deck.draw).toHaveLength(2);
  });

  test("the last seat wraps to a new round", () => {
    const state = makeState(baseRegions, { turn: { round: 4, activeIndex: 2, phase: "End" } });
    const result = finishTurn(state, createRng("wrap"), cards);
    expect(result.state.turn).toEqual({ round: 5, activeIndex: 0, phase: "Draft" });
  });
});
