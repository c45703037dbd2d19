import type { MatchedKind } from "./types.js";
import { ConfigurationError } from "./errors.js";

// ── Setup ─────────────────────────────────────────────────────────────

export interface SetupConfig {
  /** Starting armies per player, keyed by player count. */
  readonly playerInitialArmies: Record<number, number>;
  readonly minPlayers: number;
  readonly maxPlayers: number;
}

export function resolveInitialArmies(setup: SetupConfig, playerCount: number): number {
  const armies = setup.playerInitialArmies[playerCount];
  if (
    playerCount < setup.minPlayers ||
    playerCount > setup.maxPlayers ||
    armies === undefined
  ) {
    throw new ConfigurationError(
      `Unsupported player count ${playerCount}: expected ${setup.minPlayers}-${setup.maxPlayers}`,
    );
  }
  return armies;
}

// ── Combat ────────────────────────────────────────────────────────────

export interface CombatConfig {
  readonly maxAttackDice: number;
  readonly maxDefendDice: number;
  /** Troops that must move after a capture, unless fewer are available. */
  readonly occupyMinimum: number;
}

// ── Reinforcements ────────────────────────────────────────────────────

export interface ReinforcementConfig {
  readonly minimum: number;
  readonly regionsPerArmy: number;
}

// ── Fortify ───────────────────────────────────────────────────────────

export interface FortifyConfig {
  /**
   * `anywhere`: any two owned regions. `adjacent`: neighbours only.
   * `connected`: a path through the player's own regions.
   */
  readonly fortifyMode: "anywhere" | "adjacent" | "connected";
}

// ── Cards / Trading ───────────────────────────────────────────────────

export interface CardsConfig {
  readonly threeOfAKindValues: Record<MatchedKind, number>;
  readonly oneOfEachValue: number;
  readonly forcedTradeHandSize: number;
  readonly regionTradeBonus: number;
  readonly wildsPerReshuffle: number;
}

// ── Turn control ─────────────────────────────────────────────────────

export interface TurnConfig {
  /** How often a policy is asked again after an invalid move before the phase ends. */
  readonly invalidMoveRetries: number;
}

// ── Full Config ───────────────────────────────────────────────────────

export interface RulesetConfig {
  readonly setup: SetupConfig;
  readonly combat: CombatConfig;
  readonly reinforcements: ReinforcementConfig;
  readonly fortify: FortifyConfig;
  readonly cards: CardsConfig;
  readonly turn: TurnConfig;
}

export type RulesetOverrides = {
  readonly [K in keyof RulesetConfig]?: Partial<RulesetConfig[K]>;
};

// ── Default ───────────────────────────────────────────────────────────

export const defaultRuleset: RulesetConfig = {
  setup: {
    playerInitialArmies: {
      2: 40,
      3: 35,
      4: 30,
      5: 25,
      6: 20,
    },
    minPlayers: 2,
    maxPlayers: 6,
  },

  combat: {
    maxAttackDice: 3,
    maxDefendDice: 2,
    occupyMinimum: 3,
  },

  reinforcements: {
    minimum: 3,
    regionsPerArmy: 3,
  },

  fortify: {
    fortifyMode: "anywhere",
  },

  cards: {
    threeOfAKindValues: {
      Infantry: 4,
      Cavalry: 6,
      Artillery: 8,
    },
    oneOfEachValue: 10,
    forcedTradeHandSize: 5,
    regionTradeBonus: 2,
    wildsPerReshuffle: 2,
  },

  turn: {
    invalidMoveRetries: 0,
  },
};

/** Merge section-level overrides over the default ruleset. */
export function resolveRuleset(overrides: RulesetOverrides = {}): RulesetConfig {
  return {
    setup: { ...defaultRuleset.setup, ...overrides.setup },
    combat: { ...defaultRuleset.combat, ...overrides.combat },
    reinforcements: { ...defaultRuleset.reinforcements, ...overrides.reinforcements },
    fortify: { ...defaultRuleset.fortify, ...overrides.fortify },
    cards: { ...defaultRuleset.cards, ...overrides.cards },
    turn: { ...defaultRuleset.turn, ...overrides.turn },
  };
}
