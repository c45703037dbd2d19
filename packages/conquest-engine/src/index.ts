/**
 * conquest-engine - A deterministic, headless territory-conquest engine.
 */

export const ENGINE_VERSION = "0.1.0" as const;

export * from "./types.js";
export { InvalidMoveError, CardSetError, ConfigurationError, LoadError } from "./errors.js";
export { createRng, createSequenceRng } from "./rng.js";
export type { Rng, RngState, SeededRng } from "./rng.js";
export {
  validateMap,
  regionIdsOf,
  neighborsOf,
  isAdjacent,
  regionsOwnedBy,
  countRegionsOwnedBy,
  totalArmies,
  attackableNeighbors,
  groupOwner,
  computeGroupOwners,
  canFortifyBetween,
} from "./map.js";
export type { WorldMap, RegionInfo, GroupInfo, MapValidationResult } from "./map.js";
export { loadMap, MapDocumentSchema } from "./map-loader.js";
export type { MapDocument } from "./map-loader.js";
export { defaultRuleset, resolveRuleset, resolveInitialArmies } from "./config.js";
export type {
  RulesetConfig,
  RulesetOverrides,
  SetupConfig,
  CombatConfig,
  ReinforcementConfig,
  FortifyConfig,
  CardsConfig,
  TurnConfig,
} from "./config.js";
export { resolveBattle, rollBattleRound, estimateWinProbability } from "./combat.js";
export type { BattleResult, BattleRound } from "./combat.js";
export {
  classifySet,
  findBestTradeableSet,
  hasAnyValidSet,
  applyTradeIn,
  createDeck,
  reshuffleDeck,
  drawCard,
} from "./cards.js";
export type {
  SetComposition,
  TradeSet,
  TradeInResult,
  DeckCreationResult,
  ReshuffleResult,
  DrawResult,
} from "./cards.js";
export { calculateReinforcements } from "./reinforcements.js";
export type { ReinforcementResult } from "./reinforcements.js";
export { createGame, regionShares } from "./setup.js";
export type { SetupResult } from "./setup.js";
export {
  activePlayer,
  moveTroops,
  beginTurn,
  validateDraft,
  applyDraft,
  validateTrade,
  applyTrade,
  validateAttack,
  applyAttack,
  occupyBounds,
  applyOccupy,
  validateFortify,
  applyFortify,
  skipFortify,
  finishTurn,
} from "./engine.js";
export type { ActionResult, AttackResult } from "./engine.js";
export type { DecisionPolicy, PolicyView, MaybePromise } from "./policy.js";
export { createGreedyBot, createPassiveBot } from "./bots.js";
export { EventLog, describeEvent } from "./event-log.js";
export { TurnEngine } from "./turn-engine.js";
export type { TurnEngineOptions, EngineLogger, GameOutcome } from "./turn-engine.js";
