// ── Primitive ID types (branded strings for type safety) ──────────────

export type PlayerId = string & { readonly __brand: "PlayerId" };
export type RegionId = string & { readonly __brand: "RegionId" };
export type GroupId = string & { readonly __brand: "GroupId" };
export type CardId = string & { readonly __brand: "CardId" };

// ── Enums ────────────────────────────────────────────────────────────

export type Phase = "Draft" | "Attack" | "Fortify" | "End" | "GameOver";

export type CardKind = "Infantry" | "Cavalry" | "Artillery" | "Wild";

export type MatchedKind = Exclude<CardKind, "Wild">;

export const MATCHED_KINDS: readonly MatchedKind[] = ["Infantry", "Cavalry", "Artillery"];

// ── Moves (policy → engine) ──────────────────────────────────────────

export interface DraftMove {
  readonly regionId: RegionId;
  readonly amount: number;
}

export interface AttackMove {
  readonly from: RegionId;
  readonly to: RegionId;
  readonly troops: number;
}

export interface FortifyMove {
  readonly from: RegionId;
  readonly to: RegionId;
  readonly amount: number;
}

/** A capture waiting for its mandatory troop move. */
export interface PendingCapture {
  readonly from: RegionId;
  readonly to: RegionId;
  readonly minMove: number;
  readonly maxMove: number;
}

// ── Events (engine → consumer) ───────────────────────────────────────

export type GameEvent =
  | GameStarted
  | RegionAssigned
  | StartingArmiesPlaced
  | TurnStarted
  | ReinforcementsGranted
  | CardsTraded
  | ReinforcementsPlaced
  | ReinforcementsForfeited
  | AttackResolved
  | RegionCaptured
  | PlayerEliminated
  | OccupyResolved
  | FortifyResolved
  | FortifySkipped
  | DeckReshuffled
  | CardDrawn
  | MoveRejected
  | TurnEnded
  | GameEnded;

export interface GameStarted {
  readonly type: "GameStarted";
  readonly roster: readonly PlayerId[];
}

export interface RegionAssigned {
  readonly type: "RegionAssigned";
  readonly playerId: PlayerId;
  readonly regionId: RegionId;
}

export interface StartingArmiesPlaced {
  readonly type: "StartingArmiesPlaced";
  readonly playerId: PlayerId;
  readonly armies: number;
  readonly regionCount: number;
}

export interface TurnStarted {
  readonly type: "TurnStarted";
  readonly playerId: PlayerId;
  readonly round: number;
}

export interface ReinforcementsGranted {
  readonly type: "ReinforcementsGranted";
  readonly playerId: PlayerId;
  readonly amount: number;
  readonly sources: Record<string, number>;
}

export interface CardsTraded {
  readonly type: "CardsTraded";
  readonly playerId: PlayerId;
  readonly cardIds: readonly CardId[];
  readonly value: number;
  readonly bonusRegionId?: RegionId;
  readonly bonusArmies: number;
}

export interface ReinforcementsPlaced {
  readonly type: "ReinforcementsPlaced";
  readonly playerId: PlayerId;
  readonly regionId: RegionId;
  readonly count: number;
}

export interface ReinforcementsForfeited {
  readonly type: "ReinforcementsForfeited";
  readonly playerId: PlayerId;
  readonly count: number;
}

export interface AttackResolved {
  readonly type: "AttackResolved";
  readonly playerId: PlayerId;
  readonly from: RegionId;
  readonly to: RegionId;
  readonly committed: number;
  readonly rounds: number;
  readonly attackerLosses: number;
  readonly defenderLosses: number;
}

export interface RegionCaptured {
  readonly type: "RegionCaptured";
  readonly from: RegionId;
  readonly to: RegionId;
  readonly newOwnerId: PlayerId;
  readonly previousOwnerId: PlayerId;
}

export interface PlayerEliminated {
  readonly type: "PlayerEliminated";
  readonly eliminatedId: PlayerId;
  readonly byId: PlayerId;
  readonly cardsTransferred: readonly CardId[];
}

export interface OccupyResolved {
  readonly type: "OccupyResolved";
  readonly playerId: PlayerId;
  readonly from: RegionId;
  readonly to: RegionId;
  readonly moved: number;
}

export interface FortifyResolved {
  readonly type: "FortifyResolved";
  readonly playerId: PlayerId;
  readonly from: RegionId;
  readonly to: RegionId;
  readonly moved: number;
}

export interface FortifySkipped {
  readonly type: "FortifySkipped";
  readonly playerId: PlayerId;
}

export interface DeckReshuffled {
  readonly type: "DeckReshuffled";
  readonly deckSize: number;
  readonly wildsAdded: readonly CardId[];
}

export interface CardDrawn {
  readonly type: "CardDrawn";
  readonly playerId: PlayerId;
  readonly cardId: CardId;
}

export interface MoveRejected {
  readonly type: "MoveRejected";
  readonly playerId: PlayerId;
  readonly phase: Phase;
  readonly reason: string;
}

export interface TurnEnded {
  readonly type: "TurnEnded";
  readonly playerId: PlayerId;
  readonly armies: number;
}

export interface GameEnded {
  readonly type: "GameEnded";
  readonly winningPlayerId: PlayerId;
  readonly round: number;
}

// ── GameState ────────────────────────────────────────────────────────

export interface RegionState {
  readonly ownerId: PlayerId | null;
  readonly garrison: number;
}

export interface CardState {
  readonly kind: CardKind;
  readonly regionId?: RegionId;
}

export interface DeckState {
  readonly draw: readonly CardId[];
  readonly discard: readonly CardId[];
}

export interface TurnState {
  readonly round: number;
  /** Index into `roster` of the player whose turn it is. */
  readonly activeIndex: number;
  readonly phase: Phase;
}

export interface GameState {
  /** Live turn order. Eliminated players are removed. */
  readonly roster: readonly PlayerId[];
  readonly regions: Record<string, RegionState>;
  readonly groupOwners: Record<string, PlayerId | null>;
  readonly cardsById: Record<string, CardState>;
  readonly hands: Record<string, readonly CardId[]>;
  /** Cached army totals, recomputed from regions at the end of each turn. */
  readonly armies: Record<string, number>;
  readonly deck: DeckState;
  readonly turn: TurnState;
  /** Reinforcements still to be placed by the active player. */
  readonly allowance: number;
  readonly capturedThisTurn: boolean;
  readonly winnerId?: PlayerId;
}
