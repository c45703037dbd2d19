import type {
  AttackMove,
  CardId,
  DraftMove,
  FortifyMove,
  GameState,
  PendingCapture,
  PlayerId,
} from "./types.js";
import type { WorldMap } from "./map.js";
import type { RulesetConfig } from "./config.js";

export type MaybePromise<T> = T | Promise<T>;

/** Read-only picture of the game handed to the acting player's policy. */
export interface PolicyView {
  readonly playerId: PlayerId;
  readonly state: GameState;
  readonly map: WorldMap;
  readonly ruleset: RulesetConfig;
}

/**
 * How a player decides. The engine calls one method at a time and checks
 * every answer before applying it; a policy never changes state itself.
 * Interactive policies may answer asynchronously.
 */
export interface DecisionPolicy {
  /** Where to place some of the remaining allowance (`state.allowance`). */
  draft(view: PolicyView): MaybePromise<DraftMove>;
  /** Next attack, or null to end the attack phase. Asked again after every battle. */
  attack(view: PolicyView): MaybePromise<AttackMove | null>;
  /** Troops to move into a region just captured, within the capture's bounds. */
  occupy(view: PolicyView, capture: PendingCapture): MaybePromise<number>;
  /** The voluntary regroup at the end of the turn, or null to skip it. */
  fortify(view: PolicyView): MaybePromise<FortifyMove | null>;
  /** Three cards to trade in, or null. Null is refused while a trade is forced. */
  trade(view: PolicyView): MaybePromise<readonly CardId[] | null>;
}
