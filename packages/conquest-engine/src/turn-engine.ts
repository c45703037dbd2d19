import type { GameEvent, GameState, MoveRejected, PendingCapture, Phase, PlayerId } from "./types.js";
import type { WorldMap } from "./map.js";
import type { RulesetConfig } from "./config.js";
import { defaultRuleset } from "./config.js";
import type { DecisionPolicy, MaybePromise, PolicyView } from "./policy.js";
import type { ActionResult } from "./engine.js";
import {
  activePlayer,
  applyAttack,
  applyDraft,
  applyFortify,
  applyOccupy,
  applyTrade,
  beginTurn,
  finishTurn,
  forfeitAllowance,
  occupyBounds,
  setPhase,
  skipFortify,
} from "./engine.js";
import { findBestTradeableSet, hasAnyValidSet } from "./cards.js";
import { ConfigurationError, InvalidMoveError } from "./errors.js";
import { EventLog } from "./event-log.js";
import type { Rng } from "./rng.js";

export interface EngineLogger {
  info(message: string): void;
  warn(message: string): void;
}

export interface TurnEngineOptions {
  readonly map: WorldMap;
  readonly state: GameState;
  /** One policy per player id in the roster. */
  readonly policies: Readonly<Record<string, DecisionPolicy>>;
  readonly rng: Rng;
  readonly ruleset?: RulesetConfig;
  readonly logger?: EngineLogger;
  readonly log?: EventLog;
}

export interface GameOutcome {
  readonly winnerId: PlayerId | null;
  readonly rounds: number;
}

type Attempt<R> = { readonly ok: true; readonly value: R } | { readonly ok: false };

/**
 * Drives the Draft → Attack → Fortify → End cycle for each player in the
 * live roster. It is the only writer of game state: policies propose, the
 * engine validates and applies.
 *
 * Turn order walks the roster by index. An elimination removes the player
 * from the roster and shifts the active index down when the removed seat
 * came before it, so the next turn always goes to the seat after the
 * current player.
 */
export class TurnEngine {
  readonly map: WorldMap;
  readonly ruleset: RulesetConfig;
  readonly log: EventLog;

  private current: GameState;
  private readonly policies: Readonly<Record<string, DecisionPolicy>>;
  private readonly rng: Rng;
  private readonly logger: EngineLogger;
  private readonly history: GameEvent[] = [];

  constructor(options: TurnEngineOptions) {
    for (const playerId of options.state.roster) {
      if (!options.policies[playerId]) {
        throw new ConfigurationError(`No decision policy for player ${playerId}`);
      }
    }
    this.map = options.map;
    this.current = options.state;
    this.policies = options.policies;
    this.rng = options.rng;
    this.ruleset = options.ruleset ?? defaultRuleset;
    this.logger = options.logger ?? console;
    this.log = options.log ?? new EventLog();
  }

  get state(): GameState {
    return this.current;
  }

  get events(): readonly GameEvent[] {
    return this.history;
  }

  get isOver(): boolean {
    return this.current.winnerId !== undefined;
  }

  /** Record events produced outside the engine, such as game setup. */
  record(events: readonly GameEvent[]): void {
    for (const event of events) {
      this.history.push(event);
      this.log.record(event);
    }
  }

  // ── Turn loop ─────────────────────────────────────────────────────

  async playTurn(): Promise<void> {
    if (this.isOver) return;

    const playerId = activePlayer(this.current);
    const policy = this.policyFor(playerId);

    this.commit(beginTurn(this.current, this.map, this.ruleset));
    await this.trades(playerId, policy, true);
    await this.draft(playerId, policy);

    this.current = setPhase(this.current, "Attack");
    await this.attacks(playerId, policy);
    if (this.isOver) return;

    this.current = setPhase(this.current, "Fortify");
    await this.fortify(playerId, policy);

    this.current = setPhase(this.current, "End");
    this.commit(finishTurn(this.current, this.rng, this.ruleset.cards));
  }

  /** Play turns until the round counter moves on or the game ends. */
  async playRound(): Promise<void> {
    const round = this.current.turn.round;
    while (!this.isOver && this.current.turn.round === round) {
      await this.playTurn();
    }
  }

  async run(options: { readonly maxRounds?: number } = {}): Promise<GameOutcome> {
    const maxRounds = options.maxRounds ?? Number.POSITIVE_INFINITY;
    while (!this.isOver && this.current.turn.round <= maxRounds) {
      await this.playRound();
    }

    const outcome: GameOutcome = {
      winnerId: this.current.winnerId ?? null,
      rounds: this.isOver ? this.current.turn.round : this.current.turn.round - 1,
    };
    this.logger.info(
      JSON.stringify({
        scope: "turnEngine",
        event: outcome.winnerId ? "game_won" : "round_limit_reached",
        winnerId: outcome.winnerId,
        rounds: outcome.rounds,
      }),
    );
    return outcome;
  }

  // ── Phases ─────────────────────────────────────────────────────────

  /** Trade while the hand is at the forced size; otherwise only on request. */
  private async trades(playerId: PlayerId, policy: DecisionPolicy, voluntary: boolean): Promise<void> {
    const cards = this.ruleset.cards;

    for (;;) {
      const hand = this.current.hands[playerId] ?? [];
      const forced = hand.length >= cards.forcedTradeHandSize;
      if (!forced && (!voluntary || !hasAnyValidSet(hand, this.current.cardsById, cards))) return;

      const result = await this.attempt(
        playerId,
        () => policy.trade(this.view(playerId)),
        (cardIds) => {
          if (cardIds === null) {
            if (forced) {
              throw new InvalidMoveError(
                this.current.turn.phase,
                `A trade is required with ${hand.length} cards in hand`,
              );
            }
            return false;
          }
          this.commit(applyTrade(this.current, playerId, cardIds, cards));
          return true;
        },
      );

      if (!result.ok) {
        if (!forced) return;
        const best = findBestTradeableSet(hand, this.current.cardsById, cards);
        if (!best) return;
        this.commit(applyTrade(this.current, playerId, best, cards));
      } else if (!result.value) {
        return;
      }
    }
  }

  private async draft(playerId: PlayerId, policy: DecisionPolicy): Promise<void> {
    while (this.current.allowance > 0) {
      const result = await this.attempt(
        playerId,
        () => policy.draft(this.view(playerId)),
        (move) => this.commit(applyDraft(this.current, playerId, move)),
      );
      if (!result.ok) {
        this.logger.warn(
          JSON.stringify({
            scope: "turnEngine",
            event: "allowance_forfeited",
            playerId,
            count: this.current.allowance,
          }),
        );
        this.commit(forfeitAllowance(this.current, playerId));
      }
    }
  }

  private async attacks(playerId: PlayerId, policy: DecisionPolicy): Promise<void> {
    while (!this.isOver) {
      const result = await this.attempt(
        playerId,
        () => policy.attack(this.view(playerId)),
        (move) => {
          if (move === null) return null;
          const outcome = applyAttack(
            this.current,
            this.map,
            playerId,
            move,
            this.rng,
            this.ruleset.combat,
          );
          this.commit(outcome);
          return outcome.capture ?? false;
        },
      );
      if (!result.ok || result.value === null) return;
      if (result.value !== false) {
        await this.occupy(playerId, policy, result.value);
      }
    }
  }

  /**
   * Settle a capture: forced trades first (an elimination can hand over a
   * full hand), then the mandatory move into the captured region.
   */
  private async occupy(playerId: PlayerId, policy: DecisionPolicy, capture: PendingCapture): Promise<void> {
    if (this.isOver) {
      this.commit(applyOccupy(this.current, playerId, capture, capture.minMove));
      return;
    }

    await this.trades(playerId, policy, false);
    await this.draft(playerId, policy);

    const bounds = occupyBounds(this.current, capture.from, capture.to, this.ruleset.combat);
    if (bounds.minMove === bounds.maxMove) {
      this.commit(applyOccupy(this.current, playerId, bounds, bounds.maxMove));
      return;
    }

    const result = await this.attempt(
      playerId,
      () => policy.occupy(this.view(playerId), bounds),
      (amount) => this.commit(applyOccupy(this.current, playerId, bounds, amount)),
    );
    if (!result.ok) {
      this.commit(applyOccupy(this.current, playerId, bounds, bounds.minMove));
    }
  }

  private async fortify(playerId: PlayerId, policy: DecisionPolicy): Promise<void> {
    await this.attempt(
      playerId,
      () => policy.fortify(this.view(playerId)),
      (move) =>
        this.commit(
          move === null
            ? skipFortify(this.current, playerId)
            : applyFortify(this.current, this.map, playerId, move, this.ruleset.fortify),
        ),
    );
  }

  // ── Helpers ────────────────────────────────────────────────────────

  private policyFor(playerId: PlayerId): DecisionPolicy {
    const policy = this.policies[playerId];
    if (!policy) {
      throw new ConfigurationError(`No decision policy for player ${playerId}`);
    }
    return policy;
  }

  private view(playerId: PlayerId): PolicyView {
    return { playerId, state: this.current, map: this.map, ruleset: this.ruleset };
  }

  private commit(result: ActionResult): void {
    this.current = result.state;
    this.record(result.events);
  }

  /**
   * Ask the policy, then apply its answer. Invalid moves are logged and
   * the policy is asked again up to `invalidMoveRetries` times. Any other
   * error is a fault and propagates.
   */
  private async attempt<T, R>(
    playerId: PlayerId,
    propose: () => MaybePromise<T>,
    apply: (move: T) => R,
  ): Promise<Attempt<R>> {
    const attempts = 1 + Math.max(0, this.ruleset.turn.invalidMoveRetries);
    for (let i = 0; i < attempts; i++) {
      const move = await propose();
      try {
        return { ok: true, value: apply(move) };
      } catch (error) {
        if (!(error instanceof InvalidMoveError)) throw error;
        this.reject(playerId, error.phase, error.message);
      }
    }
    return { ok: false };
  }

  private reject(playerId: PlayerId, phase: Phase, reason: string): void {
    this.logger.warn(
      JSON.stringify({ scope: "turnEngine", event: "move_rejected", playerId, phase, reason }),
    );
    const event: MoveRejected = { type: "MoveRejected", playerId, phase, reason };
    this.record([event]);
  }
}
