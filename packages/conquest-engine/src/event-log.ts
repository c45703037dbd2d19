import type { GameEvent } from "./types.js";

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}

/** One human-readable line per event. */
export function describeEvent(event: GameEvent): string {
  switch (event.type) {
    case "GameStarted":
      return `Game started with ${event.roster.join(", ")}.`;
    case "RegionAssigned":
      return `${event.playerId} received ${event.regionId}.`;
    case "StartingArmiesPlaced":
      return `${event.playerId} starts with ${plural(event.armies, "troop")} on ${plural(event.regionCount, "region")}.`;
    case "TurnStarted":
      return `--- Round ${event.round}: ${event.playerId}'s turn ---`;
    case "ReinforcementsGranted": {
      const sources = Object.entries(event.sources)
        .map(([source, amount]) => `${source} ${amount}`)
        .join(", ");
      return `[DRAFT] ${event.playerId} receives ${plural(event.amount, "troop")} (${sources}).`;
    }
    case "CardsTraded": {
      const bonus = event.bonusRegionId
        ? ` and ${event.bonusArmies} on ${event.bonusRegionId}`
        : "";
      return `${event.playerId} traded ${event.cardIds.join(", ")} for ${plural(event.value, "troop")}${bonus}.`;
    }
    case "ReinforcementsPlaced":
      return `${event.playerId} placed ${plural(event.count, "troop")} in ${event.regionId}.`;
    case "ReinforcementsForfeited":
      return `${event.playerId} forfeits ${plural(event.count, "unplaced troop")}.`;
    case "AttackResolved":
      return `[ATTACK] ${event.playerId} attacked ${event.to} from ${event.from} with ${plural(event.committed, "troop")}: lost ${event.attackerLosses}, killed ${event.defenderLosses} in ${plural(event.rounds, "round")}.`;
    case "RegionCaptured":
      return `${event.newOwnerId} captured ${event.to} from ${event.previousOwnerId}.`;
    case "PlayerEliminated":
      return `${event.eliminatedId} was eliminated by ${event.byId} (${plural(event.cardsTransferred.length, "card")} taken).`;
    case "OccupyResolved":
      return `${event.playerId} moved ${plural(event.moved, "troop")} from ${event.from} into ${event.to}.`;
    case "FortifyResolved":
      return `[FORTIFY] ${event.playerId} moved ${plural(event.moved, "troop")} from ${event.from} to ${event.to}.`;
    case "FortifySkipped":
      return `[FORTIFY] ${event.playerId} did not fortify.`;
    case "DeckReshuffled":
      return `Deck reshuffled with ${plural(event.wildsAdded.length, "wildcard")} (${plural(event.deckSize, "card")}).`;
    case "CardDrawn":
      return `${event.playerId} drew a card.`;
    case "MoveRejected":
      return `Rejected ${event.phase.toLowerCase()} move by ${event.playerId}: ${event.reason}`;
    case "TurnEnded":
      return `${event.playerId} ends with ${plural(event.armies, "troop")}.`;
    case "GameEnded":
      return `${event.winningPlayerId} wins in round ${event.round}.`;
  }
}

/**
 * Append-only list of log lines. Readers either take the whole log or only
 * what was appended since their previous `unread()` call.
 */
export class EventLog {
  private readonly lines: string[] = [];
  private cursor = 0;

  append(line: string): void {
    this.lines.push(line);
  }

  record(event: GameEvent): void {
    this.append(describeEvent(event));
  }

  get size(): number {
    return this.lines.length;
  }

  /** Every line so far. Also marks them as read. */
  entries(): readonly string[] {
    this.cursor = this.lines.length;
    return this.lines.slice();
  }

  unread(): readonly string[] {
    const out = this.lines.slice(this.cursor);
    this.cursor = this.lines.length;
    return out;
  }
}
