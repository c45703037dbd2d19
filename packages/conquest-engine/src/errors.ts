import type { Phase } from "./types.js";

/**
 * A policy proposed a move that breaks ownership, adjacency or troop-count
 * rules. Raised before any state change, so the engine can recover.
 */
export class InvalidMoveError extends Error {
  readonly phase: Phase;

  constructor(phase: Phase, message: string) {
    super(message);
    this.name = "InvalidMoveError";
    this.phase = phase;
  }
}

/** A trade-in was attempted with cards that do not form a valid set. */
export class CardSetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CardSetError";
  }
}

/** Game setup was given an unsupported roster. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The map document could not be turned into a world model. */
export class LoadError extends Error {
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Map could not be loaded:\n  - ${problems.join("\n  - ")}`);
    this.name = "LoadError";
    this.problems = problems;
  }
}
