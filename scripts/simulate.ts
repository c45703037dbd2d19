/**
 * All-bot simulation.
 *
 * Loads a map, seats greedy (and optionally passive) bots in a shuffled
 * order, plays the game out and prints the event log. The full log is also
 * written to the next free `<n>.txt` in the log directory.
 *
 * Usage:
 *   npm run simulate -- [--map path.json] [--players 6] [--passive 0]
 *                       [--seed text] [--max-rounds 500] [--log-dir game_logs]
 */

import { mkdir, readdir, writeFile } from "node:fs/promises";
import { join, parse } from "node:path";
import { parseArgs } from "node:util";
import {
  TurnEngine,
  createGame,
  createGreedyBot,
  createPassiveBot,
  createRng,
  defaultRuleset,
} from "conquest-engine";
import type { DecisionPolicy, PlayerId } from "conquest-engine";
import { classicMapPath, loadMapFile } from "conquest-maps";

const { values } = parseArgs({
  options: {
    map: { type: "string" },
    players: { type: "string" },
    passive: { type: "string" },
    seed: { type: "string" },
    "max-rounds": { type: "string" },
    "log-dir": { type: "string" },
  },
});

function intOption(name: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    console.error(`--${name} must be an integer >= ${min}, got "${raw}"`);
    process.exit(1);
  }
  return value;
}

const mapPath = values.map ?? classicMapPath;
const seed = values.seed ?? String(Date.now());
const logDir = values["log-dir"] ?? "game_logs";
const playerCount = intOption("players", values.players, 6, 1);
const passiveCount = intOption("passive", values.passive, 0, 0);
const maxRounds = intOption("max-rounds", values["max-rounds"], 500, 1);
if (passiveCount > playerCount) {
  console.error(`--passive (${passiveCount}) cannot exceed --players (${playerCount})`);
  process.exit(1);
}

/** Next unused `<n>.txt` in `dir`. */
async function nextLogPath(dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const taken = (await readdir(dir))
    .filter((name) => name.endsWith(".txt"))
    .map((name) => Number(parse(name).name))
    .filter((n) => Number.isInteger(n));
  const next = taken.length > 0 ? Math.max(...taken) + 1 : 1;
  return join(dir, `${next}.txt`);
}

const rng = createRng(seed);
const map = await loadMapFile(mapPath);

const seats = rng.shuffle(
  Array.from({ length: playerCount }, (_, i) => `P${i + 1}` as PlayerId),
);
const policies: Record<string, DecisionPolicy> = {};
seats.forEach((playerId, i) => {
  policies[playerId] = i < passiveCount ? createPassiveBot(rng) : createGreedyBot();
});

const setup = createGame(map, seats, rng, defaultRuleset);
const engine = new TurnEngine({ map, state: setup.state, policies, rng, ruleset: defaultRuleset });
engine.record(setup.events);

console.info(
  JSON.stringify({
    scope: "simulate",
    event: "game_started",
    seed,
    map: mapPath,
    roster: seats,
  }),
);

while (!engine.isOver && engine.state.turn.round <= maxRounds) {
  await engine.playRound();
  for (const line of engine.log.unread()) {
    console.log(line);
  }
}
// Every round is already played; this only settles and logs the outcome.
const outcome = await engine.run({ maxRounds });

const logPath = await nextLogPath(logDir);
await writeFile(logPath, `${engine.log.entries().join("\n")}\n`, "utf8");

console.info(
  JSON.stringify({
    scope: "simulate",
    event: "log_written",
    path: logPath,
    winnerId: outcome.winnerId,
    rounds: outcome.rounds,
  }),
);
