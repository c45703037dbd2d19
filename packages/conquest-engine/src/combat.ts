import type { CombatConfig } from "./config.js";
import { defaultRuleset } from "./config.js";
import type { Rng } from "./rng.js";

// ── Types ─────────────────────────────────────────────────────────────

export interface BattleRound {
  readonly attackRolls: readonly number[];
  readonly defendRolls: readonly number[];
  readonly attackerLosses: number;
  readonly defenderLosses: number;
  readonly attackersAfter: number;
  readonly defendersAfter: number;
}

export interface BattleResult {
  readonly attackers: number;
  readonly defenders: number;
  readonly rounds: readonly BattleRound[];
}

// ── Dice ──────────────────────────────────────────────────────────────

/**
 * Roll one exchange of dice. Both sides are sorted descending and compared
 * pairwise; the attacker must beat the defender's die, ties go to the defender.
 */
export function rollBattleRound(
  attackerDice: number,
  defenderDice: number,
  rng: Rng,
): Pick<BattleRound, "attackRolls" | "defendRolls" | "attackerLosses" | "defenderLosses"> {
  const attackRolls = rng.rollDice(attackerDice);
  const defendRolls = rng.rollDice(defenderDice);

  const pairs = Math.min(attackRolls.length, defendRolls.length);
  let attackerLosses = 0;
  let defenderLosses = 0;
  for (let i = 0; i < pairs; i++) {
    if (attackRolls[i]! > defendRolls[i]!) {
      defenderLosses++;
    } else {
      attackerLosses++;
    }
  }

  return { attackRolls, defendRolls, attackerLosses, defenderLosses };
}

function assertTroops(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${label} must be a positive integer, got ${value}`);
  }
}

function fight(
  attackers: number,
  defenders: number,
  rng: Rng,
  combat: CombatConfig,
  onRound?: (round: BattleRound) => void,
): { attackers: number; defenders: number } {
  while (attackers > 0 && defenders > 0) {
    const round = rollBattleRound(
      Math.min(combat.maxAttackDice, attackers),
      Math.min(combat.maxDefendDice, defenders),
      rng,
    );
    attackers -= round.attackerLosses;
    defenders -= round.defenderLosses;
    onRound?.({ ...round, attackersAfter: attackers, defendersAfter: defenders });
  }
  return { attackers, defenders };
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Fight until one side is wiped out. Every committed attacker rolls: a
 * troop held back from the attack is simply not part of `attackers`.
 */
export function resolveBattle(
  attackers: number,
  defenders: number,
  rng: Rng,
  combat: CombatConfig = defaultRuleset.combat,
): BattleResult {
  assertTroops("Attacking troops", attackers);
  assertTroops("Defending troops", defenders);

  const rounds: BattleRound[] = [];
  const result = fight(attackers, defenders, rng, combat, (round) => rounds.push(round));
  return { ...result, rounds };
}

/**
 * Monte Carlo estimate of the attacker's chance to wipe out the defenders,
 * as a percentage rounded to `precision` decimals.
 */
export function estimateWinProbability(
  attackers: number,
  defenders: number,
  trials: number,
  rng: Rng,
  precision = 2,
  combat: CombatConfig = defaultRuleset.combat,
): number {
  assertTroops("Attacking troops", attackers);
  assertTroops("Defending troops", defenders);
  if (!Number.isInteger(trials) || trials < 1) {
    throw new RangeError(`Trials must be a positive integer, got ${trials}`);
  }

  let wins = 0;
  for (let i = 0; i < trials; i++) {
    if (fight(attackers, defenders, rng, combat).defenders === 0) wins++;
  }

  const scale = 10 ** precision;
  return Math.round((wins / trials) * 100 * scale) / scale;
}
