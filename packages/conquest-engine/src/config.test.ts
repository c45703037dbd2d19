import { describe, expect, test } from "vitest";
import { defaultRuleset, resolveInitialArmies, resolveRuleset } from "./config.js";
import { ConfigurationError } from "./errors.js";

describe("defaultRuleset", () => {
  test("uses the classic starting armies", () => {
    expect(defaultRuleset.setup.playerInitialArmies).toEqual({ 2: 40, 3: 35, 4: 30, 5: 25, 6: 20 });
  });

  test("uses the classic trade table", () => {
    expect(defaultRuleset.cards.threeOfAKindValues).toEqual({
      Infantry: 4,
      Cavalry: 6,
      Artillery: 8,
    });
    expect(defaultRuleset.cards.oneOfEachValue).toBe(10);
    expect(defaultRuleset.cards.forcedTradeHandSize).toBe(5);
  });

  test("rolls up to 3 attacking and 2 defending dice", () => {
    expect(defaultRuleset.combat.maxAttackDice).toBe(3);
    expect(defaultRuleset.combat.maxDefendDice).toBe(2);
  });
});

describe("resolveRuleset", () => {
  test("returns the defaults without overrides", () => {
    expect(resolveRuleset()).toEqual(defaultRuleset);
  });

  test("merges overrides per section", () => {
    const ruleset = resolveRuleset({
      fortify: { fortifyMode: "connected" },
      cards: { oneOfEachValue: 12 },
    });
    expect(ruleset.fortify.fortifyMode).toBe("connected");
    expect(ruleset.cards.oneOfEachValue).toBe(12);
    expect(ruleset.cards.forcedTradeHandSize).toBe(5);
    expect(ruleset.combat).toEqual(defaultRuleset.combat);
  });

  test("does not mutate the defaults", () => {
    resolveRuleset({ turn: { invalidMoveRetries: 4 } });
    expect(defaultRuleset.turn.invalidMoveRetries).toBe(0);
  });
});

describe("resolveInitialArmies", () => {
  test("looks up the table by player count", () => {
    expect(resolveInitialArmies(defaultRuleset.setup, 2)).toBe(40);
    expect(resolveInitialArmies(defaultRuleset.setup, 6)).toBe(20);
  });

  test("rejects unsupported player counts", () => {
    expect(() => resolveInitialArmies(defaultRuleset.setup, 1)).toThrow(ConfigurationError);
    expect(() => resolveInitialArmies(defaultRuleset.setup, 7)).toThrow(
      "Unsupported player count 7: expected 2-6",
    );
  });
});
