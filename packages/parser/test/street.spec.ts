import { describe, it, expect, expectTypeOf } from "vitest";
import { Card } from "@hh-parser/shared";
import { Street } from "../src/street";
import type { PlayerAction } from "../src/types";

const actions: PlayerAction[] = [
  { name: "charlie", action: "check", amount: null },
  { name: "alpha", action: "bet", amount: 120 },
  { name: "charlie", action: "call", amount: 120 }
];

describe("Street", () => {
  it("takes cards as a list, not a concatenated string", () => {
    expectTypeOf<ConstructorParameters<typeof Street>[0]>().toEqualTypeOf<readonly (Card | string)[]>();
    const cards: readonly string[] = Object.freeze(["Kc", "7h", "2s"]);
    expect(new Street(cards).cards.map(String)).toEqual(["Kc", "7h", "2s"]);
  });

  it("reads a dry rainbow flop", () => {
    const street = new Street(["Kc", "7h", "2s"]);
    expect(street.texture()).toEqual({
      isRainbow: true,
      isMonotone: false,
      isTriplet: false,
      hasPair: false,
      hasFlushDraw: false,
      hasStraightDraw: false,
      hasGutshot: false
    });
  });

  it("reads a monotone connected flop", () => {
    const street = new Street(["7s", "Ts", "2s"]);
    expect(street.isMonotone).toBe(true);
    expect(street.hasFlushDraw).toBe(true);
    expect(street.isRainbow).toBe(false);
    expect(street.hasStraightDraw).toBe(true);
    expect(street.hasGutshot).toBe(true);
  });

  it("separates gutshots from straight draws", () => {
    const street = new Street(["9c", "5d", "Ah"]);
    // 9 and 5 are four ranks apart
    expect(street.hasGutshot).toBe(true);
    expect(street.hasStraightDraw).toBe(false);
  });

  it("reads pairs and trips", () => {
    const paired = new Street(["8c", "8d", "3h"]);
    expect(paired.hasPair).toBe(true);
    expect(paired.isTriplet).toBe(false);
    const trips = new Street(["Qc", "Qd", "Qh"]);
    expect(trips.isTriplet).toBe(true);
    expect(trips.hasPair).toBe(true);
    expect(trips.isRainbow).toBe(true);
  });

  it("treats a two-tone flop as a flush draw but not rainbow", () => {
    const street = new Street(["Ah", "Kh", "2c"]);
    expect(street.hasFlushDraw).toBe(true);
    expect(street.isRainbow).toBe(false);
    expect(street.isMonotone).toBe(false);
  });

  it("evaluates a single card street vacuously", () => {
    const street = new Street(["9d"]);
    expect(street.isRainbow).toBe(true);
    expect(street.isMonotone).toBe(true);
    expect(street.hasPair).toBe(false);
  });

  it("lists actors in order of first appearance", () => {
    const street = new Street(["Kc", "7h", "2s"], actions, 195);
    expect(street.players).toEqual(["charlie", "alpha"]);
    expect(street.pot).toBe(195);
  });

  it("returns null players when nobody acted", () => {
    expect(new Street(["Kc", "7h", "2s"]).players).toBeNull();
  });

  it("normalizes card codes and freezes its inputs", () => {
    const street = new Street([Card.of("Kc"), "7h"], actions);
    expect(street.cards[1]).toBe(Card.of("7h"));
    expect(Object.isFrozen(street.cards)).toBe(true);
    expect(Object.isFrozen(street.actions[0])).toBe(true);
    expect(street.actions[0]).not.toBe(actions[0]);
  });

  it("caches flags between reads", () => {
    const street = new Street(["Kc", "7h", "2s"]);
    expect(street.isRainbow).toBe(street.isRainbow);
    expect(street.players).toBe(street.players);
  });
});
