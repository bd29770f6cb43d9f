import { describe, it, expect } from "vitest";
import { Card, Combo, InvalidCardFormatError } from "../src";

describe("Combo", () => {
  it("stores the higher card first", () => {
    expect(Combo.of("KdAh").toString()).toBe("AhKd");
    expect(Combo.fromCards("2c", "Ah").first).toBe(Card.of("Ah"));
  });

  it("ignores whitespace and card order when comparing", () => {
    expect(Combo.of("Ah Kd").equals(Combo.of("KdAh"))).toBe(true);
    expect(Combo.of("Ah Kd").equals(Combo.of("AhKc"))).toBe(false);
  });

  it("flags pairs and suited hands", () => {
    expect(Combo.of("7c7d").isPair).toBe(true);
    expect(Combo.of("7c7d").isSuited).toBe(false);
    expect(Combo.of("QsJs").isSuited).toBe(true);
  });

  it("rejects the same card twice", () => {
    expect(() => Combo.of("AhAh")).toThrowError(InvalidCardFormatError);
  });

  it("rejects anything but two cards", () => {
    expect(() => Combo.of("AhK")).toThrowError("Invalid card 'AhK': a combo is exactly two cards.");
  });

  it("serializes to its code", () => {
    expect(JSON.stringify([Combo.of("Qs Jc")])).toBe('["QsJc"]');
  });
});
