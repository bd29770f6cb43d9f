import { UnknownEnumerationValueError } from "../errors";

export type RankSymbol = "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9" | "T" | "J" | "Q" | "K" | "A";

/**
 * One of the 13 ranks. Ordering follows the canonical sequence 2..A via
 * `index`; `value` is the face value (Ace = 14) and never drives ordering.
 */
export class Rank {
  static readonly DEUCE = new Rank(0, "2", "deuce", 2);
  static readonly THREE = new Rank(1, "3", "three", 3);
  static readonly FOUR = new Rank(2, "4", "four", 4);
  static readonly FIVE = new Rank(3, "5", "five", 5);
  static readonly SIX = new Rank(4, "6", "six", 6);
  static readonly SEVEN = new Rank(5, "7", "seven", 7);
  static readonly EIGHT = new Rank(6, "8", "eight", 8);
  static readonly NINE = new Rank(7, "9", "nine", 9);
  static readonly TEN = new Rank(8, "T", "ten", 10);
  static readonly JACK = new Rank(9, "J", "jack", 11);
  static readonly QUEEN = new Rank(10, "Q", "queen", 12);
  static readonly KING = new Rank(11, "K", "king", 13);
  static readonly ACE = new Rank(12, "A", "ace", 14);

  private static readonly ordered: readonly Rank[] = Object.freeze([
    Rank.DEUCE,
    Rank.THREE,
    Rank.FOUR,
    Rank.FIVE,
    Rank.SIX,
    Rank.SEVEN,
    Rank.EIGHT,
    Rank.NINE,
    Rank.TEN,
    Rank.JACK,
    Rank.QUEEN,
    Rank.KING,
    Rank.ACE
  ]);

  private constructor(
    readonly index: number,
    readonly symbol: RankSymbol,
    readonly name: string,
    readonly value: number
  ) {
    Object.freeze(this);
  }

  static values(): readonly Rank[] {
    return Rank.ordered;
  }

  /** Accepts a rank or its symbol; letters are case-insensitive. */
  static of(value: Rank | string): Rank {
    if (value instanceof Rank) {
      return value;
    }
    const upper = value.toUpperCase();
    const found = Rank.ordered.find(rank => rank.symbol === upper);
    if (!found) {
      throw new UnknownEnumerationValueError("rank", value);
    }
    return found;
  }

  static random(rng: () => number = Math.random): Rank {
    return Rank.ordered[Math.floor(rng() * Rank.ordered.length) % Rank.ordered.length];
  }

  static compare(a: Rank, b: Rank): number {
    return a.index - b.index;
  }

  /** Distance between two ranks in the canonical 2..A sequence. */
  static difference(first: Rank | string, second: Rank | string): number {
    return Math.abs(Rank.of(first).index - Rank.of(second).index);
  }

  equals(other: Rank): boolean {
    return this.index === other.index;
  }

  hashCode(): number {
    return this.index;
  }

  toString(): string {
    return this.symbol;
  }
}

export const FACE_RANKS: readonly Rank[] = Object.freeze([Rank.JACK, Rank.QUEEN, Rank.KING]);

export const BROADWAY_RANKS: readonly Rank[] = Object.freeze([
  Rank.TEN,
  Rank.JACK,
  Rank.QUEEN,
  Rank.KING,
  Rank.ACE
]);
