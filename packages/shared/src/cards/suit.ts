import { UnknownEnumerationValueError } from "../errors";

export type SuitCode = "c" | "d" | "h" | "s";

export class Suit {
  static readonly CLUBS = new Suit(0, "♣", "c", "clubs");
  static readonly DIAMONDS = new Suit(1, "♦", "d", "diamonds");
  static readonly HEARTS = new Suit(2, "♥", "h", "hearts");
  static readonly SPADES = new Suit(3, "♠", "s", "spades");

  private static readonly ordered: readonly Suit[] = Object.freeze([
    Suit.CLUBS,
    Suit.DIAMONDS,
    Suit.HEARTS,
    Suit.SPADES
  ]);

  private constructor(
    readonly index: number,
    readonly glyph: string,
    readonly code: SuitCode,
    readonly name: string
  ) {
    Object.freeze(this);
  }

  /** clubs < diamonds < hearts < spades */
  static values(): readonly Suit[] {
    return Suit.ordered;
  }

  /** Accepts a suit, its one-letter code (any case) or its glyph. */
  static of(value: Suit | string): Suit {
    if (value instanceof Suit) {
      return value;
    }
    const lowered = value.toLowerCase();
    const found = Suit.ordered.find(suit => suit.code === lowered || suit.glyph === value);
    if (!found) {
      throw new UnknownEnumerationValueError("suit", value);
    }
    return found;
  }

  static random(rng: () => number = Math.random): Suit {
    return Suit.ordered[Math.floor(rng() * Suit.ordered.length) % Suit.ordered.length];
  }

  static compare(a: Suit, b: Suit): number {
    return a.index - b.index;
  }

  equals(other: Suit): boolean {
    return this.index === other.index;
  }

  hashCode(): number {
    return this.index;
  }

  toString(): string {
    return this.code;
  }
}
