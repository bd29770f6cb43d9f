import { InvalidCardFormatError } from "../errors";
import { Card } from "./card";

/** Two distinct hole cards. Stored high card first, so "2cAh" equals "Ah2c". */
export class Combo {
  readonly first: Card;
  readonly second: Card;

  private constructor(a: Card, b: Card) {
    const [high, low] = Card.compare(a, b) >= 0 ? [a, b] : [b, a];
    this.first = high;
    this.second = low;
    Object.freeze(this);
  }

  static of(combo: Combo | string): Combo {
    if (combo instanceof Combo) {
      return combo;
    }
    const compact = combo.replace(/\s+/g, "");
    if (compact.length !== 4) {
      throw new InvalidCardFormatError(combo, "a combo is exactly two cards");
    }
    return Combo.fromCards(compact.slice(0, 2), compact.slice(2, 4));
  }

  static fromCards(a: Card | string, b: Card | string): Combo {
    const first = Card.of(a);
    const second = Card.of(b);
    if (first.equals(second)) {
      throw new InvalidCardFormatError(`${first}${second}`, "combo cards must differ");
    }
    return new Combo(first, second);
  }

  get cards(): readonly [Card, Card] {
    return [this.first, this.second];
  }

  get isPair(): boolean {
    return this.first.rank.equals(this.second.rank);
  }

  get isSuited(): boolean {
    return this.first.suit.equals(this.second.suit);
  }

  equals(other: Combo): boolean {
    return this.first.equals(other.first) && this.second.equals(other.second);
  }

  toString(): string {
    return `${this.first}${this.second}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
