import { InvalidCardFormatError } from "../errors";
import { BROADWAY_RANKS, FACE_RANKS, Rank } from "./rank";
import { Suit } from "./suit";

export class Card {
  private static readonly byKey = new Map<string, Card>();

  /** Rank-major product of Rank x Suit, built once when the module loads. */
  private static readonly deck: readonly Card[] = Card.buildDeck();

  private constructor(readonly rank: Rank, readonly suit: Suit) {
    Object.freeze(this);
  }

  /**
   * Resolves `"Ah"`, `"td"` etc. to the shared deck instance. A Card is
   * returned unchanged.
   */
  static of(card: Card | string): Card {
    if (card instanceof Card) {
      return card;
    }
    if (card.length !== 2) {
      throw new InvalidCardFormatError(card, "length should be two");
    }
    let rank: Rank;
    let suit: Suit;
    try {
      rank = Rank.of(card[0]);
      suit = Suit.of(card[1]);
    } catch (error) {
      throw new InvalidCardFormatError(card, "unknown rank or suit", error);
    }
    const found = Card.byKey.get(Card.key(rank, suit));
    if (!found) {
      throw new InvalidCardFormatError(card, "card is not part of the deck");
    }
    return found;
  }

  static all(): readonly Card[] {
    return Card.deck;
  }

  /** A fresh instance, deliberately not taken from the deck cache. */
  static random(rng: () => number = Math.random): Card {
    return new Card(Rank.random(rng), Suit.random(rng));
  }

  static compare(a: Card, b: Card): number {
    const byRank = Rank.compare(a.rank, b.rank);
    return byRank !== 0 ? byRank : Suit.compare(a.suit, b.suit);
  }

  static sort(cards: Iterable<Card>): Card[] {
    return Array.from(cards).sort(Card.compare);
  }

  private static key(rank: Rank, suit: Suit): string {
    return `${rank.symbol}${suit.code}`;
  }

  private static buildDeck(): readonly Card[] {
    const cards: Card[] = [];
    for (const rank of Rank.values()) {
      for (const suit of Suit.values()) {
        const card = new Card(rank, suit);
        Card.byKey.set(Card.key(rank, suit), card);
        cards.push(card);
      }
    }
    return Object.freeze(cards);
  }

  get isFace(): boolean {
    return FACE_RANKS.includes(this.rank);
  }

  get isBroadway(): boolean {
    return BROADWAY_RANKS.includes(this.rank);
  }

  equals(other: Card): boolean {
    return this.rank.equals(other.rank) && this.suit.equals(other.suit);
  }

  lessThan(other: Card): boolean {
    return Card.compare(this, other) < 0;
  }

  hashCode(): number {
    return this.rank.hashCode() * Suit.values().length + this.suit.hashCode();
  }

  toString(): string {
    return Card.key(this.rank, this.suit);
  }

  toJSON(): string {
    return this.toString();
  }
}

export const DECK: readonly Card[] = Card.all();
