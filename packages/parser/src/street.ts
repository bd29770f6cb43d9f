import { Card, Rank } from "@hh-parser/shared";
import type { PlayerAction } from "./types";

type TextureFlag =
  | "isRainbow"
  | "isMonotone"
  | "isTriplet"
  | "hasPair"
  | "hasFlushDraw"
  | "hasStraightDraw"
  | "hasGutshot";

export type StreetTexture = Record<TextureFlag, boolean>;

/**
 * Cards dealt on a street with the actions taken on it. Texture flags are
 * evaluated over every unordered pair of the street's cards and cached on
 * first read; inputs are frozen, so the cache never goes stale.
 */
export class Street {
  readonly cards: readonly Card[];
  readonly actions: readonly PlayerAction[];
  /** Pot when the street was dealt. */
  readonly pot: number | null;

  private readonly flags: Partial<StreetTexture> = {};
  private pairsCache: ReadonlyArray<readonly [Card, Card]> | null = null;
  private playersCache: readonly string[] | null | undefined;

  constructor(cards: readonly (Card | string)[], actions: Iterable<PlayerAction> = [], pot: number | null = null) {
    this.cards = Object.freeze(cards.map(card => Card.of(card)));
    this.actions = Object.freeze(Array.from(actions, action => Object.freeze({ ...action })));
    this.pot = pot;
  }

  get isRainbow(): boolean {
    return this.flag("isRainbow", () => this.pairs.every(([a, b]) => !a.suit.equals(b.suit)));
  }

  get isMonotone(): boolean {
    return this.flag("isMonotone", () => this.pairs.every(([a, b]) => a.suit.equals(b.suit)));
  }

  get isTriplet(): boolean {
    return this.flag("isTriplet", () => this.pairs.every(([a, b]) => a.rank.equals(b.rank)));
  }

  get hasPair(): boolean {
    return this.flag("hasPair", () => this.pairs.some(([a, b]) => a.rank.equals(b.rank)));
  }

  get hasFlushDraw(): boolean {
    return this.flag("hasFlushDraw", () => this.pairs.some(([a, b]) => a.suit.equals(b.suit)));
  }

  get hasStraightDraw(): boolean {
    return this.flag("hasStraightDraw", () => this.differences().some(diff => diff >= 1 && diff <= 3));
  }

  get hasGutshot(): boolean {
    return this.flag("hasGutshot", () => this.differences().some(diff => diff >= 1 && diff <= 4));
  }

  /**
   * Distinct actors in order of first appearance, or `null` when nobody
   * acted on the street.
   */
  get players(): readonly string[] | null {
    if (this.playersCache === undefined) {
      if (this.actions.length === 0) {
        this.playersCache = null;
      } else {
        const names: string[] = [];
        for (const action of this.actions) {
          if (!names.includes(action.name)) {
            names.push(action.name);
          }
        }
        this.playersCache = Object.freeze(names);
      }
    }
    return this.playersCache;
  }

  texture(): StreetTexture {
    return {
      isRainbow: this.isRainbow,
      isMonotone: this.isMonotone,
      isTriplet: this.isTriplet,
      hasPair: this.hasPair,
      hasFlushDraw: this.hasFlushDraw,
      hasStraightDraw: this.hasStraightDraw,
      hasGutshot: this.hasGutshot
    };
  }

  private get pairs(): ReadonlyArray<readonly [Card, Card]> {
    if (!this.pairsCache) {
      const pairs: Array<readonly [Card, Card]> = [];
      for (let i = 0; i < this.cards.length; i += 1) {
        for (let j = i + 1; j < this.cards.length; j += 1) {
          pairs.push([this.cards[i], this.cards[j]]);
        }
      }
      this.pairsCache = pairs;
    }
    return this.pairsCache;
  }

  private differences(): number[] {
    return this.pairs.map(([a, b]) => Rank.difference(a.rank, b.rank));
  }

  private flag(name: TextureFlag, compute: () => boolean): boolean {
    const cached = this.flags[name];
    if (cached !== undefined) {
      return cached;
    }
    const value = compute();
    this.flags[name] = value;
    return value;
  }
}
