import { SectionNotFoundError } from "@hh-parser/shared";

/**
 * Raw hand text split on a room's delimiter pattern. Empty fragments are the
 * section boundaries: the first one opens the hole-cards section, the last
 * one opens the summary, the ones between open each betting round.
 */
export class SplitText {
  readonly fragments: readonly string[];
  readonly boundaries: readonly number[];

  constructor(fragments: readonly string[]) {
    this.fragments = Object.freeze([...fragments]);
    const boundaries: number[] = [];
    this.fragments.forEach((fragment, idx) => {
      if (!fragment) {
        boundaries.push(idx);
      }
    });
    this.boundaries = Object.freeze(boundaries);
  }

  get length(): number {
    return this.fragments.length;
  }

  at(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this.fragments.length) {
      throw new SectionNotFoundError(`fragment #${index}`);
    }
    return this.fragments[index];
  }

  /** Index of the first fragment equal to `marker` at or after `from`, or null. */
  indexOf(marker: string, from = 0): number | null {
    const idx = this.fragments.indexOf(marker, from);
    return idx === -1 ? null : idx;
  }

  require(marker: string, from = 0): number {
    const idx = this.indexOf(marker, from);
    if (idx === null) {
      throw new SectionNotFoundError(marker);
    }
    return idx;
  }

  includes(marker: string): boolean {
    return this.indexOf(marker) !== null;
  }

  firstBoundary(): number {
    const first = this.boundaries[0];
    if (first === undefined) {
      throw new SectionNotFoundError("first section boundary");
    }
    return first;
  }

  lastBoundary(): number {
    const last = this.boundaries[this.boundaries.length - 1];
    if (last === undefined) {
      throw new SectionNotFoundError("last section boundary");
    }
    return last;
  }

  /** First boundary strictly after `index`. */
  nextBoundary(index: number): number {
    const next = this.boundaries.find(boundary => boundary > index);
    if (next === undefined) {
      throw new SectionNotFoundError(`section boundary after fragment #${index}`);
    }
    return next;
  }

  /** Fragments in [start, stop). */
  between(start: number, stop: number = this.fragments.length): readonly string[] {
    return this.fragments.slice(start, stop);
  }
}

/**
 * Splits `raw` on `pattern`. Never fails: text that lacks the expected
 * delimiters just yields fewer boundaries. The pattern should not contain
 * capturing groups, since `String#split` would splice the captures in.
 */
export function splitSections(raw: string, pattern: RegExp): SplitText {
  return new SplitText(raw.split(pattern));
}
