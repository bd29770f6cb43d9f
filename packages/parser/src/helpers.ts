import { HeroNotFoundError } from "@hh-parser/shared";
import type { Player } from "./types";

export function initSeats(count: number): Player[] {
  const players: Player[] = [];
  for (let seat = 1; seat <= count; seat += 1) {
    players.push({ name: `Empty Seat ${seat}`, stack: 0, seat, combo: null });
  }
  return players;
}

export function findHero(players: readonly Player[], heroName: string): Player {
  const hero = players.find(player => player.name === heroName);
  if (!hero) {
    throw new HeroNotFoundError(heroName);
  }
  return hero;
}

/** "1,035" -> 1035, "0.25" -> 0.25; NaN for anything else. */
export function parseChips(text: string): number {
  const normalized = text.replace(/,/g, "").trim();
  if (!/^\d+(?:\.\d+)?$/.test(normalized)) {
    return Number.NaN;
  }
  return Number(normalized);
}
