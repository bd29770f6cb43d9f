import { UnknownEnumerationValueError } from "./errors";

export type Limit = "NL" | "PL" | "FL";
export type Game = "HOLDEM" | "OMAHA" | "OHILO" | "STUD" | "RAZZ";
export type GameType = "CASH" | "TOUR" | "SNG";
export type Currency = "USD" | "EUR" | "GBP";
export type ActionType =
  | "bet"
  | "raise"
  | "call"
  | "check"
  | "fold"
  | "muck"
  | "show"
  | "think"
  | "return"
  | "win";

const LIMIT_ALIASES: Record<string, Limit> = {
  nl: "NL",
  "no limit": "NL",
  pl: "PL",
  "pot limit": "PL",
  fl: "FL",
  "fix limit": "FL",
  "fixed limit": "FL"
};

const GAME_ALIASES: Record<string, Game> = {
  "hold'em": "HOLDEM",
  holdem: "HOLDEM",
  "texas hold'em": "HOLDEM",
  omaha: "OMAHA",
  "omaha hi": "OMAHA",
  "omaha hi/lo": "OHILO",
  "omaha h/l": "OHILO",
  "7 card stud": "STUD",
  stud: "STUD",
  razz: "RAZZ"
};

const GAME_TYPE_ALIASES: Record<string, GameType> = {
  cash: "CASH",
  "cash game": "CASH",
  ring: "CASH",
  tour: "TOUR",
  tournament: "TOUR",
  sng: "SNG",
  "sit & go": "SNG",
  "sit and go": "SNG"
};

const CURRENCY_ALIASES: Record<string, Currency> = {
  usd: "USD",
  $: "USD",
  eur: "EUR",
  "€": "EUR",
  gbp: "GBP",
  "£": "GBP"
};

const ACTION_ALIASES: Record<string, ActionType> = {
  bet: "bet",
  bets: "bet",
  raise: "raise",
  raises: "raise",
  call: "call",
  calls: "call",
  check: "check",
  checks: "check",
  fold: "fold",
  folds: "fold",
  muck: "muck",
  mucks: "muck",
  show: "show",
  shows: "show",
  think: "think",
  return: "return",
  win: "win",
  wins: "win"
};

function lookup<T extends string>(enumeration: string, aliases: Record<string, T>, value: string): T {
  const found = aliases[value.trim().toLowerCase()];
  if (found === undefined) {
    throw new UnknownEnumerationValueError(enumeration, value);
  }
  return found;
}

export function parseLimit(value: string): Limit {
  return lookup("limit", LIMIT_ALIASES, value);
}

export function parseGame(value: string): Game {
  return lookup("game", GAME_ALIASES, value);
}

export function parseGameType(value: string): GameType {
  return lookup("game type", GAME_TYPE_ALIASES, value);
}

export function parseCurrency(value: string): Currency {
  return lookup("currency", CURRENCY_ALIASES, value);
}

export function parseAction(value: string): ActionType {
  return lookup("action", ACTION_ALIASES, value);
}
