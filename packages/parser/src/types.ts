import type { ActionType, Combo } from "@hh-parser/shared";

export interface Player {
  readonly name: string;
  readonly stack: number;
  /** 1-based */
  readonly seat: number;
  /** Known for the hero, and for anyone who shows at showdown. */
  readonly combo: Combo | null;
}

export interface PlayerAction {
  readonly name: string;
  readonly action: ActionType;
  readonly amount: number | null;
}

export type PostflopStreet = "flop" | "turn" | "river";

/** Pot and player count announced on the street line, plus its actions. All null when not dealt. */
export interface StreetStats {
  pot: number | null;
  numPlayers: number | null;
  actions: readonly PlayerAction[] | null;
}

export type ExtraValue = string | number | boolean | null;

export const PARSE_STAGES = [
  "table",
  "players",
  "button",
  "hero",
  "preflop",
  "flop",
  "turn",
  "river",
  "showdown",
  "pot",
  "board",
  "winners",
  "extra"
] as const;

export type ParseStage = (typeof PARSE_STAGES)[number];

export type ParseState = "unparsed" | "header_parsed" | ParseStage | "parsed" | "failed";
