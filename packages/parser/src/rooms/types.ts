import type { Currency, EventLogger, Game, GameType, Limit } from "@hh-parser/shared";
import type { HandHistory } from "../handHistory";
import type { SplitText } from "../splitter";
import type { ExtraValue, ParseStage } from "../types";

/** What a room's header routine extracts. Dates are already UTC. */
export interface HandHeader {
  ident: string;
  date: Date;
  sb: number;
  bb: number;
  buyin: number | null;
  currency: Currency | null;
  limit: Limit;
  game: Game;
  gameType: GameType;
  tableName: string | null;
  tournamentIdent: string | null;
  extra?: Record<string, ExtraValue>;
}

export interface HeaderContext {
  readonly split: SplitText;
  readonly raw: string;
}

export interface StageContext {
  readonly stage: ParseStage;
  readonly split: SplitText;
  /** The shared record; stages write their results here. */
  readonly hand: HandHistory;
  readonly logger: EventLogger;
}

export type StageHandler = (context: StageContext) => void;

export type StageHandlers = Record<ParseStage, StageHandler>;

/**
 * Everything the generic pipeline needs from a poker room. The pipeline
 * only ever calls `parseHeader` and `stages[stage]`, in `PARSE_STAGES` order.
 */
export interface RoomAdapter {
  readonly name: string;
  /** Delimiter handed to the section splitter. */
  readonly sectionPattern: RegExp;
  /** strftime-style format of the local timestamp in the header. */
  readonly dateFormat: string;
  /** IANA zone the room prints its timestamps in. */
  readonly timeZone: string;
  /** Seats to initialise before the player list is read. */
  readonly maxSeats: number;
  parseHeader(context: HeaderContext): HandHeader;
  readonly stages: StageHandlers;
}
