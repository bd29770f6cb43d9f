import { readFile } from "node:fs/promises";
import {
  HandHistoryError,
  HandParseAbortedError,
  LogLevel,
  StageFailedError,
  silentLogger,
  type Card,
  type Currency,
  type EventLogger,
  type Game,
  type GameType,
  type Limit
} from "@hh-parser/shared";
import { splitSections, type SplitText } from "./splitter";
import type { Street } from "./street";
import type { HandHeader, RoomAdapter, StageContext } from "./rooms/types";
import {
  PARSE_STAGES,
  type ExtraValue,
  type ParseState,
  type Player,
  type PlayerAction,
  type PostflopStreet,
  type StreetStats
} from "./types";

export interface HandHistoryOptions {
  logger?: EventLogger;
}

function emptyStreets(): Record<PostflopStreet, StreetStats> {
  return {
    flop: { pot: null, numPlayers: null, actions: null },
    turn: { pot: null, numPlayers: null, actions: null },
    river: { pot: null, numPlayers: null, actions: null }
  };
}

/**
 * One hand, parsed in two steps: `parseHeader()` for the cheap metadata scan,
 * then `parse()` for the body. The body stages run once, in `PARSE_STAGES`
 * order, each writing into this record through the room adapter.
 */
export class HandHistory {
  readonly raw: string;
  readonly adapter: RoomAdapter;

  ident: string | null = null;
  date: Date | null = null;
  sb: number | null = null;
  bb: number | null = null;
  buyin: number | null = null;
  currency: Currency | null = null;
  limit: Limit | null = null;
  game: Game | null = null;
  gameType: GameType | null = null;
  tableName: string | null = null;
  tournamentIdent: string | null = null;

  maxPlayers: number | null = null;
  players: Player[] = [];
  button: Player | null = null;
  hero: Player | null = null;

  preflopActions: readonly PlayerAction[] | null = null;
  flop: Street | null = null;
  turn: Card | null = null;
  river: Card | null = null;
  streets: Record<PostflopStreet, StreetStats> = emptyStreets();

  showDown = false;
  totalPot: number | null = null;
  rake: number | null = null;
  winners: ReadonlySet<string> | null = null;
  extra: Record<string, ExtraValue> = {};

  private split: SplitText | null;
  private currentState: ParseState = "unparsed";
  private headerDone = false;
  private readonly logger: EventLogger;

  constructor(raw: string, adapter: RoomAdapter, options: HandHistoryOptions = {}) {
    // Line endings are normalised before splitting.
    this.raw = raw.replace(/\r\n?/g, "\n").trim();
    this.adapter = adapter;
    this.logger = options.logger ?? silentLogger;
    this.split = splitSections(this.raw, adapter.sectionPattern);
  }

  static fromText(raw: string, adapter: RoomAdapter, options?: HandHistoryOptions): HandHistory {
    return new HandHistory(raw, adapter, options);
  }

  static async fromFile(filePath: string, adapter: RoomAdapter, options?: HandHistoryOptions): Promise<HandHistory> {
    const raw = await readFile(filePath, "utf-8");
    return new HandHistory(raw, adapter, options);
  }

  get state(): ParseState {
    return this.currentState;
  }

  get headerParsed(): boolean {
    return this.headerDone;
  }

  get parsed(): boolean {
    return this.currentState === "parsed";
  }

  get turnActions(): readonly PlayerAction[] | null {
    return this.streets.turn.actions;
  }

  get riverActions(): readonly PlayerAction[] | null {
    return this.streets.river.actions;
  }

  /** Flop, then turn only after a flop, then river only after a turn; null before the flop. */
  get board(): readonly Card[] | null {
    if (!this.flop) {
      return null;
    }
    const board: Card[] = [...this.flop.cards];
    if (this.turn) {
      board.push(this.turn);
      if (this.river) {
        board.push(this.river);
      }
    }
    return board.length > 0 ? board : null;
  }

  /** Runs the room's header routine. Repeated calls are no-ops. */
  parseHeader(): this {
    if (this.headerDone) {
      return this;
    }
    if (this.currentState === "failed") {
      throw new HandParseAbortedError(this.ident);
    }
    const split = this.requireSplit();
    try {
      this.applyHeader(this.adapter.parseHeader({ split, raw: this.raw }));
    } catch (error) {
      throw this.fail("header", error);
    }
    this.headerDone = true;
    this.currentState = "header_parsed";
    this.logger.log(LogLevel.DEBUG, "hand.header_parsed", { room: this.adapter.name, ident: this.ident });
    return this;
  }

  /**
   * Parses the header if needed, then every body stage. Once parsed the split
   * buffer is released and further calls only log; after a failure they throw.
   */
  parse(): this {
    if (this.currentState === "parsed") {
      this.logger.log(LogLevel.DEBUG, "hand.reparse_skipped", { room: this.adapter.name, ident: this.ident });
      return this;
    }
    if (this.currentState === "failed") {
      throw new HandParseAbortedError(this.ident);
    }
    this.parseHeader();

    const split = this.requireSplit();
    for (const stage of PARSE_STAGES) {
      const context: StageContext = { stage, split, hand: this, logger: this.logger };
      try {
        this.adapter.stages[stage](context);
      } catch (error) {
        throw this.fail(stage, error);
      }
      this.currentState = stage;
      this.logger.log(LogLevel.DEBUG, "hand.stage_completed", { ident: this.ident, stage });
    }

    this.split = null;
    this.currentState = "parsed";
    this.logger.log(LogLevel.INFO, "hand.parsed", {
      room: this.adapter.name,
      ident: this.ident,
      players: this.players.length,
      winners: this.winners ? [...this.winners] : []
    });
    return this;
  }

  /** Swaps in an updated player, keeping `button` and `hero` pointing at the same value. */
  replacePlayer(updated: Player): void {
    const idx = this.players.findIndex(player => player.seat === updated.seat);
    if (idx === -1) {
      this.players.push(updated);
    } else {
      this.players[idx] = updated;
    }
    if (this.button?.seat === updated.seat) {
      this.button = updated;
    }
    if (this.hero?.seat === updated.seat) {
      this.hero = updated;
    }
  }

  playerByName(name: string): Player | null {
    return this.players.find(player => player.name === name) ?? null;
  }

  toString(): string {
    return `<HandHistory ${this.adapter.name}: #${this.ident ?? "?"}>`;
  }

  private requireSplit(): SplitText {
    if (!this.split) {
      throw new HandHistoryError(`Hand ${this.ident ?? "<unknown>"} has no split text left to parse.`);
    }
    return this.split;
  }

  private applyHeader(header: HandHeader) {
    this.ident = header.ident;
    this.date = header.date;
    this.sb = header.sb;
    this.bb = header.bb;
    this.buyin = header.buyin;
    this.currency = header.currency;
    this.limit = header.limit;
    this.game = header.game;
    this.gameType = header.gameType;
    this.tableName = header.tableName;
    this.tournamentIdent = header.tournamentIdent;
    this.extra = { ...this.extra, ...(header.extra ?? {}) };
  }

  private fail(stage: string, error: unknown): HandHistoryError {
    this.currentState = "failed";
    this.split = null;
    const wrapped = error instanceof HandHistoryError ? error : new StageFailedError(stage, error);
    this.logger.log(LogLevel.ERROR, "hand.parse_failed", {
      room: this.adapter.name,
      ident: this.ident,
      stage,
      error: wrapped.message
    });
    return wrapped;
  }
}
