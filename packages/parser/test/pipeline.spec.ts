import { describe, it, expect } from "vitest";
import path from "node:path";
import {
  Card,
  HandParseAbortedError,
  LogLevel,
  MalformedHeaderError,
  MalformedStageLineError,
  StageFailedError,
  type EventLogger
} from "@hh-parser/shared";
import { HandHistory } from "../src/handHistory";
import { Street } from "../src/street";
import { PARSE_STAGES, type ParseStage, type ParseState } from "../src/types";
import type { HandHeader, RoomAdapter, StageHandler, StageHandlers } from "../src/rooms/types";

interface Recorded {
  level: LogLevel;
  event: string;
  payload?: Record<string, unknown>;
}

function recordingLogger(events: Recorded[]): EventLogger {
  return {
    log: (level, event, payload) => {
      events.push({ level, event, payload });
    }
  };
}

const header: HandHeader = {
  ident: "42",
  date: new Date(Date.UTC(2014, 0, 1, 12)),
  sb: 10,
  bb: 20,
  buyin: null,
  currency: null,
  limit: "NL",
  game: "HOLDEM",
  gameType: "TOUR",
  tableName: "7",
  tournamentIdent: "1001",
  extra: { tournamentName: "Stub Cup" }
};

interface StubAdapter extends RoomAdapter {
  calls: ParseStage[];
  headerCalls: number;
}

function stubAdapter(overrides: Partial<Record<ParseStage, StageHandler>> = {}): StubAdapter {
  const calls: ParseStage[] = [];
  const stage = (name: ParseStage): StageHandler => context => {
    calls.push(name);
    overrides[name]?.(context);
  };
  const stages: StageHandlers = {
    table: stage("table"),
    players: stage("players"),
    button: stage("button"),
    hero: stage("hero"),
    preflop: stage("preflop"),
    flop: stage("flop"),
    turn: stage("turn"),
    river: stage("river"),
    showdown: stage("showdown"),
    pot: stage("pot"),
    board: stage("board"),
    winners: stage("winners"),
    extra: stage("extra")
  };
  const adapter: StubAdapter = {
    name: "stub",
    sectionPattern: /\n/,
    dateFormat: "%Y",
    timeZone: "UTC",
    maxSeats: 6,
    calls,
    headerCalls: 0,
    parseHeader: () => {
      adapter.headerCalls += 1;
      return header;
    },
    stages
  };
  return adapter;
}

describe("HandHistory pipeline", () => {
  it("starts unparsed with the raw text trimmed", () => {
    const hand = new HandHistory("  \nline one\nline two\n\n", stubAdapter());
    expect(hand.raw).toBe("line one\nline two");
    expect(hand.state).toBe("unparsed");
    expect(hand.headerParsed).toBe(false);
    expect(hand.parsed).toBe(false);
    expect(hand.toString()).toBe("<HandHistory stub: #?>");
  });

  it("parses the header once and runs no body stage", () => {
    const adapter = stubAdapter();
    const hand = new HandHistory("text", adapter);
    hand.parseHeader();
    hand.parseHeader();

    expect(adapter.headerCalls).toBe(1);
    expect(adapter.calls).toEqual([]);
    expect(hand.state).toBe("header_parsed");
    expect(hand.ident).toBe("42");
    expect(hand.tournamentIdent).toBe("1001");
    expect(hand.extra).toEqual({ tournamentName: "Stub Cup" });
  });

  it("runs every stage once, in order, parsing the header first", () => {
    const adapter = stubAdapter();
    const hand = new HandHistory("text", adapter).parse();

    expect(adapter.headerCalls).toBe(1);
    expect(adapter.calls).toEqual([...PARSE_STAGES]);
    expect(hand.state).toBe("parsed");
    expect(hand.parsed).toBe(true);
    expect(hand.headerParsed).toBe(true);
  });

  it("keeps the header from parseHeader() when parse() follows", () => {
    const headerFields = (hand: HandHistory) => ({
      ident: hand.ident,
      date: hand.date,
      sb: hand.sb,
      bb: hand.bb,
      buyin: hand.buyin,
      currency: hand.currency,
      limit: hand.limit,
      game: hand.game,
      gameType: hand.gameType,
      tableName: hand.tableName,
      tournamentIdent: hand.tournamentIdent,
      extra: hand.extra
    });
    const adapter = stubAdapter();
    const hand = new HandHistory("text", adapter).parseHeader().parse();
    const direct = new HandHistory("text", stubAdapter()).parse();

    expect(adapter.headerCalls).toBe(1);
    expect(adapter.calls).toEqual([...PARSE_STAGES]);
    expect(hand.state).toBe("parsed");
    expect(headerFields(hand)).toEqual(headerFields(direct));
  });

  it("exposes the last completed stage while a stage runs", () => {
    const seen: ParseState[] = [];
    const hand = new HandHistory(
      "text",
      stubAdapter({
        table: context => {
          seen.push(context.hand.state);
        },
        flop: context => {
          seen.push(context.hand.state);
        }
      })
    );
    hand.parse();
    expect(seen).toEqual(["header_parsed", "preflop"]);
  });

  it("skips a second parse and logs it", () => {
    const events: Recorded[] = [];
    const adapter = stubAdapter();
    const hand = new HandHistory("text", adapter, { logger: recordingLogger(events) });
    hand.parse();
    hand.parse();

    expect(adapter.calls).toHaveLength(PARSE_STAGES.length);
    expect(events.map(entry => entry.event)).toEqual([
      "hand.header_parsed",
      ...PARSE_STAGES.map(() => "hand.stage_completed"),
      "hand.parsed",
      "hand.reparse_skipped"
    ]);
    expect(events[events.length - 1].level).toBe(LogLevel.DEBUG);
  });

  it("wraps unexpected stage errors and aborts the run", () => {
    const boom = new Error("boom");
    const events: Recorded[] = [];
    const adapter = stubAdapter({
      flop: () => {
        throw boom;
      }
    });
    const hand = new HandHistory("text", adapter, { logger: recordingLogger(events) });

    let caught: unknown;
    try {
      hand.parse();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(StageFailedError);
    expect(caught instanceof StageFailedError ? [caught.stage, caught.cause, caught.message] : []).toEqual([
      "flop",
      boom,
      "Stage 'flop' failed: boom"
    ]);
    expect(adapter.calls).toEqual(["table", "players", "button", "hero", "preflop", "flop"]);
    expect(hand.state).toBe("failed");
    expect(events[events.length - 1]).toEqual({
      level: LogLevel.ERROR,
      event: "hand.parse_failed",
      payload: { room: "stub", ident: "42", stage: "flop", error: "Stage 'flop' failed: boom" }
    });

    expect(() => hand.parse()).toThrowError(HandParseAbortedError);
    expect(() => hand.parse()).toThrowError("Hand 42 failed to parse earlier and cannot be parsed again.");
  });

  it("lets parser errors through unchanged", () => {
    const error = new MalformedStageLineError("pot", 12, "Total pot ??");
    const hand = new HandHistory(
      "text",
      stubAdapter({
        pot: () => {
          throw error;
        }
      })
    );
    expect(() => hand.parse()).toThrow(error);
    expect(hand.state).toBe("failed");
  });

  it("fails the hand when the header cannot be read", () => {
    const adapter = stubAdapter();
    adapter.parseHeader = () => {
      throw new MalformedHeaderError("garbage");
    };
    const hand = new HandHistory("garbage", adapter);

    expect(() => hand.parseHeader()).toThrowError(MalformedHeaderError);
    expect(hand.state).toBe("failed");
    expect(hand.headerParsed).toBe(false);
    expect(() => hand.parseHeader()).toThrowError(HandParseAbortedError);
    expect(adapter.calls).toEqual([]);
  });

  it("builds the board from flop, turn and river only in order", () => {
    const hand = new HandHistory("text", stubAdapter());
    expect(hand.board).toBeNull();

    hand.flop = new Street(["Kc", "7h", "2s"]);
    hand.river = Card.of("Qh");
    expect(hand.board?.map(String)).toEqual(["Kc", "7h", "2s"]);

    hand.turn = Card.of("9d");
    expect(hand.board?.map(String)).toEqual(["Kc", "7h", "2s", "9d", "Qh"]);
  });

  it("keeps button and hero pointing at replaced players", () => {
    const hand = new HandHistory("text", stubAdapter());
    const alpha = { name: "alpha", stack: 1500, seat: 1, combo: null };
    const bravo = { name: "bravo", stack: 1500, seat: 2, combo: null };
    hand.players = [alpha, bravo];
    hand.button = alpha;
    hand.hero = alpha;

    const updated = { ...alpha, stack: 1400 };
    hand.replacePlayer(updated);

    expect(hand.players[0]).toBe(updated);
    expect(hand.button).toBe(updated);
    expect(hand.hero).toBe(updated);
    expect(hand.playerByName("bravo")).toBe(bravo);
    expect(hand.playerByName("zulu")).toBeNull();
  });

  it("reads hands from files", async () => {
    const adapter = stubAdapter();
    const hand = await HandHistory.fromFile(path.join(__dirname, "fixtures", "fulltilt_preflop.txt"), adapter);
    expect(hand.raw.startsWith("Full Tilt Poker Game #31100220033")).toBe(true);
    expect(hand.parse().state).toBe("parsed");
  });
});
