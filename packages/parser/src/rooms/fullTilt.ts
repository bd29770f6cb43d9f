import {
  Card,
  Combo,
  MalformedHeaderError,
  MalformedStageLineError,
  SectionNotFoundError,
  parseGame,
  parseLimit,
  parseLocalDate,
  type GameType
} from "@hh-parser/shared";
import type { HandHistory } from "../handHistory";
import { findHero, initSeats, parseChips } from "../helpers";
import { Street } from "../street";
import type { SplitText } from "../splitter";
import type { PostflopStreet, StreetStats } from "../types";
import { parseActionLines } from "./fullTiltActions";
import type { HandHeader, HeaderContext, RoomAdapter, StageContext, StageHandlers } from "./types";

const HEADER_RE = new RegExp(
  [
    "^Full Tilt Poker Game #(?<ident>\\d+): ",
    "(?<tournamentName>\\$?(?<buyin>\\d+(?:\\.\\d+)?)?.*?) ",
    "\\((?<tournamentIdent>\\d+)\\), ",
    "Table (?<tableName>\\S+) - ",
    "(?<limit>NL|PL|FL|No Limit|Pot Limit|Fix Limit) (?<game>.+?) - ",
    "(?<sb>[\\d,.]+)/(?<bb>[\\d,.]+) - .*",
    "\\[(?<date>[^\\]]*)\\]$"
  ].join("")
);
const SEAT_RE = /^Seat (\d+): (.+) \(([\d,]+)\)(?:, is sitting out)?$/;
const BUTTON_RE = /^The button is in seat #(\d+)$/;
const HERO_RE = /^Dealt to (.+) \[(\S{2}) (\S{2})\]$/;
const STREET_RE = /\[([^\]]*)\] \(Total Pot: ([\d,.]+), (\d+) Players?\)/;
const SHOWS_RE = /^(.+) shows \[(\S{2}) (\S{2})\]/;
const POT_RE = /^Total pot ([\d.]+) .*\| Rake ([\d.]+)$/;
const BOARD_CARD_RE = /(?<=[\[ ])(\S{2})(?=[\] ])/g;
const ANTE_RE = /^.+ posts an ante of ([\d,.]+)$/;
const COLLECTED_RE = /^Seat \d+: (.+?) (?:\([^)]*\) )*collected \(([\d,.]+)\)/;
const SHOWDOWN_WON_RE = /^Seat \d+: (.+?) (?:\([^)]*\) )*showed \[[^\]]*\] and won/;

export type WinnerStrategy = (summaryLines: readonly string[], firstIndex: number) => Set<string>;

/** Hands that ended without a showdown: `Seat N: name (...) collected (amount)`. */
export const collectedWinners: WinnerStrategy = (summaryLines, firstIndex) => {
  const winners = new Set<string>();
  summaryLines.forEach((line, offset) => {
    if (!line.includes("collected")) {
      return;
    }
    const match = COLLECTED_RE.exec(line);
    if (!match) {
      throw new MalformedStageLineError("winners", firstIndex + offset, line);
    }
    winners.add(match[1]);
  });
  return winners;
};

/** Hands that went to showdown: `Seat N: name (...) showed [..] and won`. */
export const showdownWinners: WinnerStrategy = (summaryLines, firstIndex) => {
  const winners = new Set<string>();
  summaryLines.forEach((line, offset) => {
    if (!line.includes(" and won")) {
      return;
    }
    const match = SHOWDOWN_WON_RE.exec(line);
    if (!match) {
      throw new MalformedStageLineError("winners", firstIndex + offset, line);
    }
    winners.add(match[1]);
  });
  return winners;
};

function toCards(codes: readonly string[], stage: string, index: number, line: string): Card[] {
  try {
    return codes.map(code => Card.of(code));
  } catch (error) {
    throw new MalformedStageLineError(stage, index, line, error);
  }
}

function toCombo(first: string, second: string, stage: string, index: number, line: string): Combo {
  const [a, b] = toCards([first, second], stage, index, line);
  try {
    return Combo.fromCards(a, b);
  } catch (error) {
    throw new MalformedStageLineError(stage, index, line, error);
  }
}

function seatedNames(hand: HandHistory): string[] {
  return hand.players.map(player => player.name);
}

function absentStreet(): StreetStats {
  return { pot: null, numPlayers: null, actions: null };
}

/** Index of `marker`, or null when that street was never dealt. */
function findStreetMarker(split: SplitText, marker: string): number | null {
  try {
    return split.require(marker);
  } catch (error) {
    if (error instanceof SectionNotFoundError) {
      return null;
    }
    throw error;
  }
}

export interface FullTiltPokerOptions {
  /** Seats initialised before reading the player list; the header does not say. */
  maxSeats?: number;
}

export class FullTiltPokerAdapter implements RoomAdapter {
  readonly name = "fulltilt";
  readonly sectionPattern = / ?\*\*\* ?\n?|\n/;
  readonly dateFormat = "%H:%M:%S ET - %Y/%m/%d";
  readonly timeZone = "America/New_York";
  readonly maxSeats: number;

  readonly stages: StageHandlers = {
    table: () => undefined, // table name comes with the header line
    players: context => this.parsePlayers(context),
    button: context => this.parseButton(context),
    hero: context => this.parseHero(context),
    preflop: context => this.parsePreflop(context),
    flop: context => this.parseFlop(context),
    turn: context => this.parseLaterStreet(context, "turn"),
    river: context => this.parseLaterStreet(context, "river"),
    showdown: context => this.parseShowdown(context),
    pot: context => this.parsePot(context),
    board: context => this.parseBoard(context),
    winners: context => this.parseWinners(context),
    extra: context => this.parseExtra(context)
  };

  constructor(options: FullTiltPokerOptions = {}) {
    this.maxSeats = options.maxSeats ?? 9;
  }

  parseHeader({ split }: HeaderContext): HandHeader {
    const line = split.at(0);
    const groups = HEADER_RE.exec(line)?.groups;
    if (!groups) {
      throw new MalformedHeaderError(line);
    }
    const tournamentName = groups.tournamentName;
    const sb = parseChips(groups.sb);
    const bb = parseChips(groups.bb);
    if (Number.isNaN(sb) || Number.isNaN(bb)) {
      throw new MalformedHeaderError(line, "blinds are not amounts");
    }
    const gameType: GameType = tournamentName.includes("Sit & Go") ? "SNG" : "TOUR";
    return {
      ident: groups.ident,
      date: parseLocalDate(groups.date, this.dateFormat, this.timeZone),
      sb,
      bb,
      buyin: groups.buyin ? Number(groups.buyin) : null,
      currency: tournamentName.includes("$") ? "USD" : null,
      limit: parseLimit(groups.limit),
      game: parseGame(groups.game),
      gameType,
      tableName: groups.tableName,
      tournamentIdent: groups.tournamentIdent,
      extra: { tournamentName }
    };
  }

  private parsePlayers({ split, hand }: StageContext) {
    const players = initSeats(this.maxSeats);
    let maxSeat = 0;
    for (let idx = 1; idx < split.length; idx += 1) {
      const line = split.at(idx);
      const match = SEAT_RE.exec(line);
      if (!match) {
        break;
      }
      const seat = Number(match[1]);
      if (seat < 1 || seat > this.maxSeats) {
        throw new MalformedStageLineError("players", idx, line);
      }
      players[seat - 1] = { name: match[2], stack: parseChips(match[3]), seat, combo: null };
      maxSeat = Math.max(maxSeat, seat);
    }
    if (maxSeat === 0) {
      throw new MalformedStageLineError("players", 1, split.fragments[1] ?? "");
    }
    hand.maxPlayers = maxSeat;
    hand.players = players.slice(0, maxSeat);
  }

  private parseButton({ split, hand }: StageContext) {
    const idx = split.firstBoundary() - 1;
    const line = split.at(idx);
    const match = BUTTON_RE.exec(line);
    const button = match ? hand.players[Number(match[1]) - 1] : undefined;
    if (!button) {
      throw new MalformedStageLineError("button", idx, line);
    }
    hand.button = button;
  }

  private parseHero({ split, hand }: StageContext) {
    const idx = split.firstBoundary() + 2;
    const line = split.at(idx);
    if (!line.startsWith("Dealt to ")) {
      hand.hero = null;
      return;
    }
    const match = HERO_RE.exec(line);
    if (!match) {
      throw new MalformedStageLineError("hero", idx, line);
    }
    const combo = toCombo(match[2], match[3], "hero", idx, line);
    const hero = { ...findHero(hand.players, match[1]), combo };
    hand.hero = hero;
    // the button may have been captured before the hero's cards were known
    hand.replacePlayer(hero);
  }

  private parsePreflop({ split, hand }: StageContext) {
    const first = split.firstBoundary();
    const start = first + (hand.hero ? 3 : 2);
    const stop = split.nextBoundary(first);
    hand.preflopActions = parseActionLines("preflop", split.between(start, stop), start, seatedNames(hand));
  }

  private parseFlop({ split, hand }: StageContext) {
    const marker = findStreetMarker(split, "FLOP");
    if (marker === null) {
      hand.flop = null;
      hand.streets.flop = absentStreet();
      return;
    }
    const lineIdx = marker + 1;
    const line = split.at(lineIdx);
    const match = STREET_RE.exec(line);
    if (!match) {
      throw new MalformedStageLineError("flop", lineIdx, line);
    }
    const cards = toCards(match[1].split(" "), "flop", lineIdx, line);
    if (cards.length !== 3) {
      throw new MalformedStageLineError("flop", lineIdx, line);
    }
    const stop = split.nextBoundary(marker);
    const actions = parseActionLines("flop", split.between(lineIdx + 1, stop), lineIdx + 1, seatedNames(hand));
    const pot = parseChips(match[2]);
    hand.flop = new Street(cards, actions, pot);
    hand.streets.flop = { pot, numPlayers: Number(match[3]), actions: actions.length ? actions : null };
  }

  private parseLaterStreet({ split, hand }: StageContext, street: Exclude<PostflopStreet, "flop">) {
    const marker = findStreetMarker(split, street.toUpperCase());
    if (marker === null) {
      this.setStreetCard(hand, street, null);
      hand.streets[street] = absentStreet();
      return;
    }
    const lineIdx = marker + 1;
    const line = split.at(lineIdx);
    const match = STREET_RE.exec(line);
    if (!match) {
      throw new MalformedStageLineError(street, lineIdx, line);
    }
    const [card] = toCards([match[1].trim()], street, lineIdx, line);
    const stop = split.nextBoundary(marker);
    const actions = parseActionLines(street, split.between(lineIdx + 1, stop), lineIdx + 1, seatedNames(hand));
    this.setStreetCard(hand, street, card);
    hand.streets[street] = {
      pot: parseChips(match[2]),
      numPlayers: Number(match[3]),
      actions: actions.length ? actions : null
    };
  }

  private setStreetCard(hand: HandHistory, street: Exclude<PostflopStreet, "flop">, card: Card | null) {
    if (street === "turn") {
      hand.turn = card;
    } else {
      hand.river = card;
    }
  }

  private parseShowdown({ split, hand }: StageContext) {
    const marker = split.indexOf("SHOW DOWN");
    hand.showDown = marker !== null;
    if (marker === null) {
      return;
    }
    const stop = split.nextBoundary(marker);
    for (let idx = marker + 1; idx < stop; idx += 1) {
      const line = split.at(idx);
      const match = SHOWS_RE.exec(line);
      if (!match) {
        continue;
      }
      const player = hand.playerByName(match[1]);
      if (!player) {
        throw new MalformedStageLineError("showdown", idx, line);
      }
      hand.replacePlayer({ ...player, combo: toCombo(match[2], match[3], "showdown", idx, line) });
    }
  }

  private parsePot({ split, hand }: StageContext) {
    const idx = split.lastBoundary() + 2;
    const line = split.at(idx);
    const match = POT_RE.exec(line.replace(/,/g, ""));
    if (!match) {
      throw new MalformedStageLineError("pot", idx, line);
    }
    hand.totalPot = Number(match[1]);
    hand.rake = Number(match[2]);
  }

  private parseBoard({ split, hand }: StageContext) {
    const idx = split.lastBoundary() + 3;
    if (idx >= split.length) {
      return;
    }
    const line = split.at(idx);
    if (!line.startsWith("Board")) {
      return;
    }
    const codes = Array.from(line.matchAll(BOARD_CARD_RE), match => match[1]);
    const cards = toCards(codes, "board", idx, line);
    hand.turn = cards[3] ?? null;
    hand.river = cards[4] ?? null;
  }

  private parseWinners({ split, hand }: StageContext) {
    // starts at the board line: it is absent when the hand ended preflop
    const start = split.lastBoundary() + 3;
    const strategy = hand.showDown ? showdownWinners : collectedWinners;
    hand.winners = strategy(split.between(start), start);
  }

  private parseExtra({ split, hand }: StageContext) {
    let ante: number | null = null;
    const stop = split.firstBoundary();
    for (let idx = 1; idx < stop; idx += 1) {
      const match = ANTE_RE.exec(split.at(idx));
      if (match) {
        ante = Math.max(ante ?? 0, parseChips(match[1]));
      }
    }
    hand.extra.ante = ante;
  }
}

export const fullTiltPoker = new FullTiltPokerAdapter();
