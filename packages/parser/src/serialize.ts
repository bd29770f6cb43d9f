import type { Card, Combo } from "@hh-parser/shared";
import type { HandHistory } from "./handHistory";
import type { ExtraValue, Player, PlayerAction, PostflopStreet, StreetStats } from "./types";

export interface SerializedPlayer {
  name: string;
  stack: number;
  seat: number;
  combo: string | null;
}

export interface SerializedStreet {
  cards: string[];
  pot: number | null;
  numPlayers: number | null;
  actions: PlayerAction[] | null;
}

export interface SerializedHand {
  room: string;
  state: string;
  ident: string | null;
  date: string | null;
  sb: number | null;
  bb: number | null;
  buyin: number | null;
  currency: string | null;
  limit: string | null;
  game: string | null;
  gameType: string | null;
  tableName: string | null;
  tournamentIdent: string | null;
  maxPlayers: number | null;
  players: SerializedPlayer[];
  button: number | null;
  hero: string | null;
  preflopActions: PlayerAction[] | null;
  board: string[] | null;
  flop: SerializedStreet | null;
  turn: SerializedStreet | null;
  river: SerializedStreet | null;
  showDown: boolean;
  totalPot: number | null;
  rake: number | null;
  winners: string[] | null;
  extra: Record<string, ExtraValue>;
}

function comboText(combo: Combo | null): string | null {
  return combo ? combo.toString() : null;
}

function player(value: Player): SerializedPlayer {
  return { name: value.name, stack: value.stack, seat: value.seat, combo: comboText(value.combo) };
}

function actions(list: readonly PlayerAction[] | null): PlayerAction[] | null {
  return list ? list.map(action => ({ ...action })) : null;
}

function street(cards: readonly Card[] | null, stats: StreetStats): SerializedStreet | null {
  if (!cards) {
    return null;
  }
  return {
    cards: cards.map(card => card.toString()),
    pot: stats.pot,
    numPlayers: stats.numPlayers,
    actions: actions(stats.actions)
  };
}

function streetCards(hand: HandHistory, name: PostflopStreet): readonly Card[] | null {
  switch (name) {
    case "flop":
      return hand.flop ? hand.flop.cards : null;
    case "turn":
      return hand.turn ? [hand.turn] : null;
    case "river":
      return hand.river ? [hand.river] : null;
  }
}

/** Plain JSON view of a hand: cards as strings, sets as sorted arrays, dates in ISO form. */
export function serializeHand(hand: HandHistory): SerializedHand {
  return {
    room: hand.adapter.name,
    state: hand.state,
    ident: hand.ident,
    date: hand.date ? hand.date.toISOString() : null,
    sb: hand.sb,
    bb: hand.bb,
    buyin: hand.buyin,
    currency: hand.currency,
    limit: hand.limit,
    game: hand.game,
    gameType: hand.gameType,
    tableName: hand.tableName,
    tournamentIdent: hand.tournamentIdent,
    maxPlayers: hand.maxPlayers,
    players: hand.players.map(player),
    button: hand.button ? hand.button.seat : null,
    hero: hand.hero ? hand.hero.name : null,
    preflopActions: actions(hand.preflopActions),
    board: hand.board ? hand.board.map(card => card.toString()) : null,
    flop: street(streetCards(hand, "flop"), hand.streets.flop),
    turn: street(streetCards(hand, "turn"), hand.streets.turn),
    river: street(streetCards(hand, "river"), hand.streets.river),
    showDown: hand.showDown,
    totalPot: hand.totalPot,
    rake: hand.rake,
    winners: hand.winners ? [...hand.winners].sort() : null,
    extra: { ...hand.extra }
  };
}
