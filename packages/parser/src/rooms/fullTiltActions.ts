import { MalformedStageLineError, parseAction, type ActionType } from "@hh-parser/shared";
import { parseChips } from "../helpers";
import type { PlayerAction } from "../types";

const UNCALLED_RE = /^Uncalled bet of ([\d,.]+) returned to (.+)$/;
const RAISE_RE = /^raises to ([\d,.]+)/;
const WIN_RE = /^wins the (?:main |side )?pot \(([\d,.]+)\)/;
const MUCK_RE = /^mucks\b/;
const SHOW_RE = /^shows \[/;
const THINK_RE = /^has \d+ seconds left to act$/;
const GENERIC_RE = /^(\w+)(?: ([\d,.]+))?(?:, and is all in)?$/;
const NOISE_RE =
  /^(?:is sitting out|has returned|has reconnected|has been disconnected|has timed out|sits down|stands up|is feeling \w+)/;

/**
 * Splits `line` into the acting player and the rest. Seated names are tried
 * longest first so names containing spaces resolve; otherwise the first word
 * is taken as the name.
 */
export function splitActor(line: string, names: readonly string[]): { name: string; rest: string } | null {
  const known = [...names].sort((a, b) => b.length - a.length).find(name => line.startsWith(`${name} `));
  if (known) {
    return { name: known, rest: line.slice(known.length + 1) };
  }
  const space = line.indexOf(" ");
  if (space <= 0) {
    return null;
  }
  return { name: line.slice(0, space), rest: line.slice(space + 1) };
}

function amountOf(text: string): number {
  const amount = parseChips(text);
  if (Number.isNaN(amount)) {
    throw new Error(`'${text}' is not an amount`);
  }
  return amount;
}

function action(name: string, type: ActionType, amount: number | null = null): PlayerAction {
  return { name, action: type, amount };
}

/**
 * One Full Tilt action line. Returns null for lines that carry no action
 * (chat, seat status changes); throws on anything unrecognised.
 */
export function parseActionLine(line: string, names: readonly string[]): PlayerAction | null {
  const uncalled = UNCALLED_RE.exec(line);
  if (uncalled) {
    return action(uncalled[2], "return", amountOf(uncalled[1]));
  }
  if (names.some(name => line.startsWith(`${name}: `))) {
    return null;
  }

  const actor = splitActor(line, names);
  if (!actor) {
    throw new Error("no acting player");
  }
  const { name, rest } = actor;
  if (NOISE_RE.test(rest)) {
    return null;
  }

  const raise = RAISE_RE.exec(rest);
  if (raise) {
    return action(name, "raise", amountOf(raise[1]));
  }
  const win = WIN_RE.exec(rest);
  if (win) {
    return action(name, "win", amountOf(win[1]));
  }
  if (MUCK_RE.test(rest)) {
    return action(name, "muck");
  }
  if (SHOW_RE.test(rest)) {
    return action(name, "show");
  }
  if (THINK_RE.test(rest)) {
    return action(name, "think");
  }
  const generic = GENERIC_RE.exec(rest);
  if (!generic) {
    throw new Error("unrecognised action");
  }
  return action(name, parseAction(generic[1]), generic[2] === undefined ? null : amountOf(generic[2]));
}

/**
 * Parses consecutive action lines; `firstIndex` is the fragment index of
 * `lines[0]` so failures can point at the offending fragment.
 */
export function parseActionLines(
  stage: string,
  lines: readonly string[],
  firstIndex: number,
  names: readonly string[]
): PlayerAction[] {
  const actions: PlayerAction[] = [];
  lines.forEach((line, offset) => {
    let parsed: PlayerAction | null;
    try {
      parsed = parseActionLine(line, names);
    } catch (error) {
      throw new MalformedStageLineError(stage, firstIndex + offset, line, error);
    }
    if (parsed) {
      actions.push(parsed);
    }
  });
  return actions;
}
