import { UnknownEnumerationValueError } from "@hh-parser/shared";
import { fullTiltPoker } from "./fullTilt";
import type { RoomAdapter } from "./types";

const rooms = new Map<string, RoomAdapter>();

/** Registers `adapter` under its lower-cased name, replacing any previous one. */
export function registerRoom(adapter: RoomAdapter): void {
  rooms.set(adapter.name.toLowerCase(), adapter);
}

export function getRoom(name: string): RoomAdapter {
  const adapter = rooms.get(name.trim().toLowerCase());
  if (!adapter) {
    throw new UnknownEnumerationValueError("poker room", name);
  }
  return adapter;
}

export function listRooms(): string[] {
  return [...rooms.keys()].sort();
}

registerRoom(fullTiltPoker);
