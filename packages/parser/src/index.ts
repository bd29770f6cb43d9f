export { HandHistory, type HandHistoryOptions } from "./handHistory";
export { SplitText, splitSections } from "./splitter";
export { Street, type StreetTexture } from "./street";
export { initSeats, findHero, parseChips } from "./helpers";
export * from "./types";
export type { HandHeader, HeaderContext, RoomAdapter, StageContext, StageHandler, StageHandlers } from "./rooms/types";
export {
  FullTiltPokerAdapter,
  fullTiltPoker,
  collectedWinners,
  showdownWinners,
  type FullTiltPokerOptions,
  type WinnerStrategy
} from "./rooms/fullTilt";
export { parseActionLine, parseActionLines, splitActor } from "./rooms/fullTiltActions";
export { registerRoom, getRoom, listRooms } from "./rooms/registry";
export { parseHands, parseHandFiles, type BatchFailure, type BatchOptions, type BatchResult } from "./batch";
export { serializeHand, type SerializedHand, type SerializedPlayer, type SerializedStreet } from "./serialize";
