export { Rank, FACE_RANKS, BROADWAY_RANKS, type RankSymbol } from "./rank";
export { Suit, type SuitCode } from "./suit";
export { Card, DECK } from "./card";
export { Combo } from "./combo";
