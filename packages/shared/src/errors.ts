export class HandHistoryError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "HandHistoryError";
  }
}

export class InvalidCardFormatError extends HandHistoryError {
  readonly input: string;

  constructor(input: string, reason: string, cause?: unknown) {
    super(`Invalid card '${input}': ${reason}.`, { cause });
    this.name = "InvalidCardFormatError";
    this.input = input;
  }
}

export class UnknownEnumerationValueError extends HandHistoryError {
  readonly enumeration: string;
  readonly value: string;

  constructor(enumeration: string, value: string) {
    super(`'${value}' is not a valid ${enumeration}.`);
    this.name = "UnknownEnumerationValueError";
    this.enumeration = enumeration;
    this.value = value;
  }
}

/**
 * A stage looked for a marker or boundary that the split text does not have.
 * Street stages absorb it as "street not dealt"; elsewhere it propagates.
 */
export class SectionNotFoundError extends HandHistoryError {
  readonly marker: string;

  constructor(marker: string) {
    super(`Section '${marker}' was not found in the hand history.`);
    this.name = "SectionNotFoundError";
    this.marker = marker;
  }
}

export class MalformedHeaderError extends HandHistoryError {
  readonly line: string;

  constructor(line: string, reason = "header does not match the room format") {
    super(`Malformed header (${reason}): '${line}'`);
    this.name = "MalformedHeaderError";
    this.line = line;
  }
}

export class MalformedStageLineError extends HandHistoryError {
  readonly stage: string;
  readonly fragmentIndex: number | null;
  readonly line: string;

  constructor(stage: string, fragmentIndex: number | null, line: string, cause?: unknown) {
    const where = fragmentIndex === null ? "" : ` at fragment ${fragmentIndex}`;
    super(`Malformed ${stage} line${where}: '${line}'`, { cause });
    this.name = "MalformedStageLineError";
    this.stage = stage;
    this.fragmentIndex = fragmentIndex;
    this.line = line;
  }
}

export class HeroNotFoundError extends HandHistoryError {
  readonly heroName: string;

  constructor(heroName: string) {
    super(`Hero '${heroName}' is not seated at the table.`);
    this.name = "HeroNotFoundError";
    this.heroName = heroName;
  }
}

export class StageFailedError extends HandHistoryError {
  readonly stage: string;

  constructor(stage: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Stage '${stage}' failed: ${detail}`, { cause });
    this.name = "StageFailedError";
    this.stage = stage;
  }
}

export class HandParseAbortedError extends HandHistoryError {
  readonly ident: string | null;

  constructor(ident: string | null) {
    super(`Hand ${ident ?? "<unknown>"} failed to parse earlier and cannot be parsed again.`);
    this.name = "HandParseAbortedError";
    this.ident = ident;
  }
}
