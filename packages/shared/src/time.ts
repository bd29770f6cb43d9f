import { MalformedHeaderError, UnknownEnumerationValueError } from "./errors";

type DateField = "year" | "month" | "day" | "hour" | "minute" | "second";

const DIRECTIVES: Record<string, { field: DateField; pattern: string }> = {
  Y: { field: "year", pattern: "(\\d{4})" },
  m: { field: "month", pattern: "(\\d{1,2})" },
  d: { field: "day", pattern: "(\\d{1,2})" },
  H: { field: "hour", pattern: "(\\d{1,2})" },
  M: { field: "minute", pattern: "(\\d{1,2})" },
  S: { field: "second", pattern: "(\\d{1,2})" }
};

interface CompiledFormat {
  regex: RegExp;
  fields: DateField[];
}

const compiledFormats = new Map<string, CompiledFormat>();
const formatters = new Map<string, Intl.DateTimeFormat>();

function compileFormat(format: string): CompiledFormat {
  const cached = compiledFormats.get(format);
  if (cached) {
    return cached;
  }
  const fields: DateField[] = [];
  let source = "";
  for (let i = 0; i < format.length; i += 1) {
    const char = format[i];
    if (char === "%" && i + 1 < format.length) {
      const directive = format[i + 1];
      i += 1;
      if (directive === "%") {
        source += "%";
        continue;
      }
      const entry = DIRECTIVES[directive];
      if (!entry) {
        throw new UnknownEnumerationValueError("date directive", `%${directive}`);
      }
      fields.push(entry.field);
      source += entry.pattern;
      continue;
    }
    source += char.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
  }
  const compiled = { regex: new RegExp(`^${source}$`), fields };
  compiledFormats.set(format, compiled);
  return compiled;
}

function zoneFormatter(timeZone: string): Intl.DateTimeFormat {
  const cached = formatters.get(timeZone);
  if (cached) {
    return cached;
  }
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit"
    });
  } catch {
    throw new UnknownEnumerationValueError("time zone", timeZone);
  }
  formatters.set(timeZone, formatter);
  return formatter;
}

/** Milliseconds the zone's wall clock is ahead of UTC at `instant`. */
function zoneOffsetMs(instant: number, formatter: Intl.DateTimeFormat): number {
  const parts = formatter.formatToParts(new Date(instant));
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find(entry => entry.type === type)?.value ?? Number.NaN);
  const wallAsUtc = Date.UTC(
    part("year"),
    part("month") - 1,
    part("day"),
    part("hour"),
    part("minute"),
    part("second")
  );
  return wallAsUtc - Math.floor(instant / 1000) * 1000;
}

/**
 * Parses a room-local timestamp with a strftime-style format (`%Y %m %d %H
 * %M %S %%`), interprets it in `timeZone` and returns the UTC instant.
 */
export function parseLocalDate(text: string, format: string, timeZone: string): Date {
  const { regex, fields } = compileFormat(format);
  const match = regex.exec(text.trim());
  if (!match) {
    throw new MalformedHeaderError(text, `date does not match '${format}'`);
  }

  const values: Record<DateField, number> = { year: 1970, month: 1, day: 1, hour: 0, minute: 0, second: 0 };
  fields.forEach((field, idx) => {
    values[field] = Number(match[idx + 1]);
  });
  if (
    values.month < 1 ||
    values.month > 12 ||
    values.day < 1 ||
    values.day > 31 ||
    values.hour > 23 ||
    values.minute > 59 ||
    values.second > 59
  ) {
    throw new MalformedHeaderError(text, "date out of range");
  }

  const formatter = zoneFormatter(timeZone);
  const wallAsUtc = Date.UTC(values.year, values.month - 1, values.day, values.hour, values.minute, values.second);
  const guessOffset = zoneOffsetMs(wallAsUtc, formatter);
  let instant = wallAsUtc - guessOffset;
  const settledOffset = zoneOffsetMs(instant, formatter);
  if (settledOffset !== guessOffset) {
    instant = wallAsUtc - settledOffset;
  }
  return new Date(instant);
}
