type DateField = 'year' | 'month' | 'day' | 'hour' | 'minute' | 'second' | 'millisecond';

type PatternSegment =
  | { kind: 'field'; field: DateField; width: number }
  | { kind: 'literal'; text: string };

const FIELD_TOKENS: ReadonlyArray<{ token: string; field: DateField }> = [
  { token: 'yyyy', field: 'year' },
  { token: 'fff', field: 'millisecond' },
  { token: 'MM', field: 'month' },
  { token: 'dd', field: 'day' },
  { token: 'HH', field: 'hour' },
  { token: 'mm', field: 'minute' },
  { token: 'ss', field: 'second' }
];

const compiledPatterns = new Map<string, PatternSegment[]>();

function compilePattern(pattern: string): PatternSegment[] {
  const cached = compiledPatterns.get(pattern);
  if (cached) {
    return cached;
  }

  const segments: PatternSegment[] = [];
  const pushLiteral = (text: string) => {
    const last = segments[segments.length - 1];
    if (last && last.kind === 'literal') {
      last.text += text;
    } else {
      segments.push({ kind: 'literal', text });
    }
  };

  let index = 0;
  while (index < pattern.length) {
    const char = pattern[index];
    if (char === "'") {
      const closing = pattern.indexOf("'", index + 1);
      const end = closing === -1 ? pattern.length : closing;
      pushLiteral(pattern.slice(index + 1, end));
      index = end + 1;
      continue;
    }
    if (char === '\\' && index + 1 < pattern.length) {
      pushLiteral(pattern[index + 1]);
      index += 2;
      continue;
    }
    const token = FIELD_TOKENS.find((candidate) => pattern.startsWith(candidate.token, index));
    if (token) {
      segments.push({ kind: 'field', field: token.field, width: token.token.length });
      index += token.token.length;
      continue;
    }
    pushLiteral(char);
    index += 1;
  }

  compiledPatterns.set(pattern, segments);
  return segments;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parses `value` against a fixed-width date pattern such as `yyyy-MM-dd` or
 * `yyyyMMddHHmm`. Matching is exact: every field must have its full width of
 * digits and every literal must appear verbatim. Leading and trailing whitespace
 * is ignored. Missing fields default to the start of their range, and the result
 * is read as UTC.
 *
 * Quoted (`'T'`) and backslash-escaped literals are accepted, but patterns
 * applied to object paths must not use them: the path is cut to the pattern's
 * length before parsing, and the quotes count toward that length.
 */
export function parseDatePattern(value: string, pattern: string): Date | null {
  const input = value.trim();
  const fields: Record<DateField, number> = {
    year: 1970,
    month: 1,
    day: 1,
    hour: 0,
    minute: 0,
    second: 0,
    millisecond: 0
  };

  let cursor = 0;
  for (const segment of compilePattern(pattern)) {
    if (segment.kind === 'literal') {
      if (!input.startsWith(segment.text, cursor)) {
        return null;
      }
      cursor += segment.text.length;
      continue;
    }
    const digits = input.slice(cursor, cursor + segment.width);
    if (digits.length !== segment.width || !/^\d+$/.test(digits)) {
      return null;
    }
    fields[segment.field] = Number.parseInt(digits, 10);
    cursor += segment.width;
  }

  if (cursor !== input.length) {
    return null;
  }

  const { year, month, day, hour, minute, second, millisecond } = fields;
  if (year < 1 || month < 1 || month > 12) {
    return null;
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const parsed = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millisecond));
  // Date.UTC maps years 0-99 onto 1900-1999.
  parsed.setUTCFullYear(year);
  return parsed;
}
