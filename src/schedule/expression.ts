// ── Schedule Expressions ────────────────────────────────────────────────────
//
// Text form of a schedule, for jobs files and the CLI.
//
//   days(wed) & hours(6,12) & minutes(0) | days(thu) & hours(5-7) & minutes(30)
//
// Operators, loosest first: "|" union, "&" intersection, "!" negation.
// Field lists follow cron conventions: *, literals, ranges (1-5), steps
// (*/15, 1-5/2) and lists (1,3,5). Days accept names (wed, wednesday).
// times(<expr>, n) keeps the first n occurrences.

import { FIELD_RANGES } from "../types/time.ts";
import { ScheduleParseError } from "./errors.ts";
import {
  always,
  assertNever,
  intersection,
  LEAF_FIELDS,
  leaf,
  negate,
  never,
  times,
  union,
} from "./schedule.ts";
import type { LeafKind, Schedule } from "./schedule.ts";
import { dayFromIndex, dayIndex, lookupDay } from "./time-point.ts";

// ── Field Names ──────────────────────────────────────────────────────────────

const FIELD_KEYWORDS: Readonly<Record<string, LeafKind>> = {
  weeks: "weeks",
  days: "daysOfWeek",
  hours: "hours",
  minutes: "minutes",
  months: "months",
};

const LEAF_KEYWORDS: Readonly<Record<LeafKind, string>> = {
  weeks: "weeks",
  daysOfWeek: "days",
  hours: "hours",
  minutes: "minutes",
  months: "months",
};

// ── Tokenizer ────────────────────────────────────────────────────────────────

type TokenType = "ident" | "int" | "symbol" | "end";

interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly position: number;
}

const SYMBOLS = "()|&!,-/*";

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expression.length) {
    const ch = expression.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (SYMBOLS.includes(ch)) {
      tokens.push({ type: "symbol", value: ch, position: i });
      i++;
      continue;
    }

    const word = /^[A-Za-z]+|^\d+/.exec(expression.slice(i));
    if (!word) {
      throw new ScheduleParseError(
        `Unexpected character "${ch}" at position ${i}`,
        expression,
        i,
      );
    }

    const value = word[0];
    tokens.push({
      type: /^\d/.test(value) ? "int" : "ident",
      value: /^\d/.test(value) ? value : value.toLowerCase(),
      position: i,
    });
    i += value.length;
  }

  tokens.push({ type: "end", value: "", position: expression.length });
  return tokens;
}

// ── Parser ───────────────────────────────────────────────────────────────────

/**
 * Parse a schedule expression.
 * Throws ScheduleParseError for syntax errors and out-of-range values.
 */
export function parseSchedule(expression: string): Schedule {
  if (!expression.trim()) {
    throw new ScheduleParseError("Empty schedule expression", expression, 0);
  }

  const parser = new ExpressionParser(expression, tokenize(expression));
  return parser.parse();
}

class ExpressionParser {
  private index = 0;

  constructor(
    private readonly expression: string,
    private readonly tokens: readonly Token[],
  ) {}

  parse(): Schedule {
    const schedule = this.parseUnion();
    const trailing = this.peek();
    if (trailing.type !== "end") {
      throw this.error(`Unexpected "${trailing.value}"`, trailing);
    }
    return schedule;
  }

  private parseUnion(): Schedule {
    let result = this.parseIntersection();
    while (this.acceptSymbol("|")) {
      result = union(result, this.parseIntersection());
    }
    return result;
  }

  private parseIntersection(): Schedule {
    let result = this.parseUnary();
    while (this.acceptSymbol("&")) {
      result = intersection(result, this.parseUnary());
    }
    return result;
  }

  private parseUnary(): Schedule {
    if (this.acceptSymbol("!")) {
      return negate(this.parseUnary());
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Schedule {
    const token = this.next();

    if (token.type === "symbol" && token.value === "(") {
      const inner = this.parseUnion();
      this.expectSymbol(")");
      return inner;
    }

    if (token.type !== "ident") {
      throw this.error(
        token.type === "end" ? "Unexpected end of expression" : `Unexpected "${token.value}"`,
        token,
      );
    }

    if (token.value === "always") return always();
    if (token.value === "never") return never();

    if (token.value === "times") {
      this.expectSymbol("(");
      const inner = this.parseUnion();
      this.expectSymbol(",");
      const countToken = this.peek();
      const count = this.expectInt();
      if (!Number.isSafeInteger(count)) {
        throw this.error(`Occurrence count ${countToken.value} is too large`, countToken);
      }
      this.expectSymbol(")");
      return times(inner, count);
    }

    const kind = FIELD_KEYWORDS[token.value];
    if (kind === undefined) {
      throw this.error(`Unknown schedule field "${token.value}"`, token);
    }
    return leaf(kind, this.parseFieldList(kind));
  }

  // ── Field Lists ───────────────────────────────────────────────────────

  private parseFieldList(kind: LeafKind): number[] {
    this.expectSymbol("(");
    const values = new Set<number>();
    if (this.acceptSymbol(")")) {
      return [];
    }

    do {
      this.parseFieldItem(kind, values);
    } while (this.acceptSymbol(","));

    this.expectSymbol(")");
    return [...values];
  }

  private parseFieldItem(kind: LeafKind, values: Set<number>): void {
    const field = LEAF_FIELDS[kind];
    const { min, max } = FIELD_RANGES[field];
    const startToken = this.peek();

    let start: number;
    let end: number;

    if (this.acceptSymbol("*")) {
      start = min;
      end = max;
    } else {
      start = this.parseFieldValue(kind);
      end = start;
      if (this.acceptSymbol("-")) {
        end = this.parseFieldValue(kind);
        if (start > end) {
          throw this.error(`Range start ${start} > end ${end} in ${field}`, startToken);
        }
      }
    }

    let step: number | null = null;
    if (this.acceptSymbol("/")) {
      const stepToken = this.peek();
      step = this.expectInt();
      if (step <= 0) {
        throw this.error(`Step value must be positive in ${field}, got ${step}`, stepToken);
      }
      // A single value with a step runs to the end of the field, as in cron.
      if (start === end) {
        end = max;
      }
    }

    for (let v = start; v <= end; v += step ?? 1) {
      values.add(v);
    }
  }

  private parseFieldValue(kind: LeafKind): number {
    const field = LEAF_FIELDS[kind];
    const { min, max } = FIELD_RANGES[field];
    const token = this.next();

    let value: number;
    if (token.type === "int") {
      value = parseInt(token.value, 10);
    } else if (token.type === "ident" && kind === "daysOfWeek") {
      const day = lookupDay(token.value);
      if (day === null) {
        throw this.error(`Unknown day of week "${token.value}"`, token);
      }
      value = dayIndex(day);
    } else {
      throw this.error(`Expected a ${field} value, got "${token.value}"`, token);
    }

    if (value < min || value > max) {
      throw this.error(`Value ${value} out of range [${min}-${max}] in ${field}`, token);
    }
    return value;
  }

  // ── Token Helpers ─────────────────────────────────────────────────────

  private peek(): Token {
    return this.tokens[this.index] ?? this.endToken();
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== "end") this.index++;
    return token;
  }

  private acceptSymbol(symbol: string): boolean {
    const token = this.peek();
    if (token.type === "symbol" && token.value === symbol) {
      this.index++;
      return true;
    }
    return false;
  }

  private expectSymbol(symbol: string): void {
    const token = this.peek();
    if (!this.acceptSymbol(symbol)) {
      throw this.error(
        `Expected "${symbol}" but found ${token.type === "end" ? "end of expression" : `"${token.value}"`}`,
        token,
      );
    }
  }

  private expectInt(): number {
    const token = this.next();
    if (token.type !== "int") {
      throw this.error(`Expected an integer, got "${token.value}"`, token);
    }
    return parseInt(token.value, 10);
  }

  private endToken(): Token {
    return { type: "end", value: "", position: this.expression.length };
  }

  private error(message: string, token: Token): ScheduleParseError {
    return new ScheduleParseError(
      `${message} at position ${token.position}`,
      this.expression,
      token.position,
    );
  }
}

// ── Formatter ────────────────────────────────────────────────────────────────

const PRECEDENCE = { union: 1, intersection: 2, atom: 3 } as const;

function precedenceOf(schedule: Schedule): number {
  switch (schedule.kind) {
    case "union":
      return PRECEDENCE.union;
    case "intersection":
      return PRECEDENCE.intersection;
    default:
      return PRECEDENCE.atom;
  }
}

/**
 * Render a schedule as an expression that `parseSchedule` reads back to the
 * same tree. Parentheses appear only where precedence or right-nesting needs
 * them.
 */
export function formatSchedule(schedule: Schedule): string {
  switch (schedule.kind) {
    case "weeks":
    case "daysOfWeek":
    case "hours":
    case "minutes":
    case "months":
      return `${LEAF_KEYWORDS[schedule.kind]}(${formatValues(schedule.kind, schedule.values)})`;
    case "always":
    case "never":
      return schedule.kind;
    case "times":
      return `times(${formatSchedule(schedule.schedule)}, ${schedule.n})`;
    case "negate": {
      const inner = formatSchedule(schedule.schedule);
      return precedenceOf(schedule.schedule) < PRECEDENCE.atom ? `!(${inner})` : `!${inner}`;
    }
    case "union":
    case "intersection": {
      const own = precedenceOf(schedule);
      const left = formatSchedule(schedule.left);
      const right = formatSchedule(schedule.right);
      const op = schedule.kind === "union" ? "|" : "&";
      return [
        precedenceOf(schedule.left) < own ? `(${left})` : left,
        op,
        precedenceOf(schedule.right) <= own ? `(${right})` : right,
      ].join(" ");
    }
    default:
      return assertNever(schedule);
  }
}

/** Values joined by commas, with runs of three or more written as ranges. */
function formatValues(kind: LeafKind, values: readonly number[]): string {
  const render = (v: number): string =>
    kind === "daysOfWeek" ? dayFromIndex(v).slice(0, 3) : String(v);

  const parts: string[] = [];
  let i = 0;
  while (i < values.length) {
    const start = values[i] ?? 0;
    let j = i;
    while (j + 1 < values.length && values[j + 1] === (values[j] ?? 0) + 1) {
      j++;
    }

    if (j - i >= 2) {
      parts.push(`${render(start)}-${render(values[j] ?? start)}`);
    } else {
      for (let k = i; k <= j; k++) {
        parts.push(render(values[k] ?? start));
      }
    }
    i = j + 1;
  }

  return parts.join(",");
}
