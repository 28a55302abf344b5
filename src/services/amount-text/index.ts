import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';

const ONES: Readonly<Record<string, number>> = {
  one: 1, two: 2, three: 3, four: 4, five: 5, six: 6, seven: 7, eight: 8, nine: 9,
};

const TEENS: Readonly<Record<string, number>> = {
  ten: 10, eleven: 11, twelve: 12, thirteen: 13, fourteen: 14,
  fifteen: 15, sixteen: 16, seventeen: 17, eighteen: 18, nineteen: 19,
};

const TENS: Readonly<Record<string, number>> = {
  twenty: 20, thirty: 30, forty: 40, fifty: 50, sixty: 60, seventy: 70, eighty: 80, ninety: 90,
};

const SCALES: Readonly<Record<string, number>> = {
  thousand: 1_000,
  million: 1_000_000,
  billion: 1_000_000_000,
};

const DOLLAR_WORDS: ReadonlySet<string> = new Set(['dollar', 'dollars']);
const CENT_WORDS: ReadonlySet<string> = new Set(['cent', 'cents']);
const FRACTION = /^(\d{2})\/100$/;
const WORD = /^[a-z]+$/;

/** Parse step outcome; the string is the reason shown to the caller. */
type Step<T> = Result<T, string>;

/**
 * Converts a written-English amount ("One Million Two Hundred Fifty Thousand
 * Dollars", "Ten Dollars and 50/100", "Five Dollars and Twenty Cents") into
 * integer cents. Only exact vocabulary is accepted: an unknown word or an
 * out-of-grammar sequence fails the whole parse.
 */
export function parseAmountText(text: string): Result<number, AppError> {
  const parsed = parseTokens(tokenize(text));
  if (!parsed.ok) {
    return err(
      createAppError(
        ErrorCode.AMOUNT_PARSE_ERROR,
        `Cannot parse written amount '${text}': ${parsed.error}`,
        false,
      ),
    );
  }
  return ok(parsed.value);
}

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[-,.()]/g, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

function parseTokens(all: string[]): Step<number> {
  const unsupported = all.find((token) => !WORD.test(token) && !FRACTION.test(token));
  if (unsupported !== undefined) return err(`unsupported token '${unsupported}'`);

  const tokens = all[all.length - 1] === 'only' ? all.slice(0, -1) : all;

  const fractionIndex = tokens.findIndex((token) => FRACTION.test(token));
  if (fractionIndex !== -1) {
    return parseWithFraction(tokens, fractionIndex);
  }

  const last = tokens[tokens.length - 1];
  if (last !== undefined && CENT_WORDS.has(last)) {
    return parseWithCentWords(tokens.slice(0, -1));
  }

  const whole = parseWholeNumber(dropTrailingDollarWord(tokens));
  return whole.ok ? ok(whole.value * 100) : whole;
}

/** `... [dollars] [and] NN/100 [dollars]` */
function parseWithFraction(tokens: string[], fractionIndex: number): Step<number> {
  const extra = tokens
    .slice(fractionIndex + 1)
    .find((token, index) => index > 0 || !DOLLAR_WORDS.has(token));
  if (extra !== undefined) return err(`unexpected word '${extra}' after fraction`);

  let leading = tokens.slice(0, fractionIndex);
  if (leading[leading.length - 1] === 'and') leading = leading.slice(0, -1);
  leading = dropTrailingDollarWord(leading);

  if (leading.length === 0) return err('fraction has no dollar amount before it');

  const whole = parseWholeNumber(leading);
  if (!whole.ok) return whole;

  const match = FRACTION.exec(tokens[fractionIndex]);
  const cents = match ? Number(match[1]) : 0;
  return ok(whole.value * 100 + cents);
}

/** `[<whole> dollars and] <zero | 1..99> cents` */
function parseWithCentWords(tokens: string[]): Step<number> {
  const dollarIndex = tokens.findIndex((token) => DOLLAR_WORDS.has(token));

  let wholeTokens: string[] = [];
  let centTokens = tokens;
  if (dollarIndex !== -1) {
    wholeTokens = tokens.slice(0, dollarIndex);
    if (tokens[dollarIndex + 1] !== 'and') {
      return err(`expected 'and' between dollars and cents`);
    }
    centTokens = tokens.slice(dollarIndex + 2);
  }

  const cents: Step<number> = centTokens.length === 1 && centTokens[0] === 'zero' ? ok(0) : parseGroup(centTokens);
  if (!cents.ok) return cents;
  if (cents.value > 99) return err(`cent amount ${cents.value} is not below 100`);

  if (dollarIndex === -1) return ok(cents.value);

  const whole = parseWholeNumber(wholeTokens);
  return whole.ok ? ok(whole.value * 100 + cents.value) : whole;
}

function dropTrailingDollarWord(tokens: string[]): string[] {
  const last = tokens[tokens.length - 1];
  return last !== undefined && DOLLAR_WORDS.has(last) ? tokens.slice(0, -1) : tokens;
}

/** Groups joined by scale words, scales strictly decreasing. */
function parseWholeNumber(tokens: string[]): Step<number> {
  if (tokens.length === 0) return err('no number words');
  if (tokens.length === 1 && tokens[0] === 'zero') return ok(0);

  let total = 0;
  let previousScale = Number.POSITIVE_INFINITY;
  let group: string[] = [];

  for (const token of tokens) {
    const scale = SCALES[token];
    if (scale === undefined) {
      group.push(token);
      continue;
    }

    if (scale >= previousScale) return err(`scale word '${token}' is out of order`);
    group = dropLeadingAnd(group, previousScale);
    if (group.length === 0) return err(`scale word '${token}' has no number before it`);

    const value = parseGroup(group);
    if (!value.ok) return value;

    total += value.value * scale;
    previousScale = scale;
    group = [];
  }

  group = dropLeadingAnd(group, previousScale);
  if (group.length > 0) {
    const value = parseGroup(group);
    if (!value.ok) return value;
    total += value.value;
  }

  return ok(total);
}

// "one million and five thousand", "one thousand and five": a group after a scale may open with "and".
function dropLeadingAnd(group: string[], previousScale: number): string[] {
  return group[0] === 'and' && group.length > 1 && Number.isFinite(previousScale) ? group.slice(1) : group;
}

/** `[ONES hundred [and]] (TENS [ONES] | TEEN | ONES)`, yielding 1..999. */
function parseGroup(tokens: string[]): Step<number> {
  if (tokens.length === 0) return err('no number words');

  let value = 0;
  let i = 0;

  const hundreds = ONES[tokens[0]];
  if (hundreds !== undefined && tokens[1] === 'hundred') {
    value = hundreds * 100;
    i = 2;
    if (tokens[i] === 'and') {
      if (i + 1 >= tokens.length) return err(`dangling 'and' after 'hundred'`);
      i += 1;
    }
  }

  if (i < tokens.length) {
    const token = tokens[i];
    const tens = TENS[token];
    const teen = TEENS[token];
    const one = ONES[token];

    if (tens !== undefined) {
      value += tens;
      i += 1;
      const unit = i < tokens.length ? ONES[tokens[i]] : undefined;
      if (unit !== undefined) {
        value += unit;
        i += 1;
      }
    } else if (teen !== undefined) {
      value += teen;
      i += 1;
    } else if (one !== undefined) {
      value += one;
      i += 1;
    }
  }

  if (i < tokens.length) return err(`unexpected word '${tokens[i]}'`);
  return ok(value);
}
