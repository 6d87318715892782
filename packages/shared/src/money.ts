/**
 * Monetary Token Parsing
 *
 * Shared by the column-role detector, the content gate, the response parser
 * and the pattern extractor so that every stage agrees on what a number is.
 *
 * Accepted forms: currency symbols ($ € £ ¥), thousands separators, decimals,
 * parenthesized negatives "(1,234.56)", and minus-prefixed or minus-suffixed
 * negatives "-1,234" / "1,234-".
 */

const CURRENCY_SYMBOLS = /[$€£¥]/g;
const CURRENCY_CODE = /^(usd|eur|gbp)\s*/i;
const AMOUNT_BODY = /^(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?$|^\.\d+$/;

/**
 * Parse a cell or token as a monetary amount. Returns null for anything that
 * is not a well-formed number (percentages, words, malformed separators).
 */
export function parseMoney(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw !== 'string') return null;

  let text = raw.trim().replace(/\s+/g, '').replace(/−/g, '-');
  if (!text || text.includes('%')) return null;

  let negative = false;
  const stripParens = () => {
    const match = /^\((.*)\)$/.exec(text);
    if (match) {
      negative = true;
      text = match[1];
    }
  };
  const stripMinus = () => {
    if (text.startsWith('-')) {
      negative = true;
      text = text.slice(1);
    }
    if (text.endsWith('-')) {
      negative = true;
      text = text.slice(0, -1);
    }
  };

  stripParens();
  stripMinus();
  text = text.replace(CURRENCY_CODE, '').replace(CURRENCY_SYMBOLS, '');
  stripParens();
  stripMinus();

  if (!AMOUNT_BODY.test(text)) return null;

  const value = parseFloat(text.replace(/,/g, ''));
  if (!Number.isFinite(value)) return null;
  return negative && value !== 0 ? -value : value;
}

export interface MoneyToken {
  raw: string;
  value: number;
  /** Offset of the token in the scanned line */
  index: number;
  hasCurrency: boolean;
  hasSeparator: boolean;
  hasDecimal: boolean;
}

// Groups: 1 "(", 2 leading minus, 3 currency, 4 minus after currency,
// 5 integer part, 6 decimals, 7 ")", 8 trailing minus
const MONEY_TOKEN_PATTERN =
  /(?<![\w.,/-])(\()?([-−])?(?:([$€£¥])\s?)?(-)?(\d{1,3}(?:,\d{3})+|\d+)(\.\d+)?(\))?(-(?!\w))?(?![\w%/]|\.\d|,\d)/g;

/**
 * Find every monetary-looking token in a line, in order of appearance.
 */
export function findMoneyTokens(line: string): MoneyToken[] {
  const tokens: MoneyToken[] = [];
  for (const match of line.matchAll(MONEY_TOKEN_PATTERN)) {
    const [raw, open, leadingMinus, currency, innerMinus, integerPart, decimals, close, trailingMinus] =
      match;
    const magnitude = parseFloat(integerPart.replace(/,/g, '') + (decimals ?? ''));
    if (!Number.isFinite(magnitude)) continue;

    const parenthesized = open !== undefined && close !== undefined;
    const negative =
      parenthesized ||
      leadingMinus !== undefined ||
      innerMinus !== undefined ||
      trailingMinus !== undefined;

    let text = raw;
    let index = match.index ?? 0;
    // An unbalanced parenthesis belongs to the surrounding prose, not the amount
    if (open !== undefined && close === undefined) {
      text = text.slice(1);
      index += 1;
    } else if (close !== undefined && open === undefined) {
      text = text.slice(0, -1);
    }

    tokens.push({
      raw: text.trim(),
      value: negative && magnitude !== 0 ? -magnitude : magnitude,
      index,
      hasCurrency: currency !== undefined,
      hasSeparator: integerPart.includes(','),
      hasDecimal: decimals !== undefined,
    });
  }
  return tokens;
}

/**
 * A bare four-digit integer between 1900 and 2099 reads as a year, not money.
 */
export function isYearLike(token: MoneyToken): boolean {
  return (
    !token.hasCurrency &&
    !token.hasSeparator &&
    !token.hasDecimal &&
    Number.isInteger(token.value) &&
    token.value >= 1900 &&
    token.value <= 2099
  );
}

export function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Render an amount the way the canonical content text does: plain digits,
 * a leading minus, at most two decimals.
 */
export function formatAmount(value: number): string {
  return String(roundCents(value));
}

/**
 * Amount for a "Category: value" statement line. An integer in the year range
 * keeps two decimals so it still reads as money.
 */
export function formatStatementAmount(value: number): string {
  const rounded = roundCents(value);
  if (Number.isInteger(rounded) && rounded >= 1900 && rounded <= 2099) return rounded.toFixed(2);
  return formatAmount(rounded);
}
