export const SUPPORTED_CURRENCIES = ["PHP", "USD"] as const;

export type CurrencyCode = (typeof SUPPORTED_CURRENCIES)[number];

/**
 * Amounts are integer minor units (centavos/cents). Sums stay exact; conversion to a
 * decimal happens only when an amount is rendered or written to a numeric column.
 */
export type Cents = number;

export interface MoneyFormatOptions extends Intl.NumberFormatOptions {
  locale?: string;
}

/** Largest unit price a numeric(10,2) column holds (99,999,999.99). */
export const MAX_UNIT_PRICE: Cents = 9_999_999_999;

/** Largest subtotal or sale total a numeric(12,2) column holds (9,999,999,999.99). */
export const MAX_AMOUNT: Cents = 999_999_999_999;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

export class MoneyParseError extends Error {
  constructor(value: unknown) {
    super(`Invalid money amount: ${String(value)}`);
    this.name = "MoneyParseError";
  }
}

export function isCurrencyCode(value: string): value is CurrencyCode {
  return SUPPORTED_CURRENCIES.some((code) => code === value);
}

/**
 * Parses a non-negative amount with at most two decimals ("50", "50.5", "50.25", 50.25)
 * into cents.
 */
export function parseMoney(value: string | number): Cents {
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) {
      throw new MoneyParseError(value);
    }
    const scaled = value * 100;
    const rounded = Math.round(scaled);
    if (Math.abs(scaled - rounded) > 1e-6 || !Number.isSafeInteger(rounded)) {
      throw new MoneyParseError(value);
    }
    return rounded;
  }

  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) {
    throw new MoneyParseError(value);
  }
  const whole = Number(match[1]);
  const fraction = Number((match[2] ?? "").padEnd(2, "0"));
  const cents = whole * 100 + fraction;
  if (!Number.isSafeInteger(cents)) {
    throw new MoneyParseError(value);
  }
  return cents;
}

export function isValidMoney(value: string | number): boolean {
  try {
    parseMoney(value);
    return true;
  } catch {
    return false;
  }
}

export function isValidUnitPrice(value: string | number): boolean {
  return isValidMoney(value) && parseMoney(value) <= MAX_UNIT_PRICE;
}

/** Renders cents as the two-decimal string stored in numeric columns and sent over the API. */
export function toDecimalString(cents: Cents): string {
  if (!Number.isSafeInteger(cents)) {
    throw new MoneyParseError(cents);
  }
  const sign = cents < 0 ? "-" : "";
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, "0");
  return `${sign}${whole}.${fraction}`;
}

/** Chart-ready number; only for presentation, never fed back into sums. */
export function toMajorUnits(cents: Cents): number {
  return Number(toDecimalString(cents));
}

export function multiplyCents(unitPrice: Cents, quantity: number): Cents {
  return unitPrice * quantity;
}

export function sumCents(values: Iterable<Cents>): Cents {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

export function formatMoney(cents: Cents, currency: CurrencyCode, options: MoneyFormatOptions = {}): string {
  const { locale = "en-US", ...intlOptions } = options;
  const formatter = new Intl.NumberFormat(locale, {
    style: "currency",
    currency,
    ...intlOptions,
  });
  return formatter.format(toMajorUnits(cents));
}
