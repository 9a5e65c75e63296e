/**
 * Currency code recorded on a withdrawal test, fiat or crypto (CNY, MYR, USDT).
 * Codes are trimmed and upper-cased, so 'usdt' and ' USDT ' are the same currency.
 */
export class Currency {
  private constructor(readonly code: string) {}

  static create(code: string): Currency {
    const normalized = code.trim().toUpperCase();
    if (normalized === '') {
      throw new Error('Currency code cannot be empty');
    }
    return new Currency(normalized);
  }

  /** undefined for null, undefined or blank codes */
  static tryCreate(code: string | null | undefined): Currency | undefined {
    return code?.trim() ? Currency.create(code) : undefined;
  }

  equals(other: Currency): boolean {
    return this.code === other.code;
  }

  toString(): string {
    return this.code;
  }

  toJSON(): string {
    return this.code;
  }
}

/**
 * How the applied and received currencies of a withdrawal relate.
 * `same` also covers a record where only one side (or neither) was written down.
 */
export type CurrencyPair =
  | { mode: 'same'; currency: Currency | undefined }
  | { mode: 'cross'; from: Currency; to: Currency };

export function resolveCurrencyPair(
  applied: string | null | undefined,
  received: string | null | undefined
): CurrencyPair {
  const from = Currency.tryCreate(applied);
  const to = Currency.tryCreate(received);
  if (from && to && !from.equals(to)) {
    return { mode: 'cross', from, to };
  }
  return { mode: 'same', currency: from ?? to };
}
