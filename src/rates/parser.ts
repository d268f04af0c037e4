export const RATE_COLUMNS = [
  "TT BUY",
  "TT SELL",
  "BILL BUY",
  "BILL SELL",
  "FOREX TRAVEL CARD BUY",
  "FOREX TRAVEL CARD SELL",
  "CN BUY",
  "CN SELL",
] as const;

export interface CurrencyRates {
  currencyCode: string;
  rates: string[];
}

const REFERENCE_MARKER = "to be used as reference rates";

// Text extraction sometimes drops the space between the pair and the first rate.
const CURRENCY_LINE = /([A-Z]{3})\/INR\s*((?:\d+(?:\.\d+)?\s?)+)/;

/** The reference-rate table sits on one of the first two pages; fall back to the whole text. */
export function selectRatesText(pages: string[], fullText: string): string {
  const referencePage = pages.slice(0, 2).find((page) => page.toLowerCase().includes(REFERENCE_MARKER));
  return referencePage ?? fullText;
}

export function parseCurrencyRates(text: string): CurrencyRates[] {
  const seen = new Set<string>();
  const rows: CurrencyRates[] = [];

  for (const line of text.split(/\r?\n/)) {
    const match = line.match(CURRENCY_LINE);
    if (!match) {
      continue;
    }
    const currencyCode = match[1];
    if (seen.has(currencyCode)) {
      continue;
    }
    seen.add(currencyCode);
    rows.push({
      currencyCode,
      rates: match[2].trim().split(/\s+/).slice(0, RATE_COLUMNS.length),
    });
  }

  return rows;
}
