/**
 * Currency symbol resolution
 *
 * Maps a leading currency symbol ("R$", "£") or an embedded ISO code ("EUR")
 * to a currency code.
 */

/**
 * Ordered symbol → currency code pairs
 */
export type SymbolTable = ReadonlyArray<readonly [symbol: string, code: string]>;

/**
 * Default symbol table
 * Some symbols are prefixes of others ("R" of "R$"); the resolver tries longer symbols first.
 */
export const CURRENCY_SYMBOLS: SymbolTable = [
  ['$', 'USD'],
  ['€', 'EUR'],
  ['£', 'GBP'],
  ['₤', 'GBP'],
  ['R$', 'BRL'],
  ['R', 'ZAR'],
  ['¥', 'JPY'],
  ['C$', 'CAD'],
];

const ISO_CODE_PATTERN = /[A-Z]{2,3}/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a resolver over a symbol table
 *
 * Entries are sorted by descending symbol length (stable for equal lengths),
 * so a symbol never shadows a longer symbol it is a prefix of,
 * whatever order the table lists them in.
 */
export function createSymbolResolver(table: SymbolTable): (text: string) => string | null {
  const entries = [...table]
    .filter(([symbol]) => symbol.length > 0)
    .sort(([a], [b]) => b.length - a.length);

  if (entries.length === 0) {
    return () => null;
  }

  const codes = new Map<string, string>();
  for (const [symbol, code] of entries) {
    if (!codes.has(symbol)) codes.set(symbol, code);
  }

  const pattern = new RegExp(`^[+-]?(${entries.map(([symbol]) => escapeRegExp(symbol)).join('|')})`);

  return (text: string) => {
    const match = pattern.exec(text);
    if (!match) return null;
    return codes.get(match[1]) ?? null;
  };
}

/**
 * Resolve a leading symbol against the default symbol table
 */
export const resolveCurrencySymbol = createSymbolResolver(CURRENCY_SYMBOLS);

/**
 * Return the first run of 2–3 uppercase letters as a candidate ISO code
 * The candidate is not checked against any registry.
 */
export function scanIsoCode(text: string): string | null {
  const match = ISO_CODE_PATTERN.exec(text);
  return match ? match[0] : null;
}

/**
 * Currency named by the text: a leading symbol, else an ISO code, else null
 */
export function computeCurrency(
  text: string,
  resolveSymbol: (text: string) => string | null = resolveCurrencySymbol
): string | null {
  return resolveSymbol(text) ?? scanIsoCode(text);
}
