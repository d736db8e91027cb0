/**
 * Ticker symbol validation
 */

/** Longest accepted symbol, share-class separator included */
export const MAX_SYMBOL_LENGTH = 5;

/**
 * Check if a string is a valid ticker symbol.
 *
 * Valid symbols are:
 * - 1-5 characters long
 * - uppercase ASCII letters, digits and `.` only
 * - at least one letter
 * - not starting or ending with `.`
 *
 * @example
 * ```typescript
 * isValidSymbol('BRK.B')   // true
 * isValidSymbol('123')     // false
 * isValidSymbol('aapl')    // false
 * isValidSymbol('TOOLONG') // false
 * ```
 */
export function isValidSymbol(symbol: string): boolean {
  if (!symbol) {
    return false;
  }

  if (symbol.length > MAX_SYMBOL_LENGTH) {
    return false;
  }

  if (symbol.startsWith('.') || symbol.endsWith('.')) {
    return false;
  }

  if (!/[A-Za-z]/.test(symbol)) {
    return false;
  }

  for (const char of symbol) {
    if (char === '.') {
      continue;
    }
    if (!/^[A-Za-z0-9]$/.test(char)) {
      return false;
    }
    if (/^[a-z]$/.test(char)) {
      return false;
    }
  }

  return true;
}
