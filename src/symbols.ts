/**
 * Symbol Table
 *
 * Tracks parameter names and group identifiers used within one syntax
 * specification.
 */

import { ParseError } from './errors';

export class SymbolTable {
  private readonly symbols = new Set<string>();

  /**
   * Register a symbol and return the name to bind it under.
   * Throws ParseError when the symbol is already taken.
   */
  register(symbol: string, position: number): string {
    if (this.symbols.has(symbol)) {
      throw new ParseError(`Symbol '${symbol}' used more than once`, position);
    }
    this.symbols.add(symbol);
    return symbol;
  }

  has(symbol: string): boolean {
    return this.symbols.has(symbol);
  }

  get size(): number {
    return this.symbols.size;
  }
}
