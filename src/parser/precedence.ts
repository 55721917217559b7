/**
 * Binary operator precedence.
 * Higher numbers = higher precedence (binds tighter).
 */

/**
 * Returned by `get()` for characters that are not binary operators.
 */
export const NO_PRECEDENCE = -1;

/**
 * Precedences the language ships with.
 */
export const DEFAULT_PRECEDENCE: ReadonlyArray<readonly [string, number]> = [
  ["<", 10],
  ["+", 20],
  ["-", 20],
  ["*", 40],
];

/**
 * Raised when an operator or precedence is not acceptable.
 */
export class PrecedenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PrecedenceError";
  }
}

/**
 * Read-only view of a precedence table, as the parser sees it.
 */
export interface PrecedenceLookup {
  get(op: string): number;
}

/**
 * Mapping from a single operator character to its precedence. An absent
 * entry, or one that is zero or negative, means "not an infix operator".
 */
export class PrecedenceTable implements PrecedenceLookup {
  private table: Map<string, number>;

  constructor(entries: Iterable<readonly [string, number]> = []) {
    this.table = new Map();
    for (const [op, precedence] of entries) {
      this.set(op, precedence);
    }
  }

  /**
   * A table holding the default operators.
   */
  static withDefaults(): PrecedenceTable {
    return new PrecedenceTable(DEFAULT_PRECEDENCE);
  }

  set(op: string, precedence: number): this {
    if ([...op].length !== 1) {
      throw new PrecedenceError(`operator must be a single character, got '${op}'`);
    }
    // These never reach the parser as a character token
    if (/[A-Za-z0-9.#\s]/.test(op)) {
      throw new PrecedenceError(`'${op}' cannot be used as an operator`);
    }
    if (!Number.isInteger(precedence)) {
      throw new PrecedenceError(`precedence for '${op}' must be an integer, got ${precedence}`);
    }
    this.table.set(op, precedence);
    return this;
  }

  /**
   * Precedence of `op`, or NO_PRECEDENCE if it is not an operator.
   */
  get(op: string): number {
    const precedence = this.table.get(op);
    if (precedence === undefined || precedence <= 0) {
      return NO_PRECEDENCE;
    }
    return precedence;
  }

  has(op: string): boolean {
    return this.get(op) !== NO_PRECEDENCE;
  }

  delete(op: string): boolean {
    return this.table.delete(op);
  }

  /**
   * Operators in ascending order of precedence. Disabled entries are
   * left out.
   */
  entries(): Array<[string, number]> {
    return [...this.table.entries()]
      .filter(([, precedence]) => precedence > 0)
      .sort((a, b) => a[1] - b[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  }

  clone(): PrecedenceTable {
    return new PrecedenceTable(this.table);
  }
}

/**
 * Parse an `<op>=<precedence>` setting such as `^=50`.
 */
export function parsePrecedenceOption(option: string): [string, number] {
  const eq = option.lastIndexOf("=");
  if (eq <= 0) {
    throw new PrecedenceError(`expected <op>=<precedence>, got '${option}'`);
  }
  const op = option.slice(0, eq);
  const text = option.slice(eq + 1);
  if (!/^-?\d+$/.test(text)) {
    throw new PrecedenceError(`precedence for '${op}' must be an integer, got '${text}'`);
  }
  return [op, Number(text)];
}
