/**
 * AST node types for the Kaleido parser.
 */

import type { Position } from "../token/token.js";

/**
 * Base interface for all AST nodes.
 */
export interface Node {
  /** Start position in source */
  pos(): Position;
  /** String representation */
  toString(): string;
}

// ============================================================================
// Expressions
// ============================================================================

/**
 * Numeric literal, like "1.0".
 */
export class NumberExpr implements Node {
  readonly kind = "number";

  constructor(
    public readonly position: Position,
    public readonly value: number
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return String(this.value);
  }
}

/**
 * Reference to a variable, like "a".
 */
export class VariableExpr implements Node {
  readonly kind = "variable";

  constructor(
    public readonly position: Position,
    public readonly name: string
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return this.name;
  }
}

/**
 * Binary operator expression.
 */
export class BinaryExpr implements Node {
  readonly kind = "binary";

  constructor(
    public readonly opPos: Position,
    public readonly op: string,
    public readonly left: Expr,
    public readonly right: Expr
  ) {}

  pos(): Position {
    return this.left.pos();
  }
  toString(): string {
    return `(${this.left.toString()} ${this.op} ${this.right.toString()})`;
  }
}

/**
 * Function call.
 */
export class CallExpr implements Node {
  readonly kind = "call";

  constructor(
    public readonly position: Position,
    public readonly callee: string,
    public readonly args: readonly Expr[]
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return `${this.callee}(${this.args.map((a) => a.toString()).join(", ")})`;
  }
}

/**
 * Any expression.
 */
export type Expr = NumberExpr | VariableExpr | BinaryExpr | CallExpr;

// ============================================================================
// Functions
// ============================================================================

/**
 * The "prototype" for a function: its name and parameter names, and so
 * implicitly the number of arguments it takes.
 */
export class Prototype implements Node {
  readonly kind = "prototype";

  constructor(
    public readonly position: Position,
    public readonly name: string,
    public readonly params: readonly string[]
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return `${this.name}(${this.params.join(" ")})`;
  }
}

/**
 * A function definition: prototype plus body.
 */
export class FunctionDef implements Node {
  readonly kind = "function";

  constructor(
    public readonly proto: Prototype,
    public readonly body: Expr
  ) {}

  pos(): Position {
    return this.proto.pos();
  }
  toString(): string {
    if (isAnonymous(this.proto)) {
      return this.body.toString();
    }
    return `def ${this.proto.toString()} ${this.body.toString()}`;
  }
}

/**
 * Any node the parser produces.
 */
export type AnyNode = Expr | Prototype | FunctionDef;

/**
 * Whether the prototype is the nameless one a top-level expression is
 * wrapped in.
 */
export function isAnonymous(proto: Prototype): boolean {
  return proto.name === "" && proto.params.length === 0;
}

/**
 * Render a node as an S-expression.
 *
 *   dump(a+b*c)  =>  (+ a (* b c))
 */
export function dump(node: AnyNode): string {
  switch (node.kind) {
    case "number":
      return String(node.value);
    case "variable":
      return node.name;
    case "binary":
      return `(${node.op} ${dump(node.left)} ${dump(node.right)})`;
    case "call":
      return node.args.length === 0
        ? `(call ${node.callee})`
        : `(call ${node.callee} ${node.args.map(dump).join(" ")})`;
    case "prototype":
      return `(proto ${node.name === "" ? '""' : node.name} (${node.params.join(" ")}))`;
    case "function":
      return `(def ${dump(node.proto)} ${dump(node.body)})`;
  }
}
