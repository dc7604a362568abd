import { ResourceProgramError } from "./errors.js";
import type { ResourceMap, ResourceRecord } from "./resource.js";

// =============================================================================
// TYPES
// =============================================================================

type Scalar = string | number;

type ExprNode =
  | { kind: "ref"; resourceId: string; attribute: string }
  | { kind: "literal"; value: Scalar }
  | { kind: "tuple"; items: ExprNode[] }
  | { kind: "not"; operand: ExprNode }
  | { kind: "logical"; op: "and" | "or"; left: ExprNode; right: ExprNode }
  | { kind: "compare"; op: CompareOp; left: ExprNode; right: ExprNode };

type CompareOp = "==" | "!=" | "<" | "<=" | ">" | ">=" | "in" | "not in";

type Token =
  | { kind: "ident"; value: string }
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "op"; value: string }
  | { kind: "end" };

type Value = Scalar | boolean | Scalar[];

export type ProgramEvaluation =
  | { status: "satisfied" }
  | { status: "pending"; expression: ResourceExpression }
  | { status: "failed"; expression: ResourceExpression };

class RecordMismatch extends Error {}

// =============================================================================
// EXPRESSIONS
// =============================================================================

/**
 * One line of a `requires` program, for example `package.name == "fwupd"`.
 *
 * Every expression refers to exactly one resource job. It is evaluated once per
 * record of that resource and holds if any record satisfies it.
 */
export class ResourceExpression {
  readonly resourceId: string;
  private readonly root: ExprNode;

  constructor(readonly text: string) {
    this.root = new ExpressionParser(text).parse();

    const ids = new Set<string>();
    collectResourceIds(this.root, ids);
    if (ids.size === 0) {
      throw new ResourceProgramError(`expression does not reference any resources`, text);
    }
    if (ids.size > 1) {
      throw new ResourceProgramError(
        `expression references multiple resources: ${[...ids].sort().join(", ")}`,
        text,
      );
    }
    this.resourceId = [...ids][0];
  }

  evaluate(records: readonly ResourceRecord[]): boolean {
    return records.some((record) => {
      try {
        return truthy(evaluateNode(this.root, record));
      } catch (err) {
        if (err instanceof RecordMismatch) return false;
        throw err;
      }
    });
  }
}

export class ResourceProgram {
  readonly expressions: readonly ResourceExpression[];

  constructor(readonly text: string) {
    this.expressions = text
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith("#"))
      .map((line) => new ResourceExpression(line));
  }

  get requiredResources(): string[] {
    return [...new Set(this.expressions.map((expression) => expression.resourceId))].sort();
  }

  evaluate(resourceMap: ResourceMap): ProgramEvaluation {
    for (const expression of this.expressions) {
      if (!resourceMap.has(expression.resourceId)) {
        return { status: "pending", expression };
      }
    }

    for (const expression of this.expressions) {
      const records = resourceMap.get(expression.resourceId) ?? [];
      if (!expression.evaluate(records)) {
        return { status: "failed", expression };
      }
    }

    return { status: "satisfied" };
  }
}

// =============================================================================
// PARSER
// =============================================================================

const COMPARE_OPS: readonly CompareOp[] = ["==", "!=", "<", "<=", ">", ">="];

function isCompareOp(value: string): value is CompareOp {
  return COMPARE_OPS.some((op) => op === value);
}

class ExpressionParser {
  private readonly tokens: Token[];
  private position = 0;

  constructor(private readonly text: string) {
    this.tokens = tokenize(text);
  }

  parse(): ExprNode {
    const node = this.parseOr();
    const next = this.peek();
    if (next.kind !== "end") {
      throw this.error(`unexpected ${describeToken(next)}`);
    }
    return node;
  }

  private parseOr(): ExprNode {
    let left = this.parseAnd();
    while (this.acceptKeyword("or")) {
      left = { kind: "logical", op: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExprNode {
    let left = this.parseNot();
    while (this.acceptKeyword("and")) {
      left = { kind: "logical", op: "and", left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ExprNode {
    if (this.acceptKeyword("not")) {
      return { kind: "not", operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ExprNode {
    const left = this.parsePrimary();
    const token = this.peek();

    if (token.kind === "op" && isCompareOp(token.value)) {
      this.position += 1;
      return { kind: "compare", op: token.value, left, right: this.parsePrimary() };
    }
    if (this.acceptKeyword("in")) {
      return { kind: "compare", op: "in", left, right: this.parsePrimary() };
    }
    if (this.isKeyword(token, "not") && this.isKeyword(this.peek(1), "in")) {
      this.position += 2;
      return { kind: "compare", op: "not in", left, right: this.parsePrimary() };
    }
    return left;
  }

  private parsePrimary(): ExprNode {
    const token = this.next();
    switch (token.kind) {
      case "string":
      case "number":
        return { kind: "literal", value: token.value };
      case "ident":
        return this.parseReference(token.value);
      case "op":
        if (token.value === "(") return this.parseGroup();
        throw this.error(`unexpected ${describeToken(token)}`);
      case "end":
        throw this.error("unexpected end of expression");
    }
  }

  private parseReference(path: string): ExprNode {
    const dot = path.lastIndexOf(".");
    if (dot <= 0 || dot === path.length - 1) {
      throw this.error(`expected <resource>.<attribute>, got ${JSON.stringify(path)}`);
    }
    return { kind: "ref", resourceId: path.slice(0, dot), attribute: path.slice(dot + 1) };
  }

  private parseGroup(): ExprNode {
    const first = this.parseOr();
    if (this.acceptOp(")")) return first;

    const items = [first];
    while (this.acceptOp(",")) {
      if (this.acceptOp(")")) return { kind: "tuple", items };
      items.push(this.parseOr());
    }
    if (!this.acceptOp(")")) {
      throw this.error("expected ')'");
    }
    return { kind: "tuple", items };
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.position + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== "end") this.position += 1;
    return token;
  }

  private isKeyword(token: Token, keyword: string): boolean {
    return token.kind === "ident" && token.value === keyword;
  }

  private acceptKeyword(keyword: string): boolean {
    if (!this.isKeyword(this.peek(), keyword)) return false;
    this.position += 1;
    return true;
  }

  private acceptOp(op: string): boolean {
    const token = this.peek();
    if (token.kind !== "op" || token.value !== op) return false;
    this.position += 1;
    return true;
  }

  private error(message: string): ResourceProgramError {
    return new ResourceProgramError(`invalid requirement expression: ${message}`, this.text);
  }
}

const IDENT_PATTERN = /^[A-Za-z_][A-Za-z0-9_\-:]*(?:\.[A-Za-z_][A-Za-z0-9_\-:]*)*/;
const NUMBER_PATTERN = /^-?\d+(?:\.\d+)?/;
const OP_PATTERN = /^(?:==|!=|<=|>=|<|>|\(|\)|,)/;

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let rest = text;

  while (rest.length > 0) {
    const trimmed = rest.trimStart();
    if (trimmed.length === 0) break;
    rest = trimmed;

    const quote = rest[0];
    if (quote === '"' || quote === "'") {
      const { value, length } = readString(rest, quote, text);
      tokens.push({ kind: "string", value });
      rest = rest.slice(length);
      continue;
    }

    const number = NUMBER_PATTERN.exec(rest);
    if (number) {
      tokens.push({ kind: "number", value: Number(number[0]) });
      rest = rest.slice(number[0].length);
      continue;
    }

    const ident = IDENT_PATTERN.exec(rest);
    if (ident) {
      tokens.push({ kind: "ident", value: ident[0] });
      rest = rest.slice(ident[0].length);
      continue;
    }

    const op = OP_PATTERN.exec(rest);
    if (op) {
      tokens.push({ kind: "op", value: op[0] });
      rest = rest.slice(op[0].length);
      continue;
    }

    throw new ResourceProgramError(
      `invalid requirement expression: unexpected character ${JSON.stringify(rest[0])}`,
      text,
    );
  }

  tokens.push({ kind: "end" });
  return tokens;
}

function readString(input: string, quote: string, text: string): { value: string; length: number } {
  let value = "";
  for (let i = 1; i < input.length; i += 1) {
    const ch = input[i];
    if (ch === "\\" && i + 1 < input.length) {
      value += input[i + 1];
      i += 1;
      continue;
    }
    if (ch === quote) {
      return { value, length: i + 1 };
    }
    value += ch;
  }
  throw new ResourceProgramError("invalid requirement expression: unterminated string", text);
}

function describeToken(token: Token): string {
  switch (token.kind) {
    case "end":
      return "end of expression";
    case "string":
      return `string ${JSON.stringify(token.value)}`;
    default:
      return `${token.kind} ${JSON.stringify(token.value)}`;
  }
}

// =============================================================================
// EVALUATION
// =============================================================================

function collectResourceIds(node: ExprNode, ids: Set<string>): void {
  switch (node.kind) {
    case "ref":
      ids.add(node.resourceId);
      return;
    case "literal":
      return;
    case "tuple":
      node.items.forEach((item) => collectResourceIds(item, ids));
      return;
    case "not":
      collectResourceIds(node.operand, ids);
      return;
    case "logical":
    case "compare":
      collectResourceIds(node.left, ids);
      collectResourceIds(node.right, ids);
      return;
  }
}

function evaluateNode(node: ExprNode, record: ResourceRecord): Value {
  switch (node.kind) {
    case "ref": {
      const value = Object.hasOwn(record, node.attribute) ? record[node.attribute] : undefined;
      if (value === undefined) throw new RecordMismatch(node.attribute);
      return value;
    }
    case "literal":
      return node.value;
    case "tuple":
      return node.items.map((item) => toScalar(evaluateNode(item, record)));
    case "not":
      return !truthy(evaluateNode(node.operand, record));
    case "logical": {
      const left = truthy(evaluateNode(node.left, record));
      if (node.op === "and") return left && truthy(evaluateNode(node.right, record));
      return left || truthy(evaluateNode(node.right, record));
    }
    case "compare":
      return compare(node.op, evaluateNode(node.left, record), evaluateNode(node.right, record));
  }
}

function compare(op: CompareOp, left: Value, right: Value): boolean {
  switch (op) {
    case "==":
      return looseEquals(left, right);
    case "!=":
      return !looseEquals(left, right);
    case "in":
      return contains(right, left);
    case "not in":
      return !contains(right, left);
    case "<":
      return order(left, right) < 0;
    case "<=":
      return order(left, right) <= 0;
    case ">":
      return order(left, right) > 0;
    case ">=":
      return order(left, right) >= 0;
  }
}

// Resource values are strings; numeric literals compare against numeric strings.
function looseEquals(left: Value, right: Value): boolean {
  if (Array.isArray(left) || Array.isArray(right)) return false;
  if (typeof left === typeof right) return left === right;
  const a = asNumber(left);
  const b = asNumber(right);
  return a !== null && b !== null && a === b;
}

function contains(container: Value, item: Value): boolean {
  if (Array.isArray(container)) {
    return container.some((entry) => looseEquals(entry, item));
  }
  if (typeof container === "string" && typeof item === "string") {
    return container.includes(item);
  }
  return false;
}

function order(left: Value, right: Value): number {
  const a = asNumber(left);
  const b = asNumber(right);
  if (a !== null && b !== null) return a - b;
  if (typeof left === "string" && typeof right === "string") {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  throw new RecordMismatch("incomparable values");
}

function asNumber(value: Value): number | null {
  if (typeof value === "number") return value;
  if (typeof value === "string" && NUMBER_PATTERN.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toScalar(value: Value): Scalar {
  if (Array.isArray(value)) throw new RecordMismatch("nested tuple");
  if (typeof value === "boolean") return value ? 1 : 0;
  return value;
}

function truthy(value: Value): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "string") return value.length > 0;
  if (typeof value === "number") return value !== 0;
  return value;
}
