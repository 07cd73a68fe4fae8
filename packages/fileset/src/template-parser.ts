/**
 * Parser for the fileset template language.
 *
 * The syntax is the `{{ }}` action language filesets are authored in:
 *
 * - `{{.a.b}}` / `{{.}}` — field of / the current context
 * - `{{$}}`, `{{$.a}}`, `{{$x.a}}` — root context and range variables
 * - `{{if X}}…{{else if Y}}…{{else}}…{{end}}`
 * - `{{with X}}…{{else}}…{{end}}`
 * - `{{range X}}`, `{{range $v := X}}`, `{{range $i, $v := X}}` … `{{else}}` … `{{end}}`
 * - `{{/* comment *\/}}`, and `{{-` / `-}}` to trim adjacent whitespace
 *
 * Only single operands are supported inside an action; there are no
 * function calls or pipelines.
 */

import { TemplateError } from "@harvestkit/errors";

// ============================================================================
// AST
// ============================================================================

export type Operand =
  | { readonly type: "field"; readonly path: readonly string[] }
  | { readonly type: "variable"; readonly name: string; readonly path: readonly string[] }
  | { readonly type: "literal"; readonly value: string | number | boolean };

export type TemplateNode =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "output"; readonly operand: Operand }
  | {
      readonly type: "if" | "with";
      readonly operand: Operand;
      readonly body: readonly TemplateNode[];
      readonly elseBody: readonly TemplateNode[];
    }
  | {
      readonly type: "range";
      readonly operand: Operand;
      readonly keyVar: string | undefined;
      readonly valueVar: string | undefined;
      readonly body: readonly TemplateNode[];
      readonly elseBody: readonly TemplateNode[];
    };

export interface ParsedTemplate {
  readonly source: string;
  readonly nodes: readonly TemplateNode[];
}

// ============================================================================
// LEXER
// ============================================================================

type Item =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "action"; readonly tokens: readonly string[]; readonly offset: number };

const LEFT_DELIM = "{{";
const RIGHT_DELIM = "}}";
const COMMENT_OPEN = "/*";
const COMMENT_CLOSE = "*/";
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const NUMBER = /^-?\d+(\.\d+)?$/;

function isSpace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\r" || ch === "\n";
}

/**
 * Splits the source into text runs and action token lists, applying trim
 * markers and dropping comments.
 */
function lex(source: string): Item[] {
  const items: Item[] = [];
  let cursor = 0;
  let trimNextText = false;

  const pushText = (text: string, trimRight: boolean): void => {
    let value = trimNextText ? text.replace(/^\s+/, "") : text;
    if (trimRight) {
      value = value.replace(/\s+$/, "");
    }
    if (value.length > 0) {
      items.push({ kind: "text", text: value });
    }
  };

  while (cursor < source.length) {
    const open = source.indexOf(LEFT_DELIM, cursor);
    if (open === -1) {
      pushText(source.slice(cursor), false);
      break;
    }

    let bodyStart = open + LEFT_DELIM.length;
    const trimLeft = source[bodyStart] === "-" && isSpace(source[bodyStart + 1]);
    if (trimLeft) {
      bodyStart += 1;
    }
    pushText(source.slice(cursor, open), trimLeft);

    const commentStart = skipSpaces(source, bodyStart);
    if (source.startsWith(COMMENT_OPEN, commentStart)) {
      const end = closeComment(source, commentStart, open);
      trimNextText = end.trimRight;
      cursor = end.close + RIGHT_DELIM.length;
      continue;
    }

    const close = findActionEnd(source, bodyStart);
    if (close === -1) {
      throw new TemplateError(source, `unclosed action at offset ${open}`);
    }

    let bodyEnd = close;
    trimNextText = false;
    if (source[close - 1] === "-" && isSpace(source[close - 2])) {
      bodyEnd = close - 1;
      trimNextText = true;
    }

    const tokens = tokenize(source.slice(bodyStart, bodyEnd).trim(), source, open);
    if (tokens.length === 0) {
      throw new TemplateError(source, `missing value for command at offset ${open}`);
    }
    items.push({ kind: "action", tokens, offset: open });
    cursor = close + RIGHT_DELIM.length;
  }

  return items;
}

function skipSpaces(source: string, from: number): number {
  let i = from;
  while (isSpace(source[i])) {
    i++;
  }
  return i;
}

/**
 * Locates the `}}` that closes a comment opened at `from`. The comment
 * body is opaque: quotes and delimiters inside it are not interpreted.
 */
function closeComment(
  source: string,
  from: number,
  open: number,
): { readonly close: number; readonly trimRight: boolean } {
  const end = source.indexOf(COMMENT_CLOSE, from + COMMENT_OPEN.length);
  if (end === -1) {
    throw new TemplateError(source, `unclosed comment at offset ${open}`);
  }

  let close = end + COMMENT_CLOSE.length;
  let trimRight = false;
  if (isSpace(source[close]) && source.startsWith(`-${RIGHT_DELIM}`, skipSpaces(source, close))) {
    close = skipSpaces(source, close) + 1;
    trimRight = true;
  }
  if (!source.startsWith(RIGHT_DELIM, close)) {
    throw new TemplateError(source, `comment ends before closing delimiter at offset ${open}`);
  }
  return { close, trimRight };
}

/** Position of the closing delimiter, skipping over quoted strings. */
function findActionEnd(source: string, from: number): number {
  let quote: string | undefined;
  for (let i = from; i < source.length; i++) {
    const ch = source[i];
    if (quote !== undefined) {
      if (ch === "\\" && quote === '"') {
        i++;
      } else if (ch === quote) {
        quote = undefined;
      }
      continue;
    }
    if (ch === '"' || ch === "`") {
      quote = ch;
    } else if (source.startsWith(RIGHT_DELIM, i)) {
      return i;
    }
  }
  return -1;
}

/**
 * Breaks an action body into tokens: `:=`, `,`, quoted strings (kept with
 * their quotes) and bare words.
 */
function tokenize(body: string, source: string, offset: number): string[] {
  const tokens: string[] = [];
  let i = 0;
  while (i < body.length) {
    const ch = body[i];
    if (isSpace(ch)) {
      i++;
    } else if (body.startsWith(":=", i)) {
      tokens.push(":=");
      i += 2;
    } else if (ch === ",") {
      tokens.push(",");
      i++;
    } else if (ch === '"' || ch === "`") {
      let j = i + 1;
      while (j < body.length && body[j] !== ch) {
        j += body[j] === "\\" && ch === '"' ? 2 : 1;
      }
      if (j >= body.length) {
        throw new TemplateError(source, `unterminated quoted string at offset ${offset}`);
      }
      tokens.push(body.slice(i, j + 1));
      i = j + 1;
    } else {
      let j = i;
      while (j < body.length && !isSpace(body[j]) && body[j] !== "," && !body.startsWith(":=", j)) {
        j++;
      }
      tokens.push(body.slice(i, j));
      i = j;
    }
  }
  return tokens;
}

// ============================================================================
// PARSER
// ============================================================================

interface Terminator {
  readonly keyword: "end" | "else";
  readonly rest: readonly string[];
  readonly offset: number;
}

const UNSUPPORTED_KEYWORDS = new Set(["define", "template", "block", "break", "continue"]);

class Parser {
  private index = 0;

  constructor(
    private readonly items: readonly Item[],
    private readonly source: string,
  ) {}

  parse(): TemplateNode[] {
    const { nodes, terminator } = this.parseList();
    if (terminator !== undefined) {
      this.fail(`unexpected {{${terminator.keyword}}} at offset ${terminator.offset}`);
    }
    return nodes;
  }

  private parseList(): { nodes: TemplateNode[]; terminator: Terminator | undefined } {
    const nodes: TemplateNode[] = [];
    while (this.index < this.items.length) {
      const item = this.items[this.index++];
      if (item === undefined) {
        break;
      }
      if (item.kind === "text") {
        nodes.push({ type: "text", text: item.text });
        continue;
      }

      const [keyword, ...rest] = item.tokens;
      switch (keyword) {
        case "end":
        case "else":
          if (keyword === "end" && rest.length > 0) {
            this.fail(`unexpected "${rest[0]}" in end at offset ${item.offset}`);
          }
          return { nodes, terminator: { keyword, rest, offset: item.offset } };
        case "if":
        case "with":
          nodes.push(this.parseConditional(keyword, rest, item.offset));
          break;
        case "range":
          nodes.push(this.parseRange(rest, item.offset));
          break;
        default:
          if (keyword !== undefined && UNSUPPORTED_KEYWORDS.has(keyword)) {
            this.fail(`{{${keyword}}} is not supported (offset ${item.offset})`);
          }
          nodes.push({ type: "output", operand: this.parseOperand(item.tokens, item.offset) });
      }
    }
    return { nodes, terminator: undefined };
  }

  private parseConditional(
    type: "if" | "with",
    tokens: readonly string[],
    offset: number,
  ): TemplateNode {
    const operand = this.parseOperand(tokens, offset);
    const { nodes: body, terminator } = this.parseList();
    const elseBody = this.parseElse(type, terminator, offset);
    return { type, operand, body, elseBody };
  }

  private parseRange(tokens: readonly string[], offset: number): TemplateNode {
    let keyVar: string | undefined;
    let valueVar: string | undefined;
    let operandTokens = tokens;

    const declIndex = tokens.indexOf(":=");
    if (declIndex !== -1) {
      const decl = tokens.slice(0, declIndex);
      operandTokens = tokens.slice(declIndex + 1);
      if (decl.length === 1) {
        valueVar = this.parseVariableName(decl[0], offset);
      } else if (decl.length === 3 && decl[1] === ",") {
        keyVar = this.parseVariableName(decl[0], offset);
        valueVar = this.parseVariableName(decl[2], offset);
      } else {
        this.fail(`range can only initialize one or two variables (offset ${offset})`);
      }
    }

    const operand = this.parseOperand(operandTokens, offset);
    const { nodes: body, terminator } = this.parseList();
    const elseBody = this.parseElse("range", terminator, offset);
    return { type: "range", operand, keyVar, valueVar, body, elseBody };
  }

  /** Handles whatever closed a block body: `{{end}}`, `{{else}}` or `{{else if}}`. */
  private parseElse(
    blockType: "if" | "with" | "range",
    terminator: Terminator | undefined,
    offset: number,
  ): TemplateNode[] {
    if (terminator === undefined) {
      this.fail(`unexpected EOF: {{${blockType}}} at offset ${offset} has no matching {{end}}`);
    }
    if (terminator.keyword === "end") {
      return [];
    }

    const [chained, ...rest] = terminator.rest;
    if ((blockType === "if" || blockType === "with") && (chained === "if" || chained === "with")) {
      // `{{else if X}}` shares the enclosing block's {{end}}
      return [this.parseConditional(chained, rest, terminator.offset)];
    }
    if (chained !== undefined) {
      this.fail(`unexpected "${chained}" in else at offset ${terminator.offset}`);
    }

    const { nodes, terminator: closing } = this.parseList();
    if (closing === undefined) {
      this.fail(`unexpected EOF: {{${blockType}}} at offset ${offset} has no matching {{end}}`);
    }
    if (closing.keyword !== "end") {
      this.fail(`expected end; found {{else}} at offset ${closing.offset}`);
    }
    return nodes;
  }

  private parseVariableName(token: string | undefined, offset: number): string {
    if (token === undefined || !token.startsWith("$") || !IDENTIFIER.test(token.slice(1))) {
      this.fail(`bad variable name "${token ?? ""}" in range at offset ${offset}`);
    }
    return token.slice(1);
  }

  private parseOperand(tokens: readonly string[], offset: number): Operand {
    const [token, extra] = tokens;
    if (token === undefined) {
      this.fail(`missing value for command at offset ${offset}`);
    }
    if (extra !== undefined) {
      this.fail(`unexpected "${extra}" in operand at offset ${offset}`);
    }

    if (token === ".") {
      return { type: "field", path: [] };
    }
    if (token.startsWith(".")) {
      return { type: "field", path: this.parsePath(token.slice(1), offset) };
    }
    if (token.startsWith("$")) {
      const dot = token.indexOf(".");
      const name = dot === -1 ? token.slice(1) : token.slice(1, dot);
      if (name !== "" && !IDENTIFIER.test(name)) {
        this.fail(`bad variable name "${token}" at offset ${offset}`);
      }
      const path = dot === -1 ? [] : this.parsePath(token.slice(dot + 1), offset);
      return { type: "variable", name, path };
    }
    if (token === "true" || token === "false") {
      return { type: "literal", value: token === "true" };
    }
    if (NUMBER.test(token)) {
      return { type: "literal", value: Number(token) };
    }
    if (token.startsWith("`")) {
      return { type: "literal", value: token.slice(1, -1) };
    }
    if (token.startsWith('"')) {
      return { type: "literal", value: this.parseQuoted(token, offset) };
    }
    this.fail(`function "${token}" not defined (offset ${offset})`);
  }

  private parsePath(dotted: string, offset: number): string[] {
    const segments = dotted.split(".");
    for (const segment of segments) {
      if (!IDENTIFIER.test(segment)) {
        this.fail(`bad field name "${segment}" at offset ${offset}`);
      }
    }
    return segments;
  }

  private parseQuoted(token: string, offset: number): string {
    let value: unknown;
    try {
      value = JSON.parse(token);
    } catch {
      this.fail(`invalid quoted string ${token} at offset ${offset}`);
    }
    if (typeof value !== "string") {
      this.fail(`invalid quoted string ${token} at offset ${offset}`);
    }
    return value;
  }

  private fail(reason: string): never {
    throw new TemplateError(this.source, reason);
  }
}

/**
 * Parses template source into an AST.
 *
 * @throws {TemplateError} on malformed actions or unbalanced blocks
 */
export function parseTemplate(source: string): ParsedTemplate {
  return { source, nodes: new Parser(lex(source), source).parse() };
}
