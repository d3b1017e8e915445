import { InvalidTextSearchError } from "./errors.js";
import { analyze, tokenize } from "./text.js";
import type { IndexField, TermTarget, TextQuery } from "./types.js";

type Token =
  | { type: "lparen" }
  | { type: "rparen" }
  | { type: "colon" }
  | { type: "and" }
  | { type: "or" }
  | { type: "not" }
  | { type: "word"; value: string }
  | { type: "phrase"; value: string };

type Analyzer = "analyzed" | "exact" | "keyword";

interface FieldContext {
  target: TermTarget;
  analyzer: Analyzer;
}

const KEYWORD_FIELDS: readonly IndexField[] = [
  "id",
  "status",
  "predicted",
  "predicted_as",
  "predicted_by",
  "annotated_as",
  "annotated_by"
];

const DEFAULT_FIELD: FieldContext = {
  target: { kind: "field", field: "text" },
  analyzer: "analyzed"
};

const WORD_BREAKS = new Set([" ", "\t", "\n", "\r", "(", ")", ":", '"']);

class ParseFailure extends Error {}

/**
 * Parses the free-text search syntax: terms, "phrases", `field: value`,
 * trailing `*` prefixes, AND/&&, OR/||, NOT/!, and parentheses. Adjacent
 * clauses are combined with AND.
 */
export function parseTextQuery(raw: string): TextQuery {
  try {
    return new Parser(lex(raw)).parse();
  } catch (err) {
    if (err instanceof ParseFailure) {
      throw new InvalidTextSearchError(raw);
    }
    throw err;
  }
}

function lex(raw: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < raw.length) {
    const char = raw[index];
    if (char === " " || char === "\t" || char === "\n" || char === "\r") {
      index += 1;
    } else if (char === "(") {
      tokens.push({ type: "lparen" });
      index += 1;
    } else if (char === ")") {
      tokens.push({ type: "rparen" });
      index += 1;
    } else if (char === ":") {
      tokens.push({ type: "colon" });
      index += 1;
    } else if (char === "!") {
      tokens.push({ type: "not" });
      index += 1;
    } else if (raw.startsWith("&&", index)) {
      tokens.push({ type: "and" });
      index += 2;
    } else if (raw.startsWith("||", index)) {
      tokens.push({ type: "or" });
      index += 2;
    } else if (char === '"') {
      const end = raw.indexOf('"', index + 1);
      if (end < 0) {
        throw new ParseFailure("unterminated phrase");
      }
      tokens.push({ type: "phrase", value: raw.slice(index + 1, end) });
      index = end + 1;
    } else {
      let end = index;
      while (end < raw.length && !WORD_BREAKS.has(raw[end])) {
        end += 1;
      }
      const value = raw.slice(index, end);
      if (value === "AND") tokens.push({ type: "and" });
      else if (value === "OR") tokens.push({ type: "or" });
      else if (value === "NOT") tokens.push({ type: "not" });
      else tokens.push({ type: "word", value });
      index = end;
    }
  }

  return tokens;
}

class Parser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): TextQuery {
    if (this.tokens.length === 0) {
      throw new ParseFailure("empty query");
    }
    const query = this.parseOr(DEFAULT_FIELD);
    if (this.peek()) {
      throw new ParseFailure("unexpected token");
    }
    return query;
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private next(): Token {
    const token = this.tokens[this.position];
    if (!token) {
      throw new ParseFailure("unexpected end of query");
    }
    this.position += 1;
    return token;
  }

  private parseOr(context: FieldContext): TextQuery {
    const clauses = [this.parseAnd(context)];
    while (this.peek()?.type === "or") {
      this.next();
      clauses.push(this.parseAnd(context));
    }
    return clauses.length === 1 ? clauses[0] : { kind: "or", clauses };
  }

  private parseAnd(context: FieldContext): TextQuery {
    const clauses = [this.parseUnary(context)];
    for (;;) {
      const token = this.peek();
      if (token?.type === "and") {
        this.next();
        clauses.push(this.parseUnary(context));
      } else if (token && startsClause(token)) {
        clauses.push(this.parseUnary(context));
      } else {
        break;
      }
    }
    return clauses.length === 1 ? clauses[0] : { kind: "and", clauses };
  }

  private parseUnary(context: FieldContext): TextQuery {
    if (this.peek()?.type === "not") {
      this.next();
      return { kind: "not", clause: this.parseUnary(context) };
    }
    return this.parsePrimary(context);
  }

  private parsePrimary(context: FieldContext): TextQuery {
    const token = this.next();
    switch (token.type) {
      case "lparen": {
        const inner = this.parseOr(context);
        if (this.next().type !== "rparen") {
          throw new ParseFailure("expected closing parenthesis");
        }
        return inner;
      }
      case "word": {
        if (this.peek()?.type === "colon") {
          this.next();
          return this.parseFieldValue(resolveField(token.value));
        }
        return termQuery(context, token.value, false);
      }
      case "phrase":
        return termQuery(context, token.value, true);
      default:
        throw new ParseFailure("unexpected token");
    }
  }

  private parseFieldValue(context: FieldContext): TextQuery {
    const token = this.next();
    switch (token.type) {
      case "word":
        return termQuery(context, token.value, false);
      case "phrase":
        return termQuery(context, token.value, true);
      case "lparen": {
        const inner = this.parseOr(context);
        if (this.next().type !== "rparen") {
          throw new ParseFailure("expected closing parenthesis");
        }
        return inner;
      }
      default:
        throw new ParseFailure("field without value");
    }
  }
}

function startsClause(token: Token): boolean {
  return (
    token.type === "word" ||
    token.type === "phrase" ||
    token.type === "lparen" ||
    token.type === "not"
  );
}

function resolveField(name: string): FieldContext {
  if (name === "text") return DEFAULT_FIELD;
  if (name === "text.exact") {
    return { target: { kind: "field", field: "text_exact" }, analyzer: "exact" };
  }
  if (name === "words") {
    return { target: { kind: "field", field: "words" }, analyzer: "analyzed" };
  }
  const keyword = KEYWORD_FIELDS.find((field) => field === name);
  if (keyword) {
    return { target: { kind: "field", field: keyword }, analyzer: "keyword" };
  }
  if (name.startsWith("metadata.")) {
    const key = name.slice("metadata.".length);
    if (!key) throw new ParseFailure("missing metadata key");
    return { target: { kind: "metadata", key }, analyzer: "keyword" };
  }

  const input = name.startsWith("inputs.") ? name.slice("inputs.".length) : name;
  const exact = input.endsWith(".exact");
  const inputName = exact ? input.slice(0, -".exact".length) : input;
  if (!inputName) throw new ParseFailure("missing input name");
  return {
    target: { kind: "input", name: inputName, exact },
    analyzer: exact ? "exact" : "analyzed"
  };
}

function termQuery(context: FieldContext, value: string, phrase: boolean): TextQuery {
  const prefix = !phrase && value.endsWith("*");
  const text = prefix ? value.slice(0, -1) : value;

  if (context.analyzer === "keyword") {
    if (!text && !prefix) throw new ParseFailure("empty value");
    return { kind: "term", target: context.target, value: text, prefix };
  }

  const terms = context.analyzer === "analyzed" ? analyze(text) : tokenize(text);
  if (terms.length === 0) {
    if (prefix && !text) {
      return { kind: "term", target: context.target, value: "", prefix: true };
    }
    throw new ParseFailure("no searchable terms");
  }

  const clauses: TextQuery[] = terms.map((term, index) => ({
    kind: "term",
    target: context.target,
    value: term,
    prefix: prefix && index === terms.length - 1
  }));
  return clauses.length === 1 ? clauses[0] : { kind: "and", clauses };
}
