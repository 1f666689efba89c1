/**
 * Recursive-descent parser for field type expressions
 *
 *   type    := tuple | array | named
 *   tuple   := "(" [ type { "," type } [ "," ] ] ")"
 *   array   := "[" type ";" integer "]"
 *   named   := identifier [ "<" type { "," type } ">" ]
 *
 * A parenthesized single type without a trailing comma is the type itself.
 */

import type { SourceLocation } from "#errors";
import type { TypeExpression } from "#descriptor";
import { Result } from "#result";

import { Error as ParseError } from "./errors.js";

interface Token {
  kind: "identifier" | "integer" | "punctuation" | "end";
  text: string;
  offset: number;
}

const PUNCTUATION = new Set(["<", ">", "(", ")", "[", "]", ",", ";"]);

/**
 * Parse a type expression. `base` shifts reported locations so they point
 * into the enclosing source text.
 */
export function parseTypeExpression(
  text: string,
  base: number = 0,
): Result<TypeExpression, ParseError> {
  try {
    const parser = new TypeExpressionParser(tokenize(text, base), base);
    return Result.ok(parser.parse());
  } catch (e) {
    if (e instanceof ParseError) {
      return Result.err(e);
    }
    throw e;
  }
}

function tokenize(text: string, base: number): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (PUNCTUATION.has(char)) {
      tokens.push({ kind: "punctuation", text: char, offset: base + i });
      i++;
      continue;
    }

    const identifier = /^[A-Za-z_][A-Za-z0-9_]*/.exec(text.slice(i));
    if (identifier) {
      tokens.push({
        kind: "identifier",
        text: identifier[0],
        offset: base + i,
      });
      i += identifier[0].length;
      continue;
    }

    const integer = /^(0x[0-9a-fA-F]+|[0-9]+)/.exec(text.slice(i));
    if (integer) {
      tokens.push({ kind: "integer", text: integer[0], offset: base + i });
      i += integer[0].length;
      continue;
    }

    throw new ParseError(`Unexpected character '${char}' in type`, {
      offset: base + i,
      length: 1,
    });
  }

  tokens.push({ kind: "end", text: "", offset: base + text.length });
  return tokens;
}

class TypeExpressionParser {
  private position = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly base: number,
  ) {}

  parse(): TypeExpression {
    if (this.peek().kind === "end") {
      throw new ParseError("Expected a type", this.locate(this.peek()), [
        "type",
      ]);
    }

    const expression = this.type();
    const rest = this.peek();
    if (rest.kind !== "end") {
      throw new ParseError(
        `Unexpected '${rest.text}' after type`,
        this.locate(rest),
        ["end of type"],
      );
    }
    return expression;
  }

  private type(): TypeExpression {
    const token = this.peek();

    if (token.text === "(") {
      return this.tuple();
    }
    if (token.text === "[") {
      return this.array();
    }
    if (token.kind === "identifier") {
      return this.named();
    }

    throw new ParseError(
      token.kind === "end"
        ? "Unexpected end of type"
        : `Unexpected '${token.text}' in type`,
      this.locate(token),
      ["identifier", "(", "["],
    );
  }

  private tuple(): TypeExpression {
    this.expect("(");
    const elements: TypeExpression[] = [];
    let trailingComma = false;

    while (this.peek().text !== ")") {
      elements.push(this.type());
      trailingComma = false;
      if (this.peek().text === ",") {
        this.advance();
        trailingComma = true;
      } else {
        break;
      }
    }
    this.expect(")");

    if (elements.length === 1 && !trailingComma) {
      return elements[0];
    }
    return { kind: "tuple", elements };
  }

  private array(): TypeExpression {
    this.expect("[");
    const element = this.type();
    this.expect(";");

    const sizeToken = this.advance();
    if (sizeToken.kind !== "integer") {
      throw new ParseError(
        "Expected array length",
        this.locate(sizeToken),
        ["integer"],
      );
    }
    this.expect("]");

    return { kind: "array", element, size: Number(sizeToken.text) };
  }

  private named(): TypeExpression {
    const name = this.advance().text;

    if (this.peek().text !== "<") {
      return { kind: "named", name };
    }

    this.advance();
    const args: TypeExpression[] = [this.type()];
    while (this.peek().text === ",") {
      this.advance();
      args.push(this.type());
    }
    this.expect(">");

    return { kind: "generic", name, args };
  }

  private expect(text: string): Token {
    const token = this.advance();
    if (token.text !== text || token.kind === "end") {
      throw new ParseError(
        token.kind === "end"
          ? `Expected '${text}' but the type ended`
          : `Expected '${text}' but found '${token.text}'`,
        this.locate(token),
        [text],
      );
    }
    return token;
  }

  private peek(): Token {
    return this.tokens[this.position];
  }

  private advance(): Token {
    const token = this.tokens[this.position];
    if (token.kind !== "end") {
      this.position++;
    }
    return token;
  }

  private locate(token: Token): SourceLocation {
    return {
      offset: Math.max(token.offset, this.base),
      length: Math.max(token.text.length, 1),
    };
  }
}
