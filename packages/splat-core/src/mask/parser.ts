// ─── Mask Expression Parser ─────────────────────────────────────────────────
// Grammar, lowest to highest precedence:
//
//   union        := intersection ("|" intersection)*
//   intersection := difference ("&" difference)*
//   difference   := symdiff ("-" symdiff)*
//   symdiff      := factor ("^" factor)*
//   factor       := "!" factor | "(" union ")" | integer
//
// Binary operators fold to the left. Whitespace is allowed between tokens.

import { MaskParseError } from "../errors";
import type { BinaryMaskType, MaskOp } from "./types";

const BINARY_LEVELS: [string, BinaryMaskType][] = [
  ["|", "union"],
  ["&", "intersection"],
  ["-", "difference"],
  ["^", "symmetric-difference"],
];

/**
 * Parse mask expression text. Returns null for empty or whitespace-only
 * input, meaning "no restriction".
 *
 * @throws MaskParseError when the text is not a complete expression.
 */
export function parseMaskOp(input: string): MaskOp | null {
  if (input.trim() === "") return null;
  return new MaskOpParser(input).parse();
}

class MaskOpParser {
  private pos = 0;

  constructor(private readonly input: string) {}

  parse(): MaskOp {
    const op = this.parseLevel(0);
    this.skipWhitespace();
    if (this.pos < this.input.length) {
      throw this.unexpected();
    }
    return op;
  }

  private parseLevel(level: number): MaskOp {
    if (level === BINARY_LEVELS.length) return this.parseFactor();

    const [operator, type] = BINARY_LEVELS[level];
    let left = this.parseLevel(level + 1);

    for (;;) {
      this.skipWhitespace();
      if (this.peek() !== operator) return left;
      this.pos++;
      const right = this.parseLevel(level + 1);
      left = { type, left, right };
    }
  }

  private parseFactor(): MaskOp {
    this.skipWhitespace();
    const ch = this.peek();

    if (ch === undefined) {
      throw new MaskParseError(
        "expected a shape index, '(' or '!' but reached end of input",
        this.pos,
      );
    }

    if (ch === "!") {
      this.pos++;
      return { type: "complement", operand: this.parseFactor() };
    }

    if (ch === "(") {
      const open = this.pos;
      this.pos++;
      const inner = this.parseLevel(0);
      this.skipWhitespace();
      if (this.peek() !== ")") {
        throw new MaskParseError(
          `expected ')' to close '(' at offset ${open}`,
          this.pos,
        );
      }
      this.pos++;
      return inner;
    }

    if (isDigit(ch)) return this.parseShape();

    throw this.unexpected();
  }

  private parseShape(): MaskOp {
    const start = this.pos;
    while (this.pos < this.input.length && isDigit(this.input[this.pos])) {
      this.pos++;
    }

    const digits = this.input.slice(start, this.pos);
    const index = Number(digits);
    if (!Number.isSafeInteger(index)) {
      throw new MaskParseError(`shape index ${digits} is too large`, start);
    }

    return { type: "shape", index };
  }

  private unexpected(): MaskParseError {
    return new MaskParseError(
      `unexpected character '${this.input[this.pos]}'`,
      this.pos,
    );
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
      this.pos++;
    }
  }

  private peek(): string | undefined {
    return this.input[this.pos];
  }
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}
