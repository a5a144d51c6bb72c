/**
 * G-Code Lexer
 *
 * Splits one line of G-code into tokens. Letters are case-insensitive and may
 * be separated from their number by whitespace, as GRBL strips all spaces
 * before parsing a block.
 */

import { Token, TokenType } from "@grbl-node/types";
import { GCodeSyntaxError } from "./errors";

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)/;
const INTEGER_PATTERN = /^\d+/;
const LETTER_PATTERN = /^[A-Z]$/;
const WHITESPACE_PATTERN = /\s/;

/**
 * Tokenizes a single line of G-code.
 *
 * @param text - One line, without its line terminator
 * @returns Tokens in source order. Empty and comment-free blank lines yield `[]`.
 * @throws GCodeSyntaxError naming the 1-based column of the offending character
 *
 * @example
 * ```typescript
 * tokenizeLine("N10 G1 X10.5 (cut) F500");
 * // LINE_NUMBER 10, COMMAND G1, PARAMETER X 10.5, COMMENT "cut", PARAMETER F 500
 * ```
 */
export function tokenizeLine(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    const column = i + 1;

    // '%' delimits a program on some senders; it carries no meaning for GRBL
    if (WHITESPACE_PATTERN.test(ch) || ch === "%") {
      i++;
      continue;
    }

    if (ch === "(") {
      const close = text.indexOf(")", i + 1);
      if (close === -1) {
        throw new GCodeSyntaxError(
          `Unterminated comment starting at column ${column}`,
          column
        );
      }
      tokens.push({
        type: TokenType.COMMENT,
        text: text.slice(i + 1, close).trim(),
        column,
      });
      i = close + 1;
      continue;
    }

    if (ch === ";") {
      tokens.push({
        type: TokenType.COMMENT,
        text: text.slice(i + 1).trim(),
        column,
      });
      break;
    }

    if (ch === "*") {
      const digits = INTEGER_PATTERN.exec(text.slice(i + 1));
      if (!digits) {
        throw new GCodeSyntaxError(
          `Expected checksum digits after '*' at column ${column}`,
          column + 1
        );
      }
      tokens.push({
        type: TokenType.CHECKSUM,
        value: Number(digits[0]),
        column,
      });
      i += 1 + digits[0].length;
      continue;
    }

    const letter = ch.toUpperCase();
    if (!LETTER_PATTERN.test(letter)) {
      throw new GCodeSyntaxError(
        `Unexpected character '${ch}' at column ${column}`,
        column
      );
    }

    let numberStart = i + 1;
    while (
      numberStart < text.length &&
      (text[numberStart] === " " || text[numberStart] === "\t")
    ) {
      numberStart++;
    }
    const match = NUMBER_PATTERN.exec(text.slice(numberStart));
    if (!match) {
      throw new GCodeSyntaxError(
        `Expected a number after '${letter}' at column ${numberStart + 1}`,
        numberStart + 1
      );
    }

    tokens.push(wordToken(letter, match[0], column));
    i = numberStart + match[0].length;
  }

  return tokens;
}

function wordToken(letter: string, literal: string, column: number): Token {
  const value = Number(literal);

  if (letter === "G" || letter === "M") {
    if (value < 0) {
      throw new GCodeSyntaxError(
        `Negative ${letter} code at column ${column}`,
        column
      );
    }
    return {
      type: TokenType.COMMAND,
      letter: letter === "G" ? "G" : "M",
      code: value,
      column,
    };
  }

  if (letter === "T" || letter === "N") {
    if (value < 0 || !Number.isInteger(value)) {
      throw new GCodeSyntaxError(
        `${letter} word must be a non-negative integer at column ${column}`,
        column
      );
    }
    return letter === "T"
      ? { type: TokenType.COMMAND, letter: "T", code: value, column }
      : { type: TokenType.LINE_NUMBER, value, column };
  }

  return { type: TokenType.PARAMETER, letter, value, column };
}
