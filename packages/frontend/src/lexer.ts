/**
 * BSL lexer
 *
 * Keywords are case-insensitive and accepted in both Russian and English
 * spelling; the token carries the canonical English keyword in `text` and
 * the source spelling in `raw`. Line comments, preprocessor lines (`#...`)
 * and compilation directives (`&...`) are skipped.
 */

import {
  createDiagnostic,
  type Diagnostic,
} from "./types/diagnostic.js";
import { error, ok, type Result } from "./types/result.js";

export type Keyword =
  | "if"
  | "then"
  | "elsif"
  | "else"
  | "endif"
  | "for"
  | "each"
  | "in"
  | "to"
  | "do"
  | "enddo"
  | "while"
  | "procedure"
  | "endprocedure"
  | "function"
  | "endfunction"
  | "return"
  | "var"
  | "export"
  | "val"
  | "new"
  | "try"
  | "except"
  | "endtry"
  | "raise"
  | "break"
  | "continue"
  | "and"
  | "or"
  | "not"
  | "true"
  | "false"
  | "undefined"
  | "null";

export type TokenKind =
  | "identifier"
  | "keyword"
  | "number"
  | "string"
  | "date"
  | "punctuation"
  | "eof";

export type Token = {
  readonly kind: TokenKind;
  /** Canonical text: keyword name, punctuation, decoded string, number digits */
  readonly text: string;
  /** Text as written in the source */
  readonly raw: string;
  readonly line: number;
  readonly column: number;
};

const KEYWORDS: ReadonlyMap<string, Keyword> = new Map<string, Keyword>([
  ["если", "if"],
  ["if", "if"],
  ["тогда", "then"],
  ["then", "then"],
  ["иначеесли", "elsif"],
  ["elsif", "elsif"],
  ["иначе", "else"],
  ["else", "else"],
  ["конецесли", "endif"],
  ["endif", "endif"],
  ["для", "for"],
  ["for", "for"],
  ["каждого", "each"],
  ["each", "each"],
  ["из", "in"],
  ["in", "in"],
  ["по", "to"],
  ["to", "to"],
  ["цикл", "do"],
  ["do", "do"],
  ["конеццикла", "enddo"],
  ["enddo", "enddo"],
  ["пока", "while"],
  ["while", "while"],
  ["процедура", "procedure"],
  ["procedure", "procedure"],
  ["конецпроцедуры", "endprocedure"],
  ["endprocedure", "endprocedure"],
  ["функция", "function"],
  ["function", "function"],
  ["конецфункции", "endfunction"],
  ["endfunction", "endfunction"],
  ["возврат", "return"],
  ["return", "return"],
  ["перем", "var"],
  ["var", "var"],
  ["экспорт", "export"],
  ["export", "export"],
  ["знач", "val"],
  ["val", "val"],
  ["новый", "new"],
  ["new", "new"],
  ["попытка", "try"],
  ["try", "try"],
  ["исключение", "except"],
  ["except", "except"],
  ["конецпопытки", "endtry"],
  ["endtry", "endtry"],
  ["вызватьисключение", "raise"],
  ["raise", "raise"],
  ["прервать", "break"],
  ["break", "break"],
  ["продолжить", "continue"],
  ["continue", "continue"],
  ["и", "and"],
  ["and", "and"],
  ["или", "or"],
  ["or", "or"],
  ["не", "not"],
  ["not", "not"],
  ["истина", "true"],
  ["true", "true"],
  ["ложь", "false"],
  ["false", "false"],
  ["неопределено", "undefined"],
  ["undefined", "undefined"],
  ["null", "null"],
]);

const TWO_CHAR_PUNCTUATION = new Set(["<>", "<=", ">="]);
const ONE_CHAR_PUNCTUATION = new Set([
  "+",
  "-",
  "*",
  "/",
  "%",
  "=",
  "<",
  ">",
  "(",
  ")",
  "[",
  "]",
  ",",
  ";",
  ".",
  "?",
]);

const IDENTIFIER_START = /[\p{L}_]/u;
const IDENTIFIER_PART = /[\p{L}\p{N}_]/u;
const DIGIT = /[0-9]/;

export const lookupKeyword = (word: string): Keyword | undefined =>
  KEYWORDS.get(word.toLowerCase());

/**
 * Split source text into tokens. The last token is always `eof`.
 */
export const tokenize = (
  source: string,
  file: string
): Result<readonly Token[], Diagnostic> => {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;
  let column = 1;

  const peek = (offset = 0): string => source.charAt(pos + offset);

  const advance = (): string => {
    const ch = source.charAt(pos);
    pos++;
    if (ch === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
    return ch;
  };

  const skipToEndOfLine = (): void => {
    while (pos < source.length && peek() !== "\n") {
      advance();
    }
  };

  const fail = (
    code: "BSL1001" | "BSL1002",
    message: string,
    atLine: number,
    atColumn: number
  ): Result<readonly Token[], Diagnostic> =>
    error(
      createDiagnostic(code, "error", message, {
        file,
        line: atLine,
        column: atColumn,
      })
    );

  let atLineStart = true;

  while (pos < source.length) {
    const ch = peek();

    if (ch === "\n") {
      advance();
      atLineStart = true;
      continue;
    }

    if (ch === " " || ch === "\t" || ch === "\r" || ch === "\uFEFF") {
      advance();
      continue;
    }

    if (ch === "/" && peek(1) === "/") {
      skipToEndOfLine();
      continue;
    }

    if (atLineStart && (ch === "#" || ch === "&")) {
      skipToEndOfLine();
      continue;
    }

    atLineStart = false;
    const startLine = line;
    const startColumn = column;

    if (IDENTIFIER_START.test(ch)) {
      let word = "";
      while (pos < source.length && IDENTIFIER_PART.test(peek())) {
        word += advance();
      }
      const keyword = lookupKeyword(word);
      tokens.push({
        kind: keyword ? "keyword" : "identifier",
        text: keyword ?? word,
        raw: word,
        line: startLine,
        column: startColumn,
      });
      continue;
    }

    if (DIGIT.test(ch)) {
      let digits = "";
      while (pos < source.length && DIGIT.test(peek())) {
        digits += advance();
      }
      if (peek() === "." && DIGIT.test(peek(1))) {
        digits += advance();
        while (pos < source.length && DIGIT.test(peek())) {
          digits += advance();
        }
      }
      tokens.push({
        kind: "number",
        text: digits,
        raw: digits,
        line: startLine,
        column: startColumn,
      });
      continue;
    }

    if (ch === '"') {
      advance();
      let value = "";
      let raw = '"';
      let closed = false;
      while (pos < source.length) {
        const next = advance();
        raw += next;
        if (next === '"') {
          if (peek() === '"') {
            raw += advance();
            value += '"';
            continue;
          }
          closed = true;
          break;
        }
        if (next === "\n") {
          // Multi-line strings continue on a line starting with `|`
          while (peek() === " " || peek() === "\t" || peek() === "\r") {
            raw += advance();
          }
          if (peek() !== "|") {
            break;
          }
          raw += advance();
          value += "\n";
          continue;
        }
        value += next;
      }
      if (!closed) {
        return fail(
          "BSL1002",
          "Unterminated string literal",
          startLine,
          startColumn
        );
      }
      tokens.push({
        kind: "string",
        text: value,
        raw,
        line: startLine,
        column: startColumn,
      });
      continue;
    }

    if (ch === "'") {
      advance();
      let value = "";
      let closed = false;
      while (pos < source.length && peek() !== "\n") {
        const next = advance();
        if (next === "'") {
          closed = true;
          break;
        }
        value += next;
      }
      if (!closed) {
        return fail(
          "BSL1002",
          "Unterminated date literal",
          startLine,
          startColumn
        );
      }
      tokens.push({
        kind: "date",
        text: value,
        raw: `'${value}'`,
        line: startLine,
        column: startColumn,
      });
      continue;
    }

    const pair = ch + peek(1);
    if (TWO_CHAR_PUNCTUATION.has(pair)) {
      advance();
      advance();
      tokens.push({
        kind: "punctuation",
        text: pair,
        raw: pair,
        line: startLine,
        column: startColumn,
      });
      continue;
    }

    if (ONE_CHAR_PUNCTUATION.has(ch)) {
      advance();
      tokens.push({
        kind: "punctuation",
        text: ch,
        raw: ch,
        line: startLine,
        column: startColumn,
      });
      continue;
    }

    return fail(
      "BSL1001",
      `Unexpected character '${ch}'`,
      startLine,
      startColumn
    );
  }

  tokens.push({ kind: "eof", text: "", raw: "", line, column });
  return ok(tokens);
};
