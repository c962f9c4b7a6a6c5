/**
 * Recursive-descent parser producing the BSL syntax tree
 */

import type {
  BinaryOperator,
  Expression,
  NodePosition,
} from "./ast/expressions.js";
import type {
  ElseIfBranch,
  Parameter,
  Program,
  Statement,
} from "./ast/statements.js";
import { tokenize, type Keyword, type Token } from "./lexer.js";
import {
  createDiagnostic,
  type Diagnostic,
  type DiagnosticCode,
} from "./types/diagnostic.js";
import { error, flatMap, ok, type Result } from "./types/result.js";

class ParseFailure extends Error {
  constructor(readonly diagnostic: Diagnostic) {
    super(diagnostic.message);
  }
}

const COMPARISON_OPERATORS: ReadonlyMap<string, BinaryOperator> = new Map<
  string,
  BinaryOperator
>([
  ["=", "="],
  ["<>", "<>"],
  ["<", "<"],
  ["<=", "<="],
  [">", ">"],
  [">=", ">="],
]);

class Parser {
  private index = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly file: string
  ) {}

  parseProgram(): Program {
    const statements = this.parseBlock([]);
    if (!this.isEof()) {
      this.fail("BSL1003", `Unexpected '${this.current().raw}'`);
    }
    return { kind: "program", statements };
  }

  // ─── token helpers ───────────────────────────────────────────────

  private current(): Token {
    const token = this.tokens[this.index] ?? this.tokens[this.tokens.length - 1];
    if (!token) {
      this.fail("BSL1003", "Empty token stream");
    }
    return token;
  }

  private isEof(): boolean {
    return this.current().kind === "eof";
  }

  private advance(): Token {
    const token = this.current();
    if (token.kind !== "eof") {
      this.index++;
    }
    return token;
  }

  private isKeyword(...keywords: readonly Keyword[]): boolean {
    const token = this.current();
    return (
      token.kind === "keyword" &&
      keywords.some((keyword) => keyword === token.text)
    );
  }

  private isPunctuation(text: string): boolean {
    const token = this.current();
    return token.kind === "punctuation" && token.text === text;
  }

  private matchKeyword(keyword: Keyword): boolean {
    if (this.isKeyword(keyword)) {
      this.advance();
      return true;
    }
    return false;
  }

  private matchPunctuation(text: string): boolean {
    if (this.isPunctuation(text)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expectKeyword(keyword: Keyword, spelling: string): Token {
    if (!this.isKeyword(keyword)) {
      this.fail(
        this.isEof() ? "BSL1004" : "BSL1003",
        `Expected '${spelling}' but found ${this.describeCurrent()}`
      );
    }
    return this.advance();
  }

  private expectPunctuation(text: string): Token {
    if (!this.isPunctuation(text)) {
      this.fail(
        "BSL1003",
        `Expected '${text}' but found ${this.describeCurrent()}`
      );
    }
    return this.advance();
  }

  private expectIdentifier(what: string): Token {
    const token = this.current();
    if (token.kind !== "identifier") {
      this.fail(
        "BSL1003",
        `Expected ${what} but found ${this.describeCurrent()}`
      );
    }
    return this.advance();
  }

  private skipSemicolons(): void {
    while (this.matchPunctuation(";")) {
      // consume
    }
  }

  private describeCurrent(): string {
    const token = this.current();
    return token.kind === "eof" ? "end of file" : `'${token.raw}'`;
  }

  private position(token: Token): NodePosition {
    return { line: token.line, column: token.column };
  }

  private fail(code: DiagnosticCode, message: string): never {
    const token = this.tokens[this.index] ?? this.tokens[this.tokens.length - 1];
    throw new ParseFailure(
      createDiagnostic(code, "error", message, {
        file: this.file,
        line: token?.line ?? 1,
        column: token?.column ?? 1,
      })
    );
  }

  // ─── statements ──────────────────────────────────────────────────

  /**
   * Parse statements until one of the terminating keywords (or EOF)
   */
  private parseBlock(terminators: readonly Keyword[]): readonly Statement[] {
    const statements: Statement[] = [];
    this.skipSemicolons();
    while (!this.isEof() && !this.isKeyword(...terminators)) {
      statements.push(...this.parseStatement());
      this.skipSemicolons();
    }
    return statements;
  }

  private parseStatement(): readonly Statement[] {
    const token = this.current();

    if (token.kind === "keyword") {
      switch (token.text) {
        case "var":
          return this.parseVarDeclarations();
        case "procedure":
        case "function":
          return [this.parseRoutine()];
        case "if":
          return [this.parseIf()];
        case "for":
          return [this.parseFor()];
        case "while":
          return [this.parseWhile()];
        case "return":
          return [this.parseReturn()];
        case "break":
          this.advance();
          return [{ kind: "breakStatement", location: this.position(token) }];
        case "continue":
          this.advance();
          return [
            { kind: "continueStatement", location: this.position(token) },
          ];
        case "try":
          return [this.parseTry()];
        case "raise":
          return [this.parseRaise()];
      }
    }

    return [this.parseExpressionStatement()];
  }

  private parseVarDeclarations(): readonly Statement[] {
    this.advance();
    const declarations: Statement[] = [];
    do {
      const nameToken = this.expectIdentifier("variable name");
      const value = this.matchPunctuation("=")
        ? this.parseExpression()
        : undefined;
      const exported = this.matchKeyword("export");
      declarations.push({
        kind: "varDeclaration",
        name: nameToken.text,
        exported,
        value,
        location: this.position(nameToken),
      });
    } while (this.matchPunctuation(","));
    return declarations;
  }

  private parseRoutine(): Statement {
    const keywordToken = this.advance();
    const isFunction = keywordToken.text === "function";
    const nameToken = this.expectIdentifier(
      isFunction ? "function name" : "procedure name"
    );
    const params = this.parseParameters();
    const exported = this.matchKeyword("export");

    if (isFunction) {
      const body = this.parseBlock(["endfunction"]);
      this.expectKeyword("endfunction", "КонецФункции");
      return {
        kind: "functionDeclaration",
        name: nameToken.text,
        params,
        body,
        exported,
        location: this.position(keywordToken),
      };
    }

    const body = this.parseBlock(["endprocedure"]);
    this.expectKeyword("endprocedure", "КонецПроцедуры");
    return {
      kind: "procedureDeclaration",
      name: nameToken.text,
      params,
      body,
      exported,
      location: this.position(keywordToken),
    };
  }

  private parseParameters(): readonly Parameter[] {
    this.expectPunctuation("(");
    const params: Parameter[] = [];
    if (this.matchPunctuation(")")) {
      return params;
    }
    do {
      const byValue = this.matchKeyword("val");
      const nameToken = this.expectIdentifier("parameter name");
      const defaultValue = this.matchPunctuation("=")
        ? this.parseUnary()
        : undefined;
      params.push({ name: nameToken.text, byValue, defaultValue });
    } while (this.matchPunctuation(","));
    this.expectPunctuation(")");
    return params;
  }

  private parseIf(): Statement {
    const ifToken = this.advance();
    const condition = this.parseExpression();
    this.expectKeyword("then", "Тогда");
    const thenBranch = this.parseBlock(["elsif", "else", "endif"]);

    const elseIfBranches: ElseIfBranch[] = [];
    while (this.matchKeyword("elsif")) {
      const branchCondition = this.parseExpression();
      this.expectKeyword("then", "Тогда");
      const body = this.parseBlock(["elsif", "else", "endif"]);
      elseIfBranches.push({ condition: branchCondition, body });
    }

    const elseBranch = this.matchKeyword("else")
      ? this.parseBlock(["endif"])
      : undefined;
    this.expectKeyword("endif", "КонецЕсли");

    return {
      kind: "ifStatement",
      condition,
      thenBranch,
      elseIfBranches,
      elseBranch,
      location: this.position(ifToken),
    };
  }

  private parseFor(): Statement {
    const forToken = this.advance();

    if (this.matchKeyword("each")) {
      const variable = this.expectIdentifier("loop variable");
      this.expectKeyword("in", "Из");
      const collection = this.parseExpression();
      this.expectKeyword("do", "Цикл");
      const body = this.parseBlock(["enddo"]);
      this.expectKeyword("enddo", "КонецЦикла");
      return {
        kind: "forEachStatement",
        variable: variable.text,
        collection,
        body,
        location: this.position(forToken),
      };
    }

    const variable = this.expectIdentifier("loop variable");
    this.expectPunctuation("=");
    const from = this.parseExpression();
    this.expectKeyword("to", "По");
    const to = this.parseExpression();
    this.expectKeyword("do", "Цикл");
    const body = this.parseBlock(["enddo"]);
    this.expectKeyword("enddo", "КонецЦикла");
    return {
      kind: "forStatement",
      variable: variable.text,
      from,
      to,
      body,
      location: this.position(forToken),
    };
  }

  private parseWhile(): Statement {
    const whileToken = this.advance();
    const condition = this.parseExpression();
    this.expectKeyword("do", "Цикл");
    const body = this.parseBlock(["enddo"]);
    this.expectKeyword("enddo", "КонецЦикла");
    return {
      kind: "whileStatement",
      condition,
      body,
      location: this.position(whileToken),
    };
  }

  private startsExpression(): boolean {
    if (this.isEof() || this.isPunctuation(";")) {
      return false;
    }
    const token = this.current();
    if (token.kind !== "keyword") {
      return true;
    }
    return this.isKeyword(
      "not",
      "new",
      "true",
      "false",
      "undefined",
      "null"
    );
  }

  private parseReturn(): Statement {
    const returnToken = this.advance();
    const value = this.startsExpression() ? this.parseExpression() : undefined;
    return {
      kind: "returnStatement",
      value,
      location: this.position(returnToken),
    };
  }

  private parseTry(): Statement {
    const tryToken = this.advance();
    const tryBlock = this.parseBlock(["except", "endtry"]);
    const exceptBlock = this.matchKeyword("except")
      ? this.parseBlock(["endtry"])
      : undefined;
    this.expectKeyword("endtry", "КонецПопытки");
    return {
      kind: "tryStatement",
      tryBlock,
      exceptBlock,
      location: this.position(tryToken),
    };
  }

  private parseRaise(): Statement {
    const raiseToken = this.advance();
    const message = this.startsExpression()
      ? this.parseExpression()
      : undefined;
    return {
      kind: "raiseStatement",
      message,
      location: this.position(raiseToken),
    };
  }

  private parseExpressionStatement(): Statement {
    const startToken = this.current();
    const target = this.parsePostfix();
    const location = this.position(startToken);

    if (this.matchPunctuation("=")) {
      if (
        target.kind !== "identifier" &&
        target.kind !== "memberAccess" &&
        target.kind !== "index"
      ) {
        this.fail("BSL1003", "Invalid assignment target");
      }
      const value = this.parseExpression();
      return { kind: "assignment", target, value, location };
    }

    if (target.kind === "call") {
      if (target.callee.kind === "identifier") {
        return {
          kind: "procedureCall",
          name: target.callee.name,
          args: target.args,
          location,
        };
      }
      if (target.callee.kind === "memberAccess") {
        return {
          kind: "procedureCall",
          name: target.callee.member,
          object: target.callee.object,
          args: target.args,
          location,
        };
      }
    }

    return this.fail(
      "BSL1003",
      `Unexpected ${this.describeCurrent()}, expected an assignment or a call`
    );
  }

  // ─── expressions ─────────────────────────────────────────────────

  private parseExpression(): Expression {
    return this.parseOr();
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.isKeyword("or")) {
      const token = this.advance();
      const right = this.parseAnd();
      left = {
        kind: "binary",
        operator: "or",
        left,
        right,
        location: this.position(token),
      };
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseNot();
    while (this.isKeyword("and")) {
      const token = this.advance();
      const right = this.parseNot();
      left = {
        kind: "binary",
        operator: "and",
        left,
        right,
        location: this.position(token),
      };
    }
    return left;
  }

  private parseNot(): Expression {
    if (this.isKeyword("not")) {
      const token = this.advance();
      const operand = this.parseNot();
      return {
        kind: "unary",
        operator: "not",
        operand,
        location: this.position(token),
      };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expression {
    let left = this.parseAdditive();
    for (;;) {
      const token = this.current();
      const operator =
        token.kind === "punctuation"
          ? COMPARISON_OPERATORS.get(token.text)
          : undefined;
      if (!operator) {
        return left;
      }
      this.advance();
      const right = this.parseAdditive();
      left = {
        kind: "binary",
        operator,
        left,
        right,
        location: this.position(token),
      };
    }
  }

  private parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    while (this.isPunctuation("+") || this.isPunctuation("-")) {
      const token = this.advance();
      const right = this.parseMultiplicative();
      left = {
        kind: "binary",
        operator: token.text === "+" ? "+" : "-",
        left,
        right,
        location: this.position(token),
      };
    }
    return left;
  }

  private parseMultiplicative(): Expression {
    let left = this.parseUnary();
    for (;;) {
      const token = this.current();
      if (token.kind !== "punctuation") {
        return left;
      }
      const operator =
        token.text === "*"
          ? "*"
          : token.text === "/"
            ? "/"
            : token.text === "%"
              ? "%"
              : undefined;
      if (!operator) {
        return left;
      }
      this.advance();
      const right = this.parseUnary();
      left = {
        kind: "binary",
        operator,
        left,
        right,
        location: this.position(token),
      };
    }
  }

  private parseUnary(): Expression {
    if (this.isPunctuation("-")) {
      const token = this.advance();
      const operand = this.parseUnary();
      return {
        kind: "unary",
        operator: "-",
        operand,
        location: this.position(token),
      };
    }
    if (this.matchPunctuation("+")) {
      return this.parseUnary();
    }
    return this.parsePostfix();
  }

  private parsePostfix(): Expression {
    let expression = this.parsePrimary();
    for (;;) {
      const token = this.current();
      if (this.matchPunctuation(".")) {
        const memberToken = this.current();
        if (
          memberToken.kind !== "identifier" &&
          memberToken.kind !== "keyword"
        ) {
          this.fail(
            "BSL1003",
            `Expected member name but found ${this.describeCurrent()}`
          );
        }
        this.advance();
        expression = {
          kind: "memberAccess",
          object: expression,
          member: memberToken.raw,
          location: this.position(token),
        };
        continue;
      }
      if (this.isPunctuation("(")) {
        const args = this.parseArguments();
        expression = {
          kind: "call",
          callee: expression,
          args,
          location: expression.location,
        };
        continue;
      }
      if (this.matchPunctuation("[")) {
        const index = this.parseExpression();
        this.expectPunctuation("]");
        expression = {
          kind: "index",
          object: expression,
          index,
          location: this.position(token),
        };
        continue;
      }
      return expression;
    }
  }

  /**
   * Parse `(a, , c)`; skipped arguments become `Неопределено`
   */
  private parseArguments(): readonly Expression[] {
    this.expectPunctuation("(");
    const args: Expression[] = [];
    if (this.matchPunctuation(")")) {
      return args;
    }
    for (;;) {
      if (this.isPunctuation(",") || this.isPunctuation(")")) {
        args.push({
          kind: "undefinedLiteral",
          location: this.position(this.current()),
        });
      } else {
        args.push(this.parseExpression());
      }
      if (this.matchPunctuation(",")) {
        continue;
      }
      this.expectPunctuation(")");
      return args;
    }
  }

  private parsePrimary(): Expression {
    const token = this.current();
    const location = this.position(token);

    switch (token.kind) {
      case "number":
        this.advance();
        return { kind: "numberLiteral", value: Number(token.text), location };
      case "string":
        this.advance();
        return { kind: "stringLiteral", value: token.text, location };
      case "date":
        this.advance();
        return { kind: "dateLiteral", value: token.text, location };
      case "identifier":
        this.advance();
        return { kind: "identifier", name: token.text, location };
      case "keyword":
        switch (token.text) {
          case "true":
          case "false":
            this.advance();
            return {
              kind: "booleanLiteral",
              value: token.text === "true",
              location,
            };
          case "undefined":
            this.advance();
            return { kind: "undefinedLiteral", location };
          case "null":
            this.advance();
            return { kind: "nullLiteral", location };
          case "new": {
            this.advance();
            const typeToken = this.expectIdentifier("type name");
            const args = this.isPunctuation("(") ? this.parseArguments() : [];
            return { kind: "new", typeName: typeToken.text, args, location };
          }
        }
        break;
      case "punctuation":
        if (token.text === "(") {
          this.advance();
          const inner = this.parseExpression();
          this.expectPunctuation(")");
          return inner;
        }
        if (token.text === "?") {
          this.advance();
          this.expectPunctuation("(");
          const condition = this.parseExpression();
          this.expectPunctuation(",");
          const whenTrue = this.parseExpression();
          this.expectPunctuation(",");
          const whenFalse = this.parseExpression();
          this.expectPunctuation(")");
          return { kind: "ternary", condition, whenTrue, whenFalse, location };
        }
        break;
      case "eof":
        break;
    }

    return this.fail(
      this.isEof() ? "BSL1004" : "BSL1003",
      `Unexpected ${this.describeCurrent()} in expression`
    );
  }
}

const parseTokens = (
  tokens: readonly Token[],
  file: string
): Result<Program, Diagnostic> => {
  try {
    return ok(new Parser(tokens, file).parseProgram());
  } catch (caught) {
    if (caught instanceof ParseFailure) {
      return error(caught.diagnostic);
    }
    throw caught;
  }
};

/**
 * Parse BSL module source into a program
 */
export const parse = (
  source: string,
  file = "<memory>"
): Result<Program, Diagnostic> =>
  flatMap(tokenize(source, file), (tokens) => parseTokens(tokens, file));
