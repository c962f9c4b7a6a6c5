/**
 * Tests for the BSL parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parse } from "./parser.js";
import type { Program, Statement } from "./ast/statements.js";

const parseOk = (source: string): Program => {
  const result = parse(source, "test.bsl");
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value;
};

const first = (source: string): Statement => {
  const statement = parseOk(source).statements[0];
  if (!statement) {
    throw new Error("no statements");
  }
  return statement;
};

describe("Parser", () => {
  describe("declarations", () => {
    it("should split a variable list into separate declarations", () => {
      const program = parseOk("Перем А, Б = 2 Экспорт;");

      expect(program.statements).to.deep.equal([
        {
          kind: "varDeclaration",
          name: "А",
          exported: false,
          value: undefined,
          location: { line: 1, column: 7 },
        },
        {
          kind: "varDeclaration",
          name: "Б",
          exported: true,
          value: {
            kind: "numberLiteral",
            value: 2,
            location: { line: 1, column: 14 },
          },
          location: { line: 1, column: 10 },
        },
      ]);
    });

    it("should parse functions with by-value and default parameters", () => {
      const statement = first(
        "Функция Сложить(Знач А, Б = 0) Экспорт\n  Возврат А + Б;\nКонецФункции"
      );

      expect(statement.kind).to.equal("functionDeclaration");
      if (statement.kind === "functionDeclaration") {
        expect(statement.name).to.equal("Сложить");
        expect(statement.exported).to.equal(true);
        expect(statement.params.map((p) => [p.name, p.byValue])).to.deep.equal(
          [
            ["А", true],
            ["Б", false],
          ]
        );
        expect(statement.params[1]?.defaultValue?.kind).to.equal(
          "numberLiteral"
        );
        expect(statement.body.map((s) => s.kind)).to.deep.equal([
          "returnStatement",
        ]);
      }
    });

    it("should parse procedures written with English keywords", () => {
      const statement = first("Procedure Run()\nEndProcedure");
      expect(statement.kind).to.equal("procedureDeclaration");
    });
  });

  describe("statements", () => {
    it("should parse if / elsif / else chains", () => {
      const statement = first(
        "Если А > 0 Тогда Б = 1; ИначеЕсли А < 0 Тогда Б = -1; Иначе Б = 0; КонецЕсли;"
      );

      expect(statement.kind).to.equal("ifStatement");
      if (statement.kind === "ifStatement") {
        expect(statement.thenBranch).to.have.length(1);
        expect(statement.elseIfBranches).to.have.length(1);
        expect(statement.elseBranch).to.have.length(1);
      }
    });

    it("should parse both loop forms", () => {
      const program = parseOk(
        "Для Каждого Эл Из Список Цикл Прервать; КонецЦикла;\n" +
          "Для Инд = 1 По 10 Цикл Продолжить; КонецЦикла;\n" +
          "Пока Истина Цикл КонецЦикла;"
      );

      expect(program.statements.map((s) => s.kind)).to.deep.equal([
        "forEachStatement",
        "forStatement",
        "whileStatement",
      ]);
    });

    it("should parse try blocks and raise", () => {
      const statement = first(
        'Попытка ВызватьИсключение "Ошибка"; Исключение Возврат; КонецПопытки;'
      );

      expect(statement.kind).to.equal("tryStatement");
      if (statement.kind === "tryStatement") {
        expect(statement.tryBlock[0]?.kind).to.equal("raiseStatement");
        expect(statement.exceptBlock?.[0]).to.deep.equal({
          kind: "returnStatement",
          value: undefined,
          location: { line: 1, column: 48 },
        });
      }
    });

    it("should distinguish procedure calls from method calls", () => {
      const program = parseOk("Сообщить(1);\nМассив.Добавить(2);");

      const [call, method] = program.statements;
      expect(call?.kind).to.equal("procedureCall");
      expect(method?.kind).to.equal("procedureCall");
      if (method?.kind === "procedureCall") {
        expect(method.name).to.equal("Добавить");
        expect(method.object).to.deep.equal({
          kind: "identifier",
          name: "Массив",
          location: { line: 2, column: 1 },
        });
      }
    });

    it("should parse member assignment", () => {
      const statement = first("Объект.Поле = 5;");
      expect(statement.kind).to.equal("assignment");
      if (statement.kind === "assignment") {
        expect(statement.target.kind).to.equal("memberAccess");
      }
    });
  });

  describe("expressions", () => {
    it("should respect operator precedence", () => {
      const statement = first("Х = 1 + 2 * 3;");

      if (statement.kind !== "assignment") {
        throw new Error("expected assignment");
      }
      const value = statement.value;
      expect(value.kind).to.equal("binary");
      if (value.kind === "binary") {
        expect(value.operator).to.equal("+");
        expect(value.right.kind).to.equal("binary");
        if (value.right.kind === "binary") {
          expect(value.right.operator).to.equal("*");
        }
      }
    });

    it("should bind Не looser than comparison", () => {
      const statement = first("Х = Не А = 1;");
      if (statement.kind === "assignment") {
        expect(statement.value.kind).to.equal("unary");
        if (statement.value.kind === "unary") {
          expect(statement.value.operand.kind).to.equal("binary");
        }
      }
    });

    it("should parse ТипЗнч comparisons with Тип calls", () => {
      const statement = first('Если ТипЗнч(Х) = Тип("Строка") Тогда КонецЕсли;');

      if (statement.kind === "ifStatement") {
        const condition = statement.condition;
        expect(condition.kind).to.equal("binary");
        if (condition.kind === "binary") {
          expect(condition.left.kind).to.equal("call");
          expect(condition.right.kind).to.equal("call");
        }
      }
    });

    it("should parse new, ternary and skipped arguments", () => {
      const program = parseOk(
        "М = Новый Массив;\nТ = ?(А, 1, 2);\nФ(1, , 3);"
      );

      const [creation, ternary, call] = program.statements;
      if (creation?.kind === "assignment") {
        expect(creation.value).to.deep.equal({
          kind: "new",
          typeName: "Массив",
          args: [],
          location: { line: 1, column: 5 },
        });
      }
      if (ternary?.kind === "assignment") {
        expect(ternary.value.kind).to.equal("ternary");
      }
      if (call?.kind === "procedureCall") {
        expect(call.args.map((a) => a.kind)).to.deep.equal([
          "numberLiteral",
          "undefinedLiteral",
          "numberLiteral",
        ]);
      }
    });
  });

  describe("errors", () => {
    it("should report a missing closing keyword at end of file", () => {
      const result = parse("Если А Тогда\n  Б = 1;", "test.bsl");

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("BSL1004");
        expect(result.error.message).to.equal(
          "Expected 'КонецЕсли' but found end of file"
        );
      }
    });

    it("should report unexpected tokens with their position", () => {
      const result = parse("А = ;", "test.bsl");

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("BSL1003");
        expect(result.error.location).to.deep.equal({
          file: "test.bsl",
          line: 1,
          column: 5,
        });
      }
    });

    it("should forward lexer errors", () => {
      const result = parse("А = 'без конца", "test.bsl");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("BSL1002");
      }
    });
  });
});
