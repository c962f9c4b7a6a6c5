import { describe, it } from "mocha";
import { expect } from "chai";
import { parse, type Expression } from "@bsl-gradual/frontend";
import { createTypeContext, withVariables } from "./context.js";
import { complementOf, TypeNarrower } from "./narrowing.js";
import {
  formatResolution,
  primitiveType,
  type TypeResolution,
} from "./types/resolution.js";

const conditionOf = (condition: string): Expression => {
  const result = parse(`Если ${condition} Тогда\nКонецЕсли;`, "test.bsl");
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  const [statement] = result.value.statements;
  if (statement?.kind !== "ifStatement") {
    throw new Error("expected an if statement");
  }
  return statement.condition;
};

const narrowerWith = (
  variables: Readonly<Record<string, TypeResolution>> = {}
): TypeNarrower =>
  new TypeNarrower(
    withVariables(createTypeContext(), new Map(Object.entries(variables)))
  );

describe("TypeNarrower", () => {
  describe("analyzeCondition", () => {
    it("should narrow ТипЗнч comparisons to the named type", () => {
      const [refinement, ...rest] = narrowerWith().analyzeCondition(
        conditionOf('ТипЗнч(Значение) = Тип("Строка")')
      );
      expect(rest).to.deep.equal([]);
      expect(refinement?.variable).to.equal("Значение");
      expect(refinement?.condition).to.deep.equal({
        kind: "typeEquals",
        typeName: "Строка",
      });
      expect(refinement?.refinedType.source).to.equal("inferred");
      expect(refinement?.refinedType.metadata.notes).to.deep.equal([
        "Type narrowed from condition",
      ]);
      expect(formatResolution(refinement?.refinedType ?? primitiveType("Date"))).to.equal(
        "Строка [known]"
      );
    });

    it("should accept English spellings and platform types", () => {
      const [refinement] = narrowerWith().analyzeCondition(
        conditionOf('TypeOf(Items) = Type("Array")')
      );
      expect(refinement?.variable).to.equal("Items");
      expect(refinement?.refinedType.result).to.deep.equal({
        kind: "concrete",
        type: { kind: "platform", name: "Массив", methods: [], properties: [] },
      });
    });

    it("should keep the prior type for a negative type test", () => {
      const prior = primitiveType("Number");
      const [refinement] = narrowerWith({ Х: prior }).analyzeCondition(
        conditionOf('ТипЗнч(Х) <> Тип("Строка")')
      );
      expect(refinement?.condition).to.deep.equal({
        kind: "typeNotEquals",
        typeName: "Строка",
      });
      expect(refinement?.refinedType).to.equal(prior);
    });

    it("should narrow comparisons with Неопределено", () => {
      const [positive] = narrowerWith().analyzeCondition(
        conditionOf("Х = Неопределено")
      );
      expect(positive?.condition).to.deep.equal({ kind: "isUndefined" });
      expect(positive?.refinedType.result).to.deep.equal({
        kind: "concrete",
        type: { kind: "special", special: "Undefined" },
      });

      const [negative] = narrowerWith().analyzeCondition(
        conditionOf("Х <> Неопределено")
      );
      expect(negative?.condition).to.deep.equal({ kind: "isNotUndefined" });
      expect(negative?.refinedType.certainty.kind).to.equal("unknown");
      expect(negative?.refinedType.metadata.notes).to.deep.equal([
        "Unknown type",
      ]);
    });

    it("should narrow comparisons with Null", () => {
      const [refinement] = narrowerWith().analyzeCondition(
        conditionOf("Х = Null")
      );
      expect(refinement?.condition).to.deep.equal({ kind: "isNull" });
    });

    it("should mark bare identifiers as truthy and negations as falsy", () => {
      const [truthy] = narrowerWith().analyzeCondition(conditionOf("Флаг"));
      expect(truthy?.condition).to.deep.equal({ kind: "isTruthy" });
      expect(truthy?.refinedType.certainty).to.deep.equal({
        kind: "inferred",
        confidence: 0.8,
      });
      expect(truthy?.refinedType.result.kind).to.equal("dynamic");

      const [falsy] = narrowerWith().analyzeCondition(conditionOf("Не Флаг"));
      expect(falsy?.condition).to.deep.equal({ kind: "isFalsy" });
      expect(formatResolution(falsy?.refinedType ?? primitiveType("Date"))).to.equal(
        "Булево [known]"
      );
    });

    it("should ignore conditions it cannot interpret", () => {
      const narrower = narrowerWith();
      expect(narrower.analyzeCondition(conditionOf("Х > 1"))).to.deep.equal([]);
      expect(
        narrower.analyzeCondition(conditionOf('ТипЗнч(Х) = Тип("Неизвестный")'))
      ).to.deep.equal([]);
    });
  });

  describe("invertRefinements", () => {
    it("should complement every condition", () => {
      expect(complementOf({ kind: "isTruthy" })).to.deep.equal({
        kind: "isFalsy",
      });
      expect(complementOf({ kind: "typeNotEquals", typeName: "Число" })).to.deep.equal(
        { kind: "typeEquals", typeName: "Число" }
      );
    });

    it("should restore the prior type on the negative branch", () => {
      const prior = primitiveType("Number");
      const narrower = narrowerWith({ Х: prior });
      const [inverted] = narrower.invertRefinements(
        narrower.analyzeCondition(conditionOf('ТипЗнч(Х) = Тип("Строка")'))
      );
      expect(inverted?.condition).to.deep.equal({
        kind: "typeNotEquals",
        typeName: "Строка",
      });
      expect(inverted?.refinedType).to.equal(prior);
    });

    it("should narrow on the negative branch of a negative test", () => {
      const narrower = narrowerWith();
      const [inverted] = narrower.invertRefinements(
        narrower.analyzeCondition(conditionOf("Х <> Неопределено"))
      );
      expect(inverted?.condition).to.deep.equal({ kind: "isUndefined" });
      expect(inverted?.refinedType.result).to.deep.equal({
        kind: "concrete",
        type: { kind: "special", special: "Undefined" },
      });
    });
  });

  describe("applyRefinementsToContext", () => {
    it("should return a new context and leave the original alone", () => {
      const prior = primitiveType("Number");
      const context = withVariables(createTypeContext(), new Map([["Х", prior]]));
      const narrower = new TypeNarrower(context);
      const refined = narrower.applyRefinementsToContext(
        narrower.analyzeCondition(conditionOf('ТипЗнч(Х) = Тип("Строка")'))
      );
      expect(formatResolution(refined.variables.get("Х") ?? prior)).to.equal(
        "Строка [known]"
      );
      expect(context.variables.get("Х")).to.equal(prior);
    });
  });
});
