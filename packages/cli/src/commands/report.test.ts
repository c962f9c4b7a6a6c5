import { describe, it } from "mocha";
import { expect } from "chai";
import { createDiagnostic } from "@bsl-gradual/frontend";
import {
  createTypeContext,
  primitiveType,
  unknown,
  withFunction,
  withVariables,
} from "@bsl-gradual/analysis";
import { countBySeverity, renderJson, renderText } from "./report.js";

const warning = createDiagnostic(
  "BSL2002",
  "warning",
  "Переменная 'У' используется без объявления",
  { file: "test.bsl", line: 1, column: 5 }
);

const context = withFunction(
  withVariables(
    createTypeContext(),
    new Map([["Х", primitiveType("Number")]])
  ),
  "Ф",
  {
    params: [
      { name: "А", type: unknown(), optional: false },
      { name: "Б", type: primitiveType("Number"), optional: true },
    ],
    returnType: primitiveType("String"),
    exported: false,
  }
);

describe("report", () => {
  it("should count diagnostics by severity", () => {
    expect(countBySeverity([warning, warning])).to.deep.equal({
      error: 0,
      warning: 2,
      info: 0,
      hint: 0,
    });
  });

  it("should render diagnostics and a summary as text", () => {
    expect(renderText({ file: "test.bsl", diagnostics: [warning] })).to.equal(
      [
        "test.bsl:1:5 warning BSL2002: Переменная 'У' используется без объявления",
        "test.bsl: 0 error(s), 1 warning(s), 0 info, 0 hint(s)",
      ].join("\n")
    );
  });

  it("should append inferred types when a context is given", () => {
    expect(
      renderText({ file: "test.bsl", diagnostics: [], context }).split("\n")
    ).to.deep.equal([
      "test.bsl: 0 error(s), 0 warning(s), 0 info, 0 hint(s)",
      "Variables:",
      "  Х: Число [known]",
      "Functions:",
      "  Ф(А, Б?): Строка [known]",
    ]);
  });

  it("should render JSON", () => {
    const parsed: unknown = JSON.parse(
      renderJson({ file: "test.bsl", diagnostics: [warning], context })
    );
    expect(parsed).to.deep.equal({
      file: "test.bsl",
      diagnostics: [
        {
          code: "BSL2002",
          severity: "warning",
          message: "Переменная 'У' используется без объявления",
          location: { file: "test.bsl", line: 1, column: 5 },
        },
      ],
      summary: { error: 0, warning: 1, info: 0, hint: 0 },
      types: {
        variables: { Х: "Число [known]" },
        functions: { Ф: "Ф(А, Б?): Строка [known]" },
      },
    });
  });
});
