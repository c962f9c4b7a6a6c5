import { describe, it } from "mocha";
import { expect } from "chai";
import { parse, type Program } from "@bsl-gradual/frontend";
import { buildDependencyGraph } from "./builder.js";
import { formatNode, type DependencyNode } from "./dependency-graph.js";

const parseOk = (source: string): Program => {
  const result = parse(source, "test.bsl");
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value;
};

const moduleVariable = (name: string): DependencyNode => ({
  kind: "variable",
  name,
  scope: { kind: "module", name: "test.bsl" },
});

describe("buildDependencyGraph", () => {
  const source = [
    "Функция Удвоить(Х)",
    "  Возврат Х * 2;",
    "КонецФункции",
    "А = 1;",
    "Б = Удвоить(А);",
  ].join("\n");

  it("should link assignments to called functions", () => {
    const graph = buildDependencyGraph(parseOk(source), "test.bsl");
    expect(graph.getDependencies(moduleVariable("Б"))).to.deep.equal([
      { kind: "function", name: "Удвоить", exported: false },
    ]);
  });

  it("should flow arguments into positional parameters", () => {
    const graph = buildDependencyGraph(parseOk(source), "test.bsl");
    const parameter: DependencyNode = {
      kind: "parameter",
      function: "Удвоить",
      name: "param_0",
    };
    expect(graph.getDependencies(parameter)).to.deep.equal([
      moduleVariable("А"),
    ]);
    const edge = graph.edges().find((e) => e.from.kind === "parameter");
    expect(edge?.type).to.deep.equal({ kind: "parameter", index: 0 });
    expect(edge?.location).to.deep.equal({
      file: "test.bsl",
      line: 5,
      column: 13,
    });
  });

  it("should make return values depend on function-scoped variables", () => {
    const graph = buildDependencyGraph(parseOk(source), "test.bsl");
    expect(
      graph.getDependencies({ kind: "returnValue", function: "Удвоить" })
    ).to.deep.equal([
      { kind: "variable", name: "Х", scope: { kind: "function", name: "Удвоить" } },
    ]);
  });

  it("should name called routines as declared", () => {
    const graph = buildDependencyGraph(
      parseOk(
        [
          "Функция Удвоить(Х) Экспорт",
          "  Возврат Х * 2;",
          "КонецФункции",
          "Б = УДВОИТЬ(1);",
        ].join("\n")
      ),
      "test.bsl"
    );
    expect(graph.getDependencies(moduleVariable("Б"))).to.deep.equal([
      { kind: "function", name: "Удвоить", exported: true },
    ]);
  });

  it("should expose mutual recursion as a cycle", () => {
    const graph = buildDependencyGraph(
      parseOk(
        [
          "Процедура А()",
          "  Б();",
          "КонецПроцедуры",
          "Процедура Б()",
          "  А();",
          "КонецПроцедуры",
        ].join("\n")
      ),
      "test.bsl"
    );
    expect(graph.getCalledFunctions("А")).to.deep.equal(["Б"]);
    expect(graph.findCycles().map((cycle) => cycle.map(formatNode))).to.deep.equal(
      [["А()", "Б()"]]
    );
  });

  it("should record field and method dependencies", () => {
    const graph = buildDependencyGraph(
      parseOk("Итог = Заказ.Сумма;\nКоличество = Список.Количество();"),
      "test.bsl"
    );
    expect(graph.getDependencies(moduleVariable("Итог"))).to.deep.equal([
      { kind: "field", object: "Заказ", field: "Сумма" },
    ]);
    expect(graph.getDependencies(moduleVariable("Количество"))).to.deep.equal([
      { kind: "method", object: "Список", method: "Количество" },
    ]);
  });
});
