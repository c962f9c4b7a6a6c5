import { describe, it } from "mocha";
import { expect } from "chai";
import { parse, type Program } from "@bsl-gradual/frontend";
import { createTypeContext, GLOBAL_SCOPE, withVariables } from "./context.js";
import { FlowSensitiveAnalyzer, type FlowHooks } from "./flow.js";
import {
  formatResolution,
  platformType,
  primitiveType,
  unknown,
  type TypeResolution,
} from "./types/resolution.js";

const parseOk = (source: string): Program => {
  const result = parse(source, "test.bsl");
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value;
};

const analyze = (
  lines: readonly string[],
  variables: Readonly<Record<string, TypeResolution>> = {},
  hooks: FlowHooks = {}
): FlowSensitiveAnalyzer => {
  const context = withVariables(
    createTypeContext(),
    new Map(Object.entries(variables))
  );
  const flow = new FlowSensitiveAnalyzer(context, hooks);
  flow.analyzeBlock(parseOk(lines.join("\n")).statements);
  return flow;
};

const typeOf = (flow: FlowSensitiveAnalyzer, name: string): string => {
  const type = flow.getVariableType(name);
  return type ? formatResolution(type) : "<absent>";
};

describe("FlowSensitiveAnalyzer", () => {
  it("should give a reassigned variable its latest type", () => {
    const flow = analyze(["А = 1;", 'А = "текст";']);
    expect(typeOf(flow, "А")).to.equal("Строка [known]");
    expect(flow.allStates()).to.have.length(3);
    expect(flow.finalState().predecessors).to.deep.equal([1]);
  });

  it("should not mutate earlier states", () => {
    const flow = new FlowSensitiveAnalyzer(createTypeContext());
    const before = flow.currentState;
    const after = flow.updateVariableType("Х", primitiveType("Number"));
    expect(before.variables.has("Х")).to.equal(false);
    expect(after.predecessors).to.deep.equal([before.id]);
  });

  it("should merge the two branches of a conditional into a union", () => {
    const flow = analyze(
      [
        "Если Условие Тогда",
        "  Х = 1;",
        "Иначе",
        '  Х = "строка";',
        "КонецЕсли;",
      ],
      { Условие: primitiveType("Boolean") }
    );
    expect(typeOf(flow, "Х")).to.equal("Число | Строка [inferred 0.90]");
    expect(flow.mergePoints()).to.deep.equal([
      { states: [2, 4], mergedState: 5 },
    ]);
    expect(flow.finalState().predecessors).to.deep.equal([2, 4]);
  });

  it("should apply narrowing inside the then branch only", () => {
    const flow = analyze(
      [
        'Если ТипЗнч(Значение) = Тип("Число") Тогда',
        "  Результат = Значение + 1;",
        "КонецЕсли;",
      ],
      { Значение: unknown() }
    );
    const [merge] = flow.mergePoints();
    const thenEnd = flow.refinedContextAt(merge?.states[0] ?? -1);
    const narrowed = thenEnd?.variables.get("Значение");
    expect(narrowed ? formatResolution(narrowed) : "").to.equal("Число [known]");

    expect(typeOf(flow, "Результат")).to.equal("Число [known]");
    expect(typeOf(flow, "Значение")).to.equal("Число [inferred 0.50]");
  });

  it("should fold else-if branches as nested conditionals", () => {
    const flow = analyze(
      [
        "Если А = 1 Тогда",
        "  Х = 1;",
        "ИначеЕсли А = 2 Тогда",
        '  Х = "два";',
        "Иначе",
        "  Х = Истина;",
        "КонецЕсли;",
      ],
      { А: primitiveType("Number") }
    );
    expect(typeOf(flow, "Х")).to.equal(
      "Число | Строка | Булево [inferred 0.90]"
    );
    expect(flow.mergePoints()).to.deep.equal([
      { states: [5, 7], mergedState: 8 },
      { states: [2, 8], mergedState: 9 },
    ]);
  });

  it("should type loop variables", () => {
    const flow = analyze(
      [
        "Для Сч = 1 По 10 Цикл",
        "КонецЦикла;",
        "Для Каждого Элемент Из Список Цикл",
        "КонецЦикла;",
      ],
      { Список: platformType("Массив") }
    );
    expect(typeOf(flow, "Сч")).to.equal("Число [known]");
    expect(typeOf(flow, "Элемент")).to.equal("Произвольный [unknown]");
    expect(flow.getVariableType("Элемент")?.metadata.notes).to.deep.equal([
      "Collection element",
    ]);
  });

  it("should keep routine locals out of the module state", () => {
    const assigned: string[] = [];
    const flow = analyze(
      [
        "Процедура П(Знач Параметр = 5)",
        "  Локальная = Параметр;",
        "КонецПроцедуры",
      ],
      {},
      {
        onAssignment: (name, previous, next) =>
          assigned.push(
            `${name}: ${previous ? formatResolution(previous) : "-"} -> ${formatResolution(next)}`
          ),
      }
    );
    expect(assigned).to.deep.equal(["Локальная: - -> Число [known]"]);
    expect(flow.getVariableType("Локальная")).to.equal(undefined);
    expect(flow.getVariableType("Параметр")).to.equal(undefined);
  });

  it("should walk routine bodies in their own scope", () => {
    const flow = analyze(["Процедура П(а)", "  б = а;", "КонецПроцедуры"]);
    const routine = { kind: "function", name: "П" };
    expect(flow.allStates().map((state) => state.scope)).to.deep.equal([
      GLOBAL_SCOPE,
      routine,
      routine,
    ]);

    const inside = flow.refinedContextAt(2);
    expect(inside?.currentScope).to.deep.equal(routine);
    expect(inside?.scopeStack).to.deep.equal([GLOBAL_SCOPE]);
    expect(inside?.variables.has("б")).to.equal(true);

    expect(flow.finalState().id).to.equal(0);
    expect(flow.refinedContextAt(0)?.currentScope).to.deep.equal(GLOBAL_SCOPE);
  });

  it("should report undeclared identifiers and calls through hooks", () => {
    const undeclared: string[] = [];
    const calls: string[] = [];
    const flow = analyze(["Х = Неизвестная + 1;", "Сообщить(Х);"], {}, {
      onUndeclaredVariable: (node) => undeclared.push(node.name),
      onCall: (name, count, location) =>
        calls.push(`${name}/${count}@${location?.line ?? 0}`),
    });
    expect(undeclared).to.deep.equal(["Неизвестная"]);
    expect(calls).to.deep.equal(["Сообщить/1@2"]);
    expect(typeOf(flow, "Х")).to.equal("Число [known]");
  });
});
