import { describe, it } from "mocha";
import { expect } from "chai";
import {
  canonicalPlatformTypeName,
  globalFunctions,
  lookupGlobalFunction,
  resolveConstructedType,
  resolveGlobalReturnType,
} from "./builtins.js";
import {
  formatResolution,
  platformType,
  primitiveType,
} from "./types/resolution.js";

const builtin = (name: string) => {
  const fn = lookupGlobalFunction(name);
  if (!fn) {
    throw new Error(`missing built-in ${name}`);
  }
  return fn;
};

describe("built-in functions", () => {
  it("should look names up in either language, ignoring case", () => {
    expect(lookupGlobalFunction("стрдлина")?.name).to.equal("СтрДлина");
    expect(lookupGlobalFunction("STRLEN")?.name).to.equal("СтрДлина");
    expect(lookupGlobalFunction("НетТакой")).to.equal(undefined);
    expect(globalFunctions()).to.have.length(12);
  });

  it("should return the declared type of monomorphic functions", () => {
    expect(
      formatResolution(resolveGlobalReturnType(builtin("Формат"), []))
    ).to.equal("Строка [known]");
  });

  it("should let Мин and Макс follow their first argument", () => {
    const min = builtin("Мин");
    expect(
      formatResolution(resolveGlobalReturnType(min, [primitiveType("Number")]))
    ).to.equal("Число [known]");
    expect(
      formatResolution(resolveGlobalReturnType(min, [platformType("Массив")]))
    ).to.equal("Массив [inferred 0.50]");
    expect(
      formatResolution(resolveGlobalReturnType(builtin("Max"), []))
    ).to.equal("Произвольный [unknown]");
  });
});

describe("platform types", () => {
  it("should canonicalize English names", () => {
    expect(canonicalPlatformTypeName("ValueTable")).to.equal("ТаблицаЗначений");
    expect(canonicalPlatformTypeName("Запрос")).to.equal(undefined);
  });

  it("should type Новый expressions", () => {
    expect(formatResolution(resolveConstructedType("Array"))).to.equal(
      "Массив [known]"
    );
    expect(formatResolution(resolveConstructedType("Запрос"))).to.equal(
      "Произвольный [unknown]"
    );
  });
});
