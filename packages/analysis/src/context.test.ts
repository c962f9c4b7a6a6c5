import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createTypeContext,
  enterScope,
  exitScope,
  GLOBAL_SCOPE,
  requiredArgumentCount,
  scopeKey,
  withFunction,
} from "./context.js";
import { primitiveType, unknown } from "./types/resolution.js";

describe("TypeContext", () => {
  it("should push and pop scopes", () => {
    const context = createTypeContext();
    const inner = enterScope(context, { kind: "function", name: "Ф" });
    expect(inner.currentScope).to.deep.equal({ kind: "function", name: "Ф" });
    expect(inner.scopeStack).to.deep.equal([GLOBAL_SCOPE]);

    const outer = exitScope(inner);
    expect(outer.currentScope).to.deep.equal(GLOBAL_SCOPE);
    expect(outer.scopeStack).to.deep.equal([]);
    expect(exitScope(outer)).to.equal(outer);
  });

  it("should add functions without touching the original", () => {
    const context = createTypeContext();
    const updated = withFunction(context, "Ф", {
      params: [
        { name: "А", type: unknown(), optional: false },
        { name: "Б", type: primitiveType("Number"), optional: true },
      ],
      returnType: primitiveType("String"),
      exported: false,
    });
    expect(context.functions.size).to.equal(0);
    const signature = updated.functions.get("Ф");
    expect(signature ? requiredArgumentCount(signature) : -1).to.equal(1);
  });

  it("should key scopes distinctly", () => {
    expect(scopeKey({ kind: "module", name: "a.bsl" })).to.equal(
      "module:a.bsl"
    );
    expect(scopeKey({ kind: "local", function: "Ф", blockId: 2 })).to.equal(
      "local:Ф#2"
    );
  });
});
