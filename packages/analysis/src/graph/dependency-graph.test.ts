import { describe, it } from "mocha";
import { expect } from "chai";
import { GLOBAL_SCOPE } from "../context.js";
import {
  DependencyGraph,
  formatNode,
  nodeKey,
  type DependencyNode,
} from "./dependency-graph.js";

const variable = (name: string): DependencyNode => ({
  kind: "variable",
  name,
  scope: GLOBAL_SCOPE,
});

const fn = (name: string): DependencyNode => ({
  kind: "function",
  name,
  exported: false,
});

const chain = (): DependencyGraph => {
  const graph = new DependencyGraph();
  graph.addEdge({ from: variable("a"), to: variable("b"), type: { kind: "assignment" } });
  graph.addEdge({ from: variable("b"), to: variable("c"), type: { kind: "expression" } });
  return graph;
};

describe("DependencyGraph", () => {
  it("should identify nodes structurally", () => {
    const graph = new DependencyGraph();
    graph.addNode(variable("a"));
    graph.addNode(variable("a"));
    expect(graph.nodes()).to.have.length(1);
    expect(
      nodeKey({ kind: "variable", name: "a", scope: { kind: "function", name: "f" } })
    ).to.not.equal(nodeKey(variable("a")));
  });

  it("should insert the endpoints of an edge", () => {
    const graph = chain();
    expect(graph.hasNode(variable("c"))).to.equal(true);
    expect(graph.getDependencies(variable("a"))).to.deep.equal([variable("b")]);
    expect(graph.getDependents(variable("b"))).to.deep.equal([variable("a")]);
  });

  it("should find the shortest path with both endpoints", () => {
    const graph = chain();
    expect(graph.findPath(variable("a"), variable("c"))).to.deep.equal([
      variable("a"),
      variable("b"),
      variable("c"),
    ]);
    expect(graph.findPath(variable("a"), variable("a"))).to.deep.equal([
      variable("a"),
    ]);
    expect(graph.findPath(variable("c"), variable("a"))).to.equal(undefined);
  });

  it("should sort an acyclic graph topologically", () => {
    expect(chain().topologicalSort()).to.deep.equal([
      variable("a"),
      variable("b"),
      variable("c"),
    ]);
  });

  it("should report cycles and refuse to sort them", () => {
    const graph = chain();
    graph.addEdge({ from: variable("c"), to: variable("a"), type: { kind: "expression" } });

    expect(graph.findCycles().map((cycle) => cycle.map(formatNode))).to.deep.equal(
      [["a", "b", "c"]]
    );
    expect(graph.topologicalSort()).to.equal(undefined);
  });

  it("should list reachable nodes in breadth-first order", () => {
    expect(chain().getReachableNodes(variable("b"))).to.deep.equal([
      variable("b"),
      variable("c"),
    ]);
  });

  it("should list directly called functions once", () => {
    const graph = new DependencyGraph();
    graph.addEdge({ from: fn("main"), to: fn("helper"), type: { kind: "expression" } });
    graph.addEdge({ from: fn("main"), to: fn("helper"), type: { kind: "expression" } });
    graph.addEdge({ from: fn("main"), to: variable("x"), type: { kind: "expression" } });
    expect(graph.getCalledFunctions("main")).to.deep.equal(["helper"]);
  });

  it("should count nodes by kind", () => {
    const graph = chain();
    graph.addEdge({ from: fn("f"), to: variable("a"), type: { kind: "return" } });
    expect(graph.stats()).to.deep.equal({
      nodes: 4,
      edges: 3,
      functions: 1,
      variables: 3,
    });
  });
});
