/**
 * Type dependency graph
 *
 * A directed multigraph over variables, functions, parameters, return
 * values, fields and methods. Cycles are legal (recursive calls) and are
 * reported, not rejected.
 */

import { scopeKey, type Scope } from "../context.js";

export type DependencyNode =
  | { readonly kind: "variable"; readonly name: string; readonly scope: Scope }
  | {
      readonly kind: "function";
      readonly name: string;
      readonly exported: boolean;
    }
  | {
      readonly kind: "parameter";
      readonly function: string;
      readonly name: string;
    }
  | { readonly kind: "returnValue"; readonly function: string }
  | { readonly kind: "field"; readonly object: string; readonly field: string }
  | { readonly kind: "method"; readonly object: string; readonly method: string };

export type DependencyType =
  | { readonly kind: "assignment" }
  | { readonly kind: "parameter"; readonly index: number }
  | { readonly kind: "return" }
  | { readonly kind: "fieldAccess" }
  | { readonly kind: "methodCall" }
  | { readonly kind: "expression" }
  | { readonly kind: "conditional" };

export type EdgeLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
};

export type DependencyEdge = {
  readonly from: DependencyNode;
  readonly to: DependencyNode;
  readonly type: DependencyType;
  readonly location?: EdgeLocation;
};

export type GraphStats = {
  readonly nodes: number;
  readonly edges: number;
  readonly functions: number;
  readonly variables: number;
};

/**
 * Stable identity of a node; equal nodes have equal keys
 */
export const nodeKey = (node: DependencyNode): string => {
  switch (node.kind) {
    case "variable":
      return `var:${scopeKey(node.scope)}:${node.name}`;
    case "function":
      return `fn:${node.name}:${node.exported ? "export" : "local"}`;
    case "parameter":
      return `param:${node.function}:${node.name}`;
    case "returnValue":
      return `return:${node.function}`;
    case "field":
      return `field:${node.object}.${node.field}`;
    case "method":
      return `method:${node.object}.${node.method}()`;
  }
};

export const formatNode = (node: DependencyNode): string => {
  switch (node.kind) {
    case "variable":
      return node.name;
    case "function":
      return `${node.name}()`;
    case "parameter":
      return `${node.function}(${node.name})`;
    case "returnValue":
      return `${node.function}:return`;
    case "field":
      return `${node.object}.${node.field}`;
    case "method":
      return `${node.object}.${node.method}()`;
  }
};

export class DependencyGraph {
  private readonly nodeMap = new Map<string, DependencyNode>();
  private readonly outgoing = new Map<string, DependencyEdge[]>();
  private readonly incoming = new Map<string, DependencyEdge[]>();
  private edgeCount = 0;

  addNode(node: DependencyNode): void {
    const key = nodeKey(node);
    if (!this.nodeMap.has(key)) {
      this.nodeMap.set(key, node);
    }
  }

  /**
   * Add an edge, inserting missing endpoints
   */
  addEdge(edge: DependencyEdge): void {
    this.addNode(edge.from);
    this.addNode(edge.to);
    pushTo(this.outgoing, nodeKey(edge.from), edge);
    pushTo(this.incoming, nodeKey(edge.to), edge);
    this.edgeCount++;
  }

  hasNode(node: DependencyNode): boolean {
    return this.nodeMap.has(nodeKey(node));
  }

  nodes(): readonly DependencyNode[] {
    return [...this.nodeMap.values()];
  }

  edges(): readonly DependencyEdge[] {
    return [...this.outgoing.values()].flat();
  }

  getDependencies(node: DependencyNode): readonly DependencyNode[] {
    return (this.outgoing.get(nodeKey(node)) ?? []).map((e) => e.to);
  }

  getDependents(node: DependencyNode): readonly DependencyNode[] {
    return (this.incoming.get(nodeKey(node)) ?? []).map((e) => e.from);
  }

  /**
   * Shortest path by breadth-first search, endpoints included
   */
  findPath(
    from: DependencyNode,
    to: DependencyNode
  ): readonly DependencyNode[] | undefined {
    const targetKey = nodeKey(to);
    const parents = new Map<string, { key: string; node: DependencyNode }>();
    const visited = new Set<string>([nodeKey(from)]);
    const queue: { key: string; node: DependencyNode }[] = [
      { key: nodeKey(from), node: from },
    ];

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      if (!current) {
        break;
      }
      if (current.key === targetKey) {
        const path: DependencyNode[] = [];
        let cursor: { key: string; node: DependencyNode } | undefined =
          current;
        while (cursor) {
          path.push(cursor.node);
          cursor = parents.get(cursor.key);
        }
        return path.reverse();
      }
      for (const edge of this.outgoing.get(current.key) ?? []) {
        const next = nodeKey(edge.to);
        if (!visited.has(next)) {
          visited.add(next);
          parents.set(next, current);
          queue.push({ key: next, node: edge.to });
        }
      }
    }

    return undefined;
  }

  /**
   * Cycles found by depth-first search with an explicit stack. Each cycle
   * lists its nodes in edge order, starting from the node the search
   * re-entered.
   */
  findCycles(): readonly (readonly DependencyNode[])[] {
    const cycles: DependencyNode[][] = [];
    const visited = new Set<string>();
    const onStack = new Set<string>();
    const path: string[] = [];

    type Frame = {
      readonly key: string;
      readonly edges: readonly DependencyEdge[];
      next: number;
    };

    for (const startKey of this.nodeMap.keys()) {
      if (visited.has(startKey)) {
        continue;
      }

      const stack: Frame[] = [];
      const enter = (key: string): void => {
        visited.add(key);
        onStack.add(key);
        path.push(key);
        stack.push({ key, edges: this.outgoing.get(key) ?? [], next: 0 });
      };
      enter(startKey);

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        if (!frame) {
          break;
        }
        const edge = frame.edges[frame.next];
        if (!edge) {
          stack.pop();
          path.pop();
          onStack.delete(frame.key);
          continue;
        }
        frame.next++;

        const target = nodeKey(edge.to);
        if (!visited.has(target)) {
          enter(target);
        } else if (onStack.has(target)) {
          const start = path.indexOf(target);
          cycles.push(
            path
              .slice(start)
              .map((key) => this.nodeMap.get(key))
              .filter((node): node is DependencyNode => node !== undefined)
          );
        }
      }
    }

    return cycles;
  }

  /**
   * Kahn's algorithm; `undefined` when a cycle leaves nodes unprocessed
   */
  topologicalSort(): readonly DependencyNode[] | undefined {
    const inDegree = new Map<string, number>();
    for (const key of this.nodeMap.keys()) {
      inDegree.set(key, this.incoming.get(key)?.length ?? 0);
    }

    const queue = [...inDegree]
      .filter(([, degree]) => degree === 0)
      .map(([key]) => key);
    const sorted: DependencyNode[] = [];

    for (let head = 0; head < queue.length; head++) {
      const key = queue[head];
      const node = key === undefined ? undefined : this.nodeMap.get(key);
      if (key === undefined || !node) {
        continue;
      }
      sorted.push(node);
      for (const edge of this.outgoing.get(key) ?? []) {
        const target = nodeKey(edge.to);
        const degree = (inDegree.get(target) ?? 0) - 1;
        inDegree.set(target, degree);
        if (degree === 0) {
          queue.push(target);
        }
      }
    }

    return sorted.length === this.nodeMap.size ? sorted : undefined;
  }

  /**
   * Nodes reachable from `start` (itself included), in breadth-first order
   */
  getReachableNodes(start: DependencyNode): readonly DependencyNode[] {
    const visited = new Set<string>([nodeKey(start)]);
    const reachable: DependencyNode[] = [start];

    for (let head = 0; head < reachable.length; head++) {
      const current = reachable[head];
      if (!current) {
        break;
      }
      for (const edge of this.outgoing.get(nodeKey(current)) ?? []) {
        const next = nodeKey(edge.to);
        if (!visited.has(next)) {
          visited.add(next);
          reachable.push(edge.to);
        }
      }
    }

    return reachable;
  }

  /**
   * Names of functions the named function calls directly
   */
  getCalledFunctions(functionName: string): readonly string[] {
    const called: string[] = [];
    for (const exported of [false, true]) {
      const key = nodeKey({ kind: "function", name: functionName, exported });
      for (const edge of this.outgoing.get(key) ?? []) {
        if (edge.to.kind === "function" && !called.includes(edge.to.name)) {
          called.push(edge.to.name);
        }
      }
    }
    return called;
  }

  stats(): GraphStats {
    const nodes = [...this.nodeMap.values()];
    return {
      nodes: nodes.length,
      edges: this.edgeCount,
      functions: nodes.filter((n) => n.kind === "function").length,
      variables: nodes.filter((n) => n.kind === "variable").length,
    };
  }
}

const pushTo = <K, V>(map: Map<K, V[]>, key: K, value: V): void => {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
};
