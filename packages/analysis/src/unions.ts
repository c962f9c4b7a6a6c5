/**
 * Union type construction, normalization and set operations
 *
 * Unions are bounded: members below MIN_WEIGHT are dropped and at most
 * MAX_MEMBERS survive, so deep branching cannot grow them without limit.
 */

import {
  concrete,
  concreteTypeOf,
  concreteTypesEqual,
  confidenceOf,
  DYNAMIC,
  inferred,
  known,
  primitive,
  stableConcreteTypeKey,
  UNKNOWN,
  type ConcreteType,
  type TypeResolution,
  type WeightedType,
} from "./types/resolution.js";

export const MAX_MEMBERS = 5;
export const MIN_WEIGHT = 0.05;
export const MAX_UNION_CONFIDENCE = 0.9;

/**
 * Resolution of an empty union
 */
export const neverType = (): TypeResolution => ({
  certainty: UNKNOWN,
  result: DYNAMIC,
  source: "inferred",
  metadata: { notes: ["Never type (empty union)"] },
  availableFacets: [],
});

/**
 * Merge structurally equal members (summing weights), heaviest first
 */
export const normalizeUnion = (
  members: readonly WeightedType[]
): readonly WeightedType[] => {
  const merged = new Map<string, WeightedType>();
  for (const member of members) {
    const key = stableConcreteTypeKey(member.type);
    const existing = merged.get(key);
    merged.set(
      key,
      existing
        ? { type: existing.type, weight: existing.weight + member.weight }
        : member
    );
  }
  return [...merged.values()].sort((a, b) => b.weight - a.weight);
};

const totalWeight = (members: readonly WeightedType[]): number =>
  members.reduce((sum, member) => sum + member.weight, 0);

const renormalize = (
  members: readonly WeightedType[]
): readonly WeightedType[] => {
  const total = totalWeight(members);
  return total > 0
    ? members.map((m) => ({ type: m.type, weight: m.weight / total }))
    : members;
};

const isPrimitiveMember = (
  member: WeightedType,
  kind: "Number" | "String"
): boolean => member.type.kind === "primitive" && member.type.primitive === kind;

const simplifyUnion = (
  members: readonly WeightedType[]
): readonly WeightedType[] => {
  if (members.length === 0) {
    return members;
  }

  for (const kind of ["Number", "String"] as const) {
    if (members.every((m) => isPrimitiveMember(m, kind))) {
      return [{ type: primitive(kind), weight: totalWeight(members) }];
    }
  }

  const significant = renormalize(members.filter((m) => m.weight >= MIN_WEIGHT));
  return significant.length > MAX_MEMBERS
    ? renormalize(significant.slice(0, MAX_MEMBERS))
    : significant;
};

/**
 * Combine resolutions into one. Members are weighted equally; nested
 * unions contribute their members scaled by their share. Inputs without
 * a concrete result add no member but still count toward the average
 * confidence.
 */
export const createUnion = (
  types: readonly TypeResolution[]
): TypeResolution => {
  const [single] = types;
  if (!single) {
    return neverType();
  }
  if (types.length === 1) {
    return single;
  }

  const share = 1 / types.length;
  const members: WeightedType[] = [];
  let totalConfidence = 0;

  for (const resolution of types) {
    const result = resolution.result;
    if (result.kind === "concrete") {
      members.push({ type: result.type, weight: share });
    } else if (result.kind === "union") {
      for (const member of result.members) {
        members.push({ type: member.type, weight: member.weight * share });
      }
    }
    totalConfidence += confidenceOf(resolution.certainty);
  }

  const averageConfidence = totalConfidence / types.length;
  const simplified = simplifyUnion(normalizeUnion(members));
  const [first] = simplified;

  if (!first) {
    return neverType();
  }

  if (simplified.length === 1) {
    return {
      ...inferred(averageConfidence, concrete(first.type)),
      metadata: { notes: ["Union type simplified to concrete"] },
    };
  }

  return {
    ...inferred(Math.min(averageConfidence, MAX_UNION_CONFIDENCE), {
      kind: "union",
      members: simplified,
    }),
    metadata: { notes: [`Union of ${simplified.length} types`] },
  };
};

/**
 * Members present in both unions, weighted by the product of their weights
 */
export const intersectUnions = (
  left: readonly WeightedType[],
  right: readonly WeightedType[]
): readonly WeightedType[] => {
  const result: WeightedType[] = [];
  for (const a of left) {
    for (const b of right) {
      if (concreteTypesEqual(a.type, b.type)) {
        result.push({ type: a.type, weight: a.weight * b.weight });
      }
    }
  }
  return normalizeUnion(result);
};

export const mergeUnions = (
  left: readonly WeightedType[],
  right: readonly WeightedType[]
): readonly WeightedType[] =>
  normalizeUnion(
    [...left, ...right].map((m) => ({ type: m.type, weight: m.weight * 0.5 }))
  );

export const filterUnion = (
  members: readonly WeightedType[],
  predicate: (type: ConcreteType) => boolean
): readonly WeightedType[] =>
  normalizeUnion(members.filter((m) => predicate(m.type)));

export const containsType = (
  members: readonly WeightedType[],
  target: ConcreteType
): boolean => members.some((m) => concreteTypesEqual(m.type, target));

export const getTypeWeight = (
  members: readonly WeightedType[],
  target: ConcreteType
): number => members.find((m) => concreteTypesEqual(m.type, target))?.weight ?? 0;

/**
 * First member of a normalized union
 */
export const getMostLikelyType = (
  members: readonly WeightedType[]
): ConcreteType | undefined => members[0]?.type;

export const getAllTypes = (
  members: readonly WeightedType[]
): readonly ConcreteType[] => members.map((m) => m.type);

/**
 * Non-concrete resolutions are assumed compatible
 */
export const isCompatibleWithUnion = (
  resolution: TypeResolution,
  members: readonly WeightedType[]
): boolean =>
  resolution.result.kind === "concrete"
    ? containsType(members, resolution.result.type)
    : true;

export const fromConcreteTypes = (
  types: readonly ConcreteType[]
): TypeResolution => createUnion(types.map(known));

export const addTypeToUnion = (
  union: TypeResolution,
  addition: TypeResolution
): TypeResolution => {
  if (union.result.kind !== "union") {
    return createUnion([union, addition]);
  }
  const expanded = union.result.members.map((m) =>
    inferred(m.weight, concrete(m.type))
  );
  return createUnion([...expanded, addition]);
};

const sameResolution = (a: TypeResolution, b: TypeResolution): boolean => {
  if (a === b) {
    return true;
  }
  const left = concreteTypeOf(a);
  const right = concreteTypeOf(b);
  return (
    left !== undefined &&
    right !== undefined &&
    concreteTypesEqual(left, right) &&
    a.certainty.kind === b.certainty.kind &&
    confidenceOf(a.certainty) === confidenceOf(b.certainty)
  );
};

/**
 * One type for values reaching a point along several paths: the shared
 * resolution when all agree, their union otherwise
 */
export const joinTypes = (types: readonly TypeResolution[]): TypeResolution => {
  const [head] = types;
  if (!head) {
    return neverType();
  }
  return types.every((type) => sameResolution(head, type))
    ? head
    : createUnion(types);
};

/**
 * Join the variables of several control-flow paths. Each name takes the
 * union of its types on the paths that define it; identical resolutions
 * are kept as they are.
 */
export const joinVariableTypes = (
  paths: readonly ReadonlyMap<string, TypeResolution>[]
): Map<string, TypeResolution> => {
  const names = new Set<string>();
  for (const path of paths) {
    for (const name of path.keys()) {
      names.add(name);
    }
  }

  const joined = new Map<string, TypeResolution>();
  for (const name of names) {
    const types = paths
      .map((path) => path.get(name))
      .filter((type): type is TypeResolution => type !== undefined);
    if (types.length > 0) {
      joined.set(name, joinTypes(types));
    }
  }
  return joined;
};
