/**
 * Type resolution model
 *
 * A `TypeResolution` is not a type but a statement about what is known of
 * a value's type, with a confidence level attached. All values here are
 * immutable; every helper returns a new value.
 */

export type Certainty =
  | { readonly kind: "known" }
  | { readonly kind: "inferred"; readonly confidence: number }
  | { readonly kind: "unknown" };

export type ResolutionSource =
  | "static"
  | "inferred"
  | "annotated"
  | "runtime"
  | "predicted";

export type FacetKind =
  | "manager"
  | "object"
  | "reference"
  | "metadata"
  | "constructor"
  | "collection"
  | "singleton";

export type ExecutionContext =
  | "server"
  | "client"
  | "thickClient"
  | "webClient"
  | "mobileClient"
  | "externalConnection";

export type PrimitiveKind = "String" | "Number" | "Boolean" | "Date";

export type SpecialKind = "Undefined" | "Null" | "Type";

export type MetadataKind =
  | "Catalog"
  | "Document"
  | "Register"
  | "Report"
  | "DataProcessor"
  | "Enum"
  | "ChartOfAccounts"
  | "ChartOfCharacteristicTypes";

export type MethodParameter = {
  readonly name: string;
  readonly type?: string;
  readonly optional: boolean;
  readonly byValue: boolean;
};

export type PlatformMethod = {
  readonly name: string;
  readonly parameters: readonly MethodParameter[];
  readonly returnType?: string;
  readonly isFunction: boolean;
};

export type PlatformProperty = {
  readonly name: string;
  readonly type: string;
  readonly readonly: boolean;
};

export type Attribute = {
  readonly name: string;
  /** May be composite, e.g. `СправочникСсылка.Контрагенты,Строка(10)` */
  readonly type: string;
  readonly types: readonly string[];
};

export type TabularSection = {
  readonly name: string;
  readonly synonym?: string;
  readonly attributes: readonly Attribute[];
};

export type GlobalFunctionParameter = {
  readonly name: string;
  readonly type?: TypeResolution;
  readonly optional: boolean;
};

export type PlatformType = {
  readonly kind: "platform";
  readonly name: string;
  readonly methods: readonly PlatformMethod[];
  readonly properties: readonly PlatformProperty[];
};

export type ConfigurationType = {
  readonly kind: "configuration";
  readonly metadataKind: MetadataKind;
  readonly name: string;
  readonly attributes: readonly Attribute[];
  readonly tabularSections: readonly TabularSection[];
};

export type PrimitiveType = {
  readonly kind: "primitive";
  readonly primitive: PrimitiveKind;
};

export type SpecialType = {
  readonly kind: "special";
  readonly special: SpecialKind;
};

export type GlobalFunctionType = {
  readonly kind: "globalFunction";
  readonly name: string;
  readonly englishName: string;
  readonly parameters: readonly GlobalFunctionParameter[];
  readonly returnType?: TypeResolution;
  /** No side effects */
  readonly pure: boolean;
  /** Return type depends on the arguments */
  readonly polymorphic: boolean;
  readonly contextRequired: readonly ExecutionContext[];
};

export type ConcreteType =
  | PlatformType
  | ConfigurationType
  | PrimitiveType
  | SpecialType
  | GlobalFunctionType;

export type WeightedType = {
  readonly type: ConcreteType;
  readonly weight: number;
};

export type TypeEffect =
  | { readonly kind: "mayBeNull" }
  | { readonly kind: "requiresTransaction" }
  | { readonly kind: "requiresLock"; readonly lock: string }
  | { readonly kind: "requiresContext"; readonly context: ExecutionContext }
  | { readonly kind: "modifiedByExtension"; readonly extension: string };

export type ResolutionResult =
  | { readonly kind: "concrete"; readonly type: ConcreteType }
  | { readonly kind: "union"; readonly members: readonly WeightedType[] }
  | {
      readonly kind: "conditional";
      readonly condition: string;
      readonly thenResult: ResolutionResult;
      readonly elseResult: ResolutionResult;
    }
  | {
      readonly kind: "contextual";
      readonly base: ResolutionResult;
      readonly effects: readonly TypeEffect[];
      readonly context: ExecutionContext;
    }
  | { readonly kind: "dynamic" };

export type ResolutionMetadata = {
  readonly file?: string;
  readonly line?: number;
  readonly column?: number;
  readonly notes: readonly string[];
};

export type TypeResolution = {
  readonly certainty: Certainty;
  readonly result: ResolutionResult;
  readonly source: ResolutionSource;
  readonly metadata: ResolutionMetadata;
  readonly activeFacet?: FacetKind;
  readonly availableFacets: readonly FacetKind[];
};

// ─── constructors ──────────────────────────────────────────────────

const EMPTY_METADATA: ResolutionMetadata = { notes: [] };

export const KNOWN: Certainty = { kind: "known" };
export const UNKNOWN: Certainty = { kind: "unknown" };

const clampConfidence = (confidence: number): number =>
  Number.isNaN(confidence) ? 0 : Math.min(1, Math.max(0, confidence));

export const inferredCertainty = (confidence: number): Certainty => ({
  kind: "inferred",
  confidence: clampConfidence(confidence),
});

export const DYNAMIC: ResolutionResult = { kind: "dynamic" };

export const concrete = (type: ConcreteType): ResolutionResult => ({
  kind: "concrete",
  type,
});

export const known = (type: ConcreteType): TypeResolution => ({
  certainty: KNOWN,
  result: concrete(type),
  source: "static",
  metadata: EMPTY_METADATA,
  availableFacets: [],
});

export const unknown = (note?: string): TypeResolution => ({
  certainty: UNKNOWN,
  result: DYNAMIC,
  source: "static",
  metadata: note ? { notes: [note] } : EMPTY_METADATA,
  availableFacets: [],
});

/**
 * Inferred resolution; confidence is clamped into [0, 1]
 */
export const inferred = (
  confidence: number,
  result: ResolutionResult
): TypeResolution => ({
  certainty: inferredCertainty(confidence),
  result,
  source: "inferred",
  metadata: EMPTY_METADATA,
  availableFacets: [],
});

export const primitive = (kind: PrimitiveKind): PrimitiveType => ({
  kind: "primitive",
  primitive: kind,
});

export const special = (kind: SpecialKind): SpecialType => ({
  kind: "special",
  special: kind,
});

export const platform = (name: string): PlatformType => ({
  kind: "platform",
  name,
  methods: [],
  properties: [],
});

export const primitiveType = (kind: PrimitiveKind): TypeResolution =>
  known(primitive(kind));

export const specialType = (kind: SpecialKind): TypeResolution =>
  known(special(kind));

export const platformType = (name: string): TypeResolution =>
  known(platform(name));

/**
 * Result type of a routine without a value
 */
export const voidType = (): TypeResolution => ({
  certainty: KNOWN,
  result: DYNAMIC,
  source: "static",
  metadata: { notes: ["Void type (procedure)"] },
  availableFacets: [],
});

export const withNote = (
  resolution: TypeResolution,
  note: string
): TypeResolution => ({
  ...resolution,
  metadata: {
    ...resolution.metadata,
    notes: [...resolution.metadata.notes, note],
  },
});

export const withSource = (
  resolution: TypeResolution,
  source: ResolutionSource
): TypeResolution => ({ ...resolution, source });

// ─── queries ───────────────────────────────────────────────────────

export const isResolved = (resolution: TypeResolution): boolean =>
  resolution.certainty.kind === "known";

export const isUnknown = (resolution: TypeResolution): boolean =>
  resolution.certainty.kind === "unknown";

/**
 * Numeric confidence: 1 for known, 0 for unknown
 */
export const confidenceOf = (certainty: Certainty): number => {
  switch (certainty.kind) {
    case "known":
      return 1;
    case "inferred":
      return certainty.confidence;
    case "unknown":
      return 0;
  }
};

export const concreteTypeOf = (
  resolution: TypeResolution
): ConcreteType | undefined =>
  resolution.certainty.kind !== "unknown" &&
  resolution.result.kind === "concrete"
    ? resolution.result.type
    : undefined;

const isPrimitiveOf = (
  resolution: TypeResolution,
  kind: PrimitiveKind
): boolean => {
  const type = concreteTypeOf(resolution);
  return type?.kind === "primitive" && type.primitive === kind;
};

export const isNumber = (resolution: TypeResolution): boolean =>
  isPrimitiveOf(resolution, "Number");

export const isString = (resolution: TypeResolution): boolean =>
  isPrimitiveOf(resolution, "String");

export const isBoolean = (resolution: TypeResolution): boolean =>
  isPrimitiveOf(resolution, "Boolean");

export const isDate = (resolution: TypeResolution): boolean =>
  isPrimitiveOf(resolution, "Date");

const PRIMITIVE_NAMES: Readonly<Record<PrimitiveKind, string>> = {
  String: "Строка",
  Number: "Число",
  Boolean: "Булево",
  Date: "Дата",
};

const SPECIAL_NAMES: Readonly<Record<SpecialKind, string>> = {
  Undefined: "Неопределено",
  Null: "Null",
  Type: "Тип",
};

export const concreteTypeName = (type: ConcreteType): string => {
  switch (type.kind) {
    case "platform":
    case "configuration":
    case "globalFunction":
      return type.name;
    case "primitive":
      return PRIMITIVE_NAMES[type.primitive];
    case "special":
      return SPECIAL_NAMES[type.special];
  }
};

/**
 * Display name of a concrete resolution. Special types have no name.
 */
export const resolutionName = (
  resolution: TypeResolution
): string | undefined => {
  if (resolution.result.kind !== "concrete") {
    return undefined;
  }
  const type = resolution.result.type;
  return type.kind === "special" ? undefined : concreteTypeName(type);
};

// ─── structural equality ───────────────────────────────────────────

const methodKey = (method: PlatformMethod): string =>
  `${method.name}(${method.parameters
    .map(
      (p) =>
        `${p.byValue ? "val " : ""}${p.name}${p.optional ? "?" : ""}:${p.type ?? ""}`
    )
    .join(",")})${method.isFunction ? `:${method.returnType ?? ""}` : ""}`;

const propertyKey = (property: PlatformProperty): string =>
  `${property.readonly ? "ro " : ""}${property.name}:${property.type}`;

const attributeKey = (attribute: Attribute): string =>
  `${attribute.name}:${attribute.type}`;

/**
 * Stable key for structural comparison of concrete types
 */
export const stableConcreteTypeKey = (type: ConcreteType): string => {
  switch (type.kind) {
    case "primitive":
      return `prim:${type.primitive}`;
    case "special":
      return `special:${type.special}`;
    case "platform":
      return `platform:${type.name}:${type.methods
        .map(methodKey)
        .join("|")}:${type.properties.map(propertyKey).join("|")}`;
    case "configuration":
      return `config:${type.metadataKind}:${type.name}:${type.attributes
        .map(attributeKey)
        .join("|")}:${type.tabularSections
        .map(
          (section) =>
            `${section.name}[${section.attributes.map(attributeKey).join("|")}]`
        )
        .join("|")}`;
    case "globalFunction":
      return `fn:${type.name}/${type.englishName}:${type.parameters
        .map((p) => `${p.name}${p.optional ? "?" : ""}`)
        .join(",")}:${type.polymorphic ? "poly" : "mono"}`;
  }
};

export const concreteTypesEqual = (
  left: ConcreteType,
  right: ConcreteType
): boolean => stableConcreteTypeKey(left) === stableConcreteTypeKey(right);

// ─── formatting ────────────────────────────────────────────────────

const formatResult = (result: ResolutionResult): string => {
  switch (result.kind) {
    case "concrete":
      return concreteTypeName(result.type);
    case "union":
      return result.members.map((m) => concreteTypeName(m.type)).join(" | ");
    case "conditional":
      return `${formatResult(result.thenResult)} | ${formatResult(result.elseResult)}`;
    case "contextual":
      return formatResult(result.base);
    case "dynamic":
      return "Произвольный";
  }
};

const formatCertainty = (certainty: Certainty): string => {
  switch (certainty.kind) {
    case "known":
      return "known";
    case "inferred":
      return `inferred ${certainty.confidence.toFixed(2)}`;
    case "unknown":
      return "unknown";
  }
};

/**
 * Human-readable rendering, e.g. `Строка | Число [inferred 0.90]`
 */
export const formatResolution = (resolution: TypeResolution): string =>
  `${formatResult(resolution.result)} [${formatCertainty(resolution.certainty)}]`;
