/**
 * Built-in global functions and platform type names
 */

import {
  inferred,
  platformType,
  primitiveType,
  specialType,
  unknown,
  type GlobalFunctionParameter,
  type GlobalFunctionType,
  type TypeResolution,
} from "./types/resolution.js";

const param = (name: string, optional = false): GlobalFunctionParameter => ({
  name,
  optional,
});

const globalFunction = (
  name: string,
  englishName: string,
  parameters: readonly GlobalFunctionParameter[],
  returnType: TypeResolution | undefined,
  options: { readonly pure?: boolean; readonly polymorphic?: boolean } = {}
): GlobalFunctionType => ({
  kind: "globalFunction",
  name,
  englishName,
  parameters,
  returnType,
  pure: options.pure ?? true,
  polymorphic: options.polymorphic ?? false,
  contextRequired: [],
});

const GLOBAL_FUNCTIONS: readonly GlobalFunctionType[] = [
  globalFunction("Строка", "String", [param("Значение")], primitiveType("String")),
  globalFunction("Число", "Number", [param("Значение")], primitiveType("Number")),
  globalFunction("Булево", "Boolean", [param("Значение")], primitiveType("Boolean")),
  globalFunction(
    "Дата",
    "Date",
    [
      param("Год"),
      param("Месяц", true),
      param("День", true),
      param("Час", true),
      param("Минута", true),
      param("Секунда", true),
    ],
    primitiveType("Date")
  ),
  globalFunction("ТипЗнч", "TypeOf", [param("Значение")], specialType("Type")),
  globalFunction("Тип", "Type", [param("ИмяТипа")], specialType("Type")),
  globalFunction("СтрДлина", "StrLen", [param("Строка")], primitiveType("Number")),
  globalFunction(
    "Мин",
    "Min",
    [param("Значение1"), param("Значение2", true)],
    undefined,
    { polymorphic: true }
  ),
  globalFunction(
    "Макс",
    "Max",
    [param("Значение1"), param("Значение2", true)],
    undefined,
    { polymorphic: true }
  ),
  globalFunction(
    "Формат",
    "Format",
    [param("Значение"), param("ФорматнаяСтрока", true)],
    primitiveType("String")
  ),
  globalFunction("ТекущаяДата", "CurrentDate", [], primitiveType("Date"), {
    pure: false,
  }),
  globalFunction(
    "Сообщить",
    "Message",
    [param("ТекстСообщения"), param("Статус", true)],
    undefined,
    { pure: false }
  ),
];

const GLOBAL_FUNCTION_INDEX: ReadonlyMap<string, GlobalFunctionType> = new Map(
  GLOBAL_FUNCTIONS.flatMap((fn) => [
    [fn.name.toLowerCase(), fn],
    [fn.englishName.toLowerCase(), fn],
  ])
);

export const lookupGlobalFunction = (
  name: string
): GlobalFunctionType | undefined =>
  GLOBAL_FUNCTION_INDEX.get(name.toLowerCase());

export const globalFunctions = (): readonly GlobalFunctionType[] =>
  GLOBAL_FUNCTIONS;

/**
 * Return type of a call to a built-in function. Polymorphic `Мин`/`Макс`
 * follow the type of their first argument.
 */
export const resolveGlobalReturnType = (
  fn: GlobalFunctionType,
  args: readonly TypeResolution[]
): TypeResolution => {
  if (!fn.polymorphic) {
    return fn.returnType ?? unknown();
  }

  const first = args[0];
  if (!first) {
    return unknown();
  }
  const result = first.result;
  if (result.kind === "concrete" && result.type.kind === "primitive") {
    return primitiveType(result.type.primitive);
  }
  return inferred(0.5, result);
};

const PLATFORM_TYPE_NAMES: ReadonlyMap<string, string> = new Map([
  ["массив", "Массив"],
  ["array", "Массив"],
  ["соответствие", "Соответствие"],
  ["map", "Соответствие"],
  ["структура", "Структура"],
  ["structure", "Структура"],
  ["таблицазначений", "ТаблицаЗначений"],
  ["valuetable", "ТаблицаЗначений"],
]);

/**
 * Canonical Russian name of a known platform type, e.g. `Array` → `Массив`
 */
export const canonicalPlatformTypeName = (name: string): string | undefined =>
  PLATFORM_TYPE_NAMES.get(name.toLowerCase());

/**
 * Resolution for `Новый <Имя>`; names outside the table stay unknown
 */
export const resolveConstructedType = (typeName: string): TypeResolution => {
  const canonical = canonicalPlatformTypeName(typeName);
  return canonical ? platformType(canonical) : unknown();
};
