// @rebind/core/model.js
// The language-neutral declaration model consumed by the translator.

export type Field = {
  readonly name: string;
  readonly type: Type;
};

export type Param = {
  readonly name: string;
  readonly type: Type;
};

export type PrimitiveKind = "number" | "string" | "boolean" | "unit" | "null" | "any" | "unknown" | "regex";

export type Type =
  | { readonly kind: PrimitiveKind }
  | { readonly kind: "dict"; readonly value: Type }
  | { readonly kind: "array"; readonly element: Type }
  | { readonly kind: "tuple"; readonly elements: readonly Type[] }
  | { readonly kind: "object"; readonly fields: readonly Field[] }
  | { readonly kind: "class"; readonly fields: readonly Field[] }
  | { readonly kind: "function"; readonly params: readonly Param[]; readonly ret: Type }
  | { readonly kind: "named"; readonly name: string }
  | { readonly kind: "union"; readonly members: readonly [Type, ...Type[]] }
  | { readonly kind: "optional"; readonly inner: Type };

export type ClassType = Extract<Type, { readonly kind: "class" }>;
export type FunctionType = Extract<Type, { readonly kind: "function" }>;
export type UnionType = Extract<Type, { readonly kind: "union" }>;

export type Decl =
  | { readonly kind: "var"; readonly name: string; readonly type: Type }
  | { readonly kind: "func"; readonly name: string; readonly type: Type }
  | { readonly kind: "type"; readonly name: string; readonly type: Type }
  | { readonly kind: "class"; readonly name: string; readonly type: Type }
  | { readonly kind: "exports"; readonly type: Type }
  | { readonly kind: "module"; readonly name: string; readonly statements: readonly Decl[] }
  | { readonly kind: "unknown" };

export type ModuleDecl = Extract<Decl, { readonly kind: "module" }>;

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
  "number",
  "string",
  "boolean",
  "unit",
  "null",
  "any",
  "unknown",
  "regex",
];

export function isPrimitiveKind(kind: string): kind is PrimitiveKind {
  return (PRIMITIVE_KINDS as readonly string[]).includes(kind);
}

export function numberType(): Type {
  return { kind: "number" };
}

export function stringType(): Type {
  return { kind: "string" };
}

export function booleanType(): Type {
  return { kind: "boolean" };
}

export function unitType(): Type {
  return { kind: "unit" };
}

export function nullType(): Type {
  return { kind: "null" };
}

export function anyType(): Type {
  return { kind: "any" };
}

export function unknownType(): Type {
  return { kind: "unknown" };
}

export function regexType(): Type {
  return { kind: "regex" };
}

export function dictType(value: Type): Type {
  return { kind: "dict", value };
}

export function arrayType(element: Type): Type {
  return { kind: "array", element };
}

export function tupleType(elements: readonly Type[]): Type {
  return { kind: "tuple", elements };
}

export function objectType(fields: readonly Field[]): Type {
  return { kind: "object", fields };
}

export function classType(fields: readonly Field[]): ClassType {
  return { kind: "class", fields };
}

export function functionType(params: readonly Param[], ret: Type): FunctionType {
  return { kind: "function", params, ret };
}

export function namedType(name: string): Type {
  return { kind: "named", name };
}

export function unionType(members: readonly [Type, ...Type[]]): UnionType {
  return { kind: "union", members };
}

export function optionalType(inner: Type): Type {
  return { kind: "optional", inner };
}

export function field(name: string, type: Type): Field {
  return { name, type };
}

export function varDecl(name: string, type: Type): Decl {
  return { kind: "var", name, type };
}

export function funcDecl(name: string, type: Type): Decl {
  return { kind: "func", name, type };
}

export function typeDecl(name: string, type: Type): Decl {
  return { kind: "type", name, type };
}

export function classDecl(name: string, type: ClassType): Decl {
  return { kind: "class", name, type };
}

export function exportsDecl(type: Type): Decl {
  return { kind: "exports", type };
}

export function moduleDecl(name: string, statements: readonly Decl[]): ModuleDecl {
  return { kind: "module", name, statements };
}

export function unknownDecl(): Decl {
  return { kind: "unknown" };
}
