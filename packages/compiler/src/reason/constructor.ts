import type { Type } from "@rebind/core/model.js";
import { functionType, namedType, unitType } from "@rebind/core/model.js";

import { TranslateError } from "./diagnostics.js";
import { encodeType } from "./type-encoding.js";

export function constructorTypeOf(identifier: string, type: Type): Type {
  if (type.kind !== "class") {
    throw new TranslateError("RBD1002", `Cannot resolve a constructor for '${identifier}': expected a class type, got '${type.kind}'.`);
  }
  // First match wins when a class lists several constructors.
  const declared = type.fields.find((f) => f.name === "constructor");
  if (declared) return declared.type;
  return functionType([{ name: "", type: unitType() }], namedType(identifier));
}

export function resolveConstructorType(identifier: string, type: Type): string {
  return encodeType(constructorTypeOf(identifier, type));
}
