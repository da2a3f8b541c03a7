import type { Type } from "@rebind/core/model.js";

import { lowercaseFirst } from "./common.js";
import { TranslateError } from "./diagnostics.js";

/**
 * Derives an identifier from a type's shape.
 *
 * The same name is used for a hoisted union alias and at every site that
 * references it, so both must come from this function.
 */
export function typeName(type: Type): string {
  switch (type.kind) {
    case "number":
    case "string":
    case "unit":
    case "null":
    case "any":
    case "unknown":
    case "regex":
      return type.kind;
    case "boolean":
      return "bool";
    case "dict":
      return `dict_${typeName(type.value)}`;
    case "array":
      return `array_${typeName(type.element)}`;
    case "tuple":
      return `tuple_of_${type.elements.map(typeName).join("_")}`;
    case "object":
      return "object";
    case "function":
      return "func";
    case "named":
      return lowercaseFirst(type.name);
    case "union":
      return type.members.map(typeName).join("_or_");
    case "optional":
      return "";
    case "class":
      throw new TranslateError("RBD1001", "Class types have no structural name; reference them through their declaration.");
  }
}
