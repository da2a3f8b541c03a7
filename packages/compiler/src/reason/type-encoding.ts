import type { Type } from "@rebind/core/model.js";

import { lowercaseFirst, normalizeIdentifier } from "./common.js";
import { typeName } from "./naming.js";
import { functionType, objectType, tupleType } from "./write.js";

export const UNTRANSLATABLE_MARKER = "__UNTRANSLATABLE__";

export function encodeType(type: Type): string {
  switch (type.kind) {
    case "number":
      return "float";
    case "string":
      return "string";
    case "boolean":
      return "bool";
    case "unit":
      return "unit";
    case "null":
      return "Js.Null.t(unit)";
    case "regex":
      return "Js.Re.t";
    case "any":
      return "'a";
    case "unknown":
      return UNTRANSLATABLE_MARKER;
    case "dict":
      return `Js.Dict.t(${encodeType(type.value)})`;
    case "array":
      return `array(${encodeType(type.element)})`;
    case "tuple":
      return tupleType(type.elements.map(encodeType));
    case "object":
      return objectType(type.fields.map((f) => ({ name: f.name, type: encodeType(f.type), method: false })));
    case "function":
      return functionType(
        type.params.map((p) => ({ name: normalizeIdentifier(p.name), type: encodeType(p.type) })),
        type.params.some((p) => p.type.kind === "optional"),
        encodeType(type.ret)
      );
    case "class":
      return objectType(
        type.fields
          .filter((f) => f.name !== "constructor")
          .map((f) => ({ name: f.name, type: encodeType(f.type), method: f.type.kind === "function" }))
      );
    case "named":
      return lowercaseFirst(type.name);
    case "union":
      return typeName(type);
    case "optional":
      return `${encodeType(type.inner)}=?`;
  }
}
