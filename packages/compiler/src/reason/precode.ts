import type { Decl, Type } from "@rebind/core/model.js";

import { capitalize, dedupe, lowercaseFirst } from "./common.js";
import { typeName } from "./naming.js";
import { encodeType } from "./type-encoding.js";
import { typeAliasDeclaration, variantAliasDeclaration } from "./write.js";

export type PrecodeOptions = {
  /**
   * Also hoist unions that appear in function return positions.
   *
   * Off by default: return-only unions are referenced by name but never
   * declared, and existing outputs depend on that.
   */
  readonly hoistReturnUnions?: boolean;
};

export function typePrecode(type: Type, options: PrecodeOptions = {}): readonly string[] {
  const visit = (t: Type): readonly string[] => typePrecode(t, options);

  switch (type.kind) {
    case "union": {
      // Members are not visited: a union yields exactly its own alias.
      const variants = type.members.map((m) => ({ name: capitalize(typeName(m)), payload: encodeType(m) }));
      return [variantAliasDeclaration(typeName(type), variants)];
    }
    case "function": {
      const fromParams = type.params.flatMap((p) => visit(p.type));
      return options.hoistReturnUnions ? [...fromParams, ...visit(type.ret)] : fromParams;
    }
    case "object":
    case "class":
      return type.fields.flatMap((f) => visit(f.type));
    case "optional":
      return visit(type.inner);
    case "array":
      return visit(type.element);
    case "dict":
      return visit(type.value);
    case "number":
    case "string":
    case "boolean":
    case "unit":
    case "null":
    case "any":
    case "unknown":
    case "regex":
    case "named":
    case "tuple":
      return [];
  }
}

export function declPrecode(decl: Decl, options: PrecodeOptions = {}): readonly string[] {
  switch (decl.kind) {
    case "type":
      return [
        typeAliasDeclaration(lowercaseFirst(decl.name), encodeType(decl.type)),
        ...typePrecode(decl.type, options),
      ];
    case "var":
    case "func":
    case "class":
    case "exports":
      return typePrecode(decl.type, options);
    case "module":
      return decl.statements.flatMap((s) => declPrecode(s, options));
    case "unknown":
      return [];
  }
}

export function renderPrecode(decl: Decl, options: PrecodeOptions = {}): string {
  return dedupe(declPrecode(decl, options)).join("\n");
}
