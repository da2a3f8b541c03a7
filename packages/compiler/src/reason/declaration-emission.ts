import type { Decl } from "@rebind/core/model.js";

import { lowercaseFirst, normalizeIdentifier } from "./common.js";
import { resolveConstructorType } from "./constructor.js";
import { encodeType } from "./type-encoding.js";
import { classDeclaration, moduleDeclaration, variableDeclaration } from "./write.js";

export const UNSUPPORTED_DECLARATION_MARKER = "/* rebind: unsupported declaration */";

export function emitDecl(decl: Decl, moduleId: string): string {
  switch (decl.kind) {
    case "var":
    case "func":
      return variableDeclaration(normalizeIdentifier(decl.name), moduleId, encodeType(decl.type), false);
    case "exports":
      return variableDeclaration(moduleId, moduleId, encodeType(decl.type), true);
    case "module": {
      const childModuleId = normalizeIdentifier(decl.name);
      return moduleDeclaration(
        decl.name,
        decl.statements.map((s) => emitDecl(s, childModuleId))
      );
    }
    case "type":
      // Emitted entirely as precode.
      return "";
    case "class":
      return classDeclaration(
        lowercaseFirst(decl.name),
        decl.name,
        moduleId,
        encodeType(decl.type),
        resolveConstructorType(decl.name, decl.type)
      );
    case "unknown":
      return UNSUPPORTED_DECLARATION_MARKER;
  }
}
