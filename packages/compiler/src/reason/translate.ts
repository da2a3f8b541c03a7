import type { Decl } from "@rebind/core/model.js";

import { normalizeIdentifier } from "./common.js";
import { emitDecl } from "./declaration-emission.js";
import { renderPrecode, type PrecodeOptions } from "./precode.js";
import type { Artifact } from "./write.js";

export type TranslateOptions = PrecodeOptions;

/**
 * Translates a root declaration into one artifact.
 *
 * Only modules and bare type aliases produce output; any other root yields
 * `undefined`. Throws `TranslateError` when a class type is named
 * structurally or a constructor is requested for a non-class type.
 */
export function translate(root: Decl, options: TranslateOptions = {}): Artifact | undefined {
  switch (root.kind) {
    case "module": {
      const moduleId = normalizeIdentifier(root.name);
      const body = root.statements.map((s) => emitDecl(s, moduleId));
      return { name: moduleId, text: renderPrecode(root, options) + "\n" + body.join("\n") };
    }
    case "type":
      return { name: "", text: renderPrecode(root, options) + emitDecl(root, "") };
    default:
      return undefined;
  }
}
