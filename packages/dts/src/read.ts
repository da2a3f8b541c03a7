import ts from "typescript";
import { readFileSync } from "node:fs";
import { basename } from "node:path";

import type { Decl } from "@rebind/core/model.js";
import { moduleDecl } from "@rebind/core/model.js";

import type { ExtractCtx, SkipIssue } from "./pipeline/common.js";
import { moduleToDecl, statementsToDecls } from "./pipeline/extract.js";

export type { SkipIssue } from "./pipeline/common.js";

export type DtsReadResult = {
  readonly root: Decl;
  readonly issues: readonly SkipIssue[];
};

function fileStem(fileName: string): string {
  return basename(fileName).replace(/\.d\.[cm]?ts$/, "").replace(/\.[^.]+$/, "");
}

/**
 * Reads declarations from `.d.ts` source text.
 *
 * A file holding exactly one `declare module "x"` yields that module; any
 * other file is wrapped in a module named after the file.
 */
export function readDtsSource(fileName: string, text: string): DtsReadResult {
  const sourceFile = ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  const ctx: ExtractCtx = { sourceFile, issues: [] };

  const [only] = sourceFile.statements;
  if (
    sourceFile.statements.length === 1 &&
    only &&
    ts.isModuleDeclaration(only) &&
    ts.isStringLiteral(only.name)
  ) {
    return { root: moduleToDecl(only, ctx), issues: ctx.issues };
  }

  const root = moduleDecl(JSON.stringify(fileStem(fileName)), statementsToDecls(sourceFile.statements, ctx));
  return { root, issues: ctx.issues };
}

export function readDtsFile(path: string): DtsReadResult {
  return readDtsSource(path, readFileSync(path, "utf-8"));
}
