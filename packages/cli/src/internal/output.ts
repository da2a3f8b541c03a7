import { mkdirSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";

import type { Decl } from "@rebind/core/model.js";
import { normalizeIdentifier, renderArtifactFile, translate } from "@rebind/compiler";

import { loadProjectContext } from "./config.js";

export type OutputLog = (line: string) => void;

export type WriteTranslationInput = {
  readonly dir: string;
  readonly root: Decl;
  // Used when the artifact has no name of its own (a bare type alias root).
  readonly fallbackName: string;
  readonly outDir?: string;
  readonly quiet: boolean;
};

export function writeTranslation(input: WriteTranslationInput, log: OutputLog): string | undefined {
  const ctx = loadProjectContext(input.dir);
  const artifact = translate(input.root, { hoistReturnUnions: ctx.config.hoistReturnUnions ?? false });
  if (!artifact) {
    log("nothing to translate");
    return undefined;
  }

  const outDir = input.outDir ? resolve(input.dir, input.outDir) : ctx.outDir;
  mkdirSync(outDir, { recursive: true });
  const name = artifact.name.length > 0 ? artifact.name : normalizeIdentifier(input.fallbackName);
  const path = join(outDir, `${name}.re`);
  writeFileSync(path, renderArtifactFile(artifact, { header: ctx.config.header ?? [] }), "utf-8");
  if (!input.quiet) log(`wrote ${path}`);
  return path;
}
