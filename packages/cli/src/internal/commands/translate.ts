import { basename, resolve } from "node:path";

import { loadModelFile } from "@rebind/core/model-json.js";

import { writeTranslation, type OutputLog } from "../output.js";

export type TranslateArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
};

export type TranslateParsed = {
  readonly modelPath: string;
  readonly outDir?: string;
  readonly quiet: boolean;
};

export function parseTranslateArgs(args: TranslateArgs): TranslateParsed {
  let modelPath: string | undefined;
  let outDir: string | undefined;
  let quiet = false;

  const it = args.argv[Symbol.iterator]();
  while (true) {
    const next = it.next();
    if (next.done) break;
    const a = next.value;
    switch (a) {
      case "--model": {
        const v = it.next();
        if (v.done) throw new Error("translate: --model requires a value");
        modelPath = resolve(args.dir, v.value);
        break;
      }
      case "--out": {
        const v = it.next();
        if (v.done) throw new Error("translate: --out requires a value");
        outDir = v.value;
        break;
      }
      case "--quiet":
        quiet = true;
        break;
      case "--help":
      case "-h":
        throw new Error("Usage: rebind translate --model <model.json> [--out <dir>] [--quiet]");
      default:
        throw new Error(`translate: unknown arg: ${a}`);
    }
  }

  if (!modelPath) {
    throw new Error("translate: missing required --model <model.json>");
  }

  return { modelPath, ...(outDir ? { outDir } : {}), quiet };
}

export async function runTranslate(
  args: TranslateArgs,
  deps?: { readonly log?: OutputLog }
): Promise<string | undefined> {
  const parsed = parseTranslateArgs(args);
  const root = loadModelFile(parsed.modelPath);
  return writeTranslation(
    {
      dir: args.dir,
      root,
      fallbackName: basename(parsed.modelPath).replace(/\.json$/, ""),
      ...(parsed.outDir ? { outDir: parsed.outDir } : {}),
      quiet: parsed.quiet,
    },
    deps?.log ?? console.log
  );
}
