import { basename, resolve } from "node:path";

import { readDtsFile, type SkipIssue } from "@rebind/dts";

import { writeTranslation, type OutputLog } from "../output.js";

export type DtsArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
};

export type DtsParsed = {
  readonly inputPath: string;
  readonly outDir?: string;
  readonly quiet: boolean;
};

export function parseDtsArgs(args: DtsArgs): DtsParsed {
  let inputPath: string | undefined;
  let outDir: string | undefined;
  let quiet = false;

  const it = args.argv[Symbol.iterator]();
  while (true) {
    const next = it.next();
    if (next.done) break;
    const a = next.value;
    switch (a) {
      case "--input": {
        const v = it.next();
        if (v.done) throw new Error("dts: --input requires a value");
        inputPath = resolve(args.dir, v.value);
        break;
      }
      case "--out": {
        const v = it.next();
        if (v.done) throw new Error("dts: --out requires a value");
        outDir = v.value;
        break;
      }
      case "--quiet":
        quiet = true;
        break;
      case "--help":
      case "-h":
        throw new Error("Usage: rebind dts --input <file.d.ts> [--out <dir>] [--quiet]");
      default:
        throw new Error(`dts: unknown arg: ${a}`);
    }
  }

  if (!inputPath) {
    throw new Error("dts: missing required --input <file.d.ts>");
  }

  return { inputPath, ...(outDir ? { outDir } : {}), quiet };
}

export function formatSkipIssue(issue: SkipIssue): string {
  return `warning: ${issue.file}: ${issue.reason} (${issue.snippet})`;
}

export async function runDts(
  args: DtsArgs,
  deps?: { readonly log?: OutputLog; readonly warn?: OutputLog }
): Promise<string | undefined> {
  const parsed = parseDtsArgs(args);
  const { root, issues } = readDtsFile(parsed.inputPath);
  const warn = deps?.warn ?? console.error;
  for (const issue of issues) warn(formatSkipIssue(issue));
  return writeTranslation(
    {
      dir: args.dir,
      root,
      fallbackName: basename(parsed.inputPath).replace(/\.d\.[cm]?ts$/, ""),
      ...(parsed.outDir ? { outDir: parsed.outDir } : {}),
      quiet: parsed.quiet,
    },
    deps?.log ?? console.log
  );
}
