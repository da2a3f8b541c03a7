#!/usr/bin/env -S node --import tsx
import { realpathSync } from "node:fs";
import { argv, cwd, exit } from "node:process";
import { pathToFileURL } from "node:url";

import { TranslateError } from "@rebind/compiler";

import { runDts } from "./internal/commands/dts.js";
import { runInit } from "./internal/commands/init.js";
import { runTranslate } from "./internal/commands/translate.js";

export type Cmd = "init" | "translate" | "dts" | "help";

function usage(): void {
  console.log(
    [
      "rebind",
      "",
      "Usage:",
      "  rebind init",
      "  rebind translate --model <model.json> [--out <dir>] [--quiet]",
      "  rebind dts --input <file.d.ts> [--out <dir>] [--quiet]",
      "",
    ].join("\n")
  );
}

export function parseCommand(args: readonly string[]): Cmd {
  const [cmd] = args;
  if (!cmd) return "help";
  if (cmd === "init" || cmd === "translate" || cmd === "dts" || cmd === "help") return cmd;
  return "help";
}

export function formatCliError(err: unknown): string {
  if (err instanceof TranslateError) return `${err.code}: ${err.message}`;
  return err instanceof Error ? err.message : String(err);
}

async function main(): Promise<void> {
  try {
    const cmd = parseCommand(argv.slice(2));
    switch (cmd) {
      case "init": {
        const path = await runInit({ dir: cwd() });
        console.log(`wrote ${path}`);
        return;
      }
      case "translate":
        await runTranslate({ dir: cwd(), argv: argv.slice(3) });
        return;
      case "dts":
        await runDts({ dir: cwd(), argv: argv.slice(3) });
        return;
      case "help":
        usage();
        return;
    }
  } catch (err: unknown) {
    console.error(formatCliError(err));
    exit(1);
  }
}

const entry = argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  void main();
}
