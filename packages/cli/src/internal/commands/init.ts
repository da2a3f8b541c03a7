import { existsSync, mkdirSync } from "node:fs";
import { join, resolve } from "node:path";

import { CONFIG_FILE_NAME, writeRebindConfig, type RebindConfig } from "../config.js";

export type InitArgs = {
  readonly dir: string;
};

export async function runInit(args: InitArgs): Promise<string> {
  const root = resolve(args.dir);
  const path = join(root, CONFIG_FILE_NAME);
  if (existsSync(path)) {
    throw new Error(`init: ${CONFIG_FILE_NAME} already exists in ${root}.`);
  }

  const config: RebindConfig = {
    schema: 1,
    outDir: "bindings",
    header: ["/* Generated by rebind. Do not edit. */"],
    hoistReturnUnions: false,
  };
  mkdirSync(root, { recursive: true });
  writeRebindConfig(path, config);
  return path;
}
