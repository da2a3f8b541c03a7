import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

export const CONFIG_FILE_NAME = "rebind.json";

export type RebindConfig = {
  readonly schema: 1;
  readonly outDir: string;
  readonly header?: readonly string[];
  readonly hoistReturnUnions?: boolean;
};

export type ProjectContext = {
  // Undefined when no rebind.json was found; `config` then holds defaults.
  readonly projectRoot?: string;
  readonly config: RebindConfig;
  readonly outDir: string;
};

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }
  return value as Record<string, unknown>;
}

function assertKnownKeys(
  value: Record<string, unknown>,
  allowed: readonly string[],
  label: string
): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new Error(`${label}: unknown key '${key}'.`);
    }
  }
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${label} must be a non-empty string.`);
  }
  return value;
}

function asBoolean(value: unknown, label: string): boolean {
  if (typeof value !== "boolean") {
    throw new Error(`${label} must be a boolean.`);
  }
  return value;
}

function asStringArray(value: unknown, label: string): readonly string[] {
  if (!Array.isArray(value) || !value.every((entry) => typeof entry === "string")) {
    throw new Error(`${label} must be an array of strings.`);
  }
  return value;
}

function parseRebindConfig(value: unknown): RebindConfig {
  const root = asRecord(value, CONFIG_FILE_NAME);
  assertKnownKeys(root, ["schema", "outDir", "header", "hoistReturnUnions"], CONFIG_FILE_NAME);

  if (root.schema !== 1) {
    throw new Error(`Unsupported ${CONFIG_FILE_NAME} schema.`);
  }

  const outDir = asString(root.outDir, `${CONFIG_FILE_NAME}: 'outDir'`);
  const header = root.header === undefined ? undefined : asStringArray(root.header, `${CONFIG_FILE_NAME}: 'header'`);
  const hoistReturnUnions =
    root.hoistReturnUnions === undefined
      ? undefined
      : asBoolean(root.hoistReturnUnions, `${CONFIG_FILE_NAME}: 'hoistReturnUnions'`);

  return {
    schema: 1,
    outDir,
    ...(header ? { header } : {}),
    ...(hoistReturnUnions !== undefined ? { hoistReturnUnions } : {}),
  };
}

function readJson(path: string): unknown {
  const raw = readFileSync(path, "utf-8");
  return JSON.parse(raw) as unknown;
}

export function writeRebindConfig(path: string, value: RebindConfig): void {
  writeFileSync(path, JSON.stringify(value, null, 2) + "\n", "utf-8");
}

export function loadRebindConfig(path: string): RebindConfig {
  return parseRebindConfig(readJson(path));
}

export function findProjectRoot(fromDir: string): string | undefined {
  let cur = resolve(fromDir);
  while (true) {
    if (existsSync(join(cur, CONFIG_FILE_NAME))) return cur;
    const parent = dirname(cur);
    if (parent === cur) return undefined;
    cur = parent;
  }
}

export function loadProjectContext(fromDir: string): ProjectContext {
  const projectRoot = findProjectRoot(fromDir);
  if (!projectRoot) {
    return { config: { schema: 1, outDir: "." }, outDir: resolve(fromDir) };
  }
  const config = loadRebindConfig(join(projectRoot, CONFIG_FILE_NAME));
  return { projectRoot, config, outDir: resolve(projectRoot, config.outDir) };
}
