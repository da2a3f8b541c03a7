import { readFileSync } from "node:fs";
import { basename } from "node:path";

import type { Decl, Field, Type } from "./model.js";
import { isPrimitiveKind } from "./model.js";

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
  if (typeof value !== "string") {
    throw new Error(`${label} must be a string.`);
  }
  return value;
}

function asArray(value: unknown, label: string): readonly unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`${label} must be an array.`);
  }
  return value;
}

function asKind(root: Record<string, unknown>, label: string): string {
  const kind = root.kind;
  if (typeof kind !== "string" || kind.length === 0) {
    throw new Error(`${label}: 'kind' must be a non-empty string.`);
  }
  return kind;
}

function decodeFields(value: unknown, label: string, unique: boolean): readonly Field[] {
  const seen = new Set<string>();
  return asArray(value, label).map((entry, i) => {
    const entryLabel = `${label}[${i}]`;
    const raw = asRecord(entry, entryLabel);
    assertKnownKeys(raw, ["name", "type"], entryLabel);
    const name = asString(raw.name, `${entryLabel}.name`);
    if (unique && seen.has(name)) {
      throw new Error(`${entryLabel}: duplicate field '${name}'.`);
    }
    seen.add(name);
    return { name, type: decodeType(raw.type, `${entryLabel}.type`) };
  });
}

export function decodeType(value: unknown, label: string): Type {
  const raw = asRecord(value, label);
  const kind = asKind(raw, label);

  if (isPrimitiveKind(kind)) {
    assertKnownKeys(raw, ["kind"], label);
    return { kind };
  }

  switch (kind) {
    case "dict":
      assertKnownKeys(raw, ["kind", "value"], label);
      return { kind, value: decodeType(raw.value, `${label}.value`) };
    case "array":
      assertKnownKeys(raw, ["kind", "element"], label);
      return { kind, element: decodeType(raw.element, `${label}.element`) };
    case "tuple": {
      assertKnownKeys(raw, ["kind", "elements"], label);
      const elements = asArray(raw.elements, `${label}.elements`).map((e, i) =>
        decodeType(e, `${label}.elements[${i}]`)
      );
      return { kind, elements };
    }
    case "object":
    case "class":
      assertKnownKeys(raw, ["kind", "fields"], label);
      // Classes may repeat `constructor`; object field names are unique.
      return { kind, fields: decodeFields(raw.fields, `${label}.fields`, kind === "object") };
    case "function":
      assertKnownKeys(raw, ["kind", "params", "ret"], label);
      return {
        kind,
        params: decodeFields(raw.params, `${label}.params`, false),
        ret: decodeType(raw.ret, `${label}.ret`),
      };
    case "named":
      assertKnownKeys(raw, ["kind", "name"], label);
      return { kind, name: asString(raw.name, `${label}.name`) };
    case "union": {
      assertKnownKeys(raw, ["kind", "members"], label);
      const members = asArray(raw.members, `${label}.members`).map((m, i) =>
        decodeType(m, `${label}.members[${i}]`)
      );
      const [first, ...rest] = members;
      if (!first) {
        throw new Error(`${label}.members must not be empty.`);
      }
      return { kind, members: [first, ...rest] };
    }
    case "optional":
      assertKnownKeys(raw, ["kind", "inner"], label);
      return { kind, inner: decodeType(raw.inner, `${label}.inner`) };
    default:
      throw new Error(`${label}: unknown type kind '${kind}'.`);
  }
}

export function decodeDecl(value: unknown, label: string): Decl {
  const raw = asRecord(value, label);
  const kind = asKind(raw, label);

  switch (kind) {
    case "var":
    case "func":
    case "type":
      assertKnownKeys(raw, ["kind", "name", "type"], label);
      return { kind, name: asString(raw.name, `${label}.name`), type: decodeType(raw.type, `${label}.type`) };
    case "class": {
      assertKnownKeys(raw, ["kind", "name", "type"], label);
      const type = decodeType(raw.type, `${label}.type`);
      if (type.kind !== "class") {
        throw new Error(`${label}.type must be a class type.`);
      }
      return { kind, name: asString(raw.name, `${label}.name`), type };
    }
    case "exports":
      assertKnownKeys(raw, ["kind", "type"], label);
      return { kind, type: decodeType(raw.type, `${label}.type`) };
    case "module": {
      assertKnownKeys(raw, ["kind", "name", "statements"], label);
      const statements = asArray(raw.statements, `${label}.statements`).map((s, i) =>
        decodeDecl(s, `${label}.statements[${i}]`)
      );
      return { kind, name: asString(raw.name, `${label}.name`), statements };
    }
    case "unknown":
      assertKnownKeys(raw, ["kind"], label);
      return { kind };
    default:
      throw new Error(`${label}: unknown declaration kind '${kind}'.`);
  }
}

export function loadModelFile(path: string): Decl {
  const raw = readFileSync(path, "utf-8");
  return decodeDecl(JSON.parse(raw) as unknown, basename(path));
}
