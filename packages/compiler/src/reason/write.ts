import { capitalize } from "./common.js";

export type EncodedField = {
  readonly name: string;
  readonly type: string;
  readonly method: boolean;
};

export type EncodedParam = {
  readonly name: string;
  readonly type: string;
};

export type EncodedVariant = {
  readonly name: string;
  readonly payload: string;
};

export type Artifact = {
  readonly name: string;
  readonly text: string;
};

function indentLines(text: string, indent: string): string[] {
  return text.split("\n").map((line) => (line.length === 0 ? line : `${indent}${line}`));
}

export function objectType(fields: readonly EncodedField[]): string {
  if (fields.length === 0) return "{.}";
  const members = fields.map((f) => `${f.method ? "[@bs.meth] " : ""}${JSON.stringify(f.name)}: ${f.type}`);
  return `{. ${members.join(", ")}}`;
}

export function tupleType(members: readonly string[]): string {
  return `(${members.join(", ")})`;
}

export function functionType(params: readonly EncodedParam[], hasOptionalParam: boolean, ret: string): string {
  if (hasOptionalParam) {
    // Labelled form: optional arguments need a trailing positional unit to be omittable.
    const labelled = params.map((p) => `~${p.name}: ${p.type}`);
    return `(${[...labelled, "unit"].join(", ")}) => ${ret}`;
  }
  if (params.length === 0) return `(unit) => ${ret}`;
  return `(${params.map((p) => p.type).join(", ")}) => ${ret}`;
}

export function typeAliasDeclaration(name: string, type: string): string {
  return `type ${name} = ${type};`;
}

export function variantAliasDeclaration(name: string, variants: readonly EncodedVariant[]): string {
  const lines = variants.map((v) => `  | ${v.name}(${v.payload})`);
  return [`type ${name} =`, ...lines].join("\n") + ";";
}

export function variableDeclaration(
  name: string,
  moduleId: string,
  type: string,
  isDefaultExport: boolean
): string {
  if (isDefaultExport) {
    return `[@bs.module] external ${name}: ${type} = ${JSON.stringify(moduleId)};`;
  }
  return `[@bs.module ${JSON.stringify(moduleId)}] external ${name}: ${type} = ${JSON.stringify(name)};`;
}

export function moduleDeclaration(name: string, children: readonly string[]): string {
  const out: string[] = [`module ${name} = {`];
  for (const child of children) {
    if (child.length === 0) continue;
    out.push(...indentLines(child, "  "));
  }
  out.push("};");
  return out.join("\n");
}

export function classDeclaration(
  name: string,
  exportedName: string,
  moduleId: string,
  classType: string,
  constructorType: string
): string {
  return [
    typeAliasDeclaration(name, classType),
    `[@bs.new] [@bs.module ${JSON.stringify(moduleId)}] external make${capitalize(name)}: ${constructorType} = ${JSON.stringify(exportedName)};`,
  ].join("\n");
}

export function renderArtifactFile(artifact: Artifact, opts?: { readonly header?: readonly string[] }): string {
  const parts: string[] = [];
  for (const h of opts?.header ?? []) parts.push(h);
  if (parts.length > 0) parts.push("");
  parts.push(artifact.text.replace(/\n+$/, ""));
  parts.push("");
  return parts.join("\n");
}
