import { expect } from "chai";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  arrayType,
  booleanType,
  classDecl,
  classType,
  dictType,
  exportsDecl,
  field,
  funcDecl,
  functionType,
  moduleDecl,
  namedType,
  nullType,
  numberType,
  objectType,
  optionalType,
  regexType,
  stringType,
  tupleType,
  typeDecl,
  unionType,
  unitType,
  unknownDecl,
  unknownType,
  varDecl,
} from "@rebind/core/model.js";

import { readDtsFile, readDtsSource } from "./read.js";

describe("@rebind/dts reader", () => {
  it("reads a single ambient module with an `export =` default", () => {
    const { root, issues } = readDtsSource(
      "left-pad.d.ts",
      [
        'declare module "left-pad" {',
        "  function leftPad(str: string, len: number, ch?: string | number): string;",
        "  export = leftPad;",
        "}",
        "",
      ].join("\n")
    );
    const fn = functionType(
      [
        { name: "str", type: stringType() },
        { name: "len", type: numberType() },
        { name: "ch", type: optionalType(unionType([stringType(), numberType()])) },
      ],
      stringType()
    );
    expect(root).to.deep.equal(moduleDecl('"left-pad"', [funcDecl("leftPad", fn), exportsDecl(fn)]));
    expect(issues).to.deep.equal([]);
  });

  it("wraps a plain declaration file in a module named after the file", () => {
    const { root, issues } = readDtsSource(
      "/lib/greeter.d.ts",
      [
        "export interface Options { loud?: boolean; tags: string[] }",
        "export declare class Greeter {",
        "  constructor(name: string, options?: Options);",
        "  private secret: string;",
        "  readonly name: string;",
        "  greet(who: string): string;",
        "  greet(who: string, times: number): string;",
        "}",
        "export type Id = string | number;",
        "export declare const version: string;",
        "",
      ].join("\n")
    );
    expect(root).to.deep.equal(
      moduleDecl('"greeter"', [
        typeDecl("Options", objectType([field("loud", booleanType()), field("tags", arrayType(stringType()))])),
        classDecl(
          "Greeter",
          classType([
            field(
              "constructor",
              functionType(
                [
                  { name: "name", type: stringType() },
                  { name: "options", type: optionalType(namedType("Options")) },
                ],
                namedType("Greeter")
              )
            ),
            field("name", stringType()),
            field("greet", functionType([{ name: "who", type: stringType() }], stringType())),
          ])
        ),
        typeDecl("Id", unionType([stringType(), numberType()])),
        varDecl("version", stringType()),
      ])
    );
    expect(issues).to.deep.equal([]);
  });

  it("maps type syntax onto the model", () => {
    const { root } = readDtsSource(
      "types.d.ts",
      [
        "type A = Record<string, number>;",
        "type B = { [key: string]: boolean };",
        "type C = ReadonlyArray<ns.Node>;",
        "type D = [x: number, y: RegExp];",
        "type E = (a: number) => void;",
        "type F = string | null;",
        "type G = (number);",
        "",
      ].join("\n")
    );
    expect(root).to.deep.equal(
      moduleDecl('"types"', [
        typeDecl("A", dictType(numberType())),
        typeDecl("B", dictType(booleanType())),
        typeDecl("C", arrayType(namedType("Node"))),
        typeDecl("D", tupleType([numberType(), regexType()])),
        typeDecl("E", functionType([{ name: "a", type: numberType() }], unitType())),
        typeDecl("F", unionType([stringType(), nullType()])),
        typeDecl("G", numberType()),
      ])
    );
  });

  it("nests dotted namespaces and drops `this` parameters", () => {
    const { root } = readDtsSource(
      "ns.d.ts",
      [
        "declare namespace Outer.Inner { const x: number; }",
        "declare function f(this: Window, ...rest: string[]): void;",
        "",
      ].join("\n")
    );
    expect(root).to.deep.equal(
      moduleDecl('"ns"', [
        moduleDecl("Outer", [moduleDecl("Inner", [varDecl("x", numberType())])]),
        funcDecl("f", functionType([{ name: "rest", type: arrayType(stringType()) }], unitType())),
      ])
    );
  });

  it("records skip issues for unsupported syntax", () => {
    const { root, issues } = readDtsSource(
      "odd.d.ts",
      ['import x from "y";', "type C<T> = T extends string ? 1 : 2;", ""].join("\n")
    );
    expect(root).to.deep.equal(moduleDecl('"odd"', [unknownDecl(), typeDecl("C", unknownType())]));
    expect(issues).to.deep.equal([
      {
        file: "odd.d.ts",
        kind: "declaration",
        snippet: 'import x from "y";',
        reason: "Unsupported statement 'ImportDeclaration'.",
      },
      {
        file: "odd.d.ts",
        kind: "type",
        snippet: "T extends string ? 1 : 2",
        reason: "Unsupported type syntax 'ConditionalType'.",
      },
    ]);
  });

  it("reads files from disk", () => {
    const dir = mkdtempSync(join(tmpdir(), "rebind-dts-"));
    const path = join(dir, "util.d.ts");
    writeFileSync(path, "export declare function id(x: any): any;\n", "utf-8");
    const { root } = readDtsFile(path);
    expect(root).to.deep.equal(
      moduleDecl('"util"', [funcDecl("id", functionType([{ name: "x", type: { kind: "any" } }], { kind: "any" }))])
    );
  });
});
