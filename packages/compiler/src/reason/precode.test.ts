import { expect } from "chai";

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
  varDecl,
} from "@rebind/core/model.js";

import { declPrecode, renderPrecode, typePrecode } from "./precode.js";

const numberOrString = ["type number_or_string =", "  | Number(float)", "  | String(string);"].join("\n");

describe("@rebind/compiler reason/precode", () => {
  it("hoists parameter unions but not return unions", () => {
    const fn = functionType(
      [{ name: "x", type: unionType([numberType(), stringType()]) }],
      unionType([booleanType(), nullType()])
    );
    expect(typePrecode(fn)).to.deep.equal([numberOrString]);
  });

  it("hoists return unions behind the compatibility flag", () => {
    const fn = functionType(
      [{ name: "x", type: unionType([numberType(), stringType()]) }],
      unionType([booleanType(), nullType()])
    );
    expect(typePrecode(fn, { hoistReturnUnions: true })).to.deep.equal([
      numberOrString,
      ["type bool_or_null =", "  | Bool(bool)", "  | Null(Js.Null.t(unit));"].join("\n"),
    ]);
  });

  it("emits exactly one alias per union without visiting its members", () => {
    const t = unionType([arrayType(unionType([numberType(), stringType()])), nullType()]);
    expect(typePrecode(t)).to.deep.equal([
      [
        "type array_number_or_string_or_null =",
        "  | Array_number_or_string(array(number_or_string))",
        "  | Null(Js.Null.t(unit));",
      ].join("\n"),
    ]);
  });

  it("does not reach parameter unions inside a union member", () => {
    const t = unionType([
      functionType([{ name: "x", type: unionType([numberType(), stringType()]) }], unitType()),
      booleanType(),
    ]);
    expect(typePrecode(t)).to.deep.equal([
      ["type func_or_bool =", "  | Func((number_or_string) => unit)", "  | Bool(bool);"].join("\n"),
    ]);
  });

  it("does not visit tuple elements", () => {
    expect(renderPrecode(varDecl("v", tupleType([unionType([numberType(), stringType()])])))).to.equal("");
  });

  it("visits dictionary values", () => {
    expect(typePrecode(dictType(unionType([numberType(), stringType()])))).to.deep.equal([numberOrString]);
  });

  it("visits object field types after the alias of the declaring type", () => {
    const opts = objectType([field("size", unionType([numberType(), stringType()])), field("name", stringType())]);
    expect(declPrecode(typeDecl("Opts", opts))).to.deep.equal([
      'type opts = {. "size": number_or_string, "name": string};',
      numberOrString,
    ]);
  });

  it("takes precode from the type of an exports declaration", () => {
    const fn = functionType([{ name: "p", type: unionType([stringType(), regexType()]) }], unitType());
    expect(declPrecode(exportsDecl(fn))).to.deep.equal([
      ["type string_or_regex =", "  | String(string)", "  | Regex(Js.Re.t);"].join("\n"),
    ]);
  });

  it("visits class fields, constructor parameters included", () => {
    const cls = classType([
      field("constructor", functionType([{ name: "init", type: optionalType(unionType([numberType(), stringType()])) }], unitType())),
      field("match", functionType([{ name: "p", type: unionType([stringType(), regexType()]) }], booleanType())),
    ]);
    expect(declPrecode(classDecl("Matcher", cls))).to.deep.equal([
      numberOrString,
      ["type string_or_regex =", "  | String(string)", "  | Regex(Js.Re.t);"].join("\n"),
    ]);
  });

  it("puts a type alias ahead of its nested precode", () => {
    expect(declPrecode(typeDecl("Id", unionType([stringType(), numberType()])))).to.deep.equal([
      "type id = string_or_number;",
      ["type string_or_number =", "  | String(string)", "  | Number(float);"].join("\n"),
    ]);
  });

  it("emits nothing for base shapes and unknown declarations", () => {
    expect(typePrecode(numberType())).to.deep.equal([]);
    expect(typePrecode(tupleType([stringType()]))).to.deep.equal([]);
    expect(declPrecode(unknownDecl())).to.deep.equal([]);
  });

  it("flattens modules in order and keeps only the first copy of each alias", () => {
    const union = unionType([numberType(), stringType()]);
    const mod = moduleDecl("m", [
      varDecl("a", union),
      typeDecl("Pair", tupleType([union, stringType()])),
      funcDecl("f", functionType([{ name: "cb", type: optionalType(union) }], unitType())),
    ]);
    expect(declPrecode(mod)).to.have.length(3);
    expect(renderPrecode(mod)).to.equal([numberOrString, "type pair = (number_or_string, string);"].join("\n"));
  });
});
