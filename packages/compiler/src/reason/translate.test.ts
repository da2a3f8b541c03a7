import { expect } from "chai";

import {
  classDecl,
  classType,
  exportsDecl,
  field,
  funcDecl,
  functionType,
  moduleDecl,
  nullType,
  numberType,
  objectType,
  optionalType,
  stringType,
  typeDecl,
  unionType,
  unknownDecl,
  varDecl,
} from "@rebind/core/model.js";

import { TranslateError } from "./diagnostics.js";
import { translate } from "./translate.js";

describe("@rebind/compiler reason/translate", () => {
  it("produces no artifact for roots that are not modules or type aliases", () => {
    expect(translate(varDecl("x", numberType()))).to.equal(undefined);
    expect(translate(exportsDecl(numberType()))).to.equal(undefined);
    expect(translate(classDecl("Foo", classType([])))).to.equal(undefined);
    expect(translate(unknownDecl())).to.equal(undefined);
  });

  it("names module artifacts by the normalized module name", () => {
    expect(translate(moduleDecl('"my-mod"', []))).to.deep.equal({ name: "my_mod", text: "\n" });
  });

  it("translates a bare type alias into precode only", () => {
    expect(translate(typeDecl("Id", unionType([stringType(), numberType()])))).to.deep.equal({
      name: "",
      text: ["type id = string_or_number;", "type string_or_number =", "  | String(string)", "  | Number(float);"].join(
        "\n"
      ),
    });
  });

  it("emits hoisted precode ahead of the module body", () => {
    const root = moduleDecl('"left-pad"', [
      typeDecl("Options", objectType([field("width", numberType())])),
      funcDecl(
        "pad",
        functionType(
          [
            { name: "text", type: stringType() },
            { name: "fill", type: optionalType(unionType([stringType(), numberType()])) },
          ],
          stringType()
        )
      ),
      exportsDecl(functionType([{ name: "text", type: stringType() }], stringType())),
    ]);
    const artifact = translate(root);
    expect(artifact?.name).to.equal("left_pad");
    expect(artifact?.text.split("\n")).to.deep.equal([
      'type options = {. "width": float};',
      "type string_or_number =",
      "  | String(string)",
      "  | Number(float);",
      "",
      '[@bs.module "left_pad"] external pad: (~text: string, ~fill: string_or_number=?, unit) => string = "pad";',
      '[@bs.module] external left_pad: (string) => string = "left_pad";',
    ]);
  });

  it("passes the return-union flag through to precode", () => {
    const root = moduleDecl("m", [funcDecl("f", functionType([], unionType([stringType(), nullType()])))]);
    expect(translate(root)?.text).to.equal('\n[@bs.module "m"] external f: (unit) => string_or_null = "f";');
    expect(translate(root, { hoistReturnUnions: true })?.text.split("\n")[0]).to.equal("type string_or_null =");
  });

  it("fails the whole unit when a class type is named", () => {
    const root = moduleDecl("m", [typeDecl("Bad", unionType([classType([])]))]);
    expect(() => translate(root)).to.throw(TranslateError).with.property("code", "RBD1001");
  });
});
