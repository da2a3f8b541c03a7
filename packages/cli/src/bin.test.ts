import { expect } from "chai";

import { TranslateError } from "@rebind/compiler";

import { formatCliError, parseCommand } from "./bin.js";

describe("@rebind/cli command parser", () => {
  it("classifies supported commands", () => {
    expect(parseCommand(["init"])).to.equal("init");
    expect(parseCommand(["translate", "--model", "m.json"])).to.equal("translate");
    expect(parseCommand(["dts"])).to.equal("dts");
    expect(parseCommand(["help"])).to.equal("help");
  });

  it("classifies missing and unknown commands as help", () => {
    expect(parseCommand([])).to.equal("help");
    expect(parseCommand(["build"])).to.equal("help");
  });

  it("prefixes translate errors with their code", () => {
    expect(formatCliError(new TranslateError("RBD1002", "bad target"))).to.equal("RBD1002: bad target");
    expect(formatCliError(new Error("plain"))).to.equal("plain");
    expect(formatCliError("text")).to.equal("text");
  });
});
