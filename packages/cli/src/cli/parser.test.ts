/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse generate command", () => {
        const result = parseArgs(["generate"]);
        expect(result.command).to.equal("generate");
      });

      it("should parse list command", () => {
        const result = parseArgs(["list"]);
        expect(result.command).to.equal("list");
      });

      it("should parse check command", () => {
        const result = parseArgs(["check"]);
        expect(result.command).to.equal("check");
      });

      it("should parse help command from --help", () => {
        const result = parseArgs(["--help"]);
        expect(result.command).to.equal("help");
      });

      it("should parse help command from -h after a command", () => {
        const result = parseArgs(["generate", "-h"]);
        expect(result.command).to.equal("help");
      });

      it("should parse version command from -v", () => {
        const result = parseArgs(["-v"]);
        expect(result.command).to.equal("version");
      });

      it("should leave the command empty without arguments", () => {
        const result = parseArgs([]);
        expect(result.command).to.equal("");
      });
    });

    describe("Options", () => {
      it("should parse -V short option for verbose", () => {
        const result = parseArgs(["list", "-V"]);
        expect(result.options.verbose).to.equal(true);
      });

      it("should parse --quiet option", () => {
        const result = parseArgs(["check", "--quiet"]);
        expect(result.options.quiet).to.equal(true);
      });

      it("should parse -c short option for config", () => {
        const result = parseArgs(["generate", "-c", "custom.json"]);
        expect(result.options.config).to.equal("custom.json");
      });

      it("should parse --src and --out values", () => {
        const result = parseArgs([
          "generate",
          "--src",
          "lib",
          "-o",
          "lib/registrations.ts",
        ]);
        expect(result.options.src).to.equal("lib");
        expect(result.options.out).to.equal("lib/registrations.ts");
      });

      it("should parse --catalog and --tsconfig values", () => {
        const result = parseArgs([
          "list",
          "--catalog",
          "catalog.json",
          "--tsconfig",
          "tsconfig.json",
        ]);
        expect(result.options.catalog).to.equal("catalog.json");
        expect(result.options.tsconfig).to.equal("tsconfig.json");
      });

      it("should parse --timestamp flag", () => {
        const result = parseArgs(["generate", "--timestamp"]);
        expect(result.options.timestamp).to.equal(true);
      });

      it("should accept inline values", () => {
        const result = parseArgs(["generate", "--out=lib/reg.ts", "-c=a=b.json"]);
        expect(result.options.out).to.equal("lib/reg.ts");
        expect(result.options.config).to.equal("a=b.json");
      });

      it("should report an inline value on a flag as unknown", () => {
        const result = parseArgs(["generate", "--verbose=yes"]);
        expect(result.options.verbose).to.equal(undefined);
        expect(result.unknown).to.deep.equal(["--verbose=yes"]);
      });

      it("should use an empty value when a value option is last", () => {
        const result = parseArgs(["generate", "--out"]);
        expect(result.options.out).to.equal("");
      });

      it("should collect unknown options and extra arguments", () => {
        const result = parseArgs(["generate", "--fast", "extra"]);
        expect(result.unknown).to.deep.equal(["--fast", "extra"]);
      });
    });
  });
});
