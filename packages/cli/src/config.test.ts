/**
 * Tests for configuration loading and resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { findConfig, loadConfig, parseConfig, resolveConfig } from "./config.js";
import type { RelaygenConfig, CliOptions } from "./types.js";

describe("Config", () => {
  describe("resolveConfig", () => {
    it("should apply defaults", () => {
      const result = resolveConfig({}, {}, "/project");

      expect(result.projectRoot).to.equal(path.resolve("/project"));
      expect(result.sourceRoot).to.equal("src");
      expect(result.tsconfig).to.equal(undefined);
      expect(result.outputFile).to.equal(
        "src/generated/service-registration-extensions.ts"
      );
      expect(result.outputPath).to.equal(
        path.resolve("/project/src/generated/service-registration-extensions.ts")
      );
      expect(result.contract).to.deep.equal({
        module: "@relaygen/contracts",
        name: "RequestHandler",
      });
      expect(result.runtimeModule).to.equal("@relaygen/contracts");
      expect(result.importExtension).to.equal(".js");
      expect(result.includeTimestamp).to.equal(false);
      expect(result.catalogPath).to.equal(undefined);
    });

    it("should use config values over defaults", () => {
      const config: RelaygenConfig = {
        sourceRoot: "lib",
        outputFile: "./lib/registrations.ts",
        contract: { module: "./lib/contracts.ts", name: "Handles" },
        runtimeModule: "./lib/container.ts",
        importExtension: ".ts",
        includeTimestamp: true,
        catalog: "catalog.json",
      };

      const result = resolveConfig(config, {}, "/project");
      expect(result.sourceRoot).to.equal("lib");
      expect(result.outputFile).to.equal("lib/registrations.ts");
      expect(result.contract).to.deep.equal({
        module: "./lib/contracts.ts",
        name: "Handles",
      });
      expect(result.runtimeModule).to.equal("./lib/container.ts");
      expect(result.importExtension).to.equal(".ts");
      expect(result.includeTimestamp).to.equal(true);
      expect(result.catalogPath).to.equal(path.resolve("/project/catalog.json"));
    });

    it("should override config with CLI options", () => {
      const config: RelaygenConfig = {
        sourceRoot: "lib",
        outputFile: "lib/registrations.ts",
        tsconfig: "tsconfig.json",
      };
      const cliOptions: CliOptions = {
        src: "source",
        out: "source/out.ts",
        tsconfig: "tsconfig.build.json",
        timestamp: true,
        verbose: true,
      };

      const result = resolveConfig(config, cliOptions, "/project");
      expect(result.sourceRoot).to.equal("source");
      expect(result.outputFile).to.equal("source/out.ts");
      expect(result.tsconfig).to.equal("tsconfig.build.json");
      expect(result.includeTimestamp).to.equal(true);
      expect(result.verbose).to.equal(true);
      expect(result.quiet).to.equal(false);
    });

    it("should make absolute output paths project-relative", () => {
      const result = resolveConfig(
        { outputFile: path.resolve("/project/gen/out.ts") },
        {},
        "/project"
      );
      expect(result.outputFile).to.equal("gen/out.ts");
    });
  });

  describe("parseConfig", () => {
    it("should accept an empty object", () => {
      const result = parseConfig({});
      expect(result.ok).to.equal(true);
    });

    it("should reject non-objects", () => {
      const result = parseConfig([]);
      expect(result).to.deep.equal({
        ok: false,
        error: "relaygen.json must contain an object",
      });
    });

    it("should report every invalid field", () => {
      const result = parseConfig({
        sourceRoot: 1,
        importExtension: ".mjs",
        contract: { module: "x" },
        includeTimestamp: "yes",
      });

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.split("\n")).to.deep.equal([
        "relaygen.json: 'includeTimestamp' must be a boolean",
        "relaygen.json: 'sourceRoot' must be a string",
        "relaygen.json: 'contract' must be an object with string 'module' and 'name'",
        `relaygen.json: 'importExtension' must be one of ".js", ".ts", ""`,
      ]);
    });
  });

  describe("loadConfig and findConfig", () => {
    const withTempDir = (run: (dir: string) => void): void => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), "relaygen-config-"));
      try {
        run(dir);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    };

    it("should find relaygen.json in a parent directory", () => {
      withTempDir((dir) => {
        fs.writeFileSync(path.join(dir, "relaygen.json"), "{}");
        const nested = path.join(dir, "src", "handlers");
        fs.mkdirSync(nested, { recursive: true });

        expect(findConfig(nested)).to.equal(path.join(dir, "relaygen.json"));
      });
    });

    it("should load a valid file", () => {
      withTempDir((dir) => {
        const file = path.join(dir, "relaygen.json");
        fs.writeFileSync(file, JSON.stringify({ sourceRoot: "lib" }));

        const result = loadConfig(file);
        expect(result.ok).to.equal(true);
        if (!result.ok) return;
        expect(result.value.sourceRoot).to.equal("lib");
      });
    });

    it("should report a missing file", () => {
      withTempDir((dir) => {
        const file = path.join(dir, "relaygen.json");
        expect(loadConfig(file)).to.deep.equal({
          ok: false,
          error: `Config file not found: ${file}`,
        });
      });
    });

    it("should report invalid JSON", () => {
      withTempDir((dir) => {
        const file = path.join(dir, "relaygen.json");
        fs.writeFileSync(file, "{ sourceRoot: ");

        const result = loadConfig(file);
        expect(result.ok).to.equal(false);
        if (result.ok) return;
        expect(result.error).to.match(/^Failed to parse relaygen\.json: /);
      });
    });
  });
});
