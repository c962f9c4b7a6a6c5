/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse check command", () => {
        const result = parseArgs(["check"]);
        expect(result.command).to.equal("check");
      });

      it("should parse graph command", () => {
        const result = parseArgs(["graph"]);
        expect(result.command).to.equal("graph");
      });

      it("should parse help command from --help", () => {
        expect(parseArgs(["--help"]).command).to.equal("help");
        expect(parseArgs(["check", "-h"]).command).to.equal("help");
      });

      it("should parse version command from --version", () => {
        expect(parseArgs(["--version"]).command).to.equal("version");
        expect(parseArgs(["-v"]).command).to.equal("version");
      });

      it("should handle empty args array", () => {
        const result = parseArgs([]);
        expect(result.command).to.equal("");
        expect(result.entryFile).to.equal(undefined);
        expect(result.options).to.deep.equal({});
      });
    });

    describe("Entry file", () => {
      it("should parse entry file after command", () => {
        const result = parseArgs(["check", "src/Модуль.bsl"]);
        expect(result.entryFile).to.equal("src/Модуль.bsl");
      });

      it("should handle no entry file", () => {
        const result = parseArgs(["check", "--quiet"]);
        expect(result.entryFile).to.equal(undefined);
      });
    });

    describe("Options", () => {
      it("should parse --verbose and -V", () => {
        expect(parseArgs(["check", "--verbose"]).options.verbose).to.equal(true);
        expect(parseArgs(["check", "-V"]).options.verbose).to.equal(true);
      });

      it("should parse --quiet and -q", () => {
        expect(parseArgs(["check", "--quiet"]).options.quiet).to.equal(true);
        expect(parseArgs(["check", "-q"]).options.quiet).to.equal(true);
      });

      it("should parse --config option with value", () => {
        const result = parseArgs(["check", "-c", "custom.json"]);
        expect(result.options.config).to.equal("custom.json");
      });

      it("should parse --format option", () => {
        const result = parseArgs(["check", "--format", "json"]);
        expect(result.options.format).to.equal("json");
        expect(result.error).to.equal(undefined);
      });

      it("should parse --types option", () => {
        expect(parseArgs(["check", "--types"]).options.types).to.equal(true);
      });

      it("should parse --min-severity option", () => {
        const result = parseArgs(["check", "--min-severity", "warning"]);
        expect(result.options.minSeverity).to.equal("warning");
      });

      it("should report invalid option values", () => {
        expect(parseArgs(["check", "--format", "xml"]).error).to.equal(
          "--format expects text or json, got 'xml'"
        );
        expect(parseArgs(["check", "--min-severity"]).error).to.equal(
          "--min-severity expects error, warning, info or hint, got ''"
        );
      });

      it("should report unknown options", () => {
        expect(parseArgs(["check", "--watch"]).error).to.equal(
          "Unknown option: --watch"
        );
      });
    });

    describe("Complex scenarios", () => {
      it("should parse command with entry file and multiple options", () => {
        const result = parseArgs([
          "check",
          "Модуль.bsl",
          "--config",
          "bsl-gradual.json",
          "-q",
          "--types",
          "--format",
          "json",
        ]);
        expect(result).to.deep.equal({
          command: "check",
          entryFile: "Модуль.bsl",
          options: {
            config: "bsl-gradual.json",
            quiet: true,
            types: true,
            format: "json",
          },
        });
      });
    });
  });
});
