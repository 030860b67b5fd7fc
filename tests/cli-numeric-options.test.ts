import { Command } from "commander";
import { describe, expect, it } from "vitest";
import { collectOption, parseIntOption, parsePositiveIntOption } from "../src/cli/option-parsers.js";

describe("CLI option parsing", () => {
  it("parseIntOption parses integers and rejects invalid input", () => {
    expect(parseIntOption("10")).toBe(10);
    expect(parseIntOption(" -3 ")).toBe(-3);
    expect(() => parseIntOption("nope")).toThrow("Expected an integer");
    expect(() => parseIntOption("12abc")).toThrow("Expected an integer, got: 12abc");
  });

  it("parsePositiveIntOption rejects zero", () => {
    expect(parsePositiveIntOption("250")).toBe(250);
    expect(() => parsePositiveIntOption("0")).toThrow("Expected a positive integer, got: 0");
  });

  it("commander defaults and parsed values are numbers", () => {
    const program = new Command();
    program.option("--cap <n>", "Scan cap", parsePositiveIntOption, 10);

    program.parse(["node", "test"]);
    expect(program.opts().cap).toBe(10);

    program.parse(["node", "test", "--cap", "7"]);
    expect(program.opts().cap).toBe(7);
  });

  it("collects repeatable options", () => {
    const program = new Command();
    program.option("--domain <domain>", "Disallowed domain", collectOption);

    program.parse(["node", "test", "--domain", "epa.gov", "--domain", "example.org"]);
    expect(program.opts().domain).toEqual(["epa.gov", "example.org"]);
  });
});
