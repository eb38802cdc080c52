import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { assertSingleSource, parseJson } from "../src/lib/arg.js";

describe("parseJson", () => {
  it("should read a plan document", () => {
    expect(parseJson('[{"op":"author.create","name":"Jane","as":"jane"}]', "--data")).toEqual([
      { op: "author.create", name: "Jane", as: "jane" },
    ]);
  });

  it("should accept any JSON value and leave shape checks to the plan parser", () => {
    expect(parseJson("null", "stdin")).toBeNull();
    expect(parseJson(" 3 ", "stdin")).toBe(3);
  });

  it("should skip a leading byte order mark", () => {
    expect(parseJson('\uFEFF[{"op":"catalog.stats"}]', "file plan.json")).toEqual([{ op: "catalog.stats" }]);
  });

  it("should name the source when the JSON is malformed", () => {
    const attempt = () => parseJson('[{"op":', "file plan.json");

    expect(attempt).toThrow(InvalidArgumentError);
    expect(attempt).toThrow(/^Invalid JSON in file plan\.json: /);
  });
});

describe("assertSingleSource", () => {
  it("should allow a single source or none", () => {
    expect(() => assertSingleSource({ "--file": "plan.json", "--data": undefined })).not.toThrow();
    expect(() => assertSingleSource({ "--file": undefined, "--data": undefined })).not.toThrow();
  });

  it("should reject --file together with --data", () => {
    expect(() => assertSingleSource({ "--file": "plan.json", "--data": "[]" })).toThrow(
      "Cannot use both --file and --data; choose one or use stdin"
    );
  });
});
