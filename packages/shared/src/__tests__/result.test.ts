/**
 * Unit tests for the Result helpers
 *
 * @module shared/__tests__/result
 */

import { describe, expect, it } from "vitest";
import { Err, Ok, type Result } from "../types/result.js";

describe("Result", () => {
  it("creates successful results", () => {
    const result: Result<number, string> = Ok(42);

    expect(result).toEqual({ ok: true, value: 42 });
    expect(result.ok).toBe(true);
  });

  it("creates failed results", () => {
    const result: Result<number, string> = Err("boom");

    expect(result).toEqual({ ok: false, error: "boom" });
    expect(result.ok).toBe(false);
  });

  it("narrows on the ok flag", () => {
    const parse = (input: string): Result<number, string> =>
      /^\d+$/.test(input) ? Ok(Number(input)) : Err(`not a number: ${input}`);

    const messages = ["12", "x"].map((input) => {
      const result = parse(input);
      return result.ok ? `value ${result.value}` : result.error;
    });

    expect(messages).toEqual(["value 12", "not a number: x"]);
  });
});
