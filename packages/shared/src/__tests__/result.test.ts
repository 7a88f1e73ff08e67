/**
 * Unit tests for the Result type
 */

import { describe, expect, it } from "vitest";
import {
  Err,
  isErr,
  isOk,
  map,
  mapErr,
  Ok,
  type Result,
  tryCatch,
  tryCatchAsync,
  unwrap,
  unwrapOr,
} from "../types/result.js";

describe("Ok/Err", () => {
  it("creates an Ok result with a value", () => {
    const result = Ok(42);
    expect(result.ok).toBe(true);
    expect(result.value).toBe(42);
  });

  it("creates an Err result with an error", () => {
    const error = new Error("boom");
    const result = Err(error);
    expect(result.ok).toBe(false);
    expect(result.error).toBe(error);
  });

  it("narrows with isOk and isErr", () => {
    const ok: Result<number, string> = Ok(1);
    const err: Result<number, string> = Err("nope");

    expect(isOk(ok)).toBe(true);
    expect(isErr(ok)).toBe(false);
    expect(isOk(err)).toBe(false);
    expect(isErr(err)).toBe(true);
  });
});

describe("unwrap", () => {
  it("returns the value of an Ok", () => {
    expect(unwrap(Ok("value"))).toBe("value");
  });

  it("throws with the error message on Err", () => {
    expect(() => unwrap(Err(new Error("Something failed")))).toThrow(
      "Result.unwrap called on Err: Something failed"
    );
  });

  it("describes string errors verbatim", () => {
    expect(() => unwrap(Err("plain"))).toThrow("Result.unwrap called on Err: plain");
  });

  it("falls back with unwrapOr", () => {
    const result: Result<number, string> = Err("nope");
    expect(unwrapOr(result, 7)).toBe(7);
    expect(unwrapOr(Ok(3), 7)).toBe(3);
  });
});

describe("map/mapErr", () => {
  it("maps the value of an Ok", () => {
    const result = map(Ok(2), (n) => n * 10);
    expect(result).toEqual({ ok: true, value: 20 });
  });

  it("leaves an Err untouched when mapping the value", () => {
    const err: Result<number, string> = Err("nope");
    expect(map(err, (n: number) => n * 10)).toBe(err);
  });

  it("maps the error of an Err", () => {
    const err: Result<number, string> = Err("nope");
    expect(mapErr(err, (e) => e.toUpperCase())).toEqual({ ok: false, error: "NOPE" });
  });
});

describe("tryCatch", () => {
  it("captures a return value as Ok", () => {
    expect(tryCatch(() => JSON.parse('{"a":1}'))).toEqual({ ok: true, value: { a: 1 } });
  });

  it("captures a thrown error as Err", () => {
    const result = tryCatch(() => JSON.parse("invalid json"));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SyntaxError);
    }
  });
});

describe("tryCatchAsync", () => {
  it("captures a resolved value as Ok", async () => {
    await expect(tryCatchAsync(async () => "done")).resolves.toEqual({ ok: true, value: "done" });
  });

  it("captures a rejection as Err", async () => {
    const error = new Error("rejected");
    const result = await tryCatchAsync(() => Promise.reject(error));
    expect(result).toEqual({ ok: false, error });
  });
});
