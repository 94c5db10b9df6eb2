import { describe, expect, it } from "vitest";
import { Err, MazeError, Ok, Result } from "../src";

describe("Result", () => {
  it("maps over Ok values and skips Err", () => {
    expect(Ok(2).map((n) => n * 3).getOrElse(0)).toBe(6);
    expect(Err<number, string>("nope").map((n) => n * 3).getOrElse(0)).toBe(0);
  });

  it("mapErr only touches the error", () => {
    const result = Err<number, string>("bad").mapErr((e) => e.length);
    expect(result.error).toBe(3);
    expect(Ok<number, string>(1).mapErr((e) => e.length).value).toBe(1);
  });

  it("flatMap short-circuits on the first Err", () => {
    const half = (n: number): Result<number, string> =>
      n % 2 === 0 ? Ok(n / 2) : Err(`${n} is odd`);

    expect(Ok<number, string>(8).flatMap(half).flatMap(half).value).toBe(2);
    expect(Ok<number, string>(6).flatMap(half).flatMap(half).error).toBe(
      "3 is odd",
    );
  });

  it("match picks the branch by state", () => {
    const describeResult = (r: Result<number, string>) =>
      r.match(
        (v) => `ok:${v}`,
        (e) => `err:${e}`,
      );
    expect(describeResult(Ok(1))).toBe("ok:1");
    expect(describeResult(Err("x"))).toBe("err:x");
  });

  it("getOrThrow rethrows the stored error", () => {
    const error = MazeError.configInvalid("broken");
    expect(() => Err(error).getOrThrow()).toThrow(error);
    expect(Ok("fine").getOrThrow()).toBe("fine");
  });

  it("fromThrowable captures thrown values through onError", () => {
    const failed = Result.fromThrowable(
      () => {
        throw new Error("boom");
      },
      (e) => (e instanceof Error ? e.message : "unknown"),
    );
    expect(failed.isErr()).toBe(true);
    expect(failed.error).toBe("boom");

    const passed = Result.fromThrowable(() => 42, () => "unused");
    expect(passed.isOk()).toBe(true);
    expect(passed.value).toBe(42);
  });

  it("guards value and error accessors", () => {
    expect(() => Err("x").value).toThrow("Cannot access value of Err Result");
    expect(() => Ok(1).error).toThrow("Cannot access error of Ok Result");
  });

  it("serializes both states", () => {
    expect(Ok(5).toJSON()).toEqual({ success: true, value: 5 });
    expect(Err("e").toJSON()).toEqual({ success: false, error: "e" });
    expect(Ok(5).success).toBe(true);
    expect(Err("e").success).toBe(false);
  });
});
