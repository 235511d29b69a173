import { describe, expect, it } from "vitest";
import { Result } from "../../src/infrastructure/result/result";

describe("Result", () => {
  it("maps and folds successful data", () => {
    const result = Result.success(["bat", "hat"]).map((words) => words.length);
    expect(result.fold((count) => `found ${count}`, (error) => error.message)).toBe(
      "found 2",
    );
  });

  it("carries failures through map untouched", () => {
    const failure = new Error("not found");
    const result = Result.failure<string[]>(failure).map((words) => words.length);

    expect(result.success).toBe(false);
    expect(result.error).toBe(failure);
    expect(result.fold(() => "ok", (error) => error.message)).toBe("not found");
  });

  it("runs only the matching callback", () => {
    const seen: string[] = [];
    Result.success("cat")
      .onSuccess((word) => seen.push(`success:${word}`))
      .onFailure((error) => seen.push(`failure:${error.message}`));
    Result.failure<string>(new Error("zzqx"))
      .onSuccess((word) => seen.push(`success:${word}`))
      .onFailure((error) => seen.push(`failure:${error.message}`));

    expect(seen).toEqual(["success:cat", "failure:zzqx"]);
  });
});
