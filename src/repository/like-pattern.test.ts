import { describe, expect, it } from "vitest";
import { containsPattern } from "./like-pattern";

describe("containsPattern", () => {
  it("wraps plain text in wildcards", () => {
    expect(containsPattern("gss25")).toBe("%gss25%");
  });

  it("escapes LIKE metacharacters so they match literally", () => {
    expect(containsPattern("50%_off\\")).toBe("%50\\%\\_off\\\\%");
  });
});
