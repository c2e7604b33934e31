import { describe, it, expect } from "vitest";
import { z } from "zod";
import { formatZodError } from "../src/utils/formatZodError.js";

describe("formatZodError", () => {
  it("flattens issues to dotted paths and messages", () => {
    const parsed = z
      .object({ data: z.object({ id: z.string() }) })
      .safeParse({ data: { id: 7 } });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatZodError(parsed.error)).toEqual([
        { path: "data.id", message: "Expected string, received number" },
      ]);
    }
  });
});
