import { describe, it, expect } from "vitest";
import { z } from "zod";
import { formatZodErrors, NumberListSchema } from "./zod-helpers.js";

describe("formatZodErrors", () => {
  it("formats a single field error", () => {
    const schema = z.object({ name: z.string() });
    const result = schema.safeParse({ name: 42 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual(["name: Expected string, received number"]);
    }
  });

  it("joins nested paths with dots", () => {
    const schema = z.object({ grid: z.object({ buffers: z.array(z.number()) }) });
    const result = schema.safeParse({ grid: { buffers: ["x"] } });

    expect(result.success).toBe(false);
    if (!result.success) {
      const errors = formatZodErrors(result.error);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatch(/^grid\.buffers\.0:/);
    }
  });
});

describe("NumberListSchema", () => {
  it("splits a comma-separated string", () => {
    expect(NumberListSchema.parse("0.25, 0.30,1.3")).toEqual([0.25, 0.3, 1.3]);
  });

  it("wraps a single number", () => {
    expect(NumberListSchema.parse(0.9)).toEqual([0.9]);
  });

  it("accepts an array of numeric strings", () => {
    expect(NumberListSchema.parse(["1", "2.5"])).toEqual([1, 2.5]);
  });

  it("rejects non-numeric entries", () => {
    expect(NumberListSchema.safeParse("0.25,abc").success).toBe(false);
  });

  it("rejects an empty list", () => {
    expect(NumberListSchema.safeParse(" , ").success).toBe(false);
  });

  it("rejects values that repeat once parsed", () => {
    const result = NumberListSchema.safeParse("0.25,0.3,0.250");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual([": Duplicate value: 0.25"]);
    }
  });
});
