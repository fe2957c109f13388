import { z } from "zod";

export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
}

/**
 * Accepts "0.25,0.30", a single number, or an array, and yields a non-empty list
 * of distinct finite numbers. CLI parsers hand back numbers for single values.
 * Duplicates are compared after parsing, so "0.25,0.250" is rejected.
 */
export const NumberListSchema = z.preprocess(
  (value) => {
    if (typeof value === "number") return [value];
    if (typeof value === "string") {
      return value
        .split(",")
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
    }
    return value;
  },
  z
    .array(z.coerce.number().finite())
    .min(1, "Expected at least one number")
    .superRefine((values, ctx) => {
      const seen = new Set<number>();
      for (const value of values) {
        if (seen.has(value)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate value: ${value}` });
          return;
        }
        seen.add(value);
      }
    }),
);
