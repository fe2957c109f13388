import { z } from "zod";
import { NumberListSchema } from "@atr-sweep/kit";

// --- Zod Schemas ---

export const OverrideKeySchema = z.enum(["breakout_atr_buf", "trail_atr_mult", "atr_pct_max"]);

export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Must be YYYY-MM-DD");

export const ParameterGridSchema = z.object({
  buffers: NumberListSchema,
  trailMultipliers: NumberListSchema,
});

export const RunOptionsSchema = z
  .object({
    start: IsoDateSchema.default("2023-01-01"),
    end: IsoDateSchema.default("2024-12-31"),
    universe: z.string().min(1).default("./data/symbols_nifty500_clean.csv"),
    config: z.string().min(1).default("./backtest/config.yaml"),
    out: z.string().min(1).default("results.csv"),
    maxPos: z.coerce.number().int().min(1).default(3),
    buffers: NumberListSchema.default("0.20,0.25,0.30,0.35"),
    trails: NumberListSchema.default("0.90,1.10,1.30,1.50"),
  })
  .refine((o) => o.start <= o.end, { message: "start must not be after end", path: ["start"] });

export const CheckOptionsSchema = z.object({
  universe: z.string().min(1).default("./data/symbols_nifty500_clean.csv"),
  config: z.string().min(1).default("./backtest/config.yaml"),
});

export const OverlayOptionsSchema = z.object({
  config: z.string().min(1).default("./backtest/config.yaml"),
  out: z.string().min(1).default("backtest/config_tmp.yaml"),
  buf: z.coerce.number().finite(),
  trail: z.coerce.number().finite(),
  atrp: z.coerce.number().finite().optional(),
});

// --- Inferred Types ---

export type OverrideKey = z.infer<typeof OverrideKeySchema>;
export type ConfigOverrides = Partial<Record<OverrideKey, number>>;
export type ParameterGrid = z.infer<typeof ParameterGridSchema>;
export type RunOptions = z.infer<typeof RunOptionsSchema>;
export type CheckOptions = z.infer<typeof CheckOptionsSchema>;
export type OverlayOptions = z.infer<typeof OverlayOptionsSchema>;
