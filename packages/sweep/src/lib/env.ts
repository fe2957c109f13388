import dotenv from "dotenv";
import { z } from "zod";
import { parseEnv } from "@atr-sweep/kit";

dotenv.config();

const EnvSchema = z.object({
  SWEEP_ENGINE: z.string().trim().min(1).default("python -m backtest.run"),
  /** 0 disables the timeout. */
  SWEEP_ENGINE_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
});

export type Env = z.infer<typeof EnvSchema>;
export const env = parseEnv(EnvSchema);
