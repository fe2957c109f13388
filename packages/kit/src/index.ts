export { parseEnv } from "./parse-env.js";
export { isMainModule } from "./is-main.js";
export { formatZodErrors, NumberListSchema } from "./zod-helpers.js";
