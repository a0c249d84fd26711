export { formatZodErrors, formatZodPath } from "./zod-helpers.js";
export { parseEnv } from "./parse-env.js";
export { safeJsonParse } from "./safe-json.js";
export { isMainModule } from "./is-main.js";
