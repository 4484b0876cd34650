export { logger } from "./logger";
export { onShutdown, sleep } from "./runtime";
export { loadConfig, ConfigError } from "./config";
export type { AppConfig, Failpoint } from "./config";
