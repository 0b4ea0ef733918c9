export { componentLogger, createLogger, logger } from "./logger.js";
export type { CreateLoggerOpts, Logger } from "./logger.js";
