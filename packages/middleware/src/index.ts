export { logger, Levels } from "./logger";
export type { LoggerOptions } from "./logger";
