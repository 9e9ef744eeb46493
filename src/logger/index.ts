export { log } from "./logger";
export { LOG_LEVELS, isLogLevel, type LogLevel } from "./levels";
