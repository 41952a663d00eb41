export { $env, expandEnvReference } from "./env";
export { errorMessage, hasErrorCode, isEnoent } from "./fs-error";
export { getLogLevel, isLogLevel, LOG_LEVELS, type LogContext, type Logger, type LogLevel, logger, setLogLevel } from "./logger";
