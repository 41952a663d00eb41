/**
 * Structured logging for all packages.
 *
 * Log lines are JSON written to stderr so command output on stdout stays
 * machine-readable. The level comes from `LOG_LEVEL` and can be changed at
 * runtime with {@link setLogLevel}.
 */
import pino, { type Logger as PinoLogger } from "pino";
import { $env } from "./env";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
	trace(message: string, context?: LogContext): void;
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext | Error): void;
	child(bindings: LogContext): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(level => level === value);
}

function resolveLevel(value: string | undefined): LogLevel {
	const normalized = value?.trim().toLowerCase();
	if (normalized && isLogLevel(normalized)) return normalized;
	return "info";
}

const root: PinoLogger = pino(
	{
		level: resolveLevel($env.LOG_LEVEL),
		base: { service: "scene-forge" },
		timestamp: pino.stdTimeFunctions.isoTime,
	},
	pino.destination(2),
);

// children merge bindings over the root instead of using pino children, whose
// level is fixed at creation
function wrap(bindings: LogContext): Logger {
	const emit = (level: "trace" | "debug" | "info" | "warn" | "error", message: string, context?: LogContext) =>
		root[level]({ ...bindings, ...context }, message);
	return {
		trace: (message, context) => emit("trace", message, context),
		debug: (message, context) => emit("debug", message, context),
		info: (message, context) => emit("info", message, context),
		warn: (message, context) => emit("warn", message, context),
		error: (message, context) => emit("error", message, context instanceof Error ? { err: context } : context),
		child: childBindings => wrap({ ...bindings, ...childBindings }),
	};
}

export const logger: Logger = wrap({});

/** Change the level of the shared logger and every child created from it. */
export function setLogLevel(level: LogLevel): void {
	root.level = level;
}

export function getLogLevel(): LogLevel {
	return resolveLevel(root.level);
}
