/**
 * YAML configuration.
 *
 * Loaded from an explicit path or the first file found in {@link configSearchPaths}.
 * Whole-string `${NAME}` values are replaced from the environment before validation.
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { ProviderSettings } from "@scene-forge/ai";
import { $env, errorMessage, expandEnvReference, isEnoent, isLogLevel, type LogLevel } from "@scene-forge/utils";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import YAML from "yaml";

export const APP_NAME = "scene-forge";

const OpenAISchema = Type.Object(
	{
		model: Type.String({ minLength: 1, default: "gpt-4o" }),
		apiKey: Type.Optional(Type.String()),
	},
	{ default: {} },
);

const OllamaSchema = Type.Object(
	{
		baseUrl: Type.String({ minLength: 1, default: "http://localhost:11434" }),
		model: Type.String({ minLength: 1, default: "llama3" }),
		visionModel: Type.String({ minLength: 1, default: "llava" }),
	},
	{ default: {} },
);

export const ConfigSchema = Type.Object({
	llm: Type.Object(
		{
			backend: Type.Union([Type.Literal("openai"), Type.Literal("ollama")], { default: "openai" }),
			openai: OpenAISchema,
			ollama: OllamaSchema,
		},
		{ default: {} },
	),
	pipeline: Type.Object(
		{
			maxRetries: Type.Integer({ minimum: 1, maximum: 10, default: 5 }),
			outputDir: Type.String({ default: "./outputs" }),
			passThreshold: Type.Number({ minimum: 0, maximum: 10, default: 7 }),
			verdictPolicy: Type.Union([Type.Literal("score"), Type.Literal("strict")], { default: "score" }),
		},
		{ default: {} },
	),
	host: Type.Object(
		{
			/** Shell command with `{script}` and `{output_dir}` placeholders */
			command: Type.Optional(Type.String({ minLength: 1 })),
			timeout: Type.Integer({ minimum: 1, default: 120 }),
		},
		{ default: {} },
	),
	logging: Type.Object(
		{
			level: Type.String({ default: "info" }),
		},
		{ default: {} },
	),
});

export type Config = Static<typeof ConfigSchema>;

export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly file?: string,
	) {
		super(file ? `${message}\n\nFile: ${file}` : message);
		this.name = "ConfigError";
	}
}

export function configSearchPaths(cwd = process.cwd(), home = os.homedir()): string[] {
	return [
		path.join(cwd, "config.yaml"),
		path.join(cwd, "config.yml"),
		path.join(home, ".config", APP_NAME, "config.yaml"),
		path.join(home, `.${APP_NAME}.yaml`),
	];
}

export function findConfigFile(searchPaths: readonly string[] = configSearchPaths()): string | undefined {
	return searchPaths.find(candidate => fs.existsSync(candidate));
}

/** Replace `${NAME}` strings anywhere in a parsed document. */
export function substituteEnv(value: unknown, env: NodeJS.ProcessEnv = $env): unknown {
	if (typeof value === "string") return expandEnvReference(value, env);
	if (Array.isArray(value)) return value.map(item => substituteEnv(item, env));
	if (typeof value === "object" && value !== null) {
		return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, substituteEnv(item, env)]));
	}
	return value;
}

/** Apply defaults and validate. `data` is the parsed document, `undefined` for none. */
export function parseConfig(data: unknown, file?: string, env: NodeJS.ProcessEnv = $env): Config {
	const document = data ?? {};
	if (typeof document !== "object" || Array.isArray(document)) {
		throw new ConfigError("Configuration must be a mapping", file);
	}
	const value = Value.Default(ConfigSchema, substituteEnv(document, env));
	if (!Value.Check(ConfigSchema, value)) {
		const errors = [...Value.Errors(ConfigSchema, value)]
			.map(error => `  - ${error.path || "root"}: ${error.message}`)
			.join("\n");
		throw new ConfigError(`Invalid configuration:\n${errors}`, file);
	}

	const level = value.logging.level.toLowerCase();
	if (!isLogLevel(level)) {
		throw new ConfigError(`Invalid logging.level "${value.logging.level}"`, file);
	}
	value.logging.level = level;
	value.llm.openai.apiKey ??= env.OPENAI_API_KEY;
	return value;
}

export interface LoadConfigOptions {
	/** Explicit file; it must exist */
	path?: string;
	searchPaths?: readonly string[];
	env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
	config: Config;
	/** File the config was read from; undefined when defaults were used */
	file?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
	const env = options.env ?? $env;
	const file = options.path ?? findConfigFile(options.searchPaths);
	if (file === undefined) {
		return { config: parseConfig(undefined, undefined, env) };
	}

	let content: string;
	try {
		content = fs.readFileSync(file, "utf-8");
	} catch (err) {
		if (isEnoent(err)) throw new ConfigError("Configuration file not found", file);
		throw new ConfigError(`Failed to read configuration: ${errorMessage(err)}`, file);
	}

	let data: unknown;
	try {
		data = YAML.parse(content);
	} catch (err) {
		throw new ConfigError(`Failed to parse configuration: ${errorMessage(err)}`, file);
	}
	return { config: parseConfig(data, file, env), file };
}

export function configLogLevel(config: Config): LogLevel {
	const level = config.logging.level;
	return isLogLevel(level) ? level : "info";
}

export function providerSettings(config: Config): ProviderSettings {
	const { llm } = config;
	if (llm.backend === "ollama") {
		return {
			backend: "ollama",
			model: llm.ollama.model,
			visionModel: llm.ollama.visionModel,
			baseUrl: llm.ollama.baseUrl,
		};
	}
	return { backend: "openai", model: llm.openai.model, apiKey: llm.openai.apiKey };
}
