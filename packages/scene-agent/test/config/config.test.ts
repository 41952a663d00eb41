import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	ConfigError,
	configSearchPaths,
	findConfigFile,
	loadConfig,
	parseConfig,
	providerSettings,
	substituteEnv,
} from "../../src/config/config";

describe("parseConfig", () => {
	it("fills every default for an empty document", () => {
		expect(parseConfig(undefined, undefined, {})).toEqual({
			llm: {
				backend: "openai",
				openai: { model: "gpt-4o", apiKey: undefined },
				ollama: { baseUrl: "http://localhost:11434", model: "llama3", visionModel: "llava" },
			},
			pipeline: { maxRetries: 5, outputDir: "./outputs", passThreshold: 7, verdictPolicy: "score" },
			host: { timeout: 120 },
			logging: { level: "info" },
		});
	});

	it("keeps given values and defaults the rest of a section", () => {
		const config = parseConfig({ llm: { backend: "ollama", ollama: { model: "qwen" } }, pipeline: { maxRetries: 3 } }, undefined, {});
		expect(config.llm.backend).toBe("ollama");
		expect(config.llm.ollama).toEqual({ baseUrl: "http://localhost:11434", model: "qwen", visionModel: "llava" });
		expect(config.pipeline.maxRetries).toBe(3);
		expect(config.pipeline.outputDir).toBe("./outputs");
	});

	it("rejects maxRetries outside 1..10", () => {
		expect(() => parseConfig({ pipeline: { maxRetries: 11 } }, "cfg.yaml", {})).toThrow(ConfigError);
		expect(() => parseConfig({ pipeline: { maxRetries: 0 } }, "cfg.yaml", {})).toThrow(ConfigError);
	});

	it("reads the host command and timeout", () => {
		const config = parseConfig({ host: { command: "blender -b -P {script}", timeout: 30 } }, undefined, {});
		expect(config.host).toEqual({ command: "blender -b -P {script}", timeout: 30 });
	});

	it("rejects an unknown backend", () => {
		expect(() => parseConfig({ llm: { backend: "gemini" } }, undefined, {})).toThrow(ConfigError);
	});

	it("normalizes the log level and rejects unknown ones", () => {
		expect(parseConfig({ logging: { level: "DEBUG" } }, undefined, {}).logging.level).toBe("debug");
		expect(() => parseConfig({ logging: { level: "verbose" } }, undefined, {})).toThrow(
			'Invalid logging.level "verbose"',
		);
	});

	it("substitutes environment references before validation", () => {
		const config = parseConfig({ llm: { openai: { apiKey: "${SCENE_KEY}" } } }, undefined, { SCENE_KEY: "test-secret" });
		expect(config.llm.openai.apiKey).toBe("test-secret");
	});

	it("falls back to OPENAI_API_KEY when no key is configured", () => {
		const config = parseConfig({}, undefined, { OPENAI_API_KEY: "test-secret" });
		expect(config.llm.openai.apiKey).toBe("test-secret");
	});

	it("rejects a document that is not a mapping", () => {
		expect(() => parseConfig(["a"], "cfg.yaml", {})).toThrow("Configuration must be a mapping\n\nFile: cfg.yaml");
	});
});

describe("substituteEnv", () => {
	it("walks nested values and leaves unset references intact", () => {
		expect(substituteEnv({ a: ["${SET}", "${UNSET}"], b: { c: 1, d: "x ${SET}" } }, { SET: "yes" })).toEqual({
			a: ["yes", "${UNSET}"],
			b: { c: 1, d: "x ${SET}" },
		});
	});
});

describe("loadConfig", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "scene-forge-config-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("reads an explicit YAML file", () => {
		const file = path.join(tempDir, "custom.yaml");
		fs.writeFileSync(file, "llm:\n  backend: ollama\npipeline:\n  passThreshold: 8\n  verdictPolicy: strict\n");

		const { config, file: loaded } = loadConfig({ path: file, env: {} });

		expect(loaded).toBe(file);
		expect(config.llm.backend).toBe("ollama");
		expect(config.pipeline.passThreshold).toBe(8);
		expect(config.pipeline.verdictPolicy).toBe("strict");
	});

	it("raises ConfigError for a missing explicit file", () => {
		const file = path.join(tempDir, "nope.yaml");
		expect(() => loadConfig({ path: file, env: {} })).toThrow(`Configuration file not found\n\nFile: ${file}`);
	});

	it("raises ConfigError for malformed YAML", () => {
		const file = path.join(tempDir, "bad.yaml");
		fs.writeFileSync(file, "llm: [unclosed\n");
		expect(() => loadConfig({ path: file, env: {} })).toThrow(ConfigError);
	});

	it("uses the first file that exists in the search order", () => {
		const second = path.join(tempDir, "config.yml");
		fs.writeFileSync(second, "pipeline:\n  outputDir: ./renders\n");

		const searchPaths = configSearchPaths(tempDir, path.join(tempDir, "home"));
		expect(findConfigFile(searchPaths)).toBe(second);

		const { config } = loadConfig({ searchPaths, env: {} });
		expect(config.pipeline.outputDir).toBe("./renders");
	});

	it("falls back to defaults when no file exists", () => {
		const { config, file } = loadConfig({ searchPaths: [path.join(tempDir, "config.yaml")], env: {} });
		expect(file).toBeUndefined();
		expect(config.pipeline.maxRetries).toBe(5);
	});

	it("orders the search paths from project to home", () => {
		expect(configSearchPaths("/work", "/home/u")).toEqual([
			"/work/config.yaml",
			"/work/config.yml",
			"/home/u/.config/scene-forge/config.yaml",
			"/home/u/.scene-forge.yaml",
		]);
	});
});

describe("providerSettings", () => {
	it("maps the ollama section", () => {
		const config = parseConfig({ llm: { backend: "ollama" } }, undefined, {});
		expect(providerSettings(config)).toEqual({
			backend: "ollama",
			model: "llama3",
			visionModel: "llava",
			baseUrl: "http://localhost:11434",
		});
	});

	it("maps the openai section with its key", () => {
		const config = parseConfig({}, undefined, { OPENAI_API_KEY: "test-secret" });
		expect(providerSettings(config)).toEqual({ backend: "openai", model: "gpt-4o", apiKey: "test-secret" });
	});
});
