/**
 * Command dispatch for the `scene-forge` CLI.
 */
import * as fs from "node:fs";
import { createModelClient, type ModelClient } from "@scene-forge/ai";
import { errorMessage, logger, setLogLevel } from "@scene-forge/utils";
import chalk from "chalk";
import { CriticAgent } from "./agents/critic";
import { ScriptGenerator } from "./agents/generator";
import type { SceneDescription } from "./agents/types";
import { type Args, parseArgs, printHelp } from "./cli/args";
import { type Config, configLogLevel, loadConfig, providerSettings } from "./config/config";
import { applyEdits } from "./patch/applicator";
import { generateDiffString, generateUnifiedDiffString } from "./patch/diff";
import { locateEdit } from "./patch/fuzzy";
import { parseEditResponse } from "./patch/parser";
import { CommandHost, type SceneHost } from "./pipeline/host";
import { type IterationRecord, RefinementLoop } from "./pipeline/loop";

export interface CliIO {
	stdout(text: string): void;
	stderr(text: string): void;
}

export interface MainOptions {
	io?: CliIO;
	/** Model client for `refine` and `run`; built from the config when omitted */
	createClient?: (config: Config) => ModelClient;
	/** Modeling host for `run`; a {@link CommandHost} on `host.command` when omitted */
	createHost?: (config: Config) => SceneHost;
}

const processIO: CliIO = {
	stdout: text => process.stdout.write(`${text}\n`),
	stderr: text => process.stderr.write(`${text}\n`),
};

export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

export function readVersion(): string {
	const manifest: unknown = JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
	if (typeof manifest === "object" && manifest !== null && "version" in manifest && typeof manifest.version === "string") {
		return manifest.version;
	}
	return "unknown";
}

function readText(file: string, what: string): string {
	try {
		return fs.readFileSync(file, "utf-8");
	} catch (err) {
		throw new UsageError(`Cannot read ${what} ${file}: ${errorMessage(err)}`);
	}
}

function requireFiles(args: Args, count: number, usage: string): string[] {
	if (args.files.length !== count) {
		throw new UsageError(`Usage: ${usage}`);
	}
	return args.files;
}

function emitScript(code: string, args: Args, io: CliIO): void {
	if (args.output) {
		fs.writeFileSync(args.output, code);
		io.stderr(chalk.dim(`Wrote ${args.output}`));
	} else if (!args.diff) {
		io.stdout(code);
	}
}

function runApply(args: Args, io: CliIO): number {
	const [scriptPath, editsPath] = requireFiles(args, 2, "apply <script> <edits.json>");
	const script = readText(scriptPath, "script");
	const edits = parseEditResponse(readText(editsPath, "edits file"));
	if (edits === undefined) {
		throw new UsageError(`No valid edit list in ${editsPath}`);
	}

	const result = applyEdits(script, edits);
	if (args.json) {
		io.stdout(JSON.stringify(result, null, 2));
		return result.success ? 0 : 1;
	}
	if (!result.success) {
		io.stderr(chalk.red(result.error ?? "Edit batch rejected"));
		return 1;
	}

	if (args.diff) {
		io.stdout(generateUnifiedDiffString(script, result.code, scriptPath));
	}
	emitScript(result.code, args, io);
	const { added, removed, firstChangedLine } = generateDiffString(script, result.code);
	const where = firstChangedLine === undefined ? "no changes" : `+${added} -${removed} from line ${firstChangedLine}`;
	io.stderr(
		chalk.green(`Applied ${result.appliedCount} edit(s) (${result.strategies.join(", ") || "none"}): ${where}`),
	);
	return 0;
}

function lineOf(text: string, offset: number): number {
	let line = 1;
	for (let i = 0; i < offset; i++) {
		if (text[i] === "\n") line++;
	}
	return line;
}

function runLocate(args: Args, io: CliIO): number {
	const [scriptPath, snippetPath] = requireFiles(args, 2, "locate <script> <snippet-file>");
	const script = readText(scriptPath, "script");
	const outcome = locateEdit(script, readText(snippetPath, "snippet"));

	switch (outcome.kind) {
		case "found": {
			const { start, end } = outcome.span;
			io.stdout(`${outcome.strategy} ${start}..${end} (line ${lineOf(script, start)})`);
			return 0;
		}
		case "ambiguous":
			io.stderr(chalk.yellow(`Ambiguous (${outcome.strategy}): ${outcome.reason}`));
			return 1;
		case "not-found":
			io.stderr(chalk.red("Snippet not found in script"));
			return 1;
	}
}

function readScene(file: string | undefined): SceneDescription {
	if (file === undefined) return {};
	const data: unknown = JSON.parse(readText(file, "scene description"));
	if (typeof data !== "object" || data === null || Array.isArray(data)) {
		throw new UsageError(`Scene description in ${file} must be a JSON object`);
	}
	return Object.fromEntries(Object.entries(data));
}

interface Runtime {
	config: Config;
	client: ModelClient;
}

function loadRuntime(args: Args, options: MainOptions): Runtime {
	const { config, file } = loadConfig({ path: args.config });
	setLogLevel(args.logLevel ?? configLogLevel(config));
	logger.debug("Configuration loaded", { file: file ?? "(defaults)", backend: config.llm.backend });
	const client = options.createClient ? options.createClient(config) : createModelClient(providerSettings(config));
	return { config, client };
}

async function runRefine(args: Args, io: CliIO, options: MainOptions): Promise<number> {
	const [scriptPath] = requireFiles(args, 1, "refine <script> --feedback <text>");
	if (!args.feedback) {
		throw new UsageError("refine needs --feedback <text>");
	}
	const script = readText(scriptPath, "script");
	const scene = readScene(args.scene);

	const { client } = loadRuntime(args, options);
	const generator = new ScriptGenerator(client);
	const refined = await generator.refine({ code: script, iteration: 1, editBased: false }, scene, args.feedback, 2);

	emitScript(refined.code, { ...args, diff: false }, io);
	io.stderr(
		refined.editBased
			? chalk.green(`Refined with ${refined.editsApplied ?? 0} edit(s)`)
			: chalk.yellow("Edits could not be applied; script was regenerated"),
	);
	return 0;
}

function createHost(config: Config): SceneHost {
	if (config.host.command === undefined) {
		throw new UsageError("run needs host.command in the configuration file");
	}
	return new CommandHost({
		command: config.host.command,
		outputDir: config.pipeline.outputDir,
		timeout: config.host.timeout,
	});
}

function describeIteration(record: IterationRecord): string {
	if (record.error !== undefined) return `[${record.iteration}] ERROR ${record.error}`;
	if (record.critique === undefined) return `[${record.iteration}] ?`;
	return `[${record.iteration}] ${record.critique.verdict.toUpperCase()} (${record.critique.score.toFixed(1)}/10)`;
}

async function runPipeline(args: Args, io: CliIO, options: MainOptions): Promise<number> {
	const [scenePath] = requireFiles(args, 1, "run <scene.json> --prompt <text>");
	if (!args.prompt) {
		throw new UsageError("run needs --prompt <text>");
	}
	const scene = readScene(scenePath);

	const { config, client } = loadRuntime(args, options);
	const host = options.createHost ? options.createHost(config) : createHost(config);
	const { pipeline } = config;
	const loop = new RefinementLoop({
		generator: new ScriptGenerator(client),
		critic: new CriticAgent(client, { passThreshold: pipeline.passThreshold, policy: pipeline.verdictPolicy }),
		host,
		maxRetries: pipeline.maxRetries,
		onIteration: record => io.stderr(describeIteration(record)),
	});

	const result = await loop.run(args.prompt, scene, args.references.length > 0 ? args.references : undefined);
	io.stdout(`Status: ${result.status}`);
	io.stdout(`Iterations: ${result.iterations.length}`);
	if (result.reason !== undefined) {
		io.stdout(`Reason: ${result.reason}`);
	}
	if (result.best !== undefined) {
		io.stdout(`Best: iteration ${result.best.iteration} (score ${result.best.critique?.score.toFixed(1) ?? "?"})`);
		if (args.output && result.best.script) {
			emitScript(result.best.script.code, args, io);
		}
	}
	return result.status === "success" ? 0 : 1;
}

export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
	const io = options.io ?? processIO;
	const args = parseArgs(argv);

	if (args.version) {
		io.stdout(readVersion());
		return 0;
	}
	if (args.help || (args.command === undefined && args.errors.length === 0)) {
		printHelp();
		return 0;
	}
	if (args.errors.length > 0) {
		for (const error of args.errors) io.stderr(chalk.red(error));
		return 1;
	}
	if (args.logLevel) {
		setLogLevel(args.logLevel);
	}

	try {
		switch (args.command) {
			case "apply":
				return runApply(args, io);
			case "locate":
				return runLocate(args, io);
			case "refine":
				return await runRefine(args, io, options);
			case "run":
				return await runPipeline(args, io, options);
			default:
				return 1;
		}
	} catch (err) {
		io.stderr(chalk.red(`Error: ${errorMessage(err)}`));
		if (!(err instanceof UsageError)) {
			logger.error("Command failed", err instanceof Error ? err : { error: String(err) });
		}
		return 1;
	}
}
