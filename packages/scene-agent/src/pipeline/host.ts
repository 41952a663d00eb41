/**
 * Modeling host access.
 *
 * The refinement loop only sees {@link SceneHost}. {@link CommandHost} runs a
 * configured shell command per iteration and collects the images it renders.
 */
import { spawn } from "node:child_process";
import * as fs from "node:fs";
import * as path from "node:path";
import { logger as baseLogger, type Logger } from "@scene-forge/utils";
import { renderTemplate } from "../agents/template";
import type { GeneratedScript, RenderOutput } from "../agents/types";

export interface SceneHost {
	/** Run `script` and report what it rendered. Script failures belong in `hostError`, not a rejection. */
	run(script: GeneratedScript): Promise<RenderOutput>;
}

export interface CommandHostOptions {
	/** Shell command with `{script}` and `{output_dir}` placeholders */
	command: string;
	outputDir: string;
	/** Seconds before the command is killed */
	timeout: number;
	logger?: Logger;
}

const IMAGE_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".webp"]);
const OUTPUT_TAIL = 2000;

export function iterationDir(outputDir: string, iteration: number): string {
	return path.join(outputDir, `iteration_${String(iteration).padStart(2, "0")}`);
}

/** Rendered images in `dir`, sorted by name. */
export function collectImages(dir: string): string[] {
	return fs
		.readdirSync(dir)
		.filter(name => IMAGE_EXTENSIONS.has(path.extname(name).toLowerCase()))
		.sort()
		.map(name => path.join(dir, name));
}

interface CommandResult {
	output: string;
	exitCode: number | null;
	timedOut: boolean;
}

function runCommand(command: string, cwd: string, timeoutMs: number): Promise<CommandResult> {
	return new Promise((resolve, reject) => {
		const child = spawn(command, { cwd, shell: true, stdio: ["ignore", "pipe", "pipe"] });
		const chunks: string[] = [];
		let timedOut = false;
		const timer = setTimeout(() => {
			timedOut = true;
			child.kill("SIGKILL");
		}, timeoutMs);

		const handleData = (data: Buffer) => chunks.push(data.toString());
		child.stdout.on("data", handleData);
		child.stderr.on("data", handleData);
		child.on("error", err => {
			clearTimeout(timer);
			reject(err);
		});
		child.on("close", code => {
			clearTimeout(timer);
			resolve({ output: chunks.join(""), exitCode: code, timedOut });
		});
	});
}

export class CommandHost implements SceneHost {
	#logger: Logger;

	constructor(private readonly options: CommandHostOptions) {
		this.#logger = options.logger ?? baseLogger.child({ module: "host" });
	}

	async run(script: GeneratedScript): Promise<RenderOutput> {
		const dir = path.resolve(iterationDir(this.options.outputDir, script.iteration));
		fs.mkdirSync(dir, { recursive: true });
		const scriptPath = path.join(dir, "scene.py");
		fs.writeFileSync(scriptPath, script.code);

		const command = renderTemplate(this.options.command, { script: scriptPath, output_dir: dir });
		this.#logger.info("Running modeling host", { iteration: script.iteration, command });
		const result = await runCommand(command, dir, this.options.timeout * 1000);
		fs.writeFileSync(path.join(dir, "host.log"), result.output);

		if (result.timedOut) {
			return { imagePaths: [], hostError: `Host timed out after ${this.options.timeout}s` };
		}
		if (result.exitCode !== 0) {
			return {
				imagePaths: collectImages(dir),
				hostError: `Host exited with code ${result.exitCode}:\n${result.output.slice(-OUTPUT_TAIL)}`,
			};
		}
		return { imagePaths: collectImages(dir) };
	}
}
