/**
 * CLI argument parsing and help display
 */
import { isLogLevel, type LogLevel, LOG_LEVELS } from "@scene-forge/utils";
import chalk from "chalk";
import { APP_NAME } from "../config/config";

export type Command = "apply" | "locate" | "refine" | "run";

const COMMANDS: readonly Command[] = ["apply", "locate", "refine", "run"];

export interface Args {
	command?: Command;
	/** Positional arguments after the command */
	files: string[];
	output?: string;
	diff?: boolean;
	json?: boolean;
	feedback?: string;
	scene?: string;
	prompt?: string;
	references: string[];
	config?: string;
	logLevel?: LogLevel;
	help?: boolean;
	version?: boolean;
	/** Problems found while parsing, reported before anything runs */
	errors: string[];
}

function isCommand(value: string): value is Command {
	return COMMANDS.some(command => command === value);
}

export function parseArgs(args: string[]): Args {
	const result: Args = { files: [], references: [], errors: [] };

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];

		if (arg === "--help" || arg === "-h") {
			result.help = true;
		} else if (arg === "--version" || arg === "-v") {
			result.version = true;
		} else if ((arg === "--output" || arg === "-o") && i + 1 < args.length) {
			result.output = args[++i];
		} else if (arg === "--diff") {
			result.diff = true;
		} else if (arg === "--json") {
			result.json = true;
		} else if (arg === "--feedback" && i + 1 < args.length) {
			result.feedback = args[++i];
		} else if (arg === "--scene" && i + 1 < args.length) {
			result.scene = args[++i];
		} else if (arg === "--prompt" && i + 1 < args.length) {
			result.prompt = args[++i];
		} else if (arg === "--reference" && i + 1 < args.length) {
			result.references.push(args[++i]);
		} else if (arg === "--config" && i + 1 < args.length) {
			result.config = args[++i];
		} else if (arg === "--log-level" && i + 1 < args.length) {
			const level = args[++i];
			if (isLogLevel(level)) {
				result.logLevel = level;
			} else {
				result.errors.push(`Invalid log level "${level}". Valid values: ${LOG_LEVELS.join(", ")}`);
			}
		} else if (arg.startsWith("-")) {
			result.errors.push(`Unknown option "${arg}"`);
		} else if (result.command === undefined) {
			if (isCommand(arg)) {
				result.command = arg;
			} else {
				result.errors.push(`Unknown command "${arg}". Valid commands: ${COMMANDS.join(", ")}`);
			}
		} else {
			result.files.push(arg);
		}
	}

	return result;
}

export function printHelp(): void {
	console.log(`${chalk.bold(APP_NAME)} - apply model-proposed edits to scene scripts

${chalk.bold("Usage:")}
  ${APP_NAME} apply <script> <edits.json> [--output <file>] [--diff] [--json]
  ${APP_NAME} locate <script> <snippet-file>
  ${APP_NAME} refine <script> --feedback <text> [--scene <file>] [--config <file>] [--output <file>]
  ${APP_NAME} run <scene.json> --prompt <text> [--reference <image>]... [--config <file>] [--output <file>]

${chalk.bold("Commands:")}
  apply                   Apply a batch of { old_code, new_code } edits; all or nothing
  locate                  Report where a snippet matches and which matcher found it
  refine                  Ask the configured model for edits that address the feedback
  run                     Generate, render with host.command, critique and refine until the
                          render passes or pipeline.maxRetries is reached

${chalk.bold("Options:")}
  --output, -o <file>     Write the resulting script to a file instead of stdout
  --diff                  Print a unified diff of the change
  --json                  Print the edit result as JSON
  --feedback <text>       Critique to address (refine)
  --scene <file>          Scene description JSON (refine)
  --prompt <text>         What the scene should show (run)
  --reference <image>     Reference image for the critic (run, repeatable)
  --config <file>         Configuration file (default: first of ./config.yaml, ./config.yml,
                          ~/.config/${APP_NAME}/config.yaml, ~/.${APP_NAME}.yaml)
  --log-level <level>     ${LOG_LEVELS.join(", ")}
  --help, -h              Show this help
  --version, -v           Show version number

${chalk.bold("Examples:")}
  # Apply edits from a raw model response and show the diff
  ${APP_NAME} apply scene.py response.txt --diff --output scene.fixed.py

  # Check whether a snippet can be located unambiguously
  ${APP_NAME} locate scene.py snippet.txt

${chalk.bold("Environment Variables:")}
  OPENAI_API_KEY          - OpenAI API key when none is configured
  LOG_LEVEL               - Log level (default: info); logs go to stderr
`);
}
