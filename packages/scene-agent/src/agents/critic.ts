/**
 * Vision critique of rendered scenes.
 */
import * as fs from "node:fs";
import type { ModelClient } from "@scene-forge/ai";
import { logger as baseLogger, type Logger } from "@scene-forge/utils";
import { extractJson } from "../utils/json-extract";
import { renderTemplate } from "./template";
import {
	type CritiqueResult,
	formatSceneDescription,
	type RenderOutput,
	type SceneDescription,
	type Verdict,
	type VerdictPolicy,
} from "./types";

export const DEFAULT_PASS_THRESHOLD = 7;

const DEFAULT_SCORE = 5;
const RAW_FEEDBACK_LIMIT = 800;

export const DEFAULT_CRITIC_TEMPLATE = `Evaluate this 3D model render against the user's prompt.
Output JSON: {"verdict": "pass/fail", "score": 0-10, "feedback": "...", "issues": [...], "suggestions": [...]}

User prompt: {user_prompt}
Scene description: {scene_description}`;

export function computeVerdict(
	modelVerdict: string,
	score: number,
	threshold: number,
	policy: VerdictPolicy = "score",
): Verdict {
	if (score < threshold) return "fail";
	if (policy === "strict" && modelVerdict !== "pass") return "fail";
	return "pass";
}

function clampScore(raw: unknown): number {
	const score = typeof raw === "number" ? raw : typeof raw === "string" && raw.trim() !== "" ? Number(raw) : Number.NaN;
	if (!Number.isFinite(score)) return DEFAULT_SCORE;
	return Math.min(10, Math.max(0, score));
}

function toStringList(raw: unknown): string[] {
	if (Array.isArray(raw)) return raw.map(item => String(item));
	return raw ? [String(raw)] : [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface ParseCritiqueOptions {
	passThreshold?: number;
	policy?: VerdictPolicy;
}

/**
 * Turn a critic response into a {@link CritiqueResult}. Never throws: a
 * response without usable JSON becomes a failing result quoting the raw text.
 */
export function parseCritique(response: string, iteration: number, options: ParseCritiqueOptions = {}): CritiqueResult {
	const threshold = options.passThreshold ?? DEFAULT_PASS_THRESHOLD;
	const data = extractJson(response, "object");

	if (!isRecord(data)) {
		baseLogger.warn("Critique response has no JSON object", { length: response.length });
		return {
			verdict: "fail",
			score: DEFAULT_SCORE,
			feedback: `Model provided feedback but in wrong format. Raw response: ${response.slice(0, RAW_FEEDBACK_LIMIT)}`,
			issues: ["Critique parsing failed"],
			suggestions: ["Continue iterating based on the raw feedback above"],
			iteration,
		};
	}

	const modelVerdict = String(data.verdict ?? "fail").toLowerCase();
	const score = clampScore(data.score);
	return {
		verdict: computeVerdict(modelVerdict, score, threshold, options.policy),
		score,
		feedback: data.feedback === undefined ? "No feedback provided" : String(data.feedback),
		issues: toStringList(data.issues),
		suggestions: toStringList(data.suggestions),
		iteration,
	};
}

export interface CriticAgentOptions {
	passThreshold?: number;
	policy?: VerdictPolicy;
	/** Prompt with `{user_prompt}` and `{scene_description}` placeholders */
	template?: string;
	logger?: Logger;
}

export class CriticAgent {
	readonly passThreshold: number;
	readonly policy: VerdictPolicy;
	#template: string;
	#logger: Logger;

	constructor(
		private readonly client: ModelClient,
		options: CriticAgentOptions = {},
	) {
		this.passThreshold = options.passThreshold ?? DEFAULT_PASS_THRESHOLD;
		this.policy = options.policy ?? "score";
		this.#template = options.template ?? DEFAULT_CRITIC_TEMPLATE;
		this.#logger = options.logger ?? baseLogger.child({ module: "critic" });
	}

	async critique(
		render: RenderOutput,
		userPrompt: string,
		scene: SceneDescription,
		iteration: number,
		referenceImages?: readonly string[],
	): Promise<CritiqueResult> {
		this.#logger.info("Critiquing render", { iteration });

		if (render.hostError) {
			this.#logger.error("Scene script failed in the modeling host", { error: render.hostError.slice(0, 200) });
			return {
				verdict: "fail",
				score: 0,
				feedback: `Blender script failed with error:\n${render.hostError}`,
				issues: ["Script execution error"],
				suggestions: ["Fix the Python error in the generated script"],
				iteration,
			};
		}

		const images = render.imagePaths.filter(imagePath => fs.existsSync(imagePath));
		if (images.length === 0) {
			this.#logger.error("No render images found for critique");
			return {
				verdict: "fail",
				score: 0,
				feedback: "No render images were produced. The script may have failed. Check blender.log for details.",
				issues: ["No render output"],
				suggestions: ["Check script for errors", "Verify Blender execution"],
				iteration,
			};
		}

		const prompt = renderTemplate(this.#template, {
			user_prompt: userPrompt,
			scene_description: formatSceneDescription(scene),
		});
		// reference images follow the renders
		const references = referenceImages?.filter(imagePath => fs.existsSync(imagePath)) ?? [];
		const response = await this.client.analyzeImages({ imagePaths: [...images, ...references], prompt });
		this.#logger.debug("Critic response received", { length: response.length });

		return parseCritique(response, iteration, { passThreshold: this.passThreshold, policy: this.policy });
	}
}
