/**
 * Scene script generation and refinement.
 *
 * Refinement asks the model for `{ old_code, new_code }` edits against the
 * current script first. A response that doesn't parse or a batch the engine
 * rejects falls back to regenerating the whole script with the previous code
 * folded into the feedback.
 */
import type { ModelClient } from "@scene-forge/ai";
import { errorMessage, logger as baseLogger, type Logger } from "@scene-forge/utils";
import { applyEdits } from "../patch/applicator";
import { parseEditResponse } from "../patch/parser";
import { renderTemplate } from "./template";
import { formatSceneDescription, type GeneratedScript, type SceneDescription } from "./types";

export const DEFAULT_GENERATOR_TEMPLATE = `You are a Blender Python script generator.
Create a complete, executable script that generates the described 3D model.
Use the bpy module. Save the file using OUTPUT_BLEND_PATH variable.

Scene: {scene_description}
Feedback: {feedback}`;

export const DEFAULT_REFINE_TEMPLATE = `You are editing an existing Blender Python script.
Return only a JSON array of edits: [{"old_code": "...", "new_code": "..."}].
Each old_code must be copied exactly from the script and occur in it once.

Current script:
\`\`\`python
{current_code}
\`\`\`

Feedback:
{feedback}`;

const FIRST_ITERATION_FEEDBACK = "None - this is the first iteration";
const GENERATE_MAX_TOKENS = 4000;
const REFINE_MAX_TOKENS = 1500;

const PYTHON_FENCE = /```python\n([\s\S]*?)```/;
const ANY_FENCE = /```\n([\s\S]*?)```/;

/** Code from the first python fence, else the first bare fence, else the whole response. */
export function extractCode(response: string): string {
	const block = PYTHON_FENCE.exec(response)?.[1] ?? ANY_FENCE.exec(response)?.[1];
	return (block ?? response).trim();
}

export interface ScriptGeneratorOptions {
	/** Prompt with `{scene_description}` and `{feedback}` placeholders */
	template?: string;
	/** Prompt with `{current_code}` and `{feedback}`; `null` disables edit-based refinement */
	refineTemplate?: string | null;
	logger?: Logger;
}

export class ScriptGenerator {
	#template: string;
	#refineTemplate: string | null;
	#logger: Logger;

	constructor(
		private readonly client: ModelClient,
		options: ScriptGeneratorOptions = {},
	) {
		this.#template = options.template ?? DEFAULT_GENERATOR_TEMPLATE;
		this.#refineTemplate = options.refineTemplate === undefined ? DEFAULT_REFINE_TEMPLATE : options.refineTemplate;
		this.#logger = options.logger ?? baseLogger.child({ module: "generator" });
	}

	async generate(
		scene: SceneDescription,
		iteration = 1,
		feedback?: string,
		referenceImages?: string[],
	): Promise<GeneratedScript> {
		this.#logger.info("Generating script", { iteration });
		const prompt = renderTemplate(this.#template, {
			scene_description: formatSceneDescription(scene),
			feedback: feedback ?? FIRST_ITERATION_FEEDBACK,
		});
		const response = await this.#call(prompt, GENERATE_MAX_TOKENS, referenceImages);
		return { code: extractCode(response), iteration, basedOnFeedback: feedback, editBased: false };
	}

	async refine(
		previous: GeneratedScript,
		scene: SceneDescription,
		feedback: string,
		iteration: number,
		referenceImages?: string[],
	): Promise<GeneratedScript> {
		if (this.#refineTemplate !== null) {
			try {
				return await this.#refineByEdits(this.#refineTemplate, previous, feedback, iteration, referenceImages);
			} catch (err) {
				this.#logger.warn("Edit-based refinement failed, regenerating", { error: errorMessage(err) });
			}
		}

		const fullFeedback = `Previous script (iteration ${previous.iteration}):
\`\`\`python
${previous.code}
\`\`\`

Critic feedback:
${feedback}

Please fix the issues mentioned above while keeping what works well.`;
		return this.generate(scene, iteration, fullFeedback, referenceImages);
	}

	async #refineByEdits(
		template: string,
		previous: GeneratedScript,
		feedback: string,
		iteration: number,
		referenceImages: string[] | undefined,
	): Promise<GeneratedScript> {
		const prompt = renderTemplate(template, { current_code: previous.code, feedback });
		const response = await this.#call(prompt, REFINE_MAX_TOKENS, referenceImages);

		const edits = parseEditResponse(response);
		if (edits === undefined) {
			throw new Error("Failed to parse edits from model response");
		}
		const result = applyEdits(previous.code, edits, { logger: this.#logger });
		if (!result.success) {
			throw new Error(result.error ?? "Edit application failed");
		}

		this.#logger.info("Edit-based refinement succeeded", { edits: result.appliedCount });
		return {
			code: result.code,
			iteration,
			basedOnFeedback: feedback,
			editBased: true,
			editsApplied: result.appliedCount,
		};
	}

	#call(prompt: string, maxTokens: number, referenceImages: string[] | undefined): Promise<string> {
		if (referenceImages && referenceImages.length > 0) {
			this.#logger.debug("Model call with reference images", { images: referenceImages.length });
			return this.client.analyzeImages({ imagePaths: referenceImages, prompt, maxTokens });
		}
		return this.client.generate({ prompt, temperature: 1, maxTokens });
	}
}
