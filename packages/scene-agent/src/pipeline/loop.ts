/**
 * Generate → run → critique → refine, until the critic passes a render or
 * the iteration budget runs out.
 */
import { errorMessage, logger as baseLogger, type Logger } from "@scene-forge/utils";
import type { CriticAgent } from "../agents/critic";
import type { ScriptGenerator } from "../agents/generator";
import type { CritiqueResult, GeneratedScript, RenderOutput, SceneDescription } from "../agents/types";
import type { SceneHost } from "./host";

export type PipelineStatus = "success" | "max-retries" | "failed";

export interface IterationRecord {
	iteration: number;
	script?: GeneratedScript;
	render?: RenderOutput;
	critique?: CritiqueResult;
	/** Set when the iteration threw before a critique was made */
	error?: string;
}

export interface PipelineResult {
	status: PipelineStatus;
	iterations: IterationRecord[];
	/** The passing iteration, or the best-scoring one when none passed */
	best?: IterationRecord;
	/** Why the loop stopped early */
	reason?: string;
}

/** Window of recent iterations the early-stop rules look at */
const STALL_WINDOW = 3;
/** A declining run must end below this score to stop the loop */
const DECLINE_FLOOR = 3;

/** Reason to abandon the loop, from the last three iterations; undefined to keep going. */
export function shouldStopEarly(iterations: readonly IterationRecord[]): string | undefined {
	if (iterations.length < STALL_WINDOW) return undefined;
	const recent = iterations.slice(-STALL_WINDOW);

	const errors = recent.flatMap(record => (record.error === undefined ? [] : [record.error]));
	if (errors.length === STALL_WINDOW && errors.every(error => error === errors[0])) {
		return `Same error repeated ${STALL_WINDOW} times: ${errors[0].slice(0, 100)}`;
	}

	const scores = recent.flatMap(record => (record.critique === undefined ? [] : [record.critique.score]));
	if (scores.length === STALL_WINDOW) {
		const [first, second, last] = scores;
		if (last < second && second < first && last < DECLINE_FLOOR) {
			return "Scores declining and below threshold";
		}
	}
	return undefined;
}

/** Critique feedback with its issues and suggestions appended as bullet lists. */
export function mergeFeedback(critique: CritiqueResult): string {
	const parts = [critique.feedback];
	if (critique.issues.length > 0) {
		parts.push(`\nKey Issues:\n${critique.issues.map(issue => `  - ${issue}`).join("\n")}`);
	}
	if (critique.suggestions.length > 0) {
		parts.push(`\nSuggestions:\n${critique.suggestions.map(suggestion => `  - ${suggestion}`).join("\n")}`);
	}
	return parts.join("\n");
}

function bestScoring(iterations: readonly IterationRecord[]): IterationRecord | undefined {
	let best: IterationRecord | undefined;
	for (const record of iterations) {
		const score = record.critique?.score ?? 0;
		if (score > 0 && score > (best?.critique?.score ?? 0)) best = record;
	}
	return best;
}

export interface RefinementLoopOptions {
	generator: ScriptGenerator;
	critic: CriticAgent;
	host: SceneHost;
	maxRetries: number;
	onIteration?: (record: IterationRecord) => void;
	logger?: Logger;
}

export class RefinementLoop {
	#logger: Logger;

	constructor(private readonly options: RefinementLoopOptions) {
		this.#logger = options.logger ?? baseLogger.child({ module: "pipeline" });
	}

	async run(userPrompt: string, scene: SceneDescription, referenceImages?: string[]): Promise<PipelineResult> {
		const { generator, critic, host, maxRetries } = this.options;
		const iterations: IterationRecord[] = [];
		let feedback: string | undefined;
		let lastScript: GeneratedScript | undefined;

		while (iterations.length < maxRetries) {
			const iteration = iterations.length + 1;
			this.#logger.info("Starting iteration", { iteration, maxRetries });
			const record: IterationRecord = { iteration };

			try {
				const script =
					feedback !== undefined && lastScript !== undefined
						? await generator.refine(lastScript, scene, feedback, iteration)
						: await generator.generate(scene, iteration, feedback);
				record.script = script;
				lastScript = script;

				record.render = await host.run(script);
				const critique = await critic.critique(record.render, userPrompt, scene, iteration, referenceImages);
				record.critique = critique;
				this.#logger.info("Critique received", { iteration, verdict: critique.verdict, score: critique.score });

				if (critique.verdict === "fail") {
					feedback = mergeFeedback(critique);
				}
			} catch (err) {
				record.error = errorMessage(err);
				feedback = `Error in previous iteration: ${record.error}`;
				this.#logger.error("Iteration failed", { iteration, error: record.error });
			}

			iterations.push(record);
			this.options.onIteration?.(record);

			if (record.critique?.verdict === "pass") {
				return { status: "success", iterations, best: record };
			}
			const reason = shouldStopEarly(iterations);
			if (reason !== undefined) {
				this.#logger.warn("Stopping early", { reason });
				return { status: "failed", iterations, best: bestScoring(iterations), reason };
			}
		}

		this.#logger.warn("Max retries reached", { maxRetries });
		return { status: "max-retries", iterations, best: bestScoring(iterations) };
	}
}
