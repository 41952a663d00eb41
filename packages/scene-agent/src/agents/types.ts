/** Free-form structured description of the scene a script should build. */
export type SceneDescription = Record<string, unknown>;

export type Verdict = "pass" | "fail";

/**
 * How a critique's verdict is decided.
 * - `score`: pass whenever the score reaches the threshold
 * - `strict`: the model must also say pass
 */
export type VerdictPolicy = "score" | "strict";

export interface CritiqueResult {
	verdict: Verdict;
	/** 0 to 10 */
	score: number;
	feedback: string;
	issues: string[];
	suggestions: string[];
	iteration: number;
}

/** What the modeling host produced for one script run. */
export interface RenderOutput {
	imagePaths: string[];
	/** Error output when the script itself failed */
	hostError?: string;
}

export interface GeneratedScript {
	code: string;
	iteration: number;
	basedOnFeedback?: string;
	editBased: boolean;
	editsApplied?: number;
}

export function formatSceneDescription(scene: SceneDescription): string {
	return JSON.stringify(scene, null, 2);
}
