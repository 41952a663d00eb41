/**
 * Shared types for the edit engine.
 */

/** A requested substitution, in the shape the model emits it. */
export interface EditRecord {
	old_code: string;
	new_code: string;
}

/** Half-open `[start, end)` range of UTF-16 offsets into one specific buffer. */
export interface Span {
	start: number;
	end: number;
}

export type MatchStrategy = "exact" | "line-trimmed" | "indentation" | "blank-lines";

/**
 * Result of one matcher, or of the whole cascade.
 *
 * `ambiguous` is final: the cascade never falls through to a looser matcher
 * once a stricter one has seen more than one candidate.
 */
export type MatchOutcome =
	| { kind: "found"; span: Span; strategy: MatchStrategy }
	| { kind: "not-found" }
	| { kind: "ambiguous"; strategy: MatchStrategy; reason: string; occurrences?: number };

export interface Matcher {
	strategy: MatchStrategy;
	match(buffer: string, target: string): MatchOutcome;
}

export interface EditResult {
	success: boolean;
	/** Final buffer on success; the untouched input buffer on failure. */
	code: string;
	appliedCount: number;
	error?: string;
	/** 1-based index of the edit that stopped the batch */
	failedIndex?: number;
	/** Strategy that located each applied edit, in order */
	strategies: MatchStrategy[];
}
