/**
 * Edit target location.
 *
 * Four matchers are tried strictest first:
 * 1. Exact substring
 * 2. Trailing whitespace ignored on every line
 * 3. Snippet re-indented to each indentation level present in the buffer
 * 4. Whitespace-only lines ignored
 *
 * The first matcher that finds a unique span, or that sees more than one
 * candidate, decides the outcome. Only `not-found` moves on to the next one.
 */
import {
	collectIndentLevels,
	detectIndent,
	reindent,
	scanOccurrences,
	stripBlankLines,
	trimLineEnds,
} from "./normalize";
import { buildCollapsedView, buildTrimmedView, mapCollapsedOffset, mapTrimmedOffset } from "./remap";
import type { Matcher, MatchOutcome, Span } from "./types";

const NOT_FOUND: MatchOutcome = { kind: "not-found" };

// ═══════════════════════════════════════════════════════════════════════════
// Matchers
// ═══════════════════════════════════════════════════════════════════════════

/** Literal search. A verbatim duplicate can't be told apart by any looser matcher. */
export const exactMatcher: Matcher = {
	strategy: "exact",
	match(buffer, target) {
		const { first, count } = scanOccurrences(buffer, target);
		if (count === 0) return NOT_FOUND;
		if (count > 1) {
			return {
				kind: "ambiguous",
				strategy: "exact",
				reason: `appears ${count} times in script`,
				occurrences: count,
			};
		}
		return { kind: "found", strategy: "exact", span: { start: first, end: first + target.length } };
	},
};

export const lineTrimmedMatcher: Matcher = {
	strategy: "line-trimmed",
	match(buffer, target) {
		const trimmedTarget = trimLineEnds(target);
		const view = buildTrimmedView(buffer);
		const { first, count } = scanOccurrences(view.text, trimmedTarget);
		if (count === 0) return NOT_FOUND;
		if (count > 1) {
			return {
				kind: "ambiguous",
				strategy: "line-trimmed",
				reason: `appears ${count} times once trailing whitespace is ignored`,
				occurrences: count,
			};
		}
		return {
			kind: "found",
			strategy: "line-trimmed",
			span: {
				start: mapTrimmedOffset(view, first),
				end: mapTrimmedOffset(view, first + trimmedTarget.length),
			},
		};
	},
};

export const indentationMatcher: Matcher = {
	strategy: "indentation",
	match(buffer, target) {
		const targetIndent = detectIndent(target);
		if (targetIndent === undefined) return NOT_FOUND;

		const hits: Array<{ indent: number; span: Span }> = [];
		for (const indent of collectIndentLevels(buffer)) {
			// the snippet's own level was already covered by the stricter matchers
			if (indent === targetIndent) continue;

			const variant = reindent(target, targetIndent, indent);
			const { first, count } = scanOccurrences(buffer, variant);
			if (count === 0) continue;
			if (count > 1) {
				return {
					kind: "ambiguous",
					strategy: "indentation",
					reason: `appears ${count} times when re-indented to ${indent} spaces`,
					occurrences: count,
				};
			}
			hits.push({ indent, span: { start: first, end: first + variant.length } });
		}

		if (hits.length === 0) return NOT_FOUND;
		if (hits.length > 1) {
			return {
				kind: "ambiguous",
				strategy: "indentation",
				reason: `matches at indentation levels ${hits.map(hit => hit.indent).join(", ")}`,
				occurrences: hits.length,
			};
		}
		return { kind: "found", strategy: "indentation", span: hits[0].span };
	},
};

/** Loosest matcher: blank lines may be added or dropped on either side. */
export const blankLineMatcher: Matcher = {
	strategy: "blank-lines",
	match(buffer, target) {
		const collapsedTarget = stripBlankLines(target);
		const view = buildCollapsedView(buffer);
		const { first, count } = scanOccurrences(view.text, collapsedTarget);
		if (count === 0) return NOT_FOUND;
		if (count > 1) {
			return {
				kind: "ambiguous",
				strategy: "blank-lines",
				reason: `appears ${count} times once blank lines are ignored`,
				occurrences: count,
			};
		}
		return {
			kind: "found",
			strategy: "blank-lines",
			span: {
				start: mapCollapsedOffset(view, first),
				end: mapCollapsedOffset(view, first + collapsedTarget.length),
			},
		};
	},
};

export const MATCHERS: readonly Matcher[] = [exactMatcher, lineTrimmedMatcher, indentationMatcher, blankLineMatcher];

// ═══════════════════════════════════════════════════════════════════════════
// Cascade
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Locate `target` inside `buffer`.
 * The returned span always refers to `buffer` itself, never to a normalized view.
 */
export function locateEdit(buffer: string, target: string, matchers: readonly Matcher[] = MATCHERS): MatchOutcome {
	if (target.length === 0) return NOT_FOUND;
	for (const matcher of matchers) {
		const outcome = matcher.match(buffer, target);
		if (outcome.kind !== "not-found") return outcome;
	}
	return NOT_FOUND;
}
