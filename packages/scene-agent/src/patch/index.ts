/**
 * Edit engine: locate `old_code` snippets in a script and apply batches of
 * edits atomically.
 */
export { type ApplyEditsOptions, applyEdits } from "./applicator";
export { generateDiffString, generateUnifiedDiffString, type ScriptDiff } from "./diff";
export {
	blankLineMatcher,
	exactMatcher,
	indentationMatcher,
	lineTrimmedMatcher,
	locateEdit,
	MATCHERS,
} from "./fuzzy";
export {
	collectIndentLevels,
	countLeadingWhitespace,
	detectIndent,
	isBlankLine,
	reindent,
	scanOccurrences,
	stripBlankLines,
	trimLineEnds,
} from "./normalize";
export { type EditList, editListSchema, editRecordSchema, parseEditResponse } from "./parser";
export {
	buildCollapsedView,
	buildTrimmedView,
	type CollapsedView,
	mapCollapsedOffset,
	mapTrimmedOffset,
	type TrimmedView,
} from "./remap";
export type { EditRecord, EditResult, Matcher, MatchOutcome, MatchStrategy, Span } from "./types";
