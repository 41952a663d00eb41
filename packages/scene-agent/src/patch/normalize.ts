/**
 * Text normalization helpers used by the matchers.
 */

export function isBlankLine(line: string): boolean {
	return line.trim().length === 0;
}

/** Leading whitespace width of a line, in characters. */
export function countLeadingWhitespace(line: string): number {
	return line.length - line.trimStart().length;
}

/** Strip trailing whitespace from every line, keeping line count and leading indentation. */
export function trimLineEnds(text: string): string {
	return text
		.split("\n")
		.map(line => line.trimEnd())
		.join("\n");
}

/** Drop every whitespace-only line. */
export function stripBlankLines(text: string): string {
	return text
		.split("\n")
		.filter(line => !isBlankLine(line))
		.join("\n");
}

/** Indentation of the first non-blank line, or `undefined` when every line is blank. */
export function detectIndent(text: string): number | undefined {
	for (const line of text.split("\n")) {
		if (!isBlankLine(line)) {
			return countLeadingWhitespace(line);
		}
	}
	return undefined;
}

/**
 * Shift every line by `to - from` columns of spaces.
 * Blank lines become empty; indentation never goes below zero.
 */
export function reindent(text: string, from: number, to: number): string {
	const delta = to - from;
	return text
		.split("\n")
		.map(line => {
			if (isBlankLine(line)) return "";
			const indent = Math.max(0, countLeadingWhitespace(line) + delta);
			return " ".repeat(indent) + line.trimStart();
		})
		.join("\n");
}

/** Distinct indentation widths of the non-blank lines of `text`, ascending. */
export function collectIndentLevels(text: string): number[] {
	const levels = new Set<number>();
	for (const line of text.split("\n")) {
		if (!isBlankLine(line)) {
			levels.add(countLeadingWhitespace(line));
		}
	}
	return [...levels].sort((a, b) => a - b);
}

export interface OccurrenceScan {
	/** Offset of the first occurrence, -1 when absent */
	first: number;
	/** Number of occurrences, overlapping ones included */
	count: number;
}

/** An empty needle has no occurrences. */
export function scanOccurrences(haystack: string, needle: string): OccurrenceScan {
	if (needle.length === 0) return { first: -1, count: 0 };
	const first = haystack.indexOf(needle);
	if (first === -1) return { first, count: 0 };
	let count = 1;
	let next = haystack.indexOf(needle, first + 1);
	while (next !== -1) {
		count++;
		next = haystack.indexOf(needle, next + 1);
	}
	return { first, count };
}
