/**
 * Diff rendering for applied edit batches.
 */
import * as Diff from "diff";

export interface ScriptDiff {
	/** Numbered diff: `-N old`, `+N new`, ` N context`, with `...` for skipped runs */
	diff: string;
	/** First changed line in the edited script, 1-based */
	firstChangedLine: number | undefined;
	added: number;
	removed: number;
}

function splitPart(value: string): string[] {
	const lines = value.split("\n");
	if (lines[lines.length - 1] === "") lines.pop();
	return lines;
}

/**
 * Line-numbered diff between two versions of a script, showing `contextLines`
 * unchanged lines around each change.
 */
export function generateDiffString(before: string, after: string, contextLines = 3): ScriptDiff {
	const parts = Diff.diffLines(before, after);
	const width = String(Math.max(before.split("\n").length, after.split("\n").length)).length;
	const gutter = " ".repeat(width);
	const output: string[] = [];

	let oldLine = 1;
	let newLine = 1;
	let added = 0;
	let removed = 0;
	let firstChangedLine: number | undefined;

	for (let i = 0; i < parts.length; i++) {
		const part = parts[i];
		const lines = splitPart(part.value);

		if (part.added || part.removed) {
			firstChangedLine ??= newLine;
			for (const line of lines) {
				if (part.added) {
					output.push(`+${String(newLine).padStart(width)} ${line}`);
					newLine++;
					added++;
				} else {
					output.push(`-${String(oldLine).padStart(width)} ${line}`);
					oldLine++;
					removed++;
				}
			}
			continue;
		}

		const prev = parts[i - 1];
		const next = parts[i + 1];
		const afterChange = prev !== undefined && (prev.added === true || prev.removed === true);
		const beforeChange = next !== undefined && (next.added === true || next.removed === true);

		// leading and trailing context, with the middle of long runs collapsed
		const head = afterChange ? Math.min(contextLines, lines.length) : 0;
		const tail = beforeChange ? Math.min(contextLines, lines.length - head) : 0;

		for (let j = 0; j < lines.length; j++) {
			const visible = j < head || j >= lines.length - tail;
			if (visible) {
				output.push(` ${String(oldLine).padStart(width)} ${lines[j]}`);
			} else if (j === head && (afterChange || beforeChange)) {
				output.push(` ${gutter} ...`);
			}
			oldLine++;
			newLine++;
		}
	}

	return { diff: output.join("\n"), firstChangedLine, added, removed };
}

/** Standard unified diff, as `patch` and `git apply` read it. */
export function generateUnifiedDiffString(before: string, after: string, label: string, contextLines = 3): string {
	return Diff.createTwoFilesPatch(`a/${label}`, `b/${label}`, before, after, undefined, undefined, {
		context: contextLines,
	});
}
