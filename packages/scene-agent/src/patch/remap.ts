/**
 * Offset remapping between a buffer and its normalized views.
 *
 * A match found in a normalized view is only meaningful against the original
 * buffer after its offsets go through the view's table. Each table is built
 * once per matcher call; lookups are O(log n) for the trimmed view and O(1)
 * for the collapsed view.
 */
import { isBlankLine } from "./normalize";

// ═══════════════════════════════════════════════════════════════════════════
// Line-trimmed view
// ═══════════════════════════════════════════════════════════════════════════

export interface TrimmedView {
	/** Buffer with trailing whitespace removed from every line */
	text: string;
	/** Offset of each line in the original buffer */
	lineStarts: number[];
	/** Offset of each line in `text` */
	trimmedStarts: number[];
	originalLength: number;
}

export function buildTrimmedView(original: string): TrimmedView {
	const lines = original.split("\n");
	const lineStarts: number[] = [];
	const trimmedStarts: number[] = [];
	const trimmedLines: string[] = [];

	let originalOffset = 0;
	let trimmedOffset = 0;
	for (const line of lines) {
		const trimmed = line.trimEnd();
		lineStarts.push(originalOffset);
		trimmedStarts.push(trimmedOffset);
		trimmedLines.push(trimmed);
		originalOffset += line.length + 1;
		trimmedOffset += trimmed.length + 1;
	}

	return {
		text: trimmedLines.join("\n"),
		lineStarts,
		trimmedStarts,
		originalLength: original.length,
	};
}

/** Index of the last line whose trimmed start is at or before `offset`. */
function findTrimmedLine(view: TrimmedView, offset: number): number {
	let lo = 0;
	let hi = view.trimmedStarts.length - 1;
	while (lo < hi) {
		const mid = (lo + hi + 1) >> 1;
		if (view.trimmedStarts[mid] <= offset) {
			lo = mid;
		} else {
			hi = mid - 1;
		}
	}
	return lo;
}

/**
 * Map an offset in `view.text` to the original buffer.
 *
 * An offset at the end of a trimmed line lands right after that line's
 * content, before any trailing whitespace the original carries. Offsets past
 * the end of the view map to the end of the original.
 */
export function mapTrimmedOffset(view: TrimmedView, offset: number): number {
	if (offset <= 0) return 0;
	if (offset > view.text.length) return view.originalLength;
	const line = findTrimmedLine(view, offset);
	return view.lineStarts[line] + (offset - view.trimmedStarts[line]);
}

// ═══════════════════════════════════════════════════════════════════════════
// Blank-line-collapsed view
// ═══════════════════════════════════════════════════════════════════════════

export interface CollapsedView {
	/** Buffer with every whitespace-only line removed */
	text: string;
	/** `spans[i]` is the original range of `text[i]` */
	spans: Array<{ start: number; end: number }>;
}

export function buildCollapsedView(original: string): CollapsedView {
	const kept: Array<{ start: number; length: number }> = [];
	let offset = 0;
	for (const line of original.split("\n")) {
		if (!isBlankLine(line)) {
			kept.push({ start: offset, length: line.length });
		}
		offset += line.length + 1;
	}

	const spans: CollapsedView["spans"] = [];
	const parts: string[] = [];
	for (let i = 0; i < kept.length; i++) {
		const { start, length } = kept[i];
		parts.push(original.slice(start, start + length));
		for (let col = 0; col < length; col++) {
			spans.push({ start: start + col, end: start + col + 1 });
		}
		// separator between kept lines maps to the newline that ended this one
		if (i < kept.length - 1) {
			spans.push({ start: start + length, end: start + length + 1 });
		}
	}

	return { text: parts.join("\n"), spans };
}

/**
 * Map an offset in `view.text` to the original buffer.
 * Offsets at or past the end map to the end of the last kept character.
 */
export function mapCollapsedOffset(view: CollapsedView, offset: number): number {
	const { spans } = view;
	if (spans.length === 0) return 0;
	if (offset >= spans.length) return spans[spans.length - 1].end;
	return spans[Math.max(0, offset)].start;
}
