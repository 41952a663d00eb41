/**
 * Pull a JSON value out of free-form model output.
 *
 * Models wrap JSON in markdown fences, surround it with prose, or leave
 * trailing commas behind. Extraction tries, in order: a ```json fence, any
 * fence, then the first balanced `{...}` / `[...]` run.
 */

const JSON_FENCE = /```json\s*([\s\S]*?)\s*```/;
const ANY_FENCE = /```\s*([\s\S]*?)\s*```/;

export function extractFencedBlock(text: string): string | undefined {
	const block = JSON_FENCE.exec(text)?.[1] ?? ANY_FENCE.exec(text)?.[1];
	const trimmed = block?.trim();
	return trimmed ? trimmed : undefined;
}

/**
 * First balanced run from `open` to its matching `close`.
 * Brackets inside string literals don't count; backslash escapes are honored.
 */
export function extractBalanced(text: string, open: "{" | "[", close: "}" | "]"): string | undefined {
	const start = text.indexOf(open);
	if (start === -1) return undefined;

	let depth = 0;
	let inString = false;
	let escaped = false;
	for (let i = start; i < text.length; i++) {
		const char = text[i];
		if (escaped) {
			escaped = false;
			continue;
		}
		if (char === "\\" && inString) {
			escaped = true;
			continue;
		}
		if (char === '"') {
			inString = !inString;
			continue;
		}
		if (inString) continue;
		if (char === open) {
			depth++;
		} else if (char === close) {
			depth--;
			if (depth === 0) return text.slice(start, i + 1);
		}
	}
	return undefined;
}

export function stripTrailingCommas(json: string): string {
	return json.replace(/,\s*}/g, "}").replace(/,\s*]/g, "]");
}

/** `JSON.parse`, retried once with trailing commas removed. Throws when both fail. */
export function parseLenientJson(json: string): unknown {
	try {
		return JSON.parse(json);
	} catch {
		return JSON.parse(stripTrailingCommas(json));
	}
}

/** Locate and parse the JSON payload of a model response; `undefined` when none parses. */
export function extractJson(text: string, shape: "object" | "array"): unknown {
	const candidate =
		extractFencedBlock(text) ?? (shape === "object" ? extractBalanced(text, "{", "}") : extractBalanced(text, "[", "]"));
	if (candidate === undefined) return undefined;
	try {
		return parseLenientJson(candidate);
	} catch {
		return undefined;
	}
}
