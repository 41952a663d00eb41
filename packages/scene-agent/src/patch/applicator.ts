/**
 * Batch edit application.
 *
 * Edits run in order against a working copy, so a later edit may target text
 * an earlier one introduced. A batch is all-or-nothing: the first edit that
 * can't be located uniquely discards every change and hands back the input.
 */
import { logger as baseLogger, type Logger } from "@scene-forge/utils";
import { locateEdit, MATCHERS } from "./fuzzy";
import type { EditRecord, EditResult, Matcher, MatchStrategy } from "./types";

export interface ApplyEditsOptions {
	logger?: Logger;
	/** Matcher cascade to use, strictest first */
	matchers?: readonly Matcher[];
}

const log = baseLogger.child({ module: "patch" });

function rejected(original: string, index: number, error: string): EditResult {
	return { success: false, code: original, appliedCount: 0, error, failedIndex: index, strategies: [] };
}

export function applyEdits(original: string, edits: readonly EditRecord[], options: ApplyEditsOptions = {}): EditResult {
	const logger = options.logger ?? log;
	const matchers = options.matchers ?? MATCHERS;

	if (edits.length === 0) {
		return { success: true, code: original, appliedCount: 0, strategies: [] };
	}

	let working = original;
	const strategies: MatchStrategy[] = [];

	for (let i = 0; i < edits.length; i++) {
		const index = i + 1;
		const { old_code: oldCode, new_code: newCode } = edits[i];

		if (oldCode.length === 0) {
			return rejected(original, index, `Edit ${index}: old_code is empty`);
		}

		const outcome = locateEdit(working, oldCode, matchers);
		switch (outcome.kind) {
			case "ambiguous":
				logger.warn("Edit target is ambiguous", { edit: index, strategy: outcome.strategy, reason: outcome.reason });
				return rejected(original, index, `Edit ${index}: old_code is ambiguous (${outcome.reason})`);
			case "not-found":
				logger.warn("Edit target not found", { edit: index });
				return rejected(original, index, `Edit ${index}: old_code not found in script`);
			case "found": {
				const { start, end } = outcome.span;
				working = working.slice(0, start) + newCode + working.slice(end);
				strategies.push(outcome.strategy);
				logger.debug("Edit applied", { edit: index, strategy: outcome.strategy, start, end });
				break;
			}
		}
	}

	return { success: true, code: working, appliedCount: edits.length, strategies };
}
