/**
 * Parse a model response into edit records.
 */
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { logger } from "@scene-forge/utils";
import { extractJson } from "../utils/json-extract";
import type { EditRecord } from "./types";

export const editRecordSchema = Type.Object({
	old_code: Type.String({ minLength: 1, description: "Exact text to replace" }),
	new_code: Type.String({ description: "Replacement text, empty to delete" }),
});

export const editListSchema = Type.Array(editRecordSchema);

export type EditList = Static<typeof editListSchema>;

/**
 * Extract a JSON array of `{ old_code, new_code }` objects from `response`.
 * Returns `undefined` when nothing parses or any entry is malformed.
 */
export function parseEditResponse(response: string): EditRecord[] | undefined {
	const data = extractJson(response, "array");
	if (data === undefined) {
		logger.debug("No JSON edit list found in response", { length: response.length });
		return undefined;
	}
	if (!Value.Check(editListSchema, data)) {
		const first = Value.Errors(editListSchema, data).First();
		logger.debug("Edit list failed validation", { path: first?.path, message: first?.message });
		return undefined;
	}
	return data.map(({ old_code, new_code }) => ({ old_code, new_code }));
}
