export function hasErrorCode(err: unknown): err is Error & { code: string } {
	return err instanceof Error && "code" in err && typeof err.code === "string";
}

export function isEnoent(err: unknown): boolean {
	return hasErrorCode(err) && err.code === "ENOENT";
}

/** Best-effort message for anything thrown. */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
