/** Process environment, read through one binding so tests can stub it. */
export const $env: NodeJS.ProcessEnv = process.env;

/**
 * Replace a whole-string `${NAME}` reference with the variable's value.
 * Unset variables and any other string are returned unchanged.
 */
export function expandEnvReference(value: string, env: NodeJS.ProcessEnv = $env): string {
	const match = /^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/.exec(value);
	if (!match) return value;
	return env[match[1]] ?? value;
}
