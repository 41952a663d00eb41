/**
 * Fill `{name}` placeholders from `values`. Placeholders without a value are
 * left as written, so JSON examples inside a template survive.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
	return template.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (placeholder, name: string) =>
		Object.hasOwn(values, name) ? values[name] : placeholder,
	);
}
