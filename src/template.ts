export type TemplateVars = Record<string, string>

export const ROUTE_PATH_VAR = 'route_path'
export const BASE_URL_VAR = 'base_url'
export const ROUTE_PATH_SUFFIX_VAR = 'route_path_suffix'
export const DEFAULT_ROUTE_PATH_SUFFIX = '/'

const PLACEHOLDER = /\{([a-zA-Z0-9_]+)\}/g

/**
 * Replaces every literal `{key}` with `vars[key]`. Placeholders without a
 * value stay in the output as written.
 *
 * @example
 * substituteTemplate('{proto}://{host}/{path}', { proto: 'https', host: 'api.example.com', path: 'v1' })
 * // 'https://api.example.com/v1'
 */
export function substituteTemplate(template: string, vars: Readonly<TemplateVars>): string {
	let result = template
	for (const [key, value] of Object.entries(vars)) {
		result = result.replaceAll(`{${key}}`, value)
	}
	return result
}

/** Sorted, de-duplicated placeholder names of `template` that `vars` does not define. */
export function detectMissingTemplateVars(template: string, vars: Readonly<TemplateVars>): string[] {
	const names = new Set(Array.from(template.matchAll(PLACEHOLDER), (m) => m[1] ?? ''))
	return [...names].filter((name) => !Object.hasOwn(vars, name)).sort()
}

/** Appends `suffix` unless the path is empty or already ends with it. */
export function applyRoutePathSuffix(routePath: string, suffix: string): string {
	if (!routePath || !suffix) return routePath
	if (routePath.endsWith(suffix)) return routePath
	return routePath + suffix
}
