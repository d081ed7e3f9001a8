import { compile } from 'path-to-regexp'
import { RouteCompileError } from './errors'
import { type Result, err, ok } from './result'
import type { PathParams, Query } from './types'

// ---------- Path compiler ----------------
export type CompiledRoute = (params: PathParams) => string

// `$ & + : = @` are legal inside a path segment and stay as written.
const SEGMENT_SAFE = /%(24|26|2B|3A|3D|40)/g

export const encodePathSegment = (value: string) => encodeURIComponent(value).replace(SEGMENT_SAFE, (match) => decodeURIComponent(match))

/** Compiles a `:name` / `:name?` template; substituted values are path-segment escaped. */
export function compileRoute(route: string, template: string): Result<CompiledRoute, RouteCompileError> {
	try {
		return ok(compile<PathParams>(template, { encode: encodePathSegment }))
	} catch (cause) {
		return err(new RouteCompileError(route, template, cause))
	}
}

// ---------- Path joining -----------------
type SplitPath = { segments: string[]; hasTrailing: boolean }

const splitPath = (path: string): SplitPath => ({
	segments: path.split('/').filter(Boolean),
	hasTrailing: path.endsWith('/'),
})

/** Length of the longest suffix of `prefix` that equals a prefix of `route`. */
export function longestOverlap(prefix: readonly string[], route: readonly string[]): number {
	for (let k = Math.min(prefix.length, route.length); k > 0; k--) {
		const tail = prefix.slice(prefix.length - k)
		if (tail.every((seg, i) => seg === route[i])) return k
	}
	return 0
}

/**
 * Merges a group prefix with a route path. Segments the route re-states from
 * the end of the prefix are dropped, every separator run becomes a single `/`
 * and the route's trailing slash is kept.
 *
 * @example
 * joinURLPath('/en', '/about')      // '/en/about'
 * joinURLPath('/api/v1', '/v1/x/')  // '/api/v1/x/'
 * joinURLPath('/', '/about')        // '/about'
 */
export function joinURLPath(prefix: string, route: string): string {
	const head = splitPath(prefix)
	const tail = splitPath(route)
	const overlap = longestOverlap(head.segments, tail.segments)
	const merged = [...head.segments, ...tail.segments.slice(overlap)]

	if (merged.length === 0) return prefix || route ? '/' : ''

	const path = `/${merged.join('/')}`
	return tail.hasTrailing ? `${path}/` : path
}

// ---------- URL assembly -----------------
const URL_PARTS = /^([a-zA-Z][a-zA-Z\d+.-]*:\/\/[^/?#]*)?([^?#]*)(?:\?([^#]*))?(#.*)?$/

const encodeQuery = (query: Query): string[] =>
	Object.keys(query)
		.sort()
		.map((key) => new URLSearchParams([[key, query[key] ?? '']]).toString())

/**
 * Places `path` on `base` and appends the query maps. A path starting with `/`
 * replaces the base path, any other path is appended to it. Each map is
 * emitted in sorted key order after whatever query `base` already carries.
 */
export function joinURL(base: string, path: string, ...queries: readonly Query[]): string {
	const [, origin = '', basePath = '', existing = '', hash = ''] = URL_PARTS.exec(base) ?? ['', '', base]

	let fullPath = basePath
	if (path.startsWith('/')) fullPath = path
	else if (path) fullPath = `${basePath.endsWith('/') ? basePath : `${basePath}/`}${path}`

	const pairs = [...(existing ? [existing] : []), ...queries.flatMap(encodeQuery)]
	const search = pairs.length > 0 ? `?${pairs.join('&')}` : ''

	return `${origin}${fullPath}${search}${hash}`
}
