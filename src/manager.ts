import type { BuildError } from './builder'
import { type GroupConfig, effectiveRoutes, parseRouteConfig } from './config'
import {
	ConfigError,
	GroupNotFoundError,
	InvalidSegmentError,
	RouteCompileError,
	RouteNotFoundError,
	ValidationError,
} from './errors'
import { Group, type RenderError } from './group'
import { type Logger, makeLogger } from './logger'
import { combineQueries, mergeParamsMap, mergeStructParams, splitQueryInput } from './params'
import { joinURLPath } from './path'
import { type Result, err, ok, unwrap } from './result'
import type { Params, Query, RouteMap } from './types'

export interface RouteManagerOptions {
	logger?: Logger
}

/** One-shot resolution, for collaborators that do not need a builder. */
export interface Resolver {
	resolve(groupPath: string, route: string, params?: Readonly<Params>, query?: Readonly<Query>): Result<string, Error>
}

/** Expected route names per dotted group path, for `validate`. */
export type ExpectedRoutes = Readonly<Record<string, readonly string[]>>

// ---------- Ensure-path segments ----------
type EnsureSegment = { name: string; path: string }

/** `name` mounts at `/name`; `name:/custom` (or `name:custom`) mounts at `/custom`. */
export function parseEnsureSegment(segment: string): Result<EnsureSegment, InvalidSegmentError> {
	if (!segment) return err(new InvalidSegmentError(segment, 'empty segment'))

	const idx = segment.indexOf(':')
	const name = (idx === -1 ? segment : segment.slice(0, idx)).trim()
	let path = (idx === -1 ? '' : segment.slice(idx + 1)).trim()

	if (!name) return err(new InvalidSegmentError(segment, `segment "${segment}" missing group name`))

	if (!path) path = `/${name.replace(/^\/+/, '') || name}`
	else if (!path.startsWith('/')) path = `/${path}`

	return ok({ name, path })
}

const isPlainRecord = (value: unknown): value is Record<string, unknown> => {
	if (typeof value !== 'object' || value === null) return false
	const proto: unknown = Object.getPrototypeOf(value)
	return proto === Object.prototype || proto === null
}

/**
 * Registry of named root groups. Groups are addressed by dotted path
 * (`frontend.en.marketing`) from their root.
 */
export class RouteManager implements Resolver {
	private readonly groups = new Map<string, Group>()
	private readonly logger: Logger

	constructor(options: RouteManagerOptions = {}) {
		this.logger = options.logger ?? makeLogger({ component: 'route-manager' })
	}

	/** Builds a manager from an already parsed configuration object. */
	static fromConfig(input: unknown, options?: RouteManagerOptions): Result<RouteManager, ConfigError> {
		const manager = new RouteManager(options)
		const loaded = manager.load(input)
		if (!loaded.ok) {
			manager.logger.warn({ err: loaded.error, issues: loaded.error.issues }, 'route configuration rejected')
			return loaded
		}
		return ok(manager)
	}

	private load(input: unknown): Result<RouteManager, ConfigError> {
		const config = parseRouteConfig(input)
		if (!config.ok) return config

		for (const group of config.value.groups) {
			const loaded = this.loadGroup(group, undefined)
			if (!loaded.ok) return loaded
		}
		return ok(this)
	}

	private loadGroup(config: GroupConfig, parent: Group | undefined): Result<Group, ConfigError> {
		const routes = effectiveRoutes(config)

		let created: Result<Group, RouteCompileError>
		if (parent) {
			if (config.base_url) {
				return err(new ConfigError([`nested group ${config.name} cannot specify base_url`]))
			}
			created = parent.registerGroup(config.name, config.path ?? '', routes)
		} else {
			if (this.groups.has(config.name)) {
				return err(new ConfigError([`duplicate root group ${config.name}`]))
			}
			created = this.addRoot(config.name, config.base_url ?? '', config.path ?? '', routes)
		}
		if (!created.ok) return err(new ConfigError([created.error.message]))

		const group = created.value
		if (config.url_template) group.setURLTemplate(config.url_template)
		for (const [key, value] of Object.entries(config.template_vars ?? {})) group.setTemplateVar(key, value)

		for (const child of config.groups ?? []) {
			const loaded = this.loadGroup(child, group)
			if (!loaded.ok) return loaded
		}
		return ok(group)
	}

	private addRoot(name: string, baseURL: string, path: string, routes: RouteMap): Result<Group, RouteCompileError> {
		const group = new Group({ name, baseURL, path, logger: this.logger })
		const added = group.addRoutes(routes)
		if (!added.ok) return added

		this.groups.set(name, group)
		this.logger.debug({ group: name, baseURL }, 'root group registered')
		return ok(group)
	}

	// ---------- Registration ---------------
	/** Creates a root group, or merges `routes` into the existing one of that name. */
	registerGroup(name: string, baseURL: string, routes: RouteMap = {}): Result<Group, RouteCompileError> {
		const existing = this.groups.get(name)
		if (existing) return existing.addRoutes(routes)
		return this.addRoot(name, baseURL, '', routes)
	}

	addRoutes(path: string, routes: RouteMap): Result<Group, GroupNotFoundError | RouteCompileError> {
		const group = this.getGroup(path)
		if (!group.ok) return group
		return group.value.addRoutes(routes)
	}

	/**
	 * Creates every missing group along `path`. The root must exist already;
	 * each further segment may carry a mount path as `name:/custom`.
	 *
	 * @example
	 * manager.ensureGroup('frontend.marketing:/mkt.landing') // mounts /mkt, then /landing
	 */
	ensureGroup(path: string): Result<Group, GroupNotFoundError | InvalidSegmentError | RouteCompileError> {
		if (!path) return err(new GroupNotFoundError(''))

		const found = this.getGroup(path)
		if (found.ok) return found

		const [rootName = '', ...segments] = path.split('.')
		const root = this.groups.get(rootName)
		if (!root) return err(new GroupNotFoundError(rootName))

		let current = root
		for (const raw of segments) {
			const segment = parseEnsureSegment(raw)
			if (!segment.ok) return segment

			const child = current.getGroup(segment.value.name)
			if (child.ok) {
				current = child.value
				continue
			}

			const created = current.registerGroup(segment.value.name, segment.value.path)
			if (!created.ok) return created
			current = created.value
		}
		return ok(current)
	}

	// ---------- Lookup ---------------------
	getGroup(path: string): Result<Group, GroupNotFoundError> {
		if (!path) return err(new GroupNotFoundError(''))

		const direct = this.groups.get(path)
		if (direct) return ok(direct)

		const parts = path.split('.').map((part) => part.trim())
		if (parts.some((part) => !part)) return err(new GroupNotFoundError(path))

		const [rootName = '', ...rest] = parts
		let current = this.groups.get(rootName)
		for (const name of rest) {
			const child = current?.getGroup(name)
			current = child?.ok ? child.value : undefined
		}
		return current ? ok(current) : err(new GroupNotFoundError(path))
	}

	/** Throwing lookup for call sites that treat a missing group as a programming error. */
	group(path: string): Group {
		return unwrap(this.getGroup(path))
	}

	rootNames(): string[] {
		return [...this.groups.keys()].sort()
	}

	// ---------- Validation -----------------
	/** Every absent group or route name is reported in one aggregate error. */
	validate(expected: ExpectedRoutes): Result<RouteManager, ValidationError> {
		const errors: Record<string, string[]> = {}

		for (const [path, routes] of Object.entries(expected)) {
			const group = this.getGroup(path)
			if (!group.ok) {
				errors[path] = ['Missing group']
				continue
			}
			const checked = group.value.validate(routes)
			if (!checked.ok) errors[path] = [...checked.error.missingRoutes]
		}

		return Object.keys(errors).length > 0 ? err(new ValidationError(errors)) : ok(this)
	}

	mustValidate(expected: ExpectedRoutes): this {
		unwrap(this.validate(expected))
		return this
	}

	// ---------- One-shot resolution --------
	resolve(groupPath: string, route: string, params?: Readonly<Params>, query?: Readonly<Query>): Result<string, GroupNotFoundError | RenderError> {
		const group = this.getGroup(groupPath)
		if (!group.ok) return group

		const queries = query && Object.keys(query).length > 0 ? [{ ...query }] : []
		return group.value.render(route, params, ...queries)
	}

	/**
	 * Like `resolve` with loosely typed inputs: params from a plain record, a
	 * `ParamSource` or an object (struct rules), query from a record whose array
	 * values are multi-value keys, or a `URLSearchParams`.
	 */
	resolveWith(groupPath: string, route: string, params: unknown, query: unknown): Result<string, GroupNotFoundError | BuildError> {
		const collected: Params = {}
		const merged = isPlainRecord(params) ? mergeParamsMap(collected, params) : mergeStructParams(collected, params)
		if (!merged.ok) return merged

		const split = splitQueryInput(query)
		if (!split.ok) return split

		const group = this.getGroup(groupPath)
		if (!group.ok) return group

		return group.value.render(route, collected, ...combineQueries(split.value.single, split.value.multi))
	}

	/** Group prefix joined with the raw route template; no base URL, no query. */
	routePath(groupPath: string, route: string): Result<string, GroupNotFoundError | RouteNotFoundError> {
		const group = this.getGroup(groupPath)
		if (!group.ok) return group

		const template = group.value.route(route)
		if (!template.ok) return template

		return ok(joinURLPath(group.value.fullPath(), template.value))
	}

	// ---------- Diagnostics ----------------
	/** Alphabetically sorted dump of the hierarchy: names, base URLs, templates, effective vars, routes. */
	debugTree(): string {
		if (this.groups.size === 0) return 'RouteManager: <empty>'

		const blocks = this.rootNames().map((name) => {
			const lines: string[] = []
			const root = this.groups.get(name)
			if (root) appendGroupDebug(lines, root, 0)
			return lines.join('\n')
		})
		return `RouteManager Debug Tree:\n${blocks.join('\n\n')}`
	}
}

function appendGroupDebug(lines: string[], group: Group, depth: number) {
	const indent = '  '.repeat(depth)

	const meta: string[] = []
	if (!group.parent) meta.push(`base=${JSON.stringify(group.baseURL)}`)
	if (group.path) meta.push(`path=${JSON.stringify(group.path)}`)
	lines.push(`${indent}- ${group.displayName()}${meta.length > 0 ? ` (${meta.join(', ')})` : ''}`)

	if (group.urlTemplate) lines.push(`${indent}  template: ${JSON.stringify(group.urlTemplate)}`)

	const vars = group.collectTemplateVars()
	const varNames = Object.keys(vars).sort()
	if (varNames.length > 0) {
		lines.push(`${indent}  vars:`)
		for (const key of varNames) lines.push(`${indent}    ${key} = ${JSON.stringify(vars[key])}`)
	}

	const routes = group.routeNames()
	if (routes.length > 0) {
		lines.push(`${indent}  routes:`)
		for (const route of routes) lines.push(`${indent}    - ${route}: ${group.mustRoute(route)}`)
	}

	group.childNames().forEach((name, idx) => {
		if (idx > 0) lines.push('')
		const child = group.getGroup(name)
		if (child.ok) appendGroupDebug(lines, child.value, depth + 1)
	})
}
