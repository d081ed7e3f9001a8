import { Builder, type BuildError } from './builder'
import {
	GroupNotFoundError,
	GroupValidationError,
	RouteBuildError,
	RouteCompileError,
	RouteNotFoundError,
	TemplateSubstitutionError,
} from './errors'
import { type Logger, makeNoopLogger } from './logger'
import { coerceParams, setEntry } from './params'
import { type CompiledRoute, compileRoute, joinURL, joinURLPath } from './path'
import { type Result, err, ok, unwrap } from './result'
import {
	BASE_URL_VAR,
	DEFAULT_ROUTE_PATH_SUFFIX,
	ROUTE_PATH_SUFFIX_VAR,
	ROUTE_PATH_VAR,
	type TemplateVars,
	applyRoutePathSuffix,
	detectMissingTemplateVars,
	substituteTemplate,
} from './template'
import type { NavigationNode, Params, Query, RouteMap } from './types'

export type RenderError = RouteNotFoundError | RouteBuildError | TemplateSubstitutionError

export interface GroupInit {
	name: string
	/** Only meaningful on a root group. */
	baseURL?: string
	/** Mount path, e.g. `/en`. */
	path?: string
	logger?: Logger
}

type CompiledEntry = { template: string; compiled: CompiledRoute }

/**
 * A node of the route tree. Owns its routes, child groups, local template
 * variables and an optional URL template.
 *
 * URLs render by path concatenation (`baseURL` + mount paths + route) unless a
 * group on the chain from this node to the root has a URL template; the
 * nearest such group is the template owner and its template is rendered
 * with the collected variables plus `route_path` and `base_url`.
 */
export class Group {
	readonly name: string
	readonly baseURL: string
	private mountPath: string
	private template = ''
	private parentGroup: Group | undefined
	private readonly routes = new Map<string, CompiledEntry>()
	private readonly children = new Map<string, Group>()
	private readonly vars = new Map<string, string>()
	private readonly logger: Logger

	constructor(init: GroupInit) {
		this.name = init.name
		this.baseURL = init.baseURL ?? ''
		this.mountPath = init.path ?? ''
		this.logger = init.logger ?? makeNoopLogger()
	}

	get path(): string {
		return this.mountPath
	}

	get parent(): Group | undefined {
		return this.parentGroup
	}

	get urlTemplate(): string {
		return this.template
	}

	// ---------- Identity -------------------
	/** Dotted name from the root, e.g. `frontend.en.marketing`. */
	fqn(): string {
		const names: string[] = []
		for (let current: Group | undefined = this; current; current = current.parentGroup) {
			if (current.name) names.unshift(current.name)
		}
		return names.join('.')
	}

	displayName(): string {
		return this.fqn() || (this.parentGroup ? '(unnamed)' : '(root)')
	}

	root(): Group {
		let current: Group = this
		while (current.parentGroup) current = current.parentGroup
		return current
	}

	/** Mount paths from the root down to this group, concatenated as written. */
	fullPath(): string {
		return (this.parentGroup?.fullPath() ?? '') + this.mountPath
	}

	// ---------- Routes ---------------------
	/** Compiles and attaches routes, replacing same-named ones. Nothing is applied if one fails. */
	addRoutes(routes: RouteMap): Result<Group, RouteCompileError> {
		const compiled = compileAll(routes)
		if (!compiled.ok) {
			this.logger.debug({ group: this.displayName(), route: compiled.error.route, err: compiled.error }, 'route compile failed')
			return compiled
		}

		for (const [route, entry] of compiled.value) this.routes.set(route, entry)
		if (compiled.value.size > 0) {
			this.logger.debug({ group: this.displayName(), routes: [...compiled.value.keys()] }, 'routes compiled')
		}
		return ok(this)
	}

	route(routeName: string): Result<string, RouteNotFoundError> {
		const entry = this.routes.get(routeName)
		if (!entry) return err(new RouteNotFoundError(routeName, this.displayName()))
		return ok(entry.template)
	}

	mustRoute(routeName: string): string {
		return unwrap(this.route(routeName))
	}

	routeNames(): string[] {
		return [...this.routes.keys()].sort()
	}

	validate(routeNames: readonly string[]): Result<Group, GroupValidationError> {
		const missing = routeNames.filter((name) => !this.routes.has(name))
		if (missing.length > 0) return err(new GroupValidationError(missing))
		return ok(this)
	}

	builder(routeName: string): Builder {
		return new Builder(this, routeName)
	}

	// ---------- Children -------------------
	/**
	 * Creates a child group, or merges routes into an existing one. An existing
	 * child keeps a non-empty mount path and adopts `path` otherwise.
	 */
	registerGroup(name: string, path: string, routes: RouteMap = {}): Result<Group, RouteCompileError> {
		const existing = this.children.get(name)
		if (existing) {
			const merged = existing.addRoutes(routes)
			if (merged.ok && path && !existing.mountPath) existing.mountPath = path
			return merged
		}

		const child = new Group({ name, path, logger: this.logger })
		const added = child.addRoutes(routes)
		if (!added.ok) return added

		child.parentGroup = this
		this.children.set(name, child)
		this.logger.debug({ group: child.fqn(), path }, 'group registered')
		return ok(child)
	}

	getGroup(name: string): Result<Group, GroupNotFoundError> {
		const child = this.children.get(name)
		if (!child) return err(new GroupNotFoundError(`${this.displayName()}.${name}`))
		return ok(child)
	}

	group(name: string): Group {
		return unwrap(this.getGroup(name))
	}

	childNames(): string[] {
		return [...this.children.keys()].sort()
	}

	// ---------- Templates ------------------
	/** An empty template turns this group back into a path-concatenation group. */
	setURLTemplate(template: string): this {
		this.template = template
		return this
	}

	setTemplateVar(key: string, value: string): this {
		this.vars.set(key, value)
		return this
	}

	/** Local lookup only; ancestors are not consulted. */
	getTemplateVar(key: string): string | undefined {
		return this.vars.get(key)
	}

	findTemplateOwner(): Group | undefined {
		for (let current: Group | undefined = this; current; current = current.parentGroup) {
			if (current.template) return current
		}
		return undefined
	}

	/** Variables from the root down to this group; the nearer group wins a shared key. */
	collectTemplateVars(): TemplateVars {
		const chain: Group[] = []
		for (let current: Group | undefined = this; current; current = current.parentGroup) chain.unshift(current)

		const vars = new Map<string, string>()
		for (const group of chain) {
			for (const [key, value] of group.vars) vars.set(key, value)
		}
		return Object.fromEntries(vars)
	}

	// ---------- Rendering ------------------
	render(routeName: string, params?: Readonly<Params>, ...queries: readonly Query[]): Result<string, RenderError> {
		const rendered = this.renderURL(routeName, params, queries)
		if (!rendered.ok) {
			this.logger.debug({ group: this.displayName(), route: routeName, err: rendered.error }, 'render failed')
		}
		return rendered
	}

	private renderURL(routeName: string, params: Readonly<Params> | undefined, queries: readonly Query[]): Result<string, RenderError> {
		const entry = this.routes.get(routeName)
		if (!entry) return err(new RouteNotFoundError(routeName, this.displayName()))

		const routePath = this.compileRoutePath(routeName, entry, params)
		if (!routePath.ok) return routePath

		const owner = this.findTemplateOwner()
		if (owner) return this.renderTemplated(routeName, routePath.value, owner, queries)

		const fullPath = joinURLPath(this.fullPath(), routePath.value)
		return ok(joinURL(this.root().baseURL, fullPath, ...queries))
	}

	private compileRoutePath(routeName: string, entry: CompiledEntry, params: Readonly<Params> | undefined): Result<string, RouteBuildError> {
		const coerced = coerceParams(params)
		if (!coerced.ok) return err(new RouteBuildError(routeName, this.displayName(), coerced.error))
		try {
			return ok(entry.compiled(coerced.value))
		} catch (cause) {
			return err(new RouteBuildError(routeName, this.displayName(), cause))
		}
	}

	private renderTemplated(routeName: string, routePath: string, owner: Group, queries: readonly Query[]): Result<string, TemplateSubstitutionError> {
		const vars = this.collectTemplateVars()
		const suffix = vars[ROUTE_PATH_SUFFIX_VAR] ?? DEFAULT_ROUTE_PATH_SUFFIX

		setEntry(vars, ROUTE_PATH_VAR, applyRoutePathSuffix(routePath, suffix))
		setEntry(vars, BASE_URL_VAR, this.root().baseURL)

		const template = owner.template
		const missing = detectMissingTemplateVars(template, vars)
		if (missing.length > 0) {
			return err(
				new TemplateSubstitutionError({
					group: this.displayName(),
					route: routeName,
					templateOwner: owner.displayName(),
					template,
					missing,
				})
			)
		}

		const url = substituteTemplate(template, vars)
		return ok(queries.length > 0 ? joinURL(url, '', ...queries) : url)
	}

	// ---------- Navigation -----------------
	/**
	 * Builds one navigation entry per route name, in order. Empty names are
	 * skipped and the first build error aborts the batch.
	 */
	navigation(routeNames: readonly string[], params?: (route: string) => Params | undefined): Result<NavigationNode[], BuildError> {
		const groupName = this.fqn()
		const nodes: NavigationNode[] = []

		for (const route of routeNames) {
			if (!route) continue

			const provided = params?.(route)
			const built = this.builder(route)
				.withParamsMap(provided ?? {})
				.build()
			if (!built.ok) return built

			nodes.push({
				group: groupName,
				route,
				fullRoute: groupName ? `${groupName}.${route}` : route,
				path: this.mustRoute(route),
				url: built.value,
				...(provided ? { params: { ...provided } } : {}),
			})
		}
		return ok(nodes)
	}
}

function compileAll(routes: RouteMap): Result<Map<string, CompiledEntry>, RouteCompileError> {
	const compiled = new Map<string, CompiledEntry>()
	for (const [route, template] of Object.entries(routes)) {
		const fn = compileRoute(route, template)
		if (!fn.ok) return fn
		compiled.set(route, { template, compiled: fn.value })
	}
	return ok(compiled)
}
