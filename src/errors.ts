export type RouteErrorCode =
	| 'GROUP_NOT_FOUND'
	| 'ROUTE_NOT_FOUND'
	| 'GROUP_VALIDATION'
	| 'VALIDATION'
	| 'TEMPLATE_SUBSTITUTION'
	| 'ROUTE_COMPILE'
	| 'ROUTE_BUILD'
	| 'UNSUPPORTED_PARAMS'
	| 'UNSUPPORTED_QUERY'
	| 'INVALID_SEGMENT'
	| 'CONFIG'

export abstract class RouteError extends Error {
	abstract readonly code: RouteErrorCode
}

export class GroupNotFoundError extends RouteError {
	readonly code = 'GROUP_NOT_FOUND'

	constructor(public readonly path: string) {
		super(path ? `group not found: ${path}` : 'group not found: empty group path')
		this.name = 'GroupNotFoundError'
	}
}

export class RouteNotFoundError extends RouteError {
	readonly code = 'ROUTE_NOT_FOUND'

	constructor(
		public readonly route: string,
		public readonly group: string
	) {
		super(`route not found: route "${route}" in group ${group}`)
		this.name = 'RouteNotFoundError'
	}
}

export class GroupValidationError extends RouteError {
	readonly code = 'GROUP_VALIDATION'

	constructor(public readonly missingRoutes: readonly string[]) {
		super(`missing routes: [${missingRoutes.join(' ')}]`)
		this.name = 'GroupValidationError'
	}
}

/** Aggregate of every expected group that is absent or lacks routes, keyed by group path. */
export class ValidationError extends RouteError {
	readonly code = 'VALIDATION'

	constructor(public readonly errors: Readonly<Record<string, readonly string[]>>) {
		const parts = Object.keys(errors)
			.sort()
			.map((group) => `group ${group} missing: [${errors[group]?.join(' ') ?? ''}]`)
		super(`validation error: ${parts.join('; ')}`)
		this.name = 'ValidationError'
	}
}

export interface TemplateSubstitutionDetails {
	group: string
	route: string
	templateOwner: string
	template: string
	missing: readonly string[]
}

export class TemplateSubstitutionError extends RouteError {
	readonly code = 'TEMPLATE_SUBSTITUTION'
	readonly group: string
	readonly route: string
	readonly templateOwner: string
	readonly template: string
	readonly missing: readonly string[]

	constructor(details: TemplateSubstitutionDetails) {
		super(
			`template substitution failed for group "${details.group}" route "${details.route}" ` +
				`(template owner "${details.templateOwner}"): missing variables [${details.missing.join(' ')}]`
		)
		this.name = 'TemplateSubstitutionError'
		this.group = details.group
		this.route = details.route
		this.templateOwner = details.templateOwner
		this.template = details.template
		this.missing = [...details.missing]
	}
}

export class RouteCompileError extends RouteError {
	readonly code = 'ROUTE_COMPILE'

	constructor(
		public readonly route: string,
		public readonly template: string,
		cause: unknown
	) {
		super(`cannot compile route "${route}" (${template}): ${describe(cause)}`, { cause })
		this.name = 'RouteCompileError'
	}
}

export class RouteBuildError extends RouteError {
	readonly code = 'ROUTE_BUILD'

	constructor(
		public readonly route: string,
		public readonly group: string,
		cause: unknown
	) {
		super(`failed to build route "${route}" in group ${group}: ${describe(cause)}`, { cause })
		this.name = 'RouteBuildError'
	}
}

export class UnsupportedParamsError extends RouteError {
	readonly code = 'UNSUPPORTED_PARAMS'

	constructor(public readonly received: string) {
		super(`unsupported params type ${received}`)
		this.name = 'UnsupportedParamsError'
	}
}

export class UnsupportedQueryError extends RouteError {
	readonly code = 'UNSUPPORTED_QUERY'

	constructor(public readonly received: string) {
		super(`unsupported query type ${received}`)
		this.name = 'UnsupportedQueryError'
	}
}

export class InvalidSegmentError extends RouteError {
	readonly code = 'INVALID_SEGMENT'

	constructor(
		public readonly segment: string,
		reason: string
	) {
		super(`ensure group: ${reason}`)
		this.name = 'InvalidSegmentError'
	}
}

export class ConfigError extends RouteError {
	readonly code = 'CONFIG'

	constructor(public readonly issues: readonly string[]) {
		super(`configuration error: ${issues.join('; ')}`)
		this.name = 'ConfigError'
	}
}

/** Short runtime type label used in input-shape errors. */
export const typeLabel = (value: unknown): string => {
	if (value === null) return 'null'
	if (Array.isArray(value)) return 'array'
	if (typeof value === 'number' && !Number.isFinite(value)) return String(value)
	if (value instanceof Date && Number.isNaN(value.getTime())) return 'Invalid Date'
	if (typeof value === 'object') return value.constructor?.name ?? 'object'
	return typeof value
}

const describe = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause))
