export { Builder } from './builder'
export type { BuildError, InputError } from './builder'
export { effectiveRoutes, groupConfigSchema, parseRouteConfig, routeConfigSchema } from './config'
export type { GroupConfig, RouteConfig } from './config'
export {
	ConfigError,
	GroupNotFoundError,
	GroupValidationError,
	InvalidSegmentError,
	RouteBuildError,
	RouteCompileError,
	RouteError,
	RouteNotFoundError,
	TemplateSubstitutionError,
	UnsupportedParamsError,
	UnsupportedQueryError,
	ValidationError,
} from './errors'
export type { RouteErrorCode, TemplateSubstitutionDetails } from './errors'
export { Group } from './group'
export type { GroupInit, RenderError } from './group'
export { makeLogger, makeNoopLogger } from './logger'
export type { Logger } from './logger'
export { RouteManager, parseEnsureSegment } from './manager'
export type { ExpectedRoutes, Resolver, RouteManagerOptions } from './manager'
export { compileRoute, encodePathSegment, joinURL, joinURLPath, longestOverlap } from './path'
export type { CompiledRoute } from './path'
export { err, ok, unwrap } from './result'
export type { Result } from './result'
export {
	BASE_URL_VAR,
	DEFAULT_ROUTE_PATH_SUFFIX,
	ROUTE_PATH_SUFFIX_VAR,
	ROUTE_PATH_VAR,
	applyRoutePathSuffix,
	detectMissingTemplateVars,
	substituteTemplate,
} from './template'
export type { TemplateVars } from './template'
export type {
	FieldKeys,
	MultiQuery,
	NavigationNode,
	ParamSource,
	ParamValue,
	Params,
	PathParams,
	Query,
	QueryValue,
	RouteMap,
} from './types'
