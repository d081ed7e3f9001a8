import { z } from 'zod'
import { ConfigError } from './errors'
import { type Result, err, ok } from './result'

/**
 * One group of the configuration tree. Loading the file it comes from (JSON,
 * YAML) is the caller's business; this module only checks the shape.
 */
export interface GroupConfig {
	name: string
	/** Root groups only. */
	base_url?: string
	path?: string
	routes?: Record<string, string>
	/** Legacy alias of `routes`, read when `routes` is empty. */
	paths?: Record<string, string>
	/** e.g. `{protocol}://{host}/{locale}{route_path}` */
	url_template?: string
	template_vars?: Record<string, string>
	groups?: GroupConfig[]
}

export interface RouteConfig {
	groups: GroupConfig[]
}

export const groupConfigSchema: z.ZodType<GroupConfig> = z.lazy(() =>
	z.object({
		name: z.string().trim().min(1, 'group name is required'),
		base_url: z.string().optional(),
		path: z.string().optional(),
		routes: z.record(z.string()).optional(),
		paths: z.record(z.string()).optional(),
		url_template: z.string().optional(),
		template_vars: z.record(z.string()).optional(),
		groups: z.array(groupConfigSchema).optional(),
	})
)

export const routeConfigSchema = z.object({
	groups: z.array(groupConfigSchema).default([]),
})

const formatIssue = (issue: z.ZodIssue) =>
	issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message

export function parseRouteConfig(input: unknown): Result<RouteConfig, ConfigError> {
	const parsed = routeConfigSchema.safeParse(input)
	if (!parsed.success) return err(new ConfigError(parsed.error.issues.map(formatIssue)))
	return ok(parsed.data)
}

export function effectiveRoutes(config: GroupConfig): Record<string, string> {
	if (config.routes && Object.keys(config.routes).length > 0) return { ...config.routes }
	if (config.paths && Object.keys(config.paths).length > 0) return { ...config.paths }
	return {}
}
