import type { Logger } from 'pino'
import pino from 'pino'

export type { Logger } from 'pino'

/**
 * JSON logger on stdout. Level comes from `PINO_LOG_LEVEL` (default `info`),
 * output is disabled under Vitest and `NODE_ENV=test`.
 */
export function makeLogger(bindings?: Record<string, unknown>): Logger {
	const isVitest = process.env.VITEST === 'true'
	const nodeEnv = process.env.NODE_ENV ?? 'development'
	const level = process.env.PINO_LOG_LEVEL ?? 'info'
	const serviceName = process.env.SERVICE_NAME ?? 'app'

	return pino(
		{
			level,
			enabled: !(isVitest || nodeEnv === 'test'),
			// bindings first so the reserved keys win
			base: { ...bindings, lib: 'route-canopy', service: serviceName },
			messageKey: 'msg',
			timestamp: pino.stdTimeFunctions.isoTime,
		},
		pino.destination({ dest: 1, sync: true })
	)
}

export function makeNoopLogger(): Logger {
	return pino({ enabled: false })
}
