import { UnsupportedParamsError, UnsupportedQueryError, typeLabel } from './errors'
import { type Result, err, ok } from './result'
import type { FieldKeys, MultiQuery, ParamSource, ParamValue, Params, PathParams, Query } from './types'

// ---------- Value normalisation ----------
const isParamValue = (value: unknown): value is ParamValue =>
	value == null ||
	typeof value === 'string' ||
	(typeof value === 'number' && Number.isFinite(value)) ||
	typeof value === 'boolean' ||
	typeof value === 'bigint' ||
	(value instanceof Date && !Number.isNaN(value.getTime()))

/** Writes an own enumerable key, `__proto__` included. */
export function setEntry<T>(target: Record<string, T>, key: string, value: T) {
	Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true })
}

/** String form of a param; `undefined` means "leave the key out". */
export function paramToString(value: ParamValue): string | undefined {
	if (value == null) return undefined
	if (value instanceof Date) return value.toISOString()
	return String(value)
}

/** Drops absent values and stringifies the rest. */
export function coerceParams(source: Readonly<Params> | undefined): Result<PathParams, UnsupportedParamsError> {
	const normalized: PathParams = {}
	for (const [key, value] of Object.entries(source ?? {})) {
		if (!isParamValue(value)) return err(new UnsupportedParamsError(`${typeLabel(value)} for param "${key}"`))
		const str = paramToString(value)
		if (str !== undefined) setEntry(normalized, key, str)
	}
	return ok(normalized)
}

// ---------- Param sources ----------------
export const isParamSource = (value: unknown): value is ParamSource =>
	typeof value === 'object' && value !== null && 'toParams' in value && typeof value.toParams === 'function'

const lowerFirst = (value: string) => value.charAt(0).toLowerCase() + value.slice(1)

const fieldKey = (fields: FieldKeys, key: string): string | null | undefined =>
	Object.hasOwn(fields, key) ? fields[key] : undefined

const hasToJSON = (value: object): value is { toJSON(): unknown } =>
	'toJSON' in value && typeof value.toJSON === 'function'

/** Copies `values` into `target`, rejecting anything that is not a param value. */
export function mergeParamsMap(target: Params, values: Readonly<Record<string, unknown>>): Result<Params, UnsupportedParamsError> {
	for (const [key, value] of Object.entries(values)) {
		if (!isParamValue(value)) return err(new UnsupportedParamsError(`${typeLabel(value)} for param "${key}"`))
		setEntry(target, key, value)
	}
	return ok(target)
}

/**
 * Extracts params from a parameter source or a plain object. Per property the
 * key is the `fields` entry, else the key `toJSON()` emits it under, else the
 * property name with a lower-case first letter. Functions are skipped. A
 * parameter source keeps its own keys unless `fields` renames or drops them.
 */
export function mergeStructParams(target: Params, input: unknown, fields: FieldKeys = {}): Result<Params, UnsupportedParamsError> {
	if (input == null) return ok(target)

	if (isParamSource(input)) {
		for (const [key, value] of input.toParams()) {
			const mapped = fieldKey(fields, key)
			if (mapped === null) continue
			if (!isParamValue(value)) return err(new UnsupportedParamsError(`${typeLabel(value)} for field "${key}"`))
			setEntry(target, mapped ?? key, value)
		}
		return ok(target)
	}

	if (typeof input !== 'object' || Array.isArray(input) || input instanceof Date) {
		return err(new UnsupportedParamsError(typeLabel(input)))
	}

	const viaJSON = hasToJSON(input)
	const source = viaJSON ? input.toJSON() : input
	if (typeof source !== 'object' || source === null || Array.isArray(source)) {
		return err(new UnsupportedParamsError(`${typeLabel(input)} (toJSON returned ${typeLabel(source)})`))
	}

	for (const [prop, value] of Object.entries(source)) {
		if (typeof value === 'function') continue

		const mapped = fieldKey(fields, prop)
		if (mapped === null) continue
		const key = mapped ?? (viaJSON ? prop : lowerFirst(prop))

		if (!isParamValue(value)) return err(new UnsupportedParamsError(`${typeLabel(value)} for field "${prop}"`))
		setEntry(target, key, value)
	}
	return ok(target)
}

// ---------- Queries ----------------------
export type SplitQuery = { single: Query; multi: Record<string, string[]> }

const queryToString = (value: ParamValue) => paramToString(value) ?? ''

/**
 * Splits a loosely typed query input into single and multi-value maps. Arrays
 * (and every `URLSearchParams` key) become multi-value keys.
 */
export function splitQueryInput(input: unknown): Result<SplitQuery, UnsupportedQueryError> {
	const out: SplitQuery = { single: {}, multi: {} }
	if (input == null) return ok(out)

	if (input instanceof URLSearchParams) {
		for (const key of new Set(input.keys())) setEntry(out.multi, key, input.getAll(key))
		return ok(out)
	}

	if (typeof input !== 'object' || Array.isArray(input) || input instanceof Date) {
		return err(new UnsupportedQueryError(typeLabel(input)))
	}

	for (const [key, value] of Object.entries(input)) {
		if (Array.isArray(value)) {
			const values: string[] = []
			for (const entry of value) {
				if (!isParamValue(entry)) return err(new UnsupportedQueryError(`${typeLabel(entry)} in "${key}"`))
				values.push(queryToString(entry))
			}
			setEntry(out.multi, key, values)
		} else if (isParamValue(value)) {
			setEntry(out.single, key, queryToString(value))
		} else {
			return err(new UnsupportedQueryError(`${typeLabel(value)} for "${key}"`))
		}
	}
	return ok(out)
}

/**
 * The single-value map first, then one map per value of every multi-value key
 * in sorted key order. An empty value list still emits `key=`.
 */
export function combineQueries(single: Readonly<Query>, multi: Readonly<MultiQuery>): Query[] {
	const queries: Query[] = []
	if (Object.keys(single).length > 0) queries.push({ ...single })

	for (const key of Object.keys(multi).sort()) {
		const values = multi[key] ?? []
		if (values.length === 0) queries.push({ [key]: '' })
		for (const value of values) queries.push({ [key]: value })
	}
	return queries
}
