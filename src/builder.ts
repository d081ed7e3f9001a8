import type { UnsupportedParamsError, UnsupportedQueryError } from './errors'
import type { Group, RenderError } from './group'
import { combineQueries, mergeParamsMap, mergeStructParams, setEntry, splitQueryInput, type SplitQuery } from './params'
import { type Result, err, unwrap } from './result'
import type { FieldKeys, ParamValue, Params, Query, QueryValue } from './types'

export type InputError = UnsupportedParamsError | UnsupportedQueryError
export type BuildError = RenderError | InputError

/**
 * Per-call accumulator of path params and queries for one route. The first
 * input error is kept and returned by `build()`; later calls are ignored, so
 * chains never need checking midway. Not meant to be shared.
 *
 * @example
 * group.builder('user').withParam('id', 123).withQuery('tab', 'posts').build()
 */
export class Builder {
	private readonly params: Params = {}
	private readonly query: Query = {}
	private readonly multiQuery: Record<string, string[]> = {}
	private error: InputError | undefined

	constructor(
		private readonly group: Group,
		readonly routeName: string
	) {}

	withParam(key: string, value: ParamValue): this {
		return this.withParamsMap({ [key]: value })
	}

	withParamsMap(values: Readonly<Record<string, unknown>>): this {
		if (this.error) return this
		const merged = mergeParamsMap(this.params, values)
		if (!merged.ok) this.error = merged.error
		return this
	}

	/**
	 * Params from a `ParamSource` or an object's own properties. `fields` renames
	 * or drops keys in both cases (see `FieldKeys`).
	 */
	withStruct(value: unknown, fields?: FieldKeys): this {
		if (this.error) return this
		const merged = mergeStructParams(this.params, value, fields)
		if (!merged.ok) this.error = merged.error
		return this
	}

	/** A list value makes `key` a multi-value key; `null`/`undefined` yields `key=`. */
	withQuery(key: string, value: QueryValue): this {
		return this.mergeQuery({ [key]: value })
	}

	withQueryValues(values: Readonly<Record<string, readonly ParamValue[]>>): this {
		return this.mergeQuery(values)
	}

	build(): Result<string, BuildError> {
		if (this.error) return err(this.error)
		const queries = combineQueries(this.query, this.multiQuery)
		return this.group.render(this.routeName, this.params, ...queries)
	}

	mustBuild(): string {
		return unwrap(this.build())
	}

	private mergeQuery(input: Readonly<Record<string, unknown>>): this {
		if (this.error) return this
		const split = splitQueryInput(input)
		if (!split.ok) {
			this.error = split.error
			return this
		}
		this.applyQuery(split.value)
		return this
	}

	private applyQuery({ single, multi }: SplitQuery) {
		for (const [key, value] of Object.entries(single)) setEntry(this.query, key, value)
		for (const [key, values] of Object.entries(multi)) {
			setEntry(this.multiQuery, key, values)
			delete this.query[key]
		}
	}
}
