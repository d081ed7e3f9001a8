// ---------- Shared public types ----------
export type ParamValue = string | number | boolean | bigint | Date | null | undefined
export type Params = Record<string, ParamValue>

/** Params after normalisation: every value is the string handed to the path compiler. */
export type PathParams = Record<string, string>

/** Single-value query map; keys are emitted in sorted order. */
export type Query = Record<string, string>
export type MultiQuery = Record<string, readonly string[]>
export type QueryValue = ParamValue | readonly ParamValue[]

/** Route name → placeholder template, e.g. `{ user: '/users/:id' }`. */
export type RouteMap = Readonly<Record<string, string>>

/** Explicit per-property key mapping for `withStruct`: a string renames, `null` excludes. */
export type FieldKeys = Readonly<Record<string, string | null>>

/** Anything able to list its own path parameters. */
export interface ParamSource {
	toParams(): Iterable<readonly [string, ParamValue]>
}

/** Prebuilt navigation entry, enough for a menu without recomputing URLs. */
export interface NavigationNode {
	/** Dot-qualified group name, e.g. `frontend.en` */
	group: string
	route: string
	/** `frontend.en.about` */
	fullRoute: string
	/** Raw route template, e.g. `/users/:id` */
	path: string
	url: string
	params?: Params
}
