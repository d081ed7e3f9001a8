import { describe, expect, it } from 'vitest'
import { RouteCompileError } from './errors'
import { compileRoute, joinURL, joinURLPath, longestOverlap } from './path'
import { unwrap } from './result'

describe('joinURLPath', () => {
	it('concatenates a mount prefix and a route path', () => {
		expect(joinURLPath('/en', '/about')).toBe('/en/about')
		expect(joinURLPath('/en/deep', '/nested-route')).toBe('/en/deep/nested-route')
		expect(joinURLPath('', '/users/123')).toBe('/users/123')
		expect(joinURLPath('en', 'about')).toBe('/en/about')
	})

	it('drops the segments a route re-states from the end of its prefix', () => {
		expect(joinURLPath('/api/v1', '/v1/users')).toBe('/api/v1/users')
		expect(joinURLPath('/a/b', '/a/b/c')).toBe('/a/b/c')
		expect(joinURLPath('/a/b', '/b/a')).toBe('/a/b/a')
		expect(joinURLPath('/en', '/en')).toBe('/en')
	})

	it('does not treat a partial segment match as an overlap', () => {
		expect(joinURLPath('/blog', '/blogs/1')).toBe('/blog/blogs/1')
	})

	it('collapses a root prefix followed by a rooted route', () => {
		expect(joinURLPath('/', '/about')).toBe('/about')
		expect(joinURLPath('/', '/')).toBe('/')
	})

	it('collapses repeated separators at the boundary and inside segments', () => {
		expect(joinURLPath('/en/', '//about')).toBe('/en/about')
		expect(joinURLPath('//en', '/about//us')).toBe('/en/about/us')
	})

	it("keeps the route's trailing slash", () => {
		expect(joinURLPath('/en', '/about/')).toBe('/en/about/')
		expect(joinURLPath('/en', '/')).toBe('/en/')
		expect(joinURLPath('/en/', '')).toBe('/en')
	})

	it('handles empty inputs', () => {
		expect(joinURLPath('', '/')).toBe('/')
		expect(joinURLPath('/en', '')).toBe('/en')
		expect(joinURLPath('', '')).toBe('')
	})

	it('never emits a doubled separator', () => {
		const prefixes = ['', '/', '//', '/en', '/en/', 'en', '/a/b/']
		const routes = ['', '/', '//', '/about', 'about/', '/en/x', '//b//']
		for (const prefix of prefixes) {
			for (const route of routes) {
				expect(joinURLPath(prefix, route)).not.toContain('//')
			}
		}
	})
})

describe('longestOverlap', () => {
	it('finds the longest prefix suffix / route prefix match', () => {
		expect(longestOverlap(['a', 'b', 'c'], ['b', 'c', 'd'])).toBe(2)
		expect(longestOverlap(['a', 'b'], ['c'])).toBe(0)
		expect(longestOverlap([], ['a'])).toBe(0)
		expect(longestOverlap(['x', 'x'], ['x', 'x', 'x'])).toBe(2)
	})
})

describe('joinURL', () => {
	it('places a rooted path on the base URL', () => {
		expect(joinURL('http://example.com', '/foo')).toBe('http://example.com/foo')
		expect(joinURL('http://example.com/', '/foo')).toBe('http://example.com/foo')
	})

	it('appends a relative path to the base path', () => {
		expect(joinURL('http://example.com/', 'foo')).toBe('http://example.com/foo')
		expect(joinURL('http://example.com', 'foo')).toBe('http://example.com/foo')
		expect(joinURL('https://x.test/v1', 'users')).toBe('https://x.test/v1/users')
	})

	it('appends query maps in order with sorted keys', () => {
		expect(joinURL('http://example.com', '/foo', { a: '1' })).toBe('http://example.com/foo?a=1')
		expect(joinURL('http://example.com', '/foo', { b: '2', a: '1' }, { c: '3' })).toBe(
			'http://example.com/foo?a=1&b=2&c=3'
		)
	})

	it('keeps an existing query ahead of new pairs', () => {
		expect(joinURL('http://example.com?existing=1', '/foo', { a: '1' })).toBe(
			'http://example.com/foo?existing=1&a=1'
		)
	})

	it('form-encodes query pairs', () => {
		expect(joinURL('http://example.com', '/s', { q: 'a b&c' })).toBe('http://example.com/s?q=a+b%26c')
	})

	it('keeps the fragment last', () => {
		expect(joinURL('http://example.com/docs#top', '/api', { v: '2' })).toBe('http://example.com/api?v=2#top')
	})

	it('works without a base URL', () => {
		expect(joinURL('', '/foo', { a: '1' })).toBe('/foo?a=1')
		expect(joinURL('https://example.com/en/about/', '', { x: '1' })).toBe('https://example.com/en/about/?x=1')
	})
})

describe('compileRoute', () => {
	it('substitutes and escapes params', () => {
		const user = unwrap(compileRoute('user', '/users/:id'))
		expect(user({ id: '123' })).toBe('/users/123')
		expect(user({ id: 'a b/c' })).toBe('/users/a%20b%2Fc')
	})

	it('leaves characters that are legal in a path segment unescaped', () => {
		const profile = unwrap(compileRoute('profile', '/u/:name'))
		expect(profile({ name: 'a@b:c+d=e$f&g' })).toBe('/u/a@b:c+d=e$f&g')
		expect(profile({ name: 'x,y;z?' })).toBe('/u/x%2Cy%3Bz%3F')
	})

	it('omits an absent optional param', () => {
		const search = unwrap(compileRoute('google', '/webhooks/google/:service/:uuid?'))
		expect(search({ service: 'gmail' })).toBe('/webhooks/google/gmail')
		expect(search({ service: 'gmail', uuid: '123' })).toBe('/webhooks/google/gmail/123')
	})

	it('throws for a missing required param', () => {
		const user = unwrap(compileRoute('user', '/users/:id'))
		expect(() => user({})).toThrow(TypeError)
	})

	it('reports a template it cannot parse', () => {
		const compiled = compileRoute('broken', '/users/:')
		expect(compiled.ok).toBe(false)
		if (compiled.ok) return
		expect(compiled.error).toBeInstanceOf(RouteCompileError)
		expect(compiled.error.route).toBe('broken')
		expect(compiled.error.template).toBe('/users/:')
	})
})
