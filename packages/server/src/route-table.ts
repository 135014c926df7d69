// ---------------------------------------------------------------------------
// Route Table: path matcher plus one prebuilt chain per route
// ---------------------------------------------------------------------------

import {
	type ConflictError,
	InternalDispatchError,
	type MethodNotAllowedError,
	Ok,
	type Result,
	type RouteNotFoundError,
	type RoutePatternError,
} from "@switchyard/core";
import { PathMatcher } from "@switchyard/router";
import { Chain } from "./chain";
import type { Handler, Middleware } from "./middleware";
import type { FlatRoute } from "./router";

/** A finalized route. */
export interface RouteEntry<S> {
	/** Index in the table; the id the path matcher resolves to. */
	readonly handlerId: number;
	readonly method: string;
	readonly pattern: string;
	readonly handler: Handler<S>;
	/** Router middleware followed by route middleware. */
	readonly scopedMiddleware: readonly Middleware<S>[];
	/** `global ++ router ++ route`, terminated by the handler. */
	readonly chain: Chain<S>;
}

/** A resolved route and its captured parameters. */
export interface RouteMatch<S> {
	readonly route: RouteEntry<S>;
	readonly params: Readonly<Record<string, string>>;
}

/**
 * Immutable table of routes.
 *
 * Built once during setup; afterwards it is only read, so concurrent
 * requests can share it freely.
 */
export class RouteTable<S> {
	readonly #matcher: PathMatcher;
	readonly #entries: readonly RouteEntry<S>[];

	private constructor(matcher: PathMatcher, entries: readonly RouteEntry<S>[]) {
		this.#matcher = matcher;
		this.#entries = entries;
	}

	/**
	 * Register every route and build its chain.
	 *
	 * Fails on the first pattern that is malformed or conflicts with an
	 * earlier one for the same method.
	 */
	static build<S>(
		routes: readonly FlatRoute<S>[],
		globalMiddleware: readonly Middleware<S>[],
	): Result<RouteTable<S>, ConflictError | RoutePatternError> {
		const matcher = new PathMatcher();
		const entries: RouteEntry<S>[] = [];

		for (const route of routes) {
			const handlerId = entries.length;
			const registered = matcher.register(route.method, route.pattern, handlerId);
			if (!registered.ok) return registered;

			const scopedMiddleware = [...route.routerMiddleware, ...route.routeMiddleware];
			entries.push({
				handlerId,
				method: route.method,
				pattern: route.pattern,
				handler: route.handler,
				scopedMiddleware,
				chain: new Chain(route.handler, [...globalMiddleware, ...scopedMiddleware]),
			});
		}

		return Ok(new RouteTable(matcher, Object.freeze(entries)));
	}

	/** Find the route for a request. */
	resolve(
		method: string,
		path: string,
	): Result<RouteMatch<S>, RouteNotFoundError | MethodNotAllowedError> {
		const match = this.#matcher.resolve(method, path);
		if (!match.ok) return match;

		const route = this.#entries[match.value.handlerId];
		if (route === undefined) {
			throw new InternalDispatchError(`Path matcher returned unknown handler id ${match.value.handlerId}`);
		}
		return Ok({ route, params: match.value.params });
	}

	/** Every route, in registration order. */
	get routes(): readonly RouteEntry<S>[] {
		return this.#entries;
	}
}
