// ---------------------------------------------------------------------------
// Router: groups routes under shared middleware, nestable at a prefix
// ---------------------------------------------------------------------------

import { RouterCycleError } from "@switchyard/core";
import { joinPaths } from "@switchyard/router";
import { toMiddleware } from "./combinators";
import type { Handler, Middleware, MiddlewareLike } from "./middleware";
import { Route } from "./route";

/** A route with its router middleware resolved and its pattern prefixed. */
export interface FlatRoute<S> {
	readonly method: string;
	readonly pattern: string;
	readonly handler: Handler<S>;
	/** Middleware of every enclosing router, outermost first. */
	readonly routerMiddleware: readonly Middleware<S>[];
	readonly routeMiddleware: readonly Middleware<S>[];
}

/** Shorthand registration methods shared by {@link Router} and the app. */
export abstract class RouteRegistry<S> {
	/** Register a route object. */
	abstract route(route: Route<S>): this;

	/** Register a handler for any method. */
	on(method: string, pattern: string, handler: Handler<S>): this {
		return this.route(new Route(method, pattern, handler));
	}

	get(pattern: string, handler: Handler<S>): this {
		return this.on("GET", pattern, handler);
	}

	post(pattern: string, handler: Handler<S>): this {
		return this.on("POST", pattern, handler);
	}

	put(pattern: string, handler: Handler<S>): this {
		return this.on("PUT", pattern, handler);
	}

	patch(pattern: string, handler: Handler<S>): this {
		return this.on("PATCH", pattern, handler);
	}

	delete(pattern: string, handler: Handler<S>): this {
		return this.on("DELETE", pattern, handler);
	}

	head(pattern: string, handler: Handler<S>): this {
		return this.on("HEAD", pattern, handler);
	}

	options(pattern: string, handler: Handler<S>): this {
		return this.on("OPTIONS", pattern, handler);
	}
}

/**
 * Router for grouping routes with shared middleware.
 *
 * Router middleware applies to every route in the router, including those
 * of nested routers, and runs outside the routes' own middleware.
 *
 * @example
 * ```ts
 * const users = new Router<AppState>()
 *   .use(requireAuth)
 *   .get("/", listUsers)
 *   .get("/:id", getUser);
 * app.mount("/api/v1/users", users);
 * ```
 */
export class Router<S = unknown> extends RouteRegistry<S> {
	readonly #routes: Route<S>[] = [];
	readonly #middleware: Middleware<S>[] = [];
	readonly #nested: Array<{ prefix: string; router: Router<S> }> = [];

	route(route: Route<S>): this {
		this.#routes.push(route);
		return this;
	}

	/** Add router-scoped middleware. */
	use(middleware: MiddlewareLike<S>): this {
		this.#middleware.push(toMiddleware(middleware));
		return this;
	}

	/**
	 * Mount a nested router at a prefix.
	 *
	 * Throws `RouterCycleError` when `router` is this router or already
	 * contains it at any depth.
	 */
	nest(prefix: string, router: Router<S>): this {
		if (router.#reaches(this)) {
			throw new RouterCycleError(`A router cannot be nested inside itself (at "${prefix}")`);
		}
		this.#nested.push({ prefix, router });
		return this;
	}

	/** Whether `target` is this router or nested anywhere below it. */
	#reaches(target: Router<S>): boolean {
		return this === target || this.#nested.some(({ router }) => router.#reaches(target));
	}

	/** Number of routes registered directly on this router. */
	get routeCount(): number {
		return this.#routes.length;
	}

	/**
	 * Flatten this router and its nested routers into prefixed routes.
	 *
	 * Parent middleware comes before this router's own.
	 */
	flatten(prefix = "/", parentMiddleware: readonly Middleware<S>[] = []): FlatRoute<S>[] {
		const routerMiddleware = [...parentMiddleware, ...this.#middleware];
		const flattened: FlatRoute<S>[] = this.#routes.map((route) => ({
			method: route.method,
			pattern: joinPaths(prefix, route.pattern),
			handler: route.handler,
			routerMiddleware,
			routeMiddleware: route.middleware,
		}));

		for (const { prefix: nestedPrefix, router } of this.#nested) {
			flattened.push(...router.flatten(joinPaths(prefix, nestedPrefix), routerMiddleware));
		}
		return flattened;
	}
}
