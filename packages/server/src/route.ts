import { toMiddleware } from "./combinators";
import type { Handler, Middleware, MiddlewareLike } from "./middleware";

/**
 * A single route with its own middleware.
 *
 * Route middleware is innermost: it runs after global and router
 * middleware, in the order added.
 *
 * @example
 * ```ts
 * app.route(Route.post("/orders", createOrder).use(requireAuth).use(audit));
 * ```
 */
export class Route<S = unknown> {
	readonly method: string;
	readonly pattern: string;
	readonly handler: Handler<S>;
	readonly #middleware: Middleware<S>[] = [];

	constructor(method: string, pattern: string, handler: Handler<S>) {
		this.method = method.toUpperCase();
		this.pattern = pattern;
		this.handler = handler;
	}

	static get<S>(pattern: string, handler: Handler<S>): Route<S> {
		return new Route("GET", pattern, handler);
	}

	static post<S>(pattern: string, handler: Handler<S>): Route<S> {
		return new Route("POST", pattern, handler);
	}

	static put<S>(pattern: string, handler: Handler<S>): Route<S> {
		return new Route("PUT", pattern, handler);
	}

	static patch<S>(pattern: string, handler: Handler<S>): Route<S> {
		return new Route("PATCH", pattern, handler);
	}

	static delete<S>(pattern: string, handler: Handler<S>): Route<S> {
		return new Route("DELETE", pattern, handler);
	}

	static head<S>(pattern: string, handler: Handler<S>): Route<S> {
		return new Route("HEAD", pattern, handler);
	}

	static options<S>(pattern: string, handler: Handler<S>): Route<S> {
		return new Route("OPTIONS", pattern, handler);
	}

	/** Add route-scoped middleware. */
	use(middleware: MiddlewareLike<S>): this {
		this.#middleware.push(toMiddleware(middleware));
		return this;
	}

	/** Route-scoped middleware in execution order. */
	get middleware(): readonly Middleware<S>[] {
		return this.#middleware;
	}
}
