// ---------------------------------------------------------------------------
// Middleware variants built purely on the public `handle` contract
// ---------------------------------------------------------------------------

import { Chain } from "./chain";
import type { Awaitable, Middleware, MiddlewareFn, MiddlewareLike, Next } from "./middleware";
import type { Req } from "./req";
import type { Res } from "./res";

/** Adapts a plain function to the {@link Middleware} interface. */
export class FnMiddleware<S = unknown> implements Middleware<S> {
	constructor(private readonly fn: MiddlewareFn<S>) {}

	handle(req: Req, state: S, next: Next): Awaitable<Res> {
		return this.fn(req, state, next);
	}
}

/** Runs the wrapped middleware only when the predicate holds. */
export class ConditionalMiddleware<S = unknown> implements Middleware<S> {
	constructor(
		private readonly predicate: (req: Req, state: S) => boolean,
		private readonly inner: Middleware<S>,
	) {}

	handle(req: Req, state: S, next: Next): Awaitable<Res> {
		if (this.predicate(req, state)) {
			return this.inner.handle(req, state, next);
		}
		return next.run(req);
	}
}

/**
 * Several middleware acting as one.
 *
 * The parts run as a nested chain whose terminal step is the outer
 * continuation, so the outer `next` is still invoked at most once.
 */
export class CombinedMiddleware<S = unknown> implements Middleware<S> {
	private readonly parts: readonly Middleware<S>[];

	constructor(parts: readonly Middleware<S>[]) {
		this.parts = Object.freeze([...parts]);
	}

	handle(req: Req, state: S, next: Next): Promise<Res> {
		return new Chain<S>((inner) => next.run(inner), this.parts).dispatch(req, state, next);
	}
}

/** Normalize a function or middleware object to a {@link Middleware}. */
export function toMiddleware<S>(unit: MiddlewareLike<S>): Middleware<S> {
	return typeof unit === "function" ? new FnMiddleware(unit) : unit;
}

/**
 * Create middleware from a function.
 *
 * @example
 * ```ts
 * const timing = fromFn(async (req, _state, next) => {
 *   const started = Date.now();
 *   const res = await next.run(req);
 *   res.headers.set("Server-Timing", `total;dur=${Date.now() - started}`);
 *   return res;
 * });
 * ```
 */
export function fromFn<S = unknown>(fn: MiddlewareFn<S>): Middleware<S> {
	return new FnMiddleware(fn);
}

/**
 * Execute middleware only when `predicate` returns true. Otherwise the
 * request goes straight to `next`, as if the middleware were not there.
 *
 * @example
 * ```ts
 * app.use(when((req) => req.path.startsWith("/api"), requestLogger(logger)));
 * ```
 */
export function when<S = unknown>(
	predicate: (req: Req, state: S) => boolean,
	middleware: MiddlewareLike<S>,
): Middleware<S> {
	return new ConditionalMiddleware(predicate, toMiddleware(middleware));
}

/** Splice several middleware into one unit, preserving their order. */
export function combine<S = unknown>(...middleware: MiddlewareLike<S>[]): Middleware<S> {
	return new CombinedMiddleware(middleware.map((unit) => toMiddleware(unit)));
}
