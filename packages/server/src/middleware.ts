// ---------------------------------------------------------------------------
// Middleware contract: one operation, `handle(req, state, next)`
// ---------------------------------------------------------------------------

import type { Result } from "@switchyard/core";
import type { Req } from "./req";
import type { Res } from "./res";

/** A value or a promise of it. */
export type Awaitable<T> = T | Promise<T>;

/**
 * The rest of the pipeline: remaining middleware, then the handler.
 *
 * Single use. A middleware either calls `run` exactly once or returns a
 * response of its own without calling it (short-circuit). A second call
 * rejects with `InternalDispatchError`.
 */
export interface Next {
	run(req: Req): Promise<Res>;
}

/** A unit of cross-cutting behavior wrapped around handler execution. */
export interface Middleware<S = unknown> {
	handle(req: Req, state: S, next: Next): Awaitable<Res>;
}

/** Plain function form of {@link Middleware}. */
export type MiddlewareFn<S = unknown> = (req: Req, state: S, next: Next) => Awaitable<Res>;

/** Anything the registration API accepts as middleware. */
export type MiddlewareLike<S = unknown> = Middleware<S> | MiddlewareFn<S>;

/** What a handler may produce: a response, or a Result whose error is raised. */
export type HandlerOutcome = Res | Result<Res, Error>;

/** Terminal business logic for a route. */
export type Handler<S = unknown> = (req: Req, state: S) => Awaitable<HandlerOutcome>;
