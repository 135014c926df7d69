// ---------------------------------------------------------------------------
// Dispatcher: route lookup, chain execution, error conversion
// ---------------------------------------------------------------------------

import {
	HandlerError,
	HttpError,
	InternalDispatchError,
	MethodNotAllowedError,
	RequestCancelledError,
	type RouteNotFoundError,
	statusText,
} from "@switchyard/core";
import type { ErrorHandler } from "./error-handler";
import type { Logger } from "./logger";
import { type RawRequest, Req } from "./req";
import { Res } from "./res";
import type { RouteEntry, RouteTable } from "./route-table";
import type { SharedState } from "./shared-state";

/**
 * How loudly dispatch invariant violations surface. In development the
 * response carries the violation; in production it is a generic 500.
 */
export type DispatchMode = "development" | "production";

/** Collaborators of a {@link Dispatcher}. */
export interface DispatcherOptions {
	readonly errorHandler: ErrorHandler;
	readonly logger: Logger;
	readonly mode: DispatchMode;
}

/** Anything that turns a transport request into a response. */
export interface RequestHandler {
	handle(raw: RawRequest): Promise<Res>;
}

/** Wrap whatever was thrown into the `HttpError` the error handler receives. */
function toHttpError(err: unknown): HttpError {
	if (err instanceof HttpError) return err;
	if (err instanceof Error) return new HandlerError(err.message, err);
	return new HandlerError(String(err));
}

/** Canned response for a lookup that did not reach a route. */
function routingFailure(error: RouteNotFoundError | MethodNotAllowedError): Res {
	if (error instanceof MethodNotAllowedError) {
		return Res.text(`405 ${error.message}`, 405).header("Allow", error.allowed.join(", "));
	}
	return Res.text("404 Route not found", 404);
}

/**
 * Drives one request from lookup to response.
 *
 * `handle` never rejects: routing misses become canned 404/405 responses,
 * errors escaping the chain go to the error handler exactly once, and
 * anything the error handler cannot convert becomes a 500.
 */
export class Dispatcher<S = unknown> implements RequestHandler {
	readonly #table: RouteTable<S>;
	readonly #state: SharedState<S>;
	readonly #options: DispatcherOptions;

	constructor(table: RouteTable<S>, state: SharedState<S>, options: DispatcherOptions) {
		this.#table = table;
		this.#state = state;
		this.#options = options;
	}

	async handle(raw: RawRequest): Promise<Res> {
		let req: Req;
		try {
			req = Req.from(raw);
		} catch (err) {
			this.#options.logger.debug("malformed request", {
				url: raw.url,
				error: err instanceof Error ? err.message : String(err),
			});
			return Res.text(`400 ${statusText(400)}`, 400);
		}

		try {
			const resolved = this.#table.resolve(req.method, req.path);
			if (!resolved.ok) return routingFailure(resolved.error);

			const { route, params } = resolved.value;
			return await route.chain.dispatch(req.withParams(params), this.#state.get());
		} catch (err) {
			return this.#recover(err, req);
		}
	}

	/** The finalized routes, for introspection. */
	get routes(): readonly RouteEntry<S>[] {
		return this.#table.routes;
	}

	/** The shared state handed to every invocation. */
	get state(): S {
		return this.#state.get();
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	async #recover(err: unknown, req: Req): Promise<Res> {
		const { logger, mode, errorHandler } = this.#options;
		const context = { requestId: req.id, method: req.method, path: req.path };

		if (err instanceof InternalDispatchError) {
			logger.error("dispatch invariant violated", { ...context, error: err.message });
			if (mode === "development") {
				return Res.text(`500 ${err.name}: ${err.message}\n${err.stack ?? ""}`, 500);
			}
			return Res.text(`500 ${statusText(500)}`, 500);
		}

		if (err instanceof RequestCancelledError) {
			logger.debug("request cancelled", context);
			return Res.empty(err.status);
		}

		const httpError = toHttpError(err);
		if (httpError.status >= 500) {
			logger.error("request failed", {
				...context,
				status: httpError.status,
				error: httpError.message,
				cause: httpError.cause?.message,
			});
		}

		try {
			return await errorHandler.handle(httpError, req);
		} catch (handlerErr) {
			logger.error("error handler failed", {
				...context,
				error: handlerErr instanceof Error ? handlerErr.message : String(handlerErr),
			});
			return Res.text(`500 ${statusText(500)}`, 500);
		}
	}
}
