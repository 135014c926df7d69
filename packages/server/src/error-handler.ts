// ---------------------------------------------------------------------------
// Error handlers: turn a propagated error into a response
// ---------------------------------------------------------------------------

import { HandlerError, type HttpError, statusText } from "@switchyard/core";
import type { Awaitable } from "./middleware";
import type { Req } from "./req";
import { Res } from "./res";

/**
 * Converts an error that escaped the chain into a response.
 *
 * The dispatcher calls it at most once per request. Errors that are not
 * already an `HttpError` arrive wrapped in a `HandlerError` with the
 * original as `cause`.
 */
export interface ErrorHandler {
	handle(error: HttpError, req: Req): Awaitable<Res>;
}

/** Message safe to show a client: handler failures are reported generically. */
function publicMessage(error: HttpError): string {
	return error instanceof HandlerError ? statusText(error.status) : error.message;
}

/** Plain-text responses of the form `404 Not Found`. */
export class DefaultErrorHandler implements ErrorHandler {
	handle(error: HttpError): Res {
		return Res.text(`${error.status} ${publicMessage(error)}`, error.status);
	}
}

/** JSON responses: `{"error": ..., "code": ..., "status": ..., "requestId": ...}`. */
export class JsonErrorHandler implements ErrorHandler {
	handle(error: HttpError, req: Req): Res {
		return Res.json(
			{ error: publicMessage(error), code: error.code, status: error.status, requestId: req.id },
			error.status,
		);
	}
}

/** Function-based error handler. */
export class FnErrorHandler implements ErrorHandler {
	constructor(private readonly fn: (error: HttpError, req: Req) => Awaitable<Res>) {}

	handle(error: HttpError, req: Req): Awaitable<Res> {
		return this.fn(error, req);
	}
}

/** Create an error handler from a function. */
export function fnErrorHandler(fn: (error: HttpError, req: Req) => Awaitable<Res>): ErrorHandler {
	return new FnErrorHandler(fn);
}
