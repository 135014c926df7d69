// ---------------------------------------------------------------------------
// Request logging and correlation ids
// ---------------------------------------------------------------------------

import type { Logger } from "./logger";
import type { Middleware } from "./middleware";

/** Header carrying the request correlation id. */
export const REQUEST_ID_HEADER = "X-Request-Id";

/**
 * Log one line per request with method, path, status, duration and id.
 *
 * Failures escaping the rest of the chain are logged with the error and
 * rethrown unchanged; the dispatcher still converts them.
 */
export function requestLogger<S = unknown>(logger: Logger): Middleware<S> {
	return {
		async handle(req, _state, next) {
			const start = performance.now();
			const context = { requestId: req.id, method: req.method, path: req.path };
			try {
				const res = await next.run(req);
				logger.info("request", {
					...context,
					status: res.status,
					durationMs: Math.round(performance.now() - start),
				});
				return res;
			} catch (err) {
				logger.warn("request failed", {
					...context,
					durationMs: Math.round(performance.now() - start),
					error: err instanceof Error ? err.message : String(err),
				});
				throw err;
			}
		},
	};
}

/**
 * Echo the request id on the response.
 *
 * The id is taken from the inbound `X-Request-Id` header when present and
 * generated otherwise (see `Req.id`).
 */
export function requestId<S = unknown>(): Middleware<S> {
	return {
		async handle(req, _state, next) {
			const res = await next.run(req);
			return res.header(REQUEST_ID_HEADER, req.id);
		},
	};
}
