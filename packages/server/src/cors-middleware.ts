// ---------------------------------------------------------------------------
// CORS Middleware
// ---------------------------------------------------------------------------

import type { Middleware } from "./middleware";
import { Res } from "./res";

/** Configuration for CORS header generation. */
export interface CorsConfig {
	/** Allowed origins. When empty/omitted, all origins are reflected. */
	allowedOrigins?: string[];
	/** Methods advertised to preflight requests. */
	allowedMethods?: string[];
	/** Request headers advertised to preflight requests. */
	allowedHeaders?: string[];
	/** Preflight cache lifetime in seconds (default 86400). */
	maxAgeSeconds?: number;
}

const DEFAULT_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"];
const DEFAULT_HEADERS = ["Authorization", "Content-Type"];

/**
 * Build CORS response headers for the given origin.
 *
 * When `allowedOrigins` is set, only listed origins receive CORS headers.
 * When omitted, the request origin is reflected (or `*` if no origin header).
 */
export function corsHeaders(origin: string | null | undefined, config: CorsConfig): Record<string, string> {
	const { allowedOrigins } = config;
	let allowOrigin = "*";

	if (allowedOrigins && allowedOrigins.length > 0) {
		if (origin && allowedOrigins.includes(origin)) {
			allowOrigin = origin;
		} else {
			return {};
		}
	} else if (origin) {
		allowOrigin = origin;
	}

	const headers: Record<string, string> = {
		"Access-Control-Allow-Origin": allowOrigin,
		"Access-Control-Allow-Methods": (config.allowedMethods ?? DEFAULT_METHODS).join(", "),
		"Access-Control-Allow-Headers": (config.allowedHeaders ?? DEFAULT_HEADERS).join(", "),
		"Access-Control-Max-Age": String(config.maxAgeSeconds ?? 86_400),
	};
	if (allowOrigin !== "*") headers.Vary = "Origin";
	return headers;
}

/**
 * CORS middleware. Adds CORS headers to every response and answers
 * `OPTIONS` preflight with 204 without calling the rest of the chain.
 *
 * Middleware only runs for matched routes, so preflight needs an `OPTIONS`
 * route (any handler) on the paths it should cover.
 */
export function cors<S = unknown>(config: CorsConfig = {}): Middleware<S> {
	return {
		async handle(req, _state, next) {
			const headers = corsHeaders(req.header("origin"), config);

			if (req.method === "OPTIONS") {
				const res = Res.empty(204);
				for (const [key, value] of Object.entries(headers)) res.header(key, value);
				return res;
			}

			const res = await next.run(req);
			for (const [key, value] of Object.entries(headers)) res.header(key, value);
			return res;
		},
	};
}
