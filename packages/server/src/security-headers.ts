import type { Middleware } from "./middleware";

/** Standard security headers applied to every response. */
export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
	"X-Content-Type-Options": "nosniff",
	"X-Frame-Options": "DENY",
	"Strict-Transport-Security": "max-age=31536000; includeSubDomains",
};

/** Options for {@link securityHeaders}. */
export interface SecurityHeadersOptions {
	/** Path prefixes whose responses also get `Cache-Control: no-store`. */
	noStorePrefixes?: string[];
}

/**
 * Security headers: sets standard security headers on every response.
 *
 * Headers the handler already set are left alone.
 */
export function securityHeaders<S = unknown>(options: SecurityHeadersOptions = {}): Middleware<S> {
	const noStore = options.noStorePrefixes ?? [];
	return {
		async handle(req, _state, next) {
			const res = await next.run(req);
			for (const [key, value] of Object.entries(SECURITY_HEADERS)) {
				if (!res.headers.has(key)) res.header(key, value);
			}
			if (noStore.some((prefix) => req.path.startsWith(prefix))) {
				res.header("Cache-Control", "no-store");
			}
			return res;
		},
	};
}
