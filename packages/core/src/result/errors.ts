/** Base error class for all Switchyard errors */
export class SwitchyardError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

// ---------------------------------------------------------------------------
// Setup-time errors
// ---------------------------------------------------------------------------

/** Two routes registered for the same method are ambiguous at the same specificity */
export class ConflictError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, "ROUTE_CONFLICT", cause);
	}
}

/** A route pattern is malformed (empty capture name, misplaced wildcard, ...) */
export class RoutePatternError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, "INVALID_PATTERN", cause);
	}
}

/** A router was nested so that it would contain itself */
export class RouterCycleError extends SwitchyardError {
	constructor(message: string) {
		super(message, "ROUTER_CYCLE");
	}
}

/** Server configuration could not be parsed */
export class ConfigError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, "INVALID_CONFIG", cause);
	}
}

// ---------------------------------------------------------------------------
// Request-time errors
// ---------------------------------------------------------------------------

/** An error that maps onto an HTTP status code */
export class HttpError extends SwitchyardError {
	readonly status: number;

	constructor(status: number, message: string, code = "HTTP_ERROR", cause?: Error) {
		super(message, code, cause);
		this.status = status;
	}

	/** 400 Bad Request */
	static badRequest(message: string): HttpError {
		return new HttpError(400, message, "BAD_REQUEST");
	}

	/** 401 Unauthorized */
	static unauthorized(message: string): HttpError {
		return new HttpError(401, message, "UNAUTHORIZED");
	}

	/** 403 Forbidden */
	static forbidden(message: string): HttpError {
		return new HttpError(403, message, "FORBIDDEN");
	}

	/** 404 Not Found */
	static notFound(message: string): HttpError {
		return new HttpError(404, message, "NOT_FOUND");
	}

	/** 413 Payload Too Large */
	static payloadTooLarge(message: string): HttpError {
		return new HttpError(413, message, "PAYLOAD_TOO_LARGE");
	}

	/** 422 Unprocessable Entity */
	static unprocessable(message: string): HttpError {
		return new HttpError(422, message, "UNPROCESSABLE");
	}

	/** 500 Internal Server Error */
	static internal(message: string): HttpError {
		return new HttpError(500, message, "INTERNAL_ERROR");
	}
}

/** No registered pattern matches the request path */
export class RouteNotFoundError extends HttpError {
	readonly path: string;

	constructor(path: string) {
		super(404, `No route matches ${path}`, "ROUTE_NOT_FOUND");
		this.path = path;
	}
}

/** The path matches, but not for the requested method */
export class MethodNotAllowedError extends HttpError {
	readonly method: string;
	/** Methods that do have a route for the path, sorted. */
	readonly allowed: readonly string[];

	constructor(method: string, allowed: readonly string[]) {
		super(
			405,
			`Method ${method} not allowed. Allowed methods: ${allowed.join(", ")}`,
			"METHOD_NOT_ALLOWED",
		);
		this.method = method;
		this.allowed = allowed;
	}
}

/** Business-logic failure surfaced from a handler as something other than an HttpError */
export class HandlerError extends HttpError {
	constructor(message: string, cause?: Error) {
		super(500, message, "HANDLER_ERROR", cause);
	}
}

/** Malformed or missing request data */
export class ExtractionError extends HttpError {
	constructor(message: string, cause?: Error) {
		super(400, message, "EXTRACTION_ERROR", cause);
	}
}

/** The transport cancelled the request before the chain finished */
export class RequestCancelledError extends HttpError {
	constructor(message = "Request cancelled", cause?: Error) {
		super(499, message, "REQUEST_CANCELLED", cause);
	}
}

/**
 * Dispatch invariant violated, e.g. a continuation invoked twice.
 *
 * A programming error in middleware, never a client error. The dispatcher
 * does not hand it to the application's error handler.
 */
export class InternalDispatchError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, "INTERNAL_DISPATCH", cause);
	}
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
