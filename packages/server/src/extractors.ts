// ---------------------------------------------------------------------------
// Extractors: typed views of request data, failing with ExtractionError
// ---------------------------------------------------------------------------

import { Err, ExtractionError, Ok, type Result, toError, unwrapOrThrow } from "@switchyard/core";
import type { Req } from "./req";

/** Runtime check that narrows an unknown value. */
export type Guard<T> = (value: unknown) => value is T;

const FORM_TYPE = "application/x-www-form-urlencoded";

/** Body as UTF-8 text; fails on invalid encoding. */
export function text(req: Req): Result<string, ExtractionError> {
	try {
		return Ok(new TextDecoder("utf-8", { fatal: true }).decode(req.bytes()));
	} catch (err) {
		return Err(new ExtractionError("Request body is not valid UTF-8", toError(err)));
	}
}

/**
 * Body parsed as JSON.
 *
 * With a guard the parsed value must also pass it; without one the result
 * is `unknown` and the caller narrows it.
 *
 * @example
 * ```ts
 * const isOrder = (v: unknown): v is Order => typeof v === "object" && v !== null && "sku" in v;
 * const order = extract(json(req, isOrder));
 * ```
 */
export function json(req: Req): Result<unknown, ExtractionError>;
export function json<T>(req: Req, guard: Guard<T>): Result<T, ExtractionError>;
export function json<T>(req: Req, guard?: Guard<T>): Result<unknown, ExtractionError> {
	const body = text(req);
	if (!body.ok) return body;
	if (body.value.trim() === "") {
		return Err(new ExtractionError("Request body is empty"));
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(body.value);
	} catch (err) {
		const cause = toError(err);
		return Err(new ExtractionError(`Invalid JSON body: ${cause.message}`, cause));
	}

	if (guard && !guard(parsed)) {
		return Err(new ExtractionError("JSON body has an unexpected shape"));
	}
	return Ok(parsed);
}

/** URL-encoded form body as a flat record (last value wins). */
export function form(req: Req): Result<Record<string, string>, ExtractionError> {
	const contentType = req.contentType ?? "";
	if (!contentType.startsWith(FORM_TYPE)) {
		return Err(new ExtractionError(`Expected ${FORM_TYPE}, got ${contentType || "no content type"}`));
	}
	const body = text(req);
	if (!body.ok) return body;
	return Ok(Object.fromEntries(new URLSearchParams(body.value)));
}

/** Query string as a flat record (last value wins). */
export function query(req: Req): Result<Record<string, string>, ExtractionError> {
	return Ok(Object.fromEntries(req.query));
}

/** A required query parameter. */
export function queryParam(req: Req, name: string): Result<string, ExtractionError> {
	const value = req.query.get(name);
	if (value === null) return Err(new ExtractionError(`Missing query parameter "${name}"`));
	return Ok(value);
}

/** A path parameter captured by the route. */
export function param(req: Req, name: string): Result<string, ExtractionError> {
	const value = req.param(name);
	if (value === undefined) return Err(new ExtractionError(`Missing path parameter "${name}"`));
	return Ok(value);
}

/** A required header. */
export function header(req: Req, name: string): Result<string, ExtractionError> {
	const value = req.header(name);
	if (value === null) return Err(new ExtractionError(`Missing header "${name}"`));
	return Ok(value);
}

/**
 * Unwrap an extraction inside a handler; a failure is thrown and reaches
 * the error handler as a 400.
 */
export function extract<T>(result: Result<T, ExtractionError>): T {
	return unwrapOrThrow(result);
}
