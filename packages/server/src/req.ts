// ---------------------------------------------------------------------------
// Req: the inbound request value handed through the chain
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import { Extensions } from "./extensions";

/** Header values as delivered by a transport. */
export type RawHeaders = Headers | Record<string, string | readonly string[] | undefined>;

/** Request value as produced by the transport layer. */
export interface RawRequest {
	readonly method: string;
	/** Request target: a path with optional query, or an absolute URL. */
	readonly url: string;
	readonly headers?: RawHeaders;
	/** Fully buffered body. */
	readonly body?: Uint8Array | string;
	/** Aborted by the transport when the client goes away. */
	readonly signal?: AbortSignal;
	readonly requestId?: string;
}

/** Constructor input for {@link Req}. */
export interface ReqInit {
	readonly method: string;
	readonly path: string;
	readonly query: URLSearchParams;
	readonly headers: Headers;
	readonly body: Uint8Array;
	readonly params: Readonly<Record<string, string>>;
	readonly extensions: Extensions;
	readonly signal: AbortSignal;
	readonly id: string;
}

const ABSOLUTE_URL_RE = /^[a-z][a-z0-9+.-]*:\/\//i;
const NEVER_ABORTED = new AbortController().signal;

/** Split a request target into its path and query string. */
function parseTarget(target: string): { path: string; search: string } {
	if (ABSOLUTE_URL_RE.test(target)) {
		const url = new URL(target);
		return { path: url.pathname, search: url.search };
	}
	const hash = target.indexOf("#");
	const withoutHash = hash === -1 ? target : target.slice(0, hash);
	const query = withoutHash.indexOf("?");
	if (query === -1) return { path: withoutHash || "/", search: "" };
	return { path: withoutHash.slice(0, query) || "/", search: withoutHash.slice(query) };
}

/** Copy transport headers into a `Headers` instance. */
export function toHeaders(raw: RawHeaders | undefined): Headers {
	if (raw === undefined) return new Headers();
	if (raw instanceof Headers) return new Headers(raw);
	const headers = new Headers();
	for (const [name, value] of Object.entries(raw)) {
		if (value === undefined) continue;
		if (typeof value === "string") {
			headers.append(name, value);
		} else {
			for (const item of value) headers.append(name, item);
		}
	}
	return headers;
}

function toBytes(body: Uint8Array | string | undefined): Uint8Array {
	if (body === undefined) return new Uint8Array(0);
	return typeof body === "string" ? new TextEncoder().encode(body) : body;
}

/**
 * HTTP request.
 *
 * Headers and extensions are mutable so middleware can annotate the
 * request on its way in; everything else is fixed at construction.
 */
export class Req {
	readonly method: string;
	/** Request path as received (not normalized, not decoded). */
	readonly path: string;
	readonly query: URLSearchParams;
	readonly headers: Headers;
	/** Path parameters captured by the matched route. */
	readonly params: Readonly<Record<string, string>>;
	readonly extensions: Extensions;
	/** Aborted when the transport cancels the request. */
	readonly signal: AbortSignal;
	/** Request id: the transport's, the `x-request-id` header, or a fresh UUID. */
	readonly id: string;
	readonly #body: Uint8Array;

	constructor(init: ReqInit) {
		this.method = init.method;
		this.path = init.path;
		this.query = init.query;
		this.headers = init.headers;
		this.params = init.params;
		this.extensions = init.extensions;
		this.signal = init.signal;
		this.id = init.id;
		this.#body = init.body;
	}

	/** Build a request from a transport value. */
	static from(raw: RawRequest, params: Readonly<Record<string, string>> = {}): Req {
		const { path, search } = parseTarget(raw.url);
		const headers = toHeaders(raw.headers);
		return new Req({
			method: raw.method.toUpperCase(),
			path,
			query: new URLSearchParams(search),
			headers,
			body: toBytes(raw.body),
			params,
			extensions: new Extensions(),
			signal: raw.signal ?? NEVER_ABORTED,
			id: raw.requestId ?? headers.get("x-request-id") ?? randomUUID(),
		});
	}

	/** A copy of this request carrying resolved path parameters. */
	withParams(params: Readonly<Record<string, string>>): Req {
		return new Req({
			method: this.method,
			path: this.path,
			query: this.query,
			headers: this.headers,
			body: this.#body,
			params,
			extensions: this.extensions,
			signal: this.signal,
			id: this.id,
		});
	}

	/** A header value, or null when absent. */
	header(name: string): string | null {
		return this.headers.get(name);
	}

	/** A path parameter, or undefined when the route has no such capture. */
	param(name: string): string | undefined {
		return this.params[name];
	}

	/** Raw body bytes. */
	bytes(): Uint8Array {
		return this.#body;
	}

	/** Body decoded as UTF-8 (invalid sequences replaced). */
	text(): string {
		return new TextDecoder().decode(this.#body);
	}

	get contentType(): string | null {
		return this.headers.get("content-type");
	}

	/** Whether the request declares a JSON body. */
	isJson(): boolean {
		return this.contentType?.includes("application/json") ?? false;
	}
}
