// ---------------------------------------------------------------------------
// Res: the outbound response value
// ---------------------------------------------------------------------------

import { open } from "node:fs/promises";
import { extname } from "node:path";
import { fromPromise } from "@switchyard/core";
import type { WebSocket } from "ws";

/** Chunks of a streamed body. */
export type BodyStream = AsyncIterable<Uint8Array | string>;

/** Response body: buffered, streamed, or absent. */
export type ResBody = string | Uint8Array | BodyStream | null;

/** Optional status and headers for a response. */
export interface ResInit {
	status?: number;
	headers?: Record<string, string>;
}

const TEXT = "text/plain; charset=utf-8";
const HTML = "text/html; charset=utf-8";
const JSON_TYPE = "application/json";
const OCTET_STREAM = "application/octet-stream";

/** Content types guessed from a file extension by {@link Res.file}. */
const FILE_TYPES: Record<string, string> = {
	".html": HTML,
	".txt": TEXT,
	".css": "text/css; charset=utf-8",
	".js": "text/javascript; charset=utf-8",
	".json": JSON_TYPE,
	".svg": "image/svg+xml",
	".png": "image/png",
	".jpg": "image/jpeg",
	".ico": "image/x-icon",
};

/** Receives the socket once a WebSocket upgrade completes. */
export type UpgradeHandler = (socket: WebSocket) => void | Promise<void>;

/** Whether an `open` failure means there is nothing to serve. */
function isMissingFile(error: Error): boolean {
	return "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

/** Whether a body is buffered (as opposed to streamed or absent). */
export function isBuffered(body: ResBody): body is string | Uint8Array {
	return typeof body === "string" || body instanceof Uint8Array;
}

/**
 * HTTP response.
 *
 * Middleware may rewrite the status and headers on the way out.
 *
 * @example
 * ```ts
 * Res.json({ id: "42" }, 201);
 * Res.builder().status(202).header("Retry-After", "5").text("queued");
 * ```
 */
export class Res {
	status: number;
	readonly headers: Headers;
	body: ResBody;
	/** Set by {@link Res.websocket}; the transport hands it the upgraded socket. */
	upgrade: UpgradeHandler | null = null;

	constructor(body: ResBody = null, init: ResInit = {}) {
		this.body = body;
		this.status = init.status ?? 200;
		this.headers = new Headers(init.headers);
	}

	/** Plain-text response. */
	static text(body: string, status = 200): Res {
		return new Res(body, { status, headers: { "Content-Type": TEXT } });
	}

	/** HTML response. */
	static html(body: string, status = 200): Res {
		return new Res(body, { status, headers: { "Content-Type": HTML } });
	}

	/** JSON response. */
	static json(value: unknown, status = 200): Res {
		return new Res(JSON.stringify(value), { status, headers: { "Content-Type": JSON_TYPE } });
	}

	/** Response without a body (204 unless told otherwise). */
	static empty(status = 204): Res {
		return new Res(null, { status });
	}

	/** Redirect to `location`. */
	static redirect(location: string, status = 302): Res {
		return new Res(null, { status, headers: { Location: location } });
	}

	/** Streamed response; the transport writes chunks as they are produced. */
	static stream(chunks: BodyStream, contentType = "application/octet-stream"): Res {
		return new Res(chunks, { headers: { "Content-Type": contentType } });
	}

	/**
	 * Stream a file from disk, or answer 404 when there is no such file.
	 *
	 * The content type is guessed from the extension unless given.
	 */
	static async file(path: string, contentType?: string): Promise<Res> {
		const opened = await fromPromise(open(path, "r"));
		if (!opened.ok) {
			if (isMissingFile(opened.error)) return Res.text("File not found", 404);
			throw opened.error;
		}
		const handle = opened.value;

		const info = await fromPromise(handle.stat());
		if (!info.ok || !info.value.isFile()) {
			await handle.close();
			if (!info.ok) throw info.error;
			return Res.text("File not found", 404);
		}

		const type = contentType ?? FILE_TYPES[extname(path).toLowerCase()] ?? OCTET_STREAM;
		const res = Res.stream(handle.createReadStream(), type);
		res.headers.set("Content-Length", String(info.value.size));
		return res;
	}

	/**
	 * Accept a WebSocket upgrade. The transport completes the handshake and
	 * passes the open socket to `handler`; a plain HTTP request to the same
	 * route gets 426.
	 *
	 * @example
	 * ```ts
	 * app.get("/echo", () =>
	 *   Res.websocket((socket) => {
	 *     socket.on("message", (data, binary) => socket.send(data, { binary }));
	 *   }),
	 * );
	 * ```
	 */
	static websocket(handler: UpgradeHandler): Res {
		const res = new Res(null, { status: 101 });
		res.upgrade = handler;
		return res;
	}

	/** Start a fluent response builder. */
	static builder(): ResBuilder {
		return new ResBuilder();
	}

	/** Set a header and return the response, for chaining. */
	header(name: string, value: string): this {
		this.headers.set(name, value);
		return this;
	}

	/**
	 * The buffered body as text.
	 *
	 * Returns an empty string for streamed or absent bodies.
	 */
	bodyText(): string {
		if (typeof this.body === "string") return this.body;
		if (this.body instanceof Uint8Array) return new TextDecoder().decode(this.body);
		return "";
	}
}

/** Fluent builder for responses that need several headers. */
export class ResBuilder {
	private statusCode = 200;
	private readonly headerMap: Record<string, string> = {};

	status(code: number): this {
		this.statusCode = code;
		return this;
	}

	header(name: string, value: string): this {
		this.headerMap[name] = value;
		return this;
	}

	/** Finish with a plain-text body. */
	text(body: string): Res {
		return this.finish(body, TEXT);
	}

	/** Finish with an HTML body. */
	html(body: string): Res {
		return this.finish(body, HTML);
	}

	/** Finish with a JSON body. */
	json(value: unknown): Res {
		return this.finish(JSON.stringify(value), JSON_TYPE);
	}

	/** Finish with an arbitrary body and no default content type. */
	body(body: ResBody): Res {
		return new Res(body, { status: this.statusCode, headers: this.headerMap });
	}

	private finish(body: string, contentType: string): Res {
		const res = new Res(body, { status: this.statusCode, headers: this.headerMap });
		if (!res.headers.has("content-type")) res.headers.set("Content-Type", contentType);
		return res;
	}
}
