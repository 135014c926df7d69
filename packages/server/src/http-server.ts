// ---------------------------------------------------------------------------
// Node HTTP transport
// ---------------------------------------------------------------------------

import { once } from "node:events";
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { Duplex } from "node:stream";
import { finished } from "node:stream/promises";
import { Err, HttpError, Ok, type Result, statusText, toError } from "@switchyard/core";
import { type WebSocket, WebSocketServer } from "ws";
import {
	DEFAULT_DRAIN_TIMEOUT_MS,
	DEFAULT_HOST,
	DEFAULT_MAX_BODY_BYTES,
	DEFAULT_PORT,
	type ServerConfig,
} from "./config";
import type { RequestHandler } from "./dispatcher";
import { Logger } from "./logger";
import { isBuffered, Res, type ResBody } from "./res";

/** Options for {@link HttpServer}; omitted fields take the config defaults. */
export interface HttpServerOptions
	extends Partial<Pick<ServerConfig, "port" | "host" | "maxBodyBytes" | "drainTimeoutMs">> {
	logger?: Logger;
}

const TEXT = "text/plain; charset=utf-8";

// ---------------------------------------------------------------------------
// Node HTTP helpers
// ---------------------------------------------------------------------------

/**
 * Read the full request body, refusing more than `maxBytes`.
 *
 * An oversized body is still read to the end (and discarded) so the
 * rejection can be written on an intact connection.
 */
export function readBody(req: IncomingMessage, maxBytes: number): Promise<Result<Uint8Array, HttpError>> {
	return new Promise((resolve, reject) => {
		const declared = Number(req.headers["content-length"] ?? "0");
		let overflow = Number.isFinite(declared) && declared > maxBytes;
		let size = 0;
		const chunks: Buffer[] = [];

		req.on("data", (chunk: Buffer) => {
			size += chunk.length;
			if (size > maxBytes) overflow = true;
			if (overflow) {
				chunks.length = 0;
				return;
			}
			chunks.push(chunk);
		});
		req.on("end", () => {
			if (overflow) {
				resolve(Err(HttpError.payloadTooLarge(`Request body exceeds ${maxBytes} bytes`)));
				return;
			}
			resolve(Ok(new Uint8Array(Buffer.concat(chunks))));
		});
		req.on("error", reject);
	});
}

/** Send a plain-text status response. */
function sendStatus(res: ServerResponse, status: number, extraHeaders: Record<string, string> = {}): void {
	res.writeHead(status, { "Content-Type": TEXT, ...extraHeaders });
	res.end(`${status} ${statusText(status)}`);
}

/** Release a streamed body that will not be written. */
async function discard(body: ResBody): Promise<void> {
	if (body === null || isBuffered(body)) return;
	await body[Symbol.asyncIterator]().return?.();
}

/**
 * Answer an upgrade request with a plain HTTP response, then close the
 * socket. Used when the route did not accept the upgrade.
 */
async function rejectUpgrade(socket: Duplex, response: Res): Promise<void> {
	const { body } = response;
	let bytes: Uint8Array = new Uint8Array(0);
	if (typeof body === "string") bytes = new TextEncoder().encode(body);
	else if (body instanceof Uint8Array) bytes = body;
	else await discard(body);

	const lines = [`HTTP/1.1 ${response.status} ${statusText(response.status)}`];
	for (const [name, value] of response.headers) {
		if (name === "content-length" || name === "connection") continue;
		lines.push(`${name}: ${value}`);
	}
	lines.push(`Content-Length: ${bytes.byteLength}`, "Connection: close", "", "");
	socket.end(Buffer.concat([Buffer.from(lines.join("\r\n")), bytes]));
}

/**
 * Write a {@link Res} to the socket. Streamed bodies are written chunk by
 * chunk, waiting for `drain` when the socket buffer is full.
 */
export async function writeResponse(
	res: ServerResponse,
	response: Res,
	options: { head?: boolean; signal?: AbortSignal } = {},
): Promise<void> {
	res.statusCode = response.status;
	for (const [name, value] of response.headers) {
		if (name === "set-cookie") continue;
		res.setHeader(name, value);
	}
	const cookies = response.headers.getSetCookie();
	if (cookies.length > 0) res.setHeader("Set-Cookie", cookies);

	const { body } = response;
	if (options.head || body === null) {
		await discard(body);
		res.end();
	} else if (isBuffered(body)) {
		res.end(body);
	} else {
		for await (const chunk of body) {
			if (!res.write(chunk)) {
				await once(res, "drain", { signal: options.signal });
			}
		}
		res.end();
	}
	await finished(res);
}

// ---------------------------------------------------------------------------
// HttpServer
// ---------------------------------------------------------------------------

/**
 * Serves a {@link RequestHandler} (usually a built `App`) over Node's HTTP
 * server.
 *
 * Upgrade requests are dispatched like any other GET; a route answering
 * with `Res.websocket` gets the socket once the handshake completes.
 *
 * @example
 * ```ts
 * const server = new HttpServer(app.build(), { port: 3000 });
 * await server.start();
 * // ...
 * await server.stop();
 * ```
 */
export class HttpServer {
	private readonly handler: RequestHandler;
	private readonly logger: Logger;
	private readonly config: Pick<ServerConfig, "port" | "host" | "maxBodyBytes" | "drainTimeoutMs">;

	private httpServer: Server | null = null;
	private wss: WebSocketServer | null = null;
	private readonly sockets = new Set<WebSocket>();
	private resolvedPort = 0;
	private draining = false;
	private active = 0;
	private idleWaiters: Array<() => void> = [];

	constructor(handler: RequestHandler, options: HttpServerOptions = {}) {
		this.handler = handler;
		this.logger = options.logger ?? new Logger("info");
		this.config = {
			port: options.port ?? DEFAULT_PORT,
			host: options.host ?? DEFAULT_HOST,
			maxBodyBytes: options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
			drainTimeoutMs: options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS,
		};
	}

	/** Start listening. Resolves once the port is bound. */
	async start(): Promise<void> {
		if (this.httpServer) return;

		const server = createServer((req, res) => {
			this.serve(req, res).catch((err: unknown) => this.fail(res, err));
		});

		// Upgrades are handled manually so they pass through the middleware chain
		const wss = new WebSocketServer({ noServer: true });
		server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
			this.upgrade(wss, req, socket, head).catch((err: unknown) => {
				this.logger.error("websocket upgrade failed", { url: req.url, error: toError(err).message });
				socket.destroy();
			});
		});

		await new Promise<void>((resolve, reject) => {
			server.once("error", reject);
			server.listen(this.config.port, this.config.host, () => {
				server.off("error", reject);
				const addr = server.address();
				if (addr && typeof addr === "object") {
					this.resolvedPort = addr.port;
				}
				resolve();
			});
		});

		this.httpServer = server;
		this.wss = wss;
		this.draining = false;
		this.logger.info("server listening", { host: this.config.host, port: this.port });
	}

	/**
	 * Stop accepting requests and shut down.
	 *
	 * Requests arriving while draining get 503. In-flight requests have
	 * `drainTimeoutMs` to finish before their connections are closed. Open
	 * WebSockets are sent a 1001 close frame and terminated if still open
	 * when the drain ends.
	 */
	async stop(): Promise<void> {
		const server = this.httpServer;
		if (!server) return;

		this.draining = true;
		const closed = new Promise<void>((resolve) => {
			server.close(() => resolve());
		});
		server.closeIdleConnections();

		const [drained] = await Promise.all([
			this.waitForIdle(this.config.drainTimeoutMs),
			this.closeSockets(this.config.drainTimeoutMs),
		]);
		if (drained) {
			server.closeIdleConnections();
		} else {
			this.logger.warn("drain timeout elapsed, closing connections", {
				activeRequests: this.active,
			});
			server.closeAllConnections();
		}
		this.wss?.close();
		this.wss = null;

		await closed;
		this.httpServer = null;
		this.logger.info("server stopped");
	}

	/** The port the server is listening on (available after start). */
	get port(): number {
		return this.resolvedPort || this.config.port;
	}

	/** Whether the server is shutting down. */
	get isDraining(): boolean {
		return this.draining;
	}

	/** Requests currently being handled. */
	get activeRequests(): number {
		return this.active;
	}

	/** Open WebSocket connections. */
	get openSockets(): number {
		return this.sockets.size;
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private async serve(req: IncomingMessage, res: ServerResponse): Promise<void> {
		if (this.draining) {
			sendStatus(res, 503, { Connection: "close" });
			return;
		}

		this.active++;
		const controller = new AbortController();
		res.on("close", () => {
			if (!res.writableFinished) controller.abort();
		});

		try {
			const body = await readBody(req, this.config.maxBodyBytes);
			if (!body.ok) {
				this.logger.debug("request body rejected", { url: req.url, error: body.error.message });
				sendStatus(res, body.error.status, { Connection: "close" });
				return;
			}

			const response = await this.handler.handle({
				method: req.method ?? "GET",
				url: req.url ?? "/",
				headers: req.headers,
				body: body.value,
				signal: controller.signal,
			});

			const reply =
				response.upgrade === null
					? response
					: Res.text(`426 ${statusText(426)}`, 426).header("Upgrade", "websocket");
			if (this.draining) res.setHeader("Connection", "close");
			await writeResponse(res, reply, { head: req.method === "HEAD", signal: controller.signal });
		} finally {
			this.active--;
			if (this.active === 0) this.notifyIdle();
		}
	}

	private async upgrade(wss: WebSocketServer, req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
		socket.on("error", (err) => {
			this.logger.debug("upgrade socket error", { url: req.url, error: err.message });
		});
		if (this.draining) {
			await rejectUpgrade(socket, Res.text(`503 ${statusText(503)}`, 503));
			return;
		}

		const controller = new AbortController();
		socket.once("close", () => controller.abort());
		const response = await this.handler.handle({
			method: req.method ?? "GET",
			url: req.url ?? "/",
			headers: req.headers,
			signal: controller.signal,
		});

		const onOpen = response.upgrade;
		if (onOpen === null) {
			await rejectUpgrade(socket, response);
			return;
		}

		wss.handleUpgrade(req, socket, head, (ws) => {
			this.sockets.add(ws);
			ws.once("close", () => this.sockets.delete(ws));
			this.logger.debug("websocket opened", { url: req.url });
			Promise.resolve()
				.then(() => onOpen(ws))
				.catch((err: unknown) => {
					this.logger.error("websocket handler failed", { url: req.url, error: toError(err).message });
					ws.close(1011, "Internal error");
				});
		});
	}

	private fail(res: ServerResponse, err: unknown): void {
		const error = toError(err);
		if (res.destroyed) {
			this.logger.debug("connection closed before response completed", { error: error.message });
			return;
		}
		this.logger.error("failed to write response", { error: error.message });
		if (res.headersSent) {
			res.destroy(error);
			return;
		}
		sendStatus(res, 500);
	}

	/** Send every open WebSocket a 1001 close; terminate those still open after `timeoutMs`. */
	private async closeSockets(timeoutMs: number): Promise<void> {
		const open = [...this.sockets];
		if (open.length === 0) return;

		const allClosed = Promise.all(
			open.map((ws) => (ws.readyState === ws.CLOSED ? Promise.resolve() : once(ws, "close"))),
		);
		for (const ws of open) ws.close(1001, "Server shutting down");

		let timer: NodeJS.Timeout | undefined;
		const expired = await Promise.race([
			allClosed.then(() => false),
			new Promise<boolean>((resolve) => {
				timer = setTimeout(() => resolve(true), timeoutMs);
			}),
		]);
		clearTimeout(timer);

		if (expired) {
			this.logger.warn("websockets still open after drain timeout, terminating", { openSockets: this.sockets.size });
			for (const ws of this.sockets) ws.terminate();
		}
	}

	private waitForIdle(timeoutMs: number): Promise<boolean> {
		if (this.active === 0) return Promise.resolve(true);
		return new Promise((resolve) => {
			const timer = setTimeout(() => resolve(false), timeoutMs);
			this.idleWaiters.push(() => {
				clearTimeout(timer);
				resolve(true);
			});
		});
	}

	private notifyIdle(): void {
		const waiters = this.idleWaiters;
		this.idleWaiters = [];
		for (const wake of waiters) wake();
	}
}

/** Create an {@link HttpServer} and start it. */
export async function startServer(handler: RequestHandler, options: HttpServerOptions = {}): Promise<HttpServer> {
	const server = new HttpServer(handler, options);
	await server.start();
	return server;
}

/**
 * Stop `server` on SIGTERM or SIGINT.
 *
 * Opt-in; returns a function that removes the listeners again.
 */
export function installShutdownHooks(
	server: HttpServer,
	logger: Logger,
	signals: readonly NodeJS.Signals[] = ["SIGTERM", "SIGINT"],
): () => void {
	function dispose(): void {
		for (const signal of signals) process.off(signal, onSignal);
	}

	function onSignal(signal: NodeJS.Signals): void {
		dispose();
		logger.info("shutdown signal received", { signal });
		server.stop().catch((err: unknown) => {
			logger.error("shutdown failed", { error: toError(err).message });
		});
	}

	for (const signal of signals) process.once(signal, onSignal);
	return dispose;
}
