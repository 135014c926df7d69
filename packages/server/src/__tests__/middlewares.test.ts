import { describe, expect, it } from "vitest";
import { App } from "../app";
import { cors, corsHeaders } from "../cors-middleware";
import { type LogEntry, Logger } from "../logger";
import { requestId, requestLogger } from "../request-logger";
import { Res } from "../res";
import { securityHeaders } from "../security-headers";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function captureLogger() {
	const lines: LogEntry[] = [];
	const logger = new Logger("info", {}, (line) => {
		lines.push(JSON.parse(line) as LogEntry);
	});
	return { logger, lines };
}

// ---------------------------------------------------------------------------
// CORS
// ---------------------------------------------------------------------------

describe("corsHeaders", () => {
	it("reflects the origin when no allow-list is configured", () => {
		expect(corsHeaders("https://app.example.test", {})).toEqual({
			"Access-Control-Allow-Origin": "https://app.example.test",
			"Access-Control-Allow-Methods": "GET, POST, PUT, PATCH, DELETE, OPTIONS",
			"Access-Control-Allow-Headers": "Authorization, Content-Type",
			"Access-Control-Max-Age": "86400",
			Vary: "Origin",
		});
	});

	it("uses * when there is no origin header", () => {
		const headers = corsHeaders(null, {});

		expect(headers["Access-Control-Allow-Origin"]).toBe("*");
		expect(headers.Vary).toBeUndefined();
	});

	it("returns nothing for origins outside the allow-list", () => {
		expect(corsHeaders("https://evil.test", { allowedOrigins: ["https://app.example.test"] })).toEqual({});
	});
});

describe("cors", () => {
	it("answers preflight with 204 without reaching the handler", async () => {
		let handled = false;
		const dispatcher = App.create()
			.use(cors({ allowedMethods: ["GET", "OPTIONS"] }))
			.options("/items", () => {
				handled = true;
				return Res.text("unreachable");
			})
			.build();

		const res = await dispatcher.handle({
			method: "OPTIONS",
			url: "/items",
			headers: { origin: "https://app.example.test" },
		});

		expect(res.status).toBe(204);
		expect(res.headers.get("access-control-allow-origin")).toBe("https://app.example.test");
		expect(res.headers.get("access-control-allow-methods")).toBe("GET, OPTIONS");
		expect(handled).toBe(false);
	});

	it("decorates regular responses", async () => {
		const dispatcher = App.create()
			.use(cors({ allowedOrigins: ["https://app.example.test"] }))
			.get("/items", () => Res.json([]))
			.build();

		const allowed = await dispatcher.handle({
			method: "GET",
			url: "/items",
			headers: { origin: "https://app.example.test" },
		});
		const refused = await dispatcher.handle({
			method: "GET",
			url: "/items",
			headers: { origin: "https://evil.test" },
		});

		expect(allowed.headers.get("access-control-allow-origin")).toBe("https://app.example.test");
		expect(refused.status).toBe(200);
		expect(refused.headers.has("access-control-allow-origin")).toBe(false);
	});
});

// ---------------------------------------------------------------------------
// Security headers
// ---------------------------------------------------------------------------

describe("securityHeaders", () => {
	it("adds the standard headers without overriding the handler's", async () => {
		const dispatcher = App.create()
			.use(securityHeaders({ noStorePrefixes: ["/admin/"] }))
			.get("/embed", () => Res.text("ok").header("X-Frame-Options", "SAMEORIGIN"))
			.get("/admin/keys", () => Res.text("keys"))
			.build();

		const embed = await dispatcher.handle({ method: "GET", url: "/embed" });
		const admin = await dispatcher.handle({ method: "GET", url: "/admin/keys" });

		expect(embed.headers.get("x-frame-options")).toBe("SAMEORIGIN");
		expect(embed.headers.get("x-content-type-options")).toBe("nosniff");
		expect(embed.headers.has("cache-control")).toBe(false);
		expect(admin.headers.get("x-frame-options")).toBe("DENY");
		expect(admin.headers.get("cache-control")).toBe("no-store");
	});
});

// ---------------------------------------------------------------------------
// Request logging and ids
// ---------------------------------------------------------------------------

describe("requestLogger", () => {
	it("logs one line per request", async () => {
		const { logger, lines } = captureLogger();
		const dispatcher = App.create({ logger: Logger.silent() })
			.use(requestLogger(logger))
			.post("/orders", () => Res.text("created", 201))
			.build();

		await dispatcher.handle({ method: "POST", url: "/orders?x=1", requestId: "req-7" });

		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatchObject({
			level: "info",
			msg: "request",
			requestId: "req-7",
			method: "POST",
			path: "/orders",
			status: 201,
		});
		expect(typeof lines[0]!.durationMs).toBe("number");
	});

	it("logs and rethrows failures", async () => {
		const { logger, lines } = captureLogger();
		const dispatcher = App.create({ logger: Logger.silent() })
			.use(requestLogger(logger))
			.get("/boom", () => {
				throw new Error("kaput");
			})
			.build();

		const res = await dispatcher.handle({ method: "GET", url: "/boom" });

		expect(res.status).toBe(500);
		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatchObject({ level: "warn", msg: "request failed", error: "kaput" });
	});
});

describe("requestId", () => {
	it("echoes the inbound id", async () => {
		const dispatcher = App.create()
			.use(requestId())
			.get("/", () => Res.text("ok"))
			.build();

		const res = await dispatcher.handle({ method: "GET", url: "/", headers: { "x-request-id": "abc-123" } });

		expect(res.headers.get("x-request-id")).toBe("abc-123");
	});

	it("sets a generated id when none was sent", async () => {
		const dispatcher = App.create()
			.use(requestId())
			.get("/", () => Res.text("ok"))
			.build();

		const res = await dispatcher.handle({ method: "GET", url: "/" });

		expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
	});
});
