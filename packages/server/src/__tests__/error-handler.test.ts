import { ExtractionError, HandlerError, HttpError } from "@switchyard/core";
import { describe, expect, it } from "vitest";
import { DefaultErrorHandler, fnErrorHandler, JsonErrorHandler } from "../error-handler";
import { Req } from "../req";
import { Res } from "../res";

const req = Req.from({ method: "GET", url: "/orders/1", requestId: "req-1" });

describe("DefaultErrorHandler", () => {
	const handler = new DefaultErrorHandler();

	it("renders status and message as text", () => {
		const res = handler.handle(HttpError.notFound("order 1 not found"));

		expect(res.status).toBe(404);
		expect(res.bodyText()).toBe("404 order 1 not found");
		expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
	});

	it("does not reveal handler failure details", () => {
		const res = handler.handle(new HandlerError("connection refused to 10.0.0.5"));

		expect(res.status).toBe(500);
		expect(res.bodyText()).toBe("500 Internal Server Error");
	});
});

describe("JsonErrorHandler", () => {
	it("renders a JSON body with the request id", () => {
		const res = new JsonErrorHandler().handle(new ExtractionError("Missing header \"x-tenant\""), req);

		expect(res.status).toBe(400);
		expect(JSON.parse(res.bodyText())).toEqual({
			error: 'Missing header "x-tenant"',
			code: "EXTRACTION_ERROR",
			status: 400,
			requestId: "req-1",
		});
	});
});

describe("fnErrorHandler", () => {
	it("delegates to the function", async () => {
		const handler = fnErrorHandler((error, r) => Res.text(`${r.path}: ${error.code}`, error.status));

		const res = await handler.handle(HttpError.forbidden("no"), req);

		expect(res.status).toBe(403);
		expect(res.bodyText()).toBe("/orders/1: FORBIDDEN");
	});
});
