import { describe, expect, it } from "vitest";
import {
	ConflictError,
	Err,
	ExtractionError,
	fromPromise,
	HttpError,
	InternalDispatchError,
	isResult,
	MethodNotAllowedError,
	Ok,
	RouteNotFoundError,
	SwitchyardError,
	toError,
	unwrapOrThrow,
} from "../../result";

describe("Result", () => {
	it("Ok/Err have correct discriminants", () => {
		const ok = Ok(42);
		const err = Err(new SwitchyardError("fail", "TEST"));

		expect(ok.ok).toBe(true);
		if (ok.ok) expect(ok.value).toBe(42);
		expect(err.ok).toBe(false);
		if (!err.ok) expect(err.error).toBeInstanceOf(SwitchyardError);
	});

	it("unwrapOrThrow returns value on Ok, throws on Err", () => {
		expect(unwrapOrThrow(Ok(42))).toBe(42);
		expect(() => unwrapOrThrow(Err(new Error("boom")))).toThrow("boom");
	});

	it("fromPromise wraps resolve to Ok, reject to Err", async () => {
		const ok = await fromPromise(Promise.resolve(42));
		expect(ok).toEqual({ ok: true, value: 42 });

		const err = await fromPromise(Promise.reject(new Error("nope")));
		expect(err.ok).toBe(false);
		if (!err.ok) expect(err.error.message).toBe("nope");
	});

	it("isResult recognises both variants and nothing else", () => {
		expect(isResult(Ok(1))).toBe(true);
		expect(isResult(Err("x"))).toBe(true);
		expect(isResult({ ok: true })).toBe(false);
		expect(isResult({ ok: "yes", value: 1 })).toBe(false);
		expect(isResult(null)).toBe(false);
		expect(isResult("ok")).toBe(false);
	});
});

describe("errors", () => {
	it("sets name and code from the subclass", () => {
		const err = new ConflictError("dup");
		expect(err.name).toBe("ConflictError");
		expect(err.code).toBe("ROUTE_CONFLICT");
		expect(err).toBeInstanceOf(SwitchyardError);
	});

	it("HttpError factories carry their status", () => {
		expect(HttpError.badRequest("x").status).toBe(400);
		expect(HttpError.unauthorized("x").status).toBe(401);
		expect(HttpError.forbidden("x").status).toBe(403);
		expect(HttpError.notFound("x").status).toBe(404);
		expect(HttpError.payloadTooLarge("x").status).toBe(413);
		expect(HttpError.unprocessable("x").status).toBe(422);
		expect(HttpError.internal("x").status).toBe(500);
	});

	it("routing errors are HttpErrors", () => {
		const notFound = new RouteNotFoundError("/missing");
		expect(notFound.status).toBe(404);
		expect(notFound.path).toBe("/missing");

		const notAllowed = new MethodNotAllowedError("PUT", ["GET", "POST"]);
		expect(notAllowed.status).toBe(405);
		expect(notAllowed.message).toBe("Method PUT not allowed. Allowed methods: GET, POST");

		expect(new ExtractionError("bad json").status).toBe(400);
	});

	it("InternalDispatchError is not an HttpError", () => {
		expect(new InternalDispatchError("twice")).not.toBeInstanceOf(HttpError);
	});

	it("toError coerces non-Error values", () => {
		const original = new Error("x");
		expect(toError(original)).toBe(original);
		expect(toError("plain").message).toBe("plain");
	});
});
