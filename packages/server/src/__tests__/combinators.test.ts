import { InternalDispatchError } from "@switchyard/core";
import { describe, expect, it } from "vitest";
import { Chain } from "../chain";
import { combine, fromFn, toMiddleware, when } from "../combinators";
import type { Middleware } from "../middleware";
import { Req } from "../req";
import { Res } from "../res";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeReq(url = "/"): Req {
	return Req.from({ method: "GET", url });
}

/** Middleware that appends its name to an `X-Trace` response header. */
function stamp(name: string, log: string[]): Middleware<unknown> {
	return fromFn(async (req, _state, next) => {
		log.push(name);
		const res = await next.run(req);
		const trace = res.headers.get("x-trace");
		return res.header("X-Trace", trace ? `${trace},${name}` : name);
	});
}

async function run(middleware: Middleware<unknown>[], url = "/"): Promise<{ res: Res; log: string[] }> {
	const log: string[] = [];
	const chain = new Chain(() => {
		log.push("handler");
		return Res.text("ok");
	}, middleware);
	const res = await chain.dispatch(makeReq(url), undefined);
	return { res, log };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("when", () => {
	it("behaves as if the middleware were omitted when the predicate is false", async () => {
		const log: string[] = [];
		const withSkipped = new Chain(() => Res.text("ok"), [
			stamp("outer", log),
			when(() => false, stamp("skipped", log)),
			stamp("inner", log),
		]);
		const without = new Chain(() => Res.text("ok"), [stamp("outer", log), stamp("inner", log)]);

		const a = await withSkipped.dispatch(makeReq(), undefined);
		const b = await without.dispatch(makeReq(), undefined);

		expect(a.headers.get("x-trace")).toBe("inner,outer");
		expect(a.headers.get("x-trace")).toBe(b.headers.get("x-trace"));
		expect(log).toEqual(["outer", "inner", "outer", "inner"]);
	});

	it("runs the middleware when the predicate holds", async () => {
		const log: string[] = [];
		const { res } = await run([when((req) => req.path.startsWith("/api"), stamp("api", log))], "/api/x");

		expect(res.headers.get("x-trace")).toBe("api");
		expect(log).toEqual(["api"]);
	});

	it("evaluates the predicate per request", async () => {
		const log: string[] = [];
		const guarded = when<unknown>((req) => req.path === "/admin", stamp("admin", log));
		const chain = new Chain(() => Res.text("ok"), [guarded]);

		await chain.dispatch(makeReq("/public"), undefined);
		await chain.dispatch(makeReq("/admin"), undefined);

		expect(log).toEqual(["admin"]);
	});

	it("accepts plain functions", async () => {
		const { res } = await run([when(() => true, () => Res.text("short", 418))]);

		expect(res.status).toBe(418);
	});
});

describe("combine", () => {
	it("runs its parts in order, as if spliced into the chain", async () => {
		const log: string[] = [];
		const { res, log: handlerLog } = await run([
			stamp("a", log),
			combine(stamp("b", log), stamp("c", log)),
			stamp("d", log),
		]);

		expect(log).toEqual(["a", "b", "c", "d"]);
		expect(handlerLog).toEqual(["handler"]);
		expect(res.headers.get("x-trace")).toBe("d,c,b,a");
	});

	it("lets a part short-circuit the rest of the chain", async () => {
		const log: string[] = [];
		const { res, log: handlerLog } = await run([
			combine(stamp("b", log), () => Res.text("stop", 401)),
			stamp("d", log),
		]);

		expect(res.status).toBe(401);
		expect(log).toEqual(["b"]);
		expect(handlerLog).toEqual([]);
	});

	it("still guards the outer continuation against reuse", async () => {
		const reuse = fromFn(async (req, _state, next) => {
			await next.run(req);
			return next.run(req);
		});

		await expect(run([combine(stamp("b", []), reuse)])).rejects.toThrow(InternalDispatchError);
	});

	it("surfaces reuse inside a combined unit past middleware that catches it", async () => {
		const reuse = fromFn(async (req, _state, next) => {
			await next.run(req);
			return next.run(req);
		});
		const recover = fromFn(async (req, _state, next) => {
			try {
				return await next.run(req);
			} catch {
				return Res.text("recovered");
			}
		});

		await expect(run([recover, combine(stamp("b", []), reuse)])).rejects.toThrow(InternalDispatchError);
	});

	it("with no parts is a pass-through", async () => {
		const { res, log } = await run([combine()]);

		expect(res.bodyText()).toBe("ok");
		expect(log).toEqual(["handler"]);
	});
});

describe("toMiddleware", () => {
	it("returns middleware objects unchanged", () => {
		const mw = stamp("x", []);
		expect(toMiddleware(mw)).toBe(mw);
	});

	it("wraps functions", async () => {
		const mw = toMiddleware<unknown>((req, _state, next) => next.run(req));
		const res = await new Chain(() => Res.text("through"), [mw]).dispatch(makeReq(), undefined);

		expect(res.bodyText()).toBe("through");
	});
});
