import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { ExtensionKey, Extensions } from "../extensions";
import { Req, toHeaders } from "../req";
import { isBuffered, Res } from "../res";

/** Drain a response body, buffered or streamed, into a string. */
async function readAll(res: Res): Promise<string> {
	const { body } = res;
	if (body === null || isBuffered(body)) return res.bodyText();
	const chunks: Uint8Array[] = [];
	for await (const chunk of body) {
		chunks.push(typeof chunk === "string" ? new TextEncoder().encode(chunk) : chunk);
	}
	return Buffer.concat(chunks).toString("utf-8");
}

describe("Req", () => {
	it("splits the target into path and query", () => {
		const req = Req.from({ method: "get", url: "/search?q=a%20b&tag=x&tag=y#frag" });

		expect(req.method).toBe("GET");
		expect(req.path).toBe("/search");
		expect(req.query.get("q")).toBe("a b");
		expect(req.query.getAll("tag")).toEqual(["x", "y"]);
	});

	it("accepts absolute URLs", () => {
		const req = Req.from({ method: "GET", url: "http://localhost:3000/health?probe=1" });

		expect(req.path).toBe("/health");
		expect(req.query.get("probe")).toBe("1");
	});

	it("defaults an empty path to the root", () => {
		expect(Req.from({ method: "GET", url: "?x=1" }).path).toBe("/");
	});

	it("takes the request id from the transport, then the header", () => {
		const fromTransport = Req.from({
			method: "GET",
			url: "/",
			requestId: "req-a",
			headers: { "x-request-id": "req-b" },
		});
		const fromHeader = Req.from({ method: "GET", url: "/", headers: { "x-request-id": "req-b" } });
		const generated = Req.from({ method: "GET", url: "/" });

		expect(fromTransport.id).toBe("req-a");
		expect(fromHeader.id).toBe("req-b");
		expect(generated.id).toMatch(/^[0-9a-f-]{36}$/);
	});

	it("exposes the body as bytes and text", () => {
		const req = Req.from({
			method: "POST",
			url: "/",
			body: "hello",
			headers: { "content-type": "application/json; charset=utf-8" },
		});

		expect(req.bytes()).toEqual(new TextEncoder().encode("hello"));
		expect(req.text()).toBe("hello");
		expect(req.isJson()).toBe(true);
	});

	it("keeps headers, extensions and body when params are attached", () => {
		const key = new ExtensionKey<string>("tenant");
		const req = Req.from({ method: "POST", url: "/a", body: "x", headers: { "x-a": "1" } });
		req.extensions.insert(key, "acme");

		const withParams = req.withParams({ id: "7" });

		expect(withParams.param("id")).toBe("7");
		expect(withParams.header("x-a")).toBe("1");
		expect(withParams.text()).toBe("x");
		expect(withParams.extensions.get(key)).toBe("acme");
		expect(withParams.id).toBe(req.id);
	});

	it("starts with a signal that is not aborted", () => {
		expect(Req.from({ method: "GET", url: "/" }).signal.aborted).toBe(false);
	});
});

describe("toHeaders", () => {
	it("joins repeated values", () => {
		const headers = toHeaders({ accept: ["text/html", "application/json"], host: "example.test", skip: undefined });

		expect(headers.get("accept")).toBe("text/html, application/json");
		expect(headers.get("host")).toBe("example.test");
		expect(headers.has("skip")).toBe(false);
	});
});

describe("Res", () => {
	it("builds text, html and json responses", () => {
		const text = Res.text("hi", 202);
		const html = Res.html("<p>hi</p>");
		const json = Res.json({ a: 1 }, 201);

		expect(text.status).toBe(202);
		expect(text.headers.get("content-type")).toBe("text/plain; charset=utf-8");
		expect(html.headers.get("content-type")).toBe("text/html; charset=utf-8");
		expect(json.status).toBe(201);
		expect(json.bodyText()).toBe('{"a":1}');
	});

	it("builds empty and redirect responses", () => {
		const empty = Res.empty();
		const redirect = Res.redirect("/login");

		expect(empty.status).toBe(204);
		expect(empty.body).toBeNull();
		expect(redirect.status).toBe(302);
		expect(redirect.headers.get("location")).toBe("/login");
	});

	it("builds responses fluently", () => {
		const res = Res.builder().status(202).header("Retry-After", "5").json({ queued: true });

		expect(res.status).toBe(202);
		expect(res.headers.get("retry-after")).toBe("5");
		expect(res.headers.get("content-type")).toBe("application/json");
	});

	it("keeps an explicit content type from the builder", () => {
		const res = Res.builder().header("Content-Type", "text/csv").text("a,b");

		expect(res.headers.get("content-type")).toBe("text/csv");
	});

	it("distinguishes buffered from streamed bodies", async () => {
		async function* chunks() {
			yield "a";
			yield "b";
		}
		const streamed = Res.stream(chunks(), "text/plain");

		expect(isBuffered(Res.text("x").body)).toBe(true);
		expect(isBuffered(streamed.body)).toBe(false);
		expect(streamed.bodyText()).toBe("");
	});
});

describe("Res.file", () => {
	let dir = "";

	beforeAll(async () => {
		dir = await mkdtemp(join(tmpdir(), "switchyard-file-"));
		await writeFile(join(dir, "notes.txt"), "line one\nline two\n");
		await writeFile(join(dir, "blob.bin"), new Uint8Array([1, 2, 3]));
	});

	afterAll(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("streams the file with its length and a type guessed from the extension", async () => {
		const res = await Res.file(join(dir, "notes.txt"));

		expect(res.status).toBe(200);
		expect(isBuffered(res.body)).toBe(false);
		expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
		expect(res.headers.get("content-length")).toBe("18");
		expect(await readAll(res)).toBe("line one\nline two\n");
	});

	it("uses octet-stream for unknown extensions unless a type is given", async () => {
		const guessed = await Res.file(join(dir, "blob.bin"));
		const explicit = await Res.file(join(dir, "blob.bin"), "application/x-blob");

		expect(guessed.headers.get("content-type")).toBe("application/octet-stream");
		expect(explicit.headers.get("content-type")).toBe("application/x-blob");
		expect(await readAll(guessed)).toBe("\u0001\u0002\u0003");
		await readAll(explicit);
	});

	it("answers 404 for a missing file", async () => {
		const res = await Res.file(join(dir, "absent.txt"));

		expect(res.status).toBe(404);
		expect(res.bodyText()).toBe("File not found");
	});

	it("answers 404 for a directory", async () => {
		const res = await Res.file(dir);

		expect(res.status).toBe(404);
		expect(res.bodyText()).toBe("File not found");
	});
});

describe("Res.websocket", () => {
	it("marks the response as an upgrade carrying the socket handler", () => {
		const onOpen = () => {};
		const res = Res.websocket(onOpen);

		expect(res.status).toBe(101);
		expect(res.body).toBeNull();
		expect(res.upgrade).toBe(onOpen);
		expect(Res.text("plain").upgrade).toBeNull();
	});
});

describe("Extensions", () => {
	it("stores values by typed key", () => {
		const user = new ExtensionKey<{ id: string }>("user");
		const attempts = new ExtensionKey<number>("attempts");
		const ext = new Extensions();

		expect(ext.insert(user, { id: "u1" })).toBeUndefined();
		expect(ext.insert(attempts, 1)).toBeUndefined();
		expect(ext.insert(attempts, 2)).toBe(1);

		expect(ext.get(user)).toEqual({ id: "u1" });
		expect(ext.get(attempts)).toBe(2);
		expect(ext.size).toBe(2);
	});

	it("keeps values of one request separate from another", () => {
		const key = new ExtensionKey<string>("tenant");
		const a = new Extensions();
		const b = new Extensions();
		a.insert(key, "acme");

		expect(b.get(key)).toBeUndefined();
		expect(b.has(key)).toBe(false);
	});

	it("removes and clears values", () => {
		const key = new ExtensionKey<string>("tenant");
		const other = new ExtensionKey<string>("region");
		const ext = new Extensions();
		ext.insert(key, "acme");
		ext.insert(other, "eu");

		expect(ext.remove(key)).toBe("acme");
		expect(ext.has(key)).toBe(false);

		ext.clear();
		expect(ext.get(other)).toBeUndefined();
		expect(ext.size).toBe(0);
	});
});
