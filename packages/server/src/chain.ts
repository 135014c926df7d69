// ---------------------------------------------------------------------------
// Chain: ordered middleware plus terminal handler, driven by index
// ---------------------------------------------------------------------------

import { InternalDispatchError, isResult, RequestCancelledError } from "@switchyard/core";
import type { Handler, HandlerOutcome, Middleware, Next } from "./middleware";
import type { Req } from "./req";
import type { Res } from "./res";

/** The fixed, shared part of a chain. */
interface Links<S> {
	readonly middleware: readonly Middleware<S>[];
	readonly handler: Handler<S>;
}

/**
 * Per-dispatch record shared by every continuation of one request. A
 * violation stays recorded even when middleware catches the thrown error.
 */
class DispatchRecord {
	violation: InternalDispatchError | null = null;
}

/** Record owned by each live continuation, so nested chains can share it. */
const records = new WeakMap<Next, DispatchRecord>();

/** Unwrap a handler outcome, raising the error of a failed Result. */
function settle(outcome: HandlerOutcome): Res {
	if (!isResult(outcome)) return outcome;
	if (outcome.ok) return outcome.value;
	throw outcome.error;
}

/** Run the link at `index`: middleware `index`, or the handler past the end. */
async function runLink<S>(links: Links<S>, index: number, req: Req, state: S, record: DispatchRecord): Promise<Res> {
	if (req.signal.aborted) {
		throw new RequestCancelledError();
	}
	const middleware = links.middleware[index];
	if (middleware === undefined) {
		return settle(await links.handler(req, state));
	}
	return await middleware.handle(req, state, new Continuation(links, index + 1, state, record));
}

/**
 * Position `index` in a chain. Created fresh for every link, so a consumed
 * continuation cannot be reached again through another one.
 */
class Continuation<S> implements Next {
	readonly #links: Links<S>;
	readonly #index: number;
	readonly #state: S;
	readonly #record: DispatchRecord;
	#consumed = false;

	constructor(links: Links<S>, index: number, state: S, record: DispatchRecord) {
		this.#links = links;
		this.#index = index;
		this.#state = state;
		this.#record = record;
		records.set(this, record);
	}

	async run(req: Req): Promise<Res> {
		if (this.#consumed) {
			const violation = new InternalDispatchError(
				`Continuation after middleware #${this.#index - 1} was invoked more than once`,
			);
			this.#record.violation ??= violation;
			throw violation;
		}
		this.#consumed = true;
		return runLink(this.#links, this.#index, req, this.#state, this.#record);
	}
}

/**
 * Immutable middleware chain for one route.
 *
 * Built once and shared by every request to the route. Middleware run
 * outermost-first; each sees the request before calling `next` and the
 * response after.
 */
export class Chain<S = unknown> {
	readonly #links: Links<S>;

	constructor(handler: Handler<S>, middleware: readonly Middleware<S>[] = []) {
		this.#links = { handler, middleware: Object.freeze([...middleware]) };
	}

	/** Number of middleware ahead of the handler. */
	get length(): number {
		return this.#links.middleware.length;
	}

	/**
	 * Run the whole chain for one request.
	 *
	 * A continuation invoked twice rejects the dispatch with
	 * `InternalDispatchError` once the chain settles, whatever response or
	 * error the middleware produced after catching it. Pass the enclosing
	 * `parent` continuation when running as a nested chain so the outer
	 * dispatch sees the violation too.
	 */
	async dispatch(req: Req, state: S, parent?: Next): Promise<Res> {
		const record = (parent === undefined ? undefined : records.get(parent)) ?? new DispatchRecord();
		let res: Res;
		try {
			res = await runLink(this.#links, 0, req, state, record);
		} catch (err) {
			throw record.violation ?? err;
		}
		if (record.violation !== null) throw record.violation;
		return res;
	}
}
