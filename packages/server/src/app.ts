// ---------------------------------------------------------------------------
// App: registration API and build step
// ---------------------------------------------------------------------------

import { unwrapOrThrow } from "@switchyard/core";
import { toMiddleware } from "./combinators";
import { type DispatchMode, Dispatcher } from "./dispatcher";
import { DefaultErrorHandler, type ErrorHandler } from "./error-handler";
import { Logger } from "./logger";
import type { Middleware, MiddlewareLike } from "./middleware";
import type { Route } from "./route";
import { RouteRegistry, Router } from "./router";
import { RouteTable } from "./route-table";
import { SharedState } from "./shared-state";

/** Options for {@link App}. */
export interface AppOptions {
	/** Default "production". */
	mode?: DispatchMode;
	/** Default: JSON lines to stdout at info level. */
	logger?: Logger;
	/** Default {@link DefaultErrorHandler}. */
	errorHandler?: ErrorHandler;
}

/**
 * HTTP application builder.
 *
 * Registration is single-threaded setup work; {@link App.build} freezes it
 * into a {@link Dispatcher}. Later changes to the app do not affect
 * dispatchers already built.
 *
 * @example
 * ```ts
 * const app = App.withState({ db })
 *   .use(requestLogger(logger))
 *   .get("/health", () => Res.text("OK"))
 *   .mount("/api/v1", api);
 * const server = new HttpServer(app.build(), { port: 3000 });
 * await server.start();
 * ```
 */
export class App<S = undefined> extends RouteRegistry<S> {
	readonly #state: SharedState<S>;
	readonly #global: Middleware<S>[] = [];
	readonly #root = new Router<S>();
	#errorHandler: ErrorHandler;
	readonly #mode: DispatchMode;
	readonly #logger: Logger;

	private constructor(state: S, options: AppOptions) {
		super();
		this.#state = new SharedState(state);
		this.#errorHandler = options.errorHandler ?? new DefaultErrorHandler();
		this.#mode = options.mode ?? "production";
		this.#logger = options.logger ?? new Logger("info");
	}

	/** Create an application without shared state. */
	static create(options: AppOptions = {}): App<undefined> {
		return new App<undefined>(undefined, options);
	}

	/** Create an application whose handlers all receive `state`. */
	static withState<S>(state: S, options: AppOptions = {}): App<S> {
		return new App(state, options);
	}

	/** Add global middleware. Global middleware is the outermost layer. */
	use(middleware: MiddlewareLike<S>): this {
		this.#global.push(toMiddleware(middleware));
		return this;
	}

	route(route: Route<S>): this {
		this.#root.route(route);
		return this;
	}

	/** Mount a router at a prefix; every pattern in it is prefixed. */
	mount(prefix: string, router: Router<S>): this {
		this.#root.nest(prefix, router);
		return this;
	}

	/** Replace the error handler. */
	errorHandler(handler: ErrorHandler): this {
		this.#errorHandler = handler;
		return this;
	}

	/**
	 * Finalize the route table and build every route's chain.
	 *
	 * @throws ConflictError when two routes for one method are ambiguous
	 * @throws RoutePatternError when a pattern is malformed
	 */
	build(): Dispatcher<S> {
		const table = unwrapOrThrow(RouteTable.build(this.#root.flatten(), [...this.#global]));
		return new Dispatcher(table, this.#state, {
			errorHandler: this.#errorHandler,
			logger: this.#logger,
			mode: this.#mode,
		});
	}
}
