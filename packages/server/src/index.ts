export { App, type AppOptions } from "./app";
export { Chain } from "./chain";
export {
	CombinedMiddleware,
	ConditionalMiddleware,
	combine,
	FnMiddleware,
	fromFn,
	toMiddleware,
	when,
} from "./combinators";
export {
	configFromEnv,
	DEFAULT_DRAIN_TIMEOUT_MS,
	DEFAULT_HOST,
	DEFAULT_MAX_BODY_BYTES,
	DEFAULT_PORT,
	ENV_KEYS,
	resolveConfig,
	type ServerConfig,
} from "./config";
export { type CorsConfig, cors, corsHeaders } from "./cors-middleware";
export {
	type DispatcherOptions,
	type DispatchMode,
	Dispatcher,
	type RequestHandler,
} from "./dispatcher";
export {
	DefaultErrorHandler,
	type ErrorHandler,
	FnErrorHandler,
	fnErrorHandler,
	JsonErrorHandler,
} from "./error-handler";
export { ExtensionKey, Extensions } from "./extensions";
export * as extractors from "./extractors";
export { extract, type Guard } from "./extractors";
export {
	type HttpServerOptions,
	HttpServer,
	installShutdownHooks,
	readBody,
	startServer,
	writeResponse,
} from "./http-server";
export { isLogLevel, LOG_LEVELS, type LogEntry, Logger, type LogLevel } from "./logger";
export type {
	Awaitable,
	Handler,
	HandlerOutcome,
	Middleware,
	MiddlewareFn,
	MiddlewareLike,
	Next,
} from "./middleware";
export { type RawHeaders, type RawRequest, Req, type ReqInit, toHeaders } from "./req";
export { REQUEST_ID_HEADER, requestId, requestLogger } from "./request-logger";
export {
	type BodyStream,
	isBuffered,
	Res,
	type ResBody,
	ResBuilder,
	type ResInit,
	type UpgradeHandler,
} from "./res";
export { Route } from "./route";
export { type RouteEntry, type RouteMatch, RouteTable } from "./route-table";
export { type FlatRoute, RouteRegistry, Router } from "./router";
export { SECURITY_HEADERS, type SecurityHeadersOptions, securityHeaders } from "./security-headers";
export { SharedState } from "./shared-state";
