export {
	ConfigError,
	ConflictError,
	ExtractionError,
	HandlerError,
	HttpError,
	InternalDispatchError,
	MethodNotAllowedError,
	RequestCancelledError,
	RouteNotFoundError,
	RoutePatternError,
	RouterCycleError,
	SwitchyardError,
	toError,
} from "./errors";
export {
	Err,
	fromPromise,
	isResult,
	Ok,
	type Result,
	unwrapOrThrow,
} from "./result";
