// ---------------------------------------------------------------------------
// Path Matcher: method + path → handler id, one radix tree per method
// ---------------------------------------------------------------------------

import {
	type ConflictError,
	Err,
	MethodNotAllowedError,
	Ok,
	type Result,
	RouteNotFoundError,
	type RoutePatternError,
} from "@switchyard/core";
import { normalizePath, splitPath } from "./path";
import { parsePattern } from "./pattern";
import { RadixTree } from "./radix-tree";

/** Outcome of a successful lookup. */
export interface MatchResult {
	readonly handlerId: number;
	readonly params: Readonly<Record<string, string>>;
}

/** A pattern as registered, for introspection. */
export interface RegisteredPattern {
	readonly method: string;
	readonly pattern: string;
	readonly handlerId: number;
}

/**
 * Maps method + path patterns to handler ids.
 *
 * Lookup cost is proportional to the number of path segments, not the
 * number of registered routes.
 *
 * @example
 * ```ts
 * const matcher = new PathMatcher();
 * matcher.register("GET", "/users/:id", 0);
 * matcher.register("GET", "/users/active", 1);
 * matcher.resolve("GET", "/users/42"); // Ok({ handlerId: 0, params: { id: "42" } })
 * ```
 */
export class PathMatcher {
	private readonly trees = new Map<string, RadixTree>();
	private readonly registered: RegisteredPattern[] = [];

	/** Register a pattern for a method. */
	register(
		method: string,
		pattern: string,
		handlerId: number,
	): Result<void, ConflictError | RoutePatternError> {
		const parsed = parsePattern(pattern);
		if (!parsed.ok) return parsed;

		const verb = method.toUpperCase();
		let tree = this.trees.get(verb);
		if (!tree) {
			tree = new RadixTree();
			this.trees.set(verb, tree);
		}

		const inserted = tree.insert(parsed.value, handlerId);
		if (!inserted.ok) {
			return Err(inserted.error);
		}

		this.registered.push({ method: verb, pattern: parsed.value.source, handlerId });
		return Ok(undefined);
	}

	/**
	 * Resolve a request path for a method.
	 *
	 * HEAD falls back to the GET route when no HEAD route matches, and GET
	 * routes count as allowing HEAD. When the path matches under other
	 * methods only, the error lists them so the caller can answer with an
	 * `Allow` header.
	 */
	resolve(
		method: string,
		path: string,
	): Result<MatchResult, RouteNotFoundError | MethodNotAllowedError> {
		const verb = method.toUpperCase();
		const normalized = normalizePath(path);
		const segments = splitPath(normalized);

		const match =
			this.trees.get(verb)?.lookup(segments) ??
			(verb === "HEAD" ? this.trees.get("GET")?.lookup(segments) : undefined);
		if (match) return Ok(match);

		const allowed = new Set<string>();
		for (const [other, tree] of this.trees) {
			if (other === verb || !tree.lookup(segments)) continue;
			allowed.add(other);
			if (other === "GET") allowed.add("HEAD");
		}
		if (allowed.size > 0) {
			return Err(new MethodNotAllowedError(verb, [...allowed].sort()));
		}
		return Err(new RouteNotFoundError(normalized));
	}

	/** Every registered pattern, in registration order. */
	routes(): readonly RegisteredPattern[] {
		return this.registered;
	}
}
