// ---------------------------------------------------------------------------
// Radix Tree: segment-level prefix-compressed tree for one HTTP method
// ---------------------------------------------------------------------------

import { ConflictError, Err, Ok, type Result } from "@switchyard/core";
import { decodeSegment } from "./path";
import type { PathPattern, Segment } from "./pattern";

interface NamedEdge {
	readonly name: string;
	readonly node: RadixNode;
}

interface WildcardEdge {
	readonly name: string;
	readonly handlerId: number;
}

/**
 * A tree node. `prefix` is the run of literal segments consumed on entering
 * the node; literal children are keyed by the first segment of their prefix.
 */
interface RadixNode {
	prefix: string[];
	readonly literal: Map<string, RadixNode>;
	named: NamedEdge | null;
	wildcard: WildcardEdge | null;
	handlerId: number | null;
}

function createNode(prefix: string[] = []): RadixNode {
	return { prefix, literal: new Map(), named: null, wildcard: null, handlerId: null };
}

/** Number of leading segments shared by `a` and `b`. */
function commonLength(a: readonly string[], b: readonly string[]): number {
	const max = Math.min(a.length, b.length);
	let i = 0;
	while (i < max && a[i] === b[i]) i++;
	return i;
}

/** Length of the run of literal segments starting at `start`. */
function literalRunEnd(segments: readonly Segment[], start: number): number {
	let end = start;
	while (end < segments.length && segments[end]?.kind === "literal") end++;
	return end;
}

/**
 * Radix tree holding every route of a single method.
 *
 * Lookup tries literal children first, then the named capture, then the
 * wildcard, backtracking into the next branch when a higher-priority branch
 * dead-ends further down the path.
 */
export class RadixTree {
	private readonly root = createNode();

	/** Insert a parsed pattern. Fails when an equivalent pattern is already present. */
	insert(pattern: PathPattern, handlerId: number): Result<void, ConflictError> {
		let node = this.root;
		let i = 0;
		const { segments } = pattern;

		while (i < segments.length) {
			const segment = segments[i];
			if (segment === undefined) break;

			if (segment.kind === "literal") {
				const end = literalRunEnd(segments, i);
				const run = segments.slice(i, end).map((s) => (s.kind === "literal" ? s.value : ""));
				node = this.descendLiteral(node, run);
				i += node.prefix.length;
				continue;
			}

			if (segment.kind === "named") {
				if (node.named && node.named.name !== segment.name) {
					return Err(
						new ConflictError(
							`Capture :${segment.name} in ${pattern.source} conflicts with existing capture :${node.named.name}`,
						),
					);
				}
				if (!node.named) {
					node.named = { name: segment.name, node: createNode() };
				}
				node = node.named.node;
				i++;
				continue;
			}

			// Wildcards are always the final segment.
			if (node.wildcard) {
				return Err(
					new ConflictError(
						`Wildcard *${segment.name} in ${pattern.source} conflicts with existing wildcard *${node.wildcard.name}`,
					),
				);
			}
			node.wildcard = { name: segment.name, handlerId };
			return Ok(undefined);
		}

		if (node.handlerId !== null) {
			return Err(new ConflictError(`Route ${pattern.source} is already registered`));
		}
		node.handlerId = handlerId;
		return Ok(undefined);
	}

	/**
	 * Find the handler for a list of path segments.
	 *
	 * Returns the handler id and the captured parameters, or null when no
	 * pattern matches.
	 */
	lookup(segments: readonly string[]): { handlerId: number; params: Record<string, string> } | null {
		const captures: Array<[string, string]> = [];
		const handlerId = this.walk(this.root, segments, 0, captures);
		if (handlerId === null) return null;

		const params: Record<string, string> = {};
		for (const [name, value] of captures) {
			params[name] = decodeSegment(value);
		}
		return { handlerId, params };
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	/**
	 * Follow (or create) the literal edge for `run`, splitting an existing
	 * child whose prefix diverges part-way. Returns the node reached, whose
	 * prefix is the portion of `run` it consumed.
	 */
	private descendLiteral(node: RadixNode, run: string[]): RadixNode {
		const first = run[0] ?? "";
		const child = node.literal.get(first);

		if (!child) {
			const created = createNode(run);
			node.literal.set(first, created);
			return created;
		}

		const shared = commonLength(child.prefix, run);
		if (shared === child.prefix.length) return child;

		// Split: `mid` keeps the shared part, `child` keeps its remainder.
		const mid = createNode(child.prefix.slice(0, shared));
		child.prefix = child.prefix.slice(shared);
		mid.literal.set(child.prefix[0] ?? "", child);
		node.literal.set(first, mid);
		return mid;
	}

	private walk(
		node: RadixNode,
		segments: readonly string[],
		index: number,
		captures: Array<[string, string]>,
	): number | null {
		if (index === segments.length) return node.handlerId;

		const segment = segments[index] ?? "";

		const child = node.literal.get(segment);
		if (child && this.prefixMatches(child.prefix, segments, index)) {
			const found = this.walk(child, segments, index + child.prefix.length, captures);
			if (found !== null) return found;
		}

		if (node.named) {
			captures.push([node.named.name, segment]);
			const found = this.walk(node.named.node, segments, index + 1, captures);
			if (found !== null) return found;
			captures.pop();
		}

		if (node.wildcard) {
			captures.push([node.wildcard.name, segments.slice(index).join("/")]);
			return node.wildcard.handlerId;
		}

		return null;
	}

	private prefixMatches(prefix: readonly string[], segments: readonly string[], index: number): boolean {
		if (index + prefix.length > segments.length) return false;
		for (let k = 0; k < prefix.length; k++) {
			if (prefix[k] !== segments[index + k]) return false;
		}
		return true;
	}
}
