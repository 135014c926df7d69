// ---------------------------------------------------------------------------
// Extensions: request-scoped values keyed by typed tokens
// ---------------------------------------------------------------------------

interface Forgettable {
	forget(owner: Extensions): boolean;
}

/**
 * Typed token for a request-scoped value.
 *
 * Each key keeps its own per-request slots, so reading a value back never
 * needs a type assertion.
 *
 * @example
 * ```ts
 * const CurrentUser = new ExtensionKey<{ id: string }>("currentUser");
 * req.extensions.insert(CurrentUser, { id: "u1" }); // in auth middleware
 * req.extensions.get(CurrentUser)?.id;              // in the handler
 * ```
 */
export class ExtensionKey<T> implements Forgettable {
	readonly #slots = new WeakMap<Extensions, T>();

	constructor(readonly name: string) {}

	/** @internal Read this key's slot for `owner`. */
	read(owner: Extensions): T | undefined {
		return this.#slots.get(owner);
	}

	/** @internal Write this key's slot for `owner`. */
	write(owner: Extensions, value: T): void {
		this.#slots.set(owner, value);
	}

	/** @internal Clear this key's slot for `owner`. */
	forget(owner: Extensions): boolean {
		return this.#slots.delete(owner);
	}
}

/** Values that middleware attach to a request for downstream units. */
export class Extensions {
	readonly #keys = new Set<Forgettable>();

	/** Store a value, returning the one it replaced. */
	insert<T>(key: ExtensionKey<T>, value: T): T | undefined {
		const previous = key.read(this);
		key.write(this, value);
		this.#keys.add(key);
		return previous;
	}

	get<T>(key: ExtensionKey<T>): T | undefined {
		return key.read(this);
	}

	has<T>(key: ExtensionKey<T>): boolean {
		return this.#keys.has(key);
	}

	/** Remove a value, returning it. */
	remove<T>(key: ExtensionKey<T>): T | undefined {
		const previous = key.read(this);
		key.forget(this);
		this.#keys.delete(key);
		return previous;
	}

	clear(): void {
		for (const key of this.#keys) key.forget(this);
		this.#keys.clear();
	}

	get size(): number {
		return this.#keys.size;
	}
}
