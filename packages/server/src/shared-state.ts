/**
 * Application-wide state, fixed at construction.
 *
 * The framework hands the same reference to every middleware and handler
 * and offers no way to replace it. A value that needs interior mutability
 * owns its own synchronization.
 */
export class SharedState<S> {
	readonly #value: S;

	constructor(value: S) {
		this.#value = value;
	}

	get(): S {
		return this.#value;
	}
}
