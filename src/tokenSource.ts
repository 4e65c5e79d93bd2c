import { InvalidStateError, SourceInterruptedError } from "./errors.js";

export type TurnStats = {
	tokensGenerated: number;
	durationSeconds: number;
	promptTokens: number;
};

export type TokenSourceState =
	| "idle"
	| "streaming"
	| "completed"
	| "interrupted"
	| "failed";

/**
 * A single-pass stream of text fragments for one assistant turn.
 *
 * Iteration ends normally when generation is done, or throws
 * `SourceInterruptedError` after `abort()` and `SourceFailureError` when the
 * transport fails. `stats()` is only answerable once the state is `completed`.
 */
export interface TokenSource extends AsyncIterable<string> {
	readonly state: TokenSourceState;
	stats(): TurnStats;
	abort(): void;
}

export function tokensPerSecond(stats: TurnStats): number | undefined {
	if (stats.tokensGenerated <= 0 || stats.durationSeconds <= 0) return undefined;
	return stats.tokensGenerated / stats.durationSeconds;
}

/**
 * Shared state bookkeeping for TokenSource implementations: single iteration,
 * stats gated on completion.
 */
export abstract class BaseTokenSource implements TokenSource {
	#state: TokenSourceState = "idle";
	#stats: TurnStats | undefined;

	get state(): TokenSourceState {
		return this.#state;
	}

	stats(): TurnStats {
		if (this.#state !== "completed" || !this.#stats) {
			throw new InvalidStateError(
				`Turn statistics are not available while the stream is ${this.#state}.`
			);
		}
		return this.#stats;
	}

	abstract abort(): void;

	protected abstract produce(): AsyncGenerator<string, TurnStats>;

	async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
		if (this.#state !== "idle") {
			throw new InvalidStateError("A token stream can only be consumed once.");
		}
		this.#state = "streaming";
		try {
			this.#stats = yield* this.produce();
			this.#state = "completed";
		} catch (err) {
			this.#state =
				err instanceof SourceInterruptedError ? "interrupted" : "failed";
			throw err;
		} finally {
			// consumer stopped early (break/return)
			if (this.#state === "streaming") this.#state = "interrupted";
		}
	}
}
