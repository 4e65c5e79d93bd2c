export type ChatErrorCode =
	| "invalid_state"
	| "out_of_range"
	| "source_interrupted"
	| "source_failure";

// Every ChatError is recoverable: the REPL reports it and returns to the prompt.
export class ChatError extends Error {
	readonly code: ChatErrorCode;

	constructor(code: ChatErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

export class InvalidStateError extends ChatError {
	constructor(message: string) {
		super("invalid_state", message);
	}
}

export class OutOfRangeError extends ChatError {
	constructor(message: string) {
		super("out_of_range", message);
	}
}

export class SourceInterruptedError extends ChatError {
	constructor(message = "Response interrupted.") {
		super("source_interrupted", message);
	}
}

export class SourceFailureError extends ChatError {
	constructor(message: string, cause?: unknown) {
		super("source_failure", message, { cause });
	}
}

export function isChatError(err: unknown): err is ChatError {
	return err instanceof ChatError;
}

export function describeError(err: unknown): string {
	if (err instanceof Error) return err.message || err.name;
	return String(err);
}
