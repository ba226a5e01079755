// src/petkit/errors.ts

export class PetkitError extends Error {
	public constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Login answered without a usable session (no `result.session.id`).
 */
export class AuthError extends PetkitError {
	public constructor(
		message: string,
		public readonly response?: unknown,
	) {
		super(message);
	}
}

/**
 * Network failure, timeout or a body that is not JSON.
 * Never thrown by ApiClient; carried in a failed ApiResult instead.
 */
export class TransportError extends PetkitError {
	public constructor(
		message: string,
		public readonly method: string,
		public readonly url: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}
