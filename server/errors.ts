export type AppErrorCode =
	| "INVALID_CONFIG"
	| "INVALID_REQUEST"
	| "CREATE_REJECTED";

/**
 * Application-level error with a user-facing message.
 * Used for configuration problems and rejected API requests.
 */
export class AppError extends Error {
	public readonly code: AppErrorCode;

	constructor(code: AppErrorCode, message: string) {
		super(message);
		this.name = "AppError";
		this.code = code;
	}
}

export function toErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}

	return "Internal error";
}
