export type ErrorCode =
	| "NO_MICROPHONE"
	| "PERMISSION_DENIED"
	| "DEVICE_BUSY"
	| "AUDIO_BACKEND_MISSING"
	| "ALREADY_RECORDING"
	| "CAPTURE_CANCELLED"
	| "RECORDING_TOO_SHORT"
	| "CONNECTION_FAILED"
	| "API_ERROR"
	| "EMPTY_RESULT"
	| "INJECTION_FAILED"
	| "VALIDATION_FAILED"
	| "CORRUPTED"
	| "WRITE_FAILED"
	| "UNKNOWN_ERROR";

/** Error kinds that mean the microphone could not be used. */
export const DEVICE_ERROR_CODES: readonly ErrorCode[] = [
	"NO_MICROPHONE",
	"PERMISSION_DENIED",
	"DEVICE_BUSY",
	"AUDIO_BACKEND_MISSING",
];

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly context?: Record<string, unknown>;

	constructor(
		code: ErrorCode,
		message: string,
		context?: Record<string, unknown>,
	) {
		super(message);
		this.code = code;
		this.context = context;
		this.name = "AppError";
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

export const hasErrorCode = (error: unknown, code: ErrorCode): boolean =>
	error instanceof AppError && error.code === code;

export const isDeviceError = (error: unknown): error is AppError =>
	error instanceof AppError && DEVICE_ERROR_CODES.includes(error.code);

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
