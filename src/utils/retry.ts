import { logError } from "./logger";

export interface RetryOptions {
	/** Attempts after the first one. */
	maxRetries?: number;
	/** Delay before each retry; the last entry repeats. */
	backoffs?: number[];
	operationName?: string;
	/** Per-attempt limit in ms. The attempt's signal is aborted when it passes. */
	timeout?: number;
	shouldRetry?: (error: unknown) => boolean;
}

const sleep = (ms: number) =>
	new Promise<void>((resolve) => setTimeout(resolve, ms));

const attemptWithTimeout = async <T>(
	operation: (signal?: AbortSignal) => Promise<T>,
	timeoutMs: number,
	operationName: string,
): Promise<T> => {
	const controller = new AbortController();
	let timer: ReturnType<typeof setTimeout> | undefined;
	const expired = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			controller.abort();
			reject(new Error(`${operationName} timed out after ${timeoutMs}ms`));
		}, timeoutMs);
	});

	try {
		return await Promise.race([operation(controller.signal), expired]);
	} finally {
		clearTimeout(timer);
	}
};

export async function withRetry<T>(
	operation: (signal?: AbortSignal) => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const {
		maxRetries = 2,
		backoffs = [100, 200],
		operationName = "Operation",
		timeout,
		shouldRetry = () => true,
	} = options;

	let lastError: unknown;

	for (let attempt = 0; attempt <= maxRetries; attempt++) {
		try {
			return timeout
				? await attemptWithTimeout(operation, timeout, operationName)
				: await operation();
		} catch (error) {
			if (!shouldRetry(error)) throw error;
			lastError = error;
			if (attempt === maxRetries) break;

			logError(
				`${operationName} attempt ${attempt + 1}/${maxRetries + 1} failed`,
				error,
			);
			await sleep(backoffs[attempt] ?? backoffs[backoffs.length - 1] ?? 200);
		}
	}

	logError(`${operationName} failed after ${maxRetries} retries`, lastError);
	throw lastError;
}
