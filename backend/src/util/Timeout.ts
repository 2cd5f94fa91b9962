export class TimeoutError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "TimeoutError";
	}
}

/**
 * Settles like `promise`, or rejects with a TimeoutError after `timeoutMs`.
 * The timer is always cleared.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message = "Operation timed out"): Promise<T> {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const expired = new Promise<never>((_resolve, reject) => {
		timer = setTimeout(() => reject(new TimeoutError(message)), timeoutMs);
	});
	return Promise.race([promise, expired]).finally(() => clearTimeout(timer));
}
