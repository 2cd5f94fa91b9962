export interface ClientAuth {
	authToken?: string | undefined;
	createRequest(method: "GET" | "POST" | "PUT" | "DELETE", body?: unknown, additional?: Partial<RequestInit>): RequestInit;
	/**
	 * Returns true for a 401 response after notifying the session owner.
	 * When absent, 401 responses are handled like any other error.
	 */
	checkUnauthorized?(response: Response): boolean;
}

export interface ClientCallbacks {
	onUnauthorized?: () => void;
}

/**
 * Creates a JSON request factory that sends cookies and, when present, a bearer token.
 */
export function createClientAuth(authToken?: string, callbacks?: ClientCallbacks): ClientAuth {
	return {
		authToken,
		createRequest(method, body, additional) {
			const headers: Record<string, string> = {};
			if (body !== undefined) {
				headers["Content-Type"] = "application/json";
			}
			if (authToken) {
				headers.Authorization = `Bearer ${authToken}`;
			}
			return {
				method,
				headers,
				body: body === undefined ? null : JSON.stringify(body),
				credentials: "include",
				...additional,
			};
		},
		checkUnauthorized(response) {
			if (response.status !== 401) {
				return false;
			}
			callbacks?.onUnauthorized?.();
			return true;
		},
	};
}

/**
 * Reads the `{ error }` body of a failed response, falling back to the given message.
 */
export async function readError(response: Response, fallback: string): Promise<string> {
	const body: unknown = await response.json().catch(() => undefined);
	if (body && typeof body === "object" && "error" in body && typeof body.error === "string" && body.error) {
		return body.error;
	}
	return fallback;
}
