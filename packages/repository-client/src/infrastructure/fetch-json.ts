import { TransportError, describeError } from "./transport-error.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export const fetchJson = async (
  fetchFn: FetchLike,
  url: string,
  headers: Readonly<Record<string, string>>,
): Promise<unknown> => {
  let response: Response;
  try {
    response = await fetchFn(url, { method: "GET", headers: { ...headers } });
  } catch (error) {
    throw new TransportError(`request failed: ${describeError(error)}`, {
      url,
      status: null,
      cause: error,
    });
  }

  if (!response.ok) {
    // Release the connection; the error body is not part of the failure.
    await response.body?.cancel();
    throw new TransportError(`request failed with status ${response.status}`, {
      url,
      status: response.status,
    });
  }

  try {
    const body: unknown = await response.json();
    return body;
  } catch (error) {
    throw new TransportError(`response body is not valid JSON: ${describeError(error)}`, {
      url,
      status: response.status,
      cause: error,
    });
  }
};
