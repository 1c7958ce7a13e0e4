export type TimedResponse = {
  ok: boolean;
  status: number;
  body: string;
};

/**
 * Sends a request and reads its whole body under one deadline. The timer only
 * stops once the body is in, so a server that sends headers and then stalls
 * still times out.
 */
export async function fetchText(
  input: string | URL,
  init: RequestInit & { timeoutMs: number }
): Promise<TimedResponse> {
  const { timeoutMs, ...rest } = init;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(input, { ...rest, signal: controller.signal });
    const body = await res.text();
    return { ok: res.ok, status: res.status, body };
  } catch (e) {
    if (controller.signal.aborted) {
      throw new Error(`Request timed out after ${timeoutMs}ms`, { cause: e });
    }
    throw e;
  } finally {
    clearTimeout(timer);
  }
}

export function parseJsonBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}
