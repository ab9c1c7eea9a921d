/**
 * JSON webhook helper used by action callbacks.
 */

const DEFAULT_TIMEOUT_MS = 5000

export interface PostJsonOptions {
  timeoutMs?: number
}

/**
 * POST a JSON body. Throws on network failure, timeout or a non-2xx
 * status; the EventLoop logs the failure against the firing.
 */
export async function postJson(
  url: string,
  payload: unknown,
  options: PostJsonOptions = {},
): Promise<void> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(payload),
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
  })

  if (!response.ok) {
    throw new Error(`POST ${url} returned HTTP ${response.status}`)
  }
}
