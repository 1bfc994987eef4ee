// SPDX-License-Identifier: Apache-2.0
export class RequestTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`)
    this.name = 'RequestTimeoutError'
  }
}

export type TextResponse = {
  status: number
  ok: boolean
  text: string
}

// Aborts the request and rejects once timeoutMs elapses, even when the
// underlying fetch ignores the abort signal.
export async function fetchTextWithTimeout(
  fetchImpl: typeof fetch,
  input: string,
  init: RequestInit,
  timeoutMs: number
): Promise<TextResponse> {
  const controller = new AbortController()
  let timeoutId: ReturnType<typeof setTimeout> | undefined
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort()
      reject(new RequestTimeoutError(timeoutMs))
    }, timeoutMs)
  })
  const exchange = (async (): Promise<TextResponse> => {
    const response = await fetchImpl(input, { ...init, signal: controller.signal })
    const text = await response.text()
    return { status: response.status, ok: response.ok, text }
  })()
  try {
    return await Promise.race([exchange, timeoutPromise])
  } finally {
    clearTimeout(timeoutId)
  }
}
