// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it, vi } from 'vitest'
import { RequestTimeoutError, fetchTextWithTimeout } from './http'

describe('fetchTextWithTimeout', () => {
  it('returns status and body text', async () => {
    const fetchImpl = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) => new Response('hello', { status: 201 }))
    const result = await fetchTextWithTimeout(fetchImpl, '/x', { method: 'GET' }, 1000)
    expect(result).toEqual({ status: 201, ok: true, text: 'hello' })
  })

  it('passes an abort signal to fetch', async () => {
    const fetchImpl = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) => new Response('{}'))
    await fetchTextWithTimeout(fetchImpl, '/x', { method: 'GET' }, 1000)
    expect(fetchImpl.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal)
  })

  it('rejects with RequestTimeoutError when fetch never settles', async () => {
    const fetchImpl = vi.fn((_input: RequestInfo | URL, _init?: RequestInit) => new Promise<Response>(() => undefined))
    await expect(fetchTextWithTimeout(fetchImpl, '/x', { method: 'GET' }, 20)).rejects.toBeInstanceOf(RequestTimeoutError)
  })

  it('aborts the request on timeout', async () => {
    let signal: AbortSignal | null | undefined
    const fetchImpl = vi.fn((_input: RequestInfo | URL, init?: RequestInit) => {
      signal = init?.signal
      return new Promise<Response>(() => undefined)
    })
    await expect(fetchTextWithTimeout(fetchImpl, '/x', {}, 20)).rejects.toThrow('Request timed out after 20ms')
    expect(signal?.aborted).toBe(true)
  })
})
