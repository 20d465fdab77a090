import { describe, it, expect, vi } from 'vitest'
import { TokenAcquirer, extractWebToken } from '../tokens/token-acquirer.js'
import type { FetchResult } from '../types.js'
import { makeStore } from '../../__tests__/memory-repository.js'

function setup(result: FetchResult | Error) {
  const request =
    result instanceof Error ? vi.fn().mockRejectedValue(result) : vi.fn().mockResolvedValue(result)
  const pause = vi.fn().mockResolvedValue(undefined)
  const acquirer = new TokenAcquirer({ fetcher: { request }, politeness: { pause } })
  return { acquirer, request, pause }
}

describe('extractWebToken', () => {
  it('reads double or single quoted assignments', () => {
    expect(extractWebToken('<script>var web_token = "a1b2c3";</script>')).toBe('a1b2c3')
    expect(extractWebToken("var  web_token='DEADbeef'")).toBe('DEADbeef')
  })

  it('returns the first assignment', () => {
    expect(extractWebToken('var web_token = "aaa"; var web_token = "bbb";')).toBe('aaa')
  })

  it('returns null for missing or non-hex tokens', () => {
    expect(extractWebToken('<html></html>')).toBeNull()
    expect(extractWebToken('var web_token = "xyz";')).toBeNull()
  })
})

describe('TokenAcquirer', () => {
  it('fetches the homepage and returns the token', async () => {
    const { acquirer, request, pause } = setup({
      status: 'ok',
      body: '<script>var web_token = "a1b2c3";</script>',
      durationMs: 1,
    })

    const token = await acquirer.acquire(makeStore({ baseUrl: 'https://shop.test' }))

    expect(token).toBe('a1b2c3')
    expect(request).toHaveBeenCalledWith('https://shop.test')
    expect(pause).toHaveBeenCalledTimes(1)
  })

  it('returns null when the page has no token', async () => {
    const { acquirer, pause } = setup({ status: 'ok', body: '<html></html>', durationMs: 1 })
    expect(await acquirer.acquire(makeStore())).toBeNull()
    expect(pause).toHaveBeenCalledTimes(1)
  })

  it('returns null when the fetch fails', async () => {
    const { acquirer, pause } = setup({ status: 'error', statusCode: 502, error: 'HTTP 502: Bad Gateway', durationMs: 1 })
    expect(await acquirer.acquire(makeStore())).toBeNull()
    expect(pause).toHaveBeenCalledTimes(1)
  })

  it('returns null when the fetcher throws', async () => {
    const { acquirer, pause } = setup(new Error('socket hang up'))
    expect(await acquirer.acquire(makeStore())).toBeNull()
    expect(pause).toHaveBeenCalledTimes(1)
  })
})
