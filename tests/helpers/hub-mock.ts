import { MockAgent } from 'undici'

export const HUB_ORIGIN = 'https://huggingface.co'

export interface ReplyOptions {
  /** Only requests carrying these headers match. */
  headers?: Record<string, string>
  /** Hold the whole reply back this long. */
  delayMs?: number
}

export interface HubMock {
  agent: MockAgent
  /** Every request URL the mock answered, in order. */
  requests: URL[]
  reply(pathname: string, statusCode: number, body: unknown, opts?: ReplyOptions): void
  /** Fail the next request to `pathname` at the socket level. */
  fail(pathname: string, error: Error): void
  close(): Promise<void>
}

/**
 * In-process stand-in for the Hub: an undici MockAgent with net connect disabled.
 */
export function createHubMock(origin = HUB_ORIGIN): HubMock {
  const agent = new MockAgent()
  agent.disableNetConnect()
  const pool = agent.get(origin)
  const requests: URL[] = []
  const matchPath = (pathname: string) => (p: string) => p.split('?')[0] === pathname

  return {
    agent,
    requests,
    reply(pathname, statusCode, body, opts = {}) {
      const scope = pool
        .intercept({
          path: matchPath(pathname),
          method: 'GET',
          ...(opts.headers ? { headers: opts.headers } : {})
        })
        .reply((req) => {
          requests.push(new URL(req.path, origin))
          return { statusCode, data: typeof body === 'string' ? body : JSON.stringify(body) }
        })
      if (opts.delayMs) scope.delay(opts.delayMs)
    },
    fail(pathname, error) {
      pool.intercept({ path: matchPath(pathname), method: 'GET' }).replyWithError(error)
    },
    close: () => agent.close()
  }
}
