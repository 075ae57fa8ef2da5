import { describe, it, expect, vi, afterEach } from 'vitest'
import { runCheckCommand } from '../commands/check.js'
import { failedResult, okResult, readFixture, stubFetcher } from '../../scraper/__tests__/helpers.js'

const env = { P2000_BASE_URL: 'https://p2000.test' }

function captureConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  }
}

function printedJson(log: ReturnType<typeof captureConsole>['log']): unknown {
  expect(log).toHaveBeenCalledTimes(1)
  return JSON.parse(String(log.mock.calls[0][0]))
}

describe('runCheckCommand', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prints the published state of one poll', async () => {
    const output = captureConsole()
    const { fetcher, fetch } = stubFetcher()
    fetch.mockResolvedValue(okResult(readFixture('listing.html')))

    const exitCode = await runCheckCommand({ region: '/utrecht/', filters: ['Fire'] }, { fetcher, env })

    expect(exitCode).toBe(0)
    expect(fetch).toHaveBeenCalledWith('utrecht', { timeoutMs: 20_000, signal: expect.any(AbortSignal) })
    expect(printedJson(output.log)).toMatchObject({
      url: 'https://p2000.test/utrecht/',
      instanceName: '/utrecht/',
      regionPath: 'utrecht',
      state: 'P 1',
      icon: 'mdi:fire-truck',
      attributes: { serviceType: 'Fire', location: 'Zeist', matchesFilter: true },
      diagnostics: { lastUpdateStatus: 'OK', consecutiveErrors: 0 },
      available: true,
      error: null,
    })
  })

  it('exits 1 and prints the error when the poll fails', async () => {
    const output = captureConsole()
    const { fetcher, fetch } = stubFetcher()
    fetch.mockResolvedValue(failedResult({ kind: 'http_status', statusCode: 503 }))

    const exitCode = await runCheckCommand({ region: 'utrecht', name: 'Utrecht', filters: [] }, { fetcher, env })

    expect(exitCode).toBe(1)
    expect(printedJson(output.log)).toMatchObject({
      instanceName: 'Utrecht',
      state: null,
      available: false,
      diagnostics: { lastUpdateStatus: 'Error', lastSuccessfulUpdate: null, consecutiveErrors: 1 },
      error: 'fetch/http_status [503]: HTTP 503',
    })
  })

  it('exits 2 without a region', async () => {
    const output = captureConsole()
    const { fetcher, fetch } = stubFetcher()

    expect(await runCheckCommand({ region: '', filters: [] }, { fetcher, env })).toBe(2)
    expect(output.error).toHaveBeenCalledWith('Missing --region <path>')
    expect(fetch).not.toHaveBeenCalled()
  })

  it('exits 2 for an unknown service type', async () => {
    const output = captureConsole()
    const { fetcher, fetch } = stubFetcher()

    expect(await runCheckCommand({ region: 'utrecht', filters: ['Boats'] }, { fetcher, env })).toBe(2)
    expect(output.error).toHaveBeenCalledWith(
      expect.stringMatching(/^Invalid configuration in command line: serviceTypeFilters\.0: /)
    )
    expect(fetch).not.toHaveBeenCalled()
  })
})
