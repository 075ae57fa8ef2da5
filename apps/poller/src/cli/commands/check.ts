import { isConfigError } from '../../config/errors.js'
import { loggers } from '../../config/logger.js'
import { parseEnvironment, parseRegionConfig } from '../../config/settings.js'
import type { EnvironmentSettings, RegionConfig } from '../../config/settings.js'
import { RegionCoordinator } from '../../scraper/coordinator.js'
import { describePollError } from '../../scraper/errors.js'
import { HttpFetcher } from '../../scraper/fetch/http-fetcher.js'
import { toPublishedState } from '../../scraper/publish.js'
import type { Fetcher } from '../../scraper/types.js'
import { buildRegionUrl } from '../../scraper/utils/url.js'

export interface CheckCommandArgs {
  region: string
  name?: string
  filters: string[]
}

export interface CheckCommandDeps {
  fetcher?: Fetcher
  env?: NodeJS.ProcessEnv
}

/**
 * One fetch + parse + select for a region path, printed as published state.
 * Exit codes: 0 poll ok, 1 poll failed, 2 bad arguments or environment.
 */
export async function runCheckCommand(args: CheckCommandArgs, deps: CheckCommandDeps = {}): Promise<number> {
  if (!args.region) {
    console.error('Missing --region <path>')
    return 2
  }

  let environment: EnvironmentSettings
  let region: RegionConfig
  try {
    environment = parseEnvironment(deps.env ?? process.env)
    region = parseRegionConfig(
      {
        regionPath: args.region,
        instanceName: args.name || args.region,
        serviceTypeFilters: args.filters,
      },
      'command line'
    )
  } catch (error) {
    if (isConfigError(error)) {
      console.error(error.message)
      return 2
    }
    throw error
  }

  const fetcher =
    deps.fetcher ?? new HttpFetcher({ baseUrl: environment.baseUrl, timeoutMs: environment.fetchTimeoutMs })
  const coordinator = new RegionCoordinator({
    region,
    fetcher,
    fetchTimeoutMs: environment.fetchTimeoutMs,
    logger: loggers.cli,
  })

  const state = await coordinator.poll()

  const output = {
    url: buildRegionUrl(environment.baseUrl, region.regionPath),
    ...toPublishedState(region, state),
    error: state.lastError ? describePollError(state.lastError) : null,
  }
  console.log(JSON.stringify(output, null, 2))

  return state.lastUpdateStatus === 'ok' ? 0 : 1
}
