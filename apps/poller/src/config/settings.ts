/**
 * Poller settings
 *
 * Two sources:
 * - environment (base URL, fetch timeout, regions file, alert threshold)
 * - a JSON regions file listing one entry per monitored region
 *
 * Both are validated with zod; any problem surfaces as a ConfigError.
 */

import { readFileSync } from 'fs'
import { resolve } from 'path'
import { z } from 'zod'
import { ConfigError } from './errors.js'
import { MESSAGE_FIELDS, SERVICE_TYPE_PRIORITY } from '../scraper/types.js'
import type { MessageField } from '../scraper/types.js'
import { normalizeRegionPath } from '../scraper/utils/url.js'

export const DEFAULT_BASE_URL = 'https://www.alarmfase1.nl/'
export const DEFAULT_FETCH_TIMEOUT_MS = 20_000
export const DEFAULT_SCAN_INTERVAL_SECONDS = 120
export const MIN_SCAN_INTERVAL_SECONDS = 30
export const DEFAULT_ERROR_ALERT_THRESHOLD = 5
export const DEFAULT_REGIONS_FILE = 'regions.json'

export const DEFAULT_ENABLED_SENSORS: readonly MessageField[] = [
  'priorityCode',
  'description',
  'timestamp',
  'location',
  'street',
  'serviceType',
  'latitude',
  'longitude',
]

export const regionConfigSchema = z.object({
  regionPath: z
    .string()
    .transform(normalizeRegionPath)
    .pipe(z.string().min(1, 'Region path must not be empty')),
  instanceName: z.string().trim().min(1, 'Instance name must not be empty'),
  scanIntervalSeconds: z
    .number()
    .int()
    .min(MIN_SCAN_INTERVAL_SECONDS, `Scan interval must be at least ${MIN_SCAN_INTERVAL_SECONDS} seconds`)
    .default(DEFAULT_SCAN_INTERVAL_SECONDS),
  enabledSensors: z.array(z.enum(MESSAGE_FIELDS)).default([...DEFAULT_ENABLED_SENSORS]),
  serviceTypeFilters: z.array(z.enum(SERVICE_TYPE_PRIORITY)).default([]),
})

export type RegionConfig = z.infer<typeof regionConfigSchema>

export type RegionConfigInput = z.input<typeof regionConfigSchema>

export const regionsFileSchema = z
  .array(regionConfigSchema)
  .min(1, 'At least one region must be configured')
  .superRefine((regions, ctx) => {
    const seen = new Set<string>()
    regions.forEach((region, index) => {
      if (seen.has(region.regionPath)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'regionPath'],
          message: `Region path "${region.regionPath}" is configured more than once`,
        })
      }
      seen.add(region.regionPath)
    })
  })

const environmentSchema = z.object({
  P2000_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  P2000_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
  P2000_REGIONS_FILE: z.string().min(1).default(DEFAULT_REGIONS_FILE),
  P2000_ERROR_ALERT_THRESHOLD: z.coerce.number().int().positive().default(DEFAULT_ERROR_ALERT_THRESHOLD),
})

export interface EnvironmentSettings {
  baseUrl: string
  fetchTimeoutMs: number
  regionsFile: string
  errorAlertThreshold: number
}

export interface PollerSettings extends EnvironmentSettings {
  regions: RegionConfig[]
}

export function parseEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentSettings {
  const result = environmentSchema.safeParse(env)
  if (!result.success) {
    throw ConfigError.fromZod('environment', result.error)
  }

  return {
    baseUrl: result.data.P2000_BASE_URL,
    fetchTimeoutMs: result.data.P2000_FETCH_TIMEOUT_MS,
    regionsFile: result.data.P2000_REGIONS_FILE,
    errorAlertThreshold: result.data.P2000_ERROR_ALERT_THRESHOLD,
  }
}

export function parseRegionConfig(input: unknown, source = 'region'): RegionConfig {
  const result = regionConfigSchema.safeParse(input)
  if (!result.success) {
    throw ConfigError.fromZod(source, result.error)
  }
  return result.data
}

export function parseRegions(input: unknown, source = 'regions'): RegionConfig[] {
  const result = regionsFileSchema.safeParse(input)
  if (!result.success) {
    throw ConfigError.fromZod(source, result.error)
  }
  return result.data
}

export function readRegionsFile(path: string): RegionConfig[] {
  const absolutePath = resolve(process.cwd(), path)

  let raw: string
  try {
    raw = readFileSync(absolutePath, 'utf8')
  } catch (error) {
    throw new ConfigError(absolutePath, [
      { path: '', message: `Cannot read regions file: ${error instanceof Error ? error.message : String(error)}` },
    ])
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new ConfigError(absolutePath, [
      { path: '', message: `Regions file is not valid JSON: ${error instanceof Error ? error.message : String(error)}` },
    ])
  }

  return parseRegions(parsed, absolutePath)
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): PollerSettings {
  const environment = parseEnvironment(env)
  return {
    ...environment,
    regions: readRegionsFile(environment.regionsFile),
  }
}
