/**
 * Configuration errors
 *
 * Invalid configuration is the only condition that stops the poller. Everything
 * that goes wrong during a poll is recorded in coordinator state instead.
 */

import { ZodError } from 'zod'

export interface ConfigIssue {
  path: string
  message: string
}

export class ConfigError extends Error {
  readonly source: string
  readonly issues: ConfigIssue[]

  constructor(source: string, issues: ConfigIssue[]) {
    super(`Invalid configuration in ${source}: ${issues.map(formatIssue).join('; ')}`)
    this.name = 'ConfigError'
    this.source = source
    this.issues = issues
  }

  static fromZod(source: string, error: ZodError): ConfigError {
    return new ConfigError(
      source,
      error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    )
  }
}

function formatIssue(issue: ConfigIssue): string {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}
