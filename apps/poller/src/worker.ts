#!/usr/bin/env node

/**
 * Poller Worker
 * Polls every configured region until SIGINT/SIGTERM.
 */

// Load environment variables first, before any other imports
import './env.js'

import { isConfigError } from './config/errors.js'
import { loggers } from './config/logger.js'
import { loadSettings } from './config/settings.js'
import type { PollerSettings } from './config/settings.js'
import { runUntilSignal } from './runtime.js'

const log = loggers.worker

function loadOrExit(): PollerSettings {
  try {
    return loadSettings()
  } catch (error) {
    if (isConfigError(error)) {
      log.fatal('CONFIG_INVALID', { source: error.source, issues: error.issues }, error)
      process.exit(1)
    }
    throw error
  }
}

runUntilSignal(loadOrExit(), log)
