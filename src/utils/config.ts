import Conf from 'conf'

import type { RunRecord } from '../types.js'

interface ConfigSchema {
  lastRun: null | RunRecord
}

function openConfig(): Conf<ConfigSchema> {
  return new Conf<ConfigSchema>({
    // CONLL_SPLIT_CONFIG_DIR moves the store out of the user's config directory
    cwd: process.env.CONLL_SPLIT_CONFIG_DIR || undefined,
    projectName: 'conll-split',
    schema: {
      lastRun: {
        default: null,
        type: ['object', 'null'],
      },
    },
  })
}

export function recordRun(run: RunRecord): void {
  openConfig().set('lastRun', run)
}

export function getLastRun(): null | RunRecord {
  return openConfig().get('lastRun')
}

export function getConfigPath(): string {
  return openConfig().path
}
