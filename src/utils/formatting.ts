import type { RunRecord, SplitSummary } from '../types.js'

function quoteArgument(argument: string): string {
  return /^[\w./:@-]+$/.test(argument) ? argument : `'${argument.replaceAll("'", String.raw`'\''`)}'`
}

/**
 * Command line that recreates a recorded run, with its seed spelled out.
 */
export function formatReproduceCommand(run: RunRecord): string {
  const parts = [
    'conll-split',
    'split',
    quoteArgument(run.source),
    '-o',
    quoteArgument(run.outputFolder),
    '-t',
    String(run.test),
    '-d',
    String(run.dev),
    '-s',
    String(run.seed),
  ]

  if (run.outputFilename) parts.push('-f', quoteArgument(run.outputFilename))
  if (run.crossValidation) parts.push('--cross-validation')
  if (run.omitMetadata) parts.push('--omit-metadata')

  return parts.join(' ')
}

export function formatSummary(summary: SplitSummary): string[] {
  const { dev, test, train } = summary.sizes
  const lines = [
    `- Samples: ${summary.sampleCount}`,
    `- Seed: ${summary.seed}`,
    summary.folds > 1
      ? `- Folds: ${summary.folds} (test ${test} per fold, last fold takes the remainder; dev ${dev})`
      : `- Train / dev / test: ${train} / ${dev} / ${test}`,
    '- Files:',
  ]

  for (const file of summary.files) {
    lines.push(`  - ${file}`)
  }

  return lines
}
