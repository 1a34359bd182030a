import type { Dataset, SplitSizes } from '../types.js'

import { ParameterError } from '../utils/errors.js'

function checkProportion(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value >= 1) {
    throw new ParameterError(`The ${name} proportion must be at least 0 and below 1, got ${value}.`)
  }
}

export function validateProportions(test: number, dev: number): void {
  checkProportion('test', test)
  checkProportion('dev', dev)

  if (test + dev >= 1) {
    throw new ParameterError(`Test and dev proportions must add up to less than 1, got ${test} + ${dev}.`)
  }
}

export function computeSplitSizes(sampleCount: number, test: number, dev: number): SplitSizes {
  const testSize = Math.round(test * sampleCount)
  const devSize = Math.round(dev * sampleCount)
  const trainSize = sampleCount - testSize - devSize

  if (testSize === 0) {
    throw new ParameterError(`A test proportion of ${test} leaves the test set empty for ${sampleCount} samples.`)
  }

  if (devSize < 0 || trainSize < 0) {
    throw new ParameterError(`Cannot split ${sampleCount} samples into ${testSize} test and ${devSize} dev samples.`)
  }

  return { dev: devSize, test: testSize, train: trainSize }
}

/**
 * Number of cross-validation folds implied by the test proportion.
 */
export function foldCount(test: number): number {
  const folds = Math.round(1 / test)
  if (!Number.isFinite(folds) || folds < 2) {
    throw new ParameterError(`A test proportion of ${test} gives fewer than 2 cross-validation folds.`)
  }

  return folds
}

/**
 * Maps every sample index to its dataset: the permutation is cut into
 * test, dev and train in that order.
 */
export function assignStandard(order: readonly number[], sizes: SplitSizes): Dataset[] {
  const table = new Array<Dataset>(order.length).fill('train')

  for (const [position, index] of order.entries()) {
    if (position < sizes.test) table[index] = 'test'
    else if (position < sizes.test + sizes.dev) table[index] = 'dev'
  }

  return table
}

/**
 * One table per fold. Test windows of `sizes.test` entries partition the
 * permutation left to right, the last one running to its end. Each dev
 * window sits just before its test window, wrapping around to the tail.
 */
export function assignFolds(order: readonly number[], sizes: SplitSizes, folds: number): Dataset[][] {
  const total = order.length

  if ((folds - 1) * sizes.test >= total) {
    throw new ParameterError(`Cannot build ${folds} folds of ${sizes.test} test samples from ${total} samples.`)
  }

  const tables: Dataset[][] = []
  for (let fold = 0; fold < folds; fold++) {
    const testStart = fold * sizes.test
    const testEnd = fold === folds - 1 ? total : testStart + sizes.test

    if (sizes.dev + testEnd - testStart > total) {
      throw new ParameterError(`Fold ${fold + 1} has no room for ${sizes.dev} dev samples.`)
    }

    const table = new Array<Dataset>(total).fill('train')
    for (let offset = sizes.dev; offset > 0; offset--) {
      table[order[(testStart - offset + total) % total]] = 'dev'
    }

    for (let position = testStart; position < testEnd; position++) {
      table[order[position]] = 'test'
    }

    tables.push(table)
  }

  return tables
}
