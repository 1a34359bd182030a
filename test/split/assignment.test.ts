import { expect } from 'chai'

import type { Dataset } from '../../src/types.js'

import {
  assignFolds,
  assignStandard,
  computeSplitSizes,
  foldCount,
  validateProportions,
} from '../../src/split/assignment.js'
import { ParameterError } from '../../src/utils/errors.js'

const identity = (size: number): number[] => Array.from({ length: size }, (_, index) => index)

function indexesOf(table: Dataset[], dataset: Dataset): number[] {
  return [...table.entries()].filter(([, value]) => value === dataset).map(([index]) => index)
}

describe('validateProportions', () => {
  it('accepts proportions that leave room for train', () => {
    expect(() => validateProportions(0.3, 0.1)).to.not.throw()
    expect(() => validateProportions(0.3, 0)).to.not.throw()
  })

  it('rejects proportions adding up to 1 or more', () => {
    expect(() => validateProportions(0.5, 0.5)).to.throw(
      ParameterError,
      'Test and dev proportions must add up to less than 1, got 0.5 + 0.5.',
    )
  })

  it('rejects proportions outside [0, 1)', () => {
    expect(() => validateProportions(-0.1, 0)).to.throw(ParameterError, 'The test proportion')
    expect(() => validateProportions(1, 0)).to.throw(ParameterError, 'The test proportion')
    expect(() => validateProportions(0.2, Number.NaN)).to.throw(ParameterError, 'The dev proportion')
  })
})

describe('computeSplitSizes', () => {
  it('rounds test and dev and gives train the rest', () => {
    expect(computeSplitSizes(10, 0.3, 0.1)).to.deep.equal({ dev: 1, test: 3, train: 6 })
    expect(computeSplitSizes(7, 0.5, 0.45)).to.deep.equal({ dev: 3, test: 4, train: 0 })
  })

  it('rejects an empty test set', () => {
    expect(() => computeSplitSizes(10, 0.04, 0)).to.throw(ParameterError, 'leaves the test set empty')
  })
})

describe('foldCount', () => {
  it('is the rounded inverse of the test proportion', () => {
    expect(foldCount(0.2)).to.equal(5)
    expect(foldCount(0.3)).to.equal(3)
  })

  it('needs at least two folds', () => {
    expect(() => foldCount(0.7)).to.throw(ParameterError)
    expect(() => foldCount(0)).to.throw(ParameterError)
  })
})

describe('assignStandard', () => {
  it('cuts the permutation into test, dev and train', () => {
    const table = assignStandard([3, 0, 4, 1, 2], { dev: 1, test: 2, train: 2 })

    expect(table).to.deep.equal(['test', 'train', 'train', 'test', 'dev'])
  })
})

describe('assignFolds', () => {
  it('slides the test window and wraps the first dev window to the tail', () => {
    const tables = assignFolds(identity(10), { dev: 1, test: 2, train: 7 }, 5)

    expect(tables).to.have.length(5)
    expect(tables[0]).to.deep.equal([
      'test', 'test', 'train', 'train', 'train', 'train', 'train', 'train', 'train', 'dev',
    ])
    expect(tables[1]).to.deep.equal([
      'train', 'dev', 'test', 'test', 'train', 'train', 'train', 'train', 'train', 'train',
    ])
  })

  it('tests every sample in exactly one fold', () => {
    const order = [7, 2, 9, 0, 4, 1, 8, 3, 6, 5]
    const tables = assignFolds(order, { dev: 1, test: 2, train: 7 }, 5)

    const tested = tables.flatMap((table) => indexesOf(table, 'test'))
    expect(tested.sort((a, b) => a - b)).to.deep.equal(identity(10))
  })

  it('gives the remainder to the last test window', () => {
    const tables = assignFolds(identity(11), { dev: 1, test: 2, train: 8 }, 5)

    expect(indexesOf(tables[4], 'test')).to.deep.equal([8, 9, 10])
    expect(indexesOf(tables[4], 'dev')).to.deep.equal([7])
  })

  it('rejects folds that would have no test samples', () => {
    expect(() => assignFolds([0, 1], { dev: 0, test: 1, train: 1 }, 3)).to.throw(
      ParameterError,
      'Cannot build 3 folds of 1 test samples from 2 samples.',
    )
  })

  it('rejects dev windows that would overlap the test window', () => {
    expect(() => assignFolds(identity(7), { dev: 5, test: 2, train: 0 }, 3)).to.throw(
      ParameterError,
      'Fold 3 has no room for 5 dev samples.',
    )
  })
})
