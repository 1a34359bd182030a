import { mkdir } from 'node:fs/promises'
import ora from 'ora'

import type { CorpusIterator, CorpusIteratorFactory, SplitCorpusOptions, SplitSummary } from '../types.js'

import { ConllCorpusIterator } from '../corpus/conll-iterator.js'
import { DATASETS } from '../types.js'
import { ParameterError } from '../utils/errors.js'
import { assignFolds, assignStandard, computeSplitSizes, foldCount, validateProportions } from './assignment.js'
import { checkOutputsAgainstSources, outputNaming, outputPaths, resolveSourceFiles, SplitOutputs } from './output.js'
import { permutation } from './permutation.js'

export const DEFAULT_TEST_PROPORTION = 0.3
export const DEFAULT_DEV_PROPORTION = 0

const defaultIteratorFactory: CorpusIteratorFactory = (files) => new ConllCorpusIterator(files)

async function countSamples(corpus: CorpusIterator, quiet: boolean): Promise<number> {
  const spinner = ora({ isSilent: quiet, text: 'Counting samples...' }).start()
  try {
    const sampleCount = await corpus.getSampleCount()
    spinner.succeed(`${sampleCount} samples read.`)
    return sampleCount
  } catch (error) {
    spinner.fail(`Failed to count samples: ${String(error)}`)
    throw error
  }
}

/**
 * Splits a corpus file or folder into train, dev and test files, or into
 * cross-validation folds of them.
 *
 * The corpus is read twice: once to count its samples and once to write them.
 * Which split a sample lands in depends only on its position, the sample
 * count, the proportions and the seed, so repeated runs give identical files.
 * The seed defaults to the sample count.
 */
export async function splitCorpus(options: SplitCorpusOptions): Promise<SplitSummary> {
  const test = options.test ?? DEFAULT_TEST_PROPORTION
  const dev = options.dev ?? DEFAULT_DEV_PROPORTION
  const crossValidation = options.crossValidation ?? false
  const quiet = options.quiet ?? false

  validateProportions(test, dev)
  if (options.seed !== undefined && !Number.isSafeInteger(options.seed)) {
    throw new ParameterError(`The seed must be an integer, got ${options.seed}.`)
  }

  const folds = crossValidation ? foldCount(test) : 1

  const files = await resolveSourceFiles(options.source)
  const naming = outputNaming(options.source, files, options.outputFilename)
  const corpus = (options.iteratorFactory ?? defaultIteratorFactory)(files)

  const sampleCount = await countSamples(corpus, quiet)
  if (sampleCount === 0) {
    throw new ParameterError(`No samples found in ${options.source}.`)
  }

  const seed = options.seed ?? sampleCount
  const sizes = computeSplitSizes(sampleCount, test, dev)
  const order = permutation(sampleCount, seed)
  const tables = crossValidation ? assignFolds(order, sizes, folds) : [assignStandard(order, sizes)]
  const datasets = DATASETS.filter((dataset) => dataset !== 'dev' || sizes.dev > 0)
  checkOutputsAgainstSources(outputPaths(options.outputFolder, naming, datasets, folds), files)

  await mkdir(options.outputFolder, { recursive: true })

  const outputOptions = { datasets, folder: options.outputFolder, folds, naming, omitMetadata: options.omitMetadata ?? false }
  const written = await SplitOutputs.use(outputOptions, async (outputs) => {
    const spinner = ora({ isSilent: quiet, text: 'Writing splits...' }).start()
    try {
      let index = 0
      for await (const sample of corpus) {
        if (index >= sampleCount) {
          throw new Error(`The corpus yielded more than the ${sampleCount} samples counted; was it modified while splitting?`)
        }

        await outputs.write(sample, tables.map((table) => table[index]))
        index++
        spinner.text = `Writing splits... ${index}/${sampleCount}`
      }

      if (index !== sampleCount) {
        throw new Error(`The corpus yielded ${index} of the ${sampleCount} samples counted; was it modified while splitting?`)
      }

      spinner.succeed(`Wrote ${sampleCount} samples to ${outputs.paths.length} files.`)
      return outputs.paths
    } catch (error) {
      spinner.fail(`Failed to write splits: ${String(error)}`)
      throw error
    }
  })

  return { dev, files: written, folds, sampleCount, seed, sizes, test }
}
