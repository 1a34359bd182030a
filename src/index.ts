export { run } from '@oclif/core'

export { ConllCorpusIterator } from './corpus/conll-iterator.js'
export type { ConllCorpusIteratorOptions } from './corpus/conll-iterator.js'
export { MetadataContext } from './corpus/metadata.js'
export { COMMENT_PATTERN, patternRecognizer, SAMPLE_END_PATTERN, SAMPLE_START_PATTERN } from './corpus/recognizer.js'
export type { PatternRecognizerOptions } from './corpus/recognizer.js'
export { assignFolds, assignStandard, computeSplitSizes, foldCount, validateProportions } from './split/assignment.js'
export { outputNaming, outputPath, resolveSourceFiles } from './split/output.js'
export { createRandom, permutation, shuffle } from './split/permutation.js'
export { DEFAULT_DEV_PROPORTION, DEFAULT_TEST_PROPORTION, splitCorpus } from './split/split-corpus.js'
export type * from './types.js'
export { DATASETS } from './types.js'
export { ParameterError } from './utils/errors.js'
