export type Dataset = 'dev' | 'test' | 'train'

export const DATASETS: readonly Dataset[] = ['train', 'dev', 'test']

export interface MetadataValue {
  lineNo: number
  text: string
  value: string | true
}

export type Metadata = Map<string, MetadataValue>

export interface Sample {
  metadata: Metadata
  opensSection: boolean
  text: string
}

/**
 * A corpus that can report its size and be traversed any number of times,
 * yielding the same samples in the same order on every traversal.
 */
export interface CorpusIterator extends AsyncIterable<Sample> {
  getSampleCount(): Promise<number>
}

export type CorpusIteratorFactory = (files: string[]) => CorpusIterator

export interface CommentAttribute {
  name: string
  value: string | true
}

export interface SampleRecognizer {
  isSampleEnd(line: string): boolean
  isSampleStart(line: string): boolean
  parseComment(line: string): CommentAttribute | undefined
}

export interface SplitSizes {
  dev: number
  test: number
  train: number
}

export interface SplitCorpusOptions {
  crossValidation?: boolean
  dev?: number
  iteratorFactory?: CorpusIteratorFactory
  omitMetadata?: boolean
  outputFilename?: string
  outputFolder: string
  quiet?: boolean
  seed?: number
  source: string
  test?: number
}

export interface SplitSummary {
  dev: number
  files: string[]
  folds: number
  sampleCount: number
  seed: number
  sizes: SplitSizes
  test: number
}

export interface RunRecord {
  crossValidation: boolean
  dev: number
  files: string[]
  finishedAt: string
  omitMetadata: boolean
  outputFilename: null | string
  outputFolder: string
  sampleCount: number
  seed: number
  source: string
  test: number
}
