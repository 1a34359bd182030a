import { open } from 'node:fs/promises'

import type { CorpusIterator, Metadata, Sample, SampleRecognizer } from '../types.js'

import { patternRecognizer } from './recognizer.js'

export interface ConllCorpusIteratorOptions {
  /** Add an empty separator line after every sample (default true). */
  appendNewline?: boolean
  recognizer?: SampleRecognizer
}

/**
 * Streams the samples of a CoNLL corpus spread over one or more files,
 * read in the order given. Every traversal reopens the files, so the
 * iterator can be consumed repeatedly.
 */
export class ConllCorpusIterator implements CorpusIterator {
  readonly files: readonly string[]
  private readonly appendNewline: boolean
  private readonly recognizer: SampleRecognizer
  private sampleCount: number | undefined

  constructor(files: readonly string[], options: ConllCorpusIteratorOptions = {}) {
    this.files = [...files]
    this.appendNewline = options.appendNewline ?? true
    this.recognizer = options.recognizer ?? patternRecognizer()
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Sample> {
    let lineNo = -1

    for (const file of this.files) {
      let body: string[] | undefined
      let metadata: Metadata = new Map()

      for await (const line of readLines(file)) {
        lineNo++

        if (this.recognizer.isSampleStart(line)) {
          if (body) {
            yield this.toSample(body, metadata)
            metadata = new Map()
          }

          body = [line]
          continue
        }

        if (body) {
          if (this.recognizer.isSampleEnd(line)) {
            yield this.toSample(body, metadata)
            body = undefined
            metadata = new Map()
          } else {
            body.push(line)
          }

          continue
        }

        const comment = this.recognizer.parseComment(line)
        if (comment) {
          metadata.set(comment.name, { lineNo, text: line, value: comment.value })
        }
      }

      // unterminated last sample
      if (body) yield this.toSample(body, metadata)
    }
  }

  async getSampleCount(): Promise<number> {
    if (this.sampleCount === undefined) {
      this.sampleCount = await this.countSamples()
    }

    return this.sampleCount
  }

  private async countSamples(): Promise<number> {
    let count = 0
    for (const file of this.files) {
      for await (const line of readLines(file)) {
        if (this.recognizer.isSampleStart(line)) count++
      }
    }

    return count
  }

  private toSample(body: string[], metadata: Metadata): Sample {
    const separator = this.appendNewline ? '\n' : ''
    return {
      metadata,
      opensSection: metadata.size > 0,
      text: `${body.join('\n')}\n${separator}`,
    }
  }
}

async function* readLines(file: string): AsyncGenerator<string> {
  const handle = await open(file, 'r')
  try {
    yield* handle.readLines({ autoClose: false, encoding: 'utf8' })
  } finally {
    await handle.close()
  }
}
