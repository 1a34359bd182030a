import type { CommentAttribute, SampleRecognizer } from '../types.js'

export const SAMPLE_START_PATTERN = /^#\s?sent_id\s?=/
export const SAMPLE_END_PATTERN = /^\s*$/
export const COMMENT_PATTERN = /^#\s?(?<name>[^=]+?)(?:\s?=\s?(?<value>.+))?$/
export const IGNORED_METADATA_ATTRIBUTES = ['global.columns']

export interface PatternRecognizerOptions {
  /** Must capture the attribute in a `name` group and may capture a `value` group. */
  commentPattern?: RegExp
  ignoreMetadataAttributes?: Iterable<string>
  sampleEndPattern?: RegExp
  sampleStartPattern?: RegExp
}

// test() on a global or sticky regex advances lastIndex between calls
function stateless(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.replaceAll(/[gy]/g, ''))
}

export function patternRecognizer(options: PatternRecognizerOptions = {}): SampleRecognizer {
  const start = stateless(options.sampleStartPattern ?? SAMPLE_START_PATTERN)
  const end = stateless(options.sampleEndPattern ?? SAMPLE_END_PATTERN)
  const comment = stateless(options.commentPattern ?? COMMENT_PATTERN)
  const ignored = new Set(options.ignoreMetadataAttributes ?? IGNORED_METADATA_ATTRIBUTES)

  return {
    isSampleEnd: (line) => end.test(line),
    isSampleStart: (line) => start.test(line),
    parseComment(line): CommentAttribute | undefined {
      const match = comment.exec(line)
      const name = match?.groups?.name
      if (name === undefined || ignored.has(name)) return undefined

      return { name, value: match?.groups?.value ?? true }
    },
  }
}
