import { mkdtemp } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

export interface CorpusOptions {
  /** Start a new document (with one paragraph) every `docSize` samples. */
  docSize?: number
  first?: number
}

/**
 * CoNLL-U text with `count` one-token samples. With `docSize`, sample ids are
 * `d{doc}-s{n}`, otherwise `s{n}`.
 */
export function buildCorpus(count: number, options: CorpusOptions = {}): string {
  const first = options.first ?? 1
  const lines: string[] = []

  for (let n = first; n < first + count; n++) {
    let id = `s${n}`
    if (options.docSize) {
      const doc = Math.floor((n - first) / options.docSize) + 1
      if ((n - first) % options.docSize === 0) {
        lines.push(`# newdoc id = d${doc}`, `# newpar id = d${doc}-p1`)
      }

      id = `d${doc}-s${n}`
    }

    lines.push(`# sent_id = ${id}`, `# text = w${n}`, `1\tw${n}\tw${n}\tX\t_\t_\t0\troot\t_\t_`, '')
  }

  return lines.join('\n')
}

export function sentIds(text: string): string[] {
  return text
    .split('\n')
    .filter((line) => line.startsWith('# sent_id = '))
    .map((line) => line.slice('# sent_id = '.length))
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'conll-split-'))
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = []
  for await (const item of iterable) items.push(item)
  return items
}

/**
 * Resolves with the error `promise` rejects with, and fails if it resolves.
 */
export async function rejection(promise: Promise<unknown>): Promise<Error> {
  try {
    await promise
  } catch (error) {
    if (error instanceof Error) return error
    throw new Error(`Rejected with a non-error: ${String(error)}`)
  }

  throw new Error('Expected the promise to reject')
}
