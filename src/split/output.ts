import type { FileHandle } from 'node:fs/promises'

import { open, readdir, stat } from 'node:fs/promises'
import path from 'node:path'

import type { Dataset, Metadata, Sample } from '../types.js'

import { MetadataContext } from '../corpus/metadata.js'
import { ParameterError } from '../utils/errors.js'

export interface OutputNaming {
  extension: string
  stem: string
}

/**
 * Files making up the corpus: the source itself, or the regular files of a
 * source folder sorted by name.
 */
export async function resolveSourceFiles(source: string): Promise<string[]> {
  const normalized = path.normalize(source)
  const stats = await stat(normalized)
  if (!stats.isDirectory()) return [normalized]

  const files = (await readdir(normalized, { withFileTypes: true }))
    .filter((dirent) => dirent.isFile())
    .map((dirent) => dirent.name)
    .sort()
    .map((name) => path.join(normalized, name))

  if (files.length === 0) {
    throw new ParameterError(`No input files found in ${source}.`)
  }

  return files
}

export function outputNaming(source: string, files: readonly string[], outputFilename?: string): OutputNaming {
  const sourceExtension = path.extname(files[0] ?? source)

  if (outputFilename) {
    const extension = path.extname(outputFilename)
    return extension
      ? { extension, stem: outputFilename.slice(0, -extension.length) }
      : { extension: sourceExtension, stem: outputFilename }
  }

  // a folder source keeps its whole name, a file source loses its extension
  const base = path.basename(path.resolve(source))
  const isFile = files.length === 1 && files[0] === path.normalize(source)
  return { extension: sourceExtension, stem: isFile ? path.basename(base, sourceExtension) : base }
}

export function outputPath(folder: string, naming: OutputNaming, dataset: Dataset, fold?: number): string {
  return path.join(folder, `${naming.stem}_${dataset}${fold ?? ''}${naming.extension}`)
}

/**
 * Refuses outputs that would overwrite one of the files being split, as when a
 * folder is split into itself a second time.
 */
export function checkOutputsAgainstSources(outputs: readonly string[], sources: readonly string[]): void {
  const resolved = new Set(sources.map((source) => path.resolve(source)))
  for (const output of outputs) {
    if (resolved.has(path.resolve(output))) {
      throw new ParameterError(`Output file ${output} is also a source file.`)
    }
  }
}

export function outputPaths(folder: string, naming: OutputNaming, datasets: readonly Dataset[], folds: number): string[] {
  const paths: string[] = []
  for (let fold = 1; fold <= folds; fold++) {
    for (const dataset of datasets) {
      paths.push(outputPath(folder, naming, dataset, folds > 1 ? fold : undefined))
    }
  }

  return paths
}

interface OutputFile {
  handle: FileHandle
  written: Metadata
}

/**
 * The open output files of one run, one set of datasets per fold. Each file
 * remembers which metadata lines it has received so that context lines are
 * only repeated when they change.
 */
export class SplitOutputs {
  readonly paths: string[] = []
  private readonly context = new MetadataContext()
  private readonly folds: Array<Partial<Record<Dataset, OutputFile>>> = []
  private readonly handles: FileHandle[] = []

  private constructor(private readonly omitMetadata: boolean) {}

  /**
   * Opens the files for `datasets` in every fold and passes them to `write`,
   * closing all of them afterwards whether or not `write` succeeds.
   */
  static async use<T>(
    options: { datasets: readonly Dataset[]; folder: string; folds: number; naming: OutputNaming; omitMetadata: boolean },
    write: (outputs: SplitOutputs) => Promise<T>,
  ): Promise<T> {
    const outputs = new SplitOutputs(options.omitMetadata)
    try {
      for (let fold = 1; fold <= options.folds; fold++) {
        const files: Partial<Record<Dataset, OutputFile>> = {}
        outputs.folds.push(files)

        for (const dataset of options.datasets) {
          const filePath = outputPath(options.folder, options.naming, dataset, options.folds > 1 ? fold : undefined)
          const handle = await open(filePath, 'w')
          outputs.handles.push(handle)
          outputs.paths.push(filePath)
          files[dataset] = { handle, written: new Map() }
        }
      }

      return await write(outputs)
    } finally {
      await outputs.close()
    }
  }

  /**
   * Appends a sample to the file of its dataset in each fold.
   */
  async write(sample: Sample, destinations: readonly Dataset[]): Promise<void> {
    if (sample.opensSection) this.context.update(sample.metadata)

    for (const [fold, dataset] of destinations.entries()) {
      const file = this.folds[fold]?.[dataset]
      if (!file) {
        throw new Error(`No ${dataset} output is open for fold ${fold + 1}.`)
      }

      let chunk = ''
      if (!this.omitMetadata) {
        for (const entry of this.context.changesSince(file.written)) chunk += `${entry.text}\n`
        file.written = this.context.snapshot()
      }

      chunk += sample.text
      await file.handle.write(chunk)
    }
  }

  private async close(): Promise<void> {
    await Promise.all(this.handles.map(async (handle) => handle.close()))
  }
}
