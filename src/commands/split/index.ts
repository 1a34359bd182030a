import { Args, Command, Flags } from '@oclif/core'

import { splitCorpus } from '../../split/split-corpus.js'
import { recordRun } from '../../utils/config.js'
import { ParameterError } from '../../utils/errors.js'
import { formatSummary } from '../../utils/formatting.js'

const proportion = Flags.custom<number>({
  async parse(input) {
    const value = Number(input)
    if (input.trim() === '' || !Number.isFinite(value)) {
      throw new Error(`Expected a decimal proportion but received: ${input}`)
    }

    return value
  },
})

export default class Split extends Command {
  static args = {
    source: Args.string({ description: 'Path to the source file or folder', required: true }),
  }
  static description = 'Reproducibly split a CoNLL corpus into train, dev and test sets'
  static examples = [
    `<%= config.bin %> <%= command.id %> corpus.conllu -o splits -t 0.2 -d 0.1
Writes splits/corpus_train.conllu, splits/corpus_dev.conllu and splits/corpus_test.conllu
`,
    `<%= config.bin %> <%= command.id %> treebank/ --cross-validation -t 0.2 -s 7
Writes five folds, treebank_train1.conllu to treebank_test5.conllu, into the current directory
`,
  ]
  static flags = {
    'cross-validation': Flags.boolean({
      description: 'Create k-fold cross-validation sets, with k = 1 / test',
    }),
    dev: proportion({ char: 'd', default: 0, description: 'Dev set size, as a decimal proportion' }),
    'omit-metadata': Flags.boolean({
      default: false,
      description: 'Do not write document and/or paragraph metadata to output files',
    }),
    'output-filename': Flags.string({
      char: 'f',
      description: 'Filename for the output files (defaults to the name of the source)',
    }),
    'output-folder': Flags.string({
      char: 'o',
      description: 'Path to the output folder (defaults to the current directory)',
    }),
    quiet: Flags.boolean({ char: 'q', description: 'Do not show progress' }),
    seed: Flags.integer({ char: 's', description: 'Random seed (defaults to the number of samples)' }),
    test: proportion({ char: 't', default: 0.3, description: 'Test set size, as a decimal proportion' }),
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Split)
    const outputFolder = flags['output-folder'] ?? process.cwd()

    const summary = await splitCorpus({
      crossValidation: flags['cross-validation'],
      dev: flags.dev,
      omitMetadata: flags['omit-metadata'],
      outputFilename: flags['output-filename'],
      outputFolder,
      quiet: flags.quiet,
      seed: flags.seed,
      source: args.source,
      test: flags.test,
    }).catch((error: unknown) => {
      if (error instanceof ParameterError) this.error(error.message, { exit: 2 })
      throw error
    })

    recordRun({
      crossValidation: flags['cross-validation'],
      dev: summary.dev,
      files: summary.files,
      finishedAt: new Date().toISOString(),
      omitMetadata: flags['omit-metadata'],
      outputFilename: flags['output-filename'] ?? null,
      outputFolder,
      sampleCount: summary.sampleCount,
      seed: summary.seed,
      source: args.source,
      test: summary.test,
    })

    this.log('\nSplit Summary:')
    for (const line of formatSummary(summary)) this.log(line)
    this.log('\nSplit complete!')
  }
}
