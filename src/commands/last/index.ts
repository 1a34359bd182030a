import { Command } from '@oclif/core'

import { getConfigPath, getLastRun } from '../../utils/config.js'
import { formatReproduceCommand } from '../../utils/formatting.js'

export default class Last extends Command {
  static description = 'Show the last recorded split and the command that reproduces it'
  static examples = [
    `<%= config.bin %> <%= command.id %>
Prints the parameters and seed of the previous split
`,
  ]

  async run(): Promise<void> {
    await this.parse(Last)
    const run = getLastRun()

    if (!run) {
      this.log('No split has been recorded yet.')
      this.log(`Runs are recorded in ${getConfigPath()}`)
      return
    }

    this.log(`Last split (${new Date(run.finishedAt).toLocaleString()}):`)
    this.log(`- Source: ${run.source}`)
    this.log(`- Samples: ${run.sampleCount}`)
    this.log(`- Seed: ${run.seed}`)
    this.log(`- Output files: ${run.files.length} in ${run.outputFolder}`)
    this.log('\nReproduce with:')
    this.log(formatReproduceCommand(run))
  }
}
