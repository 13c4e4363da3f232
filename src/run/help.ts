import { Command } from 'commander'

import { DEFAULT_API_BASE } from '../api/client.js'
import { PROGRAM_NAME } from '../version.js'

export const DEFAULT_OUTPUT_FILE = 'index.html'

export type ProgramOptions = {
  output?: string
  apiBase?: string
  config?: string
  verbose?: boolean
  version?: boolean
}

export function buildProgram(): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description(
      'Fetch every podcast episode from the API, collect the links listed in the show notes and write a searchable static page.'
    )
    .option('-o, --output <path>', `Where to write the page (default: ${DEFAULT_OUTPUT_FILE})`)
    .option('--api-base <url>', `Episode API base URL (default: ${DEFAULT_API_BASE})`)
    .option('--config <path>', 'JSON5 config file (apiBase, output, siteTitle)')
    .option('--verbose', 'Print request URLs, per-episode link counts and error stacks')
    .option('-V, --version', 'Print the version and exit')
    .allowExcessArguments(false)
    .showHelpAfterError()
}
