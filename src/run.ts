import { resolve } from 'node:path'

import { CommanderError } from 'commander'

import { DEFAULT_API_BASE, createEpisodeApiClient } from './api/client.js'
import { loadLibraryConfig, parseApiBase } from './config.js'
import { collectEpisodes, summarizeLibrary } from './library/collect.js'
import type { Episode } from './library/types.js'
import { supportsColor, writeLine, writeVerbose } from './logging.js'
import { formatGenerationDate } from './render/format.js'
import { renderLibraryPage } from './render/page.js'
import { DEFAULT_OUTPUT_FILE, type ProgramOptions, buildProgram } from './run/help.js'
import { createConsoleProgress } from './run/progress.js'
import { writeLibraryPage } from './run/write-page.js'
import { formatVersionLine } from './version.js'

export type RunCliContext = {
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  cwd: string
  now?: () => Date
}

export type RunResult = {
  outputPath: string
  generatedAt: string
  episodes: Episode[]
}

/** Returns null when only help or the version was printed. */
export async function runCli(
  argv: string[],
  { fetch: fetchImpl, stdout, stderr, cwd, now = () => new Date() }: RunCliContext
): Promise<RunResult | null> {
  const program = buildProgram()
  program.configureOutput({
    writeOut(str) {
      stdout.write(str)
    },
    writeErr(str) {
      stderr.write(str)
    },
  })
  program.exitOverride()

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError && error.code === 'commander.helpDisplayed') {
      return null
    }
    throw error
  }

  const options = program.opts<ProgramOptions>()
  if (options.version) {
    writeLine(stdout, formatVersionLine())
    return null
  }

  const verbose = options.verbose === true
  const color = supportsColor(stderr)
  const { config, path: configPath } = loadLibraryConfig({ cwd, configPath: options.config })
  if (config && configPath) writeVerbose(stderr, verbose, `config ${configPath}`, color)

  const apiBase = options.apiBase
    ? parseApiBase(options.apiBase, '--api-base')
    : (config?.apiBase ?? DEFAULT_API_BASE)
  const outputPath = resolve(cwd, options.output ?? config?.output ?? DEFAULT_OUTPUT_FILE)
  const generatedAt = formatGenerationDate(now())

  const onProgress = createConsoleProgress({ stream: stderr, verbose, color })
  const client = createEpisodeApiClient({ fetchImpl, baseUrl: apiBase, onProgress })

  writeLine(stderr, 'Starting to collect episodes and extract links...')
  const episodes = await collectEpisodes({ client, onProgress })
  const summary = summarizeLibrary(episodes)

  writeVerbose(stderr, verbose, `rendering ${summary.episodeCount} episodes`, color)
  const html = renderLibraryPage(episodes, generatedAt, { siteTitle: config?.siteTitle })
  await writeLibraryPage(outputPath, html)

  writeLine(stdout, `Generated ${outputPath}`)
  writeLine(stdout, `  Episodes with links: ${summary.episodeCount}`)
  writeLine(stdout, `  Total links: ${summary.linkCount}`)
  writeLine(stdout, `  Podcasts: ${summary.podcastCount}`)
  writeLine(stdout, `  Generated on: ${generatedAt}`)

  return { outputPath, generatedAt, episodes }
}
