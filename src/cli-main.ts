import { formatError } from './errors.js'
import { runCli } from './run.js'

export type CliMainArgs = {
  argv: string[]
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  cwd: string
  exit: (code: number) => void
  setExitCode: (code: number) => void
}

export function handlePipeErrors(stream: NodeJS.WritableStream, exit: (code: number) => void) {
  stream.on('error', (error: unknown) => {
    const code = error instanceof Error && 'code' in error ? error.code : null
    if (code === 'EPIPE') {
      exit(0)
      return
    }
    throw error
  })
}

export async function runCliMain({
  argv,
  fetch,
  stdout,
  stderr,
  cwd,
  exit,
  setExitCode,
}: CliMainArgs): Promise<void> {
  handlePipeErrors(stdout, exit)
  handlePipeErrors(stderr, exit)

  const verbose = argv.includes('--verbose')

  try {
    await runCli(argv, { fetch, stdout, stderr, cwd })
  } catch (error: unknown) {
    if (verbose && error instanceof Error && typeof error.stack === 'string') {
      stderr.write(`\n${error.stack}\n`)
      const cause = error.cause
      if (cause instanceof Error && typeof cause.stack === 'string') {
        stderr.write(`Caused by: ${cause.stack}\n`)
      }
      setExitCode(1)
      return
    }

    stderr.write(`\nError: ${formatError(error)}\n`)
    setExitCode(1)
  }
}
