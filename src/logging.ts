const ANSI_DIM = '\u001b[2m'
const ANSI_RED = '\u001b[31m'
const ANSI_RESET = '\u001b[0m'

export function supportsColor(stream: NodeJS.WritableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true
}

export function writeLine(stream: NodeJS.WritableStream, message: string): void {
  stream.write(`${message}\n`)
}

export function writeVerbose(
  stream: NodeJS.WritableStream,
  verbose: boolean,
  message: string,
  color: boolean
): void {
  if (!verbose) return
  const line = `[verbose] ${message}`
  writeLine(stream, color ? `${ANSI_DIM}${line}${ANSI_RESET}` : line)
}

export function writeError(stream: NodeJS.WritableStream, message: string, color: boolean): void {
  writeLine(stream, color ? `${ANSI_RED}${message}${ANSI_RESET}` : message)
}
