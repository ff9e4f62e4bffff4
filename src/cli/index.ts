#!/usr/bin/env node
/**
 * wire-query CLI Entry Point
 *
 * Usage:
 *   wire-query [options] <database.collection>
 *
 * @module cli
 */

import { WireProtocolError } from '../wire/errors.js'
import { parseArgs, printHelp, runQuery, validateOptions, type CLIOptions } from './query.js'

const useColors = process.env.NO_COLOR === undefined && (process.stderr.isTTY ?? false)

/**
 * Print an error message
 */
function printError(message: string): void {
  const label = useColors ? '\x1b[31merror:\x1b[0m' : 'error:'
  console.error(`${label} ${message}`)
}

/**
 * Parse and validate argv, or report why not and return null
 */
function readOptions(args: string[]): CLIOptions | null {
  try {
    const options = parseArgs(args)
    if (!options.help) {
      validateOptions(options)
    }
    return options
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Invalid options')
    console.error('Run wire-query --help for usage information.')
    return null
  }
}

async function main(): Promise<number> {
  const options = readOptions(process.argv.slice(2))
  if (!options) {
    return 1
  }
  if (options.help) {
    printHelp()
    return 0
  }

  try {
    await runQuery(options)
    return 0
  } catch (error) {
    if (error instanceof WireProtocolError) {
      printError(error.message)
      if (options.verbose && error.cause instanceof Error) {
        console.error(error.cause.stack)
      }
    } else {
      printError(error instanceof Error ? error.message : 'An unexpected error occurred')
    }
    return 1
  }
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    printError(error instanceof Error ? error.message : String(error))
    process.exitCode = 1
  }
)
