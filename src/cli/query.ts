/**
 * CLI Query Module
 *
 * Argument parsing and execution for the `wire-query` command, which sends a
 * single OP_QUERY and prints the reply documents as relaxed extended JSON,
 * one per line.
 *
 * @module cli/query
 *
 * @example
 * ```typescript
 * import { parseArgs, validateOptions, runQuery } from './query.js'
 *
 * const options = parseArgs(process.argv.slice(2))
 * validateOptions(options)
 * await runQuery(options)
 * ```
 */

import { EJSON, type Document } from 'bson'
import { connectOnPort } from '../wire/connection.js'
import { query } from '../wire/operations.js'
import { QueryOption, type QueryOptionName } from '../wire/types.js'

// ============================================================================
// Types
// ============================================================================

/**
 * Command-line options for `wire-query`.
 */
export interface CLIOptions {
  /** Server host */
  host: string
  /** Server port (1-65535) */
  port: number
  /** Fully qualified collection name, e.g. `app.users` */
  collection?: string
  /** Selector as extended JSON */
  filter: string
  /** Field selector as extended JSON */
  projection?: string
  skip: number
  limit: number
  /** Query options such as SlaveOK */
  queryOptions: QueryOptionName[]
  verbose: boolean
  help: boolean
}

// ============================================================================
// Argument Parsing
// ============================================================================

const VALUE_FLAGS: Record<string, keyof CLIOptions> = {
  '--host': 'host',
  '-H': 'host',
  '--port': 'port',
  '-p': 'port',
  '--filter': 'filter',
  '-f': 'filter',
  '--projection': 'projection',
  '-P': 'projection',
  '--skip': 'skip',
  '-s': 'skip',
  '--limit': 'limit',
  '-n': 'limit',
  '--option': 'queryOptions',
  '-o': 'queryOptions',
}

function isQueryOptionName(value: string): value is QueryOptionName {
  return Object.prototype.hasOwnProperty.call(QueryOption, value)
}

function applyValue(options: CLIOptions, key: keyof CLIOptions, value: string): void {
  switch (key) {
    case 'host':
      options.host = value
      break
    case 'port':
      options.port = parseInt(value, 10)
      break
    case 'filter':
      options.filter = value
      break
    case 'projection':
      options.projection = value
      break
    case 'skip':
      options.skip = parseInt(value, 10)
      break
    case 'limit':
      options.limit = parseInt(value, 10)
      break
    case 'queryOptions':
      if (!isQueryOptionName(value)) {
        throw new Error(
          `Invalid query option "${value}". Expected one of: ${Object.keys(QueryOption).join(', ')}`
        )
      }
      options.queryOptions.push(value)
      break
    default:
      break
  }
}

/**
 * Parse command-line arguments into a CLIOptions object.
 *
 * Value flags accept both `--port 27018` and `--port=27018`. The first bare
 * argument is the collection; unknown flags are ignored.
 *
 * @throws {Error} for an unknown `--option` name
 */
export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    host: 'localhost',
    port: 27017,
    filter: '{}',
    skip: 0,
    limit: 0,
    queryOptions: [],
    verbose: false,
    help: false,
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]

    if (arg === '--help' || arg === '-h') {
      options.help = true
      continue
    }

    if (arg === '--verbose' || arg === '-v') {
      options.verbose = true
      continue
    }

    const eq = arg.indexOf('=')
    const flag = eq === -1 ? arg : arg.slice(0, eq)
    const key = VALUE_FLAGS[flag]
    if (key !== undefined) {
      const value = eq === -1 ? args[++i] : arg.slice(eq + 1)
      if (value !== undefined) {
        applyValue(options, key, value)
      }
      continue
    }

    if (!arg.startsWith('-') && options.collection === undefined) {
      options.collection = arg
      continue
    }

    // Unknown options are ignored
  }

  return options
}

// ============================================================================
// Option Validation
// ============================================================================

function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= -0x80000000 && value <= 0x7fffffff
}

/**
 * Validate CLI options and throw descriptive errors if invalid.
 *
 * @throws {Error} If any option is invalid
 */
export function validateOptions(options: CLIOptions): void {
  if (
    isNaN(options.port) ||
    !Number.isInteger(options.port) ||
    options.port < 1 ||
    options.port > 65535
  ) {
    throw new Error(`Invalid port: ${options.port}. Port must be an integer between 1 and 65535.`)
  }

  if (!options.host) {
    throw new Error('Invalid host: host cannot be empty')
  }

  if (!options.collection) {
    throw new Error('Missing collection: pass a fully qualified name such as app.users')
  }

  if (!options.collection.includes('.')) {
    throw new Error(`Invalid collection "${options.collection}": expected <database>.<collection>`)
  }

  if (!isInt32(options.skip) || options.skip < 0) {
    throw new Error(`Invalid skip: ${options.skip}. Must be a non-negative 32-bit integer.`)
  }

  if (!isInt32(options.limit)) {
    throw new Error(`Invalid limit: ${options.limit}. Must be a 32-bit integer.`)
  }

  parseDocument('filter', options.filter)
  if (options.projection !== undefined) {
    parseDocument('projection', options.projection)
  }
}

/**
 * Parse an extended JSON object.
 *
 * @throws {Error} if the text is not valid extended JSON or not an object
 */
export function parseDocument(name: string, text: string): Document {
  let value: unknown
  try {
    value = EJSON.parse(text)
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    throw new Error(`Invalid ${name}: ${reason}`)
  }
  if (!isDocument(value)) {
    throw new Error(`Invalid ${name}: expected a JSON object`)
  }
  return value
}

function isDocument(value: unknown): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// ============================================================================
// Execution
// ============================================================================

/**
 * Connect, run one query, print each document, and disconnect.
 *
 * @returns the number of documents printed
 */
export async function runQuery(
  options: CLIOptions,
  print: (line: string) => void = console.log
): Promise<number> {
  const collection = options.collection
  if (!collection) {
    throw new Error('Missing collection: pass a fully qualified name such as app.users')
  }

  const selector = parseDocument('filter', options.filter)
  const fieldSelector =
    options.projection !== undefined ? parseDocument('projection', options.projection) : undefined

  const conn = await connectOnPort(options.host, options.port, { verbose: options.verbose })
  try {
    const documents = await query(
      conn,
      collection,
      options.queryOptions,
      options.skip,
      options.limit,
      selector,
      fieldSelector
    )
    for (const document of documents) {
      print(EJSON.stringify(document, { relaxed: true }))
    }
    return documents.length
  } finally {
    await conn.close()
  }
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Print usage help message to stdout.
 */
export function printHelp(): void {
  console.log(`
Usage: wire-query [options] <database.collection>

Send a single OP_QUERY and print the returned documents as extended JSON.

Options:
  -H, --host <host>         Server host (default: localhost)
  -p, --port <port>         Server port (default: 27017)
  -f, --filter <json>       Selector as extended JSON (default: {})
  -P, --projection <json>   Field selector as extended JSON
  -s, --skip <n>            Number of documents to skip (default: 0)
  -n, --limit <n>           Number of documents to return (default: 0, server decides)
  -o, --option <name>       Query option: ${Object.keys(QueryOption).join(', ')} (repeatable)
  -v, --verbose             Log every message sent and received
  -h, --help                Show this help message

Examples:
  wire-query app.users
  wire-query -f '{"age": {"$gt": 30}}' -n 5 app.users
  wire-query --host db.internal --option SlaveOK app.events
`)
}
