import { loadConfig, type LogLevel } from '../../config.js'
import { createLogger } from '../../logger.js'
import type { Logger } from 'pino'
import { FileLedgerWriter } from './file-ledger-writer.js'
import { NodeFileProvider, type FileProvider } from './file-provider.js'

export { FileLedgerWriter, type FileLedgerWriterOptions } from './file-ledger-writer.js'
export {
  type FileProvider,
  type NodeFileProviderOptions,
  NodeFileProvider,
  InMemoryFileProvider
} from './file-provider.js'
export { FileDescriptorSink } from './fd-sink.js'

export interface CreateFileLedgerWriterOptions {
  /**
   * Path to the journal file
   */
  journalPath: string

  /**
   * Custom file provider. Defaults to NodeFileProvider.
   */
  fileProvider?: FileProvider

  /**
   * Overrides LEDGER_ATOMIC_WRITES for the default provider
   */
  atomicWrites?: boolean

  /**
   * Overrides LOG_LEVEL for the default logger
   */
  logLevel?: LogLevel

  logger?: Logger

  env?: Record<string, string | undefined>
}

/**
 * Create a FileLedgerWriter for a journal file.
 *
 * @example
 * ```typescript
 * const writer = createFileLedgerWriter({ journalPath: './main.beancount' })
 * await writer.writeLedger({ directives })
 * ```
 */
export function createFileLedgerWriter(options: CreateFileLedgerWriterOptions): FileLedgerWriter {
  const config = loadConfig(options.env)

  const fileProvider = options.fileProvider ?? new NodeFileProvider({
    atomicWrites: options.atomicWrites ?? config.LEDGER_ATOMIC_WRITES
  })

  const logger = options.logger ?? createLogger('ledger-writer', options.logLevel ?? config.LOG_LEVEL)

  return new FileLedgerWriter({
    journalPath: options.journalPath,
    fileProvider,
    logger
  })
}
