import type { Logger } from 'pino'
import type { Directive, Ledger } from '../../core/domain/directive.js'
import { RenderIoError } from '../../core/errors/render-error.js'
import { LedgerRenderer } from '../../core/renderer/ledger-renderer.js'
import type { FileProvider } from './file-provider.js'

export interface FileLedgerWriterOptions {
  /**
   * Path to the journal file
   */
  journalPath: string

  fileProvider: FileProvider

  logger: Logger

  renderer?: LedgerRenderer
}

/**
 * Renders ledgers in memory, then stores the text in a journal file.
 * The file is not touched when rendering fails.
 */
export class FileLedgerWriter {
  private readonly journalPath: string
  private readonly fileProvider: FileProvider
  private readonly logger: Logger
  private readonly renderer: LedgerRenderer

  constructor(options: FileLedgerWriterOptions) {
    this.journalPath = options.journalPath
    this.fileProvider = options.fileProvider
    this.logger = options.logger
    this.renderer = options.renderer ?? new LedgerRenderer()
  }

  /**
   * Replace the journal with the rendered ledger.
   * @returns The text written
   */
  async writeLedger(ledger: Ledger): Promise<string> {
    const content = this.renderOrLog(
      () => this.renderer.renderToString(ledger),
      ledger.directives.length
    )
    await this.store(content, ledger.directives.length)
    return content
  }

  /**
   * Append rendered directives after the journal's existing content.
   * @returns The full journal text after the append
   */
  async appendDirectives(directives: readonly Directive[]): Promise<string> {
    const existing = await this.read()
    const content = this.renderOrLog(
      () => this.renderer.appendToLedger(existing, directives),
      directives.length
    )
    await this.store(content, directives.length)
    return content
  }

  private renderOrLog(render: () => string, count: number): string {
    try {
      return render()
    } catch (err) {
      this.logger.error({ err, path: this.journalPath, directives: count }, 'Failed to render ledger')
      throw err
    }
  }

  private async read(): Promise<string> {
    try {
      return await this.fileProvider.read(this.journalPath)
    } catch (err) {
      this.logger.error({ err, path: this.journalPath }, 'Failed to read journal')
      throw new RenderIoError(err, 'read journal')
    }
  }

  private async store(content: string, count: number): Promise<void> {
    try {
      await this.fileProvider.write(this.journalPath, content)
    } catch (err) {
      this.logger.error({ err, path: this.journalPath }, 'Failed to write journal')
      throw new RenderIoError(err, 'write journal')
    }
    this.logger.debug(
      { path: this.journalPath, directives: count, bytes: Buffer.byteLength(content, 'utf-8') },
      'Wrote journal'
    )
  }
}
