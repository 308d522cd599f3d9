import { writeSync } from 'node:fs'
import type { Sink } from '../../core/ports/sink.js'

/**
 * Writes each chunk synchronously to an already open file descriptor.
 * The caller owns the descriptor and closes it.
 */
export class FileDescriptorSink implements Sink {
  private bytes = 0

  constructor(private readonly fd: number) {}

  write(chunk: string): void {
    const buffer = Buffer.from(chunk, 'utf-8')
    let offset = 0
    while (offset < buffer.length) {
      offset += writeSync(this.fd, buffer, offset, buffer.length - offset)
    }
    this.bytes += buffer.length
  }

  get bytesWritten(): number {
    return this.bytes
  }
}
