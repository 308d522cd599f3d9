/**
 * Destination for rendered ledger text. A sink reports failure by throwing.
 */
export interface Sink {
  write(chunk: string): void
}

/**
 * In-memory sink
 */
export class StringSink implements Sink {
  private readonly chunks: string[] = []

  write(chunk: string): void {
    this.chunks.push(chunk)
  }

  toString(): string {
    return this.chunks.join('')
  }
}
