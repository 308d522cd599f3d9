/**
 * Abstract file system provider for journal output.
 * Implement this interface for other storage (browser, object store, etc.)
 */
export interface FileProvider {
  /**
   * Read file contents as string
   * @returns File contents, or empty string if file doesn't exist
   */
  read(path: string): Promise<string>

  /**
   * Replace the file with the given contents
   */
  write(path: string, content: string): Promise<void>
}

export interface NodeFileProviderOptions {
  /**
   * Write to `<path>.tmp` and rename into place. Defaults to true.
   */
  atomicWrites?: boolean
}

/**
 * Node.js file system provider
 */
export class NodeFileProvider implements FileProvider {
  private readonly atomicWrites: boolean
  private fs: typeof import('node:fs/promises') | null = null

  constructor(options: NodeFileProviderOptions = {}) {
    this.atomicWrites = options.atomicWrites ?? true
  }

  private async getFs(): Promise<typeof import('node:fs/promises')> {
    if (!this.fs) {
      this.fs = await import('node:fs/promises')
    }
    return this.fs
  }

  async read(path: string): Promise<string> {
    const fs = await this.getFs()
    try {
      return await fs.readFile(path, 'utf-8')
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
        return ''
      }
      throw e
    }
  }

  async write(path: string, content: string): Promise<void> {
    const fs = await this.getFs()
    if (!this.atomicWrites) {
      await fs.writeFile(path, content, 'utf-8')
      return
    }
    const tempPath = `${path}.tmp`
    await fs.writeFile(tempPath, content, 'utf-8')
    await fs.rename(tempPath, path)
  }
}

/**
 * In-memory file provider (useful for testing or embedding)
 */
export class InMemoryFileProvider implements FileProvider {
  private files = new Map<string, string>()

  async read(path: string): Promise<string> {
    return this.files.get(path) ?? ''
  }

  async write(path: string, content: string): Promise<void> {
    this.files.set(path, content)
  }

  clear(): void {
    this.files.clear()
  }
}
