import { randomUUID } from "node:crypto"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import type { CacheKey } from "../model/cache.model"
import type { BlobReadHandle, BlobStore, BlobWriter } from "../services/blob-store"

const READ_CHUNK_BYTES = 64 * 1024

export interface BlobStoreFsOptions {
  rootDir: string
}

/**
 * Blobs live at `<rootDir>/<repository>/<path>`. Writes go to a hidden
 * temporary file beside the destination and are published by rename.
 */
export class BlobStoreFs implements BlobStore {
  readonly rootDir: string

  constructor(options: BlobStoreFsOptions) {
    this.rootDir = path.resolve(options.rootDir)
  }

  async exists(key: CacheKey): Promise<boolean> {
    try {
      const stat = await fs.stat(this.resolveFilePath(key))
      return stat.isFile()
    } catch (err) {
      if (isNotFoundError(err)) return false
      throw err
    }
  }

  async openForRead(key: CacheKey): Promise<BlobReadHandle | null> {
    let file: fs.FileHandle

    try {
      file = await fs.open(this.resolveFilePath(key), "r")
    } catch (err) {
      if (isNotFoundError(err)) return null
      throw err
    }

    try {
      const stat = await file.stat()

      if (!stat.isFile()) {
        await file.close()
        return null
      }

      return new FsBlobReadHandle(file, stat.size, stat.mtime)
    } catch (err) {
      await file.close()
      throw err
    }
  }

  async openForWrite(key: CacheKey): Promise<BlobWriter> {
    const finalPath = this.resolveFilePath(key)
    const dir = path.dirname(finalPath)

    await fs.mkdir(dir, { recursive: true })

    const tempPath = path.join(dir, `.${path.basename(finalPath)}.${randomUUID()}.partial`)
    const file = await fs.open(tempPath, "wx")

    return new FsBlobWriter(file, tempPath, finalPath)
  }

  private resolveFilePath(key: CacheKey): string {
    validateSegment(key.repository, "repository")

    const segments = key.path.split("/")
    for (const segment of segments) validateSegment(segment, "path")

    const repositoryDir = path.join(this.rootDir, key.repository)
    const filePath = path.join(repositoryDir, ...segments)

    if (!path.resolve(filePath).startsWith(path.resolve(repositoryDir) + path.sep)) {
      throw new Error("Resolved cache path escapes repository directory")
    }

    return filePath
  }
}

class FsBlobReadHandle implements BlobReadHandle {
  private closed = false

  constructor(
    private readonly file: fs.FileHandle,
    readonly size: number,
    readonly modifiedAt: Date,
  ) {}

  stream(): ReadableStream<Uint8Array> {
    return new ReadableStream<Uint8Array>({
      pull: async (controller) => {
        const buffer = new Uint8Array(READ_CHUNK_BYTES)
        const bytesRead = await this.readInto(buffer)

        if (bytesRead === 0) {
          await this.close()
          controller.close()
          return
        }

        controller.enqueue(buffer.subarray(0, bytesRead))
      },
      cancel: async () => {
        await this.close()
      },
    })
  }

  async close(): Promise<void> {
    if (this.closed) return

    this.closed = true
    await this.file.close()
  }

  private async readInto(buffer: Uint8Array): Promise<number> {
    try {
      const { bytesRead } = await this.file.read(buffer, 0, buffer.byteLength, null)
      return bytesRead
    } catch (err) {
      await this.close()
      throw err
    }
  }
}

class FsBlobWriter implements BlobWriter {
  bytesWritten = 0

  private open = true
  private committed = false

  constructor(
    private readonly file: fs.FileHandle,
    private readonly tempPath: string,
    private readonly finalPath: string,
  ) {}

  async write(chunk: Uint8Array): Promise<void> {
    let offset = 0

    while (offset < chunk.byteLength) {
      const { bytesWritten } = await this.file.write(chunk, offset, chunk.byteLength - offset)
      offset += bytesWritten
    }

    this.bytesWritten += chunk.byteLength
  }

  async commit(): Promise<void> {
    await this.closeFile()
    await fs.rename(this.tempPath, this.finalPath)

    this.committed = true
  }

  async abort(): Promise<void> {
    await this.closeFile()
    if (this.committed) return

    try {
      await fs.unlink(this.tempPath)
    } catch (err) {
      if (!isNotFoundError(err)) throw err
    }
  }

  private async closeFile(): Promise<void> {
    if (!this.open) return

    this.open = false
    await this.file.close()
  }
}

function validateSegment(segment: string, field: string): void {
  if (segment === "" || segment === "." || segment === "..") {
    throw new Error(`Invalid cache ${field} segment "${segment}"`)
  }

  if (segment.includes("\\") || segment.includes("\0")) {
    throw new Error(`Cache ${field} segment contains a forbidden character`)
  }
}

function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
