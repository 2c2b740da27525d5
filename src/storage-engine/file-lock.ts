import { mkdir, open, rm } from 'node:fs/promises'
import { dirname } from 'node:path'
import { defaultLockTimeout } from './constants'
import { StorageError } from './errors'

const retryInterval = 100

/**
 * Lock file held by a durable store while it writes one commit.
 *
 * The file is created with O_EXCL, so only one process can hold it. It
 * contains the holder's PID and is removed when the commit finishes.
 */
export class FileLock {
  private readonly filePath: string
  private readonly timeoutMs: number

  constructor(filePath: string, timeoutMs: number = defaultLockTimeout) {
    this.filePath = filePath
    this.timeoutMs = timeoutMs
  }

  /**
   * Run `fn` with the lock file held. Waits up to the timeout for another
   * holder, then fails with DatabaseLockedError.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.waitForLock()
    try {
      return await fn()
    } finally {
      await rm(this.filePath, { force: true })
    }
  }

  private async waitForLock(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true })

    const deadline = Date.now() + this.timeoutMs
    while (!(await this.tryCreate())) {
      if (Date.now() >= deadline) {
        throw new DatabaseLockedError(
          `Store is locked by another process (timeout after ${this.timeoutMs}ms): ${this.filePath}`
        )
      }
      await sleep(retryInterval)
    }
  }

  /**
   * Returns false when another holder's lock file exists.
   */
  private async tryCreate(): Promise<boolean> {
    try {
      const fileHandle = await open(this.filePath, 'wx')
      try {
        await fileHandle.write(`${process.pid}\n`)
      } finally {
        await fileHandle.close()
      }
      return true
    } catch (error) {
      if (!(error instanceof Error) || !('code' in error)) {
        throw error
      }
      if (error.code === 'EEXIST') {
        return false
      }
      if (error.code === 'EACCES' || error.code === 'EROFS') {
        throw new LockPermissionError(this.filePath, error)
      }
      throw error
    }
  }
}

/**
 * Error thrown when a commit cannot take the lock held by another process.
 */
export class DatabaseLockedError extends StorageError {
  constructor(message: string) {
    super(message)
    this.name = 'DatabaseLockedError'
  }
}

/**
 * Error thrown when the lock file cannot be created, typically on a
 * read-only filesystem.
 */
export class LockPermissionError extends StorageError {
  constructor(
    public readonly lockPath: string,
    public readonly originalError?: Error
  ) {
    super(
      `Permission denied when creating lock file: ${lockPath}\n\n` +
        `Reads do not need the lock, only commits that write.\n` +
        `Open the store with readOnly: true, or make the directory writable.`
    )
    this.name = 'LockPermissionError'
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
