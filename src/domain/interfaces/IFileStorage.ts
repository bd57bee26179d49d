/**
 * Local storage used by one run: the working `.part` file and the final file
 */
export interface IFileStorage {
  /**
   * Fail with FilesystemError unless `directory` exists and is writable
   */
  assertWritableDirectory(directory: string): Promise<void>;

  /**
   * Create `directory` and its parents when missing
   */
  ensureDirectory(directory: string): Promise<void>;

  /**
   * Size in bytes, 0 when the file does not exist
   */
  sizeOf(path: string): Promise<number>;

  /**
   * Copy `body` into `path` chunk by chunk, appending or truncating.
   * Resolves with the number of bytes written by this call. Write failures
   * reject with FilesystemError; errors raised by `body` propagate as-is.
   */
  writeStream(path: string, body: NodeJS.ReadableStream, options?: WriteOptions): Promise<number>;

  /**
   * Read up to `length` bytes starting at `offset`
   */
  readRange(path: string, offset: number, length: number): Promise<Buffer>;

  /**
   * Atomically move `from` to `to`, replacing `to`
   */
  rename(from: string, to: string): Promise<void>;

  /**
   * Remove the file; missing files are ignored
   */
  delete(path: string): Promise<void>;
}

export interface WriteOptions {
  append?: boolean;
  /** Called after each chunk is on disk */
  onChunk?: (bytes: number) => void;
}
