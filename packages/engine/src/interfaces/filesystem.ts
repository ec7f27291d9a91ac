/**
 * Abstract File System Interface
 *
 * Route content is read whole; nothing in the engine writes files.
 */

export interface IFileSystem {
  /**
   * Read an entire file as raw bytes. Rejects when the path is missing,
   * is a directory, or cannot be read.
   */
  readFile(path: string): Promise<Uint8Array>
}
