/**
 * Archive Builder Port (Driven Port)
 * Packs a directory into a single archive file.
 */
export interface ArchiveBuilderPort {
  /** File extension of produced archives, without the dot. */
  readonly extension: string;

  /**
   * Write every file under `sourceDir` (recursively, entry name = path
   * relative to `sourceDir`) into `archivePath` and resolve with that path.
   * Raises PackagingError on I/O failure.
   */
  createArchive(sourceDir: string, archivePath: string): Promise<string>;
}
