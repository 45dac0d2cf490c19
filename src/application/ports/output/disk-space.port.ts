/**
 * Disk Space Port (Driven Port)
 * Samples free space on the volume holding `path`.
 */
export interface DiskSpacePort {
  getFreeBytes(path: string): Promise<number>;
}
