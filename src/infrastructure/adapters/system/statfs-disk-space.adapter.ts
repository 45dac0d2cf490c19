import { Injectable } from '@nestjs/common';
import { promises as fs } from 'fs';
import { DiskSpacePort } from '../../../application/ports/output/disk-space.port';

/**
 * Disk Space Adapter
 * Free bytes available to this process on the filesystem holding `path`.
 */
@Injectable()
export class StatfsDiskSpaceAdapter implements DiskSpacePort {
  async getFreeBytes(path: string): Promise<number> {
    const stats = await fs.statfs(path);
    return stats.bavail * stats.bsize;
  }
}
