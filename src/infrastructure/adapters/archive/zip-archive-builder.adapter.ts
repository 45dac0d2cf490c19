import { Injectable } from '@nestjs/common';
import archiver from 'archiver';
import { createWriteStream, promises as fs } from 'fs';
import { ArchiveBuilderPort } from '../../../application/ports/output/archive-builder.port';
import { PackagingError, errorMessage } from '../../../shared/errors';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * ZIP Archive Builder Adapter
 * Deflate-compressed ZIP via archiver; entry names are paths relative to the
 * packed directory, with `/` separators.
 */
@Injectable()
export class ZipArchiveBuilderAdapter implements ArchiveBuilderPort {
  readonly extension = 'zip';

  constructor(private readonly logger: PinoLoggerService) {
    this.logger.setContext(ZipArchiveBuilderAdapter.name);
  }

  async createArchive(sourceDir: string, archivePath: string): Promise<string> {
    try {
      const stats = await fs.stat(sourceDir);
      if (!stats.isDirectory()) {
        throw new Error(`${sourceDir} is not a directory`);
      }
      const size = await this.writeZip(sourceDir, archivePath);
      this.logger.info({ sourceDir, archivePath, size }, 'Archive created');
      return archivePath;
    } catch (error) {
      throw new PackagingError(`Failed to create archive: ${errorMessage(error)}`, {
        cause: error,
        details: { sourceDir, archivePath },
      });
    }
  }

  private writeZip(sourceDir: string, archivePath: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const output = createWriteStream(archivePath);
      const archive = archiver('zip', { zlib: { level: 6 } });

      output.on('close', () => resolve(archive.pointer()));
      output.on('error', reject);

      // archiver reports unreadable entries (ENOENT and friends) as warnings
      archive.on('warning', reject);
      archive.on('error', reject);

      archive.pipe(output);
      archive.directory(sourceDir, false);
      archive.finalize().catch(reject);
    });
  }
}
