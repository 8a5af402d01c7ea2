import { promises as fs } from 'fs';
import path from 'path';
import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuid } from 'uuid';

/**
 * Audio artifacts on local disk. A file that exists with a non-zero size is complete;
 * writes go through a temp file and a rename so a partial file is never observed.
 */
@Injectable()
export class ArtifactStore {
  private readonly logger = new Logger(ArtifactStore.name);

  async isComplete(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile() && stats.size > 0;
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw error;
    }
  }

  async write(filePath: string, buffer: Buffer): Promise<string> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.${uuid()}.tmp`;
    try {
      await fs.writeFile(tempPath, buffer);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
    return filePath;
  }

  async read(filePath: string): Promise<Buffer> {
    return fs.readFile(filePath);
  }

  async remove(filePaths: string[]): Promise<void> {
    for (const filePath of filePaths) {
      try {
        await fs.rm(filePath, { force: true });
      } catch (error) {
        this.logger.warn(`Failed to remove ${filePath}: ${error instanceof Error ? error.message : error}`);
      }
    }
  }

  async ensureDir(dir: string): Promise<string> {
    await fs.mkdir(dir, { recursive: true });
    return dir;
  }
}

// fs errors need not pass `instanceof Error` (they come from another realm under Jest)
function isMissing(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
