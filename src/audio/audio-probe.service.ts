import { Injectable, Logger } from '@nestjs/common';
import { parseFile } from 'music-metadata';
import { ArtifactStore } from './artifact-store.service';
import { decodeWav, wavDurationSeconds } from './wav-file';

@Injectable()
export class AudioProbe {
  private readonly logger = new Logger(AudioProbe.name);

  constructor(private readonly store: ArtifactStore) {}

  /** Duration in seconds; 0 when the file cannot be read as audio. */
  async durationSeconds(filePath: string): Promise<number> {
    try {
      const metadata = await parseFile(filePath, { duration: true });
      const seconds = metadata?.format?.duration;
      if (seconds && isFinite(seconds) && seconds > 0) {
        return seconds;
      }
    } catch (error) {
      this.logger.debug(
        `music-metadata could not read ${filePath}: ${error instanceof Error ? error.message : error}`,
      );
    }

    try {
      return wavDurationSeconds(decodeWav(await this.store.read(filePath)));
    } catch (error) {
      this.logger.warn(`Failed to read audio duration of ${filePath}: ${error instanceof Error ? error.message : error}`);
      return 0;
    }
  }
}
