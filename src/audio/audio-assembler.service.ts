import { Injectable, Logger } from '@nestjs/common';
import { AssemblyPreconditionError, DecodeError } from '../common/errors';
import { ArtifactStore } from './artifact-store.service';
import { WavAudio, decodeWav, describeFormat, encodeWav, sameFormat, silenceFrames } from './wav-file';

@Injectable()
export class AudioAssembler {
  private readonly logger = new Logger(AudioAssembler.name);

  constructor(private readonly store: ArtifactStore) {}

  /**
   * Concatenates WAV files in list order with `silenceSeconds` of zeroed frames between
   * neighbours (never after the last). Every input must share the first file's channel
   * count, sample width and sample rate.
   *
   * @returns the written path, or undefined when there was nothing to merge
   */
  async merge(files: string[], outputPath: string, silenceSeconds: number): Promise<string | undefined> {
    if (!files.length) {
      this.logger.warn(`Nothing to merge into ${outputPath}`);
      return undefined;
    }

    const inputs: WavAudio[] = [];
    for (const file of files) {
      inputs.push(await this.load(file));
    }

    const [first] = inputs;
    inputs.forEach((input, position) => {
      if (!sameFormat(first.format, input.format)) {
        throw new AssemblyPreconditionError(
          `${files[position]} is ${describeFormat(input.format)}, expected ${describeFormat(first.format)}`,
          files[position],
        );
      }
    });

    const silence = silenceFrames(first.format, silenceSeconds);
    const frames: Buffer[] = [];
    inputs.forEach((input, position) => {
      if (position > 0 && silence.length) {
        frames.push(silence);
      }
      frames.push(input.frames);
    });

    await this.store.write(outputPath, encodeWav(first.format, Buffer.concat(frames)));
    this.logger.log(`Merged ${files.length} files into ${outputPath}`);
    return outputPath;
  }

  private async load(file: string): Promise<WavAudio> {
    const buffer = await this.store.read(file);
    try {
      return decodeWav(buffer);
    } catch (error) {
      throw new DecodeError(`${file}: ${error instanceof Error ? error.message : error}`);
    }
  }
}
