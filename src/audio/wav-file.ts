import { DecodeError } from '../common/errors';

const PCM_FORMAT = 1;
const EXTENSIBLE_FORMAT = 0xfffe;
const HEADER_SIZE = 44;

export interface WavFormat {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

export interface WavAudio {
  format: WavFormat;
  frames: Buffer;
}

export function sampleWidth(format: WavFormat): number {
  return format.bitsPerSample / 8;
}

export function bytesPerFrame(format: WavFormat): number {
  return sampleWidth(format) * format.channels;
}

/**
 * Walks the RIFF chunks for `fmt ` and `data`. A data length running past the end of the
 * buffer (streamed WAVs often carry a placeholder) is clamped to the bytes present.
 */
export function decodeWav(buffer: Buffer): WavAudio {
  if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
    throw new DecodeError('Invalid WAV file: missing RIFF/WAVE header');
  }

  let format: WavFormat | undefined;
  let offset = 12;
  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === 'fmt ') {
      if (body + 16 > buffer.length) {
        throw new DecodeError('Invalid WAV file: truncated fmt chunk');
      }
      format = {
        audioFormat: buffer.readUInt16LE(body),
        channels: buffer.readUInt16LE(body + 2),
        sampleRate: buffer.readUInt32LE(body + 4),
        bitsPerSample: buffer.readUInt16LE(body + 14),
      };
    } else if (chunkId === 'data') {
      if (!format) {
        throw new DecodeError('Invalid WAV file: data chunk before fmt chunk');
      }
      const length = Math.min(body + chunkSize, buffer.length) - body;
      const frameSize = bytesPerFrame(format);
      const usable = frameSize > 0 ? length - (length % frameSize) : length;
      return { format, frames: buffer.subarray(body, body + usable) };
    }

    offset = body + chunkSize + (chunkSize % 2);
  }

  throw new DecodeError(format ? 'Invalid WAV file: missing data chunk' : 'Invalid WAV file: missing fmt chunk');
}

export function encodeWav(format: WavFormat, frames: Buffer): Buffer {
  const blockAlign = bytesPerFrame(format);
  const header = Buffer.alloc(HEADER_SIZE);

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + frames.length, 4);
  header.write('WAVE', 8, 'ascii');

  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(format.audioFormat === EXTENSIBLE_FORMAT ? PCM_FORMAT : format.audioFormat, 20);
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(format.sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(format.bitsPerSample, 34);

  header.write('data', 36, 'ascii');
  header.writeUInt32LE(frames.length, 40);

  return Buffer.concat([header, frames]);
}

export function silenceFrames(format: WavFormat, seconds: number): Buffer {
  return Buffer.alloc(Math.round(format.sampleRate * seconds) * bytesPerFrame(format));
}

export function wavDurationSeconds(audio: WavAudio): number {
  const frameSize = bytesPerFrame(audio.format);
  if (!frameSize || !audio.format.sampleRate) {
    return 0;
  }
  return audio.frames.length / frameSize / audio.format.sampleRate;
}

export function sameFormat(a: WavFormat, b: WavFormat): boolean {
  return a.channels === b.channels && a.bitsPerSample === b.bitsPerSample && a.sampleRate === b.sampleRate;
}

export function describeFormat(format: WavFormat): string {
  return `${format.channels}ch/${format.bitsPerSample}bit/${format.sampleRate}Hz`;
}
