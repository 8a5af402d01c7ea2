import { promises as fs } from 'fs';
import path from 'path';
import { ConfigurationError } from '../common/errors';
import { ReferenceSource } from '../config/synthesis.config';
import { ReferenceAudio, Speaker } from '../domain/types';

export const DEFAULT_REFERENCE_BASE_URL = 'https://sf-maas-uat-prod.oss-cn-shanghai.aliyuncs.com/voice_template';

export const FALLBACK_REFERENCE_TRANSCRIPT = '在一无所知中，梦里的一天结束了，一个新的轮回便会开始';

const FALLBACK_PRIMARY_VOICES = ['alex', 'benjamin', 'charles', 'david'];
const FALLBACK_SECONDARY_VOICE = 'anna';

const AUDIO_MIME_TYPES: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.m4a': 'audio/mp4',
  '.ogg': 'audio/ogg',
  '.aac': 'audio/aac',
};

/**
 * Turns a configured reference into something the backend accepts: URLs pass through,
 * local files are embedded as a base64 data URL.
 */
export async function prepareReference(reference: ReferenceSource): Promise<ReferenceAudio> {
  const source = reference.source.trim();
  if (/^https?:\/\//i.test(source) || source.startsWith('data:')) {
    return { audio: source, text: reference.text };
  }

  let content: Buffer;
  try {
    content = await fs.readFile(source);
  } catch (error) {
    throw new ConfigurationError(
      `Reference audio ${source} could not be read: ${error instanceof Error ? error.message : error}`,
    );
  }
  const mime = AUDIO_MIME_TYPES[path.extname(source).toLowerCase()] ?? 'audio/mpeg';
  return { audio: `data:${mime};base64,${content.toString('base64')}`, text: reference.text };
}

/** A speaker without a sample borrows the other speaker's. */
export function shareReferences(
  references: Partial<Record<Speaker, ReferenceAudio>>,
): Partial<Record<Speaker, ReferenceAudio>> {
  const primary = references.primary ?? references.secondary;
  const secondary = references.secondary ?? references.primary;
  return primary && secondary ? { primary, secondary } : {};
}

export function fallbackReferencePair(
  voice: string,
  baseUrl: string = DEFAULT_REFERENCE_BASE_URL,
): [ReferenceAudio, ReferenceAudio] {
  const name = voice.includes(':') ? voice.slice(voice.lastIndexOf(':') + 1).trim().toLowerCase() : 'alex';
  const primaryVoice = FALLBACK_PRIMARY_VOICES.includes(name) ? name : 'alex';
  const root = baseUrl.replace(/\/+$/, '');
  const sample = (voiceName: string): ReferenceAudio => ({
    audio: `${root}/fish_audio-${capitalize(voiceName)}.mp3`,
    text: FALLBACK_REFERENCE_TRANSCRIPT,
  });
  return [sample(primaryVoice), sample(FALLBACK_SECONDARY_VOICE)];
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}
