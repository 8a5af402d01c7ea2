import path from 'path';
import { SynthesisSettings } from '../config/synthesis.config';
import { ReferenceAudio, SPEAKERS, Speaker, VoiceProfile, VoiceProfiles } from '../domain/types';
import { MoodSwitches } from '../mood/mood-profile.resolver';
import { prepareReference, shareReferences } from '../tts/voice-references';

export interface IndexRange {
  start?: number;
  end?: number;
}

/**
 * Everything one run needs, resolved up front. Nothing about a run lives in module state,
 * so two contexts never interfere (except through a shared output directory).
 */
export interface SynthesisRunContext {
  outputDir: string;
  prefix: string;
  voices: VoiceProfiles;
  references: Partial<Record<Speaker, ReferenceAudio>>;
  requestDelaySeconds: number;
  maxRetries: number;
  retryDelaySeconds: number;
  mood: MoodSwitches;
  maxTextLength: number;
  mergeAudio: boolean;
  silenceBetweenSeconds: number;
  partSilenceSeconds: number;
  streaming: boolean;
  range?: IndexRange;
}

export interface RunOptions {
  range?: IndexRange;
  now?: Date;
}

export async function createRunContext(
  settings: SynthesisSettings,
  options: RunOptions = {},
): Promise<SynthesisRunContext> {
  const outputDir = settings.timestampSubdir
    ? path.join(settings.outputDir, formatRunStamp(options.now ?? new Date()))
    : settings.outputDir;

  const references = settings.provider === 'siliconflow' ? await resolveReferences(settings) : {};
  const withReference = (speaker: Speaker): VoiceProfile => {
    const profile = settings.voices[speaker];
    const reference = references[speaker];
    return reference && !profile.references?.length ? { ...profile, references: [reference] } : profile;
  };

  return {
    outputDir,
    prefix: settings.outputPrefix,
    voices: { primary: withReference('primary'), secondary: withReference('secondary') },
    references,
    requestDelaySeconds: settings.requestDelaySeconds,
    maxRetries: settings.maxRetries,
    retryDelaySeconds: settings.retryDelaySeconds,
    mood: { useTextMood: settings.useTextMood, passBaseParams: settings.passBaseParams },
    maxTextLength: settings.maxTextLength,
    mergeAudio: settings.mergeAudio,
    silenceBetweenSeconds: settings.silenceBetweenSeconds,
    partSilenceSeconds: settings.partSilenceSeconds,
    streaming: settings.streaming,
    range: isActiveRange(options.range) ? options.range : undefined,
  };
}

export function isActiveRange(range: IndexRange | undefined): range is IndexRange {
  return range !== undefined && (range.start !== undefined || range.end !== undefined);
}

export function inRange(index: number, range: IndexRange | undefined): boolean {
  if (!range) {
    return true;
  }
  return index >= (range.start ?? 1) && index <= (range.end ?? Number.POSITIVE_INFINITY);
}

// YYYYMMDD_HHMMSS, local time
export function formatRunStamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

async function resolveReferences(settings: SynthesisSettings): Promise<Partial<Record<Speaker, ReferenceAudio>>> {
  const prepared: Partial<Record<Speaker, ReferenceAudio>> = {};
  for (const speaker of SPEAKERS) {
    const source = settings.referenceSources[speaker];
    if (source) {
      prepared[speaker] = await prepareReference(source);
    }
  }
  return shareReferences(prepared);
}
