import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { ConfigurationError } from '../common/errors';
import { MOODS, Mood, Speaker, VoiceProfile, VoiceProfiles } from '../domain/types';
import { BACKEND_NAMES, BackendName } from '../tts/tts.interfaces';
import { getDefaultVoices } from '../tts/voice-config';

export const SYNTHESIS_SETTINGS = 'SYNTHESIS_SETTINGS';

/** Where a speaker's cloning sample comes from: an http(s) URL or a local file path. */
export interface ReferenceSource {
  source: string;
  text: string;
}

export interface SynthesisSettings {
  provider: BackendName;
  voices: VoiceProfiles;
  referenceSources: Partial<Record<Speaker, ReferenceSource>>;
  requestDelaySeconds: number;
  maxRetries: number;
  retryDelaySeconds: number;
  useTextMood: boolean;
  passBaseParams: boolean;
  defaultMood: Mood;
  outputDir: string;
  outputPrefix: string;
  timestampSubdir: boolean;
  mergeAudio: boolean;
  silenceBetweenSeconds: number;
  partSilenceSeconds: number;
  maxTextLength: number;
  stripAsides: boolean;
  localizeFigures: boolean;
  figureLabel: string;
  streaming: boolean;
}

const TRUTHY = ['1', 'true', 'yes', 'on'];

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const flag = (fallback: boolean) =>
  z.preprocess((value) => {
    const present = blankToUndefined(value);
    if (present === undefined) {
      return fallback;
    }
    if (typeof present === 'boolean') {
      return present;
    }
    return TRUTHY.includes(String(present).trim().toLowerCase());
  }, z.boolean());

const seconds = (fallback: number) => z.preprocess(blankToUndefined, z.coerce.number().min(0).default(fallback));

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));

const envSchema = z.object({
  TTS_PROVIDER: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() ? value.trim().toLowerCase() : 'qwen'),
    z.enum(BACKEND_NAMES),
  ),
  TTS_REQUEST_DELAY_SECONDS: seconds(0.3),
  TTS_MAX_RETRIES: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(0)),
  TTS_RETRY_DELAY_SECONDS: seconds(5),
  TTS_USE_TEXT_MOOD: flag(true),
  TTS_PASS_BASE_PARAMS: flag(false),
  TTS_DEFAULT_MOOD: z.preprocess(blankToUndefined, z.enum(MOODS).default('gentle')),
  TTS_OUTPUT_DIR: text('./tts_output'),
  TTS_OUTPUT_PREFIX: text('dialogue'),
  TTS_OUTPUT_TIMESTAMP_SUBDIR: flag(false),
  TTS_MERGE_AUDIO: flag(true),
  TTS_SILENCE_BETWEEN_SECONDS: seconds(0.5),
  TTS_PART_SILENCE_SECONDS: seconds(0.2),
  TTS_MAX_TEXT_LENGTH: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(500)),
  TTS_STRIP_ASIDES: flag(true),
  TTS_LOCALIZE_FIGURES: flag(true),
  TTS_FIGURE_LABEL: text('图'),
  TTS_STREAMING: flag(false),
});

const referenceSchema = z.object({
  audio: z.string().min(1),
  text: z.string().default(''),
});

const profileSchema = z
  .object({
    voice: z.string().min(1).optional(),
    speechRate: z.number().positive().optional(),
    pitchOffset: z.number().optional(),
    volumeMultiplier: z.number().positive().optional(),
    emotion: z.string().optional(),
    emotionVector: z.string().optional(),
    emotionAlpha: z.number().min(0).max(1).optional(),
    instructions: z.string().optional(),
    optimizeInstructions: z.boolean().optional(),
    languageType: z.string().optional(),
    references: z.array(referenceSchema).optional(),
    responseFormat: z.string().optional(),
    sampleRate: z.number().int().positive().optional(),
    gain: z.number().optional(),
    extras: z.record(z.unknown()).optional(),
  })
  .strict();

type ProfileOverrides = z.infer<typeof profileSchema>;

const ENV_KEYS = Object.keys(envSchema.shape);

export function loadSynthesisSettings(configService: ConfigService): SynthesisSettings {
  const raw: Record<string, unknown> = {};
  for (const key of ENV_KEYS) {
    raw[key] = configService.get<string>(key);
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid synthesis settings: ${details}`);
  }
  const env = parsed.data;

  const defaults = getDefaultVoices(env.TTS_PROVIDER);
  const referenceSources: Partial<Record<Speaker, ReferenceSource>> = {};
  const buildVoice = (speaker: Speaker): VoiceProfile => {
    const prefix = `TTS_${speaker.toUpperCase()}`;
    const overrides = parseProfile(`${prefix}_PROFILE`, configService.get<string>(`${prefix}_PROFILE`));

    const referenceAudio = configService.get<string>(`${prefix}_REFERENCE_AUDIO`)?.trim();
    if (referenceAudio) {
      referenceSources[speaker] = {
        source: referenceAudio,
        text: configService.get<string>(`${prefix}_REFERENCE_TEXT`) ?? '',
      };
    }

    return {
      ...overrides,
      voice: overrides.voice || configService.get<string>(`${prefix}_VOICE`) || defaults[speaker],
    };
  };
  const voices: VoiceProfiles = { primary: buildVoice('primary'), secondary: buildVoice('secondary') };

  return {
    provider: env.TTS_PROVIDER,
    voices,
    referenceSources,
    requestDelaySeconds: env.TTS_REQUEST_DELAY_SECONDS,
    maxRetries: env.TTS_MAX_RETRIES,
    retryDelaySeconds: env.TTS_RETRY_DELAY_SECONDS,
    useTextMood: env.TTS_USE_TEXT_MOOD,
    passBaseParams: env.TTS_PASS_BASE_PARAMS,
    defaultMood: env.TTS_DEFAULT_MOOD,
    outputDir: env.TTS_OUTPUT_DIR,
    outputPrefix: env.TTS_OUTPUT_PREFIX,
    timestampSubdir: env.TTS_OUTPUT_TIMESTAMP_SUBDIR,
    mergeAudio: env.TTS_MERGE_AUDIO,
    silenceBetweenSeconds: env.TTS_SILENCE_BETWEEN_SECONDS,
    partSilenceSeconds: env.TTS_PART_SILENCE_SECONDS,
    maxTextLength: env.TTS_MAX_TEXT_LENGTH,
    stripAsides: env.TTS_STRIP_ASIDES,
    localizeFigures: env.TTS_LOCALIZE_FIGURES,
    figureLabel: env.TTS_FIGURE_LABEL,
    streaming: env.TTS_STREAMING,
  };
}

function parseProfile(key: string, value: string | undefined): ProfileOverrides {
  if (!value || !value.trim()) {
    return {};
  }
  let json: unknown;
  try {
    json = JSON.parse(value);
  } catch (error) {
    throw new ConfigurationError(`${key} is not valid JSON: ${error instanceof Error ? error.message : error}`);
  }
  const parsed = profileSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`${key} is not a valid voice profile: ${details}`);
  }
  return parsed.data;
}

/**
 * Reads a provider credential, rejecting the unfilled template placeholder.
 */
export function requireApiKey(configService: ConfigService, key: string): string {
  const apiKey = configService.get<string>(key)?.trim();
  if (!apiKey || apiKey === 'YOUR_API_KEY_HERE') {
    throw new ConfigurationError(`${key} must be set for this TTS provider`);
  }
  return apiKey;
}
