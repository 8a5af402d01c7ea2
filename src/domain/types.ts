export const SPEAKERS = ['primary', 'secondary'] as const;

export type Speaker = (typeof SPEAKERS)[number];

export const MOODS = [
  'gentle',
  'happy',
  'confident',
  'expectant',
  'confused',
  'shocked',
  'angry',
  'sad',
  'resigned',
] as const;

export type Mood = (typeof MOODS)[number];

export const DEFAULT_MOOD: Mood = 'gentle';

export function isMood(value: string): value is Mood {
  return MOODS.some((mood) => mood === value);
}

export interface DialogueSegment {
  readonly index: number;
  readonly speaker: Speaker;
  readonly text: string;
  readonly mood: Mood;
}

export interface DialogueLine {
  speaker: Speaker;
  text: string;
}

export interface ReferenceAudio {
  /** http(s) URL or a `data:` URL with the embedded audio */
  audio: string;
  text: string;
}

export interface VoiceProfile {
  voice: string;
  speechRate?: number;
  pitchOffset?: number;
  volumeMultiplier?: number;
  emotion?: string;
  emotionVector?: string;
  emotionAlpha?: number;
  instructions?: string;
  optimizeInstructions?: boolean;
  languageType?: string;
  references?: ReferenceAudio[];
  responseFormat?: string;
  sampleRate?: number;
  gain?: number;
  extras?: Record<string, unknown>;
}

export type VoiceProfiles = Record<Speaker, VoiceProfile>;

export interface SynthesisChunk {
  segmentIndex: number;
  ordinal: number;
  text: string;
  targetPath: string;
}

export type SynthesisOutcome =
  | { ok: true; audio: Buffer }
  | { ok: false; reason: string; rateLimited?: boolean };

export type SegmentStatus = 'pending' | 'skipped' | 'synthesizing' | 'retrying' | 'succeeded' | 'failed';

export interface SegmentArtifact {
  index: number;
  speaker: Speaker;
  text: string;
  mood: Mood;
  audioPath: string;
}

export interface SegmentFailure {
  index: number;
  speaker: Speaker;
  chunk: number;
  attempts: number;
  reason: string;
}

export interface SynthesisReport {
  outputDir: string;
  succeeded: number;
  failed: number;
  resumed: number;
  states: Record<number, SegmentStatus>;
  artifacts: SegmentArtifact[];
  failures: SegmentFailure[];
  mergedPath?: string;
  mergeError?: string;
}

export interface NarrationEntry {
  index: number;
  speaker: Speaker;
  text: string;
  mood: Mood;
  audioPath: string;
  duration: number;
}
