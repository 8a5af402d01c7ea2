import { Mood } from '../domain/types';

export interface MoodParameters {
  speechRate: number;
  pitchOffset: number;
  volumeMultiplier: number;
  emotionLabel: string;
  instructionText: string;
}

export const MOOD_PARAMETERS: Record<Mood, MoodParameters> = {
  gentle: {
    speechRate: 1.0,
    pitchOffset: 0,
    volumeMultiplier: 1.0,
    emotionLabel: 'neutral',
    instructionText: '语速适中，语气温柔平和',
  },
  happy: {
    speechRate: 1.1,
    pitchOffset: 2,
    volumeMultiplier: 1.0,
    emotionLabel: 'happy',
    instructionText: '语速稍快，语气轻快愉悦',
  },
  confident: {
    speechRate: 1.0,
    pitchOffset: 0,
    volumeMultiplier: 1.1,
    emotionLabel: 'neutral',
    instructionText: '语速适中，语气坚定自信',
  },
  expectant: {
    speechRate: 1.1,
    pitchOffset: 4,
    volumeMultiplier: 1.0,
    emotionLabel: 'happy',
    instructionText: '语速稍快，语气充满期待和好奇',
  },
  confused: {
    speechRate: 0.9,
    pitchOffset: 2,
    volumeMultiplier: 1.0,
    emotionLabel: 'surprised',
    instructionText: '语速稍慢，语气带有疑问和困惑',
  },
  shocked: {
    speechRate: 1.2,
    pitchOffset: 8,
    volumeMultiplier: 1.1,
    emotionLabel: 'surprised',
    instructionText: '语速较快，语气惊讶震惊',
  },
  angry: {
    speechRate: 1.2,
    pitchOffset: -4,
    volumeMultiplier: 1.2,
    emotionLabel: 'angry',
    instructionText: '语速较快，语气愤怒不满',
  },
  sad: {
    speechRate: 0.8,
    pitchOffset: -6,
    volumeMultiplier: 0.9,
    emotionLabel: 'sad',
    instructionText: '语速较慢，语气悲伤低沉',
  },
  resigned: {
    speechRate: 1.0,
    pitchOffset: -2,
    volumeMultiplier: 1.0,
    emotionLabel: 'sad',
    instructionText: '语速适中，语气无奈平淡',
  },
};

export type EmotionVocabularyName = 'indextts';

export interface EmotionVocabulary {
  labels: Partial<Record<Mood, string>>;
  fallback: string;
}

// IndexTTS2 understands Neutral, Happy, Sad, Angry, Fearful, Disgusted, Surprised
export const EMOTION_VOCABULARIES: Record<EmotionVocabularyName, EmotionVocabulary> = {
  indextts: {
    labels: {
      gentle: 'Neutral',
      happy: 'Happy',
      confident: 'Neutral',
      expectant: 'Happy',
      confused: 'Surprised',
      shocked: 'Surprised',
      angry: 'Angry',
      sad: 'Sad',
      resigned: 'Sad',
    },
    fallback: 'Neutral',
  },
};

export const EMOTION_VECTOR_ALPHA = 0.7;

export type NumericMoodControl = 'speechRate' | 'pitchOffset' | 'volumeMultiplier';

export interface MoodCapabilities {
  numericControls: readonly NumericMoodControl[];
  emotionLabel: boolean;
  instructionText: boolean;
  emotionVocabulary?: EmotionVocabularyName;
}

export function translateMood(vocabulary: EmotionVocabularyName, mood: Mood): string {
  const table = EMOTION_VOCABULARIES[vocabulary];
  return table.labels[mood] ?? table.fallback;
}
