import { DialogueLine, ReferenceAudio, Speaker, SynthesisOutcome, VoiceProfile } from '../domain/types';
import { MoodCapabilities } from '../mood/mood-profiles';

export const BACKEND_NAMES = ['qwen', 'siliconflow', 'minimax'] as const;

export type BackendName = (typeof BACKEND_NAMES)[number];

export interface TtsProvider {
  readonly name: BackendName;
  readonly model: string;
  readonly moodCapabilities: MoodCapabilities;
  synthesize(text: string, profile: VoiceProfile): Promise<SynthesisOutcome>;
  synthesizeStreaming(text: string, profile: VoiceProfile): Promise<SynthesisOutcome>;
}

/**
 * Backends that render a whole two-speaker conversation in one request.
 */
export interface JointDialogueProvider extends TtsProvider {
  readonly supportsJointDialogue: boolean;
  synthesizeDialogue(
    lines: DialogueLine[],
    references: Partial<Record<Speaker, ReferenceAudio>>,
    profile: VoiceProfile,
  ): Promise<SynthesisOutcome>;
}

export function supportsJointDialogue(provider: TtsProvider): provider is JointDialogueProvider {
  return (
    'synthesizeDialogue' in provider &&
    'supportsJointDialogue' in provider &&
    provider.supportsJointDialogue === true
  );
}
