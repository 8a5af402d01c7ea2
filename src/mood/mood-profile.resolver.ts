import { Injectable } from '@nestjs/common';
import { Mood, VoiceProfile } from '../domain/types';
import { EMOTION_VECTOR_ALPHA, MOOD_PARAMETERS, MoodCapabilities, MoodParameters, translateMood } from './mood-profiles';

export interface MoodSwitches {
  useTextMood: boolean;
  passBaseParams: boolean;
}

/**
 * Folds a segment's mood into the speaker's voice profile, in whatever form the selected
 * backend understands. Fields already set on the profile are never overwritten.
 */
@Injectable()
export class MoodProfileResolver {
  resolve(mood: Mood, profile: VoiceProfile, capabilities: MoodCapabilities, switches: MoodSwitches): VoiceProfile {
    const params = MOOD_PARAMETERS[mood];

    if (switches.useTextMood) {
      const resolved = this.withNumericControls(profile, params, capabilities);
      if (capabilities.emotionLabel && resolved.emotion === undefined) {
        resolved.emotion = params.emotionLabel;
      }
      if (capabilities.emotionVocabulary && resolved.emotionVector === undefined) {
        resolved.emotionVector = translateMood(capabilities.emotionVocabulary, mood);
        resolved.emotionAlpha = resolved.emotionAlpha ?? EMOTION_VECTOR_ALPHA;
      }
      if (capabilities.instructionText) {
        resolved.instructions = profile.instructions
          ? `${profile.instructions}，${params.instructionText}`
          : params.instructionText;
        resolved.optimizeInstructions = profile.optimizeInstructions ?? true;
      }
      return resolved;
    }

    if (switches.passBaseParams) {
      // rate/pitch/volume only; the backend infers the emotion itself
      return this.withNumericControls(profile, params, capabilities);
    }

    if (capabilities.instructionText) {
      const { instructions: _instructions, optimizeInstructions: _optimize, ...rest } = profile;
      return rest;
    }
    return { ...profile };
  }

  private withNumericControls(
    profile: VoiceProfile,
    params: MoodParameters,
    capabilities: MoodCapabilities,
  ): VoiceProfile {
    const resolved: VoiceProfile = { ...profile };
    for (const control of capabilities.numericControls) {
      if (resolved[control] === undefined) {
        resolved[control] = params[control];
      }
    }
    return resolved;
  }
}
