import { MoodCapabilities } from './mood-profiles';
import { MoodProfileResolver } from './mood-profile.resolver';

const numericAndLabel: MoodCapabilities = {
  numericControls: ['speechRate', 'pitchOffset', 'volumeMultiplier'],
  emotionLabel: true,
  instructionText: false,
};

const instructionOnly: MoodCapabilities = {
  numericControls: [],
  emotionLabel: false,
  instructionText: true,
};

const rateWithVector: MoodCapabilities = {
  numericControls: ['speechRate'],
  emotionLabel: false,
  instructionText: false,
  emotionVocabulary: 'indextts',
};

describe('MoodProfileResolver', () => {
  const resolver = new MoodProfileResolver();
  const textMood = { useTextMood: true, passBaseParams: false };
  const baseOnly = { useTextMood: false, passBaseParams: true };
  const neither = { useTextMood: false, passBaseParams: false };

  it('maps a mood onto numeric controls and an emotion label', () => {
    const profile = resolver.resolve('sad', { voice: 'v1' }, numericAndLabel, textMood);

    expect(profile).toEqual({
      voice: 'v1',
      speechRate: 0.8,
      pitchOffset: -6,
      volumeMultiplier: 0.9,
      emotion: 'sad',
    });
  });

  it('lets explicit profile fields win over mood-derived ones', () => {
    const profile = resolver.resolve(
      'angry',
      { voice: 'v1', speechRate: 0.95, emotion: 'calm' },
      numericAndLabel,
      textMood,
    );

    expect(profile.speechRate).toBe(0.95);
    expect(profile.emotion).toBe('calm');
    expect(profile.pitchOffset).toBe(-4);
    expect(profile.volumeMultiplier).toBe(1.2);
  });

  it('appends mood instructions to the profile instructions', () => {
    const profile = resolver.resolve(
      'happy',
      { voice: 'Cherry', instructions: 'young voice' },
      instructionOnly,
      textMood,
    );

    expect(profile).toEqual({
      voice: 'Cherry',
      instructions: 'young voice，语速稍快，语气轻快愉悦',
      optimizeInstructions: true,
    });
  });

  it('uses the mood instruction alone when the profile has none', () => {
    const profile = resolver.resolve('gentle', { voice: 'Cherry' }, instructionOnly, textMood);

    expect(profile.instructions).toBe('语速适中，语气温柔平和');
  });

  it('adds an emotion vector from the vocabulary with the default intensity', () => {
    const profile = resolver.resolve('confused', { voice: 'alex' }, rateWithVector, textMood);

    expect(profile).toEqual({ voice: 'alex', speechRate: 0.9, emotionVector: 'Surprised', emotionAlpha: 0.7 });
  });

  it('passes only numeric controls when base params are requested', () => {
    const profile = resolver.resolve('shocked', { voice: 'v1' }, numericAndLabel, baseOnly);

    expect(profile).toEqual({ voice: 'v1', speechRate: 1.2, pitchOffset: 8, volumeMultiplier: 1.1 });
  });

  it('keeps profile instructions for an instruction backend in base-params mode', () => {
    const profile = resolver.resolve('sad', { voice: 'Cherry', instructions: 'young voice' }, instructionOnly, baseOnly);

    expect(profile).toEqual({ voice: 'Cherry', instructions: 'young voice' });
  });

  it('adds nothing when both switches are off', () => {
    expect(resolver.resolve('angry', { voice: 'v1' }, numericAndLabel, neither)).toEqual({ voice: 'v1' });
    expect(resolver.resolve('angry', { voice: 'alex' }, rateWithVector, neither)).toEqual({ voice: 'alex' });
  });

  it('drops profile instructions on an instruction backend when both switches are off', () => {
    const profile = resolver.resolve(
      'angry',
      { voice: 'Cherry', instructions: 'young voice', optimizeInstructions: true },
      instructionOnly,
      neither,
    );

    expect(profile).toEqual({ voice: 'Cherry' });
  });

  it('does not mutate the input profile', () => {
    const input = { voice: 'v1' };
    resolver.resolve('happy', input, numericAndLabel, textMood);

    expect(input).toEqual({ voice: 'v1' });
  });
});
