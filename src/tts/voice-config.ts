import { BackendName } from './tts.interfaces';

export function getQwenDefaultVoices(): { primary: string; secondary: string } {
  return { primary: 'Ethan', secondary: 'Cherry' };
}

export function getSiliconFlowDefaultVoices(): { primary: string; secondary: string } {
  return { primary: 'alex', secondary: 'anna' };
}

export function getMiniMaxDefaultVoices(): { primary: string; secondary: string } {
  return { primary: 'Chinese (Mandarin)_Reliable_Executive', secondary: 'female-shaonv' };
}

export function getDefaultVoices(provider: BackendName): { primary: string; secondary: string } {
  switch (provider) {
    case 'qwen':
      return getQwenDefaultVoices();
    case 'siliconflow':
      return getSiliconFlowDefaultVoices();
    case 'minimax':
      return getMiniMaxDefaultVoices();
  }
}
