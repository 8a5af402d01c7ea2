export const TTS_PROVIDER_TOKEN = 'TTS_PROVIDER';
