import { Readable } from 'stream';
import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../common/errors';
import { createFakeHttp, ndjson } from '../testing/fake-http';
import { SiliconFlowTtsProvider } from './siliconflow-tts.provider';
import { FALLBACK_REFERENCE_TRANSCRIPT } from './voice-references';

const ENDPOINT = 'https://api.siliconflow.cn/v1/audio/speech';
const TEMPLATE_ROOT = 'https://sf-maas-uat-prod.oss-cn-shanghai.aliyuncs.com/voice_template';

function config(values: Record<string, string> = {}): ConfigService {
  return new ConfigService({ SILICONFLOW_API_KEY: 'test-secret', ...values });
}

describe('SiliconFlowTtsProvider', () => {
  it('refuses to start without a key', () => {
    expect(() => new SiliconFlowTtsProvider(new ConfigService({}))).toThrow(ConfigurationError);
  });

  it('posts a speech request and returns the binary body', async () => {
    const { http, requests } = createFakeHttp(() => ({ data: Buffer.from('WAVE') }));
    const provider = new SiliconFlowTtsProvider(config(), http);

    const outcome = await provider.synthesize('hello', {
      voice: 'alex',
      speechRate: 1.1,
      emotionVector: 'Happy',
      emotionAlpha: 0.7,
      extras: { use_emo_text: false, unrelated: 1 },
    });

    expect(outcome).toEqual({ ok: true, audio: Buffer.from('WAVE') });
    expect(requests[0].url).toBe(ENDPOINT);
    expect(requests[0].responseType).toBe('arraybuffer');
    expect(requests[0].body).toEqual({
      model: 'IndexTeam/IndexTTS-2',
      input: 'hello',
      voice: 'IndexTeam/IndexTTS-2:alex',
      response_format: 'wav',
      speed: 1.1,
      emo_vector: 'Happy',
      emo_alpha: 0.7,
      use_emo_text: false,
    });
  });

  it('leaves emotion fields out for models without emotion vectors', async () => {
    const { http, requests } = createFakeHttp(() => ({ data: Buffer.from('WAVE') }));
    const provider = new SiliconFlowTtsProvider(config({ SILICONFLOW_TTS_MODEL: 'FunAudioLLM/CosyVoice2-0.5B' }), http);

    await provider.synthesize('hello', {
      voice: 'FunAudioLLM/CosyVoice2-0.5B:anna',
      emotionVector: 'Sad',
      references: [{ audio: 'https://files.example.test/ref.mp3', text: 'sample' }],
    });

    expect(provider.moodCapabilities.emotionVocabulary).toBeUndefined();
    expect(requests[0].body).toEqual({
      model: 'FunAudioLLM/CosyVoice2-0.5B',
      input: 'hello',
      voice: 'FunAudioLLM/CosyVoice2-0.5B:anna',
      response_format: 'wav',
      references: [{ audio: 'https://files.example.test/ref.mp3', text: 'sample' }],
    });
  });

  it('treats an empty body as a failure', async () => {
    const { http } = createFakeHttp(() => ({ data: Buffer.alloc(0) }));
    const provider = new SiliconFlowTtsProvider(config(), http);

    await expect(provider.synthesize('hello', { voice: 'alex' })).resolves.toEqual({
      ok: false,
      reason: 'Response body carried no audio',
    });
  });

  it('reads the error message from a JSON error body', async () => {
    const { http } = createFakeHttp(() => ({
      status: 429,
      data: Buffer.from(JSON.stringify({ error: { message: 'TPM limit reached' } })),
    }));
    const provider = new SiliconFlowTtsProvider(config(), http);

    await expect(provider.synthesize('hello', { voice: 'alex' })).resolves.toEqual({
      ok: false,
      reason: 'HTTP 429: TPM limit reached',
    });
  });

  it('decodes streamed base64 audio', async () => {
    const body = ndjson({ audio: Buffer.from('one').toString('base64') }, '{"audio":', {
      audio: Buffer.from('two').toString('base64'),
    });
    const { http } = createFakeHttp(() => ({ data: Readable.from([body]) }));
    const provider = new SiliconFlowTtsProvider(config(), http);

    await expect(provider.synthesizeStreaming('hello', { voice: 'alex' })).resolves.toEqual({
      ok: true,
      audio: Buffer.from('onetwo'),
    });
  });

  describe('joint dialogue', () => {
    const lines = [
      { speaker: 'primary' as const, text: '你好。' },
      { speaker: 'secondary' as const, text: '嗨！' },
    ];

    it('is only offered by dialogue models', () => {
      const { http } = createFakeHttp(() => ({ data: Buffer.from('x') }));

      expect(new SiliconFlowTtsProvider(config(), http).supportsJointDialogue).toBe(false);
      expect(
        new SiliconFlowTtsProvider(config({ SILICONFLOW_TTS_MODEL: 'fnlp/MOSS-TTSD-v0.5' }), http).supportsJointDialogue,
      ).toBe(true);
    });

    it('tags each line and sends both references', async () => {
      const { http, requests } = createFakeHttp(() => ({ data: Buffer.from('DIALOGUE') }));
      const provider = new SiliconFlowTtsProvider(config({ SILICONFLOW_TTS_MODEL: 'fnlp/MOSS-TTSD-v0.5' }), http);
      const host = { audio: 'https://files.example.test/host.mp3', text: 'host sample' };
      const guest = { audio: 'data:audio/wav;base64,AAAA', text: 'guest sample' };

      const outcome = await provider.synthesizeDialogue(lines, { primary: host, secondary: guest }, { voice: 'alex' });

      expect(outcome).toEqual({ ok: true, audio: Buffer.from('DIALOGUE') });
      expect(requests[0].timeout).toBe(180000);
      expect(requests[0].body).toEqual({
        model: 'fnlp/MOSS-TTSD-v0.5',
        input: '[S1]你好。[S2]嗨！',
        response_format: 'wav',
        references: [host, guest],
      });
    });

    it('reuses a single reference for both speakers', async () => {
      const { http, requests } = createFakeHttp(() => ({ data: Buffer.from('DIALOGUE') }));
      const provider = new SiliconFlowTtsProvider(config({ SILICONFLOW_TTS_MODEL: 'fnlp/MOSS-TTSD-v0.5' }), http);
      const guest = { audio: 'https://files.example.test/guest.mp3', text: 'guest sample' };

      await provider.synthesizeDialogue(lines, { secondary: guest }, { voice: 'alex' });

      expect(requests[0].body).toMatchObject({ references: [guest, guest] });
    });

    it('falls back to the template pool keyed by the voice name', async () => {
      const { http, requests } = createFakeHttp(() => ({ data: Buffer.from('DIALOGUE') }));
      const provider = new SiliconFlowTtsProvider(config({ SILICONFLOW_TTS_MODEL: 'fnlp/MOSS-TTSD-v0.5' }), http);

      await provider.synthesizeDialogue(lines, {}, { voice: 'fnlp/MOSS-TTSD-v0.5:benjamin', speechRate: 0.9 });

      expect(requests[0].body).toEqual({
        model: 'fnlp/MOSS-TTSD-v0.5',
        input: '[S1]你好。[S2]嗨！',
        response_format: 'wav',
        speed: 0.9,
        references: [
          { audio: `${TEMPLATE_ROOT}/fish_audio-Benjamin.mp3`, text: FALLBACK_REFERENCE_TRANSCRIPT },
          { audio: `${TEMPLATE_ROOT}/fish_audio-Anna.mp3`, text: FALLBACK_REFERENCE_TRANSCRIPT },
        ],
      });
    });

    it('refuses joint dialogue on other models', async () => {
      const { http, requests } = createFakeHttp(() => ({ data: Buffer.from('x') }));
      const provider = new SiliconFlowTtsProvider(config(), http);

      const outcome = await provider.synthesizeDialogue(lines, {}, { voice: 'alex' });

      expect(outcome).toEqual({ ok: false, reason: 'Model IndexTeam/IndexTTS-2 cannot render a joint dialogue' });
      expect(requests).toHaveLength(0);
    });
  });
});
