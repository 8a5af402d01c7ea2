import axios, { AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DecodeError } from '../common/errors';
import { requireApiKey } from '../config/synthesis.config';
import { DialogueLine, ReferenceAudio, Speaker, SynthesisOutcome, VoiceProfile } from '../domain/types';
import { MoodCapabilities } from '../mood/mood-profiles';
import { collectNdjsonAudio } from './ndjson-audio';
import {
  bearerHeaders,
  decodeBase64,
  isRecord,
  requestTimeoutMs,
  toFailure,
  trimTrailingSlash,
} from './provider-http';
import { BackendName, JointDialogueProvider } from './tts.interfaces';
import { DEFAULT_REFERENCE_BASE_URL, fallbackReferencePair, shareReferences } from './voice-references';

const DIALOGUE_TIMEOUT_MS = 180_000;

const SPEAKER_TAGS: Record<Speaker, string> = {
  primary: '[S1]',
  secondary: '[S2]',
};

const EMOTION_EXTRAS = ['emo_audio_prompt', 'use_emo_text'];

@Injectable()
export class SiliconFlowTtsProvider implements JointDialogueProvider {
  readonly name: BackendName = 'siliconflow';
  readonly model: string;
  readonly moodCapabilities: MoodCapabilities;
  readonly supportsJointDialogue: boolean;
  private readonly logger = new Logger(SiliconFlowTtsProvider.name);
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly referenceBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly isIndexTts: boolean;

  constructor(
    private readonly configService: ConfigService,
    private readonly http: AxiosInstance = axios.create(),
  ) {
    this.apiKey = requireApiKey(this.configService, 'SILICONFLOW_API_KEY');
    this.baseUrl = trimTrailingSlash(
      this.configService.get<string>('SILICONFLOW_BASE_URL') || 'https://api.siliconflow.cn/v1',
    );
    this.referenceBaseUrl =
      this.configService.get<string>('SILICONFLOW_REFERENCE_BASE_URL') || DEFAULT_REFERENCE_BASE_URL;
    this.model = this.configService.get<string>('SILICONFLOW_TTS_MODEL') || 'IndexTeam/IndexTTS-2';
    this.timeoutMs = requestTimeoutMs(this.configService);
    this.isIndexTts = this.model.includes('IndexTTS');
    this.supportsJointDialogue = this.model.includes('MOSS-TTSD');
    this.moodCapabilities = {
      numericControls: ['speechRate'],
      emotionLabel: false,
      instructionText: false,
      emotionVocabulary: this.isIndexTts ? 'indextts' : undefined,
    };
  }

  async synthesize(text: string, profile: VoiceProfile): Promise<SynthesisOutcome> {
    try {
      const audio = await this.postForAudio(this.buildSpeechPayload(text, profile), this.timeoutMs);
      return { ok: true, audio };
    } catch (error) {
      const failure = toFailure(error);
      this.logger.warn(`SiliconFlow TTS request failed: ${failure.reason}`);
      return failure;
    }
  }

  async synthesizeStreaming(text: string, profile: VoiceProfile): Promise<SynthesisOutcome> {
    try {
      const response = await this.http.post<Readable>(
        this.endpoint(),
        { ...this.buildSpeechPayload(text, profile), stream: true },
        { headers: bearerHeaders(this.apiKey), responseType: 'stream', timeout: this.timeoutMs },
      );
      const audio = await collectNdjsonAudio(response.data, extractStreamAudio);
      if (!audio.length) {
        throw new DecodeError('Stream carried no audio');
      }
      return { ok: true, audio };
    } catch (error) {
      const failure = toFailure(error);
      this.logger.warn(`SiliconFlow TTS stream failed: ${failure.reason}`);
      return failure;
    }
  }

  async synthesizeDialogue(
    lines: DialogueLine[],
    references: Partial<Record<Speaker, ReferenceAudio>>,
    profile: VoiceProfile,
  ): Promise<SynthesisOutcome> {
    if (!this.supportsJointDialogue) {
      return { ok: false, reason: `Model ${this.model} cannot render a joint dialogue` };
    }
    try {
      const payload = this.buildDialoguePayload(lines, references, profile);
      this.logger.log(`Rendering ${lines.length} dialogue lines in one request (${String(payload.input).length} chars)`);
      const audio = await this.postForAudio(payload, DIALOGUE_TIMEOUT_MS);
      return { ok: true, audio };
    } catch (error) {
      const failure = toFailure(error);
      this.logger.warn(`SiliconFlow dialogue request failed: ${failure.reason}`);
      return failure;
    }
  }

  buildSpeechPayload(text: string, profile: VoiceProfile): Record<string, unknown> {
    const payload: Record<string, unknown> = {
      model: this.model,
      input: text,
      voice: this.qualifyVoice(profile.voice),
      response_format: profile.responseFormat ?? 'wav',
    };
    this.applyCommonOptions(payload, profile);
    if (profile.references?.length) {
      payload.references = profile.references;
    }

    if (this.isIndexTts) {
      if (profile.emotionVector !== undefined) {
        payload.emo_vector = profile.emotionVector;
      }
      if (profile.emotionAlpha !== undefined) {
        payload.emo_alpha = profile.emotionAlpha;
      }
      const extras = profile.extras ?? {};
      for (const key of EMOTION_EXTRAS) {
        if (extras[key] !== undefined) {
          payload[key] = extras[key];
        }
      }
    }
    return payload;
  }

  buildDialoguePayload(
    lines: DialogueLine[],
    references: Partial<Record<Speaker, ReferenceAudio>>,
    profile: VoiceProfile,
  ): Record<string, unknown> {
    const shared = shareReferences(references);
    const pair =
      shared.primary && shared.secondary
        ? [shared.primary, shared.secondary]
        : fallbackReferencePair(profile.voice, this.referenceBaseUrl);

    const payload: Record<string, unknown> = {
      model: this.model,
      input: lines.map((line) => `${SPEAKER_TAGS[line.speaker]}${line.text}`).join(''),
      response_format: profile.responseFormat ?? 'wav',
      references: pair,
    };
    this.applyCommonOptions(payload, profile);
    const maxTokens = profile.extras?.max_tokens;
    if (maxTokens !== undefined) {
      payload.max_tokens = maxTokens;
    }
    return payload;
  }

  private applyCommonOptions(payload: Record<string, unknown>, profile: VoiceProfile): void {
    if (profile.speechRate !== undefined) {
      payload.speed = profile.speechRate;
    }
    if (profile.gain !== undefined) {
      payload.gain = profile.gain;
    }
    if (profile.sampleRate !== undefined) {
      payload.sample_rate = profile.sampleRate;
    }
  }

  private qualifyVoice(voice: string): string {
    return voice && !voice.startsWith(this.model) ? `${this.model}:${voice}` : voice;
  }

  private endpoint(): string {
    return `${this.baseUrl}/audio/speech`;
  }

  private async postForAudio(payload: Record<string, unknown>, timeout: number): Promise<Buffer> {
    const response = await this.http.post<ArrayBuffer>(this.endpoint(), payload, {
      headers: bearerHeaders(this.apiKey),
      responseType: 'arraybuffer',
      timeout,
    });
    const audio = Buffer.from(response.data);
    if (!audio.length) {
      throw new DecodeError('Response body carried no audio');
    }
    return audio;
  }
}

function extractStreamAudio(payload: unknown): Buffer | undefined {
  if (isRecord(payload) && typeof payload.audio === 'string' && payload.audio) {
    return decodeBase64(payload.audio);
  }
  return undefined;
}
