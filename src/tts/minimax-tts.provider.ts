import axios, { AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DecodeError, TransportError } from '../common/errors';
import { requireApiKey } from '../config/synthesis.config';
import { SynthesisOutcome, VoiceProfile } from '../domain/types';
import { MoodCapabilities } from '../mood/mood-profiles';
import { collectNdjsonAudio } from './ndjson-audio';
import {
  bearerHeaders,
  extractBackendMessage,
  isRecord,
  requestTimeoutMs,
  toFailure,
  trimTrailingSlash,
} from './provider-http';
import { BackendName, TtsProvider } from './tts.interfaces';

const PASSTHROUGH_EXTRAS = ['language_boost', 'pronunciation_dict', 'voice_modify'];

const RATE_LIMITED = /rate limit|rpm/i;

export function isRateLimitMessage(reason: string): boolean {
  return RATE_LIMITED.test(reason);
}

export function decodeHexAudio(value: string): Buffer {
  const hex = value.startsWith('0x') || value.startsWith('0X') ? value.slice(2) : value;
  if (!hex || hex.length % 2 !== 0 || /[^0-9a-f]/i.test(hex)) {
    throw new DecodeError('Audio payload is not valid hex');
  }
  return Buffer.from(hex, 'hex');
}

/**
 * MiniMax T2A v2. Audio comes back hex-encoded inside a JSON envelope; failures are reported
 * through `base_resp` even on HTTP 200.
 */
@Injectable()
export class MiniMaxTtsProvider implements TtsProvider {
  readonly name: BackendName = 'minimax';
  readonly model: string;
  readonly moodCapabilities: MoodCapabilities = {
    numericControls: ['speechRate', 'pitchOffset', 'volumeMultiplier'],
    emotionLabel: true,
    instructionText: false,
  };
  private readonly logger = new Logger(MiniMaxTtsProvider.name);
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly groupId?: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly http: AxiosInstance = axios.create(),
  ) {
    this.apiKey = requireApiKey(this.configService, 'MINIMAX_API_KEY');
    this.baseUrl = trimTrailingSlash(this.configService.get<string>('MINIMAX_BASE_URL') || 'https://api.minimax.chat');
    this.model = this.configService.get<string>('MINIMAX_TTS_MODEL') || 'speech-2.6-hd';
    this.groupId = this.configService.get<string>('MINIMAX_GROUP_ID') || undefined;
    this.timeoutMs = requestTimeoutMs(this.configService);
    if (!this.groupId) {
      this.logger.warn('MINIMAX_GROUP_ID is not set; the MiniMax API may reject requests without it');
    }
  }

  async synthesize(text: string, profile: VoiceProfile): Promise<SynthesisOutcome> {
    try {
      const response = await this.http.post<unknown>(this.endpoint(), this.buildPayload(text, profile), {
        headers: bearerHeaders(this.apiKey),
        timeout: this.timeoutMs,
      });
      const envelope = response.data;
      const data = isRecord(envelope) ? envelope.data : undefined;
      if (isRecord(data) && typeof data.audio === 'string' && data.audio) {
        return { ok: true, audio: decodeHexAudio(data.audio) };
      }
      throw new TransportError(extractBackendMessage(envelope) ?? 'Response carries no audio');
    } catch (error) {
      const failure = toFailure(error, isRateLimitMessage);
      this.logger.warn(
        `MiniMax TTS request failed: ${failure.reason}${failure.rateLimited ? ' (raise TTS_REQUEST_DELAY_SECONDS)' : ''}`,
      );
      return failure;
    }
  }

  async synthesizeStreaming(text: string, profile: VoiceProfile): Promise<SynthesisOutcome> {
    try {
      const response = await this.http.post<Readable>(this.endpoint(), this.buildPayload(text, profile, true), {
        headers: bearerHeaders(this.apiKey),
        responseType: 'stream',
        timeout: this.timeoutMs,
      });
      const audio = await collectNdjsonAudio(response.data, extractStreamAudio);
      if (!audio.length) {
        throw new DecodeError('Stream carried no audio');
      }
      return { ok: true, audio };
    } catch (error) {
      const failure = toFailure(error, isRateLimitMessage);
      this.logger.warn(`MiniMax TTS stream failed: ${failure.reason}`);
      return failure;
    }
  }

  buildPayload(text: string, profile: VoiceProfile, stream = false): Record<string, unknown> {
    const voiceSetting: Record<string, unknown> = { voice_id: profile.voice };
    if (profile.speechRate !== undefined) {
      voiceSetting.speed = profile.speechRate;
    }
    if (profile.volumeMultiplier !== undefined) {
      voiceSetting.vol = profile.volumeMultiplier;
    }
    if (profile.pitchOffset !== undefined) {
      voiceSetting.pitch = Math.round(profile.pitchOffset);
    }
    if (profile.emotion !== undefined) {
      voiceSetting.emotion = profile.emotion;
    }

    const extras = profile.extras ?? {};
    const payload: Record<string, unknown> = {
      model: this.model,
      text,
      stream,
      voice_setting: voiceSetting,
      audio_setting: {
        sample_rate: profile.sampleRate ?? 32000,
        bitrate: typeof extras.bitrate === 'number' ? extras.bitrate : 128000,
        format: profile.responseFormat ?? 'wav',
        channel: typeof extras.channel === 'number' ? extras.channel : 1,
      },
    };
    for (const key of PASSTHROUGH_EXTRAS) {
      if (extras[key] !== undefined) {
        payload[key] = extras[key];
      }
    }
    return payload;
  }

  private endpoint(): string {
    const url = `${this.baseUrl}/v1/t2a_v2`;
    return this.groupId ? `${url}?GroupId=${encodeURIComponent(this.groupId)}` : url;
  }
}

function extractStreamAudio(payload: unknown): Buffer | undefined {
  const data = isRecord(payload) ? payload.data : undefined;
  if (isRecord(data) && typeof data.audio === 'string' && data.audio) {
    return decodeHexAudio(data.audio);
  }
  return undefined;
}
