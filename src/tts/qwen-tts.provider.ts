import axios, { AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DecodeError } from '../common/errors';
import { requireApiKey } from '../config/synthesis.config';
import { SynthesisOutcome, VoiceProfile } from '../domain/types';
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
import { BackendName, TtsProvider } from './tts.interfaces';

/**
 * DashScope multimodal generation. The response points at the rendered audio by URL, which
 * is fetched, or carries it inline as base64.
 */
@Injectable()
export class QwenTtsProvider implements TtsProvider {
  readonly name: BackendName = 'qwen';
  readonly model: string;
  readonly moodCapabilities: MoodCapabilities;
  private readonly logger = new Logger(QwenTtsProvider.name);
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly http: AxiosInstance = axios.create(),
  ) {
    this.apiKey = requireApiKey(this.configService, 'QWEN_API_KEY');
    this.baseUrl = trimTrailingSlash(
      this.configService.get<string>('QWEN_BASE_URL') || 'https://dashscope.aliyuncs.com/api/v1',
    );
    this.model = this.configService.get<string>('QWEN_TTS_MODEL') || 'qwen3-tts-flash';
    this.timeoutMs = requestTimeoutMs(this.configService);
    // only the instruct models take style direction
    this.moodCapabilities = {
      numericControls: [],
      emotionLabel: false,
      instructionText: this.model.includes('instruct'),
    };
  }

  async synthesize(text: string, profile: VoiceProfile): Promise<SynthesisOutcome> {
    try {
      const response = await this.http.post<unknown>(this.endpoint(), this.buildPayload(text, profile), {
        headers: bearerHeaders(this.apiKey),
        timeout: this.timeoutMs,
      });
      const audio = await this.extractAudio(response.data);
      return { ok: true, audio };
    } catch (error) {
      const failure = toFailure(error);
      this.logger.warn(`Qwen TTS request failed: ${failure.reason}`);
      return failure;
    }
  }

  async synthesizeStreaming(text: string, profile: VoiceProfile): Promise<SynthesisOutcome> {
    try {
      const response = await this.http.post<Readable>(this.endpoint(), this.buildPayload(text, profile, true), {
        headers: { ...bearerHeaders(this.apiKey), 'X-DashScope-SSE': 'enable' },
        responseType: 'stream',
        timeout: this.timeoutMs,
      });
      const audio = await collectNdjsonAudio(response.data, extractStreamAudio);
      if (!audio.length) {
        throw new DecodeError('Stream carried no audio');
      }
      return { ok: true, audio };
    } catch (error) {
      const failure = toFailure(error);
      this.logger.warn(`Qwen TTS stream failed: ${failure.reason}`);
      return failure;
    }
  }

  buildPayload(text: string, profile: VoiceProfile, stream = false): Record<string, unknown> {
    const input: Record<string, unknown> = {
      text,
      voice: profile.voice,
      language_type: profile.languageType ?? 'Chinese',
    };
    if (this.moodCapabilities.instructionText && profile.instructions) {
      input.instructions = profile.instructions;
      input.optimize_instructions = profile.optimizeInstructions ?? true;
    }

    const payload: Record<string, unknown> = { model: this.model, input };
    if (stream) {
      payload.stream = true;
    }
    return payload;
  }

  private endpoint(): string {
    return `${this.baseUrl}/services/aigc/multimodal-generation/generation`;
  }

  private async extractAudio(data: unknown): Promise<Buffer> {
    const output = isRecord(data) ? data.output : undefined;
    const audio = isRecord(output) ? output.audio : undefined;
    if (!isRecord(audio)) {
      throw new DecodeError('Response has no output.audio');
    }

    if (typeof audio.url === 'string' && audio.url) {
      const download = await this.http.get<ArrayBuffer>(audio.url, {
        responseType: 'arraybuffer',
        timeout: this.timeoutMs,
      });
      const buffer = Buffer.from(download.data);
      if (!buffer.length) {
        throw new DecodeError(`Audio download from ${audio.url} was empty`);
      }
      return buffer;
    }
    if (typeof audio.data === 'string' && audio.data) {
      return decodeBase64(audio.data);
    }
    throw new DecodeError('Response carries neither an audio URL nor inline audio data');
  }
}

function extractStreamAudio(payload: unknown): Buffer | undefined {
  const output = isRecord(payload) ? payload.output : undefined;
  const audio = isRecord(output) ? output.audio : undefined;
  if (typeof audio === 'string' && audio) {
    return decodeBase64(audio);
  }
  if (isRecord(audio) && typeof audio.data === 'string' && audio.data) {
    return decodeBase64(audio.data);
  }
  return undefined;
}
