import axios from 'axios';
import { ConfigService } from '@nestjs/config';
import { DecodeError, describeError, TransportError } from '../common/errors';
import { SynthesisOutcome } from '../domain/types';

export type SynthesisFailure = Extract<SynthesisOutcome, { ok: false }>;

const BASE64 = /^[A-Za-z0-9+/_-]+={0,2}$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function bearerHeaders(apiKey: string): Record<string, string> {
  return {
    Authorization: `Bearer ${apiKey}`,
    'Content-Type': 'application/json',
  };
}

/**
 * Pulls the backend's own error text out of a JSON error body, whichever response type the
 * request asked for.
 */
export function extractBackendMessage(data: unknown): string | undefined {
  let payload = data;
  if (Buffer.isBuffer(payload)) {
    payload = payload.toString('utf-8');
  }
  if (typeof payload === 'string') {
    const text = payload.trim();
    if (!text) {
      return undefined;
    }
    try {
      payload = JSON.parse(text);
    } catch {
      return text.slice(0, 200);
    }
  }
  if (!isRecord(payload)) {
    return undefined;
  }

  const nested = payload.error;
  if (isRecord(nested) && typeof nested.message === 'string') {
    return nested.message;
  }
  if (typeof nested === 'string') {
    return nested;
  }
  if (typeof payload.message === 'string') {
    return payload.message;
  }
  const baseResp = payload.base_resp;
  if (isRecord(baseResp) && typeof baseResp.status_msg === 'string') {
    return baseResp.status_msg;
  }
  return undefined;
}

export function describeHttpError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (!status) {
      return error.message;
    }
    const detail = extractBackendMessage(error.response?.data);
    return detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}`;
  }
  if (error instanceof TransportError && error.status) {
    return `HTTP ${error.status}: ${error.message}`;
  }
  return describeError(error);
}

export function toFailure(error: unknown, isRateLimited?: (reason: string) => boolean): SynthesisFailure {
  const reason = describeHttpError(error);
  return isRateLimited?.(reason) ? { ok: false, reason, rateLimited: true } : { ok: false, reason };
}

export function requestTimeoutMs(configService: ConfigService, fallbackSeconds = 120): number {
  const seconds = Number(configService.get<string>('TTS_REQUEST_TIMEOUT_SECONDS')) || fallbackSeconds;
  return seconds * 1000;
}

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export function decodeBase64(value: string): Buffer {
  const compact = value.replace(/\s+/g, '');
  if (!compact || !BASE64.test(compact)) {
    throw new DecodeError('Audio payload is not valid base64');
  }
  return Buffer.from(compact, 'base64');
}
