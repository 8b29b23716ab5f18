import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import axios, { AxiosResponse, isAxiosError, isCancel } from 'axios';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { firstValueFrom } from 'rxjs';
import {
  ApiError,
  CancelledError,
  ConfigurationError,
  DecodeError,
  parseErrorEnvelope,
  TransportError,
} from './text-to-voice.errors';
import {
  CREATE_VOICE_PATH,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  DESIGN_VOICE_PATH,
} from './text-to-voice.models';
import { CreateVoicePayload, CreateVoiceRequest } from './requests/create-voice.request';
import {
  DesignVoicePayload,
  DesignVoiceQuery,
  DesignVoiceRequest,
} from './requests/design-voice.request';
import { ExecuteOptions, flattenValidationErrors, requireText } from './requests/voice-request';
import { CreatedVoiceResult } from './responses/created-voice.response';
import { DesignedVoiceResult } from './responses/designed-voice.response';

export interface TextToVoiceClientOptions {
  baseUrl?: string;
  /** Per-request timeout in milliseconds. */
  timeout?: number;
  http?: HttpService;
}

/**
 * Entry point for the text-to-voice API. Holds only immutable configuration,
 * so one instance can serve any number of concurrent requests.
 *
 * ```ts
 * const client = new TextToVoiceClient(process.env.ELEVENLABS_API_KEY ?? '');
 * const designed = await client.designVoice('Calm narrator, late 40s, low and warm').execute();
 * const voice = await client
 *   .createVoice('Narrator', 'Calm narrator, late 40s, low and warm', designed.previews[0].generated_voice_id)
 *   .execute();
 * ```
 */
export class TextToVoiceClient {
  private readonly logger = new Logger(TextToVoiceClient.name);
  private readonly apiKey: string;
  private readonly http: HttpService;
  readonly baseUrl: string;
  readonly timeout: number;

  constructor(apiKey: string, options: TextToVoiceClientOptions = {}) {
    this.apiKey = requireText(apiKey, 'apiKey');

    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    if (!this.baseUrl) throw new ConfigurationError('baseUrl must not be empty');

    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(this.timeout) || this.timeout <= 0) {
      throw new ConfigurationError(`timeout must be a positive number, got ${this.timeout}`);
    }

    this.http = options.http ?? new HttpService(axios.create());
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env, http?: HttpService): TextToVoiceClient {
    const apiKey = env.ELEVENLABS_API_KEY ?? '';
    if (!apiKey) throw new ConfigurationError('ELEVENLABS_API_KEY not set');

    const timeout = env.ELEVENLABS_TIMEOUT_MS ? Number(env.ELEVENLABS_TIMEOUT_MS) : undefined;
    return new TextToVoiceClient(apiKey, { baseUrl: env.ELEVENLABS_BASE_URL || undefined, timeout, http });
  }

  designVoice(voiceDescription: string): DesignVoiceRequest {
    return new DesignVoiceRequest(this, voiceDescription);
  }

  createVoice(voiceName: string, voiceDescription: string, generatedVoiceId: string): CreateVoiceRequest {
    return new CreateVoiceRequest(this, voiceName, voiceDescription, generatedVoiceId);
  }

  /** @internal Called by DesignVoiceRequest.execute(). */
  sendDesignVoice(
    payload: DesignVoicePayload,
    query: DesignVoiceQuery,
    options: ExecuteOptions,
  ): Promise<DesignedVoiceResult> {
    return this.post(DESIGN_VOICE_PATH, payload, query, DesignedVoiceResult, options);
  }

  /** @internal Called by CreateVoiceRequest.execute(). */
  sendCreateVoice(payload: CreateVoicePayload, options: ExecuteOptions): Promise<CreatedVoiceResult> {
    return this.post(CREATE_VOICE_PATH, payload, {}, CreatedVoiceResult, options);
  }

  private async post<T extends object>(
    path: string,
    body: object,
    params: Record<string, string | undefined>,
    target: ClassConstructor<T>,
    options: ExecuteOptions,
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    this.logger.debug(`POST ${path}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await firstValueFrom(
        this.http.post<unknown>(url, body, {
          params,
          headers: {
            'xi-api-key': this.apiKey,
            'Content-Type': 'application/json',
            Accept: 'application/json',
          },
          timeout: this.timeout,
          signal: options.signal,
          // Raw text keeps the body available for DecodeError; every status is mapped below.
          responseType: 'text',
          validateStatus: () => true,
        }),
      );
    } catch (err: unknown) {
      if (isCancel(err) || options.signal?.aborted) {
        throw new CancelledError(`POST ${path} was cancelled`, err);
      }
      const detail = isAxiosError(err) ? `${err.code ?? 'ERR_NETWORK'}: ${err.message}` : String(err);
      this.logger.warn(`POST ${path} failed: ${detail}`);
      throw new TransportError(`POST ${path} failed: ${detail}`, { cause: err });
    }

    const raw = rawBody(response.data);
    const data = parseJson(raw);

    if (response.status < 200 || response.status >= 300) {
      const envelope = parseErrorEnvelope(data);
      this.logger.warn(`POST ${path} returned ${response.status}`);
      if (!envelope) {
        throw new TransportError(`POST ${path} returned ${response.status}`, {
          status: response.status,
          body: raw,
        });
      }
      throw ApiError.from(response.status, envelope, raw, retryAfterSeconds(response));
    }

    return decode(target, data, raw);
  }
}

function rawBody(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return JSON.stringify(data);
}

function parseJson(raw: string): unknown {
  if (!raw) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function retryAfterSeconds(response: AxiosResponse<unknown>): number | undefined {
  const header: unknown = response.headers['retry-after'];
  if (typeof header !== 'string' && typeof header !== 'number') return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

export function decode<T extends object>(target: ClassConstructor<T>, data: unknown, raw: string): T {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new DecodeError(`Expected a JSON object for ${target.name}`, raw);
  }

  const instance = plainToInstance(target, data);
  const issues = flattenValidationErrors(validateSync(instance, { forbidUnknownValues: false }));
  if (issues.length > 0) {
    throw new DecodeError(`Response does not match ${target.name}: ${issues.join('; ')}`, raw, issues);
  }
  return instance;
}
