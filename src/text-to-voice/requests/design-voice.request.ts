import { IsBoolean, IsInt, IsNumber, IsOptional, IsString, Min } from 'class-validator';
import type { TextToVoiceClient } from '../text-to-voice.client';
import type { OutputFormat } from '../text-to-voice.models';
import type { DesignedVoiceResult } from '../responses/designed-voice.response';
import { ExecuteOptions, requireText, VoiceRequest } from './voice-request';

/**
 * Wire body of a design call. Numeric values are only checked for type;
 * the service owns their ranges.
 */
export class DesignVoicePayload {
  @IsString()
  voice_description!: string;

  @IsOptional() @IsString()
  model_id?: string;

  @IsOptional() @IsString()
  text?: string;

  @IsOptional() @IsBoolean()
  auto_generate_text?: boolean;

  @IsOptional() @IsNumber()
  loudness?: number;

  @IsOptional() @IsInt() @Min(0)
  seed?: number;

  @IsOptional() @IsInt() @Min(0)
  guidance_scale?: number;

  @IsOptional() @IsBoolean()
  stream_previews?: boolean;

  @IsOptional() @IsString()
  remixing_session_id?: string;

  @IsOptional() @IsString()
  remixing_session_iteration_id?: string;

  @IsOptional() @IsNumber()
  quality?: number;

  @IsOptional() @IsString()
  reference_audio_base64?: string;

  @IsOptional() @IsNumber()
  prompt_strength?: number;
}

export type DesignVoiceQuery = {
  output_format?: OutputFormat;
};

export class DesignVoiceRequest extends VoiceRequest<DesignVoicePayload, DesignedVoiceResult> {
  private format?: OutputFormat;

  constructor(
    private readonly client: TextToVoiceClient,
    voiceDescription: string,
  ) {
    const fields = new DesignVoicePayload();
    fields.voice_description = requireText(voiceDescription, 'voice_description');
    super(fields);
  }

  get voiceDescription(): string {
    return this.fields.voice_description;
  }

  /** Sent as a query parameter, e.g. `mp3_44100_128`. */
  outputFormat(format: OutputFormat): this {
    this.assertConfigurable('output_format');
    this.format = format;
    return this;
  }

  model(modelId: string): this {
    return this.set('model_id', modelId);
  }

  /** Preview text; the service expects 100 to 1000 characters. */
  text(text: string): this {
    return this.set('text', text);
  }

  autoGenerateText(enabled: boolean): this {
    return this.set('auto_generate_text', enabled);
  }

  /** -1 is quietest, 1 loudest. */
  loudness(loudness: number): this {
    return this.set('loudness', loudness);
  }

  seed(seed: number): this {
    return this.set('seed', seed);
  }

  guidanceScale(scale: number): this {
    return this.set('guidance_scale', scale);
  }

  /** When true, previews come back as ids only and are streamed separately. */
  streamPreviews(enabled: boolean): this {
    return this.set('stream_previews', enabled);
  }

  remixingSessionId(id: string): this {
    return this.set('remixing_session_id', id);
  }

  remixingSessionIterationId(id: string): this {
    return this.set('remixing_session_iteration_id', id);
  }

  quality(quality: number): this {
    return this.set('quality', quality);
  }

  referenceAudioBase64(audio: string): this {
    return this.set('reference_audio_base64', audio);
  }

  /** Balance of prompt against reference audio, 0 to 1. */
  promptStrength(strength: number): this {
    return this.set('prompt_strength', strength);
  }

  payload(): DesignVoicePayload {
    return { ...this.fields };
  }

  query(): DesignVoiceQuery {
    return this.format === undefined ? {} : { output_format: this.format };
  }

  protected send(payload: DesignVoicePayload, options: ExecuteOptions): Promise<DesignedVoiceResult> {
    return this.client.sendDesignVoice(payload, this.query(), options);
  }
}
