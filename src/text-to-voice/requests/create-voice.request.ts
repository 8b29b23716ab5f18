import { IsArray, IsObject, IsOptional, IsString } from 'class-validator';
import type { TextToVoiceClient } from '../text-to-voice.client';
import type { CreatedVoiceResult } from '../responses/created-voice.response';
import { ExecuteOptions, requireText, VoiceRequest } from './voice-request';

export class CreateVoicePayload {
  @IsString()
  voice_name!: string;

  @IsString()
  voice_description!: string;

  /** Taken from one of the previews returned by a design call. */
  @IsString()
  generated_voice_id!: string;

  @IsOptional() @IsObject()
  labels?: Record<string, string>;

  // Previews the user listened to but did not pick.
  @IsOptional() @IsArray() @IsString({ each: true })
  played_not_selected_voice_ids?: string[];
}

export class CreateVoiceRequest extends VoiceRequest<CreateVoicePayload, CreatedVoiceResult> {
  constructor(
    private readonly client: TextToVoiceClient,
    voiceName: string,
    voiceDescription: string,
    generatedVoiceId: string,
  ) {
    const fields = new CreateVoicePayload();
    fields.voice_name = requireText(voiceName, 'voice_name');
    fields.voice_description = requireText(voiceDescription, 'voice_description');
    fields.generated_voice_id = requireText(generatedVoiceId, 'generated_voice_id');
    super(fields);
  }

  get voiceName(): string {
    return this.fields.voice_name;
  }

  get voiceDescription(): string {
    return this.fields.voice_description;
  }

  get generatedVoiceId(): string {
    return this.fields.generated_voice_id;
  }

  labels(labels: Record<string, string>): this {
    return this.set('labels', { ...labels });
  }

  playedNotSelectedVoiceIds(ids: readonly string[]): this {
    return this.set('played_not_selected_voice_ids', [...ids]);
  }

  payload(): CreateVoicePayload {
    const { labels, played_not_selected_voice_ids, ...required } = this.fields;
    return {
      ...required,
      ...(labels ? { labels: { ...labels } } : {}),
      ...(played_not_selected_voice_ids
        ? { played_not_selected_voice_ids: [...played_not_selected_voice_ids] }
        : {}),
    };
  }

  protected send(payload: CreateVoicePayload, options: ExecuteOptions): Promise<CreatedVoiceResult> {
    return this.client.sendCreateVoice(payload, options);
  }
}
