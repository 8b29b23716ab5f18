import { Type } from 'class-transformer';
import { IsArray, IsNumber, IsOptional, IsString, ValidateNested } from 'class-validator';

export class VoicePreview {
  /** Base64 encoded preview audio. Empty when previews are streamed. */
  @IsString()
  audio_base_64!: string;

  /** Pass this to a create call to keep the voice. */
  @IsString()
  generated_voice_id!: string;

  @IsString()
  media_type!: string;

  @IsNumber()
  duration_secs!: number;

  @IsOptional() @IsString()
  language?: string | null;
}

export class DesignedVoiceResult {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => VoicePreview)
  previews!: VoicePreview[];

  /** The text spoken in the previews. */
  @IsString()
  text!: string;
}
