import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsIn,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

export const VOICE_CATEGORIES = [
  'generated',
  'cloned',
  'premade',
  'professional',
  'famous',
  'high_quality',
] as const;
export type VoiceCategory = (typeof VOICE_CATEGORIES)[number];

export const SHARING_STATUSES = ['enabled', 'disabled', 'copied', 'copied_disabled'] as const;
export type SharingStatus = (typeof SHARING_STATUSES)[number];

export class VoiceSample {
  @IsOptional() @IsString() sample_id?: string | null;
  @IsOptional() @IsString() file_name?: string | null;
  @IsOptional() @IsString() mime_type?: string | null;
  @IsOptional() @IsNumber() size_bytes?: number | null;
  @IsOptional() @IsString() hash?: string | null;
  @IsOptional() @IsNumber() duration_secs?: number | null;
  @IsOptional() @IsBoolean() remove_background_noise?: boolean | null;
}

export class VoiceSettings {
  @IsOptional() @IsNumber() stability?: number | null;
  @IsOptional() @IsBoolean() use_speaker_boost?: boolean | null;
  @IsOptional() @IsNumber() similarity_boost?: number | null;
  @IsOptional() @IsNumber() style?: number | null;
  @IsOptional() @IsNumber() speed?: number | null;
}

export class VoiceSharing {
  @IsOptional() @IsIn([...SHARING_STATUSES]) status?: SharingStatus | null;
  @IsOptional() @IsString() public_owner_id?: string | null;
  @IsOptional() @IsString() original_voice_id?: string | null;
  @IsOptional() @IsNumber() liked_by_count?: number | null;
  @IsOptional() @IsNumber() cloned_by_count?: number | null;
}

export class VoiceVerification {
  @IsBoolean() requires_verification!: boolean;
  @IsBoolean() is_verified!: boolean;
  @IsOptional() @IsArray() @IsString({ each: true }) verification_failures?: string[];
  @IsOptional() @IsNumber() verification_attempts_count?: number;
  @IsOptional() @IsString() language?: string | null;
}

/** A voice saved to the library. Only `voice_id` is guaranteed. */
export class CreatedVoiceResult {
  @IsString()
  voice_id!: string;

  @IsOptional() @IsString() name?: string | null;
  @IsOptional() @IsIn([...VOICE_CATEGORIES]) category?: VoiceCategory | null;
  @IsOptional() @IsString() description?: string | null;
  @IsOptional() @IsObject() labels?: Record<string, string> | null;
  @IsOptional() @IsString() preview_url?: string | null;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => VoiceSample)
  samples?: VoiceSample[] | null;

  @IsOptional() @ValidateNested() @Type(() => VoiceSettings)
  settings?: VoiceSettings | null;

  @IsOptional() @ValidateNested() @Type(() => VoiceSharing)
  sharing?: VoiceSharing | null;

  @IsOptional() @ValidateNested() @Type(() => VoiceVerification)
  voice_verification?: VoiceVerification | null;

  @IsOptional() @IsArray() @IsString({ each: true }) available_for_tiers?: string[] | null;
  @IsOptional() @IsArray() @IsString({ each: true }) high_quality_base_model_ids?: string[] | null;
  @IsOptional() @IsBoolean() is_owner?: boolean | null;
  @IsOptional() @IsBoolean() is_legacy?: boolean | null;
  @IsOptional() @IsBoolean() is_mixed?: boolean | null;
  @IsOptional() @IsNumber() favorited_at_unix?: number | null;
  @IsOptional() @IsNumber() created_at_unix?: number | null;
}

export function isVoiceReady(voice: CreatedVoiceResult): boolean {
  const verification = voice.voice_verification;
  if (!verification) return true;
  return !verification.requires_verification || verification.is_verified;
}

export function totalSampleDuration(voice: CreatedVoiceResult): number {
  return (voice.samples ?? []).reduce((sum, sample) => sum + (sample.duration_secs ?? 0), 0);
}

export function isVoiceShared(voice: CreatedVoiceResult): boolean {
  return voice.sharing?.status === 'enabled';
}
