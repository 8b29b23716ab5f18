import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';

export class DesignVoiceDto {
  @IsString() @IsNotEmpty() @MaxLength(1000)
  voiceDescription!: string;   // e.g. "Calm narrator, late 40s, low and warm"

  @IsOptional() @IsString()
  outputFormat?: string;       // query param, e.g. mp3_44100_128

  @IsOptional() @IsString()
  modelId?: string;            // eleven_multilingual_ttv_v2 | eleven_ttv_v3

  @IsOptional() @IsString()
  text?: string;

  @IsOptional() @IsBoolean()
  autoGenerateText?: boolean;

  @IsOptional() @IsNumber() loudness?: number;       // -1..1
  @IsOptional() @IsInt() @Min(0) seed?: number;
  @IsOptional() @IsInt() @Min(0) guidanceScale?: number;
  @IsOptional() @IsBoolean() streamPreviews?: boolean;

  @IsOptional() @IsString()
  remixingSessionId?: string;

  @IsOptional() @IsString()
  remixingSessionIterationId?: string;

  @IsOptional() @IsNumber() quality?: number;
  @IsOptional() @IsString() referenceAudioBase64?: string;  // eleven_ttv_v3 only
  @IsOptional() @IsNumber() promptStrength?: number;        // 0..1
}
