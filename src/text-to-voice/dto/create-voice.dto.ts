import { IsArray, IsNotEmpty, IsObject, IsOptional, IsString } from 'class-validator';

export class CreateVoiceDto {
  @IsString() @IsNotEmpty()
  voiceName!: string;

  @IsString() @IsNotEmpty()
  voiceDescription!: string;

  @IsString() @IsNotEmpty()
  generatedVoiceId!: string;   // from a preview returned by /design

  @IsOptional() @IsObject()
  labels?: Record<string, string>;   // e.g. { "accent": "british" }

  @IsOptional() @IsArray() @IsString({ each: true })
  playedNotSelectedVoiceIds?: string[];
}
