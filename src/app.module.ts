import { Module } from '@nestjs/common';
import { TextToVoiceModule } from './text-to-voice/text-to-voice.module';

@Module({
  imports: [TextToVoiceModule],
})
export class AppModule {}
