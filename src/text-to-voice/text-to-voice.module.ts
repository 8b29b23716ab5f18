import { Module } from '@nestjs/common';
import { HttpModule, HttpService } from '@nestjs/axios';
import { TextToVoiceClient } from './text-to-voice.client';
import { TextToVoiceService } from './text-to-voice.service';
import { TextToVoiceController } from './text-to-voice.controller';

@Module({
  imports: [
    // Per-request timeout comes from the client (ELEVENLABS_TIMEOUT_MS).
    HttpModule.register({
      maxContentLength: Infinity,
      maxBodyLength: Infinity,
    }),
  ],
  controllers: [TextToVoiceController],
  providers: [
    {
      provide: TextToVoiceClient,
      useFactory: (http: HttpService) => TextToVoiceClient.fromEnv(process.env, http),
      inject: [HttpService],
    },
    TextToVoiceService,
  ],
  exports: [TextToVoiceClient, TextToVoiceService],
})
export class TextToVoiceModule {}
