import {
  BadGatewayException,
  BadRequestException,
  HttpException,
  Injectable,
  InternalServerErrorException,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { TextToVoiceClient } from './text-to-voice.client';
import { isTextToVoiceError } from './text-to-voice.errors';
import { CreateVoiceDto } from './dto/create-voice.dto';
import { DesignVoiceDto } from './dto/design-voice.dto';
import { CreatedVoiceResult } from './responses/created-voice.response';
import { DesignedVoiceResult } from './responses/designed-voice.response';

@Injectable()
export class TextToVoiceService {
  private readonly logger = new Logger(TextToVoiceService.name);

  constructor(private readonly client: TextToVoiceClient) {}

  async design(dto: DesignVoiceDto): Promise<DesignedVoiceResult> {
    try {
      const request = this.client.designVoice(dto.voiceDescription);
      if (dto.outputFormat !== undefined) request.outputFormat(dto.outputFormat);
      if (dto.modelId !== undefined) request.model(dto.modelId);
      if (dto.text !== undefined) request.text(dto.text);
      if (dto.autoGenerateText !== undefined) request.autoGenerateText(dto.autoGenerateText);
      if (dto.loudness !== undefined) request.loudness(dto.loudness);
      if (dto.seed !== undefined) request.seed(dto.seed);
      if (dto.guidanceScale !== undefined) request.guidanceScale(dto.guidanceScale);
      if (dto.streamPreviews !== undefined) request.streamPreviews(dto.streamPreviews);
      if (dto.remixingSessionId !== undefined) request.remixingSessionId(dto.remixingSessionId);
      if (dto.remixingSessionIterationId !== undefined) {
        request.remixingSessionIterationId(dto.remixingSessionIterationId);
      }
      if (dto.quality !== undefined) request.quality(dto.quality);
      if (dto.referenceAudioBase64 !== undefined) request.referenceAudioBase64(dto.referenceAudioBase64);
      if (dto.promptStrength !== undefined) request.promptStrength(dto.promptStrength);

      const result = await request.execute();
      this.logger.log(`Designed ${result.previews.length} preview(s)`);
      return result;
    } catch (err: unknown) {
      return this.fail('design voice', err);
    }
  }

  async create(dto: CreateVoiceDto): Promise<CreatedVoiceResult> {
    try {
      const request = this.client.createVoice(dto.voiceName, dto.voiceDescription, dto.generatedVoiceId);
      if (dto.labels !== undefined) request.labels(dto.labels);
      if (dto.playedNotSelectedVoiceIds !== undefined) {
        request.playedNotSelectedVoiceIds(dto.playedNotSelectedVoiceIds);
      }

      const voice = await request.execute();
      this.logger.log(`Created voice ${voice.voice_id} from ${dto.generatedVoiceId}`);
      return voice;
    } catch (err: unknown) {
      return this.fail('create voice', err);
    }
  }

  private fail(action: string, err: unknown): never {
    if (!isTextToVoiceError(err)) throw err;

    this.logger.error(`ElevenLabs ${action} failed: ${err.message}`);
    switch (err.kind) {
      case 'configuration':
        throw new BadRequestException(err.message);
      case 'api':
        throw new HttpException(
          { statusCode: err.status, message: err.message, code: err.code },
          err.status,
        );
      case 'decode':
      case 'transport':
        throw new BadGatewayException(`ElevenLabs ${action} failed: ${err.message}`);
      case 'cancelled':
        throw new ServiceUnavailableException(err.message);
      case 'reuse':
        throw new InternalServerErrorException(err.message);
    }
  }
}
