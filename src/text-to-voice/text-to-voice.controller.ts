import { Body, Controller, HttpCode, HttpStatus, Post, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { TextToVoiceService } from './text-to-voice.service';
import { DesignVoiceDto } from './dto/design-voice.dto';
import { CreateVoiceDto } from './dto/create-voice.dto';

@ApiTags('text-to-voice')
@Controller('text-to-voice')
export class TextToVoiceController {
  constructor(private readonly service: TextToVoiceService) {}

  @Post('design')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Generate voice previews from a description' })
  design(@Body(new ValidationPipe({ whitelist: true, transform: true })) dto: DesignVoiceDto) {
    return this.service.design(dto);
  }

  /** Saves one of the previews returned by /design to the voice library. */
  @Post('create')
  @ApiOperation({ summary: 'Persist a designed voice' })
  create(@Body(new ValidationPipe({ whitelist: true, transform: true })) dto: CreateVoiceDto) {
    return this.service.create(dto);
  }
}
