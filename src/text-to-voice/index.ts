import 'reflect-metadata';

export * from './text-to-voice.client';
export * from './text-to-voice.errors';
export * from './text-to-voice.models';
export * from './text-to-voice.module';
export * from './text-to-voice.service';
export * from './requests/voice-request';
export * from './requests/design-voice.request';
export * from './requests/create-voice.request';
export * from './responses/designed-voice.response';
export * from './responses/created-voice.response';
export * from './dto/design-voice.dto';
export * from './dto/create-voice.dto';
