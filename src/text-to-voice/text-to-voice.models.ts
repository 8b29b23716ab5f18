export const DEFAULT_BASE_URL = 'https://api.elevenlabs.io';
export const DEFAULT_TIMEOUT_MS = 60_000;

export const DESIGN_VOICE_PATH = '/v1/text-to-voice/design';
export const CREATE_VOICE_PATH = '/v1/text-to-voice';

export const TextToVoiceModels = {
  ELEVEN_MULTILINGUAL_TTV_V2: 'eleven_multilingual_ttv_v2',
  /** Required for reference audio and prompt strength. */
  ELEVEN_TTV_V3: 'eleven_ttv_v3',
} as const;

export type TextToVoiceModelId =
  (typeof TextToVoiceModels)[keyof typeof TextToVoiceModels];

// Formatted as codec_sampleRate_bitrate. Some formats depend on the account tier.
export const OUTPUT_FORMATS = [
  'mp3_22050_32',
  'mp3_44100_32',
  'mp3_44100_64',
  'mp3_44100_96',
  'mp3_44100_128',
  'mp3_44100_192',
  'pcm_8000',
  'pcm_16000',
  'pcm_22050',
  'pcm_24000',
  'pcm_44100',
  'pcm_48000',
  'ulaw_8000',
  'alaw_8000',
  'opus_48000_32',
  'opus_48000_64',
  'opus_48000_96',
] as const;

export type KnownOutputFormat = (typeof OUTPUT_FORMATS)[number];

// Known formats autocomplete; anything else the service adds still type-checks.
export type OutputFormat = KnownOutputFormat | (string & {});
