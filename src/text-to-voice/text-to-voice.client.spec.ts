import { AxiosError } from 'axios';
import { TextToVoiceClient } from './text-to-voice.client';
import {
  ApiError,
  AuthenticationError,
  CancelledError,
  ConfigurationError,
  DecodeError,
  RateLimitError,
  ReuseError,
  TransportError,
} from './text-to-voice.errors';
import { jsonReply, sentBody, stubHttp, StubReply } from './testing/http-stub';

const DESCRIPTION = 'Calm narrator, late 40s, low and warm, slight British accent';

const designedBody = {
  previews: [
    {
      audio_base_64: 'UklGRg==',
      generated_voice_id: 'gv-1',
      media_type: 'audio/mpeg',
      duration_secs: 3.5,
      language: 'en',
    },
  ],
  text: 'Hello there, this is a preview.',
};

function clientWith(...replies: StubReply[]) {
  const stub = stubHttp(...replies);
  const client = new TextToVoiceClient('test-secret', { baseUrl: 'https://voices.test/', http: stub.http });
  return { client, ...stub };
}

describe('TextToVoiceClient', () => {
  describe('construction', () => {
    it('rejects an empty api key', () => {
      expect(() => new TextToVoiceClient('')).toThrow(ConfigurationError);
      expect(() => new TextToVoiceClient('   ')).toThrow('apiKey must be a non-empty string');
    });

    it('uses the public endpoint by default and trims trailing slashes', () => {
      expect(new TextToVoiceClient('test-secret').baseUrl).toBe('https://api.elevenlabs.io');
      expect(new TextToVoiceClient('test-secret', { baseUrl: 'http://localhost:9000//' }).baseUrl).toBe(
        'http://localhost:9000',
      );
    });

    it('rejects a non-positive timeout', () => {
      expect(() => new TextToVoiceClient('test-secret', { timeout: 0 })).toThrow(ConfigurationError);
      expect(() => new TextToVoiceClient('test-secret', { timeout: Number.NaN })).toThrow(ConfigurationError);
    });

    it('reads its settings from the environment', () => {
      const client = TextToVoiceClient.fromEnv({
        ELEVENLABS_API_KEY: 'test-secret',
        ELEVENLABS_BASE_URL: 'http://localhost:9000',
        ELEVENLABS_TIMEOUT_MS: '1500',
      });
      expect(client.baseUrl).toBe('http://localhost:9000');
      expect(client.timeout).toBe(1500);
    });

    it('fails fast when the environment has no api key', () => {
      expect(() => TextToVoiceClient.fromEnv({})).toThrow('ELEVENLABS_API_KEY not set');
    });

    it('hands out independent builders', () => {
      const client = new TextToVoiceClient('test-secret');
      const a = client.designVoice(DESCRIPTION).seed(1);
      const b = client.designVoice(DESCRIPTION);
      expect(a).not.toBe(b);
      expect(b.payload()).toEqual({ voice_description: DESCRIPTION });
    });
  });

  describe('designVoice().execute()', () => {
    it('posts only the configured fields and decodes the previews', async () => {
      const { client, requests } = clientWith(jsonReply(200, designedBody));

      const result = await client.designVoice(DESCRIPTION).model('eleven_ttv_v3').loudness(0.4).execute();

      expect(result.previews).toHaveLength(1);
      expect(result.previews[0].generated_voice_id).toBe('gv-1');
      expect(result.previews[0].duration_secs).toBe(3.5);
      expect(result.text).toBe('Hello there, this is a preview.');

      expect(requests).toHaveLength(1);
      expect(requests[0].method).toBe('post');
      expect(requests[0].url).toBe('https://voices.test/v1/text-to-voice/design');
      expect(requests[0].headers['xi-api-key']).toBe('test-secret');
      expect(requests[0].params).toEqual({});
      expect(sentBody(requests[0])).toEqual({
        voice_description: DESCRIPTION,
        model_id: 'eleven_ttv_v3',
        loudness: 0.4,
      });
    });

    it('sends the output format as a query parameter', async () => {
      const { client, requests } = clientWith(jsonReply(200, designedBody));

      await client.designVoice(DESCRIPTION).outputFormat('mp3_22050_32').execute();

      expect(requests[0].params).toEqual({ output_format: 'mp3_22050_32' });
      expect(sentBody(requests[0])).toEqual({ voice_description: DESCRIPTION });
    });

    it('maps an error envelope to ApiError', async () => {
      const { client } = clientWith(jsonReply(422, { message: 'invalid prompt' }));

      const err = await client.designVoice(DESCRIPTION).execute().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ApiError);
      expect(err).toMatchObject({ kind: 'api', status: 422, message: 'invalid prompt', code: undefined });
    });

    it('joins validation details from the service', async () => {
      const { client } = clientWith(
        jsonReply(422, { detail: [{ loc: ['body', 'text'], msg: 'text too short' }, { msg: 'seed out of range' }] }),
      );

      await expect(client.designVoice(DESCRIPTION).execute()).rejects.toMatchObject({
        status: 422,
        message: 'text too short; seed out of range',
        code: 'validation_error',
      });
    });

    it('maps 401 to AuthenticationError with the service code', async () => {
      const { client } = clientWith(
        jsonReply(401, { detail: { status: 'invalid_api_key', message: 'Invalid API key' } }),
      );

      const err = await client.designVoice(DESCRIPTION).execute().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(AuthenticationError);
      expect(err).toMatchObject({ status: 401, code: 'invalid_api_key', message: 'Invalid API key' });
    });

    it('maps 429 to RateLimitError and reads Retry-After', async () => {
      const { client } = clientWith(
        jsonReply(429, { detail: { status: 'too_many_concurrent_requests', message: 'Slow down' } }, { 'retry-after': '7' }),
      );

      const err = await client.designVoice(DESCRIPTION).execute().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RateLimitError);
      expect(err).toMatchObject({ status: 429, retryAfter: 7 });
    });

    it('returns TransportError when the error body is not an envelope', async () => {
      const { client } = clientWith({ status: 502, body: '<html>Bad gateway</html>' });

      const err = await client.designVoice(DESCRIPTION).execute().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransportError);
      expect(err).toMatchObject({ status: 502, body: '<html>Bad gateway</html>' });
    });

    it('returns DecodeError carrying the raw body when previews are missing', async () => {
      const raw = JSON.stringify({ text: 'Hello there' });
      const { client } = clientWith({ status: 200, body: raw });

      const err = await client.designVoice(DESCRIPTION).execute().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(DecodeError);
      if (!(err instanceof DecodeError)) return;
      expect(err.body).toBe(raw);
      expect(err.issues).toContain('previews must be an array');
    });

    it('returns DecodeError when a 2xx body is not JSON', async () => {
      const { client } = clientWith({ status: 200, body: 'ok' });

      await expect(client.designVoice(DESCRIPTION).execute()).rejects.toMatchObject({
        kind: 'decode',
        body: 'ok',
      });
    });

    it('leaves the builder untouched after a timeout so it can be retried', async () => {
      const timeout = new AxiosError('timeout of 60000ms exceeded', 'ECONNABORTED');
      const { client, adapter } = clientWith(timeout, jsonReply(200, designedBody));
      const request = client.designVoice(DESCRIPTION).seed(42).streamPreviews(false);

      const err = await request.execute().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransportError);
      expect(err).toMatchObject({ cause: timeout });
      expect(request.executed).toBe(false);
      expect(request.payload()).toEqual({ voice_description: DESCRIPTION, seed: 42, stream_previews: false });

      const result = await request.execute();
      expect(result.previews[0].generated_voice_id).toBe('gv-1');
      expect(adapter).toHaveBeenCalledTimes(2);
    });

    it('returns CancelledError when the signal is already aborted', async () => {
      const { client, adapter } = clientWith(jsonReply(200, designedBody));
      const controller = new AbortController();
      controller.abort();

      await expect(client.designVoice(DESCRIPTION).execute({ signal: controller.signal })).rejects.toBeInstanceOf(
        CancelledError,
      );
      expect(adapter).not.toHaveBeenCalled();
    });

    it('rejects a second execute after success', async () => {
      const { client, adapter } = clientWith(jsonReply(200, designedBody), jsonReply(200, designedBody));
      const request = client.designVoice(DESCRIPTION);

      await request.execute();

      expect(request.executed).toBe(true);
      await expect(request.execute()).rejects.toBeInstanceOf(ReuseError);
      expect(() => request.text('late change')).toThrow(ReuseError);
      expect(adapter).toHaveBeenCalledTimes(1);
    });

    it('rejects an execute while another is in flight', async () => {
      const { client, adapter } = clientWith(jsonReply(200, designedBody));
      const request = client.designVoice(DESCRIPTION);

      const first = request.execute();
      await expect(request.execute()).rejects.toBeInstanceOf(ReuseError);
      await expect(first).resolves.toMatchObject({ text: 'Hello there, this is a preview.' });
      expect(adapter).toHaveBeenCalledTimes(1);
    });
  });

  describe('createVoice().execute()', () => {
    it('posts the chosen preview and decodes the saved voice', async () => {
      const { client, requests } = clientWith(
        jsonReply(200, {
          voice_id: 'voice-123',
          name: 'Narrator',
          category: 'generated',
          labels: { accent: 'british' },
          high_quality_base_model_ids: ['eleven_multilingual_v2'],
          some_future_field: true,
        }),
      );

      const voice = await client
        .createVoice('Narrator', DESCRIPTION, 'gv-1')
        .labels({ accent: 'british' })
        .playedNotSelectedVoiceIds(['gv-2', 'gv-3'])
        .execute();

      expect(voice.voice_id).toBe('voice-123');
      expect(voice.category).toBe('generated');
      expect(voice.labels).toEqual({ accent: 'british' });

      expect(requests[0].url).toBe('https://voices.test/v1/text-to-voice');
      expect(sentBody(requests[0])).toEqual({
        voice_name: 'Narrator',
        voice_description: DESCRIPTION,
        generated_voice_id: 'gv-1',
        labels: { accent: 'british' },
        played_not_selected_voice_ids: ['gv-2', 'gv-3'],
      });
    });

    it('rejects a saved voice without an id', async () => {
      const { client } = clientWith(jsonReply(200, { name: 'Narrator' }));

      const err = await client.createVoice('Narrator', DESCRIPTION, 'gv-1').execute().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(DecodeError);
      expect(err).toMatchObject({ issues: ['voice_id must be a string'] });
    });

    it('rejects an unknown voice category', async () => {
      const { client } = clientWith(jsonReply(200, { voice_id: 'voice-123', category: 'imaginary' }));

      await expect(client.createVoice('Narrator', DESCRIPTION, 'gv-1').execute()).rejects.toBeInstanceOf(
        DecodeError,
      );
    });
  });
});
