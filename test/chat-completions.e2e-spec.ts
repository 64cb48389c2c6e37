import { INestApplication } from '@nestjs/common';
import { PassThrough } from 'stream';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { GATEWAY_CONFIG } from '../src/config/gateway.config';
import { UPSTREAM_HTTP } from '../src/modules/upstream/upstream.constants';
import { FALLBACK_TOKEN_PREFIX, PROOF_TOKEN_PREFIX } from '../src/modules/upstream/proof-of-work';
import {
  CONVERSATION_PATH,
  FakeUpstream,
  REQUIREMENTS_PATH,
  SSE_HEADERS,
  assistantEvent,
  delay,
  requirementsBody,
  sseBody,
  testConfig,
  waitFor,
} from './fake-upstream';

const hi = { messages: [{ role: 'user', content: 'hi' }] };

describe('Chat gateway (e2e)', () => {
  let app: INestApplication;
  let upstream: FakeUpstream;

  async function startApp(env: NodeJS.ProcessEnv = {}) {
    const config = testConfig(env);
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(GATEWAY_CONFIG)
      .useValue(config)
      .overrideProvider(UPSTREAM_HTTP)
      .useValue(upstream.http)
      .compile();

    app = moduleRef.createNestApplication({ bodyParser: false, logger: false });
    configureApp(app, config);
    await app.init();
  }

  beforeEach(() => {
    upstream = new FakeUpstream().on(REQUIREMENTS_PATH, { body: requirementsBody() });
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /v1/chat/completions', () => {
    beforeEach(() => startApp());

    it('returns the buffered completion', async () => {
      upstream.on(CONVERSATION_PATH, {
        headers: SSE_HEADERS,
        body: sseBody(assistantEvent('H'), assistantEvent('Hello'), '[DONE]'),
      });

      const res = await request(app.getHttpServer())
        .post('/v1/chat/completions')
        .send({ ...hi, stream: false })
        .expect(200)
        .expect('Content-Type', /application\/json/);

      expect(res.body).toEqual({
        id: expect.stringMatching(/^chatcmpl-[A-Za-z0-9]{16}$/),
        object: 'chat.completion',
        created: expect.any(Number),
        model: 'gpt-3.5-turbo',
        choices: [{ index: 0, message: { role: 'assistant', content: 'Hello' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
      });
    });

    it('streams one frame per delta, the stop frame and the done sentinel', async () => {
      upstream.on(CONVERSATION_PATH, {
        headers: SSE_HEADERS,
        body: sseBody(assistantEvent(''), assistantEvent('Hel'), assistantEvent('Hello'), '[DONE]'),
      });

      const res = await request(app.getHttpServer())
        .post('/v1/chat/completions')
        .send({ ...hi, stream: true })
        .buffer(true)
        .expect(200)
        .expect('Content-Type', /text\/event-stream/)
        .expect('Cache-Control', 'no-cache');

      const frames = res.text
        .split('\n\n')
        .filter((frame) => frame !== '')
        .map((frame) => frame.replace(/^data: /, ''));

      expect(frames).toHaveLength(5);
      expect(frames[4]).toBe('[DONE]');
      const chunks: unknown[] = frames.slice(0, 4).map((frame) => JSON.parse(frame));
      expect(chunks).toEqual([
        expect.objectContaining({
          object: 'chat.completion.chunk',
          choices: [{ index: 0, delta: { role: 'assistant', content: '' }, finish_reason: null }],
        }),
        expect.objectContaining({ choices: [{ index: 0, delta: { content: 'Hel' }, finish_reason: null }] }),
        expect.objectContaining({ choices: [{ index: 0, delta: { content: 'lo' }, finish_reason: null }] }),
        expect.objectContaining({
          object: 'chat.completion.chunk',
          model: 'gpt-3.5-turbo',
          choices: [{ index: 0, delta: {}, finish_reason: 'stop' }],
        }),
      ]);
    });

    it('sends the solved proof token and the session credentials upstream', async () => {
      upstream.on(CONVERSATION_PATH, { headers: SSE_HEADERS, body: sseBody('[DONE]') });

      await request(app.getHttpServer()).post('/v1/chat/completions').send(hi).expect(200);

      const [negotiation] = upstream.requestsTo(REQUIREMENTS_PATH);
      const [conversation] = upstream.requestsTo(CONVERSATION_PATH);
      expect(conversation.headers['oai-device-id']).toBe(negotiation.headers['oai-device-id']);
      expect(conversation.headers['openai-sentinel-chat-requirements-token']).toBe('test-requirements-token');
      expect(String(conversation.headers['openai-sentinel-proof-token'])).toMatch(
        new RegExp(`^${PROOF_TOKEN_PREFIX}[A-Za-z0-9+/=]+$`),
      );
      expect(conversation.body).toMatchObject({
        action: 'next',
        messages: [{ author: { role: 'user' }, content: { content_type: 'text', parts: ['hi'] } }],
      });
    });

    it('sends the degraded token when the challenge is not met in time', async () => {
      upstream.on(REQUIREMENTS_PATH, { body: requirementsBody('0000000000') });
      upstream.on(CONVERSATION_PATH, { headers: SSE_HEADERS, body: sseBody('[DONE]') });

      await request(app.getHttpServer()).post('/v1/chat/completions').send(hi).expect(200);

      const [conversation] = upstream.requestsTo(CONVERSATION_PATH);
      expect(conversation.headers['openai-sentinel-proof-token']).toBe(
        FALLBACK_TOKEN_PREFIX + Buffer.from('"test-seed"').toString('base64'),
      );
    });

    it('rejects a body without messages before calling the upstream', async () => {
      const res = await request(app.getHttpServer())
        .post('/v1/chat/completions')
        .send({ stream: false })
        .expect(200);

      expect(res.body).toEqual({
        status: false,
        error: { message: 'Invalid request messages', type: 'invalid_request_error' },
      });
      expect(upstream.requests).toHaveLength(0);
    });

    it('rejects a body that is not valid JSON', async () => {
      const res = await request(app.getHttpServer())
        .post('/v1/chat/completions')
        .set('Content-Type', 'application/json')
        .send('{"messages": [')
        .expect(200);

      expect(res.body.status).toBe(false);
      expect(res.body.error.message).toMatch(/^Invalid request body, /);
      expect(upstream.requests).toHaveLength(0);
    });

    it('reports a failed negotiation without opening the conversation', async () => {
      upstream.on(REQUIREMENTS_PATH, new Error('connect ECONNREFUSED'));

      const res = await request(app.getHttpServer()).post('/v1/chat/completions').send(hi).expect(200);

      expect(res.body).toEqual({
        status: false,
        error: {
          message: 'Failed to meet chat requirements, connect ECONNREFUSED',
          type: 'invalid_request_error',
        },
      });
      expect(upstream.requestsTo(CONVERSATION_PATH)).toHaveLength(0);
    });

    it('reports an upstream failure before anything is streamed', async () => {
      upstream.on(CONVERSATION_PATH, { status: 500, body: 'boom' });

      const res = await request(app.getHttpServer())
        .post('/v1/chat/completions')
        .send({ ...hi, stream: true })
        .expect(200)
        .expect('Content-Type', /application\/json/);

      expect(res.body.error.message).toBe('Invalid response code 500, boom');
    });

    it('answers preflight requests', async () => {
      await request(app.getHttpServer()).options('/v1/chat/completions').expect(204);
    });
  });

  describe('client disconnect', () => {
    beforeEach(() => startApp());

    const leaveAfter = (ms: number, stream: boolean) =>
      expect(
        request(app.getHttpServer())
          .post('/v1/chat/completions')
          .send({ ...hi, stream })
          .timeout(ms),
      ).rejects.toThrow(`Timeout of ${ms}ms exceeded`);

    it('abandons the negotiation and never opens the conversation', async () => {
      upstream.on(REQUIREMENTS_PATH, async () => {
        await delay(200);
        return { body: requirementsBody() };
      });

      await leaveAfter(50, false);
      await waitFor(() => upstream.aborted.includes(REQUIREMENTS_PATH));
      await delay(250);

      expect(upstream.requestsTo(CONVERSATION_PATH)).toHaveLength(0);
    });

    it.each([false, true])('drops the pending conversation request (stream=%s)', async (stream) => {
      upstream.on(CONVERSATION_PATH, () => new Promise(() => undefined));

      await leaveAfter(50, stream);
      await waitFor(() => upstream.aborted.includes(CONVERSATION_PATH));
    });

    it.each([false, true])('stops reading the upstream once the client leaves (stream=%s)', async (stream) => {
      const body = new PassThrough();
      body.write(sseBody(assistantEvent('partial')));
      upstream.on(CONVERSATION_PATH, { headers: SSE_HEADERS, stream: body });

      await leaveAfter(100, stream);
      await waitFor(() => body.destroyed);
    });
  });

  describe('routing', () => {
    beforeEach(() => startApp());

    it('lists the model', async () => {
      const res = await request(app.getHttpServer()).get('/v1/models').expect(200);

      expect(res.body.object).toBe('list');
      expect(res.body.data).toEqual([
        expect.objectContaining({ id: 'gpt-3.5-turbo', object: 'model', owned_by: 'openai' }),
      ]);
    });

    it('answers unknown paths with 404 and the envelope', async () => {
      const res = await request(app.getHttpServer()).get('/v1/unknown').expect(404);

      expect(res.body).toEqual({
        status: false,
        error: { message: 'The requested endpoint was not found.', type: 'invalid_request_error' },
      });
    });

    it('sets the CORS headers on success and error responses', async () => {
      for (const res of [
        await request(app.getHttpServer()).get('/v1/models'),
        await request(app.getHttpServer()).get('/v1/unknown'),
        await request(app.getHttpServer()).post('/v1/chat/completions').send({}),
      ]) {
        expect(res.headers['access-control-allow-origin']).toBe('*');
        expect(res.headers['access-control-allow-methods']).toBe('GET,POST,PUT,PATCH,DELETE');
        expect(res.headers['access-control-allow-headers']).toBe('Content-Type,Authorization');
      }
    });
  });

  describe('shared secret', () => {
    beforeEach(() => startApp({ AUTHORIZATION: 'test-secret' }));

    it('rejects a missing authorization header', async () => {
      const res = await request(app.getHttpServer()).post('/v1/chat/completions').send(hi).expect(401);

      expect(res.body).toEqual({
        status: false,
        error: {
          message: 'No authorization header or invalid authorization value.',
          type: 'invalid_request_error',
        },
      });
      expect(res.headers['access-control-allow-origin']).toBe('*');
      expect(upstream.requests).toHaveLength(0);
    });

    it('rejects a wrong secret', async () => {
      await request(app.getHttpServer()).get('/v1/models').set('Authorization', 'Bearer wrong-secret').expect(401);
    });

    it('accepts the secret with or without the bearer prefix', async () => {
      await request(app.getHttpServer()).get('/v1/models').set('Authorization', 'Bearer test-secret').expect(200);
      await request(app.getHttpServer()).get('/v1/models').set('Authorization', 'test-secret').expect(200);
    });

    it('lets preflight requests through', async () => {
      await request(app.getHttpServer()).options('/v1/models').expect(204);
    });
  });
});
