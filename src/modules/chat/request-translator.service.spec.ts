import { ValidationError } from '../../common/errors';
import { loadGatewayConfig } from '../../config/gateway.config';
import { RequestTranslatorService, extractContentText } from './request-translator.service';

const translator = (policy: 'merge' | 'passthrough' = 'merge') =>
  new RequestTranslatorService(loadGatewayConfig({ MESSAGE_MERGE_POLICY: policy }));

const parts = (service: RequestTranslatorService, body: unknown) =>
  service.translate(service.parse(body)).messages.map((m) => ({
    role: m.author.role,
    text: m.content.parts[0],
  }));

describe('extractContentText', () => {
  it('returns plain string content as is', () => {
    expect(extractContentText('hello')).toBe('hello');
  });

  it('takes the text of a single-element structured array', () => {
    expect(extractContentText([{ type: 'text', text: 'hello' }])).toBe('hello');
  });

  it('yields empty text for arrays with more than one element', () => {
    expect(extractContentText([{ text: 'a' }, { text: 'b' }])).toBe('');
  });

  it('yields empty text for unrecognized shapes', () => {
    expect(extractContentText(42)).toBe('');
    expect(extractContentText([{ type: 'image_url' }])).toBe('');
    expect(extractContentText(null)).toBe('');
  });
});

describe('RequestTranslatorService.parse', () => {
  const service = translator();

  it.each([
    ['a body without messages', { stream: false }],
    ['an empty message list', { messages: [] }],
    ['messages that are not a list', { messages: 'hi' }],
    ['a message without a role', { messages: [{ content: 'hi' }] }],
    ['a message with an empty role', { messages: [{ role: '', content: 'hi' }] }],
    ['a message with a non-string role', { messages: [{ role: 7, content: 'hi' }] }],
    ['a message that is not an object', { messages: ['hi'] }],
    ['a null message', { messages: [null] }],
    ['a message with empty content', { messages: [{ role: 'user', content: '' }] }],
    ['a message with a multi-part array', { messages: [{ role: 'user', content: [{ text: 'a' }, { text: 'b' }] }] }],
    [
      'two system messages',
      {
        messages: [
          { role: 'system', content: 'one' },
          { role: 'system', content: 'two' },
          { role: 'user', content: 'hi' },
        ],
      },
    ],
  ])('rejects %s', (_label, body) => {
    expect(() => service.parse(body)).toThrow(new ValidationError('Invalid request messages'));
  });

  it('rejects a body that is not an object', () => {
    expect(() => service.parse('hi')).toThrow('Invalid request body, expected a JSON object');
  });

  it('rejects a non-boolean stream flag', () => {
    expect(() => service.parse({ messages: [{ role: 'user', content: 'hi' }], stream: 'yes' })).toThrow(
      'Invalid request body, "stream" must be a boolean',
    );
  });

  it('reports a bad stream flag before bad messages', () => {
    expect(() => service.parse({ stream: 1 })).toThrow('Invalid request body, "stream" must be a boolean');
  });

  it('accepts a null stream flag as not streaming', () => {
    expect(service.parse({ messages: [{ role: 'user', content: 'hi' }], stream: null }).stream).toBe(false);
  });

  it('ignores a model that is not a string', () => {
    expect(service.parse({ model: 4, messages: [{ role: 'user', content: 'hi' }] }).model).toBeUndefined();
  });

  it('defaults stream to false and keeps the model', () => {
    expect(service.parse({ model: 'gpt-4', messages: [{ role: 'user', content: [{ text: 'hi' }] }] })).toEqual({
      model: 'gpt-4',
      messages: [{ role: 'user', content: 'hi' }],
      stream: false,
    });
  });
});

describe('RequestTranslatorService.translate', () => {
  it('sends a single user message unchanged', () => {
    expect(parts(translator(), { messages: [{ role: 'user', content: 'hi' }] })).toEqual([
      { role: 'user', text: 'hi' },
    ]);
  });

  it('keeps the system prompt separate and joins two turns without markers', () => {
    expect(
      parts(translator(), {
        messages: [
          { role: 'system', content: 'be brief' },
          { role: 'user', content: 'hi' },
        ],
      }),
    ).toEqual([
      { role: 'system', text: 'be brief' },
      { role: 'user', text: 'hi' },
    ]);
  });

  it('wraps user turns in instruction markers once there is history', () => {
    expect(
      parts(translator(), {
        messages: [
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: 'hello' },
          { role: 'user', content: 'how are you' },
        ],
      }),
    ).toEqual([{ role: 'user', text: '[INST]hi[/INST]\nhello\n[INST]how are you[/INST]' }]);
  });

  it('maps every message on its own under the passthrough policy', () => {
    expect(
      parts(translator('passthrough'), {
        messages: [
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: 'hello' },
          { role: 'user', content: 'again' },
        ],
      }),
    ).toEqual([
      { role: 'user', text: 'hi' },
      { role: 'assistant', text: 'hello' },
      { role: 'user', text: 'again' },
    ]);
  });

  it('fills the fixed conversation fields', () => {
    const service = translator();
    const request = service.translate(service.parse({ messages: [{ role: 'user', content: 'hi' }] }));

    expect(request).toMatchObject({
      action: 'next',
      model: 'text-davinci-002-render-sha',
      timezone_offset_min: 0,
      suggestions: [],
      history_and_training_disabled: true,
      conversation_mode: { kind: 'primary_assistant' },
      force_paragen: false,
      force_paragen_model_slug: '',
      force_nulligen: false,
      force_rate_limit: false,
    });
    expect(request.messages[0]).toMatchObject({ content: { content_type: 'text' }, metadata: {} });
    expect(request.parent_message_id).not.toBe(request.websocket_request_id);
  });
});
