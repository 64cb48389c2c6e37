import { Inject, Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { GATEWAY_CONFIG, GatewayConfig, MessageMergePolicy } from '../../config/gateway.config';
import {
  ChatMessage,
  ChatRequest,
  ChatRole,
  UpstreamConversationRequest,
  UpstreamMessage,
} from '../../common/interfaces';
import { ValidationError } from '../../common/errors';
import { randomId } from '../../common/utils';
import { ChatCompletionRequestDto } from './dto/chat-completion-request.dto';

const INVALID_MESSAGES = 'Invalid request messages';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text of a message's content: the string itself, or the `text` of the only
 * element of a structured array. Anything else yields an empty string.
 */
export function extractContentText(content: unknown): string {
  if (typeof content === 'string') return content;
  if (Array.isArray(content) && content.length === 1) {
    const [part] = content;
    if (isRecord(part) && typeof part.text === 'string') return part.text;
  }
  return '';
}

export function buildUpstreamMessage(role: ChatRole, text: string): UpstreamMessage {
  return {
    id: randomId(),
    author: { role },
    content: { content_type: 'text', parts: [text] },
    metadata: {},
  };
}

@Injectable()
export class RequestTranslatorService {
  constructor(@Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig) {}

  get mergePolicy(): MessageMergePolicy {
    return this.config.mergePolicy;
  }

  /** Validates an inbound request body. Throws ValidationError, never touches the network. */
  parse(body: unknown): ChatRequest {
    if (!isRecord(body)) {
      throw new ValidationError('Invalid request body, expected a JSON object');
    }

    const dto = plainToInstance(ChatCompletionRequestDto, body);
    const errors = validateSync(dto);
    if (errors.some((error) => error.property === 'stream')) {
      throw new ValidationError('Invalid request body, "stream" must be a boolean');
    }
    if (errors.length > 0) {
      throw new ValidationError(INVALID_MESSAGES);
    }

    const messages: ChatMessage[] = [];
    let systemCount = 0;

    for (const message of dto.messages) {
      const content = extractContentText(message.content);
      if (content === '') {
        throw new ValidationError(INVALID_MESSAGES);
      }
      if (message.role === 'system' && ++systemCount > 1) {
        throw new ValidationError(INVALID_MESSAGES);
      }
      messages.push({ role: message.role, content });
    }

    return {
      model: typeof dto.model === 'string' ? dto.model : undefined,
      messages,
      stream: dto.stream === true,
    };
  }

  translate(request: ChatRequest): UpstreamConversationRequest {
    const messages =
      this.config.mergePolicy === 'passthrough'
        ? request.messages.map((m) => buildUpstreamMessage(m.role, m.content))
        : this.mergeMessages(request.messages);

    return {
      action: 'next',
      messages,
      parent_message_id: randomId(),
      model: this.config.upstream.model,
      timezone_offset_min: 0,
      suggestions: [],
      history_and_training_disabled: true,
      conversation_mode: { kind: 'primary_assistant' },
      force_paragen: false,
      force_paragen_model_slug: '',
      force_nulligen: false,
      force_rate_limit: false,
      websocket_request_id: randomId(),
    };
  }

  /**
   * The system prompt stays a message of its own; every other turn is folded
   * into a single user message. Once there is history (more than two
   * messages), user turns are wrapped in [INST] markers so the backend can
   * tell them apart from earlier assistant replies.
   */
  private mergeMessages(messages: ChatMessage[]): UpstreamMessage[] {
    const hasHistory = messages.length > 2;
    const result: UpstreamMessage[] = [];
    const turns: string[] = [];

    for (const message of messages) {
      if (message.role === 'system') {
        result.push(buildUpstreamMessage('system', message.content));
      } else if (message.role === 'user' && hasHistory) {
        turns.push(`[INST]${message.content}[/INST]`);
      } else {
        turns.push(message.content);
      }
    }

    result.push(buildUpstreamMessage('user', turns.join('\n')));
    return result;
  }
}
