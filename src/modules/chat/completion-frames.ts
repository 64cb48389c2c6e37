import { ChatCompletion, ChatCompletionChunk, ChatCompletionUsage } from '../../common/interfaces';

export interface CompletionMeta {
  id: string;
  created: number;
  model: string;
}

export const SSE_DONE_FRAME = 'data: [DONE]\n\n';

const zeroUsage = (): ChatCompletionUsage => ({
  prompt_tokens: 0,
  completion_tokens: 0,
  total_tokens: 0,
});

/**
 * An empty delta announces the assistant role; the upstream's first
 * snapshot is usually empty, and OpenAI clients expect the role up front.
 */
export function createChunk(meta: CompletionMeta, text: string): ChatCompletionChunk {
  return {
    id: meta.id,
    object: 'chat.completion.chunk',
    created: meta.created,
    model: meta.model,
    choices: [
      {
        index: 0,
        delta: text === '' ? { role: 'assistant', content: '' } : { content: text },
        finish_reason: null,
      },
    ],
  };
}

export function createFinalChunk(meta: CompletionMeta): ChatCompletionChunk {
  return {
    id: meta.id,
    object: 'chat.completion.chunk',
    created: meta.created,
    model: meta.model,
    choices: [{ index: 0, delta: {}, finish_reason: 'stop' }],
    usage: zeroUsage(),
  };
}

export function createCompletion(meta: CompletionMeta, content: string): ChatCompletion {
  return {
    id: meta.id,
    object: 'chat.completion',
    created: meta.created,
    model: meta.model,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content },
        finish_reason: 'stop',
      },
    ],
    usage: zeroUsage(),
  };
}

export function renderChunkFrame(meta: CompletionMeta, text: string): string {
  return `data: ${JSON.stringify(createChunk(meta, text))}\n\n`;
}

/** The terminal chunk and the [DONE] sentinel always leave in the same write. */
export function renderFinalFrame(meta: CompletionMeta): string {
  return `data: ${JSON.stringify(createFinalChunk(meta))}\n\n${SSE_DONE_FRAME}`;
}
