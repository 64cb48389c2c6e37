export type ChatRole = 'system' | 'user' | 'assistant' | (string & {});

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatRequest {
  model?: string;
  messages: ChatMessage[];
  stream: boolean;
}

export interface UpstreamMessage {
  id: string;
  author: { role: ChatRole };
  content: {
    content_type: 'text';
    parts: [string];
  };
  metadata: Record<string, never>;
}

export interface UpstreamConversationRequest {
  action: 'next';
  messages: UpstreamMessage[];
  parent_message_id: string;
  model: string;
  timezone_offset_min: number;
  suggestions: string[];
  history_and_training_disabled: boolean;
  conversation_mode: { kind: 'primary_assistant' };
  force_paragen: boolean;
  force_paragen_model_slug: string;
  force_nulligen: boolean;
  force_rate_limit: boolean;
  websocket_request_id: string;
}

export interface SessionRequirements {
  deviceId: string;
  sessionToken: string;
  challengeSeed: string;
  challengeDifficulty: string;
}

export interface ProofToken {
  token: string;
  /** Set when the bounded search gave up and the fallback token was built instead. */
  degraded: boolean;
  attempts: number;
}

export type RelayFailureKind = 'invalid_status' | 'invalid_content_type' | 'network';

export interface RelayFailure {
  kind: RelayFailureKind;
  message: string;
}

export type RelayEvent =
  | { type: 'first'; error?: RelayFailure }
  | { type: 'text'; text: string }
  | { type: 'done' };

export interface ChatCompletionUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: {
    index: number;
    delta: { role?: 'assistant'; content?: string };
    finish_reason: 'stop' | null;
  }[];
  usage?: ChatCompletionUsage;
}

export interface ChatCompletion {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: {
    index: number;
    message: { role: 'assistant'; content: string };
    finish_reason: 'stop';
  }[];
  usage: ChatCompletionUsage;
}

export interface ModelInfo {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
  permission: {
    id: string;
    object: 'model_permission';
    created: number;
    allow_create_engine: boolean;
    allow_sampling: boolean;
    allow_logprobs: boolean;
    allow_search_indices: boolean;
    allow_view: boolean;
    allow_fine_tuning: boolean;
    organization: string;
    group: string | null;
    is_blocking: boolean;
  }[];
  root: string;
  parent: string | null;
}

export interface ErrorEnvelope {
  status: false;
  error: {
    message: string;
    type: 'invalid_request_error';
  };
}
