export const UPSTREAM_HTTP = Symbol('UPSTREAM_HTTP');
export const PROOF_CONSTANT = Symbol('PROOF_CONSTANT');

export const CHAT_REQUIREMENTS_PATH = '/backend-anon/sentinel/chat-requirements';
export const CONVERSATION_PATH = '/backend-anon/conversation';

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36';

export const DONE_SENTINEL = '[DONE]';

/** Headers the anonymous web client sends with every backend call. */
export function commonHeaders(baseUrl: string): Record<string, string> {
  return {
    accept: '*/*',
    'accept-language': 'en',
    'cache-control': 'no-cache',
    'content-type': 'application/json',
    'oai-language': 'en-US',
    origin: baseUrl,
    pragma: 'no-cache',
    priority: 'u=1, i',
    referer: `${baseUrl}/`,
    'sec-ch-ua': '"Google Chrome"; v="123", "Not:A-Brand"; v="8", "Chromium"; v="123"',
    'sec-ch-ua-mobile': '?0',
    'sec-ch-ua-platform': '"Windows"',
    'sec-fetch-dest': 'empty',
    'sec-fetch-mode': 'cors',
    'sec-fetch-site': 'same-origin',
    'user-agent': USER_AGENT,
  };
}
