import { randomInt, randomUUID } from 'crypto';

const COMPLETION_ID_CHARSET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export const COMPLETION_MODEL = 'gpt-3.5-turbo';

export function randomId(): string {
  return randomUUID();
}

export function generateCompletionId(): string {
  let id = '';
  for (let i = 0; i < 16; i++) {
    id += COMPLETION_ID_CHARSET[randomInt(COMPLETION_ID_CHARSET.length)];
  }
  return `chatcmpl-${id}`;
}

export function unixSeconds(date: Date = new Date()): number {
  return Math.floor(date.getTime() / 1000);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
