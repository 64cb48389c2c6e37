import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { GATEWAY_CONFIG, GatewayConfig } from '../../config/gateway.config';
import {
  RelayEvent,
  RelayFailure,
  SessionRequirements,
  UpstreamConversationRequest,
} from '../../common/interfaces';
import { UpstreamParseError, UpstreamTransportError } from '../../common/errors';
import { ChannelClosedError, HandoffChannel } from '../../common/utils/handoff-channel';
import { errorMessage } from '../../common/utils';
import { CONVERSATION_PATH, DONE_SENTINEL, UPSTREAM_HTTP, commonHeaders } from './upstream.constants';
import { ConversationEventDto } from './dto/conversation-event.dto';
import { parseUpstreamJson } from './upstream-parse';
import { parseSse } from './sse-parser';

export interface RelayHandle {
  events: HandoffChannel<RelayEvent>;
  /** Stops the relay: pending and future sends reject and the upstream response is torn down. */
  cancel(): void;
  /** Settles once the relay task has released the upstream connection. */
  finished: Promise<void>;
}

async function readText(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function describeTransportError(error: unknown): RelayFailure {
  if (error instanceof UpstreamTransportError && error.kind !== 'closed') {
    return { kind: error.kind, message: error.message };
  }
  if (axios.isAxiosError(error)) {
    return { kind: 'network', message: error.message };
  }
  return { kind: 'network', message: errorMessage(error) };
}

/**
 * Tracks the cumulative text snapshots of one assistant message and turns
 * them into deltas. Lengths are counted in code points, not UTF-16 units or
 * bytes, so a snapshot never splits a character.
 */
export class SnapshotDeltaTracker {
  private observed = 0;

  /** Returns the delta to forward, or `null` when the snapshot adds nothing. */
  next(snapshot: string): string | null {
    const chars = Array.from(snapshot);
    const delta = chars.slice(this.observed).join('');
    if (delta === '' && this.observed > 0) return null;
    this.observed = chars.length;
    return delta;
  }
}

@Injectable()
export class UpstreamRelayService {
  private readonly logger = new Logger(UpstreamRelayService.name);

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    @Inject(UPSTREAM_HTTP) private readonly http: AxiosInstance,
  ) {}

  /**
   * Starts the relay task and returns immediately. The task publishes exactly
   * one `first` event, then text deltas, then `done` (unless the upstream
   * stream breaks off), and closes the channel when it ends. Aborting
   * `clientSignal` cancels the relay, also before it has opened.
   */
  open(
    request: UpstreamConversationRequest,
    session: SessionRequirements,
    proofToken: string,
    clientSignal?: AbortSignal,
  ): RelayHandle {
    const events = new HandoffChannel<RelayEvent>();
    const controller = new AbortController();
    const cancel = () => {
      controller.abort();
      events.cancel();
    };

    if (clientSignal?.aborted) {
      cancel();
    } else {
      clientSignal?.addEventListener('abort', cancel, { once: true });
    }

    const finished = this.run(request, session, proofToken, events, controller.signal)
      .catch((error) => {
        this.logger.error(`Relay task failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        clientSignal?.removeEventListener('abort', cancel);
        events.close();
      });

    return { events, cancel, finished };
  }

  private async run(
    request: UpstreamConversationRequest,
    session: SessionRequirements,
    proofToken: string,
    events: HandoffChannel<RelayEvent>,
    signal: AbortSignal,
  ): Promise<void> {
    if (signal.aborted) return;

    const { baseUrl, connectTimeoutMs } = this.config.upstream;
    let firstSent = false;
    let stream: Readable | undefined;
    let connectTimedOut = false;

    const sendFirst = async (error?: RelayFailure) => {
      if (firstSent) return;
      firstSent = true;
      await events.send(error === undefined ? { type: 'first' } : { type: 'first', error });
    };
    // aborted by a cancel, or by the connect timer until the response headers arrive
    const upstreamAbort = new AbortController();
    const onAbort = () => {
      upstreamAbort.abort();
      stream?.destroy();
    };
    signal.addEventListener('abort', onAbort, { once: true });
    const connectTimer = setTimeout(() => {
      connectTimedOut = true;
      upstreamAbort.abort();
    }, connectTimeoutMs);

    this.logger.debug(
      `headers: oai-device-id ${session.deviceId}; openai-sentinel-chat-requirements-token ${session.sessionToken}; ` +
        `openai-sentinel-proof-token ${proofToken}`,
    );
    this.logger.debug(`req body: ${JSON.stringify(request)}`);

    try {
      const response = await this.http.post<Readable>(`${baseUrl}${CONVERSATION_PATH}`, request, {
        headers: {
          ...commonHeaders(baseUrl),
          accept: 'text/event-stream',
          'oai-device-id': session.deviceId,
          'openai-sentinel-chat-requirements-token': session.sessionToken,
          'openai-sentinel-proof-token': proofToken,
        },
        responseType: 'stream',
        validateStatus: () => true,
        signal: upstreamAbort.signal,
      });
      clearTimeout(connectTimer);
      stream = response.data;

      if (response.status < 200 || response.status >= 300) {
        let message: string;
        try {
          message = `Invalid response code ${response.status}, ${await readText(stream)}`;
        } catch (error) {
          message = `Invalid response, code ${response.status}, ${errorMessage(error)}`;
        }
        throw new UpstreamTransportError('invalid_status', message);
      }

      const contentType = String(response.headers['content-type'] ?? '');
      if (!contentType.includes('text/event-stream')) {
        const text = await readText(stream).catch(() => '');
        throw new UpstreamTransportError(
          'invalid_content_type',
          `The upstream API should return data as 'text/event-stream', but it isn't. ${text}`,
        );
      }

      await sendFirst();

      const tracker = new SnapshotDeltaTracker();
      for await (const event of parseSse(stream)) {
        if (event.data === DONE_SENTINEL) {
          await events.send({ type: 'done' });
          return;
        }
        const snapshot = this.assistantSnapshot(event.data);
        if (snapshot === undefined) continue;
        const delta = tracker.next(snapshot);
        if (delta === null) continue;
        await events.send({ type: 'text', text: delta });
      }

      if (!signal.aborted) {
        this.logger.debug('Upstream stream ended without a [DONE] sentinel');
      }
    } catch (error) {
      if (signal.aborted || error instanceof ChannelClosedError) {
        this.logger.debug('Relay cancelled, stopped reading upstream');
        return;
      }
      const diagnostic: RelayFailure = connectTimedOut
        ? { kind: 'network', message: `Upstream did not respond within ${connectTimeoutMs}ms` }
        : describeTransportError(error);
      if (firstSent) {
        this.logger.warn(`Upstream stream broke off after the response was committed: ${diagnostic.message}`);
        return;
      }
      this.logger.warn(`Upstream conversation failed (${diagnostic.kind}): ${diagnostic.message}`);
      try {
        await sendFirst(diagnostic);
      } catch (sendError) {
        if (!(sendError instanceof ChannelClosedError)) throw sendError;
        this.logger.debug('Client left before the upstream failure could be reported');
      }
    } finally {
      clearTimeout(connectTimer);
      signal.removeEventListener('abort', onAbort);
      stream?.destroy();
    }
  }

  /** Cumulative text of an assistant message event, `undefined` for anything else. */
  private assistantSnapshot(data: string): string | undefined {
    let event: ConversationEventDto;
    try {
      event = parseUpstreamJson(ConversationEventDto, data);
    } catch (error) {
      if (error instanceof UpstreamParseError) {
        this.logger.debug(`Skipping upstream event (${error.kind}): ${error.message}`);
        return undefined;
      }
      throw error;
    }

    const message = event.message;
    if (!message || message.author.role !== 'assistant') return undefined;
    const [text] = message.content.parts;
    return typeof text === 'string' ? text : undefined;
  }
}
