import { Injectable, Logger } from '@nestjs/common';
import { ChatCompletion } from '../../common/interfaces';
import { ClientClosedError, UpstreamTransportError } from '../../common/errors';
import { COMPLETION_MODEL, generateCompletionId, unixSeconds } from '../../common/utils';
import { RelayHandle } from '../upstream/upstream-relay.service';
import { AssemblyMode, CompletionAssembly } from './completion-assembly';
import { createCompletion, renderChunkFrame, renderFinalFrame } from './completion-frames';

@Injectable()
export class CompletionAssemblerService {
  private readonly logger = new Logger(CompletionAssemblerService.name);

  /**
   * The commit point. Waits for the relay's first event; an upstream failure
   * reported there fails the whole call before a single byte goes out.
   */
  async commit(relay: RelayHandle, mode: AssemblyMode): Promise<CompletionAssembly> {
    const assembly = new CompletionAssembly(
      { id: generateCompletionId(), created: unixSeconds(), model: COMPLETION_MODEL },
      mode,
      relay,
    );
    assembly.transition('awaiting_first');

    const first = await assembly.receive();

    if (!first) {
      assembly.transition('failed');
      if (relay.events.isCancelled) {
        throw new ClientClosedError();
      }
      throw new UpstreamTransportError('closed', 'Upstream closed the connection before responding');
    }
    if (first.type !== 'first') {
      assembly.transition('failed');
      relay.cancel();
      throw new UpstreamTransportError('closed', `Upstream relay sent ${first.type} before opening`);
    }
    if (first.error) {
      assembly.transition('failed');
      throw new UpstreamTransportError(first.error.kind, first.error.message);
    }

    assembly.transition(mode);
    return assembly;
  }

  /**
   * Lazily renders the rest of the relay's events as SSE frames, in order.
   * Abandoning the iteration early cancels the relay.
   */
  async *frames(assembly: CompletionAssembly): AsyncGenerator<string, void, undefined> {
    assembly.transition('draining');
    let count = 0;
    try {
      for await (const event of assembly.events) {
        if (event.type === 'text') {
          count++;
          yield renderChunkFrame(assembly.meta, event.text);
        } else if (event.type === 'done') {
          yield renderFinalFrame(assembly.meta);
          break;
        }
      }
      assembly.transition('complete');
      this.logger.debug(`Completion ${assembly.meta.id} streamed ${count} content frames`);
    } finally {
      assembly.cancel();
    }
  }

  /** Buffers every text delta until `done` (or the end of the stream) into one completion. */
  async collect(assembly: CompletionAssembly): Promise<ChatCompletion> {
    assembly.transition('draining');
    const parts: string[] = [];
    let sawDone = false;

    for await (const event of assembly.events) {
      if (event.type === 'text') {
        parts.push(event.text);
      } else if (event.type === 'done') {
        sawDone = true;
        break;
      }
    }

    assembly.transition('complete');
    if (!sawDone) {
      this.logger.warn(`Completion ${assembly.meta.id} ended without a done event, returning partial content`);
    }
    return createCompletion(assembly.meta, parts.join(''));
  }
}
