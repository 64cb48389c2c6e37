import { RelayEvent } from '../../common/interfaces';
import { RelayHandle } from '../upstream/upstream-relay.service';
import { CompletionMeta } from './completion-frames';

export type AssemblyMode = 'streaming' | 'buffered';

export type AssemblyState =
  | 'idle'
  | 'awaiting_first'
  | 'failed'
  | 'streaming'
  | 'buffered'
  | 'draining'
  | 'complete';

const TRANSITIONS: Record<AssemblyState, readonly AssemblyState[]> = {
  idle: ['awaiting_first'],
  awaiting_first: ['failed', 'streaming', 'buffered'],
  streaming: ['draining'],
  buffered: ['draining'],
  draining: ['complete'],
  failed: [],
  complete: [],
};

/** Per-call state of one chat completion, from the relay's first event to the last frame. */
export class CompletionAssembly {
  private current: AssemblyState = 'idle';

  constructor(
    readonly meta: CompletionMeta,
    readonly mode: AssemblyMode,
    private readonly relay: RelayHandle,
  ) {}

  get state(): AssemblyState {
    return this.current;
  }

  get events(): AsyncIterable<RelayEvent> {
    return this.relay.events;
  }

  receive(): Promise<RelayEvent | undefined> {
    return this.relay.events.receive();
  }

  transition(next: AssemblyState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal completion state transition ${this.current} -> ${next}`);
    }
    this.current = next;
  }

  /** Client went away: stop the relay. No-op once the call is over. */
  cancel(): void {
    if (this.current === 'complete') return;
    this.relay.cancel();
  }
}
