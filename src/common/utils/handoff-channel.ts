export class ChannelClosedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChannelClosedError';
  }
}

/**
 * Single-producer, single-consumer channel with room for exactly one value.
 *
 * `send` waits until the previous value has been taken, so the producer can
 * never run more than one event ahead of the consumer. `close` is called by
 * the producer when it has nothing more to say; the consumer still drains a
 * pending value. `cancel` is called by the consumer when it stops listening;
 * the pending value is dropped and every later `send` rejects.
 */
export class HandoffChannel<T extends object> implements AsyncIterable<T> {
  private slot: T | null = null;
  private closed = false;
  private cancelled = false;
  private wakeReceiver: (() => void) | null = null;
  private wakeSender: (() => void) | null = null;

  get isCancelled(): boolean {
    return this.cancelled;
  }

  async send(value: T): Promise<void> {
    while (this.slot !== null && !this.cancelled) {
      await new Promise<void>((resolve) => {
        this.wakeSender = resolve;
      });
    }
    if (this.cancelled) {
      throw new ChannelClosedError('Receiver has gone away');
    }
    if (this.closed) {
      throw new ChannelClosedError('Channel is closed');
    }
    this.slot = value;
    this.notifyReceiver();
  }

  /** Resolves with the next value, or `undefined` once the channel is closed and empty. */
  async receive(): Promise<T | undefined> {
    while (this.slot === null && !this.closed && !this.cancelled) {
      await new Promise<void>((resolve) => {
        this.wakeReceiver = resolve;
      });
    }
    if (this.cancelled || this.slot === null) {
      return undefined;
    }
    const value = this.slot;
    this.slot = null;
    this.notifySender();
    return value;
  }

  close(): void {
    this.closed = true;
    this.notifyReceiver();
  }

  cancel(): void {
    this.cancelled = true;
    this.slot = null;
    this.notifyReceiver();
    this.notifySender();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const value = await this.receive();
      if (value === undefined) return;
      yield value;
    }
  }

  private notifyReceiver() {
    const wake = this.wakeReceiver;
    this.wakeReceiver = null;
    if (wake) wake();
  }

  private notifySender() {
    const wake = this.wakeSender;
    this.wakeSender = null;
    if (wake) wake();
  }
}
