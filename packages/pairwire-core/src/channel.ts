// Simple async channel.

/**
 * An unbounded multi-producer single-consumer async channel.
 *
 * Values sent before `close` are still delivered; after they are drained,
 * `recv` resolves to null, or rejects if the channel was closed with an error.
 */
export interface Channel<T> {
  send(value: T): boolean;
  recv(): Promise<T | null>;
  close(error?: Error): void;
  isClosed(): boolean;
}

interface Waiter<T> {
  resolve(value: T | null): void;
  reject(error: Error): void;
}

interface ChannelState<T> {
  buffer: T[];
  closed: boolean;
  error: Error | null;
  waiters: Array<Waiter<T>>;
}

export function createChannel<T>(): Channel<T> {
  const state: ChannelState<T> = {
    buffer: [],
    closed: false,
    error: null,
    waiters: [],
  };

  return {
    send(value: T): boolean {
      if (state.closed) {
        return false;
      }

      // If there's a waiter, deliver directly
      const waiter = state.waiters.shift();
      if (waiter) {
        waiter.resolve(value);
        return true;
      }

      state.buffer.push(value);
      return true;
    },

    recv(): Promise<T | null> {
      if (state.buffer.length > 0) {
        const [value] = state.buffer.splice(0, 1);
        return Promise.resolve(value);
      }

      // Channel closed and empty
      if (state.error) {
        return Promise.reject(state.error);
      }
      if (state.closed) {
        return Promise.resolve(null);
      }

      return new Promise((resolve, reject) => {
        state.waiters.push({ resolve, reject });
      });
    },

    close(error?: Error): void {
      if (state.closed) return;
      state.closed = true;
      state.error = error ?? null;
      // Waiters only exist while the buffer is empty
      for (const waiter of state.waiters) {
        if (error) waiter.reject(error);
        else waiter.resolve(null);
      }
      state.waiters.length = 0;
    },

    isClosed(): boolean {
      return state.closed;
    },
  };
}
