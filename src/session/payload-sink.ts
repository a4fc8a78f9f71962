/**
 * Payload Sinks
 *
 * Destinations for a serialized new-session request. Errors raised by a
 * sink reach the caller of SessionPlan.writePayload() unchanged.
 */

import type { Writable } from 'stream';
import type { SessionPayload } from './session.types.js';

export interface PayloadSink {
  write(payload: SessionPayload): void | Promise<void>;
}

export interface StreamSinkOptions {
  /** Indent the JSON output (default: false) */
  pretty?: boolean;
}

/**
 * JSON-encode the payload into a Node writable stream, one document per line.
 *
 * @example
 * ```typescript
 * await plan.writePayload(createStreamSink(process.stdout, { pretty: true }));
 * ```
 */
export function createStreamSink(stream: Writable, options: StreamSinkOptions = {}): PayloadSink {
  const indent = options.pretty ? 2 : undefined;

  return {
    write(payload: SessionPayload): Promise<void> {
      const text = `${JSON.stringify(payload, null, indent)}\n`;

      return new Promise<void>((resolve, reject) => {
        const onError = (error: Error): void => reject(error);
        // A destroyed stream reports through the write callback only and
        // never emits 'error' again
        if (!stream.destroyed) {
          stream.once('error', onError);
        }

        stream.write(text, (error) => {
          if (error) {
            // Stays attached: a live stream emits 'error' after the write callback
            reject(error);
            return;
          }
          stream.off('error', onError);
          resolve();
        });
      });
    },
  };
}

/**
 * Sink that keeps every payload written to it
 */
export interface MemorySink extends PayloadSink {
  readonly payloads: readonly SessionPayload[];
  last(): SessionPayload | undefined;
}

export function createMemorySink(): MemorySink {
  const payloads: SessionPayload[] = [];

  return {
    payloads,
    write(payload: SessionPayload): void {
      payloads.push(payload);
    },
    last(): SessionPayload | undefined {
      return payloads[payloads.length - 1];
    },
  };
}
