/**
 * StdioFramer - newline-delimited JSON-RPC over a subprocess's stdio.
 *
 * Read side: one readline loop owns the subprocess stdout and decodes every
 * line into an InboundFrame, fanned out to all subscribers. A line that fails
 * to decode becomes a `protocol-error` frame for that line only.
 *
 * Write side: `send()` calls are chained so that concurrent callers never
 * interleave partial lines. A caller holds the write slot only until its own
 * line is flushed, never until a response arrives.
 */

import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { classifyMessage, type ClassifiedMessage, type JsonRpcMessage } from './json-rpc.js';
import { ProtocolError, TransportError, errorMessage } from '../utils/errors.js';
import { logDebug, logWarn } from '../utils/logger.js';

export type InboundFrame = ClassifiedMessage | { kind: 'protocol-error'; error: ProtocolError };

export interface FrameListener {
  onFrame(frame: InboundFrame): void;
  /** Called once when the output stream ends or the framer is closed. */
  onEnd?(reason: TransportError): void;
}

export interface StdioFramerOptions {
  /** Lines longer than this are reported as protocol errors and skipped (default 16 MiB) */
  maxLineBytes?: number;
  /** Label used in log lines, e.g. "generation 3" */
  label?: string;
}

const DEFAULT_MAX_LINE_BYTES = 16 * 1024 * 1024;
const LOG_LINE_PREVIEW = 200;

export class StdioFramer {
  private readonly readline: Interface;
  private readonly listeners = new Set<FrameListener>();
  private readonly maxLineBytes: number;
  private readonly label: string;

  private writeChain: Promise<void> = Promise.resolve();
  private writeFailure: TransportError | null = null;
  private endReason: TransportError | null = null;

  /**
   * @param input   the subprocess stdout (messages from the tool server)
   * @param output  the subprocess stdin (messages to the tool server)
   */
  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    options: StdioFramerOptions = {}
  ) {
    this.maxLineBytes = options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES;
    this.label = options.label ?? 'subprocess';

    this.readline = createInterface({ input, crlfDelay: Infinity });
    this.readline.on('line', (line) => this.handleLine(line));
    this.readline.on('close', () => this.finish(new TransportError(`Output stream of ${this.label} ended`)));

    // Without a listener an EPIPE on stdin would crash the bridge
    this.output.on('error', (err) => {
      this.writeFailure = new TransportError(`Input stream of ${this.label} failed: ${err.message}`);
      logWarn(`stdin error: ${err.message}`, { component: 'Framer', target: this.label });
    });
    this.input.on('error', (err) => {
      logWarn(`stdout error: ${err.message}`, { component: 'Framer', target: this.label });
      this.finish(new TransportError(`Output stream of ${this.label} failed: ${err.message}`));
    });
  }

  /** True until the output stream has ended or the framer was closed. */
  get isOpen(): boolean {
    return this.endReason === null;
  }

  // ── Write side ──────────────────────────────────────────────────────

  /**
   * Serialize and write one message as a single line.
   * Rejects with TransportError if the input stream is closed or broken.
   */
  send(message: JsonRpcMessage): Promise<void> {
    const line = `${JSON.stringify(message)}\n`;
    const task = this.writeChain.then(() => this.writeLine(line));
    // The chain only orders writes; each caller observes its own failure through `task`
    this.writeChain = task.then(
      () => undefined,
      () => undefined
    );
    return task;
  }

  private writeLine(line: string): Promise<void> {
    const unusable = this.checkWritable();
    if (unusable) {
      return Promise.reject(unusable);
    }

    return new Promise<void>((resolve, reject) => {
      this.output.write(line, (err) => {
        if (err) {
          this.writeFailure ??= new TransportError(`Write to ${this.label} failed: ${err.message}`);
          reject(this.writeFailure);
          return;
        }
        resolve();
      });
    });
  }

  private checkWritable(): TransportError | null {
    if (this.writeFailure) return this.writeFailure;
    if (this.output.destroyed || this.output.writableEnded) {
      return new TransportError(`Input stream of ${this.label} is closed`);
    }
    return null;
  }

  /** Close the subprocess stdin, signalling end-of-input. Pending writes flush first. */
  endInput(): void {
    if (!this.output.writableEnded && !this.output.destroyed) {
      this.output.end();
    }
  }

  // ── Read side ───────────────────────────────────────────────────────

  /**
   * Register a listener for every decoded frame. Returns an unsubscribe function.
   * A listener added after the stream ended gets `onEnd` immediately.
   */
  subscribe(listener: FrameListener): () => void {
    if (this.endReason) {
      listener.onEnd?.(this.endReason);
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Lazy sequence of inbound frames. Subscription starts on the first
   * `next()`; the sequence completes when the subprocess output ends.
   */
  async *receive(): AsyncGenerator<InboundFrame, void, undefined> {
    const queue: InboundFrame[] = [];
    let ended = false;
    let wake: (() => void) | null = null;

    const unsubscribe = this.subscribe({
      onFrame: (frame) => {
        queue.push(frame);
        wake?.();
      },
      onEnd: () => {
        ended = true;
        wake?.();
      },
    });

    try {
      for (;;) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (ended) return;
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = null;
      }
    } finally {
      unsubscribe();
    }
  }

  /** Resolves with the end reason once the output stream has ended. */
  waitForEnd(): Promise<TransportError> {
    return new Promise((resolve) => {
      this.subscribe({ onFrame: () => undefined, onEnd: resolve });
    });
  }

  private handleLine(line: string): void {
    if (this.endReason) return;
    const trimmed = line.trim();
    if (!trimmed) return;

    this.dispatch(this.decode(trimmed));
  }

  private decode(line: string): InboundFrame {
    if (Buffer.byteLength(line, 'utf8') > this.maxLineBytes) {
      return {
        kind: 'protocol-error',
        error: new ProtocolError(`Line exceeds ${this.maxLineBytes} bytes`, { line: line.slice(0, LOG_LINE_PREVIEW) }),
      };
    }

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (err) {
      return {
        kind: 'protocol-error',
        error: new ProtocolError(`Invalid JSON from ${this.label}: ${errorMessage(err)}`, { line }),
      };
    }

    const classified = classifyMessage(value);
    if (classified.kind === 'invalid') {
      return { kind: 'protocol-error', error: new ProtocolError(classified.reason, { line }) };
    }
    return classified;
  }

  private dispatch(frame: InboundFrame): void {
    if (frame.kind === 'protocol-error') {
      logWarn(`Discarding undecodable line: ${frame.error.message}`, {
        component: 'Framer',
        target: this.label,
        line: frame.error.line?.slice(0, LOG_LINE_PREVIEW),
      });
    }

    // Copy so listeners that unsubscribe during dispatch do not disturb iteration
    for (const listener of [...this.listeners]) {
      listener.onFrame(frame);
    }
  }

  // ── Teardown ────────────────────────────────────────────────────────

  /** Detach from the streams and end every reader. Idempotent. */
  close(reason = new TransportError(`Framer for ${this.label} closed`)): void {
    this.finish(reason);
  }

  private finish(reason: TransportError): void {
    if (this.endReason) return;
    this.endReason = reason;
    this.writeFailure ??= reason;
    this.readline.close();

    logDebug(`Framer closed: ${reason.message}`, { component: 'Framer', target: this.label });

    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      listener.onEnd?.(reason);
    }
  }
}
