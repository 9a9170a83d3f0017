/**
 * RequestCorrelator - matches JSON-RPC responses to the calls that caused them.
 *
 * One correlator exists per subprocess generation and exclusively owns its
 * PendingCall table. Every mutation of the table happens synchronously on the
 * event loop, so a slot can only be settled by whichever of response, timeout,
 * cancellation or drain gets there first; the others find it gone.
 */

import {
  JSONRPC_METHOD_NOT_FOUND,
  isErrorResponse,
  type JsonRpcId,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from './json-rpc.js';
import type { InboundFrame, StdioFramer } from './stdio-framer.js';
import {
  CancelledError,
  ProtocolError,
  TimeoutError,
  ToolInvocationError,
  TransportError,
  type BridgeError,
} from '../utils/errors.js';
import { logDebug, logWarn } from '../utils/logger.js';

/**
 * State for an in-flight call. Removed from the table exactly once.
 */
export interface PendingCall {
  id: number;
  method: string;
  createdAt: number;
  settled: boolean;
  resolve: (result: unknown) => void;
  reject: (error: BridgeError) => void;
  timeoutHandle: NodeJS.Timeout;
  detachSignal?: () => void;
}

export interface CallOptions {
  /** Hard deadline for this call in ms; defaults to the correlator's timeout */
  timeoutMs?: number;
  /** Frees the slot and rejects with CancelledError when aborted */
  signal?: AbortSignal;
}

export interface RequestCorrelatorOptions {
  generation: number;
  defaultTimeoutMs: number;
  /** Side channel for notifications from the subprocess */
  onNotification?: (notification: JsonRpcNotification) => void;
  now?: () => number;
}

type Outcome = { ok: true; result: unknown } | { ok: false; error: BridgeError };

export class RequestCorrelator {
  private readonly pending = new Map<JsonRpcId, PendingCall>();
  // Replaced in the constructor; a framer that already ended drains us during subscribe()
  private readonly unsubscribe: () => void = () => undefined;
  private readonly now: () => number;
  private nextId = 1;
  private drainedWith: TransportError | null = null;

  readonly generation: number;
  private readonly defaultTimeoutMs: number;
  private readonly onNotification?: (notification: JsonRpcNotification) => void;

  constructor(
    private readonly framer: StdioFramer,
    options: RequestCorrelatorOptions
  ) {
    this.generation = options.generation;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.onNotification = options.onNotification;
    this.now = options.now ?? Date.now;

    this.unsubscribe = framer.subscribe({
      onFrame: (frame) => this.handleFrame(frame),
      onEnd: (reason) => this.drain(reason),
    });
  }

  /** Number of calls currently awaiting a response. */
  get pendingCount(): number {
    return this.pending.size;
  }

  /** False once the correlator has been drained; later calls fail immediately. */
  get isOpen(): boolean {
    return this.drainedWith === null;
  }

  /**
   * Send a request and wait for its response.
   *
   * Rejects with TimeoutError, ToolInvocationError (JSON-RPC error response),
   * TransportError (send failure or drain) or CancelledError.
   */
  call(method: string, params?: unknown, options: CallOptions = {}): Promise<unknown> {
    if (this.drainedWith) {
      return Promise.reject(this.drainedWith);
    }
    if (options.signal?.aborted) {
      return Promise.reject(new CancelledError(method));
    }

    const id = this.nextId++;
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    return new Promise<unknown>((resolve, reject) => {
      const entry: PendingCall = {
        id,
        method,
        createdAt: this.now(),
        settled: false,
        resolve,
        reject,
        timeoutHandle: setTimeout(() => {
          this.settleById(id, { ok: false, error: new TimeoutError(method, timeoutMs) });
        }, timeoutMs),
      };

      const signal = options.signal;
      if (signal) {
        const onAbort = () => this.settleById(id, { ok: false, error: new CancelledError(method) });
        signal.addEventListener('abort', onAbort, { once: true });
        entry.detachSignal = () => signal.removeEventListener('abort', onAbort);
      }

      this.pending.set(id, entry);

      const request: JsonRpcRequest = { jsonrpc: '2.0', id, method };
      if (params !== undefined) request.params = params;

      this.framer.send(request).catch((err: unknown) => {
        const error = err instanceof TransportError ? err : new TransportError(`Failed to send ${method}`);
        this.settleById(id, { ok: false, error });
      });
    });
  }

  /** Send a notification (no response expected). */
  notify(method: string, params?: unknown): Promise<void> {
    if (this.drainedWith) {
      return Promise.reject(this.drainedWith);
    }
    const notification: JsonRpcNotification = { jsonrpc: '2.0', method };
    if (params !== undefined) notification.params = params;
    return this.framer.send(notification);
  }

  /**
   * Fail every pending call with `error` and refuse new ones.
   * Runs automatically when the framer reports end of stream.
   */
  drain(error: TransportError): void {
    if (!this.drainedWith) {
      this.drainedWith = error;
      this.unsubscribe();
    }

    const entries = [...this.pending.values()];
    if (entries.length > 0) {
      logDebug(`Draining ${entries.length} pending call(s): ${error.message}`, {
        component: 'Correlator',
        generation: this.generation,
      });
    }
    for (const entry of entries) {
      this.settle(entry, { ok: false, error });
    }
  }

  // ── Inbound dispatch ────────────────────────────────────────────────

  private handleFrame(frame: InboundFrame): void {
    switch (frame.kind) {
      case 'response':
        this.handleResponse(frame.message);
        break;

      case 'notification':
        logDebug(`Notification: ${frame.message.method}`, {
          component: 'Correlator',
          generation: this.generation,
        });
        this.onNotification?.(frame.message);
        break;

      case 'request':
        this.rejectServerRequest(frame.message);
        break;

      case 'protocol-error':
        // Already logged by the framer; isolated to its own line
        break;
    }
  }

  private handleResponse(response: JsonRpcResponse): void {
    if (response.id === null) {
      const error = new ProtocolError('Error response without id', { details: response });
      logWarn(error.message, {
        component: 'Correlator',
        generation: this.generation,
        error: isErrorResponse(response) ? response.error.message : undefined,
      });
      return;
    }

    const entry = this.pending.get(response.id);
    if (!entry) {
      logDebug(`Discarding response with unknown id ${String(response.id)}`, {
        component: 'Correlator',
        generation: this.generation,
      });
      return;
    }

    if (isErrorResponse(response)) {
      this.settle(entry, { ok: false, error: ToolInvocationError.fromRpcError(entry.method, response.error) });
    } else {
      this.settle(entry, { ok: true, result: response.result });
    }
  }

  /**
   * Server-initiated requests are not supported by the bridge. They are
   * logged as protocol errors and answered with "method not found" so the
   * subprocess does not wait forever.
   */
  private rejectServerRequest(request: JsonRpcRequest): void {
    const error = new ProtocolError(`Unsupported server-initiated request: ${request.method}`);
    logWarn(error.message, { component: 'Correlator', generation: this.generation, id: request.id });

    if (this.drainedWith) return;
    this.framer
      .send({
        jsonrpc: '2.0',
        id: request.id,
        error: { code: JSONRPC_METHOD_NOT_FOUND, message: `Method not supported by bridge: ${request.method}` },
      })
      .catch((err: unknown) => {
        logDebug(`Could not answer server request ${String(request.id)}`, {
          component: 'Correlator',
          error: err instanceof Error ? err.message : String(err),
        });
      });
  }

  // ── Settlement ──────────────────────────────────────────────────────

  private settleById(id: number, outcome: Outcome): void {
    const entry = this.pending.get(id);
    if (entry) {
      this.settle(entry, outcome);
    }
  }

  private settle(entry: PendingCall, outcome: Outcome): void {
    if (entry.settled) {
      throw new Error(`PendingCall ${entry.id} (${entry.method}) settled twice`);
    }
    entry.settled = true;
    this.pending.delete(entry.id);
    clearTimeout(entry.timeoutHandle);
    entry.detachSignal?.();

    logDebug(`${entry.method}#${entry.id} ${outcome.ok ? 'resolved' : `failed (${outcome.error.kind})`}`, {
      component: 'Correlator',
      generation: this.generation,
      durationMs: this.now() - entry.createdAt,
    });

    if (outcome.ok) {
      entry.resolve(outcome.result);
    } else {
      entry.reject(outcome.error);
    }
  }
}
