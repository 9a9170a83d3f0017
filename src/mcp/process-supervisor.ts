/**
 * ProcessSupervisor - owns the MCP tool server subprocess.
 *
 * Spawns the subprocess, attaches a Framer and Correlator per generation,
 * runs the handshake hook, and restarts on failure with exponential backoff
 * limited by a sliding window. Lifecycle:
 *
 *   starting → handshaking → ready
 *       ↓           ↓          ↓
 *       └────── degraded ──────┘ → restarting → starting …
 *
 * Any state can move to terminated (shutdown or exhausted restarts), which is
 * final.
 */

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { StdioFramer } from './stdio-framer.js';
import { RequestCorrelator } from './request-correlator.js';
import { BridgeError, ProtocolError, TransportError, errorMessage } from '../utils/errors.js';
import { logDebug, logInfo, logWarn } from '../utils/logger.js';

// ── Types ───────────────────────────────────────────────────────────

export type LifecycleState = 'starting' | 'handshaking' | 'ready' | 'degraded' | 'restarting' | 'terminated';

/**
 * The slice of a ChildProcess the supervisor uses. Node's ChildProcess
 * satisfies it, and tests substitute an in-process fake.
 */
export interface ChildProcessLike {
  readonly pid?: number;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'spawn', listener: () => void): this;
  once(event: 'error', listener: (err: Error) => void): this;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: { env: NodeJS.ProcessEnv; cwd?: string }
) => ChildProcessLike;

export interface RestartPolicy {
  /** Restarts allowed inside `windowMs` before giving up */
  maxRestarts: number;
  windowMs: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface ShutdownPolicy {
  /** Wait after closing stdin before SIGTERM */
  gracePeriodMs: number;
  /** Wait after SIGTERM before SIGKILL */
  killTimeoutMs: number;
}

/** Per-generation channel to the subprocess. Discarded when the generation ends. */
export interface GenerationContext {
  readonly generation: number;
  readonly pid: number | undefined;
  readonly framer: StdioFramer;
  readonly correlator: RequestCorrelator;
}

export interface SubprocessHandle {
  readonly pid: number | undefined;
  readonly generation: number;
  readonly state: LifecycleState;
  readonly stdin: Writable | undefined;
  readonly stdout: Readable | undefined;
  readonly stderr: Readable | undefined;
}

export interface StateChange {
  from: LifecycleState;
  to: LifecycleState;
  generation: number;
  reason: string;
}

export interface GenerationEnded {
  generation: number;
  pid: number | undefined;
  reason: string;
}

export interface Terminated {
  reason: string;
  /** True when the restart limit was reached, false for a requested shutdown */
  exhausted: boolean;
}

export interface ProcessSupervisorOptions {
  callTimeoutMs: number;
  restart: RestartPolicy;
  shutdown: ShutdownPolicy;
  /** Extra environment for the subprocess, merged over the bridge's own */
  env?: Record<string, string>;
  cwd?: string;
  /** Runs after every spawn; the generation becomes ready only when it resolves */
  handshake?: (context: GenerationContext) => Promise<void>;
  spawn?: SpawnFunction;
  random?: () => number;
  now?: () => number;
}

export const MAX_STDERR_LINES = 100;

const TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  starting: ['handshaking', 'degraded', 'terminated'],
  handshaking: ['ready', 'degraded', 'terminated'],
  ready: ['degraded', 'terminated'],
  degraded: ['restarting', 'terminated'],
  restarting: ['starting', 'terminated'],
  terminated: [],
};

export class IllegalTransitionError extends Error {
  constructor(from: LifecycleState, to: LifecycleState) {
    super(`Illegal lifecycle transition ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

interface Generation {
  context: GenerationContext;
  child: ChildProcessLike;
  stderrReader: Interface;
  exited: boolean;
  exit: Promise<void>;
  ended: boolean;
}

const defaultSpawn: SpawnFunction = (command, args, options) =>
  spawn(command, [...args], { env: options.env, cwd: options.cwd });

export interface SupervisorEvents {
  state: [change: StateChange];
  ready: [context: GenerationContext];
  'generation-ended': [ended: GenerationEnded];
  terminated: [terminated: Terminated];
}

export interface ProcessSupervisor {
  on<E extends keyof SupervisorEvents>(event: E, listener: (...args: SupervisorEvents[E]) => void): this;
  once<E extends keyof SupervisorEvents>(event: E, listener: (...args: SupervisorEvents[E]) => void): this;
  off<E extends keyof SupervisorEvents>(event: E, listener: (...args: SupervisorEvents[E]) => void): this;
  emit<E extends keyof SupervisorEvents>(event: E, ...args: SupervisorEvents[E]): boolean;
}

// ── ProcessSupervisor ───────────────────────────────────────────────

export class ProcessSupervisor extends EventEmitter {
  private currentState: LifecycleState = 'starting';
  private generationCounter = 0;
  private active: Generation | null = null;
  private command = '';
  private args: readonly string[] = [];
  private started = false;
  private stopping: Promise<void> | null = null;
  private restartTimer: NodeJS.Timeout | null = null;
  private restartTimes: number[] = [];
  private restartTotal = 0;
  private readonly stderrLines: string[] = [];

  private readonly spawnProcess: SpawnFunction;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(private readonly options: ProcessSupervisorOptions) {
    super();
    this.spawnProcess = options.spawn ?? defaultSpawn;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => Date.now());
  }

  get state(): LifecycleState {
    return this.currentState;
  }

  get generation(): number {
    return this.generationCounter;
  }

  get pid(): number | undefined {
    return this.active?.child.pid;
  }

  /** Total restarts since start (not just those inside the window). */
  get restarts(): number {
    return this.restartTotal;
  }

  /** Last lines the subprocess wrote to stderr, oldest first. */
  recentStderr(): string[] {
    return [...this.stderrLines];
  }

  /** The running child of the current generation, if any. */
  activeChild(): ChildProcessLike | undefined {
    return this.active && !this.active.ended ? this.active.child : undefined;
  }

  /**
   * Spawn the first generation and resolve once it is ready.
   * Rejects if the supervisor terminates first (restart limit or stop()).
   */
  start(command: string, args: readonly string[] = []): Promise<SubprocessHandle> {
    if (this.started) {
      throw new Error('ProcessSupervisor.start() called twice');
    }
    this.started = true;
    this.command = command;
    this.args = args;

    const ready = new Promise<SubprocessHandle>((resolve, reject) => {
      const onReady = () => {
        this.off('terminated', onTerminated);
        resolve(new LiveSubprocessHandle(this));
      };
      const onTerminated = (event: Terminated) => {
        this.off('ready', onReady);
        reject(new TransportError(`Tool server did not become ready: ${event.reason}`));
      };
      this.once('ready', onReady);
      this.once('terminated', onTerminated);
    });

    this.spawnGeneration();
    return ready;
  }

  /**
   * Ordered shutdown: mark terminated, close stdin, wait for exit, then
   * SIGTERM and finally SIGKILL. Pending calls drain once the output ends.
   * Idempotent.
   */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  // ── Spawning ────────────────────────────────────────────────────────

  private spawnGeneration(): void {
    const generation = ++this.generationCounter;
    this.active = null;

    let child: ChildProcessLike;
    try {
      child = this.spawnProcess(this.command, this.args, {
        env: { ...process.env, ...this.options.env },
        cwd: this.options.cwd,
      });
    } catch (err) {
      this.handleFailure(generation, new TransportError(`Failed to spawn ${this.command}: ${errorMessage(err)}`));
      return;
    }

    const label = `generation ${generation}`;
    const framer = new StdioFramer(child.stdout, child.stdin, { label });
    const correlator = new RequestCorrelator(framer, {
      generation,
      defaultTimeoutMs: this.options.callTimeoutMs,
    });

    let markExited: () => void = () => undefined;
    const gen: Generation = {
      context: { generation, pid: child.pid, framer, correlator },
      child,
      stderrReader: createInterface({ input: child.stderr, crlfDelay: Infinity }),
      exited: false,
      exit: new Promise<void>((resolve) => {
        markExited = resolve;
      }),
      ended: false,
    };
    this.active = gen;

    gen.stderrReader.on('line', (line) => this.recordStderr(generation, line));

    let spawned = false;
    child.once('spawn', () => {
      spawned = true;
      // The generation may have been replaced or stopped before the event arrived
      if (this.active !== gen || this.currentState !== 'starting') return;
      this.transition('handshaking', `spawned pid ${String(child.pid)}`);
      this.runHandshake(gen);
    });

    child.once('error', (err) => {
      const message = spawned ? `Subprocess error: ${err.message}` : `Failed to spawn ${this.command}: ${err.message}`;
      this.handleFailure(generation, new TransportError(message));
    });

    child.once('exit', (code, signal) => {
      gen.exited = true;
      markExited();
      const how = signal ? `signal ${signal}` : `code ${String(code)}`;
      this.handleFailure(generation, new TransportError(`Subprocess exited with ${how}`));
    });

    child.stdin.on('error', (err) => {
      this.handleFailure(generation, new TransportError(`Subprocess stdin failed: ${err.message}`));
    });

    framer.subscribe({
      onFrame: () => undefined,
      onEnd: (reason) => this.handleFailure(generation, reason),
    });

    logInfo(`Spawning ${this.command} (${label})`, { component: 'Supervisor', args: this.args });
  }

  private runHandshake(gen: Generation): void {
    const handshake = this.options.handshake ?? (() => Promise.resolve());
    handshake(gen.context).then(
      () => {
        if (this.active !== gen || this.currentState !== 'handshaking') return;
        this.transition('ready', 'handshake complete');
        logInfo(`Tool server ready (generation ${gen.context.generation}, pid ${String(gen.child.pid)})`, {
          component: 'Supervisor',
        });
        this.emit('ready', gen.context);
      },
      (err: unknown) => {
        const error = err instanceof BridgeError ? err : new ProtocolError(`Handshake failed: ${errorMessage(err)}`);
        this.handleFailure(gen.context.generation, error);
      }
    );
  }

  private recordStderr(generation: number, line: string): void {
    const trimmed = line.trimEnd();
    if (!trimmed) return;
    logDebug(trimmed, { component: 'subprocess', generation });
    this.stderrLines.push(trimmed);
    if (this.stderrLines.length > MAX_STDERR_LINES) {
      this.stderrLines.shift();
    }
  }

  // ── Failure and restart ─────────────────────────────────────────────

  private handleFailure(generation: number, error: BridgeError): void {
    // Late events from a generation that was already replaced or torn down
    if (generation !== this.generationCounter) return;
    if (this.currentState !== 'starting' && this.currentState !== 'handshaking' && this.currentState !== 'ready') {
      return;
    }

    logWarn(`Generation ${generation} failed: ${error.message}`, { component: 'Supervisor', kind: error.kind });
    this.transition('degraded', error.message);

    const gen = this.active;
    const transportError = error instanceof TransportError ? error : new TransportError(error.message);
    if (gen) {
      this.teardown(gen, transportError);
    }
    this.emit('generation-ended', { generation, pid: gen?.child.pid, reason: error.message });

    const now = this.now();
    const { maxRestarts, windowMs, baseDelayMs, maxDelayMs, jitterMs } = this.options.restart;
    this.restartTimes = this.restartTimes.filter((time) => now - time < windowMs);

    if (this.restartTimes.length >= maxRestarts) {
      this.terminate(
        `Restart limit reached (${maxRestarts} in ${windowMs}ms); last failure: ${error.message}`,
        true
      );
      return;
    }

    const attempt = this.restartTimes.length;
    const delay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs) + this.random() * jitterMs;
    this.restartTimes.push(now);
    this.restartTotal++;

    this.transition('restarting', `restart ${attempt + 1}/${maxRestarts} in ${Math.round(delay)}ms`);
    logInfo(`Restarting tool server in ${Math.round(delay)}ms (attempt ${attempt + 1}/${maxRestarts})`, {
      component: 'Supervisor',
    });

    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      if (this.currentState !== 'restarting') return;
      this.transition('starting', 'backoff elapsed');
      this.spawnGeneration();
    }, delay);
  }

  /** Release a failed generation: drain its calls, close its streams and kill the child if alive. */
  private teardown(gen: Generation, reason: TransportError): void {
    if (gen.ended) return;
    gen.ended = true;
    gen.context.correlator.drain(reason);
    gen.context.framer.close(reason);
    gen.stderrReader.close();

    if (!gen.exited && gen.child.exitCode === null && gen.child.signalCode === null) {
      gen.child.kill('SIGTERM');
      const killTimer = setTimeout(() => {
        if (!gen.exited) gen.child.kill('SIGKILL');
      }, this.options.shutdown.killTimeoutMs);
      void gen.exit.then(() => clearTimeout(killTimer));
    }
  }

  private terminate(reason: string, exhausted: boolean): void {
    if (this.currentState === 'terminated') return;
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    this.transition('terminated', reason);
    if (exhausted) {
      logWarn(reason, { component: 'Supervisor' });
    }
    this.emit('terminated', { reason, exhausted });
  }

  // ── Shutdown ────────────────────────────────────────────────────────

  private async shutdown(): Promise<void> {
    const gen = this.active;
    this.terminate('Shutdown requested', false);
    if (!gen || gen.ended) return;
    gen.ended = true;

    // Pending calls stay open until the server's output ends
    gen.context.framer.endInput();

    if (!(await this.waitForExit(gen, this.options.shutdown.gracePeriodMs))) {
      logWarn(`Tool server did not exit within ${this.options.shutdown.gracePeriodMs}ms, sending SIGTERM`, {
        component: 'Supervisor',
      });
      gen.child.kill('SIGTERM');

      if (!(await this.waitForExit(gen, this.options.shutdown.killTimeoutMs))) {
        logWarn('Tool server ignored SIGTERM, sending SIGKILL', { component: 'Supervisor' });
        gen.child.kill('SIGKILL');
      }
    }
    await this.waitForOutputEnd(gen, this.options.shutdown.killTimeoutMs);

    const reason = new TransportError('Bridge is shutting down');
    gen.context.correlator.drain(reason);
    gen.context.framer.close(reason);
    gen.stderrReader.close();
    logInfo('Tool server stopped', { component: 'Supervisor' });
  }

  private waitForExit(gen: Generation, timeoutMs: number): Promise<boolean> {
    if (gen.exited) return Promise.resolve(true);
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void gen.exit.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  /** Give the reader time to deliver lines written just before exit. */
  private waitForOutputEnd(gen: Generation, timeoutMs: number): Promise<void> {
    if (!gen.context.framer.isOpen) return Promise.resolve();
    return new Promise((resolve) => {
      const timer = setTimeout(resolve, timeoutMs);
      void gen.context.framer.waitForEnd().then(() => {
        clearTimeout(timer);
        resolve();
      });
    });
  }

  private transition(to: LifecycleState, reason: string): void {
    const from = this.currentState;
    if (!TRANSITIONS[from].includes(to)) {
      throw new IllegalTransitionError(from, to);
    }
    this.currentState = to;
    logDebug(`${from} → ${to}: ${reason}`, { component: 'Supervisor', generation: this.generationCounter });
    this.emit('state', { from, to, generation: this.generationCounter, reason });
  }
}

/** Handle whose fields always reflect the supervisor's current generation. */
class LiveSubprocessHandle implements SubprocessHandle {
  constructor(private readonly supervisor: ProcessSupervisor) {}

  get pid(): number | undefined {
    return this.supervisor.pid;
  }

  get generation(): number {
    return this.supervisor.generation;
  }

  get state(): LifecycleState {
    return this.supervisor.state;
  }

  get stdin(): Writable | undefined {
    return this.supervisor.activeChild()?.stdin;
  }

  get stdout(): Readable | undefined {
    return this.supervisor.activeChild()?.stdout;
  }

  get stderr(): Readable | undefined {
    return this.supervisor.activeChild()?.stderr;
  }
}
