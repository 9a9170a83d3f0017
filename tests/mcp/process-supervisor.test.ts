/**
 * Unit tests for ProcessSupervisor
 *
 * Subprocesses are FakeChildProcess instances with a FakeMcpServer behind
 * them; the clock and jitter are injected so backoff delays are exact.
 */

import { vi, describe, it, expect, beforeEach, afterEach } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logDebug: vi.fn(),
  logInfo: vi.fn(),
  logWarn: vi.fn(),
  logError: vi.fn(),
}));

import {
  IllegalTransitionError,
  MAX_STDERR_LINES,
  ProcessSupervisor,
  type GenerationContext,
  type LifecycleState,
  type ProcessSupervisorOptions,
  type Terminated,
} from '../../src/mcp/process-supervisor.js';
import { TransportError } from '../../src/utils/errors.js';
import { NO_REPLY, createFakeSpawn, flush, type FakeSpawn } from '../helpers/fake-mcp-server.js';

describe('ProcessSupervisor', () => {
  let clock: number;
  let fake: FakeSpawn;
  let supervisor: ProcessSupervisor;
  let states: LifecycleState[];
  let contexts: GenerationContext[];

  function createSupervisor(overrides: Partial<ProcessSupervisorOptions> = {}): ProcessSupervisor {
    const created = new ProcessSupervisor({
      callTimeoutMs: 1_000,
      restart: { maxRestarts: 3, windowMs: 60_000, baseDelayMs: 100, maxDelayMs: 1_000, jitterMs: 0 },
      shutdown: { gracePeriodMs: 50, killTimeoutMs: 50 },
      spawn: fake.spawn,
      random: () => 0,
      now: () => clock,
      ...overrides,
    });
    created.on('state', (change) => states.push(change.to));
    created.on('ready', (context) => contexts.push(context));
    return created;
  }

  beforeEach(() => {
    vi.clearAllMocks();
    clock = 0;
    states = [];
    contexts = [];
    fake = createFakeSpawn();
    supervisor = createSupervisor();
  });

  afterEach(async () => {
    await supervisor.stop();
    vi.useRealTimers();
  });

  // ── Startup ─────────────────────────────────────────────────────────

  describe('start', () => {
    it('spawns, handshakes and resolves with a live handle', async () => {
      const handle = await supervisor.start('fake-server', ['--stdio']);

      expect(fake.calls).toHaveLength(1);
      expect(fake.calls[0]).toMatchObject({ command: 'fake-server', args: ['--stdio'] });
      expect(states).toEqual(['handshaking', 'ready']);
      expect(handle.pid).toBe(1000);
      expect(handle.generation).toBe(1);
      expect(handle.state).toBe('ready');
      expect(handle.stdin).toBe(fake.children[0]?.stdin);
    });

    it('passes the configured environment over the inherited one', async () => {
      fake = createFakeSpawn();
      supervisor = createSupervisor({ env: { TOOL_MODE: 'test' }, cwd: '/srv/tools' });

      await supervisor.start('fake-server');

      expect(fake.calls[0]?.env.TOOL_MODE).toBe('test');
      expect(fake.calls[0]?.env.PATH).toBe(process.env.PATH);
      expect(fake.calls[0]?.cwd).toBe('/srv/tools');
    });

    it('waits for the handshake hook before becoming ready', async () => {
      let release: () => void = () => undefined;
      supervisor = createSupervisor({
        handshake: () =>
          new Promise<void>((resolve) => {
            release = resolve;
          }),
      });

      const started = supervisor.start('fake-server');
      await flush();
      expect(supervisor.state).toBe('handshaking');

      release();
      await started;
      expect(supervisor.state).toBe('ready');
    });

    it('throws when called twice', async () => {
      await supervisor.start('fake-server');

      expect(() => supervisor.start('fake-server')).toThrow('ProcessSupervisor.start() called twice');
    });

    it('rejects when the command cannot be spawned and no restarts are allowed', async () => {
      fake = createFakeSpawn(() => ({ child: { spawnError: new Error('spawn fake-server ENOENT') } }));
      supervisor = createSupervisor({
        restart: { maxRestarts: 0, windowMs: 60_000, baseDelayMs: 100, maxDelayMs: 1_000, jitterMs: 0 },
      });

      const error = await supervisor.start('fake-server').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toHaveProperty(
        'message',
        'Tool server did not become ready: Restart limit reached (0 in 60000ms); last failure: Failed to spawn fake-server: spawn fake-server ENOENT'
      );
      expect(supervisor.state).toBe('terminated');
    });

    it('treats a rejected handshake as a failed generation', async () => {
      supervisor = createSupervisor({
        restart: { maxRestarts: 0, windowMs: 60_000, baseDelayMs: 100, maxDelayMs: 1_000, jitterMs: 0 },
        handshake: () => Promise.reject(new Error('boom')),
      });

      await expect(supervisor.start('fake-server')).rejects.toThrow(
        'Tool server did not become ready: Restart limit reached (0 in 60000ms); last failure: Handshake failed: boom'
      );
      expect(states).toEqual(['handshaking', 'degraded', 'terminated']);
    });
  });

  // ── Restart ─────────────────────────────────────────────────────────

  describe('restart', () => {
    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    });

    it('restarts a crashed subprocess after an exponential backoff', async () => {
      await supervisor.start('fake-server');
      const ended = vi.fn();
      supervisor.on('generation-ended', ended);

      fake.children[0]?.exit(1);
      expect(supervisor.state).toBe('restarting');
      expect(ended).toHaveBeenCalledWith({ generation: 1, pid: 1000, reason: 'Subprocess exited with code 1' });

      vi.advanceTimersByTime(99);
      expect(fake.children).toHaveLength(1);
      vi.advanceTimersByTime(1);
      expect(fake.children).toHaveLength(2);
      await flush();
      expect(supervisor.state).toBe('ready');
      expect(supervisor.generation).toBe(2);
      expect(supervisor.pid).toBe(1001);

      // Second failure inside the window doubles the delay
      fake.children[1]?.exit(1);
      vi.advanceTimersByTime(199);
      expect(fake.children).toHaveLength(2);
      vi.advanceTimersByTime(1);
      await flush();
      expect(fake.children).toHaveLength(3);
      expect(supervisor.state).toBe('ready');
      expect(supervisor.restarts).toBe(2);

      expect(states).toEqual([
        'handshaking',
        'ready',
        'degraded',
        'restarting',
        'starting',
        'handshaking',
        'ready',
        'degraded',
        'restarting',
        'starting',
        'handshaking',
        'ready',
      ]);
    });

    it('caps the delay at maxDelayMs and adds jitter', async () => {
      supervisor = createSupervisor({
        restart: { maxRestarts: 10, windowMs: 60_000, baseDelayMs: 400, maxDelayMs: 1_000, jitterMs: 100 },
        random: () => 0.5,
      });
      await supervisor.start('fake-server');

      for (let i = 0; i < 3; i++) {
        fake.children[i]?.exit(1);
        vi.advanceTimersByTime(2_000);
        await flush();
      }

      // Fourth attempt: min(400 * 8, 1000) + 50
      fake.children[3]?.exit(1);
      vi.advanceTimersByTime(1_049);
      expect(fake.children).toHaveLength(4);
      vi.advanceTimersByTime(1);
      expect(fake.children).toHaveLength(5);
    });

    it('terminates once the restart limit is reached inside the window', async () => {
      supervisor = createSupervisor({
        restart: { maxRestarts: 2, windowMs: 60_000, baseDelayMs: 100, maxDelayMs: 1_000, jitterMs: 0 },
      });
      const terminated: Terminated[] = [];
      supervisor.on('terminated', (event) => terminated.push(event));
      await supervisor.start('fake-server');

      fake.children[0]?.exit(1);
      vi.advanceTimersByTime(100);
      await flush();
      fake.children[1]?.exit(1);
      vi.advanceTimersByTime(200);
      await flush();
      fake.children[2]?.exit(1);

      expect(supervisor.state).toBe('terminated');
      expect(supervisor.restarts).toBe(2);
      expect(terminated).toEqual([
        {
          reason: 'Restart limit reached (2 in 60000ms); last failure: Subprocess exited with code 1',
          exhausted: true,
        },
      ]);

      vi.advanceTimersByTime(10_000);
      expect(fake.children).toHaveLength(3);
    });

    it('forgets failures that slid out of the window', async () => {
      supervisor = createSupervisor({
        restart: { maxRestarts: 2, windowMs: 1_000, baseDelayMs: 100, maxDelayMs: 1_000, jitterMs: 0 },
      });
      await supervisor.start('fake-server');

      fake.children[0]?.exit(1);
      vi.advanceTimersByTime(100);
      await flush();
      fake.children[1]?.exit(1);
      vi.advanceTimersByTime(200);
      await flush();

      clock = 5_000;
      fake.children[2]?.exit(1);

      expect(supervisor.state).toBe('restarting');
      vi.advanceTimersByTime(100);
      await flush();
      expect(supervisor.state).toBe('ready');
      expect(supervisor.restarts).toBe(3);
    });

    it('fails in-flight calls of a crashed generation with TransportError', async () => {
      fake = createFakeSpawn(() => ({ server: { onCall: () => NO_REPLY } }));
      supervisor = createSupervisor();
      await supervisor.start('fake-server');

      const call = contexts[0]?.correlator.call('tools/call', { name: 'echo', arguments: {} });
      await flush();
      fake.children[0]?.exit(1);

      await expect(call).rejects.toThrow('Subprocess exited with code 1');
      expect(contexts[0]?.correlator.isOpen).toBe(false);
    });

    it('ignores late events from a replaced generation', async () => {
      await supervisor.start('fake-server');
      fake.children[0]?.exit(1);
      vi.advanceTimersByTime(100);
      await flush();
      expect(supervisor.generation).toBe(2);

      fake.children[0]?.emit('error', new Error('late'));

      expect(supervisor.state).toBe('ready');
      expect(supervisor.generation).toBe(2);
    });

    it('cancels a pending restart on stop()', async () => {
      await supervisor.start('fake-server');
      fake.children[0]?.exit(1);
      expect(supervisor.state).toBe('restarting');

      await supervisor.stop();
      vi.advanceTimersByTime(10_000);

      expect(supervisor.state).toBe('terminated');
      expect(fake.children).toHaveLength(1);
    });
  });

  // ── Shutdown ────────────────────────────────────────────────────────

  describe('stop', () => {
    it('closes stdin first and lets a cooperative server exit on its own', async () => {
      await supervisor.start('fake-server');

      await supervisor.stop();

      expect(fake.children[0]?.timeline).toEqual(['stdin-end', 'exit']);
      expect(fake.children[0]?.signals).toEqual([]);
      expect(supervisor.state).toBe('terminated');
    });

    it('sends SIGTERM when the server outlives the grace period', async () => {
      fake = createFakeSpawn(() => ({ server: { exitOnStdinEnd: false } }));
      supervisor = createSupervisor();
      await supervisor.start('fake-server');

      await supervisor.stop();

      expect(fake.children[0]?.timeline).toEqual(['stdin-end', 'SIGTERM', 'exit']);
    });

    it('escalates to SIGKILL when SIGTERM is ignored', async () => {
      fake = createFakeSpawn(() => ({ child: { ignoreSigterm: true }, server: { exitOnStdinEnd: false } }));
      supervisor = createSupervisor();
      await supervisor.start('fake-server');

      await supervisor.stop();

      expect(fake.children[0]?.timeline).toEqual(['stdin-end', 'SIGTERM', 'SIGKILL', 'exit']);
    });

    it('drains pending calls once the subprocess output ends', async () => {
      fake = createFakeSpawn(() => ({ server: { onCall: () => NO_REPLY } }));
      supervisor = createSupervisor();
      await supervisor.start('fake-server');

      const call = contexts[0]?.correlator.call('tools/call', { name: 'slow', arguments: {} });
      await flush();
      const stopped = supervisor.stop();

      await expect(call).rejects.toThrow(new TransportError('Output stream of generation 1 ended'));
      await stopped;
    });

    it('delivers a response the server sends after stdin closes', async () => {
      fake = createFakeSpawn(() => ({ server: { exitOnStdinEnd: false, onCall: () => NO_REPLY } }));
      supervisor = createSupervisor({ shutdown: { gracePeriodMs: 1_000, killTimeoutMs: 50 } });
      await supervisor.start('fake-server');
      const server = fake.servers[0];
      const child = fake.children[0];
      if (!server || !child) throw new Error('No subprocess was spawned');

      const received = server.nextRequest('tools/call');
      const call = contexts[0]?.correlator.call('tools/call', { name: 'slow', arguments: {} });
      const request = await received;

      const inputClosed = new Promise((resolve) => child.stdin.once('finish', resolve));
      const stopped = supervisor.stop();
      await inputClosed;
      server.send({ jsonrpc: '2.0', id: request.id, result: { done: true } });
      child.exit(0);

      await expect(call).resolves.toEqual({ done: true });
      await stopped;
      expect(child.timeline).toEqual(['stdin-end', 'exit']);
    });

    it('is idempotent and reports a requested shutdown as not exhausted', async () => {
      const terminated = vi.fn();
      supervisor.on('terminated', terminated);
      await supervisor.start('fake-server');

      const first = supervisor.stop();
      expect(supervisor.stop()).toBe(first);
      await first;

      expect(terminated).toHaveBeenCalledTimes(1);
      expect(terminated).toHaveBeenCalledWith({ reason: 'Shutdown requested', exhausted: false });
    });

    it('does not restart a server that exits during shutdown', async () => {
      await supervisor.start('fake-server');
      await supervisor.stop();
      await flush();

      expect(fake.children).toHaveLength(1);
      expect(supervisor.restarts).toBe(0);
    });
  });

  // ── Diagnostics ─────────────────────────────────────────────────────

  describe('stderr', () => {
    it(`keeps the last ${MAX_STDERR_LINES} lines`, async () => {
      await supervisor.start('fake-server');

      const lines = Array.from({ length: 105 }, (_, i) => `line ${i}`);
      fake.children[0]?.writeStderr(`${lines.join('\n')}\n`);
      await flush();

      const recent = supervisor.recentStderr();
      expect(recent).toHaveLength(MAX_STDERR_LINES);
      expect(recent[0]).toBe('line 5');
      expect(recent[MAX_STDERR_LINES - 1]).toBe('line 104');
    });

    it('skips blank lines and trims trailing whitespace', async () => {
      await supervisor.start('fake-server');

      fake.children[0]?.writeStderr('warming up   \r\n\n\nready\n');
      await flush();

      expect(supervisor.recentStderr()).toEqual(['warming up', 'ready']);
    });
  });

  describe('IllegalTransitionError', () => {
    it('names both states', () => {
      expect(new IllegalTransitionError('terminated', 'ready').message).toBe(
        'Illegal lifecycle transition terminated → ready'
      );
    });
  });
});
