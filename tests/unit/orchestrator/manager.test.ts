import { hardwareError } from '../../../src/hardware/errors';
import { MeasurementManager } from '../../../src/orchestrator/manager';
import type { MeasurementManagerOptions } from '../../../src/orchestrator/manager';
import type { ProgressEvent } from '../../../src/orchestrator/progress-events';
import { FakeAnalyzer, FakeStage, device, gate, makeRunConfig, waitFor } from '../../fixtures/fake-hardware';

function setup(options: MeasurementManagerOptions = {}) {
  const stage = new FakeStage();
  const analyzer = new FakeAnalyzer();
  let n = 0;
  const manager = new MeasurementManager({
    clientFactory: () => ({ stage, analyzer }),
    idFactory: () => `run-${++n}`,
    ...options,
  });
  return { manager, stage, analyzer };
}

const TWO_DEVICES = makeRunConfig([device('dut-0'), device('dut-1')]);

describe('MeasurementManager', () => {
  describe('start', () => {
    it('runs the measurement in the background and resolves with its outcome', async () => {
      const { manager } = setup();

      const started = manager.start(TWO_DEVICES);
      if (!started.ok) throw new Error(started.error);
      const outcome = await started.value.done;

      expect(started.value.runId).toBe('run-1');
      expect(outcome).toMatchObject({ runId: 'run-1', finalState: 'COMPLETED', summary: { totalDevices: 2, measured: 2, failed: 0 } });
    });

    it('refuses a second run while one is active', async () => {
      const { manager, stage } = setup();
      const hold = gate();
      stage.guard = async () => {
        await hold.wait;
        return undefined;
      };

      const first = manager.start(TWO_DEVICES);
      const second = manager.start(TWO_DEVICES);

      expect(second).toEqual({ ok: false, error: 'run run-1 is already active' });
      hold.release();
      if (first.ok) await first.value.done;
    });

    it('accepts a new run once the previous one has finished', async () => {
      const { manager } = setup();
      const first = manager.start(TWO_DEVICES);
      if (first.ok) await first.value.done;

      const second = manager.start(TWO_DEVICES);

      expect(second.ok && second.value.runId).toBe('run-2');
      if (second.ok) await second.value.done;
    });
  });

  describe('control', () => {
    it('rejects control requests when no run is active', () => {
      const { manager } = setup();

      expect(manager.pause()).toEqual({ ok: false, error: 'no active run' });
      expect(manager.resume()).toEqual({ ok: false, error: 'no active run' });
      expect(manager.cancel()).toEqual({ ok: false, error: 'no active run' });
    });

    it('allows pause and resume only when the transition is legal', async () => {
      const { manager, stage } = setup();
      const hold = gate();
      stage.guard = async () => {
        await hold.wait;
        return undefined;
      };
      const started = manager.start(TWO_DEVICES);
      await waitFor(() => stage.calls.includes('submit:move'));

      expect(manager.resume()).toEqual({ ok: false, error: 'invalid transition: RUNNING + RESUME' });
      expect(manager.pause()).toEqual({ ok: true, value: undefined });
      expect(manager.pause()).toEqual({ ok: false, error: 'invalid transition: PAUSED + PAUSE' });

      hold.release();
      await waitFor(() => manager.status().state === 'PAUSED');
      expect(manager.status().lastEvent).toMatchObject({ type: 'run_paused', deviceIndex: 0 });

      expect(manager.resume()).toEqual({ ok: true, value: undefined });
      const outcome = started.ok ? await started.value.done : undefined;
      expect(outcome?.finalState).toBe('COMPLETED');
    });

    it('lets resume withdraw a pause no checkpoint has seen yet', async () => {
      const { manager, stage } = setup();
      const hold = gate();
      stage.guard = async () => {
        await hold.wait;
        return undefined;
      };
      const started = manager.start(TWO_DEVICES);
      await waitFor(() => stage.calls.includes('submit:move'));

      manager.pause();
      expect(manager.resume()).toEqual({ ok: true, value: undefined });
      hold.release();

      const events: ProgressEvent['type'][] = [];
      const subscription = manager.subscribe();
      const outcome = started.ok ? await started.value.done : undefined;
      subscription.close();
      for await (const event of subscription) events.push(event.type);

      expect(outcome?.finalState).toBe('COMPLETED');
      expect(events).not.toContain('run_paused');
    });

    it('cancels a running run once and only once', async () => {
      const { manager, stage } = setup();
      const hold = gate();
      stage.guard = async () => {
        await hold.wait;
        return undefined;
      };
      const started = manager.start(TWO_DEVICES);
      await waitFor(() => stage.calls.includes('submit:move'));

      expect(manager.cancel()).toEqual({ ok: true, value: undefined });
      expect(manager.cancel()).toEqual({ ok: false, error: 'cancel already requested for run run-1' });
      hold.release();

      const outcome = started.ok ? await started.value.done : undefined;
      expect(outcome?.finalState).toBe('CANCELLED');
      expect(stage.calls).toContain('cancel:move');
      expect(manager.cancel()).toEqual({ ok: false, error: 'no active run' });
    });
  });

  describe('status', () => {
    it('reports IDLE when nothing has run', () => {
      expect(setup().manager.status()).toEqual({ state: 'IDLE' });
    });

    it('returns the terminal snapshot once and then releases the run', async () => {
      const { manager } = setup();
      const started = manager.start(TWO_DEVICES);
      if (started.ok) await started.value.done;

      const snapshot = manager.status();

      expect(snapshot).toMatchObject({ runId: 'run-1', state: 'COMPLETED', lastEvent: { type: 'run_completed' }, summary: { measured: 2 } });
      expect(snapshot.lastError).toBeUndefined();
      expect(manager.status()).toEqual({ state: 'IDLE' });
    });

    it('keeps the last failure reason visible after a failed run', async () => {
      const { manager, analyzer } = setup();
      analyzer.script = () => [{ status: 'failed', error: 'laser interlock open' }];
      const started = manager.start(TWO_DEVICES);
      if (started.ok) await started.value.done;

      const snapshot = manager.status();

      expect(snapshot.state).toBe('FAILED');
      expect(snapshot.lastEvent).toMatchObject({ type: 'run_failed', code: 'ANALYZER_FAULT' });
      expect(snapshot.lastError).toBe('sweep failed on device 0: laser interlock open');
    });

    it('shows which device and step a live run is on', async () => {
      const { manager, stage } = setup();
      const hold = gate();
      stage.guard = async () => {
        await hold.wait;
        return undefined;
      };
      const started = manager.start(TWO_DEVICES);
      await waitFor(() => stage.calls.includes('submit:move'));

      const snapshot = manager.status();

      expect(snapshot).toMatchObject({ runId: 'run-1', state: 'RUNNING', currentDeviceIndex: 0, currentOperation: 'move' });
      expect(snapshot.summary?.startedAt).toEqual(expect.any(String));
      expect(snapshot.summary?.completedAt).toBeUndefined();
      hold.release();
      if (started.ok) {
        const outcome = await started.value.done;
        expect(outcome.summary.durationMs).toEqual(expect.any(Number));
        expect(outcome.summary.completedAt).toEqual(expect.any(String));
      }
    });

    it('releases an unread finished run after the retention window', async () => {
      const { manager } = setup({ retentionMs: 10 });
      const started = manager.start(TWO_DEVICES);
      if (started.ok) await started.value.done;

      await new Promise((resolve) => setTimeout(resolve, 40));

      expect(manager.status()).toEqual({ state: 'IDLE' });
    });
  });

  describe('logging', () => {
    it('hands each run a logger scoped to its id', async () => {
      const scoped = { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
      const child = jest.fn(() => scoped);
      const { manager } = setup({ logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn(), child } });

      const started = manager.start(TWO_DEVICES);
      if (started.ok) await started.value.done;

      expect(child).toHaveBeenCalledWith('run-1');
      expect(scoped.info).toHaveBeenCalledWith('Starting measurement run', { runId: 'run-1', devices: 2 });
    });
  });

  describe('subscribe', () => {
    it('delivers every event of the run to each subscriber, in order', async () => {
      const { manager } = setup();
      const a = manager.subscribe();
      const b = manager.subscribe();

      const started = manager.start(makeRunConfig([device('dut-0')]));
      if (started.ok) await started.value.done;
      a.close();
      b.close();

      const seenA: string[] = [];
      const seenB: string[] = [];
      for await (const event of a) seenA.push(event.type);
      for await (const event of b) seenB.push(event.type);

      expect(seenA).toEqual(['run_started', 'device_started', 'measurement_completed', 'run_completed']);
      expect(seenB).toEqual(seenA);
    });

    it('stops delivering to a subscriber once it disconnects', async () => {
      const { manager } = setup();
      const subscription = manager.subscribe();
      subscription.close();

      expect(manager.subscriberCount).toBe(0);
      const started = manager.start(makeRunConfig([device('dut-0')]));
      if (started.ok) await started.value.done;

      expect(await subscription.next()).toEqual({ done: true, value: undefined });
    });
  });

  describe('shutdown', () => {
    it('cancels a live run and ends every subscription', async () => {
      const { manager, stage, analyzer } = setup();
      const hold = gate();
      stage.guard = async () => {
        await hold.wait;
        return undefined;
      };
      const subscription = manager.subscribe();
      manager.start(TWO_DEVICES);
      await waitFor(() => stage.calls.includes('submit:move'));

      const stopped = manager.shutdown();
      hold.release();
      await stopped;

      expect(manager.status()).toEqual({ state: 'IDLE' });
      expect(manager.subscriberCount).toBe(0);
      expect(subscription.isClosed).toBe(true);
      expect(analyzer.calls[analyzer.calls.length - 1]).toBe('disconnect');
    });
  });

  it('records a hardware failure reason from ErrorOccurred on a skipped device', async () => {
    const { manager, stage } = setup();
    stage.powerError = hardwareError('transport', 'connection refused');
    const started = manager.start(makeRunConfig([device('dut-0')]));
    if (started.ok) await started.value.done;

    const snapshot = manager.status();

    expect(snapshot.state).toBe('COMPLETED');
    expect(snapshot.lastError).toBe('connection refused');
  });
});
