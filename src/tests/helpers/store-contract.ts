import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { InvalidRunStateError, StorageError, UnknownRunError } from '../../errors.js';
import type { TraceStore } from '../../observability/types.js';

export interface StoreFixture {
  store: TraceStore;
  cleanup?: () => Promise<void>;
}

/**
 * Behaviour every TraceStore implementation shares. Each test gets a fresh
 * store from `create`.
 */
export function describeTraceStoreContract(name: string, create: () => Promise<StoreFixture>): void {
  describe(`${name} (TraceStore contract)`, () => {
    let fixture: StoreFixture;
    let store: TraceStore;

    beforeEach(async () => {
      fixture = await create();
      store = fixture.store;
    });

    afterEach(async () => {
      vi.useRealTimers();
      await fixture.cleanup?.();
    });

    const at = (iso: string) => vi.setSystemTime(new Date(iso));

    describe('runs', () => {
      it('creates a running run with its query and metadata', async () => {
        const runId = await store.createRun('weather in Oslo', { suite: 'smoke' });
        const run = await store.getRun(runId);

        expect(run.id).toBe(runId);
        expect(run.query).toBe('weather in Oslo');
        expect(run.status).toBe('running');
        expect(run.endedAt).toBeNull();
        expect(run.finalOutput).toBeNull();
        expect(run.errorKind).toBeNull();
        expect(run.metadata).toEqual({ suite: 'smoke' });
      });

      it('raises UnknownRunError for a run that was never created', async () => {
        await expect(store.getRun('missing-run')).rejects.toBeInstanceOf(UnknownRunError);
        await expect(store.getSteps('missing-run')).rejects.toBeInstanceOf(UnknownRunError);
        await expect(
          store.appendStep('missing-run', { type: 'reasoning', payload: { text: 'x' } })
        ).rejects.toBeInstanceOf(UnknownRunError);
        await expect(
          store.finalizeRun('missing-run', { status: 'success', finalOutput: 'x' })
        ).rejects.toBeInstanceOf(UnknownRunError);
      });

      it('hands out copies that cannot change stored history', async () => {
        const runId = await store.createRun('q');
        const run = await store.getRun(runId);
        run.query = 'tampered';
        run.metadata.extra = true;

        const again = await store.getRun(runId);
        expect(again.query).toBe('q');
        expect(again.metadata).toEqual({});
      });
    });

    describe('steps', () => {
      it('assigns gapless indices in call order', async () => {
        const runId = await store.createRun('q');
        expect(await store.appendStep(runId, { type: 'reasoning', payload: { text: 'think' } })).toBe(0);
        expect(await store.appendStep(runId, { type: 'tool_call', payload: { tool: 'calculate', args: { expression: '1+1' } } })).toBe(1);
        expect(await store.appendStep(runId, { type: 'tool_result', payload: { tool: 'calculate', result: 'Result: 1+1 = 2', durationMs: 3 } })).toBe(2);

        const steps = await store.getSteps(runId);
        expect(steps.map(s => s.index)).toEqual([0, 1, 2]);
        expect(steps.map(s => s.type)).toEqual(['reasoning', 'tool_call', 'tool_result']);
        expect(steps[1]).toMatchObject({
          runId,
          type: 'tool_call',
          payload: { tool: 'calculate', args: { expression: '1+1' } },
        });
      });

      it('keeps the sequence gapless under concurrent appends to one run', async () => {
        const runId = await store.createRun('q');
        const indices = await Promise.all(
          Array.from({ length: 20 }, (_, i) =>
            store.appendStep(runId, { type: 'reasoning', payload: { text: `step ${i}` } })
          )
        );

        expect([...indices].sort((a, b) => a - b)).toEqual(Array.from({ length: 20 }, (_, i) => i));
        const steps = await store.getSteps(runId);
        expect(steps.map(s => s.index)).toEqual(Array.from({ length: 20 }, (_, i) => i));
      });

      it('keeps each run gapless while writes to different runs interleave', async () => {
        const runIds = await Promise.all(['a', 'b', 'c', 'd'].map(q => store.createRun(q)));
        await Promise.all(
          runIds.flatMap(runId =>
            Array.from({ length: 8 }, (_, i) =>
              store.appendStep(runId, { type: 'reasoning', payload: { text: `${runId}:${i}` } })
            )
          )
        );

        for (const runId of runIds) {
          const steps = await store.getSteps(runId);
          expect(steps.map(s => s.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
          expect(steps.every(s => s.runId === runId)).toBe(true);
        }
      });

      it('rejects appends once the run is finalized', async () => {
        const runId = await store.createRun('q');
        await store.finalizeRun(runId, { status: 'success', finalOutput: 'done' });

        await expect(
          store.appendStep(runId, { type: 'reasoning', payload: { text: 'late' } })
        ).rejects.toBeInstanceOf(InvalidRunStateError);
        expect(await store.getSteps(runId)).toEqual([]);
      });
    });

    describe('finalizeRun', () => {
      it('records a success outcome', async () => {
        const runId = await store.createRun('q');
        const run = await store.finalizeRun(runId, { status: 'success', finalOutput: 'forty-two' });

        expect(run.status).toBe('success');
        expect(run.finalOutput).toBe('forty-two');
        expect(run.endedAt).not.toBeNull();
        expect(await store.getRun(runId)).toEqual(run);
      });

      it('records a failure outcome with kind and message', async () => {
        const runId = await store.createRun('q');
        const run = await store.finalizeRun(runId, {
          status: 'failed',
          errorKind: 'division_by_zero',
          errorMessage: 'Division by zero error',
        });

        expect(run.status).toBe('failed');
        expect(run.errorKind).toBe('division_by_zero');
        expect(run.errorMessage).toBe('Division by zero error');
        expect(run.finalOutput).toBeNull();
      });

      it('fails the second call and keeps the first outcome', async () => {
        const runId = await store.createRun('q');
        await store.finalizeRun(runId, { status: 'success', finalOutput: 'first' });

        await expect(
          store.finalizeRun(runId, { status: 'failed', errorKind: 'timeout' })
        ).rejects.toBeInstanceOf(InvalidRunStateError);
        await expect(
          store.finalizeRun(runId, { status: 'success', finalOutput: 'second' })
        ).rejects.toBeInstanceOf(InvalidRunStateError);

        const run = await store.getRun(runId);
        expect(run.status).toBe('success');
        expect(run.finalOutput).toBe('first');
      });
    });

    describe('queries', () => {
      it('lists runs newest first with status, range and limit filters', async () => {
        vi.useFakeTimers({ toFake: ['Date'] });
        at('2024-06-01T10:00:00.000Z');
        const first = await store.createRun('first');
        at('2024-06-02T10:00:00.000Z');
        const second = await store.createRun('second');
        at('2024-06-03T10:00:00.000Z');
        const third = await store.createRun('third');
        await store.finalizeRun(first, { status: 'success', finalOutput: 'ok' });
        await store.finalizeRun(third, { status: 'failed', errorKind: 'timeout' });

        expect((await store.listRuns()).map(r => r.id)).toEqual([third, second, first]);
        expect((await store.listRuns({ status: 'failed' })).map(r => r.id)).toEqual([third]);
        expect((await store.listRuns({ limit: 2 })).map(r => r.id)).toEqual([third, second]);
        expect(
          (await store.listRuns({
            range: { from: new Date('2024-06-01T12:00:00.000Z'), to: new Date('2024-06-02T12:00:00.000Z') },
          })).map(r => r.id)
        ).toEqual([second]);
      });

      it('finds runs by id or unique prefix', async () => {
        const a = await store.createRun('a');
        const b = await store.createRun('b');

        expect((await store.findRun(a))?.id).toBe(a);
        expect((await store.findRun(b.slice(0, 8)))?.query).toBe('b');
        expect(await store.findRun('zzzz')).toBeNull();
        await expect(store.findRun('')).rejects.toBeInstanceOf(UnknownRunError);
      });
    });

    describe('computeMetrics', () => {
      it('returns zeroes for an empty store', async () => {
        const metrics = await store.computeMetrics();
        expect(metrics.totalRuns).toBe(0);
        expect(metrics.finishedRuns).toBe(0);
        expect(metrics.successRate).toBe(0);
        expect(metrics.averageDurationMs).toBe(0);
        expect(Object.values(metrics.errorKinds).every(count => count === 0)).toBe(true);
      });

      it('counts in-flight runs only as in progress', async () => {
        vi.useFakeTimers({ toFake: ['Date'] });
        at('2024-06-01T10:00:00.000Z');
        const ok1 = await store.createRun('ok1');
        const ok2 = await store.createRun('ok2');
        const bad = await store.createRun('bad');
        await store.createRun('still running');

        at('2024-06-01T10:00:00.300Z');
        await store.finalizeRun(ok1, { status: 'success', finalOutput: 'a' });
        await store.finalizeRun(ok2, { status: 'success', finalOutput: 'b' });
        await store.finalizeRun(bad, { status: 'failed', errorKind: 'timeout', errorMessage: 'timed out' });

        const metrics = await store.computeMetrics();
        expect(metrics).toEqual({
          totalRuns: 4,
          finishedRuns: 3,
          inProgress: 1,
          succeeded: 2,
          failed: 1,
          successRate: 2 / 3,
          errorKinds: {
            timeout: 1,
            api_error: 0,
            validation_error: 0,
            not_found: 0,
            division_by_zero: 0,
            rate_limit: 0,
            unknown: 0,
          },
          averageDurationMs: 300,
        });
      });

      it('restricts aggregation to a time range', async () => {
        vi.useFakeTimers({ toFake: ['Date'] });
        at('2024-06-01T10:00:00.000Z');
        const early = await store.createRun('early');
        await store.finalizeRun(early, { status: 'failed', errorKind: 'not_found' });
        at('2024-06-05T10:00:00.000Z');
        const late = await store.createRun('late');
        await store.finalizeRun(late, { status: 'success', finalOutput: 'ok' });

        const metrics = await store.computeMetrics({ from: new Date('2024-06-04T00:00:00.000Z') });
        expect(metrics.totalRuns).toBe(1);
        expect(metrics.succeeded).toBe(1);
        expect(metrics.errorKinds.not_found).toBe(0);
      });
    });

    describe('prune', () => {
      it('deletes finished runs beyond the newest N and never a running one', async () => {
        vi.useFakeTimers({ toFake: ['Date'] });
        at('2024-06-01T10:00:00.000Z');
        const oldest = await store.createRun('oldest');
        at('2024-06-02T10:00:00.000Z');
        const running = await store.createRun('running');
        at('2024-06-03T10:00:00.000Z');
        const newest = await store.createRun('newest');
        await store.finalizeRun(oldest, { status: 'success', finalOutput: 'x' });
        await store.finalizeRun(newest, { status: 'success', finalOutput: 'y' });

        expect(await store.prune(1)).toBe(1);
        expect((await store.listRuns()).map(r => r.id)).toEqual([newest, running]);
        await expect(store.getRun(oldest)).rejects.toBeInstanceOf(UnknownRunError);

        expect(await store.prune(0)).toBe(1);
        expect((await store.listRuns()).map(r => r.id)).toEqual([running]);
      });
    });

    describe('close', () => {
      it('rejects every call after close', async () => {
        const runId = await store.createRun('q');
        await store.close();

        await expect(store.getRun(runId)).rejects.toBeInstanceOf(StorageError);
        await expect(store.createRun('again')).rejects.toBeInstanceOf(StorageError);
        await expect(
          store.appendStep(runId, { type: 'reasoning', payload: { text: 'x' } })
        ).rejects.toBeInstanceOf(StorageError);
      });
    });
  });
}
