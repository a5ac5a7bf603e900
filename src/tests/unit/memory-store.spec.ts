import { describe, expect, it } from 'vitest';

import { StorageError } from '../../errors.js';
import { MemoryTraceStore } from '../../observability/memory-store.js';
import { describeTraceStoreContract } from '../helpers/store-contract.js';

describeTraceStoreContract('MemoryTraceStore', async () => ({ store: new MemoryTraceStore() }));

describe('MemoryTraceStore', () => {
  it('copies step payloads on the way in', async () => {
    const store = new MemoryTraceStore();
    const runId = await store.createRun('q');
    const args = { expression: '2+2' };
    await store.appendStep(runId, { type: 'tool_call', payload: { tool: 'calculate', args } });
    args.expression = 'tampered';

    const [step] = await store.getSteps(runId);
    expect(step).toMatchObject({ type: 'tool_call', payload: { args: { expression: '2+2' } } });
  });

  it('rejects metadata that cannot be copied', async () => {
    const store = new MemoryTraceStore();
    await expect(store.createRun('q', { callback: () => 1 })).rejects.toBeInstanceOf(StorageError);
  });
});
