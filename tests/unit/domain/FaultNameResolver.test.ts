import { describe, it, expect, vi } from 'vitest';
import { FaultNameResolver } from '../../../src/domain/services/FaultNameResolver.js';
import type { FaultNameProvider } from '../../../src/domain/ports/FaultNameProvider.js';

function provider(names: () => Promise<readonly string[]>): FaultNameProvider {
  return { names: vi.fn(names), describe: () => 'test-provider' };
}

const fullNames = Array.from({ length: 187 }, (_, i) => `AEK_POW_BMS63CHAIN_flag_${String(i + 1)}`);

describe('FaultNameResolver', () => {
  it('should generate ordinal names without a provider', async () => {
    const table = await new FaultNameResolver().resolve();

    expect(table.origin).toBe('fallback');
    expect(table.columns).toHaveLength(187);
    expect(table.columns[0]).toBe('fault_001');
    expect(table.columns[186]).toBe('fault_187');
    expect(table.note).toBe('No fault-name source configured');
  });

  it('should use extracted names when exactly 187 are found', async () => {
    const table = await new FaultNameResolver(provider(() => Promise.resolve(fullNames))).resolve();

    expect(table.origin).toBe('extracted');
    expect(table.columns[0]).toBe('fault_001_flag_1');
    expect(table.columns[186]).toBe('fault_187_flag_187');
    expect(table.note).toBeUndefined();
  });

  it('should keep names that carry no device prefix', async () => {
    const names = fullNames.map((name, i) => (i === 1 ? 'CELL_OPEN' : name));

    const table = await new FaultNameResolver(provider(() => Promise.resolve(names))).resolve();

    expect(table.columns[1]).toBe('fault_002_CELL_OPEN');
  });

  it('should fall back entirely when the name count is wrong', async () => {
    const table = await new FaultNameResolver(provider(() => Promise.resolve(fullNames.slice(0, 10)))).resolve();

    expect(table.origin).toBe('fallback');
    expect(table.columns[0]).toBe('fault_001');
    expect(table.columns[9]).toBe('fault_010');
    expect(table.note).toBe('Found 10 fault names in test-provider, expected 187');
  });

  it('should fall back when the provider fails', async () => {
    const table = await new FaultNameResolver(provider(() => Promise.reject(new Error('boom')))).resolve();

    expect(table.origin).toBe('fallback');
    expect(table.note).toBe('Could not read fault names from test-provider: boom');
  });

  it('should resolve once and return the same table on every call', async () => {
    const source = provider(() => Promise.resolve(fullNames));
    const resolver = new FaultNameResolver(source);

    const first = await resolver.resolve();
    const second = await resolver.resolve();

    expect(second).toBe(first);
    expect(source.names).toHaveBeenCalledOnce();
  });
});
