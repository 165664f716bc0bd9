import { beforeEach, describe, expect, it, vi } from 'vitest';
import { EmptyDatasetError, UnknownSessionError } from '../../domain/errors/DashboardErrors.js';
import { InMemoryDatasetCache } from '../../infrastructure/adapters/cache/InMemoryDatasetCache.js';
import { columns, sampleRows } from '../../test-support/billFixtures.js';
import { RecordingRenderer, StubBillParser, upload } from '../../test-support/fakes.js';
import { BillIngestionService } from './BillIngestionService.js';
import { DashboardSession } from './DashboardSession.js';
import { DashboardSessionRegistry } from './DashboardSessionRegistry.js';

describe('DashboardSessionRegistry', () => {
  let registry: DashboardSessionRegistry;
  let clock: number;
  let createRegistry: (options?: { maxSessions?: number; idleTtlMs?: number }) => DashboardSessionRegistry;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const ingestion = new BillIngestionService(
      new StubBillParser({ bill: sampleRows, empty: [] }),
      new InMemoryDatasetCache(),
      columns,
    );
    let counter = 0;
    clock = 0;

    createRegistry = (options = {}) =>
      new DashboardSessionRegistry(
        (sessionId) => new DashboardSession(sessionId, { ingestion, renderer: new RecordingRenderer(), trendCategoryOrder: [] }),
        { generateId: () => `session-${++counter}`, now: () => clock, ...options },
      );
    registry = createRegistry();
  });

  it('opens a loaded session and finds it by id', async () => {
    const { session, load } = await registry.open(upload('bill'));

    expect(session.id).toBe('session-1');
    expect(load.latestYear).toBe(2024);
    expect(registry.get('session-1')).toBe(session);
    expect(registry.size).toBe(1);
  });

  it('does not keep a session whose upload failed', async () => {
    await expect(registry.open(upload('empty'))).rejects.toBeInstanceOf(EmptyDatasetError);

    expect(registry.size).toBe(0);
    expect(() => registry.get('session-1')).toThrow(UnknownSessionError);
  });

  it('closes sessions', async () => {
    await registry.open(upload('bill'));
    const { session } = await registry.open(upload('bill'));

    await registry.close('session-1');

    expect(registry.size).toBe(1);
    expect(registry.get('session-2')).toBe(session);
    expect(() => registry.get('session-1')).toThrow('Dashboard session session-1 does not exist');
    await expect(registry.close('session-1')).rejects.toBeInstanceOf(UnknownSessionError);
  });

  it('closes the least recently used session once the limit is reached', async () => {
    registry = createRegistry({ maxSessions: 2 });
    const { session: first } = await registry.open(upload('bill'));
    await registry.open(upload('bill'));

    clock = 10;
    registry.get('session-1');
    await registry.open(upload('bill'));

    expect(registry.size).toBe(2);
    expect(registry.get('session-1')).toBe(first);
    expect(registry.get('session-3').id).toBe('session-3');
    expect(() => registry.get('session-2')).toThrow(UnknownSessionError);
  });

  it('disposes an evicted session', async () => {
    registry = createRegistry({ maxSessions: 1 });
    const { session: first } = await registry.open(upload('bill'));

    await registry.open(upload('bill'));

    expect(first.listCharts()).toEqual([]);
    expect(() => first.summary()).toThrow(EmptyDatasetError);
  });

  it('expires sessions left idle past the time-to-live', async () => {
    registry = createRegistry({ idleTtlMs: 1000 });
    await registry.open(upload('bill'));

    clock = 1000;
    expect(registry.get('session-1').id).toBe('session-1');

    clock = 2001;
    expect(() => registry.get('session-1')).toThrow(UnknownSessionError);
    expect(registry.size).toBe(0);
  });

  it('sweeps idle sessions when a new one is opened', async () => {
    registry = createRegistry({ idleTtlMs: 1000 });
    await registry.open(upload('bill'));
    clock = 500;
    await registry.open(upload('bill'));

    clock = 1200;
    await registry.open(upload('bill'));

    expect(registry.size).toBe(2);
    expect(() => registry.get('session-1')).toThrow(UnknownSessionError);
    expect(registry.get('session-2').id).toBe('session-2');
  });
});
