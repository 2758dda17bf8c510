import * as os from 'os';
import { LeaseStolenError, StoreUnavailableError, type LeaseConfigInput } from '@leasehold/core';
import { LeaseService } from '../LeaseService';
import { LeaseState } from '../lease/LeaseState';
import { ManualTickSource } from '../scheduler/TickSource';
import { MemoryStoreProvider } from '../storage/MemoryKeyValueStore';
import { createProcess, readRecord, settle, TestClock, type TestProcess } from './utils/test-helpers';

describe('LeaseService', () => {
  let provider: MemoryStoreProvider;
  let clock: TestClock;
  let processes: TestProcess[];

  const spawn = (processId: string, config: LeaseConfigInput = {}): TestProcess => {
    const proc = createProcess(provider, clock, processId, config);
    processes.push(proc);
    return proc;
  };

  beforeEach(() => {
    provider = new MemoryStoreProvider();
    clock = new TestClock();
    processes = [];
  });

  afterEach(async () => {
    await Promise.all(processes.map((proc) => proc.service.shutdown()));
  });

  describe('Construction', () => {
    test('should default the session to this host and a fresh job id', () => {
      const service = new LeaseService({ stores: provider, ticks: new ManualTickSource() });

      expect(service.session.processId).toBe(os.hostname());
      expect(service.session.jobId).toMatch(/^[0-9a-f-]{36}$/);
      expect(service.config.autoSaveInterval).toBe(30);
      expect(service.config.remoteWriteCooldown).toBe(7);
    });

    test('should reject invalid configuration', () => {
      expect(
        () => new LeaseService({ stores: provider, config: { autoSaveInterval: 60, deadLockAssumedAfter: 60 } })
      ).toThrow('deadLockAssumedAfter must exceed autoSaveInterval');
    });
  });

  describe('Ticking', () => {
    test('should auto-save an active lease once its interval is up', async () => {
      const a = spawn('A');
      const lease = await a.players.claim('p1');
      lease.update((data) => {
        data.coins = 11;
      });

      clock.advance(30_000);
      a.ticks.tick();
      await settle();

      expect(readRecord(provider, 'players', 'p1')?.data.coins).toBe(11);
      expect(lease.isActive()).toBe(true);
      expect(lease.isDirty).toBe(false);
      expect(lease.lastPersistedAt).toBe(clock.now);
    });

    test('should enter and leave critical state on store failures', async () => {
      const a = spawn('A', { issueCountForCriticalState: 2 });
      const transitions: boolean[] = [];
      a.service.criticalState.subscribe((critical) => {
        transitions.push(critical);
      });
      provider.getStore('players').failNext('TIMEOUT', 3);

      await expect(a.players.claim('p1')).rejects.toBeInstanceOf(StoreUnavailableError);
      expect(a.service.isCritical()).toBe(true);
      expect(a.service.manager.getState('players', 'p1')).toBe(LeaseState.UNCLAIMED);

      clock.advance(61_000);
      a.ticks.tick();

      expect(a.service.isCritical()).toBe(false);
      expect(transitions).toEqual([true, false]);
    });
  });

  describe('withLease', () => {
    test('should release the lease after the callback returns', async () => {
      const a = spawn('A');

      const result = await a.players.withLease('p1', (lease) => {
        lease.update((data) => {
          data.coins += 10;
        });
        return lease.data.coins;
      });

      expect(result).toBe(10);
      const stored = readRecord(provider, 'players', 'p1');
      expect(stored?.data.coins).toBe(10);
      expect(stored?.metadata.activeSession).toBeUndefined();
    });

    test('should release the lease when the callback throws', async () => {
      const a = spawn('A');

      await expect(
        a.players.withLease('p1', () => {
          throw new Error('handler failed');
        })
      ).rejects.toThrow('handler failed');

      expect(readRecord(provider, 'players', 'p1')?.metadata.activeSession).toBeUndefined();
      expect(a.service.manager.getState('players', 'p1')).toBe(LeaseState.UNCLAIMED);
    });

    test('should keep the callback error when the release also fails', async () => {
      const a = spawn('A');

      await expect(
        a.players.withLease('p1', () => {
          provider.getStore('players').failNext('INTERNAL', 1);
          throw new Error('handler failed');
        })
      ).rejects.toThrow('handler failed');

      expect(a.service.manager.getState('players', 'p1')).toBe(LeaseState.UNCLAIMED);
      expect(readRecord(provider, 'players', 'p1')?.metadata.activeSession).toEqual({ processId: 'A', jobId: 'job-1' });
    });

    test('should take the record with the requested strategy', async () => {
      const a = spawn('A');
      const b = spawn('B');
      const held = await a.players.claim('p1');

      const count = await b.players.withLease('p1', (lease) => lease.sessionLoadCount, { strategy: 'steal' });

      expect(count).toBe(2);
      await expect(held.save()).rejects.toBeInstanceOf(LeaseStolenError);
    });
  });

  describe('Shutdown', () => {
    test('should return the same promise on repeated calls', async () => {
      const a = spawn('A');
      await a.players.claim('p1');

      const first = a.service.shutdown();
      expect(a.service.shutdown()).toBe(first);
      await first;

      expect(readRecord(provider, 'players', 'p1')?.metadata.activeSession).toBeUndefined();
    });

    test('should install and remove signal handlers', () => {
      const a = spawn('A');
      const sigint = process.listenerCount('SIGINT');
      const sigterm = process.listenerCount('SIGTERM');

      const uninstall = a.service.installShutdownHooks(jest.fn());
      expect(process.listenerCount('SIGINT')).toBe(sigint + 1);
      expect(process.listenerCount('SIGTERM')).toBe(sigterm + 1);

      uninstall();
      expect(process.listenerCount('SIGINT')).toBe(sigint);
      expect(process.listenerCount('SIGTERM')).toBe(sigterm);
    });
  });
});
