/**
 * @fileoverview Tests for the server reconciliation controller
 */

import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import {
  ConditionReason,
  ConditionType,
  ConflictError,
  InvalidSpecError,
  ServerPhase,
  SubstrateError,
  getCondition
} from '@mcpfleet/core';
import type { Server } from '@mcpfleet/core';
import { createHarness, createSettledServer, poolSpec, START_TIME } from '../__tests__/fixtures';
import type { ControllerHarness } from '../__tests__/fixtures';
import { SERVER_DELETED_EVENT, SERVER_PHASE_EVENT, isServerDeletedEvent, isServerPhaseEvent } from './events';

function phaseOf(server: Server): ServerPhase | undefined {
  return server.status?.phase;
}

describe('ServerController', () => {
  let harness: ControllerHarness;
  let phases: string[];

  beforeEach(async () => {
    harness = createHarness();
    phases = [];
    harness.controller.events.subscribe(SERVER_PHASE_EVENT, isServerPhaseEvent, event => {
      phases.push(`${event.name}:${event.phase}`);
    });
    await harness.controller.createPool('pool-a', poolSpec(2));
  });

  afterEach(async () => {
    await harness.controller.stop();
  });

  describe('admission', () => {
    it('should bring a new server to Running', async () => {
      const server = await createSettledServer(harness, 's1', 'pool-a');
      const status = server.status;

      expect(status?.phase).toBe(ServerPhase.RUNNING);
      expect(status?.running).toBe(true);
      expect(status?.idle).toBe(false);
      expect(status?.startedAt).toBe(START_TIME);
      expect(status?.endpoint).toBe('mcp-server-s1/mcp-server');
      expect(status?.observedGeneration).toBe(1);
      expect(getCondition(status?.conditions ?? [], ConditionType.CAPACITY_EXCEEDED)).toEqual({
        type: ConditionType.CAPACITY_EXCEEDED,
        status: 'False',
        reason: ConditionReason.ADMITTED,
        lastTransitionTime: START_TIME
      });
      expect(getCondition(status?.conditions ?? [], ConditionType.READY)?.status).toBe('True');
      expect(phases).toEqual(['s1:Starting', 's1:Running']);
      expect(harness.workloads.ensureCalls).toEqual(['s1']);
    });

    it('should record pool counts', async () => {
      await createSettledServer(harness, 's1', 'pool-a');
      const pool = await harness.controller.getPool('pool-a');

      expect(pool.status).toEqual({
        activeServers: 1,
        pendingServers: 0,
        totalServers: 1,
        lastReconciledAt: START_TIME,
        observedGeneration: 1
      });
    });

    it('should keep a server Pending while the pool is at capacity', async () => {
      await harness.controller.updatePool('pool-a', poolSpec(1));
      await harness.controller.drain();
      await createSettledServer(harness, 's1', 'pool-a');

      const blocked = await createSettledServer(harness, 's2', 'pool-a');
      const condition = getCondition(blocked.status?.conditions ?? [], ConditionType.CAPACITY_EXCEEDED);

      expect(phaseOf(blocked)).toBe(ServerPhase.PENDING);
      expect(condition?.status).toBe('True');
      expect(condition?.reason).toBe(ConditionReason.POOL_AT_CAPACITY);
      expect(condition?.message).toBe('pool pool-a is at capacity (1)');
      expect(harness.workloads.ensureCalls).toEqual(['s1']);
    });

    it('should evict the longest-idle server to admit a new one', async () => {
      await harness.controller.updatePool('pool-a', poolSpec(1));
      await createSettledServer(harness, 's1', 'pool-a');
      harness.clock.advance(60_000);
      await harness.controller.reconcile('s1');
      expect(phaseOf(await harness.controller.getServer('s1'))).toBe(ServerPhase.IDLE);

      await createSettledServer(harness, 's2', 'pool-a');
      const evicted = await harness.controller.getServer('s1');
      const requested = getCondition(evicted.status?.conditions ?? [], ConditionType.REQUESTED);
      expect(phaseOf(evicted)).toBe(ServerPhase.STOPPED);
      expect(requested?.status).toBe('False');
      expect(requested?.reason).toBe(ConditionReason.EVICTION);

      await harness.controller.reconcile('s2');
      expect(phaseOf(await harness.controller.getServer('s2'))).toBe(ServerPhase.RUNNING);
    });
  });

  describe('failures', () => {
    it('should fail terminally on an invalid spec', async () => {
      harness.workloads.ensureErrors = [new InvalidSpecError('bad image reference')];
      const server = await createSettledServer(harness, 's1', 'pool-a');
      const ready = getCondition(server.status?.conditions ?? [], ConditionType.READY);

      expect(phaseOf(server)).toBe(ServerPhase.FAILED);
      expect(server.status?.failureReason).toBe('bad image reference');
      expect(server.status?.failedAt).toBe(START_TIME);
      expect(ready?.reason).toBe(ConditionReason.INVALID_SPEC);
      expect(harness.workloads.ensureCalls).toEqual(['s1']);
      expect(harness.workloads.teardownCalls).toEqual(['s1']);

      await expect(harness.controller.reconcile('s1')).resolves.toEqual({});
    });

    it('should fail after exhausting retries and recover later', async () => {
      harness.workloads.ensureErrors = [
        new SubstrateError('create pod', new Error('connection reset')),
        new SubstrateError('create pod', new Error('connection reset'))
      ];
      const server = await createSettledServer(harness, 's1', 'pool-a');
      const ready = getCondition(server.status?.conditions ?? [], ConditionType.READY);

      expect(phaseOf(server)).toBe(ServerPhase.FAILED);
      expect(ready?.reason).toBe(ConditionReason.RETRIES_EXHAUSTED);
      expect(harness.workloads.ensureCalls).toEqual(['s1', 's1']);
      await expect(harness.controller.reconcile('s1')).resolves.toEqual({ requeueAfterMs: 300000 });

      harness.clock.advance(300_000);
      await harness.controller.reconcile('s1');
      const recovered = await harness.controller.getServer('s1');
      expect(phaseOf(recovered)).toBe(ServerPhase.RUNNING);
      expect(recovered.status?.failureReason).toBeUndefined();
    });

    it('should fail when the pool does not exist', async () => {
      const server = await createSettledServer(harness, 's1', 'missing');
      const ready = getCondition(server.status?.conditions ?? [], ConditionType.READY);

      expect(phaseOf(server)).toBe(ServerPhase.FAILED);
      expect(ready?.reason).toBe(ConditionReason.POOL_NOT_FOUND);
      expect(server.status?.failureReason).toBe('pool not found');
      expect(harness.workloads.ensureCalls).toEqual([]);
    });

    it('should restart a server whose workload disappeared', async () => {
      await createSettledServer(harness, 's1', 'pool-a');
      harness.workloads.setState('s1', 'absent');

      await harness.controller.reconcile('s1');

      expect(phaseOf(await harness.controller.getServer('s1'))).toBe(ServerPhase.RUNNING);
      expect(harness.workloads.ensureCalls).toEqual(['s1', 's1']);
      expect(phases).toEqual(['s1:Starting', 's1:Running', 's1:Starting', 's1:Running']);
    });

    it('should fail with a recorded reason when teardown keeps failing', async () => {
      await createSettledServer(harness, 's1', 'pool-a');
      const error = new SubstrateError('delete pod', new Error('connection reset'));
      harness.workloads.teardownError = error;

      await harness.controller.stopServer('s1');
      await harness.controller.drain();
      const server = await harness.controller.getServer('s1');

      expect(phaseOf(server)).toBe(ServerPhase.FAILED);
      expect(server.status?.failureReason).toBe('delete pod failed: connection reset');
      expect(getCondition(server.status?.conditions ?? [], ConditionType.READY)?.reason).toBe(
        ConditionReason.RETRIES_EXHAUSTED
      );
      expect(harness.workloads.teardownCalls).toEqual(['s1', 's1']);
      expect(phases).toEqual(['s1:Starting', 's1:Running', 's1:Stopping', 's1:Failed']);
    });

    it('should fail with a recorded reason when the workload cannot be inspected', async () => {
      await createSettledServer(harness, 's1', 'pool-a');
      harness.workloads.inspectError = new SubstrateError('read pod', new Error('connection reset'));

      await expect(harness.controller.reconcile('s1')).resolves.toEqual({ requeueAfterMs: 300000 });
      const server = await harness.controller.getServer('s1');

      expect(phaseOf(server)).toBe(ServerPhase.FAILED);
      expect(server.status?.failureReason).toBe('read pod failed: connection reset');
      expect(server.status?.running).toBe(false);
    });

    it('should recover a server whose pool reference is corrected', async () => {
      await createSettledServer(harness, 's1', 'missing');

      const updated = await harness.controller.updateServer('s1', { pool: 'pool-a' });
      expect(updated.metadata.generation).toBe(2);
      await harness.controller.drain();
      const server = await harness.controller.getServer('s1');

      expect(phaseOf(server)).toBe(ServerPhase.RUNNING);
      expect(server.status?.observedGeneration).toBe(2);
      expect(server.status?.failureReason).toBeUndefined();
      expect(phases).toEqual(['s1:Failed', 's1:Pending', 's1:Starting', 's1:Running']);
    });

    it('should refuse to update a server that does not exist', async () => {
      await expect(harness.controller.updateServer('ghost', { pool: 'pool-a' })).rejects.toMatchObject({
        statusCode: 404
      });
    });

    it('should retry a pass after a status conflict', async () => {
      await harness.controller.createServer('s1', { pool: 'pool-a' });
      await harness.controller.drain();
      harness.workloads.setState('s1', 'absent');
      const update = jest.spyOn(harness.store, 'updateServerStatus');
      update.mockRejectedValueOnce(new ConflictError('Server', 's1'));

      await harness.controller.reconcile('s1');

      expect(phaseOf(await harness.controller.getServer('s1'))).toBe(ServerPhase.RUNNING);
    });
  });

  describe('idle handling and activity', () => {
    it('should mark a server Idle after its timeout and wake it on a request', async () => {
      await createSettledServer(harness, 's1', 'pool-a');
      harness.clock.advance(60_000);

      await expect(harness.controller.reconcile('s1')).resolves.toEqual({});
      const idle = await harness.controller.getServer('s1');
      expect(phaseOf(idle)).toBe(ServerPhase.IDLE);
      expect(idle.status?.idle).toBe(true);

      harness.controller.notifyRequest('s1');
      await harness.controller.drain();

      const woken = await harness.controller.getServer('s1');
      expect(phaseOf(woken)).toBe(ServerPhase.RUNNING);
      expect(woken.status?.totalRequests).toBe(1);
      expect(woken.status?.lastRequestAt).toBe('2025-05-01T10:01:00.000Z');
    });

    it('should requeue a Running server at its idle deadline', async () => {
      await createSettledServer(harness, 's1', 'pool-a');
      harness.clock.advance(15_000);

      await expect(harness.controller.reconcile('s1')).resolves.toEqual({ requeueAfterMs: 45_000 });
    });

    it('should track open connections', async () => {
      await createSettledServer(harness, 's1', 'pool-a');

      harness.controller.notifyConnect('s1');
      harness.controller.notifyConnect('s1');
      await harness.controller.drain();
      expect((await harness.controller.getServer('s1')).status?.currentConnections).toBe(2);

      harness.controller.notifyDisconnect('s1');
      await harness.controller.drain();
      expect((await harness.controller.getServer('s1')).status?.currentConnections).toBe(1);
    });

    it('should not write anything when nothing changed', async () => {
      await createSettledServer(harness, 's1', 'pool-a');
      const update = jest.spyOn(harness.store, 'updateServerStatus');
      const updatePool = jest.spyOn(harness.store, 'updatePoolStatus');

      await harness.controller.reconcile('s1');
      await harness.controller.reconcile('s1');

      expect(update).not.toHaveBeenCalled();
      expect(updatePool).not.toHaveBeenCalled();
      expect(harness.workloads.ensureCalls).toEqual(['s1']);
    });
  });

  describe('manual start and stop', () => {
    it('should stop and restart a server on request', async () => {
      await createSettledServer(harness, 's1', 'pool-a');

      await harness.controller.stopServer('s1');
      await harness.controller.drain();
      const stopped = await harness.controller.getServer('s1');
      expect(phaseOf(stopped)).toBe(ServerPhase.STOPPED);
      expect(stopped.status?.stoppedAt).toBe(START_TIME);
      expect(stopped.status?.running).toBe(false);
      expect(stopped.status?.endpoint).toBeUndefined();
      expect(harness.workloads.teardownCalls).toEqual(['s1']);

      await harness.controller.startServer('s1');
      await harness.controller.drain();
      expect(phaseOf(await harness.controller.getServer('s1'))).toBe(ServerPhase.RUNNING);
      expect(phases).toEqual([
        's1:Starting',
        's1:Running',
        's1:Stopping',
        's1:Stopped',
        's1:Pending',
        's1:Starting',
        's1:Running'
      ]);
    });

    it('should evict the most idle server when a pool shrinks', async () => {
      await createSettledServer(harness, 's1', 'pool-a');
      await createSettledServer(harness, 's2', 'pool-a');

      await harness.controller.updatePool('pool-a', poolSpec(1));
      await harness.controller.drain();

      expect(phaseOf(await harness.controller.getServer('s1'))).toBe(ServerPhase.STOPPED);
      expect(phaseOf(await harness.controller.getServer('s2'))).toBe(ServerPhase.RUNNING);
      expect((await harness.controller.getPool('pool-a')).status?.activeServers).toBe(1);
    });
  });

  describe('deletion', () => {
    it('should release the workload and announce deletion', async () => {
      const deleted: string[] = [];
      harness.controller.events.subscribe(SERVER_DELETED_EVENT, isServerDeletedEvent, event => {
        deleted.push(event.name);
      });
      await createSettledServer(harness, 's1', 'pool-a');

      await harness.controller.deleteServer('s1');
      await harness.controller.drain();

      expect(deleted).toEqual(['s1']);
      expect(harness.workloads.teardownCalls).toEqual(['s1']);
      expect(await harness.controller.listServers()).toEqual([]);
    });

    it('should delete long-stopped servers when configured to', async () => {
      await harness.controller.stop();
      harness = createHarness({ terminalIdleMs: 10_000 });
      await harness.controller.createPool('pool-a', poolSpec(2));
      await createSettledServer(harness, 's1', 'pool-a');
      await harness.controller.stopServer('s1');
      await harness.controller.drain();

      await expect(harness.controller.reconcile('s1')).resolves.toEqual({ requeueAfterMs: 10_000 });
      harness.clock.advance(10_000);
      await harness.controller.reconcile('s1');

      expect(await harness.controller.listServers()).toEqual([]);
    });
  });
});
