import { describe, it, expect, beforeEach } from 'vitest';
import { ProvisioningOrchestrator } from './provisioningOrchestrator.js';
import { FakeAccessControlService } from '../testing/fakeAccessControl.js';
import { AccessControlError, type CallOptions, type CreateUserInput } from '../accessControl/types.js';
import { MemoryOrganizationStore } from '../store/memoryOrganizationStore.js';
import { newOrganizationRecord } from '../store/organizationStore.js';
import type { OrganizationRecord } from '../db/schema.js';
import { CancelledError, ConcurrentModificationError, RetryExhaustedError } from '../lifecycle/errors.js';

const NOW = new Date('2026-03-01T10:00:00.000Z');

/** Creates the user on the first call but answers it only after `delayMs`. */
class SlowFirstCreateUser extends FakeAccessControlService {
  private answered = false;

  constructor(private readonly delayMs: number) {
    super();
  }

  override async createUser(input: CreateUserInput, options?: CallOptions): Promise<string> {
    const id = await super.createUser(input, options);
    if (!this.answered) {
      this.answered = true;
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    return id;
  }
}

describe('ProvisioningOrchestrator', () => {
  let store: MemoryOrganizationStore;
  let accessControl: FakeAccessControlService;
  let orchestrator: ProvisioningOrchestrator;
  let record: OrganizationRecord;

  beforeEach(async () => {
    store = new MemoryOrganizationStore();
    accessControl = new FakeAccessControlService();
    orchestrator = new ProvisioningOrchestrator({
      store,
      accessControl,
      policy: { timeoutMs: 50, attempts: 2, backoffMs: 0 },
      maxSetupAttempts: 3,
      now: () => NOW,
    });
    record = await store.insert(
      newOrganizationRecord(
        {
          id: '7d1c2f3e-0000-4000-8000-000000000001',
          name: 'Green Valley Producers',
          registrationNumber: 'FPO-001',
          metadata: { district: 'Nashik' },
          ceoProfile: { firstName: 'Asha', lastName: 'Patil', phoneNumber: '+910000000001' },
        },
        NOW,
      ),
    );
  });

  it('runs every step and records the references each step produced', async () => {
    const run = await orchestrator.runSetup(record);

    expect(run.outcome).toEqual({
      status: 'succeeded',
      completedSteps: ['org_created', 'ceo_created', 'roles_assigned'],
    });
    expect(run.record.setupProgress).toEqual({
      org_created: true,
      ceo_created: true,
      catalog_applied: true,
      roles_assigned: true,
    });
    expect(run.record.externalOrgRef).toBe('ext-org-1');
    expect(run.record.ceoUserId).toBe('ext-user-2');
    expect(run.record.status).toBe('DRAFT');
    // one version bump per persisted step and checkpoint
    expect(run.record.version).toBe(5);

    expect(accessControl.catalogApplied.has('ext-org-1')).toBe(true);
    expect(accessControl.roleAssignments).toEqual([
      { userId: 'ext-user-2', externalOrgRef: 'ext-org-1', role: 'CEO' },
    ]);
  });

  it('passes the local id as the organization idempotency key', async () => {
    await orchestrator.runSetup(record);

    expect(accessControl.organizations.get('ext-org-1')?.metadata).toEqual({
      district: 'Nashik',
      localId: record.id,
    });
  });

  it('returns a failed outcome for a rejected step and keeps earlier progress', async () => {
    accessControl.failNext('createUser', new AccessControlError('createUser', 'phone number already in use', false, 409));

    const run = await orchestrator.runSetup(record);

    expect(run.outcome).toEqual({
      status: 'failed',
      step: 'ceo_created',
      cause: 'phone number already in use',
      transient: false,
    });
    expect(accessControl.calls.createUser).toBe(1);

    const stored = await store.findById(record.id);
    expect(stored?.setupProgress).toEqual({ org_created: true });
    expect(stored?.externalOrgRef).toBe('ext-org-1');
    expect(stored?.ceoUserId).toBeNull();
    expect(stored?.setupAttempts).toBe(0);
  });

  it('reports a step that kept failing transiently as transient', async () => {
    accessControl.failNext('createOrganization', new AccessControlError('createOrganization', 'unavailable', true, 503), 2);

    const run = await orchestrator.runSetup(record);

    expect(run.outcome).toMatchObject({ status: 'failed', step: 'org_created', transient: true });
    expect(accessControl.calls.createOrganization).toBe(2);
    expect(accessControl.calls.createUser).toBe(0);
  });

  it('resumes at the first incomplete step without repeating completed calls', async () => {
    accessControl.failNext('assignDefaultRolesAndPermissions', new AccessControlError('assign', 'bad catalog', false, 422));
    const first = await orchestrator.runSetup(record);
    expect(first.outcome).toMatchObject({ status: 'failed', step: 'roles_assigned' });

    const second = await orchestrator.runSetup(first.record);

    expect(second.outcome.status).toBe('succeeded');
    expect(accessControl.calls.createOrganization).toBe(1);
    expect(accessControl.calls.createUser).toBe(1);
    expect(accessControl.calls.assignDefaultRolesAndPermissions).toBe(2);
    expect(accessControl.calls.assignRole).toBe(1);
  });

  it('does not reapply the role catalog when only the CEO role assignment failed', async () => {
    accessControl.failNext('assignRole', new AccessControlError('assignRole', 'role not found', false, 404));
    const first = await orchestrator.runSetup(record);
    expect(first.outcome).toMatchObject({ status: 'failed', step: 'roles_assigned' });
    expect(first.record.setupProgress).toEqual({ org_created: true, ceo_created: true, catalog_applied: true });

    const second = await orchestrator.runSetup(first.record);

    expect(second.outcome.status).toBe('succeeded');
    expect(accessControl.calls.assignDefaultRolesAndPermissions).toBe(1);
    expect(accessControl.calls.assignRole).toBe(2);
  });

  it('gets the same CEO back when the first create call answered after the timeout', async () => {
    const slow = new SlowFirstCreateUser(60);
    const impatient = new ProvisioningOrchestrator({
      store,
      accessControl: slow,
      policy: { timeoutMs: 20, attempts: 2, backoffMs: 0 },
      maxSetupAttempts: 3,
      now: () => NOW,
    });

    const run = await impatient.runSetup(record);

    expect(run.outcome.status).toBe('succeeded');
    expect(slow.calls.createUser).toBe(2);
    expect(slow.users.size).toBe(1);
    expect(run.record.ceoUserId).toBe('ext-user-2');
  });

  it('makes no external call when every step is already complete', async () => {
    const done = await orchestrator.runSetup(record);
    const again = await orchestrator.runSetup(done.record);

    expect(again.outcome.status).toBe('succeeded');
    expect(again.record.version).toBe(done.record.version);
    expect(accessControl.calls.createOrganization).toBe(1);
    expect(accessControl.calls.createUser).toBe(1);
  });

  it('fails the CEO step when the record has no CEO profile', async () => {
    const synced = await store.insert(
      newOrganizationRecord({ id: '7d1c2f3e-0000-4000-8000-000000000002', name: 'No CEO Yet' }, NOW),
    );

    const run = await orchestrator.runSetup(synced);

    expect(run.outcome).toEqual({
      status: 'failed',
      step: 'ceo_created',
      cause: 'cannot run ceo_created: ceoProfile is not set',
      transient: false,
    });
    expect(accessControl.calls.createUser).toBe(0);
  });

  it('throws when the record changed underneath the run', async () => {
    await store.update(record.id, record.version, { statusReason: 'edited elsewhere' }, NOW);

    await expect(orchestrator.runSetup(record)).rejects.toBeInstanceOf(ConcurrentModificationError);
    expect(accessControl.calls.createOrganization).toBe(1);
  });

  it('rethrows the abort reason when cancelled mid-step', async () => {
    const controller = new AbortController();
    const reason = new CancelledError('transition');
    accessControl.hangNext('createUser');
    setTimeout(() => controller.abort(reason), 5);

    await expect(
      orchestrator.runSetup(record, { signal: controller.signal }),
    ).rejects.toBe(reason);

    const stored = await store.findById(record.id);
    expect(stored?.setupProgress).toEqual({ org_created: true });
  });

  it('gates retries on the attempt limit', () => {
    expect(() => orchestrator.assertCanRetry({ ...record, setupAttempts: 2 })).not.toThrow();
    expect(() => orchestrator.assertCanRetry({ ...record, setupAttempts: 3 })).toThrow(RetryExhaustedError);
  });
});
