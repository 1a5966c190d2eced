import { describe, it, expect, beforeEach } from 'vitest';
import { FakeAccessControlService } from '../testing/fakeAccessControl.js';
import { AccessControlError } from '../accessControl/types.js';
import { MemoryAuditLedger } from '../audit/memoryAuditLedger.js';
import { ConflictError, ExternalServiceError, NotFoundError } from '../lifecycle/errors.js';
import { MemoryOrganizationStore } from '../store/memoryOrganizationStore.js';
import { OrganizationRegistry, type RegisterInput } from './organizationRegistry.js';

const NOW = new Date('2026-04-02T08:30:00.000Z');
const ACTOR = 'user-registrar-1';

const INPUT: RegisterInput = {
  name: 'Godavari Farmers Collective',
  registrationNumber: 'FPO-REG-100',
  metadata: { district: 'East Godavari' },
  ceoProfile: { firstName: 'Lakshmi', lastName: 'Rao', phoneNumber: '+910000000003' },
};

describe('OrganizationRegistry', () => {
  let store: MemoryOrganizationStore;
  let ledger: MemoryAuditLedger;
  let accessControl: FakeAccessControlService;
  let registry: OrganizationRegistry;

  beforeEach(() => {
    store = new MemoryOrganizationStore();
    ledger = new MemoryAuditLedger();
    accessControl = new FakeAccessControlService();
    registry = new OrganizationRegistry({
      store,
      ledger,
      accessControl,
      policy: { timeoutMs: 100, attempts: 2, backoffMs: 0 },
      now: () => NOW,
    });
  });

  describe('register', () => {
    it('creates a DRAFT record and audits it', async () => {
      const record = await registry.register(INPUT, ACTOR, 'req-1');

      expect(record).toMatchObject({
        name: 'Godavari Farmers Collective',
        registrationNumber: 'FPO-REG-100',
        status: 'DRAFT',
        version: 1,
        setupAttempts: 0,
        setupProgress: {},
        externalOrgRef: null,
        ceoUserId: null,
        createdAt: NOW,
      });
      expect(await store.findById(record.id)).toEqual(record);

      const history = await ledger.history(record.id);
      expect(history.items).toHaveLength(1);
      expect(history.items[0]).toMatchObject({
        action: 'register',
        outcome: 'succeeded',
        previousState: null,
        newState: 'DRAFT',
        performedBy: ACTOR,
        requestId: 'req-1',
        details: null,
      });
    });

    it('rejects a registration number already in use', async () => {
      const first = await registry.register(INPUT, ACTOR, 'req-1');

      await expect(registry.register({ ...INPUT, name: 'Other' }, ACTOR, 'req-2')).rejects.toMatchObject({
        code: 'CONFLICT',
        details: { registrationNumber: 'FPO-REG-100', orgId: first.id },
      });
      expect(ledger.all()).toHaveLength(1);
    });

    it('allows several organizations without a registration number', async () => {
      await registry.register({ ...INPUT, registrationNumber: undefined }, ACTOR, 'req-1');
      await registry.register({ ...INPUT, registrationNumber: undefined, name: 'Second' }, ACTOR, 'req-2');

      expect((await registry.listByStatus('DRAFT')).total).toBe(2);
    });

    it('requires an existing parent', async () => {
      const parent = await registry.register(INPUT, ACTOR, 'req-1');

      const child = await registry.register(
        { ...INPUT, registrationNumber: 'FPO-REG-101', parentFpoId: parent.id },
        ACTOR,
        'req-2',
      );
      expect(child.parentFpoId).toBe(parent.id);

      await expect(
        registry.register({ ...INPUT, registrationNumber: 'FPO-REG-102', parentFpoId: 'missing-parent' }, ACTOR, 'req-3'),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('get and listByStatus', () => {
    it('throws NotFoundError for an unknown id', async () => {
      await expect(registry.get('no-such-org')).rejects.toThrow('Organization not found: no-such-org');
    });

    it('pages through one status', async () => {
      for (let i = 1; i <= 3; i++) {
        await registry.register({ ...INPUT, registrationNumber: `FPO-REG-20${i}`, name: `FPO ${i}` }, ACTOR, `req-${i}`);
      }

      const page = await registry.listByStatus('DRAFT', { limit: 2, offset: 1 });

      expect(page).toMatchObject({ total: 3, limit: 2, offset: 1, hasMore: false });
      expect(page.items).toHaveLength(2);
      expect((await registry.listByStatus('ACTIVE')).items).toEqual([]);
    });
  });

  describe('syncFromAccessControl', () => {
    it('creates an ACTIVE record for an external organization with a CEO', async () => {
      accessControl.addOrganization({
        id: 'ext-org-500',
        name: 'Tungabhadra FPO',
        registrationNumber: 'FPO-EXT-500',
        ceoUserId: 'ext-user-501',
        metadata: { crops: ['paddy'] },
      });

      const { record, created } = await registry.syncFromAccessControl('ext-org-500', ACTOR, 'req-sync');

      expect(created).toBe(true);
      expect(record).toMatchObject({
        externalOrgRef: 'ext-org-500',
        name: 'Tungabhadra FPO',
        registrationNumber: 'FPO-EXT-500',
        status: 'ACTIVE',
        statusChangedBy: ACTOR,
        ceoUserId: 'ext-user-501',
        ceoProfile: null,
        setupProgress: { org_created: true, ceo_created: true, roles_assigned: true },
        metadata: { crops: ['paddy'] },
      });
      const [entry] = (await ledger.history(record.id)).items;
      expect(entry).toMatchObject({
        action: 'sync',
        previousState: null,
        newState: 'ACTIVE',
        details: { externalOrgRef: 'ext-org-500' },
      });
    });

    it('leaves the CEO step open when the external organization has no CEO', async () => {
      accessControl.addOrganization({ id: 'ext-org-600', name: 'Headless FPO', metadata: {} });

      const { record } = await registry.syncFromAccessControl('ext-org-600', ACTOR, 'req-sync');

      expect(record.setupProgress).toEqual({ org_created: true, roles_assigned: true });
      expect(record.ceoUserId).toBeNull();
    });

    it('returns the linked record without calling the service again', async () => {
      accessControl.addOrganization({ id: 'ext-org-700', name: 'Linked FPO', metadata: {} });
      const first = await registry.syncFromAccessControl('ext-org-700', ACTOR, 'req-1');

      const second = await registry.syncFromAccessControl('ext-org-700', ACTOR, 'req-2');

      expect(second.created).toBe(false);
      expect(second.record.id).toBe(first.record.id);
      expect(accessControl.calls.getOrganization).toBe(1);
      expect(ledger.all()).toHaveLength(1);
    });

    it('throws NotFoundError when the service does not know the reference', async () => {
      await expect(registry.syncFromAccessControl('ext-org-404', ACTOR, 'req-1')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        details: { resource: 'External organization', id: 'ext-org-404' },
      });
    });

    it('rejects an external organization whose registration number is taken locally', async () => {
      await registry.register(INPUT, ACTOR, 'req-1');
      accessControl.addOrganization({
        id: 'ext-org-800',
        name: 'Duplicate',
        registrationNumber: 'FPO-REG-100',
        metadata: {},
      });

      await expect(registry.syncFromAccessControl('ext-org-800', ACTOR, 'req-2')).rejects.toBeInstanceOf(ConflictError);
    });

    it('retries a transient failure', async () => {
      accessControl.addOrganization({ id: 'ext-org-900', name: 'Flaky FPO', metadata: {} });
      accessControl.failNext('getOrganization', new AccessControlError('getOrganization', 'unavailable', true));

      const { created } = await registry.syncFromAccessControl('ext-org-900', ACTOR, 'req-1');

      expect(created).toBe(true);
      expect(accessControl.calls.getOrganization).toBe(2);
    });

    it('reports a rejected call as an external service error', async () => {
      accessControl.failNext('getOrganization', new AccessControlError('getOrganization', 'bad request', false, 400));

      const error = await registry.syncFromAccessControl('ext-org-901', ACTOR, 'req-1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExternalServiceError);
      expect(accessControl.calls.getOrganization).toBe(1);
    });
  });

  describe('erase', () => {
    it('hides the record but keeps its history', async () => {
      const record = await registry.register(INPUT, ACTOR, 'req-1');

      const erased = await registry.erase(record.id, ACTOR, 'data subject request', 'req-2');

      expect(erased.deletedAt).toEqual(NOW);
      await expect(registry.get(record.id)).rejects.toBeInstanceOf(NotFoundError);
      expect((await registry.listByStatus('DRAFT')).items).toEqual([]);

      const history = await ledger.history(record.id);
      expect(history.items.map((e) => e.action)).toEqual(['register', 'erase']);
      expect(history.items[1]).toMatchObject({
        previousState: 'DRAFT',
        newState: 'DRAFT',
        reason: 'data subject request',
        details: { deletedAt: NOW.toISOString() },
      });
    });

    it('throws NotFoundError for an erased record', async () => {
      const record = await registry.register(INPUT, ACTOR, 'req-1');
      await registry.erase(record.id, ACTOR, 'first', 'req-2');

      await expect(registry.erase(record.id, ACTOR, 'again', 'req-3')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('keeps the registration number reserved after erasure', async () => {
      const record = await registry.register(INPUT, ACTOR, 'req-1');
      await registry.erase(record.id, ACTOR, 'gone', 'req-2');

      await expect(registry.register(INPUT, ACTOR, 'req-3')).rejects.toBeInstanceOf(ConflictError);
    });
  });
});
