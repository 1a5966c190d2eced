import { describe, it, expect, vi, type Mock } from 'vitest';
import { HttpAccessControlClient } from './httpClient.js';
import { AccessControlError } from './types.js';

const CEO = { firstName: 'Asha', lastName: 'Patil', phoneNumber: '+910000000009' };

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function setup(...responses: Array<Response | Error>) {
  const fetchMock = vi.fn<typeof fetch>();
  for (const response of responses) {
    if (response instanceof Error) fetchMock.mockRejectedValueOnce(response);
    else fetchMock.mockResolvedValueOnce(response);
  }
  const client = new HttpAccessControlClient({
    baseUrl: 'http://access-control.local/',
    apiKey: 'test-secret',
    fetch: fetchMock,
  });
  return { client, fetchMock };
}

function sentBody(fetchMock: Mock<typeof fetch>, call = 0): unknown {
  return JSON.parse(String(fetchMock.mock.calls[call][1]?.body));
}

describe('HttpAccessControlClient', () => {
  it('checks a permission', async () => {
    const { client, fetchMock } = setup(json({ allowed: true }));

    const allowed = await client.checkPermission({ actorId: 'user-1', resource: 'fpo', action: 'approve', orgId: 'org-1' });

    expect(allowed).toBe(true);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://access-control.local/v1/permissions/check');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' });
    expect(sentBody(fetchMock)).toEqual({ subject: 'user-1', resource: 'fpo', action: 'approve', orgId: 'org-1' });
  });

  it('sends the local id as the idempotency key when creating an organization', async () => {
    const { client, fetchMock } = setup(json({ orgId: 'ext-org-1' }, 201));

    const ref = await client.createOrganization({
      localId: 'local-1',
      name: 'Krishna FPO',
      registrationNumber: null,
      metadata: { state: 'Goa' },
    });

    expect(ref).toBe('ext-org-1');
    expect(fetchMock.mock.calls[0][1]?.headers).toMatchObject({ 'Idempotency-Key': 'local-1' });
    expect(sentBody(fetchMock)).toEqual({ name: 'Krishna FPO', type: 'fpo', metadata: { state: 'Goa' } });
  });

  it('keys CEO creation on the organization so a repeated call is idempotent', async () => {
    const { client, fetchMock } = setup(json({ userId: 'ext-user-1' }, 201), json({ userId: 'ext-user-1' }, 200));

    await client.createUser({ localId: 'local-1', profile: CEO });
    await client.createUser({ localId: 'local-1', profile: CEO });

    expect(fetchMock.mock.calls[0][1]?.headers).toMatchObject({ 'Idempotency-Key': 'local-1:ceo' });
    expect(fetchMock.mock.calls[1][1]?.headers).toMatchObject({ 'Idempotency-Key': 'local-1:ceo' });
    expect(sentBody(fetchMock)).toEqual({ firstName: 'Asha', lastName: 'Patil', phoneNumber: '+910000000009' });
  });

  it('accepts an empty body for role assignment', async () => {
    const { client, fetchMock } = setup(new Response(null, { status: 204 }));

    await client.assignRole('ext-user-1', 'ext org/1', 'ceo');

    expect(fetchMock.mock.calls[0][0]).toBe('http://access-control.local/v1/organizations/ext%20org%2F1/roles');
    expect(sentBody(fetchMock)).toEqual({ userId: 'ext-user-1', role: 'ceo' });
  });

  it('returns null for an unknown organization', async () => {
    const { client } = setup(json({ error: 'not found' }, 404));

    expect(await client.getOrganization('ext-org-404')).toBeNull();
  });

  it('defaults metadata on a fetched organization', async () => {
    const { client } = setup(json({ id: 'ext-org-2', name: 'Remote FPO', ceoUserId: 'ext-user-3' }));

    expect(await client.getOrganization('ext-org-2')).toEqual({
      id: 'ext-org-2',
      name: 'Remote FPO',
      ceoUserId: 'ext-user-3',
      metadata: {},
    });
  });

  it('marks 5xx and 429 responses transient', async () => {
    const { client } = setup(new Response('busy', { status: 503 }), new Response('', { status: 429 }));

    const first = await client.createUser({ localId: 'local-1', profile: CEO }).catch((e: unknown) => e);
    const second = await client.createUser({ localId: 'local-1', profile: CEO }).catch((e: unknown) => e);

    expect(first).toBeInstanceOf(AccessControlError);
    expect(first).toMatchObject({
      operation: 'createUser',
      transient: true,
      status: 503,
      message: 'access-control service returned 503: busy',
    });
    expect(second).toMatchObject({ transient: true, status: 429, message: 'access-control service returned 429' });
  });

  it('marks 4xx responses permanent', async () => {
    const { client } = setup(new Response('duplicate', { status: 409 }));

    await expect(client.assignDefaultRolesAndPermissions('ext-org-1')).rejects.toMatchObject({
      transient: false,
      status: 409,
    });
  });

  it('treats a network failure as transient', async () => {
    const { client } = setup(new TypeError('fetch failed'));

    await expect(
      client.checkPermission({ actorId: 'u', resource: 'fpo', action: 'submit', orgId: 'o' }),
    ).rejects.toMatchObject({ transient: true, message: 'network error: fetch failed' });
  });

  it('rethrows the abort reason untouched', async () => {
    const controller = new AbortController();
    const reason = new Error('caller gave up');
    controller.abort(reason);
    const { client } = setup(reason);

    await expect(client.getOrganization('ext-org-1', { signal: controller.signal })).rejects.toBe(reason);
  });

  it('rejects a response of the wrong shape', async () => {
    const { client } = setup(json({ permitted: true }));

    await expect(
      client.checkPermission({ actorId: 'u', resource: 'fpo', action: 'submit', orgId: 'o' }),
    ).rejects.toMatchObject({ transient: false, message: 'unexpected response shape (allowed: Required)' });
  });
});
