/**
 * HTTP client for the access-control service.
 */

import { z } from 'zod';
import { errorMessage } from '../lifecycle/errors.js';
import { DEFAULT_ROLE_GROUPS } from './roleCatalog.js';
import {
  AccessControlError,
  isTransientStatus,
  type AccessControlService,
  type CallOptions,
  type CreateOrganizationInput,
  type CreateUserInput,
  type ExternalOrganization,
  type PermissionQuery,
} from './types.js';

const permissionResponseSchema = z.object({ allowed: z.boolean() });
const createOrganizationResponseSchema = z.object({ orgId: z.string().min(1) });
const createUserResponseSchema = z.object({ userId: z.string().min(1) });
const organizationResponseSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  registrationNumber: z.string().optional(),
  description: z.string().optional(),
  ceoUserId: z.string().min(1).optional(),
  metadata: z.record(z.unknown()).default({}),
});

/** The CEO is the one user created per organization. */
function ceoIdempotencyKey(localId: string): string {
  return `${localId}:ceo`;
}

export interface HttpAccessControlClientOptions {
  baseUrl: string;
  apiKey?: string;
  fetch?: typeof fetch;
}

type HttpMethod = 'GET' | 'POST';

export class HttpAccessControlClient implements AccessControlService {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: HttpAccessControlClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.apiKey = options.apiKey;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async checkPermission(query: PermissionQuery, options?: CallOptions): Promise<boolean> {
    const body = await this.request('checkPermission', 'POST', '/v1/permissions/check', options, {
      subject: query.actorId,
      resource: query.resource,
      action: query.action,
      orgId: query.orgId,
    });
    return this.parse('checkPermission', permissionResponseSchema, body).allowed;
  }

  async createOrganization(input: CreateOrganizationInput, options?: CallOptions): Promise<string> {
    const body = await this.request(
      'createOrganization',
      'POST',
      '/v1/organizations',
      options,
      {
        name: input.name,
        description: input.description ?? undefined,
        registrationNumber: input.registrationNumber ?? undefined,
        type: 'fpo',
        metadata: input.metadata,
      },
      { 'Idempotency-Key': input.localId },
    );
    return this.parse('createOrganization', createOrganizationResponseSchema, body).orgId;
  }

  async createUser(input: CreateUserInput, options?: CallOptions): Promise<string> {
    const { profile } = input;
    const body = await this.request(
      'createUser',
      'POST',
      '/v1/users',
      options,
      {
        firstName: profile.firstName,
        lastName: profile.lastName,
        phoneNumber: profile.phoneNumber,
        email: profile.email,
      },
      { 'Idempotency-Key': ceoIdempotencyKey(input.localId) },
    );
    return this.parse('createUser', createUserResponseSchema, body).userId;
  }

  async assignDefaultRolesAndPermissions(externalOrgRef: string, options?: CallOptions): Promise<void> {
    await this.request(
      'assignDefaultRolesAndPermissions',
      'POST',
      `/v1/organizations/${encodeURIComponent(externalOrgRef)}/catalog/apply`,
      options,
      { resource: 'fpo', groups: DEFAULT_ROLE_GROUPS },
    );
  }

  async assignRole(userId: string, externalOrgRef: string, role: string, options?: CallOptions): Promise<void> {
    await this.request(
      'assignRole',
      'POST',
      `/v1/organizations/${encodeURIComponent(externalOrgRef)}/roles`,
      options,
      { userId, role },
    );
  }

  async getOrganization(externalOrgRef: string, options?: CallOptions): Promise<ExternalOrganization | null> {
    const body = await this.request(
      'getOrganization',
      'GET',
      `/v1/organizations/${encodeURIComponent(externalOrgRef)}`,
      options,
      undefined,
      undefined,
      { allowNotFound: true },
    );
    if (body === null) return null;
    return this.parse('getOrganization', organizationResponseSchema, body);
  }

  private async request(
    operation: string,
    method: HttpMethod,
    path: string,
    options: CallOptions | undefined,
    payload?: unknown,
    extraHeaders?: Record<string, string>,
    behaviour?: { allowNotFound?: boolean },
  ): Promise<unknown> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...extraHeaders,
    };
    if (payload !== undefined) headers['Content-Type'] = 'application/json';
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: options?.signal,
      });
    } catch (error) {
      // Aborts are classified by the caller that owns the signal
      if (options?.signal?.aborted) throw error;
      throw new AccessControlError(operation, `network error: ${errorMessage(error)}`, true);
    }

    if (response.status === 404 && behaviour?.allowNotFound) {
      return null;
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new AccessControlError(
        operation,
        `access-control service returned ${response.status}${detail ? `: ${detail}` : ''}`,
        isTransientStatus(response.status),
        response.status,
      );
    }

    if (response.status === 204) return {};
    const text = await response.text();
    if (text === '') return {};
    try {
      return JSON.parse(text);
    } catch {
      throw new AccessControlError(operation, 'access-control service returned invalid JSON', false, response.status);
    }
  }

  private parse<T extends z.ZodTypeAny>(operation: string, schema: T, body: unknown): z.output<T> {
    const result = schema.safeParse(body);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new AccessControlError(operation, `unexpected response shape (${issues})`, false);
    }
    return result.data;
  }
}
