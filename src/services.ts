import type { ExternalCallPolicy } from './accessControl/callExternal.js';
import type { AccessControlService } from './accessControl/types.js';
import type { AuditLedger } from './audit/auditLedger.js';
import type { Config } from './config/index.js';
import { LifecycleController } from './lifecycle/lifecycleController.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { ProvisioningOrchestrator } from './provisioning/provisioningOrchestrator.js';
import { OrganizationRegistry } from './registry/organizationRegistry.js';
import type { OrganizationStore } from './store/organizationStore.js';

export type LifecycleSettings = Pick<
  Config,
  | 'accessControlTimeoutMs'
  | 'accessControlRetryAttempts'
  | 'accessControlRetryBackoffMs'
  | 'maxSetupAttempts'
  | 'transitionTimeoutMs'
>;

export interface ServiceDependencies {
  store: OrganizationStore;
  ledger: AuditLedger;
  accessControl: AccessControlService;
  settings: LifecycleSettings;
  logger?: Logger;
  now?: () => Date;
}

export interface Services {
  store: OrganizationStore;
  ledger: AuditLedger;
  registry: OrganizationRegistry;
  orchestrator: ProvisioningOrchestrator;
  lifecycle: LifecycleController;
}

/**
 * Wire the lifecycle subsystem over the given store, ledger and
 * access-control implementations.
 */
export function createServices(deps: ServiceDependencies): Services {
  const { store, ledger, accessControl, settings, now } = deps;
  const logger = deps.logger ?? rootLogger;
  const policy: ExternalCallPolicy = {
    timeoutMs: settings.accessControlTimeoutMs,
    attempts: settings.accessControlRetryAttempts,
    backoffMs: settings.accessControlRetryBackoffMs,
  };

  const orchestrator = new ProvisioningOrchestrator({
    store,
    accessControl,
    policy,
    maxSetupAttempts: settings.maxSetupAttempts,
    now,
  });

  return {
    store,
    ledger,
    orchestrator,
    registry: new OrganizationRegistry({ store, ledger, accessControl, policy, logger, now }),
    lifecycle: new LifecycleController({
      store,
      ledger,
      accessControl,
      orchestrator,
      policy,
      transitionTimeoutMs: settings.transitionTimeoutMs,
      logger,
      now,
    }),
  };
}
