/**
 * 组装 client / supervisor / delivery / orchestrator，进程内单例
 */

import { BackendClient } from '../backend/client.js';
import { MessageDelivery } from '../backend/delivery.js';
import { BackendSupervisor } from '../backend/supervisor.js';
import { defaultWorkingDirectory, loadConfig, type RelayConfig } from '../config.js';
import { SessionOrchestrator } from './session-orchestrator.js';

export interface Relay {
  config: RelayConfig;
  client: BackendClient;
  supervisor: BackendSupervisor;
  orchestrator: SessionOrchestrator;
}

export function createRelay(config: RelayConfig): Relay {
  const client = new BackendClient(config.endpoint, { messageTimeoutMs: config.messageTimeoutMs });
  const supervisor = new BackendSupervisor({
    endpoint: config.endpoint,
    logPath: config.backendLogPath,
  });
  const delivery = new MessageDelivery(client, {
    mode: config.deliveryMode,
    timeoutMs: config.messageTimeoutMs,
  });
  const orchestrator = new SessionOrchestrator({
    client,
    delivery,
    supervisor,
    projectsRoot: config.projectsRoot,
    defaultCwd: () => defaultWorkingDirectory(config),
  });
  return { config, client, supervisor, orchestrator };
}

let relay: Relay | null = null;

export function getRelay(): Relay {
  if (!relay) {
    relay = createRelay(loadConfig());
  }
  return relay;
}
