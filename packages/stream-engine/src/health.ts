import type { HealthStatus, ProviderHealth, QueueState } from '@streamscribe/shared-types';

export interface HealthSources {
  sessions: { activeSessionCount(): number };
  dispatcher: { providerHealth(): ProviderHealth[] };
  bridge?: { state(): QueueState };
  now?: () => number;
}

export const PROVIDER_ERROR_RATE_THRESHOLD = 0.5;

export function buildHealthStatus(sources: HealthSources): HealthStatus {
  const providers = sources.dispatcher.providerHealth();
  const queue = sources.bridge?.state() ?? 'disabled';
  const unhealthyProvider = providers.some((provider) => provider.errorRate >= PROVIDER_ERROR_RATE_THRESHOLD);

  return {
    status: queue === 'degraded' || unhealthyProvider ? 'degraded' : 'ok',
    activeSessions: sources.sessions.activeSessionCount(),
    providers,
    queue,
    timestamp: new Date((sources.now ?? Date.now)()).toISOString(),
  };
}
