/**
 * Default timings of the readiness gate, in seconds.
 */
export const READINESS_TIMINGS = {
  APP_INSTALLED: { interval: 10, maxWait: 120 },
  CONTAINERS_HEALTHY: { interval: 5, maxWait: 120 },
  DATABASE_REACHABLE: { interval: 5, maxWait: 60 },
  GRACE: 10,
  HTTP_ATTEMPTS: 12,
  HTTP_INTERVAL: 5,
} as const;

export interface StageTiming {
  interval: number;
  maxWait: number;
}

export interface ReadinessTimings {
  appInstalled: StageTiming;
  containersHealthy: StageTiming;
  databaseReachable: StageTiming;
  grace: number;
  httpAttempts: number;
  httpInterval: number;
}

export const DEFAULT_READINESS_TIMINGS: ReadinessTimings = {
  appInstalled: { ...READINESS_TIMINGS.APP_INSTALLED },
  containersHealthy: { ...READINESS_TIMINGS.CONTAINERS_HEALTHY },
  databaseReachable: { ...READINESS_TIMINGS.DATABASE_REACHABLE },
  grace: READINESS_TIMINGS.GRACE,
  httpAttempts: READINESS_TIMINGS.HTTP_ATTEMPTS,
  httpInterval: READINESS_TIMINGS.HTTP_INTERVAL,
};

export type ReadinessStage =
  | 'app-installed'
  | 'containers-healthy'
  | 'database-reachable'
  | 'ready'
  | 'starting';

export const STAGE_LABELS: Record<ReadinessStage, string> = {
  'app-installed': 'WordPress installation',
  'containers-healthy': 'container health',
  'database-reachable': 'database connection',
  ready: 'ready',
  starting: 'container startup',
};
