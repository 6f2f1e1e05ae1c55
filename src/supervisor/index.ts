export { DependencyGraph } from './DependencyGraph';
export { HealthProbe } from './HealthProbe';
export type { ProbeTarget } from './HealthProbe';
export { IllegalTransitionError, ServiceUnit } from './ServiceUnit';
export { START_FAILURE_EXIT_CODE, Supervisor } from './Supervisor';
export type { BlockedListener, SupervisorOptions } from './Supervisor';
export * from './errors';
export type * from './types';
