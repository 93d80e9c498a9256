export * from './core';
export { createActivityService } from './lib/activityService';
export type { ActivityService, HealthReport, ServiceResponse } from './lib/activityService';
export { validateAccelerationData, validateActivityRequest } from './lib/batchValidation';
export type { ActivityRequestV1, ValidationResult } from './lib/batchValidation';
export * from './lib/wireFormat';
export { loadSettings } from './lib/settings';
export type { Settings } from './lib/settings';
export { DebugLogger, debugLog } from './lib/debugLog';
export type { LogEntry, LogLevel } from './lib/debugLog';
