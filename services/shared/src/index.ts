// Config
export * from './config/env';
export * from './context';

// Database
export * from './db/client';
export * from './db/migrate';

// Messaging
export * from './messaging/client';

// HTTP
export * from './http/failure-classifier';
export * from './http/retry-policy';
export * from './http/request-executor';

// Auth
export * from './auth/auth-session';

// Clients
export * from './clients/envelope';
export * from './clients/outpost-client';
export * from './clients/outpost-mock-client';
export * from './clients/outpost-registry';

// Services
export * from './services/merge-planner';
export * from './services/sync-orchestrator';
export * from './services/sync-audit-log';
export * from './services/sync-service';
export * from './services/fleet-service';

// Types
export * from './types/inventory.types';
export * from './types/sync.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
