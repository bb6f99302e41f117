/**
 * Core - chat routing, API access and webhook handling, independent of Nest wiring
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Errors
export * from './errors';

// Ports
export * from './interfaces';

// Callback tokens
export * from './callbacks';

// Credentials
export * from './credentials';

// Merchant API
export * from './client';

// State machine
export * from './state-machine';

// Input validation
export * from './validation';

// Rendering
export * from './presentation';

// Routing
export * from './router';

// Deposit notifications
export * from './notifications';
export * from './webhooks';
