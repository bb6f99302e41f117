/**
 * Shared resources: DTOs and Swagger decorators
 */

export * from './dto';
export * from './swagger';
