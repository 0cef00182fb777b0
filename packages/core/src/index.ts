// Zod schemas
export {
  AuthSpecSchema,
  DEFAULT_NOTEBOOK_IMAGE,
  DEFAULT_NOTEBOOK_PORT,
  DEFAULT_STORAGE_SIZE,
  EnvVarSchema,
  EnvVarSourceSchema,
  NotebookMetadataSchema,
  NotebookModeSchema,
  NotebookPhaseSchema,
  NotebookResourceSchema,
  NotebookSpecSchema,
  NotebookStatusSchema,
  QuantitySchema,
  ResourceListSchema,
  ResourcesSpecSchema,
  RetryStrategySchema,
  SecretKeyRefSchema,
  SidecarSecurityContextSchema,
  SidecarSpecSchema,
  StorageSpecSchema,
} from './schemas.js';

// TypeScript types (inferred from Zod)
export type {
  AuthSpec,
  EnvVar,
  NotebookMetadata,
  NotebookMode,
  NotebookPhase,
  NotebookResource,
  NotebookSpec,
  NotebookSpecInput,
  NotebookStatus,
  ResourcesSpec,
  RetryStrategy,
  SecretKeyRef,
  SidecarSecurityContext,
  SidecarSpec,
  StorageSpec,
} from './types.js';

// Validation
export { parseNotebookResource } from './validate.js';

// Error model
export {
  AlreadyExistsError,
  OperatorError,
  StoreError,
  ValidationError,
} from './errors.js';

// Retry
export { computeDelay, withRetry } from './retry.js';

// Telemetry
export { initTelemetry, shutdownTelemetry, getTracer, getMeter } from './telemetry.js';
export type { TelemetryOptions } from './telemetry.js';
export type { Tracer, Meter } from '@opentelemetry/api';

// Logger
export { logger, createLogger } from './logger.js';
export type { Logger } from 'pino';
