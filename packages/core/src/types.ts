import type { z } from 'zod';

import type {
  AuthSpecSchema,
  EnvVarSchema,
  NotebookMetadataSchema,
  NotebookModeSchema,
  NotebookPhaseSchema,
  NotebookResourceSchema,
  NotebookSpecSchema,
  NotebookStatusSchema,
  ResourcesSpecSchema,
  RetryStrategySchema,
  SecretKeyRefSchema,
  SidecarSecurityContextSchema,
  SidecarSpecSchema,
  StorageSpecSchema,
} from './schemas.js';

export type SecretKeyRef = z.infer<typeof SecretKeyRefSchema>;
export type EnvVar = z.infer<typeof EnvVarSchema>;
export type ResourcesSpec = z.infer<typeof ResourcesSpecSchema>;
export type StorageSpec = z.infer<typeof StorageSpecSchema>;
export type AuthSpec = z.infer<typeof AuthSpecSchema>;
export type SidecarSecurityContext = z.infer<typeof SidecarSecurityContextSchema>;
export type SidecarSpec = z.infer<typeof SidecarSpecSchema>;
export type NotebookMode = z.infer<typeof NotebookModeSchema>;
export type NotebookSpec = z.infer<typeof NotebookSpecSchema>;
/** Spec as written by users, before schema defaults are applied. */
export type NotebookSpecInput = z.input<typeof NotebookSpecSchema>;
export type NotebookPhase = z.infer<typeof NotebookPhaseSchema>;
export type NotebookStatus = z.infer<typeof NotebookStatusSchema>;
export type NotebookMetadata = z.infer<typeof NotebookMetadataSchema>;
export type NotebookResource = z.infer<typeof NotebookResourceSchema>;
export type RetryStrategy = z.infer<typeof RetryStrategySchema>;
