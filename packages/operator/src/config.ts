import { ValidationError } from '@notebook-operator/core';
import { z } from 'zod';

/**
 * Operator settings read from the deployment's environment.
 * Images can be overridden for air-gapped clusters and mirrors.
 */
export const OperatorConfigSchema = z.object({
  /** Image for the copy-content init step. */
  initImage: z.string().min(1).default('busybox:1.36'),
  /** Image for the git-clone init step. */
  gitImage: z.string().min(1).default('alpine/git:latest'),
  /** Image for sshfs:// and rsync:// mount helpers. */
  alpineImage: z.string().min(1).default('alpine:latest'),
  /** Image for cw:// (S3-compatible) mount helpers. */
  s3fsImage: z.string().min(1).default('ghcr.io/marimo-team/marimo-operator/s3fs:latest'),
  /** Fallback S3 endpoint when the helper's S3_ENDPOINT is unset at runtime. */
  s3Endpoint: z.string().url().default('https://cwobject.com'),
  healthPort: z.coerce.number().int().min(0).max(65535).default(8080),
  /** Restrict watches to one namespace. Empty means cluster-wide. */
  watchNamespace: z.string().default(''),
  otlpEndpoint: z.string().url().optional(),
});

export type OperatorConfig = z.infer<typeof OperatorConfigSchema>;

const ENV_KEYS: Record<keyof OperatorConfig, string> = {
  initImage: 'DEFAULT_INIT_IMAGE',
  gitImage: 'GIT_IMAGE',
  alpineImage: 'ALPINE_IMAGE',
  s3fsImage: 'S3FS_IMAGE',
  s3Endpoint: 'S3_ENDPOINT',
  healthPort: 'HEALTH_PORT',
  watchNamespace: 'WATCH_NAMESPACE',
  otlpEndpoint: 'OTEL_EXPORTER_OTLP_ENDPOINT',
};

/**
 * Build the operator configuration from environment variables.
 * Empty variables count as unset.
 */
export function loadOperatorConfig(
  env: Record<string, string | undefined> = process.env,
): OperatorConfig {
  const raw: Record<string, string> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      raw[field] = value;
    }
  }

  const result = OperatorConfigSchema.safeParse(raw);
  if (!result.success) {
    const envKeyOf = new Map<string, string>(Object.entries(ENV_KEYS));
    const issues = result.error.issues.map((issue) => {
      const field = String(issue.path[0] ?? '');
      return `${envKeyOf.get(field) ?? field}: ${issue.message}`;
    });
    throw new ValidationError(`invalid operator configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/** Configuration with every default applied, for tests and tooling. */
export const DEFAULT_OPERATOR_CONFIG: OperatorConfig = OperatorConfigSchema.parse({});
