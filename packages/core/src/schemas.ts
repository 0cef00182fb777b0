import { z } from 'zod';

// --- EnvVar ---

export const SecretKeyRefSchema = z.object({
  name: z.string().min(1),
  key: z.string().min(1),
  optional: z.boolean().optional(),
});

export const EnvVarSourceSchema = z.object({
  secretKeyRef: SecretKeyRefSchema.optional(),
  configMapKeyRef: z
    .object({
      name: z.string().min(1),
      key: z.string().min(1),
      optional: z.boolean().optional(),
    })
    .optional(),
  fieldRef: z
    .object({
      apiVersion: z.string().optional(),
      fieldPath: z.string().min(1),
    })
    .optional(),
  resourceFieldRef: z
    .object({
      containerName: z.string().optional(),
      divisor: z.string().optional(),
      resource: z.string().min(1),
    })
    .optional(),
});

export const EnvVarSchema = z.object({
  name: z.string().min(1),
  value: z.string().optional(),
  valueFrom: EnvVarSourceSchema.optional(),
});

// --- Compute resources ---

/** Quantities may be stored as numbers (`cpu: 2`); they are carried as strings. */
export const QuantitySchema = z.union([z.string(), z.number()]).transform((q) => String(q));

export const ResourceListSchema = z.record(z.string(), QuantitySchema);

export const ResourcesSpecSchema = z.object({
  requests: ResourceListSchema.optional(),
  limits: ResourceListSchema.optional(),
});

// --- Storage ---

export const DEFAULT_STORAGE_SIZE = '1Gi';

export const StorageSpecSchema = z.object({
  /** Empty means unspecified; the claim builder falls back to the default. */
  size: z.string().default(DEFAULT_STORAGE_SIZE),
  /** Passed through verbatim. `""` disables dynamic provisioning. */
  storageClassName: z.string().optional(),
});

// --- Auth ---

/**
 * `auth` is tri-state on the wire: absent (generated token), present with a
 * password reference, or present and empty (authentication disabled).
 */
export const AuthSpecSchema = z.object({
  password: z
    .object({
      secretKeyRef: SecretKeyRefSchema,
    })
    .optional(),
});

// --- Sidecars ---

const SeccompProfileSchema = z.object({
  type: z.string().min(1),
  localhostProfile: z.string().optional(),
});

/** Mirrors core/v1 SecurityContext so nothing is dropped on the way to the container. */
export const SidecarSecurityContextSchema = z.object({
  privileged: z.boolean().optional(),
  runAsUser: z.number().int().optional(),
  runAsGroup: z.number().int().optional(),
  runAsNonRoot: z.boolean().optional(),
  allowPrivilegeEscalation: z.boolean().optional(),
  readOnlyRootFilesystem: z.boolean().optional(),
  procMount: z.string().optional(),
  capabilities: z
    .object({
      add: z.array(z.string()).optional(),
      drop: z.array(z.string()).optional(),
    })
    .optional(),
  seccompProfile: SeccompProfileSchema.optional(),
  appArmorProfile: SeccompProfileSchema.optional(),
  seLinuxOptions: z
    .object({
      level: z.string().optional(),
      role: z.string().optional(),
      type: z.string().optional(),
      user: z.string().optional(),
    })
    .optional(),
  windowsOptions: z
    .object({
      gmsaCredentialSpec: z.string().optional(),
      gmsaCredentialSpecName: z.string().optional(),
      hostProcess: z.boolean().optional(),
      runAsUserName: z.string().optional(),
    })
    .optional(),
});

export const SidecarSpecSchema = z.object({
  name: z.string().min(1),
  image: z.string().min(1),
  exposePort: z.number().int().min(1).max(65535).optional(),
  env: z.array(EnvVarSchema).optional(),
  command: z.array(z.string()).optional(),
  args: z.array(z.string()).optional(),
  resources: ResourcesSpecSchema.optional(),
  securityContext: SidecarSecurityContextSchema.optional(),
});

// --- MarimoNotebook spec ---

export const DEFAULT_NOTEBOOK_IMAGE = 'ghcr.io/marimo-team/marimo:latest';
export const DEFAULT_NOTEBOOK_PORT = 2718;

const MOUNT_SCHEMES = ['cw', 'sshfs', 'rsync'];

/**
 * Names the mount helpers take: `<scheme>-<position in mounts>`. Reserved
 * for every supported scheme, even when the rest of the URI is unusable.
 */
function generatedSidecarNames(mounts: string[]): Set<string> {
  const names = new Set<string>();
  mounts.forEach((uri, i) => {
    const scheme = MOUNT_SCHEMES.find((s) => uri.startsWith(`${s}://`));
    if (scheme) names.add(`${scheme}-${i}`);
  });
  return names;
}

export const NotebookModeSchema = z.enum(['edit', 'run']);

export const NotebookSpecSchema = z
  .object({
    image: z.string().min(1).default(DEFAULT_NOTEBOOK_IMAGE),
    port: z.number().int().min(1).max(65535).default(DEFAULT_NOTEBOOK_PORT),
    mode: NotebookModeSchema.default('edit'),
    source: z.string().optional(),
    content: z.string().optional(),
    storage: StorageSpecSchema.optional(),
    resources: ResourcesSpecSchema.optional(),
    auth: AuthSpecSchema.optional(),
    env: z.array(EnvVarSchema).optional(),
    mounts: z.array(z.string()).optional(),
    sidecars: z.array(SidecarSpecSchema).optional(),
    podOverrides: z.record(z.string(), z.unknown()).optional(),
  })
  .superRefine((spec, ctx) => {
    if (spec.source && spec.content !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'source and content are mutually exclusive',
        path: ['content'],
      });
    }
    const sidecars = spec.sidecars ?? [];
    if (sidecars.length > 0 && !spec.storage) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'storage is required when sidecars are specified',
        path: ['storage'],
      });
    }
    const seen = new Set<string>();
    const generated = generatedSidecarNames(spec.mounts ?? []);
    sidecars.forEach((sidecar, i) => {
      if (generated.has(sidecar.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `sidecar name "${sidecar.name}" is generated for a mount`,
          path: ['sidecars', i, 'name'],
        });
      } else if (seen.has(sidecar.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate sidecar name "${sidecar.name}"`,
          path: ['sidecars', i, 'name'],
        });
      }
      seen.add(sidecar.name);
    });
  });

// --- MarimoNotebook status ---

export const NotebookPhaseSchema = z.enum(['Pending', 'Running', 'Failed']);

export const NotebookStatusSchema = z.object({
  phase: NotebookPhaseSchema.optional(),
  url: z.string().optional(),
  sourceHash: z.string().optional(),
  podName: z.string().optional(),
  serviceName: z.string().optional(),
});

// --- MarimoNotebook resource ---

export const NotebookMetadataSchema = z.object({
  name: z.string().min(1),
  namespace: z.string().min(1),
  uid: z.string().min(1),
  resourceVersion: z.string().optional(),
  generation: z.number().int().optional(),
  deletionTimestamp: z.string().optional(),
  labels: z.record(z.string(), z.string()).optional(),
});

export const NotebookResourceSchema = z.object({
  apiVersion: z.literal('marimo.io/v1alpha1'),
  kind: z.literal('MarimoNotebook'),
  metadata: NotebookMetadataSchema,
  spec: NotebookSpecSchema,
  status: NotebookStatusSchema.optional(),
});

// --- Retry ---

export const RetryStrategySchema = z.object({
  maxRetries: z.number().int().min(0),
  backoff: z.enum(['constant', 'linear', 'exponential']),
  baseDelayMs: z.number().int().min(0),
  maxDelayMs: z.number().int().min(0),
});
