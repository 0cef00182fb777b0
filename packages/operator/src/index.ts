// Controller and reconciliation engine
export { NotebookController, DEFAULT_RECONCILE_RETRY } from './controller.js';
export type { NotebookControllerOptions } from './controller.js';
export { NotebookReconciler } from './reconciler.js';

// Real K8s client
export { createKubeClient, httpStatus, kubeClientFromApis } from './kube-client.js';
export type { KubeCoreApi, KubeCustomApi } from './kube-client.js';

// Health server for K8s probes
export { startHealthServer } from './health.js';

// Configuration
export { DEFAULT_OPERATOR_CONFIG, OperatorConfigSchema, loadOperatorConfig } from './config.js';
export type { OperatorConfig } from './config.js';

// Mount URIs and helper sidecars
export { formatMountUri, parseMountUri } from './mount-uri.js';
export type { BucketMount, MountScheme, MountUri, RemoteMount } from './mount-uri.js';
export { defaultMountPoint, expandMounts } from './mount-expander.js';

// Desired state builders
export { buildDesiredState, collectSidecars } from './desired-state.js';
export type { DesiredObjectSet } from './desired-state.js';
export { buildNotebookPod, buildSidecarContainer } from './pod-builder.js';
export { applyPodOverrides } from './pod-overrides.js';
export { buildContentConfigMap, contentConfigMapName, contentHash, sourceHash } from './content.js';
export { buildNotebookPVC } from './storage.js';
export { buildNotebookService } from './service.js';
export { resolveAuthPolicy, resolveContentSource } from './policy.js';
export type { AuthPolicy, ContentSource } from './policy.js';

// Status projection
export { projectStatus, serviceUrl, statusChanged } from './status.js';

// Labels
export { notebookLabels, ownerReference } from './labels.js';

// Types
export type { KubeClient, NotebookEventReason, Reconciler } from './types.js';
