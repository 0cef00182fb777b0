import type * as k8s from '@kubernetes/client-node';
import type { NotebookPhase, NotebookResource, NotebookStatus } from '@notebook-operator/core';

import { contentHash, sourceHash } from './content.js';

function podPhase(pod: k8s.V1Pod | null): NotebookPhase {
  switch (pod?.status?.phase) {
    case 'Running':
      return 'Running';
    case 'Failed':
      return 'Failed';
    default:
      return 'Pending';
  }
}

/** In-cluster URL of the notebook, routed through its Service. */
export function serviceUrl(service: k8s.V1Service, port: number): string {
  return `http://${service.metadata?.name ?? ''}.${service.metadata?.namespace ?? ''}.svc.cluster.local:${port}`;
}

/** Fingerprint of whatever the notebook files come from. */
export function notebookFingerprint(notebook: NotebookResource): string {
  const { content, source } = notebook.spec;
  if (content !== undefined) return contentHash(content);
  return sourceHash(source ?? '');
}

/**
 * Derive the notebook status from the observed Pod and Service.
 * Either may be null when it has not been observed yet.
 */
export function projectStatus(
  notebook: NotebookResource,
  pod: k8s.V1Pod | null,
  service: k8s.V1Service | null,
): NotebookStatus {
  const status: NotebookStatus = {
    phase: podPhase(pod),
    sourceHash: notebookFingerprint(notebook),
  };
  if (service) {
    status.url = serviceUrl(service, notebook.spec.port);
  }
  if (pod?.metadata?.name) {
    status.podName = pod.metadata.name;
  }
  if (service?.metadata?.name) {
    status.serviceName = service.metadata.name;
  }
  return status;
}

/** True when any projected field differs from the stored status. */
export function statusChanged(current: NotebookStatus | undefined, next: NotebookStatus): boolean {
  return (
    (current?.phase ?? '') !== (next.phase ?? '') ||
    (current?.url ?? '') !== (next.url ?? '') ||
    (current?.sourceHash ?? '') !== (next.sourceHash ?? '') ||
    (current?.podName ?? '') !== (next.podName ?? '') ||
    (current?.serviceName ?? '') !== (next.serviceName ?? '')
  );
}
