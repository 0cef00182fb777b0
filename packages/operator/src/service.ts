import type * as k8s from '@kubernetes/client-node';
import type { NotebookResource, SidecarSpec } from '@notebook-operator/core';

import { HTTP_PORT_NAME } from './constants.js';
import { notebookLabels, ownerReference } from './labels.js';

/**
 * Build the ClusterIP Service in front of the notebook pod.
 *
 * Always exposes marimo as `http`; every sidecar with `exposePort` adds a
 * port named after the sidecar.
 */
export function buildNotebookService(
  notebook: NotebookResource,
  sidecars: readonly SidecarSpec[],
): k8s.V1Service {
  const ports: k8s.V1ServicePort[] = [
    {
      name: HTTP_PORT_NAME,
      port: notebook.spec.port,
      targetPort: notebook.spec.port,
      protocol: 'TCP',
    },
  ];

  for (const sidecar of sidecars) {
    if (sidecar.exposePort !== undefined) {
      ports.push({
        name: sidecar.name,
        port: sidecar.exposePort,
        targetPort: sidecar.exposePort,
        protocol: 'TCP',
      });
    }
  }

  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: notebook.metadata.name,
      namespace: notebook.metadata.namespace,
      labels: notebookLabels(notebook),
      ownerReferences: [ownerReference(notebook)],
    },
    spec: {
      type: 'ClusterIP',
      selector: notebookLabels(notebook),
      ports,
    },
  };
}
