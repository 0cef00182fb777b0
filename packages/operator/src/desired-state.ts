import type * as k8s from '@kubernetes/client-node';
import type { NotebookResource, SidecarSpec } from '@notebook-operator/core';

import type { OperatorConfig } from './config.js';
import { buildContentConfigMap } from './content.js';
import { expandMounts } from './mount-expander.js';
import { buildNotebookPod } from './pod-builder.js';
import { buildNotebookService } from './service.js';
import { buildNotebookPVC } from './storage.js';

/** Every object a notebook should own, as computed from its spec alone. */
export interface DesiredObjectSet {
  configMap: k8s.V1ConfigMap | null;
  pvc: k8s.V1PersistentVolumeClaim | null;
  pod: k8s.V1Pod;
  service: k8s.V1Service;
}

/** Expanded mount helpers first, then the explicit `sidecars`. */
export function collectSidecars(notebook: NotebookResource, config: OperatorConfig): SidecarSpec[] {
  return [...expandMounts(notebook.spec.mounts ?? [], config), ...(notebook.spec.sidecars ?? [])];
}

/**
 * Compute the desired objects for a notebook. Pure: the same notebook and
 * config always produce equal output, and nothing is read from the cluster.
 */
export function buildDesiredState(notebook: NotebookResource, config: OperatorConfig): DesiredObjectSet {
  const sidecars = collectSidecars(notebook, config);
  return {
    configMap: buildContentConfigMap(notebook),
    pvc: buildNotebookPVC(notebook),
    pod: buildNotebookPod(notebook, sidecars, config),
    service: buildNotebookService(notebook, sidecars),
  };
}
