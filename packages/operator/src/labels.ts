import type * as k8s from '@kubernetes/client-node';
import type { NotebookResource } from '@notebook-operator/core';

export const NOTEBOOK_API_GROUP = 'marimo.io';
export const NOTEBOOK_API_VERSION = 'v1alpha1';
export const NOTEBOOK_PLURAL = 'marimos';
export const NOTEBOOK_KIND = 'MarimoNotebook';

export const MANAGED_BY = 'notebook-operator';
export const MANAGED_BY_LABEL = 'app.kubernetes.io/managed-by';
export const INSTANCE_LABEL = 'app.kubernetes.io/instance';

/** Standard labels for every object managed on behalf of a notebook. */
export function notebookLabels(notebook: NotebookResource): Record<string, string> {
  return {
    'app.kubernetes.io/name': 'marimo',
    [INSTANCE_LABEL]: notebook.metadata.name,
    [MANAGED_BY_LABEL]: MANAGED_BY,
  };
}

/**
 * Controller owner reference back to the notebook, so the garbage collector
 * removes the object together with its MarimoNotebook.
 */
export function ownerReference(notebook: NotebookResource): k8s.V1OwnerReference {
  return {
    apiVersion: `${NOTEBOOK_API_GROUP}/${NOTEBOOK_API_VERSION}`,
    kind: NOTEBOOK_KIND,
    name: notebook.metadata.name,
    uid: notebook.metadata.uid,
    controller: true,
    blockOwnerDeletion: true,
  };
}
