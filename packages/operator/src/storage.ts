import type * as k8s from '@kubernetes/client-node';
import { DEFAULT_STORAGE_SIZE, type NotebookResource } from '@notebook-operator/core';

import { notebookLabels } from './labels.js';

/**
 * Build the ReadWriteOnce PersistentVolumeClaim backing a notebook's data
 * directory, or null when no storage is requested.
 *
 * The claim is named after the notebook and carries no ownerReference:
 * notebook files outlive the MarimoNotebook and must be deleted by hand.
 * Size and class are only read at creation; the reconciler never resizes.
 */
export function buildNotebookPVC(notebook: NotebookResource): k8s.V1PersistentVolumeClaim | null {
  const storage = notebook.spec.storage;
  if (!storage) return null;

  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: {
      name: notebook.metadata.name,
      namespace: notebook.metadata.namespace,
      labels: notebookLabels(notebook),
    },
    spec: {
      accessModes: ['ReadWriteOnce'],
      resources: {
        requests: {
          storage: storage.size || DEFAULT_STORAGE_SIZE,
        },
      },
      ...(storage.storageClassName !== undefined ? { storageClassName: storage.storageClassName } : {}),
    },
  };
}
