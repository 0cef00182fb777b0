import { parseNotebookResource } from '@notebook-operator/core';
import type { NotebookResource, NotebookSpecInput, NotebookStatus } from '@notebook-operator/core';

export interface NotebookOverrides {
  name?: string;
  namespace?: string;
  uid?: string;
  resourceVersion?: string;
  deletionTimestamp?: string;
  status?: NotebookStatus;
}

/** A validated MarimoNotebook with CRD defaults applied, as the reconciler sees it. */
export function makeNotebook(spec: NotebookSpecInput = {}, overrides: NotebookOverrides = {}): NotebookResource {
  return parseNotebookResource({
    apiVersion: 'marimo.io/v1alpha1',
    kind: 'MarimoNotebook',
    metadata: {
      name: overrides.name ?? 'demo',
      namespace: overrides.namespace ?? 'default',
      uid: overrides.uid ?? 'uid-1234',
      resourceVersion: overrides.resourceVersion ?? '1',
      ...(overrides.deletionTimestamp ? { deletionTimestamp: overrides.deletionTimestamp } : {}),
    },
    spec,
    ...(overrides.status ? { status: overrides.status } : {}),
  });
}
