import type { NotebookResource, NotebookStatus } from '@notebook-operator/core';
import type * as k8s from '@kubernetes/client-node';

/**
 * Event reasons recorded against a MarimoNotebook.
 */
export type NotebookEventReason =
  | 'ConfigMapCreated'
  | 'ConfigMapUpdated'
  | 'PVCCreated'
  | 'PodCreated'
  | 'ServiceCreated';

/**
 * Abstraction over the K8s API calls used by NotebookReconciler.
 * Makes the reconciler testable by allowing mocks.
 *
 * Contract for implementations:
 *   - `get*` resolves null when the object does not exist
 *   - `create*` rejects with AlreadyExistsError when the name is taken
 *   - every other failure rejects with StoreError
 */
export interface KubeClient {
  // --- MarimoNotebook ---

  /** Get and validate a MarimoNotebook. Rejects with ValidationError if malformed. */
  getNotebook(name: string, namespace: string): Promise<NotebookResource | null>;

  /**
   * Write the status subresource. Uses the notebook's resourceVersion, so a
   * concurrent writer makes this reject with a 409 StoreError.
   */
  updateNotebookStatus(notebook: NotebookResource, status: NotebookStatus): Promise<void>;

  // --- ConfigMaps ---

  getConfigMap(name: string, namespace: string): Promise<k8s.V1ConfigMap | null>;
  createConfigMap(configMap: k8s.V1ConfigMap): Promise<k8s.V1ConfigMap>;
  replaceConfigMap(configMap: k8s.V1ConfigMap): Promise<k8s.V1ConfigMap>;

  // --- PersistentVolumeClaims ---

  getPVC(name: string, namespace: string): Promise<k8s.V1PersistentVolumeClaim | null>;
  createPVC(pvc: k8s.V1PersistentVolumeClaim): Promise<k8s.V1PersistentVolumeClaim>;

  // --- Pods ---

  getPod(name: string, namespace: string): Promise<k8s.V1Pod | null>;
  createPod(pod: k8s.V1Pod): Promise<k8s.V1Pod>;

  // --- Services ---

  getService(name: string, namespace: string): Promise<k8s.V1Service | null>;
  createService(service: k8s.V1Service): Promise<k8s.V1Service>;

  // --- Events ---

  /** Create a K8s Event for a MarimoNotebook. */
  emitEvent(
    notebook: NotebookResource,
    type: 'Normal' | 'Warning',
    reason: NotebookEventReason,
    message: string,
  ): Promise<void>;
}

/** Anything that can run one reconciliation pass for a notebook key. */
export interface Reconciler {
  reconcile(namespace: string, name: string): Promise<NotebookStatus | null>;
}
