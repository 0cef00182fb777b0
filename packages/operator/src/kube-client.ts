import * as k8s from '@kubernetes/client-node';
import {
  AlreadyExistsError,
  StoreError,
  ValidationError,
  parseNotebookResource,
} from '@notebook-operator/core';
import type { NotebookResource, NotebookStatus } from '@notebook-operator/core';

import {
  NOTEBOOK_API_GROUP,
  NOTEBOOK_API_VERSION,
  NOTEBOOK_KIND,
  NOTEBOOK_PLURAL,
} from './labels.js';
import type { KubeClient } from './types.js';

/**
 * Extract the HTTP status code from @kubernetes/client-node errors.
 * v1.x puts it on `code`; older releases used `statusCode` or `response.statusCode`.
 */
export function httpStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'number') return err.code;
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  if (
    'response' in err &&
    typeof err.response === 'object' &&
    err.response !== null &&
    'statusCode' in err.response &&
    typeof err.response.statusCode === 'number'
  ) {
    return err.response.statusCode;
  }
  return undefined;
}

function toStoreError(err: unknown, action: string): StoreError {
  const status = httpStatus(err);
  const detail = err instanceof Error ? err.message : String(err);
  return new StoreError(`${action} failed: ${detail}`, status, { cause: err });
}

async function readOrNull<T>(read: () => Promise<T>, action: string): Promise<T | null> {
  try {
    return await read();
  } catch (err: unknown) {
    if (httpStatus(err) === 404) return null;
    throw toStoreError(err, action);
  }
}

async function createOrConflict<T>(
  create: () => Promise<T>,
  kind: string,
  name: string,
): Promise<T> {
  try {
    return await create();
  } catch (err: unknown) {
    if (httpStatus(err) === 409) throw new AlreadyExistsError(kind, name, { cause: err });
    throw toStoreError(err, `create ${kind} ${name}`);
  }
}

function objectRef(obj: k8s.KubernetesObject, kind: string): { name: string; namespace: string } {
  const name = obj.metadata?.name;
  const namespace = obj.metadata?.namespace;
  if (!name || !namespace) {
    throw new ValidationError(`${kind} must have metadata.name and metadata.namespace`);
  }
  return { name, namespace };
}

/** The CoreV1Api calls the operator makes. */
export type KubeCoreApi = Pick<
  k8s.CoreV1Api,
  | 'readNamespacedConfigMap'
  | 'createNamespacedConfigMap'
  | 'replaceNamespacedConfigMap'
  | 'readNamespacedPersistentVolumeClaim'
  | 'createNamespacedPersistentVolumeClaim'
  | 'readNamespacedPod'
  | 'createNamespacedPod'
  | 'readNamespacedService'
  | 'createNamespacedService'
  | 'createNamespacedEvent'
>;

/** The CustomObjectsApi calls the operator makes. */
export type KubeCustomApi = Pick<
  k8s.CustomObjectsApi,
  'getNamespacedCustomObject' | 'replaceNamespacedCustomObjectStatus'
>;

/**
 * Real KubeClient implementation using @kubernetes/client-node.
 */
export function createKubeClient(kc: k8s.KubeConfig): KubeClient {
  return kubeClientFromApis(kc.makeApiClient(k8s.CoreV1Api), kc.makeApiClient(k8s.CustomObjectsApi));
}

/**
 * KubeClient over already-built API clients. Maps API failures onto the
 * operator's error model: 404 on read is null, 409 on create is
 * AlreadyExistsError, anything else is a StoreError carrying the status.
 */
export function kubeClientFromApis(coreApi: KubeCoreApi, customApi: KubeCustomApi): KubeClient {

  const crd = { group: NOTEBOOK_API_GROUP, version: NOTEBOOK_API_VERSION, plural: NOTEBOOK_PLURAL };

  return {
    // --- MarimoNotebook ---

    async getNotebook(name, namespace) {
      const res: unknown = await readOrNull(
        () => customApi.getNamespacedCustomObject({ ...crd, namespace, name }),
        `get ${NOTEBOOK_KIND} ${namespace}/${name}`,
      );
      return res === null ? null : parseNotebookResource(res);
    },

    async updateNotebookStatus(notebook: NotebookResource, status: NotebookStatus) {
      const { name, namespace } = notebook.metadata;
      try {
        await customApi.replaceNamespacedCustomObjectStatus({
          ...crd,
          namespace,
          name,
          body: { ...notebook, status },
        });
      } catch (err: unknown) {
        throw toStoreError(err, `update status of ${NOTEBOOK_KIND} ${namespace}/${name}`);
      }
    },

    // --- ConfigMaps ---

    async getConfigMap(name, namespace) {
      return readOrNull(
        () => coreApi.readNamespacedConfigMap({ name, namespace }),
        `get ConfigMap ${namespace}/${name}`,
      );
    },

    async createConfigMap(configMap) {
      const { name, namespace } = objectRef(configMap, 'ConfigMap');
      return createOrConflict(
        () => coreApi.createNamespacedConfigMap({ namespace, body: configMap }),
        'ConfigMap',
        name,
      );
    },

    async replaceConfigMap(configMap) {
      const { name, namespace } = objectRef(configMap, 'ConfigMap');
      try {
        return await coreApi.replaceNamespacedConfigMap({ name, namespace, body: configMap });
      } catch (err: unknown) {
        throw toStoreError(err, `replace ConfigMap ${namespace}/${name}`);
      }
    },

    // --- PersistentVolumeClaims ---

    async getPVC(name, namespace) {
      return readOrNull(
        () => coreApi.readNamespacedPersistentVolumeClaim({ name, namespace }),
        `get PersistentVolumeClaim ${namespace}/${name}`,
      );
    },

    async createPVC(pvc) {
      const { name, namespace } = objectRef(pvc, 'PersistentVolumeClaim');
      return createOrConflict(
        () => coreApi.createNamespacedPersistentVolumeClaim({ namespace, body: pvc }),
        'PersistentVolumeClaim',
        name,
      );
    },

    // --- Pods ---

    async getPod(name, namespace) {
      return readOrNull(
        () => coreApi.readNamespacedPod({ name, namespace }),
        `get Pod ${namespace}/${name}`,
      );
    },

    async createPod(pod) {
      const { name, namespace } = objectRef(pod, 'Pod');
      return createOrConflict(() => coreApi.createNamespacedPod({ namespace, body: pod }), 'Pod', name);
    },

    // --- Services ---

    async getService(name, namespace) {
      return readOrNull(
        () => coreApi.readNamespacedService({ name, namespace }),
        `get Service ${namespace}/${name}`,
      );
    },

    async createService(service) {
      const { name, namespace } = objectRef(service, 'Service');
      return createOrConflict(
        () => coreApi.createNamespacedService({ namespace, body: service }),
        'Service',
        name,
      );
    },

    // --- Events ---

    async emitEvent(notebook, type, reason, message) {
      const { name, namespace, uid } = notebook.metadata;
      const now = new Date();
      const event: k8s.CoreV1Event = {
        metadata: {
          generateName: `${name}-`,
          namespace,
        },
        involvedObject: {
          apiVersion: `${NOTEBOOK_API_GROUP}/${NOTEBOOK_API_VERSION}`,
          kind: NOTEBOOK_KIND,
          name,
          namespace,
          uid,
        },
        reason,
        message,
        type,
        source: { component: 'notebook-operator' },
        firstTimestamp: now,
        lastTimestamp: now,
      };
      try {
        await coreApi.createNamespacedEvent({ namespace, body: event });
      } catch (err: unknown) {
        throw toStoreError(err, `record event ${reason} on ${namespace}/${name}`);
      }
    },
  };
}
