import * as k8s from '@kubernetes/client-node';
import { createLogger, withRetry } from '@notebook-operator/core';
import type { RetryStrategy } from '@notebook-operator/core';

import {
  INSTANCE_LABEL,
  MANAGED_BY,
  MANAGED_BY_LABEL,
  NOTEBOOK_API_GROUP,
  NOTEBOOK_API_VERSION,
  NOTEBOOK_PLURAL,
} from './labels.js';
import type { Reconciler } from './types.js';

const log = createLogger('notebook-controller');

const INFORMER_RESTART_DELAY_MS = 5_000;

export const DEFAULT_RECONCILE_RETRY: RetryStrategy = {
  maxRetries: 3,
  backoff: 'exponential',
  baseDelayMs: 5_000,
  maxDelayMs: 60_000,
};

export interface NotebookControllerOptions {
  /** Watch a single namespace. Empty or absent watches the whole cluster. */
  namespace?: string;
  retry?: RetryStrategy;
}

/**
 * NotebookController watches MarimoNotebook resources and the Pods,
 * Services, ConfigMaps and claims managed for them, and feeds notebook keys
 * to a Reconciler.
 *
 * Passes for the same key never overlap. An event that arrives while a key
 * is being reconciled marks it dirty, and one more pass runs afterwards.
 */
export class NotebookController {
  private informers: Pick<k8s.Informer<k8s.KubernetesObject>, 'start' | 'stop'>[] = [];
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly dirty = new Set<string>();
  private readonly namespace: string;
  private readonly retry: RetryStrategy;
  private stopped = false;
  private ready = false;

  constructor(
    private readonly kc: k8s.KubeConfig,
    private readonly reconciler: Reconciler,
    options: NotebookControllerOptions = {},
  ) {
    this.namespace = options.namespace ?? '';
    this.retry = options.retry ?? DEFAULT_RECONCILE_RETRY;
  }

  /**
   * Start watching notebooks and managed objects. Resolves once every
   * informer has done its initial list.
   */
  async start(): Promise<void> {
    this.stopped = false;

    const customApi = this.kc.makeApiClient(k8s.CustomObjectsApi);
    const coreApi = this.kc.makeApiClient(k8s.CoreV1Api);
    const selector = `${MANAGED_BY_LABEL}=${MANAGED_BY}`;
    const ns = this.namespace;
    const crd = { group: NOTEBOOK_API_GROUP, version: NOTEBOOK_API_VERSION, plural: NOTEBOOK_PLURAL };
    const crdPrefix = `/apis/${NOTEBOOK_API_GROUP}/${NOTEBOOK_API_VERSION}`;

    const notebookInformer = k8s.makeInformer<k8s.KubernetesObject>(
      this.kc,
      ns ? `${crdPrefix}/namespaces/${ns}/${NOTEBOOK_PLURAL}` : `${crdPrefix}/${NOTEBOOK_PLURAL}`,
      async () =>
        ns
          ? customApi.listNamespacedCustomObject({ ...crd, namespace: ns })
          : customApi.listClusterCustomObject(crd),
    );
    this.watch('notebook', notebookInformer, (obj) => this.handleNotebookEvent(obj));

    const podInformer = k8s.makeInformer<k8s.V1Pod>(
      this.kc,
      ns ? `/api/v1/namespaces/${ns}/pods` : '/api/v1/pods',
      async () =>
        ns
          ? coreApi.listNamespacedPod({ namespace: ns, labelSelector: selector })
          : coreApi.listPodForAllNamespaces({ labelSelector: selector }),
      selector,
    );
    this.watch('pod', podInformer, (obj) => this.handleOwnedObjectEvent(obj));

    const serviceInformer = k8s.makeInformer<k8s.V1Service>(
      this.kc,
      ns ? `/api/v1/namespaces/${ns}/services` : '/api/v1/services',
      async () =>
        ns
          ? coreApi.listNamespacedService({ namespace: ns, labelSelector: selector })
          : coreApi.listServiceForAllNamespaces({ labelSelector: selector }),
      selector,
    );
    this.watch('service', serviceInformer, (obj) => this.handleOwnedObjectEvent(obj));

    const configMapInformer = k8s.makeInformer<k8s.V1ConfigMap>(
      this.kc,
      ns ? `/api/v1/namespaces/${ns}/configmaps` : '/api/v1/configmaps',
      async () =>
        ns
          ? coreApi.listNamespacedConfigMap({ namespace: ns, labelSelector: selector })
          : coreApi.listConfigMapForAllNamespaces({ labelSelector: selector }),
      selector,
    );
    this.watch('configmap', configMapInformer, (obj) => this.handleOwnedObjectEvent(obj));

    const pvcInformer = k8s.makeInformer<k8s.V1PersistentVolumeClaim>(
      this.kc,
      ns ? `/api/v1/namespaces/${ns}/persistentvolumeclaims` : '/api/v1/persistentvolumeclaims',
      async () =>
        ns
          ? coreApi.listNamespacedPersistentVolumeClaim({ namespace: ns, labelSelector: selector })
          : coreApi.listPersistentVolumeClaimForAllNamespaces({ labelSelector: selector }),
      selector,
    );
    this.watch('pvc', pvcInformer, (obj) => this.handleOwnedObjectEvent(obj));

    this.informers = [notebookInformer, podInformer, serviceInformer, configMapInformer, pvcInformer];
    await Promise.all(this.informers.map((informer) => informer.start()));

    this.ready = true;
    log.info({ namespace: ns || '*' }, 'watching notebooks and managed objects');
  }

  private watch<T extends k8s.KubernetesObject>(
    label: string,
    informer: k8s.Informer<T>,
    onObject: (obj: k8s.KubernetesObject) => void,
  ): void {
    informer.on('add', onObject);
    informer.on('update', onObject);
    informer.on('delete', onObject);
    informer.on('error', (err: unknown) => {
      if (this.stopped) return;
      log.error({ err, informer: label }, 'watch error, restarting informer');
      setTimeout(() => {
        if (this.stopped) return;
        informer.start().catch((restartErr: unknown) => {
          log.error({ err: restartErr, informer: label }, 'failed to restart informer');
        });
      }, INFORMER_RESTART_DELAY_MS);
    });
  }

  /** True once every informer has synced and until stop() is called. */
  isReady(): boolean {
    return this.ready && !this.stopped;
  }

  /** Stop every informer. Passes already running finish on their own. */
  async stop(): Promise<void> {
    this.stopped = true;
    this.ready = false;
    const informers = this.informers;
    this.informers = [];
    await Promise.all(informers.map((informer) => informer.stop()));
    log.info('stopped');
  }

  /** A notebook was added, changed or deleted. */
  handleNotebookEvent(obj: k8s.KubernetesObject): void {
    const namespace = obj.metadata?.namespace;
    const name = obj.metadata?.name;
    if (!namespace || !name) return;
    this.enqueue(namespace, name);
  }

  /** A managed object changed; reconcile the notebook it belongs to. */
  handleOwnedObjectEvent(obj: k8s.KubernetesObject): void {
    const namespace = obj.metadata?.namespace;
    const name = obj.metadata?.labels?.[INSTANCE_LABEL];
    if (!namespace || !name) return;
    this.enqueue(namespace, name);
  }

  /** Schedule a pass for `namespace/name`. */
  enqueue(namespace: string, name: string): void {
    if (this.stopped) return;
    const key = `${namespace}/${name}`;
    if (this.inFlight.has(key)) {
      this.dirty.add(key);
      return;
    }
    const run = this.drain(key, namespace, name).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
  }

  /** Resolves when no pass is running or queued. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values());
    }
  }

  private async drain(key: string, namespace: string, name: string): Promise<void> {
    do {
      this.dirty.delete(key);
      await this.reconcileWithRetry(key, namespace, name);
    } while (this.dirty.has(key) && !this.stopped);
    this.dirty.delete(key);
  }

  private async reconcileWithRetry(key: string, namespace: string, name: string): Promise<void> {
    try {
      await withRetry(
        () => this.reconciler.reconcile(namespace, name),
        this.retry,
        (err, attempt, delayMs) => {
          log.warn({ err, notebook: key, attempt: attempt + 1, delayMs }, 'reconcile failed, retrying');
        },
      );
    } catch (err: unknown) {
      // next watch event for the key triggers a fresh pass
      log.error({ err, notebook: key }, 'reconcile failed');
    }
  }
}
