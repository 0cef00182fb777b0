import type * as k8s from '@kubernetes/client-node';
import { SpanStatusCode } from '@opentelemetry/api';
import {
  AlreadyExistsError,
  StoreError,
  createLogger,
  getMeter,
  getTracer,
} from '@notebook-operator/core';
import type { NotebookResource, NotebookStatus } from '@notebook-operator/core';

import type { OperatorConfig } from './config.js';
import { buildDesiredState } from './desired-state.js';
import { projectStatus, statusChanged } from './status.js';
import type { KubeClient, NotebookEventReason, Reconciler } from './types.js';

const tracer = getTracer('notebook-operator');
const meter = getMeter('notebook-operator');
const reconcileCounter = meter.createCounter('notebook_operator.reconciles', {
  description: 'Reconciliation passes by result',
});
const log = createLogger('notebook-reconciler');

type ReconcileResult = 'converged' | 'skipped' | 'error';

/**
 * NotebookReconciler converges the cluster towards the objects a
 * MarimoNotebook asks for, then projects the observed state into its status.
 *
 * Existing objects are never rewritten except for the content ConfigMap:
 * the PVC keeps the user's data, and the Pod and Service are left as they are
 * once created. Deleting them makes the next pass recreate them.
 */
export class NotebookReconciler implements Reconciler {
  constructor(
    private readonly client: KubeClient,
    private readonly config: OperatorConfig,
  ) {}

  /**
   * Run one pass for `namespace/name`. Resolves the status that was
   * projected, or null when the notebook is gone or being deleted.
   * Store failures propagate so the caller can retry.
   */
  async reconcile(namespace: string, name: string): Promise<NotebookStatus | null> {
    const span = tracer.startSpan('operator.reconcile_notebook', {
      attributes: {
        'resource.name': name,
        'resource.namespace': namespace,
      },
    });
    let result: ReconcileResult = 'error';

    try {
      const notebook = await this.client.getNotebook(name, namespace);
      if (!notebook) {
        log.debug({ namespace, name }, 'notebook not found, nothing to do');
        result = 'skipped';
        return null;
      }
      if (notebook.metadata.deletionTimestamp) {
        // owned objects go with the notebook via ownerReferences
        log.debug({ namespace, name }, 'notebook is being deleted, skipping');
        result = 'skipped';
        return null;
      }

      const status = await this.converge(notebook);
      span.setAttribute('notebook.phase', status.phase ?? 'Pending');
      result = 'converged';
      return status;
    } catch (err: unknown) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    } finally {
      span.setAttribute('reconcile.result', result);
      reconcileCounter.add(1, { result });
      span.end();
    }
  }

  private async converge(notebook: NotebookResource): Promise<NotebookStatus> {
    const desired = buildDesiredState(notebook, this.config);

    if (desired.configMap) {
      await this.ensureConfigMap(notebook, desired.configMap);
    }
    if (desired.pvc) {
      await this.ensurePVC(notebook, desired.pvc);
    }

    const pod = await this.ensureObserved(
      notebook,
      'Pod',
      desired.pod,
      (n, ns) => this.client.getPod(n, ns),
      (obj) => this.client.createPod(obj),
      'PodCreated',
    );
    const service = await this.ensureObserved(
      notebook,
      'Service',
      desired.service,
      (n, ns) => this.client.getService(n, ns),
      (obj) => this.client.createService(obj),
      'ServiceCreated',
    );

    const status = projectStatus(notebook, pod, service);
    if (statusChanged(notebook.status, status)) {
      await this.client.updateNotebookStatus(notebook, status);
      log.info(
        { notebook: notebookKey(notebook), phase: status.phase, url: status.url },
        'notebook status updated',
      );
    }
    return status;
  }

  /** Create the content ConfigMap, or update it when its data drifted. */
  private async ensureConfigMap(notebook: NotebookResource, desired: k8s.V1ConfigMap): Promise<void> {
    const { namespace } = notebook.metadata;
    const name = objectName(desired);
    const existing = await this.client.getConfigMap(name, namespace);

    if (!existing) {
      try {
        await this.client.createConfigMap(desired);
      } catch (err: unknown) {
        if (err instanceof AlreadyExistsError) {
          log.info({ namespace, name }, 'configmap created concurrently, adopting');
          return;
        }
        throw err;
      }
      await this.recordEvent(notebook, 'ConfigMapCreated', `Created ConfigMap ${name}`);
      return;
    }

    if (sameData(existing.data, desired.data)) return;

    await this.client.replaceConfigMap({
      ...existing,
      data: { ...desired.data },
    });
    await this.recordEvent(notebook, 'ConfigMapUpdated', `Updated content in ConfigMap ${name}`);
  }

  /** Create the storage claim. An existing claim is never modified. */
  private async ensurePVC(
    notebook: NotebookResource,
    desired: k8s.V1PersistentVolumeClaim,
  ): Promise<void> {
    const { namespace } = notebook.metadata;
    const name = objectName(desired);
    if (await this.client.getPVC(name, namespace)) return;

    try {
      await this.client.createPVC(desired);
    } catch (err: unknown) {
      if (err instanceof AlreadyExistsError) {
        log.info({ namespace, name }, 'pvc created concurrently, adopting');
        return;
      }
      throw err;
    }
    await this.recordEvent(notebook, 'PVCCreated', `Created PersistentVolumeClaim ${name}`);
  }

  /**
   * Create `desired` when absent and return whatever the store holds
   * afterwards. An object that already exists is returned untouched.
   */
  private async ensureObserved<T extends k8s.KubernetesObject>(
    notebook: NotebookResource,
    kind: string,
    desired: T,
    get: (name: string, namespace: string) => Promise<T | null>,
    create: (obj: T) => Promise<T>,
    reason: NotebookEventReason,
  ): Promise<T> {
    const { namespace } = notebook.metadata;
    const name = objectName(desired);
    const existing = await get(name, namespace);
    if (existing) return existing;

    let created: T;
    try {
      created = await create(desired);
    } catch (err: unknown) {
      if (!(err instanceof AlreadyExistsError)) throw err;
      const raced = await get(name, namespace);
      if (!raced) {
        throw new StoreError(`${kind} ${namespace}/${name} reported as existing but not found`, 409, {
          cause: err,
        });
      }
      log.info({ namespace, name, kind }, 'object created concurrently, adopting');
      return raced;
    }

    log.info({ notebook: notebookKey(notebook), kind, name }, 'created object');
    await this.recordEvent(notebook, reason, `Created ${kind} ${name}`);
    return created;
  }

  /** Events are informational; a failure to record one never fails the pass. */
  private async recordEvent(
    notebook: NotebookResource,
    reason: NotebookEventReason,
    message: string,
  ): Promise<void> {
    try {
      await this.client.emitEvent(notebook, 'Normal', reason, message);
    } catch (err: unknown) {
      log.warn({ err, notebook: notebookKey(notebook), reason }, 'failed to record event');
    }
  }
}

function notebookKey(notebook: NotebookResource): string {
  return `${notebook.metadata.namespace}/${notebook.metadata.name}`;
}

function objectName(obj: k8s.KubernetesObject): string {
  return obj.metadata?.name ?? '';
}

function sameData(
  current: Record<string, string> | undefined,
  desired: Record<string, string> | undefined,
): boolean {
  const a = current ?? {};
  const b = desired ?? {};
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}
