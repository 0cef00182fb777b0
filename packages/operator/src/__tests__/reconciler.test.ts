import { AlreadyExistsError, StoreError, ValidationError } from '@notebook-operator/core';
import type { NotebookResource, NotebookSpecInput } from '@notebook-operator/core';
import { beforeEach, describe, expect, it } from 'vitest';

import { DEFAULT_OPERATOR_CONFIG } from '../config.js';
import { NotebookReconciler } from '../reconciler.js';
import { FakeKubeClient } from './fake-kube-client.js';
import { makeNotebook } from './fixtures.js';

const SOURCE = 'https://example.com/repo.git';
const NOTEBOOK_URL = 'http://demo.default.svc.cluster.local:2718';

describe('NotebookReconciler', () => {
  let client: FakeKubeClient;
  let reconciler: NotebookReconciler;

  beforeEach(() => {
    client = new FakeKubeClient();
    reconciler = new NotebookReconciler(client, DEFAULT_OPERATOR_CONFIG);
  });

  function seed(spec: NotebookSpecInput): void {
    client.addNotebook(makeNotebook(spec));
  }

  function stored(): NotebookResource | undefined {
    return client.notebooks.get('default/demo');
  }

  function editSpec(edit: (spec: NotebookResource['spec']) => NotebookResource['spec']): void {
    const current = stored();
    if (!current) throw new Error('notebook not seeded');
    client.notebooks.set('default/demo', { ...current, spec: edit(current.spec) });
  }

  describe('first pass', () => {
    it('creates the Pod and Service and writes the status', async () => {
      seed({ source: SOURCE });

      const status = await reconciler.reconcile('default', 'demo');

      expect(client.writes).toEqual([
        'create Pod default/demo',
        'create Service default/demo',
        'status default/demo',
      ]);
      expect(status).toEqual({
        phase: 'Pending',
        url: NOTEBOOK_URL,
        sourceHash: '3f71ca0a9a45',
        podName: 'demo',
        serviceName: 'demo',
      });
      expect(stored()?.status).toEqual(status);
      expect(client.events.map((e) => e.reason)).toEqual(['PodCreated', 'ServiceCreated']);
      expect(client.events[0]).toEqual({ type: 'Normal', reason: 'PodCreated', message: 'Created Pod demo' });
    });

    it('creates the content ConfigMap and the claim before the Pod', async () => {
      seed({ content: 'import marimo\n', storage: { size: '2Gi' } });

      await reconciler.reconcile('default', 'demo');

      expect(client.writes).toEqual([
        'create ConfigMap default/demo-content',
        'create PersistentVolumeClaim default/demo',
        'create Pod default/demo',
        'create Service default/demo',
        'status default/demo',
      ]);
      expect(client.events.map((e) => e.reason)).toEqual([
        'ConfigMapCreated',
        'PVCCreated',
        'PodCreated',
        'ServiceCreated',
      ]);
      expect(stored()?.status?.sourceHash).toBe('sha256:8210c6f24a4bf05c');
    });

    it('owns everything except the claim', async () => {
      seed({ content: 'import marimo\n', storage: {} });

      await reconciler.reconcile('default', 'demo');

      expect(client.pvcs.get('default/demo')?.metadata?.ownerReferences).toBeUndefined();
      expect(client.configMaps.get('default/demo-content')?.metadata?.ownerReferences?.[0]?.uid).toBe('uid-1234');
      expect(client.pods.get('default/demo')?.metadata?.ownerReferences?.[0]?.uid).toBe('uid-1234');
      expect(client.services.get('default/demo')?.metadata?.ownerReferences?.[0]?.uid).toBe('uid-1234');
    });
  });

  describe('idempotence', () => {
    it('writes nothing on a second pass over an unchanged notebook', async () => {
      seed({ content: 'import marimo\n', storage: {}, mounts: ['cw://bucket'] });

      await reconciler.reconcile('default', 'demo');
      const writes = [...client.writes];
      const events = client.events.length;

      await reconciler.reconcile('default', 'demo');

      expect(client.writes).toEqual(writes);
      expect(client.events).toHaveLength(events);
    });

    it('writes only the status when the observed pod phase changes', async () => {
      seed({ source: SOURCE });
      await reconciler.reconcile('default', 'demo');
      const pod = client.pods.get('default/demo');
      if (pod) pod.status = { phase: 'Running' };
      const before = client.writes.length;

      const status = await reconciler.reconcile('default', 'demo');

      expect(status?.phase).toBe('Running');
      expect(client.writes.slice(before)).toEqual(['status default/demo']);
    });
  });

  describe('content ConfigMap', () => {
    it('replaces the data when the content changes', async () => {
      seed({ content: 'import marimo\n' });
      await reconciler.reconcile('default', 'demo');
      const before = client.writes.length;

      editSpec((spec) => ({ ...spec, content: 'import marimo\nprint(1)\n' }));
      await reconciler.reconcile('default', 'demo');

      expect(client.writes.slice(before)).toEqual([
        'replace ConfigMap default/demo-content',
        'status default/demo',
      ]);
      expect(client.configMaps.get('default/demo-content')?.data).toEqual({
        'notebook.py': 'import marimo\nprint(1)\n',
      });
      expect(client.events.at(-1)).toEqual({
        type: 'Normal',
        reason: 'ConfigMapUpdated',
        message: 'Updated content in ConfigMap demo-content',
      });
    });

    it('keeps the existing metadata when replacing', async () => {
      seed({ content: 'a' });
      await reconciler.reconcile('default', 'demo');
      const cm = client.configMaps.get('default/demo-content');
      if (cm?.metadata) cm.metadata.resourceVersion = '77';

      editSpec((spec) => ({ ...spec, content: 'b' }));
      await reconciler.reconcile('default', 'demo');

      expect(client.configMaps.get('default/demo-content')?.metadata?.resourceVersion).toBe('77');
    });

    it('adopts a ConfigMap created concurrently', async () => {
      seed({ content: 'import marimo\n' });
      client.beforeCreate = (kind) => {
        if (kind === 'ConfigMap' && !client.configMaps.has('default/demo-content')) {
          client.configMaps.set('default/demo-content', {
            metadata: { name: 'demo-content', namespace: 'default' },
            data: { 'notebook.py': 'import marimo\n' },
          });
        }
      };

      await expect(reconciler.reconcile('default', 'demo')).resolves.not.toBeNull();

      expect(client.writes).not.toContain('create ConfigMap default/demo-content');
      expect(client.events.map((e) => e.reason)).not.toContain('ConfigMapCreated');
    });
  });

  describe('storage claim', () => {
    it('never modifies an existing claim', async () => {
      seed({ storage: { size: '2Gi' } });
      await reconciler.reconcile('default', 'demo');
      const before = client.writes.length;

      editSpec((spec) => ({ ...spec, storage: { size: '5Gi', storageClassName: 'fast' } }));
      await reconciler.reconcile('default', 'demo');

      expect(client.writes.slice(before)).toEqual([]);
      expect(client.pvcs.get('default/demo')?.spec?.resources?.requests).toEqual({ storage: '2Gi' });
      expect(client.pvcs.get('default/demo')?.spec?.storageClassName).toBeUndefined();
    });
  });

  describe('Pod and Service', () => {
    it('leaves an existing Pod untouched and reports its phase', async () => {
      seed({ source: SOURCE });
      client.pods.set('default/demo', {
        metadata: { name: 'demo', namespace: 'default' },
        spec: { containers: [{ name: 'old', image: 'old:1' }] },
        status: { phase: 'Running' },
      });

      const status = await reconciler.reconcile('default', 'demo');

      expect(status?.phase).toBe('Running');
      expect(client.writes).not.toContain('create Pod default/demo');
      expect(client.pods.get('default/demo')?.spec?.containers.map((c) => c.name)).toEqual(['old']);
    });

    it('adopts a Pod created concurrently and uses the observed object', async () => {
      seed({ source: SOURCE });
      client.beforeCreate = (kind) => {
        if (kind === 'Pod' && !client.pods.has('default/demo')) {
          client.pods.set('default/demo', {
            metadata: { name: 'demo', namespace: 'default' },
            status: { phase: 'Failed' },
          });
        }
      };

      const status = await reconciler.reconcile('default', 'demo');

      expect(status?.phase).toBe('Failed');
      expect(client.writes).toEqual(['create Service default/demo', 'status default/demo']);
      expect(client.events.map((e) => e.reason)).toEqual(['ServiceCreated']);
    });

    it('recreates a Pod deleted out of band', async () => {
      seed({ source: SOURCE });
      await reconciler.reconcile('default', 'demo');
      client.pods.delete('default/demo');
      const before = client.writes.length;

      await reconciler.reconcile('default', 'demo');

      expect(client.writes.slice(before)).toEqual(['create Pod default/demo']);
    });

    it('fails with a retryable error when a conflicting object cannot be read back', async () => {
      seed({ source: SOURCE });
      client.beforeCreate = (kind, obj) => {
        if (kind === 'Service') throw new AlreadyExistsError(kind, obj.metadata?.name ?? '');
      };

      const err = await reconciler.reconcile('default', 'demo').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StoreError);
      if (err instanceof StoreError) {
        expect(err.message).toBe('Service default/demo reported as existing but not found');
        expect(err.statusCode).toBe(409);
        expect(err.retryable).toBe(true);
      }
    });
  });

  describe('skipped notebooks', () => {
    it('does nothing when the notebook is gone', async () => {
      await expect(reconciler.reconcile('default', 'missing')).resolves.toBeNull();
      expect(client.writes).toEqual([]);
    });

    it('does nothing while the notebook is being deleted', async () => {
      client.addNotebook(makeNotebook({ source: SOURCE }, { deletionTimestamp: '2026-01-01T00:00:00Z' }));

      await expect(reconciler.reconcile('default', 'demo')).resolves.toBeNull();
      expect(client.writes).toEqual([]);
    });
  });

  describe('errors', () => {
    it('propagates store errors and skips the status write', async () => {
      seed({ source: SOURCE });
      const boom = new StoreError('create Service demo failed: boom', 500);
      client.failures.set('createService', boom);

      await expect(reconciler.reconcile('default', 'demo')).rejects.toBe(boom);
      expect(client.writes).toEqual(['create Pod default/demo']);
    });

    it('propagates a status write conflict', async () => {
      seed({ source: SOURCE });
      client.failures.set('updateNotebookStatus', new StoreError('conflict', 409));

      await expect(reconciler.reconcile('default', 'demo')).rejects.toMatchObject({
        statusCode: 409,
        retryable: true,
      });
    });

    it('propagates validation errors from reading the notebook', async () => {
      client.failures.set('getNotebook', new ValidationError('invalid MarimoNotebook: spec.port: too big'));

      await expect(reconciler.reconcile('default', 'demo')).rejects.toBeInstanceOf(ValidationError);
    });

    it('does not fail the pass when an event cannot be recorded', async () => {
      seed({ source: SOURCE });
      client.failures.set('emitEvent', new StoreError('forbidden', 403));

      const status = await reconciler.reconcile('default', 'demo');

      expect(status?.podName).toBe('demo');
      expect(client.writes).toContain('status default/demo');
    });
  });
});
