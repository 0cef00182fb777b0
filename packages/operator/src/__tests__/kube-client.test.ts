import { AlreadyExistsError, StoreError, ValidationError } from '@notebook-operator/core';
import { describe, expect, it, vi } from 'vitest';

import { httpStatus, kubeClientFromApis } from '../kube-client.js';
import { makeNotebook } from './fixtures.js';

describe('httpStatus', () => {
  it('reads the v1.x code property', () => {
    expect(httpStatus({ code: 404, body: '{}' })).toBe(404);
  });

  it('reads statusCode and response.statusCode', () => {
    expect(httpStatus({ statusCode: 409 })).toBe(409);
    expect(httpStatus({ response: { statusCode: 500 } })).toBe(500);
  });

  it('ignores string codes from transport errors', () => {
    expect(httpStatus(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }))).toBeUndefined();
  });

  it('returns undefined for non-objects', () => {
    expect(httpStatus(undefined)).toBeUndefined();
    expect(httpStatus('boom')).toBeUndefined();
  });
});

function apiError(code: number, message: string): Error {
  return Object.assign(new Error(message), { code });
}

function makeApis() {
  const core = {
    readNamespacedConfigMap: vi.fn(),
    createNamespacedConfigMap: vi.fn(),
    replaceNamespacedConfigMap: vi.fn(),
    readNamespacedPersistentVolumeClaim: vi.fn(),
    createNamespacedPersistentVolumeClaim: vi.fn(),
    readNamespacedPod: vi.fn(),
    createNamespacedPod: vi.fn(),
    readNamespacedService: vi.fn(),
    createNamespacedService: vi.fn(),
    createNamespacedEvent: vi.fn(),
  };
  const custom = {
    getNamespacedCustomObject: vi.fn(),
    replaceNamespacedCustomObjectStatus: vi.fn(),
  };
  return { core, custom, client: kubeClientFromApis(core, custom) };
}

const pod = { metadata: { name: 'demo', namespace: 'default' } };

describe('kubeClientFromApis', () => {
  describe('reads', () => {
    it('returns null for 404', async () => {
      const { core, custom, client } = makeApis();
      core.readNamespacedPod.mockRejectedValue(apiError(404, 'not found'));
      custom.getNamespacedCustomObject.mockRejectedValue(apiError(404, 'not found'));

      await expect(client.getPod('demo', 'default')).resolves.toBeNull();
      await expect(client.getNotebook('demo', 'default')).resolves.toBeNull();
      expect(core.readNamespacedPod).toHaveBeenCalledWith({ name: 'demo', namespace: 'default' });
    });

    it('returns the stored object', async () => {
      const { core, client } = makeApis();
      core.readNamespacedService.mockResolvedValue({ metadata: { name: 'demo' } });

      await expect(client.getService('demo', 'default')).resolves.toEqual({ metadata: { name: 'demo' } });
    });

    it('maps other failures to a StoreError with the status', async () => {
      const { core, client } = makeApis();
      core.readNamespacedConfigMap.mockRejectedValue(apiError(403, 'forbidden'));

      const err = await client.getConfigMap('demo-content', 'default').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StoreError);
      if (err instanceof StoreError) {
        expect(err.statusCode).toBe(403);
        expect(err.retryable).toBe(false);
        expect(err.message).toBe('get ConfigMap default/demo-content failed: forbidden');
      }
    });

    it('treats transport failures as retryable', async () => {
      const { core, client } = makeApis();
      core.readNamespacedPersistentVolumeClaim.mockRejectedValue(
        Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }),
      );

      const err = await client.getPVC('demo', 'default').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StoreError);
      if (err instanceof StoreError) {
        expect(err.statusCode).toBeUndefined();
        expect(err.retryable).toBe(true);
      }
    });

    it('validates notebooks on the way in', async () => {
      const { custom, client } = makeApis();
      custom.getNamespacedCustomObject.mockResolvedValue({
        apiVersion: 'marimo.io/v1alpha1',
        kind: 'MarimoNotebook',
        metadata: { name: 'demo', namespace: 'default', uid: 'uid-1234' },
        spec: { port: 0 },
      });

      await expect(client.getNotebook('demo', 'default')).rejects.toThrow(ValidationError);
    });
  });

  describe('creates', () => {
    it('maps 409 to AlreadyExistsError', async () => {
      const { core, client } = makeApis();
      core.createNamespacedPod.mockRejectedValue(apiError(409, 'conflict'));

      const err = await client.createPod(pod).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(AlreadyExistsError);
      if (err instanceof AlreadyExistsError) {
        expect(err.kind).toBe('Pod');
        expect(err.objectName).toBe('demo');
      }
    });

    it('maps other failures to a StoreError with the status', async () => {
      const { core, client } = makeApis();
      core.createNamespacedService.mockRejectedValue(apiError(500, 'internal error'));

      const err = await client.createService(pod).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StoreError);
      if (err instanceof StoreError) {
        expect(err.statusCode).toBe(500);
        expect(err.retryable).toBe(true);
        expect(err.message).toBe('create Service demo failed: internal error');
      }
    });

    it('sends the object to its namespace', async () => {
      const { core, client } = makeApis();
      core.createNamespacedPod.mockResolvedValue(pod);

      await expect(client.createPod(pod)).resolves.toEqual(pod);
      expect(core.createNamespacedPod).toHaveBeenCalledWith({ namespace: 'default', body: pod });
    });

    it('rejects objects without a namespace before calling the API', async () => {
      const { core, client } = makeApis();

      await expect(client.createPod({ metadata: { name: 'demo' } })).rejects.toThrow(ValidationError);
      expect(core.createNamespacedPod).not.toHaveBeenCalled();
    });
  });

  describe('updateNotebookStatus', () => {
    it('writes through the status subresource', async () => {
      const { custom, client } = makeApis();
      custom.replaceNamespacedCustomObjectStatus.mockResolvedValue({});
      const notebook = makeNotebook();

      await client.updateNotebookStatus(notebook, { phase: 'Running' });

      expect(custom.replaceNamespacedCustomObjectStatus).toHaveBeenCalledWith({
        group: 'marimo.io',
        version: 'v1alpha1',
        plural: 'marimos',
        namespace: 'default',
        name: 'demo',
        body: { ...notebook, status: { phase: 'Running' } },
      });
    });

    it('surfaces a write conflict as a retryable StoreError', async () => {
      const { custom, client } = makeApis();
      custom.replaceNamespacedCustomObjectStatus.mockRejectedValue(apiError(409, 'conflict'));

      const err = await client.updateNotebookStatus(makeNotebook(), {}).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StoreError);
      if (err instanceof StoreError) {
        expect(err.statusCode).toBe(409);
        expect(err.retryable).toBe(true);
        expect(err.message).toBe('update status of MarimoNotebook default/demo failed: conflict');
      }
    });
  });
});
