import { describe, expect, it } from 'vitest';

import { buildNotebookPVC } from '../storage.js';
import { makeNotebook } from './fixtures.js';

describe('buildNotebookPVC', () => {
  it('returns null when no storage is requested', () => {
    expect(buildNotebookPVC(makeNotebook())).toBeNull();
  });

  it('builds a ReadWriteOnce claim named after the notebook', () => {
    const pvc = buildNotebookPVC(makeNotebook({ storage: { size: '2Gi' } }, { name: 'analysis' }));

    expect(pvc).toEqual({
      apiVersion: 'v1',
      kind: 'PersistentVolumeClaim',
      metadata: {
        name: 'analysis',
        namespace: 'default',
        labels: {
          'app.kubernetes.io/name': 'marimo',
          'app.kubernetes.io/instance': 'analysis',
          'app.kubernetes.io/managed-by': 'notebook-operator',
        },
      },
      spec: {
        accessModes: ['ReadWriteOnce'],
        resources: { requests: { storage: '2Gi' } },
      },
    });
  });

  it('defaults the size to 1Gi', () => {
    const pvc = buildNotebookPVC(makeNotebook({ storage: {} }));
    expect(pvc?.spec?.resources?.requests).toEqual({ storage: '1Gi' });
  });

  it('passes the storage class through', () => {
    const pvc = buildNotebookPVC(makeNotebook({ storage: { storageClassName: 'fast-ssd' } }));
    expect(pvc?.spec?.storageClassName).toBe('fast-ssd');
  });

  it('treats an empty size as unspecified', () => {
    const pvc = buildNotebookPVC(makeNotebook({ storage: { size: '' } }));
    expect(pvc?.spec?.resources?.requests).toEqual({ storage: '1Gi' });
  });

  it('keeps an empty storage class', () => {
    const pvc = buildNotebookPVC(makeNotebook({ storage: { size: '1Gi', storageClassName: '' } }));
    expect(pvc?.spec?.storageClassName).toBe('');
  });

  it('leaves the storage class unset when absent', () => {
    const pvc = buildNotebookPVC(makeNotebook({ storage: { size: '1Gi' } }));
    expect(pvc?.spec).not.toHaveProperty('storageClassName');
  });

  it('carries no owner reference so data survives notebook deletion', () => {
    const pvc = buildNotebookPVC(makeNotebook({ storage: {} }));
    expect(pvc?.metadata?.ownerReferences).toBeUndefined();
  });
});
