import { createHash } from 'node:crypto';

import type * as k8s from '@kubernetes/client-node';
import type { NotebookResource } from '@notebook-operator/core';

import { CONTENT_KEY } from './constants.js';
import { notebookLabels, ownerReference } from './labels.js';

/** Name of the ConfigMap holding a notebook's inline content. */
export function contentConfigMapName(notebookName: string): string {
  return `${notebookName}-content`;
}

/**
 * Pick the in-pod filename for inline content.
 *
 * Markdown notebooks open with a `---` frontmatter block; everything else,
 * including files with `@app.cell` / `import marimo` / `marimo.App`, is
 * treated as a Python notebook.
 */
export function detectNotebookFilename(content: string): string {
  if (content.trim().startsWith('---')) {
    return 'notebook.md';
  }
  return 'notebook.py';
}

/** `sha256:` plus the first 8 bytes of the digest, hex-encoded. */
export function contentHash(content: string): string {
  const digest = createHash('sha256').update(content).digest('hex');
  return `sha256:${digest.slice(0, 16)}`;
}

/** First 12 hex characters of the SHA-256 of a source URL. */
export function sourceHash(source: string): string {
  return createHash('sha256').update(source).digest('hex').slice(0, 12);
}

/**
 * Build the ConfigMap carrying inline content, or null when the notebook
 * has no `content` field.
 */
export function buildContentConfigMap(notebook: NotebookResource): k8s.V1ConfigMap | null {
  const content = notebook.spec.content;
  if (content === undefined) return null;

  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: {
      name: contentConfigMapName(notebook.metadata.name),
      namespace: notebook.metadata.namespace,
      labels: notebookLabels(notebook),
      ownerReferences: [ownerReference(notebook)],
    },
    data: {
      [CONTENT_KEY]: content,
    },
  };
}
