import type { AuthSpec, NotebookSpec } from '@notebook-operator/core';

import { detectNotebookFilename } from './content.js';

/**
 * How marimo authenticates browser sessions.
 *
 *   token:    `auth` absent, marimo generates a one-time access token
 *   none:     `auth: {}`, marimo runs with --no-token
 *   password: `auth.password` set, password file mounted from a Secret
 */
export type AuthPolicy =
  | { kind: 'token' }
  | { kind: 'none' }
  | { kind: 'password'; secretName: string; key: string };

export function resolveAuthPolicy(auth: AuthSpec | undefined): AuthPolicy {
  if (!auth) return { kind: 'token' };
  if (auth.password) {
    return {
      kind: 'password',
      secretName: auth.password.secretKeyRef.name,
      key: auth.password.secretKeyRef.key,
    };
  }
  return { kind: 'none' };
}

/**
 * Where the notebook files come from.
 *
 *   inline:   non-empty `content`, copied from the content ConfigMap
 *   git:      `source`, shallow-cloned into the data directory
 *   external: neither set, files arrive through mounts or podOverrides
 */
export type ContentSource =
  | { kind: 'inline'; filename: string }
  | { kind: 'git'; url: string }
  | { kind: 'external' };

export function resolveContentSource(spec: NotebookSpec): ContentSource {
  if (spec.content) {
    return { kind: 'inline', filename: detectNotebookFilename(spec.content) };
  }
  if (spec.source) {
    return { kind: 'git', url: spec.source };
  }
  return { kind: 'external' };
}
