import type { SidecarSpec } from '@notebook-operator/core';

import type { OperatorConfig } from './config.js';
import { CW_CREDENTIALS_SECRET, NOTEBOOK_DIR } from './constants.js';
import { parseMountUri, type BucketMount, type RemoteMount } from './mount-uri.js';

const SSH_OPTIONS = 'ssh -o StrictHostKeyChecking=accept-new';

/** Default in-pod mount point for the helper named `name`. */
export function defaultMountPoint(name: string): string {
  return `${NOTEBOOK_DIR}/mounts/${name}`;
}

/**
 * Expand `mounts` URIs into sidecar specs.
 *
 * Helpers are named `<scheme>-<index>` where index is the URI's position in
 * the input list, so reordering the list renames the helpers. URIs with an
 * unknown scheme or a missing host/bucket produce nothing.
 */
export function expandMounts(uris: readonly string[], config: OperatorConfig): SidecarSpec[] {
  const sidecars: SidecarSpec[] = [];

  uris.forEach((uri, index) => {
    const mount = parseMountUri(uri);
    if (!mount) return;

    const name = `${mount.scheme}-${index}`;
    switch (mount.scheme) {
      case 'cw':
        sidecars.push(buildBucketSidecar(mount, name, config));
        break;
      case 'sshfs':
        sidecars.push(buildSshfsSidecar(mount, name, config));
        break;
      case 'rsync':
        sidecars.push(buildRsyncSidecar(mount, name, config));
        break;
    }
  });

  return sidecars;
}

/**
 * s3fs mount of an S3-compatible bucket. Needs /dev/fuse, hence privileged.
 * Credentials come from the cw-credentials secret.
 */
function buildBucketSidecar(mount: BucketMount, name: string, config: OperatorConfig): SidecarSpec {
  const mountPoint = mount.mountPoint ?? defaultMountPoint(name);
  const remotePath = mount.subpath ? `${mount.bucket}:/${mount.subpath}` : mount.bucket;

  return {
    name,
    image: config.s3fsImage,
    command: ['sh', '-c'],
    args: [
      `mkdir -p ${mountPoint} && ` +
        `echo "$AWS_ACCESS_KEY_ID:$AWS_SECRET_ACCESS_KEY" > /etc/passwd-s3fs && ` +
        `chmod 600 /etc/passwd-s3fs && ` +
        `s3fs ${remotePath} ${mountPoint} ` +
        `-o passwd_file=/etc/passwd-s3fs ` +
        `-o url=\${S3_ENDPOINT:-${config.s3Endpoint}} ` +
        `-o allow_other ` +
        `-o umask=0000 ` +
        `-f`,
    ],
    env: [
      {
        name: 'AWS_ACCESS_KEY_ID',
        valueFrom: { secretKeyRef: { name: CW_CREDENTIALS_SECRET, key: 'AWS_ACCESS_KEY_ID' } },
      },
      {
        name: 'AWS_SECRET_ACCESS_KEY',
        valueFrom: { secretKeyRef: { name: CW_CREDENTIALS_SECRET, key: 'AWS_SECRET_ACCESS_KEY' } },
      },
    ],
    securityContext: { privileged: true },
  };
}

/** FUSE mount over ssh. Runs in the foreground for the life of the pod. */
function buildSshfsSidecar(mount: RemoteMount, name: string, config: OperatorConfig): SidecarSpec {
  const mountPoint = mount.mountPoint ?? defaultMountPoint(name);

  return {
    name,
    image: config.alpineImage,
    command: ['sh', '-c'],
    args: [
      `apk add --no-cache sshfs >/dev/null && ` +
        `mkdir -p ${mountPoint} && ` +
        `exec sshfs ${mount.userHost}:${mount.remotePath} ${mountPoint} ` +
        `-f ` +
        `-o allow_other ` +
        `-o reconnect ` +
        `-o ServerAliveInterval=15 ` +
        `-o StrictHostKeyChecking=accept-new`,
    ],
    securityContext: { privileged: true },
  };
}

/**
 * One-shot pull from the remote, then push local changes back whenever
 * inotify reports a write. Plain file copies, so no privileges needed.
 */
function buildRsyncSidecar(mount: RemoteMount, name: string, config: OperatorConfig): SidecarSpec {
  const mountPoint = mount.mountPoint ?? defaultMountPoint(name);
  const remote = `${mount.userHost}:${mount.remotePath}/`;

  return {
    name,
    image: config.alpineImage,
    command: ['sh', '-c'],
    args: [
      `apk add --no-cache rsync openssh-client inotify-tools >/dev/null && ` +
        `mkdir -p ${mountPoint} && ` +
        `rsync -az -e "${SSH_OPTIONS}" ${remote} ${mountPoint}/ && ` +
        `while inotifywait -r -qq -e modify,create,delete,move ${mountPoint}; do ` +
        `rsync -az -e "${SSH_OPTIONS}" ${mountPoint}/ ${remote}; ` +
        `done`,
    ],
  };
}
