import type * as k8s from '@kubernetes/client-node';
import type { NotebookResource, ResourcesSpec, SidecarSpec } from '@notebook-operator/core';

import type { OperatorConfig } from './config.js';
import {
  AUTH_MOUNT_PATH,
  AUTH_VOLUME,
  CONTENT_KEY,
  CONTENT_MOUNT_PATH,
  CONTENT_VOLUME,
  DATA_VOLUME,
  HTTP_PORT_NAME,
  MAIN_CONTAINER,
  NOTEBOOK_DIR,
  PASSWORD_FILE,
  SSH_PUBKEY_MOUNT_PATH,
  SSH_PUBKEY_SECRET,
  SSH_PUBKEY_VOLUME,
  SSHFS_SIDECAR_PREFIX,
  VENV_PATH,
  VENV_VOLUME,
} from './constants.js';
import { contentConfigMapName } from './content.js';
import { notebookLabels, ownerReference } from './labels.js';
import { applyPodOverrides } from './pod-overrides.js';
import { resolveAuthPolicy, resolveContentSource, type ContentSource } from './policy.js';

/** Environment every marimo container starts with; user `env` comes after. */
export const BASE_ENV: readonly k8s.V1EnvVar[] = [
  { name: 'VIRTUAL_ENV', value: VENV_PATH },
  { name: 'UV_PROJECT_ENVIRONMENT', value: VENV_PATH },
  { name: 'UV', value: '/usr/bin/uv' },
  { name: 'UV_SYSTEM_PYTHON', value: '1' },
  {
    name: 'PYTHONPATH',
    value: `/usr/local/lib/python3.13/site-packages/:${VENV_PATH}/lib/python3.13/site-packages/`,
  },
];

export function cloneCommand(url: string): string {
  return (
    `if [ -d ${NOTEBOOK_DIR}/.git ]; then echo 'Repository already exists, skipping clone'; ` +
    `else git clone --depth 1 ${url} ${NOTEBOOK_DIR}; fi`
  );
}

export function copyContentCommand(filename: string): string {
  return `cp ${CONTENT_MOUNT_PATH}/${CONTENT_KEY} ${NOTEBOOK_DIR}/${filename}`;
}

export const SETUP_VENV_COMMAND =
  `if [ ! -f ${VENV_PATH}/bin/python ]; then echo 'Creating venv...'; uv venv ${VENV_PATH}; fi`;

export function isPrivileged(sidecar: SidecarSpec): boolean {
  return sidecar.securityContext?.privileged === true;
}

export function buildResourceRequirements(resources: ResourcesSpec | undefined): k8s.V1ResourceRequirements {
  if (!resources) return {};
  return {
    ...(resources.requests ? { requests: { ...resources.requests } } : {}),
    ...(resources.limits ? { limits: { ...resources.limits } } : {}),
  };
}

function dataVolume(notebook: NotebookResource): k8s.V1Volume {
  if (notebook.spec.storage) {
    return { name: DATA_VOLUME, persistentVolumeClaim: { claimName: notebook.metadata.name } };
  }
  return { name: DATA_VOLUME, emptyDir: {} };
}

function buildInitContainers(
  notebook: NotebookResource,
  source: ContentSource,
  config: OperatorConfig,
): k8s.V1Container[] {
  const initContainers: k8s.V1Container[] = [];

  if (source.kind === 'inline') {
    initContainers.push({
      name: 'copy-content',
      image: config.initImage,
      command: ['sh', '-c', copyContentCommand(source.filename)],
      volumeMounts: [
        { name: DATA_VOLUME, mountPath: NOTEBOOK_DIR },
        { name: CONTENT_VOLUME, mountPath: CONTENT_MOUNT_PATH, readOnly: true },
      ],
    });
  } else if (source.kind === 'git') {
    initContainers.push({
      name: 'git-clone',
      image: config.gitImage,
      command: ['sh', '-c', cloneCommand(source.url)],
      volumeMounts: [{ name: DATA_VOLUME, mountPath: NOTEBOOK_DIR }],
    });
  }

  initContainers.push({
    name: 'setup-venv',
    image: notebook.spec.image,
    command: ['sh', '-c', SETUP_VENV_COMMAND],
    volumeMounts: [{ name: VENV_VOLUME, mountPath: VENV_PATH }],
  });

  return initContainers;
}

/**
 * Build a sidecar container. Sidecars share the data volume; a privileged
 * (FUSE) sidecar mounts it Bidirectional so mounts it creates under the
 * data directory propagate back out to marimo. `sshfs-*` sidecars also get
 * the ssh-pubkey secret.
 */
export function buildSidecarContainer(sidecar: SidecarSpec): k8s.V1Container {
  const dataMount: k8s.V1VolumeMount = { name: DATA_VOLUME, mountPath: NOTEBOOK_DIR };
  if (isPrivileged(sidecar)) {
    dataMount.mountPropagation = 'Bidirectional';
  }
  const volumeMounts: k8s.V1VolumeMount[] = [dataMount];
  if (sidecar.name.startsWith(SSHFS_SIDECAR_PREFIX)) {
    volumeMounts.push({ name: SSH_PUBKEY_VOLUME, mountPath: SSH_PUBKEY_MOUNT_PATH, readOnly: true });
  }

  const container: k8s.V1Container = {
    name: sidecar.name,
    image: sidecar.image,
    volumeMounts,
  };
  if (sidecar.env) container.env = sidecar.env.map((e) => ({ ...e }));
  if (sidecar.command) container.command = [...sidecar.command];
  if (sidecar.args) container.args = [...sidecar.args];
  if (sidecar.exposePort !== undefined) {
    container.ports = [{ name: sidecar.name, containerPort: sidecar.exposePort, protocol: 'TCP' }];
  }
  if (sidecar.resources) container.resources = buildResourceRequirements(sidecar.resources);
  if (sidecar.securityContext) container.securityContext = structuredClone(sidecar.securityContext);

  return container;
}

/**
 * Build the notebook Pod.
 *
 * Layout: optional content init step (copy or clone), the venv init step,
 * then marimo followed by `sidecars` in order. `sidecars` is the expanded
 * mounts list followed by the explicit sidecars. `spec.podOverrides` is
 * merged in last.
 */
export function buildNotebookPod(
  notebook: NotebookResource,
  sidecars: readonly SidecarSpec[],
  config: OperatorConfig,
): k8s.V1Pod {
  const { spec } = notebook;
  const source = resolveContentSource(spec);
  const auth = resolveAuthPolicy(spec.auth);
  const hasFuseSidecar = sidecars.some(isPrivileged);
  const hasSshfsSidecar = sidecars.some((s) => s.name.startsWith(SSHFS_SIDECAR_PREFIX));

  const volumes: k8s.V1Volume[] = [dataVolume(notebook)];
  if (source.kind === 'inline') {
    volumes.push({
      name: CONTENT_VOLUME,
      configMap: { name: contentConfigMapName(notebook.metadata.name) },
    });
  }
  volumes.push({ name: VENV_VOLUME, emptyDir: {} });

  const dataMount: k8s.V1VolumeMount = { name: DATA_VOLUME, mountPath: NOTEBOOK_DIR };
  if (hasFuseSidecar) {
    // see FUSE mounts made by privileged sidecars
    dataMount.mountPropagation = 'HostToContainer';
  }
  const volumeMounts: k8s.V1VolumeMount[] = [dataMount, { name: VENV_VOLUME, mountPath: VENV_PATH }];

  const args = [spec.mode, '--headless', '--host=0.0.0.0', `--port=${spec.port}`];

  switch (auth.kind) {
    case 'none':
      args.push('--no-token');
      break;
    case 'password':
      args.push('--token-password-file', PASSWORD_FILE);
      volumes.push({
        name: AUTH_VOLUME,
        secret: {
          secretName: auth.secretName,
          items: [{ key: auth.key, path: 'password' }],
        },
      });
      volumeMounts.push({ name: AUTH_VOLUME, mountPath: AUTH_MOUNT_PATH, readOnly: true });
      break;
    case 'token':
      break;
  }

  if (source.kind === 'inline') {
    args.push('--sandbox', `${NOTEBOOK_DIR}/${source.filename}`);
  } else {
    args.push(NOTEBOOK_DIR);
  }

  if (hasSshfsSidecar) {
    volumes.push({ name: SSH_PUBKEY_VOLUME, secret: { secretName: SSH_PUBKEY_SECRET } });
  }

  const containers: k8s.V1Container[] = [
    {
      name: MAIN_CONTAINER,
      image: spec.image,
      workingDir: NOTEBOOK_DIR,
      command: ['marimo'],
      args,
      env: [...BASE_ENV.map((e) => ({ ...e })), ...(spec.env ?? []).map((e) => ({ ...e }))],
      ports: [{ name: HTTP_PORT_NAME, containerPort: spec.port, protocol: 'TCP' }],
      volumeMounts,
      resources: buildResourceRequirements(spec.resources),
    },
    ...sidecars.map(buildSidecarContainer),
  ];

  const basePodSpec: k8s.V1PodSpec = {
    initContainers: buildInitContainers(notebook, source, config),
    containers,
    volumes,
  };

  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: {
      name: notebook.metadata.name,
      namespace: notebook.metadata.namespace,
      labels: notebookLabels(notebook),
      ownerReferences: [ownerReference(notebook)],
    },
    spec: spec.podOverrides ? applyPodOverrides(basePodSpec, spec.podOverrides) : basePodSpec,
  };
}
