/** Where notebooks live inside the pod; also the working directory of marimo. */
export const NOTEBOOK_DIR = '/home/marimo/notebooks';

/** Volume backing NOTEBOOK_DIR: the claim when storage is requested, emptyDir otherwise. */
export const DATA_VOLUME = 'notebook-data';

/** ConfigMap volume holding inline content, read by the copy-content init step. */
export const CONTENT_VOLUME = 'notebook-content';
export const CONTENT_MOUNT_PATH = '/content';

/** Key inside the content ConfigMap, whatever the notebook format. */
export const CONTENT_KEY = 'notebook.py';

export const VENV_VOLUME = 'venv';
export const VENV_PATH = '/opt/venv';

export const AUTH_VOLUME = 'auth-secret';
export const AUTH_MOUNT_PATH = '/etc/marimo';
export const PASSWORD_FILE = `${AUTH_MOUNT_PATH}/password`;

/** Secret with the user's public key, created by the client tool. */
export const SSH_PUBKEY_SECRET = 'ssh-pubkey';
export const SSH_PUBKEY_VOLUME = 'ssh-pubkey';
export const SSH_PUBKEY_MOUNT_PATH = '/config/ssh-pubkey';
export const SSHFS_SIDECAR_PREFIX = 'sshfs-';

/** Secret with S3 credentials for cw:// mounts, created by the client tool. */
export const CW_CREDENTIALS_SECRET = 'cw-credentials';

export const MAIN_CONTAINER = 'marimo';
export const HTTP_PORT_NAME = 'http';
