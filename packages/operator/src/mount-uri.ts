/**
 * Parsing and formatting of the `mounts` URIs on a MarimoNotebook.
 *
 *   cw://bucket[/subpath][:/mount]
 *   sshfs://user@host:/remote[:/mount]
 *   rsync://user@host:/remote[:/mount]
 *
 * A trailing `:/…` segment is an explicit mount point inside the pod.
 * Parsers return null for anything they cannot use; callers skip those.
 */

export type RemoteScheme = 'sshfs' | 'rsync';
export type MountScheme = 'cw' | RemoteScheme;

export interface BucketMount {
  scheme: 'cw';
  bucket: string;
  subpath?: string;
  mountPoint?: string;
}

export interface RemoteMount {
  scheme: RemoteScheme;
  /** `user@host` passed verbatim to ssh. */
  userHost: string;
  remotePath: string;
  mountPoint?: string;
}

export type MountUri = BucketMount | RemoteMount;

/** Split off a trailing `:/mount` segment, if any. */
function splitMountPoint(rest: string): [string, string | undefined] {
  const idx = rest.lastIndexOf(':/');
  if (idx > 0) {
    return [rest.slice(0, idx), rest.slice(idx + 1)];
  }
  return [rest, undefined];
}

export function parseBucketMountUri(uri: string): BucketMount | null {
  if (!uri.startsWith('cw://')) return null;

  const [location, mountPoint] = splitMountPoint(uri.slice('cw://'.length));
  const slash = location.indexOf('/');
  const bucket = slash === -1 ? location : location.slice(0, slash);
  const subpath = slash === -1 ? '' : location.slice(slash + 1);
  if (!bucket) return null;

  return {
    scheme: 'cw',
    bucket,
    ...(subpath ? { subpath } : {}),
    ...(mountPoint ? { mountPoint } : {}),
  };
}

export function parseRemoteMountUri(uri: string, scheme: RemoteScheme): RemoteMount | null {
  const prefix = `${scheme}://`;
  if (!uri.startsWith(prefix)) return null;

  const rest = uri.slice(prefix.length);
  const colon = rest.indexOf(':');
  if (colon <= 0) return null;

  const userHost = rest.slice(0, colon);
  const at = userHost.indexOf('@');
  // Local paths (no user@host) cannot be reached from inside the cluster.
  if (at <= 0 || at === userHost.length - 1) return null;

  const [remotePath, mountPoint] = splitMountPoint(rest.slice(colon + 1));
  if (!remotePath) return null;

  return {
    scheme,
    userHost,
    remotePath,
    ...(mountPoint ? { mountPoint } : {}),
  };
}

/** Parse any supported mount URI. Unknown schemes yield null. */
export function parseMountUri(uri: string): MountUri | null {
  if (uri.startsWith('cw://')) return parseBucketMountUri(uri);
  if (uri.startsWith('sshfs://')) return parseRemoteMountUri(uri, 'sshfs');
  if (uri.startsWith('rsync://')) return parseRemoteMountUri(uri, 'rsync');
  return null;
}

/** Inverse of parseMountUri. */
export function formatMountUri(mount: MountUri): string {
  const suffix = mount.mountPoint ? `:${mount.mountPoint}` : '';
  if (mount.scheme === 'cw') {
    const subpath = mount.subpath ? `/${mount.subpath}` : '';
    return `cw://${mount.bucket}${subpath}${suffix}`;
  }
  return `${mount.scheme}://${mount.userHost}:${mount.remotePath}${suffix}`;
}
