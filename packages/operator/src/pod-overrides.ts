/**
 * Merge a user-supplied partial PodSpec (`spec.podOverrides`) into the
 * generated one, following the strategic-merge rules kubectl applies to pods:
 *
 *   - objects merge key by key, recursively
 *   - a `null` value deletes the key from the result
 *   - lists listed in MERGE_KEYS merge element-wise: a patch element whose
 *     merge key matches a base element is merged into it, any other element
 *     is appended; base elements the patch does not mention are kept
 *   - every other list, and every scalar, replaces the base value
 *
 * So `{ containers: [{ name: 'marimo', resources: {...} }] }` adjusts the
 * marimo container's resources without restating its image, args or mounts.
 */

const MERGE_KEYS: Record<string, string> = {
  containers: 'name',
  initContainers: 'name',
  ephemeralContainers: 'name',
  volumes: 'name',
  env: 'name',
  imagePullSecrets: 'name',
  resourceClaims: 'name',
  volumeMounts: 'mountPath',
  volumeDevices: 'devicePath',
  ports: 'containerPort',
  hostAliases: 'ip',
  topologySpreadConstraints: 'topologyKey',
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeList(base: unknown[], patch: unknown[], mergeKey: string): unknown[] {
  const result = [...base];
  for (const item of patch) {
    const key = isPlainObject(item) ? item[mergeKey] : undefined;
    const existing =
      key === undefined ? undefined : result.find((e) => isPlainObject(e) && e[mergeKey] === key);
    if (isPlainObject(item) && isPlainObject(existing)) {
      mergeObject(existing, item);
    } else {
      result.push(structuredClone(item));
    }
  }
  return result;
}

function mergeObject(target: object, patch: Record<string, unknown>): void {
  for (const [key, patchValue] of Object.entries(patch)) {
    if (patchValue === undefined) continue;
    if (patchValue === null) {
      Reflect.deleteProperty(target, key);
      continue;
    }

    const current: unknown = Reflect.get(target, key);
    const mergeKey = MERGE_KEYS[key];
    if (isPlainObject(patchValue) && isPlainObject(current)) {
      mergeObject(current, patchValue);
    } else if (mergeKey && Array.isArray(patchValue) && Array.isArray(current)) {
      Reflect.set(target, key, mergeList(current, patchValue, mergeKey));
    } else {
      Reflect.set(target, key, structuredClone(patchValue));
    }
  }
}

/** Return a merged copy of `base`; neither argument is modified. */
export function applyPodOverrides<T extends object>(base: T, overrides: Record<string, unknown>): T {
  const merged = structuredClone(base);
  mergeObject(merged, overrides);
  return merged;
}
