/**
 * Container env list primitives. Every env mutation in the engine goes through these,
 * which is what keeps repeated injection of the same pod a no-op.
 */

import type { V1EnvVar } from '@kubernetes/client-node';

/** Index of the first variable named `name`, or -1. */
export function indexOfEnv(envs: readonly V1EnvVar[] | undefined, name: string): number {
  if (!envs) return -1;
  return envs.findIndex((env) => env.name === name);
}

/** Returns the list with `variable` appended, unless a variable of that name is already present. */
export function insertEnvIfAbsent(envs: readonly V1EnvVar[] | undefined, variable: V1EnvVar): V1EnvVar[] {
  const list = envs ? [...envs] : [];
  if (indexOfEnv(list, variable.name) === -1) {
    list.push(variable);
  }
  return list;
}

/** Returns the list with the variable at `index` moved last. Out-of-range indexes (including -1) change nothing. */
export function moveEnvToEnd(envs: readonly V1EnvVar[] | undefined, index: number): V1EnvVar[] {
  const list = envs ? [...envs] : [];
  if (index < 0 || index >= list.length) return list;
  const [moved] = list.splice(index, 1);
  list.push(moved);
  return list;
}
