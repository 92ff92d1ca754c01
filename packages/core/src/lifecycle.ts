/**
 * Anything with an explicit start/close lifecycle (stores, caches, providers).
 * Both hooks are optional so stateless adapters can skip them.
 */
export interface RuntimeResource {
  start?(): Promise<void>;
  close?(): Promise<void>;
}

export async function startResources(resources: RuntimeResource[]): Promise<void> {
  for (const resource of resources) {
    await resource.start?.();
  }
}

export async function closeResources(resources: RuntimeResource[]): Promise<void> {
  for (const resource of [...resources].reverse()) {
    await resource.close?.();
  }
}

export function uniqueResources(candidates: Array<RuntimeResource | undefined>): RuntimeResource[] {
  const unique = new Set<RuntimeResource>();
  for (const candidate of candidates) {
    if (candidate) {
      unique.add(candidate);
    }
  }

  return [...unique];
}
