import { vi } from 'vitest';
import { ResourceRegistry, extractGuid } from '../registry';
import type { ResourceOperations, ResourceRequest } from '../types';

export const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export const createFakeOperations = (
  overrides: Partial<ResourceOperations> = {}
): ResourceOperations => ({
  create: vi.fn(async (request: ResourceRequest) => ({
    guid: `guid-${String(request.name)}`,
    ...request,
  })),
  update: vi.fn(async (guid: string, request: ResourceRequest) => ({
    guid,
    ...request,
  })),
  delete: vi.fn(async () => undefined),
  get: vi.fn(async (guid: string) => ({ guid })),
  ...overrides,
});

export const createFakeRegistry = (
  operations: Record<string, ResourceOperations>,
  irreversible: string[] = []
) => {
  const registry = new ResourceRegistry();
  for (const [resource, ops] of Object.entries(operations)) {
    registry.register(resource, {
      operations: ops,
      reversibleCreate: !irreversible.includes(resource),
      extractId: extractGuid,
    });
  }
  return registry;
};
