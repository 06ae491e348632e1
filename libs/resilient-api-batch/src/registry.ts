import {
  BatchOperationError,
  getHeader,
  type ApiHttpClient,
} from '@resilient-api/core';
import { z } from 'zod';
import type {
  BatchOperation,
  ResourceHandler,
  ResourceOperations,
  ResourceRequest,
} from './types';

const RequestSchema = z.record(z.unknown());

const UpdateDataSchema = z.object({
  guid: z.string().min(1),
  request: RequestSchema,
});

const GuidSchema = z.string().min(1);

const CreatedResourceSchema = z.object({ guid: z.string().min(1) });

/** Reads `guid` from a created resource body. */
export function extractGuid(created: unknown): string | undefined {
  const parsed = CreatedResourceSchema.safeParse(created);
  return parsed.success ? parsed.data.guid : undefined;
}

/** Maps resource tags (`app`, `space`, ...) to the operations they support. */
export class ResourceRegistry {
  private readonly handlers = new Map<string, ResourceHandler>();

  register(resource: string, handler: ResourceHandler): this {
    this.handlers.set(resource, handler);
    return this;
  }

  get(resource: string): ResourceHandler | undefined {
    return this.handlers.get(resource);
  }

  has(resource: string): boolean {
    return this.handlers.has(resource);
  }

  resources(): string[] {
    return [...this.handlers.keys()];
  }
}

/**
 * REST operations against `/v3/<collection>`: POST to create, PATCH to update,
 * DELETE and GET by guid. Deletes resolve with the job URL from `Location`,
 * when the server returns one.
 */
export function createRestResource(
  http: ApiHttpClient,
  collection: string
): ResourceOperations {
  const base = `/v3/${collection}`;
  const item = (guid: string) => `${base}/${encodeURIComponent(guid)}`;
  return {
    create: (request, signal) =>
      http.requestJson<unknown>({
        method: 'POST',
        path: base,
        body: request,
        signal,
      }),
    update: (guid, request, signal) =>
      http.requestJson<unknown>({
        method: 'PATCH',
        path: item(guid),
        body: request,
        signal,
      }),
    delete: async (guid, signal) => {
      const response = await http.delete(item(guid), signal);
      const job = getHeader(response.headers, 'Location');
      return job ? { job } : undefined;
    },
    get: (guid, signal) =>
      http.requestJson<unknown>({ method: 'GET', path: item(guid), signal }),
  };
}

/**
 * Registry for the resources a batch can address out of the box. Created apps,
 * spaces, organizations and routes can be rolled back by deleting them; service
 * instances are provisioned asynchronously and are not.
 */
export function createDefaultResourceRegistry(
  http: ApiHttpClient
): ResourceRegistry {
  const registry = new ResourceRegistry();
  const resources: Array<
    [tag: string, collection: string, reversibleCreate: boolean]
  > = [
    ['app', 'apps', true],
    ['space', 'spaces', true],
    ['organization', 'organizations', true],
    ['route', 'routes', true],
    ['service_instance', 'service_instances', false],
  ];
  for (const [tag, collection, reversibleCreate] of resources) {
    registry.register(tag, {
      operations: createRestResource(http, collection),
      reversibleCreate,
      extractId: extractGuid,
    });
  }
  return registry;
}

/**
 * Runs `operation` against its resource handler. Unknown resources, unknown
 * operation types and payloads of the wrong shape reject with a
 * {@link BatchOperationError}.
 */
export async function dispatchOperation(
  registry: ResourceRegistry,
  operation: BatchOperation,
  signal: AbortSignal
): Promise<unknown> {
  const handler = registry.get(operation.resource);
  if (!handler) {
    throw BatchOperationError.unsupportedResource(
      operation.id,
      operation.resource
    );
  }
  const { operations } = handler;

  const payload = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): T => {
    const parsed = schema.safeParse(operation.data);
    if (!parsed.success) {
      throw BatchOperationError.invalidData(
        operation.id,
        operation.resource,
        operation.type,
        parsed.error
      );
    }
    return parsed.data;
  };

  switch (operation.type) {
    case 'create': {
      const request: ResourceRequest = payload(RequestSchema);
      return operations.create(request, signal);
    }
    case 'update': {
      const { guid, request } = payload(UpdateDataSchema);
      return operations.update(guid, request, signal);
    }
    case 'delete':
      return operations.delete(payload(GuidSchema), signal);
    case 'get':
      return operations.get(payload(GuidSchema), signal);
    default:
      throw BatchOperationError.unsupportedOperation(
        operation.id,
        operation.type
      );
  }
}
