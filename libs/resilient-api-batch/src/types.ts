export type OperationType = 'create' | 'update' | 'delete' | 'get';

/** JSON request body for create and update calls. */
export type ResourceRequest = Record<string, unknown>;

/** Payload of an `update` operation. */
export interface UpdateData<
  TRequest extends ResourceRequest = ResourceRequest
> {
  guid: string;
  request: TRequest;
}

export interface BatchResult {
  id: string;
  success: boolean;
  data?: unknown;
  error?: unknown;
  durationMs: number;
}

/**
 * One unit of work in a batch. `type` and `resource` are matched at run time,
 * so an unknown value becomes a failed result instead of a thrown error.
 *
 * `data` is a request object for `create`, an {@link UpdateData} for `update`
 * and a guid for `delete` and `get`.
 */
export interface BatchOperation {
  id: string;
  type: string;
  resource: string;
  data: unknown;
  /** Called once with the final result of this operation. */
  callback?: (result: BatchResult) => void;
}

export interface ResourceOperations {
  create(request: ResourceRequest, signal: AbortSignal): Promise<unknown>;
  update(
    guid: string,
    request: ResourceRequest,
    signal: AbortSignal
  ): Promise<unknown>;
  delete(guid: string, signal: AbortSignal): Promise<unknown>;
  get(guid: string, signal: AbortSignal): Promise<unknown>;
}

export interface ResourceHandler {
  operations: ResourceOperations;
  /** Whether a successful create can be undone by deleting its resource. */
  reversibleCreate: boolean;
  /** Guid of the resource a create returned, if it can be found. */
  extractId(created: unknown): string | undefined;
}
