import type { BatchOperation, ResourceRequest, UpdateData } from './types';

/** Fluent list of batch operations. */
export class BatchBuilder {
  private readonly operations: BatchOperation[] = [];

  addCreateApp(id: string, request: ResourceRequest): this {
    return this.push(id, 'create', 'app', request);
  }

  addUpdateApp(id: string, guid: string, request: ResourceRequest): this {
    return this.push(id, 'update', 'app', update(guid, request));
  }

  addDeleteApp(id: string, guid: string): this {
    return this.push(id, 'delete', 'app', guid);
  }

  addGetApp(id: string, guid: string): this {
    return this.push(id, 'get', 'app', guid);
  }

  addCreateSpace(id: string, request: ResourceRequest): this {
    return this.push(id, 'create', 'space', request);
  }

  addUpdateSpace(id: string, guid: string, request: ResourceRequest): this {
    return this.push(id, 'update', 'space', update(guid, request));
  }

  addDeleteSpace(id: string, guid: string): this {
    return this.push(id, 'delete', 'space', guid);
  }

  addCreateOrganization(id: string, request: ResourceRequest): this {
    return this.push(id, 'create', 'organization', request);
  }

  addOperation(operation: BatchOperation): this {
    this.operations.push(operation);
    return this;
  }

  build(): BatchOperation[] {
    return [...this.operations];
  }

  private push(
    id: string,
    type: string,
    resource: string,
    data: unknown
  ): this {
    this.operations.push({ id, type, resource, data });
    return this;
  }
}

function update(guid: string, request: ResourceRequest): UpdateData {
  return { guid, request };
}
