import { InterceptorError } from './errors';
import type {
  ApiRequest,
  ApiResponse,
  RequestInterceptor,
  ResponseInterceptor,
} from './types';

/**
 * Ordered request/response middleware. Interceptors run strictly in
 * registration order and the first failure aborts the phase.
 *
 * @example
 * ```typescript
 * const chain = new InterceptorChain();
 * chain.addRequestInterceptor(
 *   createHeaderInterceptor({ 'X-Team': 'platform' })
 * );
 * chain.addResponseInterceptor(createRetryResponseInterceptor());
 * ```
 */
export class InterceptorChain {
  private readonly requestInterceptors: RequestInterceptor[] = [];
  private readonly responseInterceptors: ResponseInterceptor[] = [];

  addRequestInterceptor(interceptor: RequestInterceptor): this {
    this.requestInterceptors.push(interceptor);
    return this;
  }

  addResponseInterceptor(interceptor: ResponseInterceptor): this {
    this.responseInterceptors.push(interceptor);
    return this;
  }

  get size(): { request: number; response: number } {
    return {
      request: this.requestInterceptors.length,
      response: this.responseInterceptors.length,
    };
  }

  async executeRequestInterceptors(request: ApiRequest): Promise<void> {
    for (const interceptor of this.requestInterceptors) {
      try {
        await interceptor(request);
      } catch (error) {
        throw new InterceptorError('request', error);
      }
      // A fresh cache hit answers the request; later ones guard the transport.
      if (request.cachedResponse) return;
    }
  }

  async executeResponseInterceptors(
    request: ApiRequest,
    response: ApiResponse
  ): Promise<void> {
    for (const interceptor of this.responseInterceptors) {
      try {
        await interceptor(request, response);
      } catch (error) {
        throw new InterceptorError('response', error);
      }
    }
  }
}
