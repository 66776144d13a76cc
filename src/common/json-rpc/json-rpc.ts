import { JsonRpcError } from './json-rpc.error';

/**
 * # Helper-tools for JsonRPC API organization
 */
export namespace JsonRpc {
  export interface SuccessfulResponse<T> {
    readonly status: 'ok';
    readonly payload: T;
  }

  export interface FailedResponse {
    readonly status: 'error';
    readonly code: string;
    readonly message: string;
    /** Same request may succeed later, e.g. after a pool cooldown */
    readonly retryable: boolean;
    readonly payload?: object;
  }

  export type Response<T> = SuccessfulResponse<T> | FailedResponse;

  /**
   * # Unwrap payload (or error) from JsonRPC response
   */
  export function unwrap<T>(response: Response<T>): T {
    if (response.status === 'error') {
      throw new JsonRpcError(
        response.code,
        response.message,
        response.retryable,
        response.payload,
      );
    }

    return response.payload;
  }
}
