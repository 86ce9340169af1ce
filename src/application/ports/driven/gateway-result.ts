export type GatewayFailureReason = 'not_found' | 'unavailable' | 'rejected';

export type GatewayResult<T> =
  | { status: 'success'; data: T }
  | { status: 'failure'; reason: GatewayFailureReason; error: string };

export function success<T>(data: T): GatewayResult<T> {
  return { status: 'success', data };
}

export function failure<T>(reason: GatewayFailureReason, error: string): GatewayResult<T> {
  return { status: 'failure', reason, error };
}
