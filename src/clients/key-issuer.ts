export type KeyIssuanceFailure = 'rejected' | 'unavailable';

/**
 * `rejected`: the service refused this installation id (blocked, invalid).
 * `unavailable`: transport failure, timeout, auth or quota problems.
 */
export class KeyIssuanceError extends Error {
  constructor(
    public readonly kind: KeyIssuanceFailure,
    message: string
  ) {
    super(message);
    this.name = 'KeyIssuanceError';
  }
}

export interface KeyIssuer {
  issueConfirmationId(installationId: string): Promise<string>;
}
