/**
 * Upgrade Handshake Types
 */

/**
 * Case-insensitive, read-only header lookup
 */
export interface HeaderMap {
  get(name: string): string | undefined;
  has(name: string): boolean;
  entries(): IterableIterator<[string, string]>;
}

export interface HandshakeRequest {
  readonly method: string;
  readonly path: string;
  readonly headers: HeaderMap;
}

export interface HandshakeResponse {
  statusCode: 101;
  statusText: string;
  headers: Record<string, string>;
}

export interface HandshakeRejection {
  statusCode: number;
  reason: string;
  headers: Record<string, string>;
}

export type HandshakeResult =
  | { accepted: true; response: HandshakeResponse; protocol?: string }
  | { accepted: false; rejection: HandshakeRejection };

export interface HandshakeOptions {
  /**
   * Pick one of the client's requested sub-protocols, or none.
   * Values outside the requested list are ignored.
   */
  selectProtocol?: (requested: readonly string[], request: HandshakeRequest) => string | undefined;
}
