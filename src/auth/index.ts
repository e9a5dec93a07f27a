/**
 * Authentication for the BatchRouter client.
 */

/**
 * Supplies the credential headers attached to every request.
 */
export interface AuthProvider {
  /**
   * Returns the headers that authenticate a request.
   */
  getAuthHeaders(): Record<string, string>;

  /**
   * Returns a hint of the credential that is safe to log.
   */
  getKeyHint(): string;
}

/**
 * Bearer token authentication with a BatchRouter API key.
 */
export class BearerAuthProvider implements AuthProvider {
  private readonly apiKey: string;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
  }

  getAuthHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  getKeyHint(): string {
    if (this.apiKey.length > 7) {
      return `${this.apiKey.slice(0, 3)}...${this.apiKey.slice(-4)}`;
    }
    return '****';
  }
}

/**
 * Creates a bearer auth provider from an API key.
 */
export function createBearerAuth(apiKey: string): AuthProvider {
  return new BearerAuthProvider(apiKey);
}
