import type { RegisteredService } from '@grantline/shared';

/**
 * Service for OAuth scope parsing and filtering
 */
export class ScopeService {
  /**
   * Parse a space-delimited scope string into an array
   */
  parseScopes(scopeString: string | undefined): string[] {
    if (!scopeString) {
      return [];
    }
    return [
      ...new Set(
        scopeString
          .split(' ')
          .map((s) => s.trim())
          .filter((s) => s.length > 0)
      ),
    ];
  }

  /**
   * Convert scope array to space-delimited string
   */
  formatScopes(scopes: string[]): string {
    return scopes.join(' ');
  }

  /**
   * Resolve requested scopes against a registered service
   *
   * Unknown scopes are dropped. With nothing requested the service defaults
   * apply. A service without `allowedScopes` accepts any scope.
   */
  resolveScopes(requestedScopes: string[], service: RegisteredService): string[] {
    if (requestedScopes.length === 0) {
      return service.defaultScopes ?? [];
    }

    if (service.allowedScopes.length === 0) {
      return requestedScopes;
    }

    return this.filterScopes(requestedScopes, service.allowedScopes);
  }

  /**
   * Filter scopes to only include those from a subset
   */
  filterScopes(scopes: string[], allowedScopes: string[]): string[] {
    return scopes.filter((scope) => allowedScopes.includes(scope));
  }
}

// Singleton instance
export const scopeService = new ScopeService();
