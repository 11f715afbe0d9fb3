import { parseResponse } from '../api/GraphApiClient';
import { debugTokenSchema } from '../schemas/graph';
import type { GraphServiceDeps } from '../types/services';
import { AuthError } from '../utils/error';
import { withRetry } from '../utils/retry';

const OPERATION = 'GET /debug_token';

export interface TokenInfo {
  appId?: string;
  userId?: string;
  expiresAt?: Date;
  scopes: string[];
}

export class TokenValidator {
  constructor(private deps: GraphServiceDeps) {}

  /**
   * Inspect the token with itself as credential; rejects with AuthError when it is not valid
   */
  async validate(accessToken: string): Promise<TokenInfo> {
    const { client, retry, log } = this.deps;

    const { value } = await withRetry(
      () => client.get('debug_token', { input_token: accessToken }),
      retry,
      { operation: OPERATION, log }
    );
    const { data } = parseResponse(debugTokenSchema, value, OPERATION);

    if (!data.is_valid) {
      log.error('Access token rejected', { operation: OPERATION });
      throw new AuthError('Access token is invalid or expired', 'TOKEN_INVALID');
    }

    const info: TokenInfo = {
      appId: data.app_id,
      userId: data.user_id,
      // 0 means the token never expires
      expiresAt: data.expires_at ? new Date(data.expires_at * 1000) : undefined,
      scopes: data.scopes ?? [],
    };

    log.info('Access token is valid', {
      operation: OPERATION,
      appId: info.appId,
      expiresAt: info.expiresAt?.toISOString(),
      scopes: info.scopes,
    });

    return info;
  }
}
