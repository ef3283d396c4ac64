import {
  AuthRequestCodeResponseSchema,
  AuthVerifyResponseSchema,
  type AuthRequestCodeResponse,
  type AuthVerifyResponse,
} from '@pine-sdk/shared';

import { AuthError } from '../errors';
import { httpRequest, type HttpClientConfig } from './httpClient';

/**
 * Two-step email verification: request a code, then trade it for an access
 * token.
 */
export class AuthApi {
  constructor(
    private readonly getConfig: () => HttpClientConfig,
    private readonly onToken: (token: string) => void = () => undefined,
  ) {}

  async requestCode(email: string): Promise<AuthRequestCodeResponse> {
    try {
      const body = await httpRequest(this.getConfig(), {
        path: '/v2/auth/email/request',
        method: 'POST',
        body: { email },
        authenticated: false,
      });
      return AuthRequestCodeResponseSchema.parse(body);
    } catch (err) {
      throw new AuthError(`Failed to request auth code: ${describe(err)}`);
    }
  }

  async verifyCode(email: string, code: string, requestToken: string): Promise<AuthVerifyResponse> {
    let verified: AuthVerifyResponse;
    try {
      const body = await httpRequest(this.getConfig(), {
        path: '/v2/auth/email/verify',
        method: 'POST',
        body: { email, code, request_token: requestToken },
        authenticated: false,
      });
      verified = AuthVerifyResponseSchema.parse(body);
    } catch (err) {
      throw new AuthError(`Failed to verify auth code: ${describe(err)}`);
    }
    this.onToken(verified.access_token);
    return verified;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
