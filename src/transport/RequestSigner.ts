/**
 * @packageDocumentation
 * @module RequestSigner
 * @description
 * Produces the per-request protocol headers: request id, idempotency key
 * and request signature.
 *
 * With a signing key configured the signature is an EIP-191 personal-sign
 * over the canonical request string:
 *
 * ```
 * METHOD path
 * request-id
 * body
 * ```
 *
 * Without one it is the constant {@link UNSIGNED_SIGNATURE}.
 */

import { randomUUID } from 'crypto';
import { ethers } from 'ethers';

export const UNSIGNED_SIGNATURE = 'unsigned';

export type HttpMethod = 'GET' | 'POST' | 'PUT';

/** `request-id`, `request-signature` and, for mutating methods, `idempotency-key`. */
export type SignedHeaders = Record<string, string>;

export class RequestSigner {
  private wallet?: ethers.Wallet;

  constructor(signingKey?: string) {
    if (signingKey) {
      this.wallet = new ethers.Wallet(signingKey);
    }
  }

  get signerAddress(): string | undefined {
    return this.wallet?.address;
  }

  static canonicalRequest(method: HttpMethod, path: string, requestId: string, body: string): string {
    return `${method} ${path}\n${requestId}\n${body}`;
  }

  /**
   * Headers for one physical request. Every call mints a new request id and,
   * for mutating methods, a new idempotency key.
   */
  async sign(method: HttpMethod, path: string, body: string): Promise<SignedHeaders> {
    const requestId = randomUUID();
    const signature = this.wallet
      ? await this.wallet.signMessage(RequestSigner.canonicalRequest(method, path, requestId, body))
      : UNSIGNED_SIGNATURE;

    const headers: SignedHeaders = {
      'request-id': requestId,
      'request-signature': signature,
    };
    if (method !== 'GET') {
      headers['idempotency-key'] = randomUUID();
    }
    return headers;
  }
}
