import { Injectable } from '@nestjs/common';
import { createHmac } from 'crypto';
import { KeyHandle, MacProvider } from './interfaces';

/**
 * HMAC-SHA-256 keyed MAC.
 */
@Injectable()
export class MacService implements MacProvider {
  computeMac(message: Uint8Array, keyHandle: KeyHandle): Promise<Uint8Array> {
    const tag = createHmac('sha256', keyHandle.material).update(message).digest();
    return Promise.resolve(new Uint8Array(tag));
  }
}
