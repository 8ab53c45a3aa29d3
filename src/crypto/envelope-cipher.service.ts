import { Injectable, Logger } from '@nestjs/common';
import { CompactEncrypt, compactDecrypt } from 'jose';
import { KeyStoreService } from './key-store.service';
import { EnvelopeCipher } from './interfaces';

const JWE_HEADER = { alg: 'dir', enc: 'A256GCM', cty: 'application/json' } as const;

/**
 * AES-256-GCM envelopes serialised as compact JWE.
 */
@Injectable()
export class EnvelopeCipherService implements EnvelopeCipher {
  private readonly logger = new Logger(EnvelopeCipherService.name);

  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly keyStore: KeyStoreService) {}

  async encrypt(plaintext: Uint8Array): Promise<string> {
    return new CompactEncrypt(plaintext).setProtectedHeader(JWE_HEADER).encrypt(this.keyStore.getEnvelopeKey().material);
  }

  async decrypt(envelope: string): Promise<Uint8Array> {
    const { plaintext, protectedHeader } = await compactDecrypt(envelope, this.keyStore.getEnvelopeKey().material, {
      keyManagementAlgorithms: [JWE_HEADER.alg],
      contentEncryptionAlgorithms: [JWE_HEADER.enc],
    });
    this.logger.verbose(`Decrypted envelope (enc=${protectedHeader.enc})`);
    return plaintext;
  }
}
