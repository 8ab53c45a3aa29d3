import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createPrivateKey, createPublicKey, generateKeyPairSync, KeyObject, JsonWebKey } from 'crypto';
import { readFileSync } from 'fs';
import { getErrorMessage } from '../shared/error.utils';

const SIGNING_KEY_TYPE = 'ed25519';

/**
 * Holds the Ed25519 key used to sign issued credentials.
 * Loads the key from VCS_SIGNING_KEY_PATH when configured, otherwise generates an
 * ephemeral key pair that is replaced on every restart.
 */
@Injectable()
export class SigningKeyService {
  private readonly logger = new Logger(SigningKeyService.name);
  private readonly privateKey: KeyObject;
  private readonly publicKey: KeyObject;

  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly configService: ConfigService) {
    const keyPath = this.configService.get<string>('vcs.crypto.signingKeyPath');
    this.privateKey = keyPath ? this.loadKeyFromFile(keyPath) : this.generateEphemeralKey();
    this.publicKey = createPublicKey(this.privateKey);
  }

  /**
   * Load a PKCS#8 PEM private key and check that it is Ed25519.
   * @param keyPath Path to the PEM file
   */
  private loadKeyFromFile(keyPath: string): KeyObject {
    try {
      const key = createPrivateKey(readFileSync(keyPath));
      if (key.asymmetricKeyType !== SIGNING_KEY_TYPE) {
        throw new Error(`Unsupported signing key type: ${key.asymmetricKeyType ?? 'unknown'} (expected ${SIGNING_KEY_TYPE})`);
      }
      this.logger.log(`✓ Ed25519 signing key loaded from ${keyPath}`);
      return key;
    } catch (error) {
      const errorMessage = getErrorMessage(error);
      this.logger.error(`Failed to load signing key from file: ${errorMessage}`);
      throw new Error(`Failed to load signing key: ${errorMessage}`);
    }
  }

  private generateEphemeralKey(): KeyObject {
    const { privateKey } = generateKeyPairSync(SIGNING_KEY_TYPE);
    this.logger.warn('No VCS_SIGNING_KEY_PATH configured, using an ephemeral Ed25519 signing key');
    return privateKey;
  }

  getPrivateKey(): KeyObject {
    return this.privateKey;
  }

  /**
   * Public half of the signing key as a JWK (kty OKP, crv Ed25519).
   */
  getPublicKeyJwk(): JsonWebKey {
    return this.publicKey.export({ format: 'jwk' });
  }
}
