import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { KeyHandle } from './interfaces';
import { SYMMETRIC_KEY_BYTES } from '../config/config.constants';
import { getErrorMessage } from '../shared/error.utils';

const MAC_KEY_FILE = 'mac.key';
const ENVELOPE_KEY_FILE = 'envelope.key';

/**
 * Holds the deployment's symmetric keys.
 *
 * Keys are loaded from `<dataPath>/keys` and generated only when the file does not
 * exist yet. A blind index computed with a regenerated key would no longer match the
 * documents already in the vault, so an unreadable key file stops startup instead.
 */
@Injectable()
export class KeyStoreService {
  private readonly logger = new Logger(KeyStoreService.name);
  private readonly macKey: KeyHandle;
  private readonly envelopeKey: KeyHandle;

  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly configService: ConfigService) {
    const keysPath = this.configService.get<string>('vcs.crypto.keysPath');
    if (!keysPath) {
      throw new Error('Key directory not configured (vcs.crypto.keysPath)');
    }

    this.macKey = { id: 'mac', material: this.loadOrCreate(keysPath, MAC_KEY_FILE) };
    this.envelopeKey = { id: 'envelope', material: this.loadOrCreate(keysPath, ENVELOPE_KEY_FILE) };
  }

  getMacKey(): KeyHandle {
    return this.macKey;
  }

  getEnvelopeKey(): KeyHandle {
    return this.envelopeKey;
  }

  /**
   * Load a base64url key file, creating it on first run.
   * @param keysPath Directory holding the key files
   * @param fileName Key file name
   * @returns Raw key bytes
   */
  private loadOrCreate(keysPath: string, fileName: string): Uint8Array {
    const filePath = join(keysPath, fileName);

    if (existsSync(filePath)) {
      try {
        const material = new Uint8Array(Buffer.from(readFileSync(filePath, 'utf-8').trim(), 'base64url'));
        if (material.length !== SYMMETRIC_KEY_BYTES) {
          throw new Error(`expected ${SYMMETRIC_KEY_BYTES} bytes, found ${material.length}`);
        }
        this.logger.log(`✓ Key loaded from ${filePath}`);
        return material;
      } catch (error) {
        const errorMessage = getErrorMessage(error);
        this.logger.error(`Invalid key file ${filePath}: ${errorMessage}`);
        throw new Error(`Failed to load key ${fileName}: ${errorMessage}`);
      }
    }

    const material = new Uint8Array(randomBytes(SYMMETRIC_KEY_BYTES));
    try {
      mkdirSync(keysPath, { recursive: true, mode: 0o700 });
      writeFileSync(filePath, Buffer.from(material).toString('base64url'), { mode: 0o600 });
    } catch (error) {
      const errorMessage = getErrorMessage(error);
      this.logger.error(`Cannot persist generated key ${filePath}: ${errorMessage}`);
      throw new Error(`Failed to persist key ${fileName}: ${errorMessage}`);
    }

    this.logger.warn(`Generated new key ${filePath} (first run)`);
    return material;
  }
}
