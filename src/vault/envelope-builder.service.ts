import { Inject, Injectable } from '@nestjs/common';
import { BlindIndexerService } from '../crypto/blind-indexer.service';
import { ENVELOPE_CIPHER, EnvelopeCipher } from '../crypto/interfaces';
import { KeyStoreService } from '../crypto/key-store.service';
import { CryptoUnavailableException } from '../shared/errors';
import { EncryptedDocument, StructuredDocument } from './interfaces';
import { generateDocumentId } from './utils/document-id';

const HMAC_KEY_TYPE = 'Sha256HmacKey2019';

/**
 * Wraps a credential into an encrypted vault document.
 *
 * Two documents built for the same logical ID share only their blind index;
 * their IDs and envelopes differ. Building never retries, since every attempt
 * yields a new document ID.
 */
@Injectable()
export class EnvelopeBuilderService {
  /* v8 ignore next 5 - false positive on constructor parameter properties */
  constructor(
    @Inject(ENVELOPE_CIPHER) private readonly cipher: EnvelopeCipher,
    private readonly blindIndexer: BlindIndexerService,
    private readonly keyStore: KeyStoreService,
  ) {}

  /**
   * @param message Credential exactly as received; it is not re-serialised
   */
  buildStructuredDocument(message: string): StructuredDocument {
    return { id: generateDocumentId(), content: { message } };
  }

  async build(message: string, logicalId: string): Promise<EncryptedDocument> {
    const structuredDocument = this.buildStructuredDocument(message);
    const plaintext = new TextEncoder().encode(JSON.stringify(structuredDocument));

    let jwe: string;
    try {
      jwe = await this.cipher.encrypt(plaintext);
    } catch (error) {
      throw new CryptoUnavailableException('encrypting document', error);
    }

    const [name, value] = await Promise.all([this.blindIndexer.indexName(), this.blindIndexer.index(logicalId)]);

    return {
      id: structuredDocument.id,
      sequence: 0,
      jwe,
      indexedAttributeCollections: [
        {
          sequence: 0,
          hmac: { id: this.keyStore.getMacKey().id, type: HMAC_KEY_TYPE },
          indexedAttributes: [{ name, value, unique: true }],
        },
      ],
    };
  }
}
