import { Module } from '@nestjs/common';
import { KeyStoreService } from './key-store.service';
import { MacService } from './mac.service';
import { EnvelopeCipherService } from './envelope-cipher.service';
import { BlindIndexerService } from './blind-indexer.service';
import { SigningKeyService } from './signing-key.service';
import { ENVELOPE_CIPHER, MAC_PROVIDER } from './interfaces';

@Module({
  providers: [
    KeyStoreService,
    BlindIndexerService,
    SigningKeyService,
    { provide: MAC_PROVIDER, useClass: MacService },
    { provide: ENVELOPE_CIPHER, useClass: EnvelopeCipherService },
  ],
  exports: [KeyStoreService, BlindIndexerService, SigningKeyService, ENVELOPE_CIPHER],
})
export class CryptoModule {}
