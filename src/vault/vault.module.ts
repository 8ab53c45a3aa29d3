import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpModule, HttpService } from '@nestjs/axios';
import { CryptoModule } from '../crypto/crypto.module';
import { VaultMode } from '../config/config.constants';
import { VAULT_GATEWAY, VaultGateway } from './interfaces';
import { InMemoryVaultGateway } from './gateways/in-memory-vault.gateway';
import { EdvHttpGateway } from './gateways/edv-http.gateway';
import { EnvelopeBuilderService } from './envelope-builder.service';
import { ConsistencyReconcilerService } from './consistency-reconciler.service';
import { CredentialStoreService } from './credential-store.service';
import { CredentialStoreController } from './credential-store.controller';

/**
 * In-process vault in `local` mode, remote EDV server in `remote` mode.
 */
const vaultGatewayProvider = {
  provide: VAULT_GATEWAY,
  inject: [ConfigService, HttpService],
  useFactory: (configService: ConfigService, httpService: HttpService): VaultGateway => {
    const mode = configService.get<VaultMode>('vcs.vault.mode') ?? VaultMode.LOCAL;
    new Logger('VaultModule').log(`Vault mode: ${mode}`);
    return mode === VaultMode.REMOTE ? new EdvHttpGateway(httpService, configService) : new InMemoryVaultGateway();
  },
};

@Module({
  imports: [HttpModule, CryptoModule],
  controllers: [CredentialStoreController],
  providers: [
    vaultGatewayProvider,
    EnvelopeBuilderService,
    ConsistencyReconcilerService,
    CredentialStoreService,
  ],
  exports: [VAULT_GATEWAY, CredentialStoreService],
})
export class VaultModule {}
