import { Module } from '@nestjs/common';
import { CryptoModule } from '../crypto/crypto.module';
import { ProfileModule } from '../profile/profile.module';
import { StatusModule } from '../status/status.module';
import { CREDENTIAL_SIGNER } from './interfaces';
import { JwsCredentialSignerService } from './jws-credential-signer.service';
import { IssuanceService } from './issuance.service';
import { IssuerController } from './issuer.controller';

@Module({
  imports: [CryptoModule, ProfileModule, StatusModule],
  controllers: [IssuerController],
  providers: [{ provide: CREDENTIAL_SIGNER, useClass: JwsCredentialSignerService }, IssuanceService],
})
export class IssuerModule {}
