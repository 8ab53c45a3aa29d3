import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, StreamableFile } from '@nestjs/common';
import { CredentialStoreController } from '../credential-store.controller';
import { CredentialStoreService } from '../credential-store.service';
import { ApiKeyGuard } from '../../shared/guards/api-key.guard';

describe('CredentialStoreController', () => {
  let controller: CredentialStoreController;
  const credentialStore = {
    storeCredential: jest.fn().mockResolvedValue(undefined),
    retrieveCredential: jest.fn(),
  };

  const credential = JSON.stringify({
    '@context': ['https://www.w3.org/2018/credentials/v1'],
    id: 'urn:uuid:vc-1',
    type: ['VerifiableCredential'],
    credentialSubject: { id: 'did:example:holder' },
  });

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      controllers: [CredentialStoreController],
      providers: [{ provide: CredentialStoreService, useValue: credentialStore }],
    })
      .overrideGuard(ApiKeyGuard)
      .useValue({ canActivate: () => true })
      .compile();

    controller = module.get(CredentialStoreController);
  });

  describe('storeCredential', () => {
    it('stores the raw credential under its ID', async () => {
      await controller.storeCredential({ profile: 'profileA', credential });

      expect(credentialStore.storeCredential).toHaveBeenCalledWith(credential, 'urn:uuid:vc-1', 'profileA');
    });

    it('rejects a credential that is not JSON', async () => {
      const result = controller.storeCredential({ profile: 'profileA', credential: '{not json' });

      await expect(result).rejects.toBeInstanceOf(BadRequestException);
      await expect(result).rejects.toThrow(/^unable to unmarshal the VC: /);
      expect(credentialStore.storeCredential).not.toHaveBeenCalled();
    });

    it('rejects a credential without an ID', async () => {
      const withoutId = JSON.stringify({ ...JSON.parse(credential), id: undefined });

      await expect(controller.storeCredential({ profile: 'profileA', credential: withoutId })).rejects.toThrow(
        new BadRequestException('missing verifiable credential ID'),
      );
    });

    it('rejects a structurally invalid credential', async () => {
      const invalid = JSON.stringify({ id: 'urn:uuid:vc-1', credentialSubject: {} });

      await expect(controller.storeCredential({ profile: 'profileA', credential: invalid })).rejects.toThrow(
        'unable to unmarshal the VC: @context is required',
      );
    });
  });

  describe('retrieveCredential', () => {
    it('streams the stored bytes as JSON', async () => {
      const payload = Buffer.from(credential);
      credentialStore.retrieveCredential.mockResolvedValue(payload);

      const file = await controller.retrieveCredential({ id: 'urn:uuid:vc-1', profile: 'profileA' });

      expect(file).toBeInstanceOf(StreamableFile);
      expect(file.getHeaders()).toMatchObject({ type: 'application/json', length: payload.length });
      expect(credentialStore.retrieveCredential).toHaveBeenCalledWith('urn:uuid:vc-1', 'profileA');
    });
  });
});
