import { Test, TestingModule } from '@nestjs/testing';
import { createHmac } from 'crypto';
import { BlindIndexerService } from '../blind-indexer.service';
import { KeyStoreService } from '../key-store.service';
import { MacService } from '../mac.service';
import { MAC_PROVIDER, MacProvider } from '../interfaces';
import { CryptoUnavailableException } from '../../shared/errors';

describe('BlindIndexerService', () => {
  const macKey = { id: 'mac', material: new Uint8Array(32).fill(5) };

  async function createService(macProvider: MacProvider): Promise<BlindIndexerService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BlindIndexerService,
        { provide: MAC_PROVIDER, useValue: macProvider },
        { provide: KeyStoreService, useValue: { getMacKey: () => macKey } },
      ],
    }).compile();

    return module.get(BlindIndexerService);
  }

  describe('with a working MAC', () => {
    let service: BlindIndexerService;

    beforeEach(async () => {
      service = await createService(new MacService());
    });

    it('returns the base64url HMAC of the identifier', async () => {
      const expected = createHmac('sha256', Buffer.from(macKey.material)).update('urn:uuid:a').digest('base64url');

      await expect(service.index('urn:uuid:a')).resolves.toBe(expected);
    });

    it('is deterministic', async () => {
      await expect(service.index('urn:uuid:a')).resolves.toBe(await service.index('urn:uuid:a'));
    });

    it('gives distinct identifiers distinct indexes', async () => {
      const first = await service.index('urn:uuid:a');
      const second = await service.index('urn:uuid:b');

      expect(first).not.toBe(second);
    });

    it('treats string and byte identifiers alike', async () => {
      await expect(service.index(new TextEncoder().encode('urn:uuid:a'))).resolves.toBe(await service.index('urn:uuid:a'));
    });

    it('derives the index name from the vcID label', async () => {
      const expected = createHmac('sha256', Buffer.from(macKey.material)).update('vcID').digest('base64url');

      await expect(service.indexName()).resolves.toBe(expected);
    });
  });

  describe('with a failing MAC', () => {
    it('fails with CryptoUnavailableException', async () => {
      const service = await createService({
        computeMac: jest.fn().mockRejectedValue(new Error('key unavailable')),
      });

      const result = service.index('urn:uuid:a');

      await expect(result).rejects.toBeInstanceOf(CryptoUnavailableException);
      await expect(service.index('urn:uuid:a')).rejects.toThrow(
        'cryptographic operation unavailable while computing blind index: key unavailable',
      );
    });

    it('caches the index name only once it has been derived', async () => {
      const computeMac = jest
        .fn()
        .mockRejectedValueOnce(new Error('key unavailable'))
        .mockResolvedValue(new Uint8Array([1, 2, 3]));
      const service = await createService({ computeMac });

      await expect(service.indexName()).rejects.toBeInstanceOf(CryptoUnavailableException);
      await expect(service.indexName()).resolves.toBe('AQID');
      await expect(service.indexName()).resolves.toBe('AQID');
      expect(computeMac).toHaveBeenCalledTimes(2);
    });
  });
});
