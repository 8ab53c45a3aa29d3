import { decodeProtectedHeader } from 'jose';
import { EnvelopeCipherService } from '../envelope-cipher.service';
import { KeyStoreService } from '../key-store.service';

describe('EnvelopeCipherService', () => {
  const envelopeKey = { id: 'envelope', material: new Uint8Array(32).fill(9) };
  const keyStore = { getEnvelopeKey: jest.fn().mockReturnValue(envelopeKey) };
  let service: EnvelopeCipherService;

  beforeEach(() => {
    service = new EnvelopeCipherService(keyStore as unknown as KeyStoreService);
  });

  it('produces a compact JWE with a direct AES-256-GCM header', async () => {
    const envelope = await service.encrypt(new TextEncoder().encode('{}'));

    expect(envelope.split('.')).toHaveLength(5);
    expect(decodeProtectedHeader(envelope)).toEqual({ alg: 'dir', enc: 'A256GCM', cty: 'application/json' });
  });

  it('recovers the exact plaintext bytes', async () => {
    const plaintext = new TextEncoder().encode('{"name":"Zoë","city":"Łódź","note":"✓"}');

    const decrypted = await service.decrypt(await service.encrypt(plaintext));

    expect(Buffer.from(decrypted).equals(Buffer.from(plaintext))).toBe(true);
  });

  it('recovers an empty object', async () => {
    const plaintext = new TextEncoder().encode('{}');

    const decrypted = await service.decrypt(await service.encrypt(plaintext));

    expect(Buffer.from(decrypted).toString('utf-8')).toBe('{}');
  });

  it('uses a fresh nonce for every envelope', async () => {
    const plaintext = new TextEncoder().encode('{"a":1}');

    const first = await service.encrypt(plaintext);
    const second = await service.encrypt(plaintext);

    expect(first).not.toBe(second);
  });

  it('rejects an envelope sealed under another key', async () => {
    const other = new EnvelopeCipherService({
      getEnvelopeKey: () => ({ id: 'envelope', material: new Uint8Array(32).fill(3) }),
    } as unknown as KeyStoreService);
    const envelope = await other.encrypt(new TextEncoder().encode('{"a":1}'));

    await expect(service.decrypt(envelope)).rejects.toThrow();
  });
});
