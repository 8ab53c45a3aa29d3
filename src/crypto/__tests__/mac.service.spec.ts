import { createHmac } from 'crypto';
import { MacService } from '../mac.service';
import { KeyHandle } from '../interfaces';

describe('MacService', () => {
  const service = new MacService();
  const key: KeyHandle = { id: 'mac', material: new Uint8Array(32).fill(1) };
  const otherKey: KeyHandle = { id: 'mac', material: new Uint8Array(32).fill(2) };
  const message = new TextEncoder().encode('urn:uuid:credential-1');

  it('computes HMAC-SHA-256', async () => {
    const expected = createHmac('sha256', Buffer.alloc(32, 1)).update('urn:uuid:credential-1').digest();

    const tag = await service.computeMac(message, key);

    expect(tag).toHaveLength(32);
    expect(Buffer.from(tag).equals(expected)).toBe(true);
  });

  it('is deterministic for the same key and message', async () => {
    await expect(service.computeMac(message, key)).resolves.toEqual(await service.computeMac(message, key));
  });

  it('depends on the key', async () => {
    const first = await service.computeMac(message, key);
    const second = await service.computeMac(message, otherKey);

    expect(Buffer.from(first).equals(Buffer.from(second))).toBe(false);
  });
});
