import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { KeyStoreService } from '../key-store.service';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('KeyStoreService', () => {
  const restoreLogger = silenceNestLogger();
  let keysPath: string;

  afterAll(() => restoreLogger());

  beforeEach(() => {
    keysPath = join(mkdtempSync(join(tmpdir(), 'vcs-keys-')), 'keys');
  });

  afterEach(() => {
    rmSync(join(keysPath, '..'), { recursive: true, force: true });
  });

  async function createService(config: { keysPath?: string } = { keysPath }): Promise<KeyStoreService> {
    const module = await Test.createTestingModule({
      providers: [
        KeyStoreService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn().mockReturnValue(config.keysPath) },
        },
      ],
    }).compile();

    return module.get(KeyStoreService);
  }

  it('generates and persists both keys on first run', async () => {
    const service = await createService();

    expect(service.getMacKey().id).toBe('mac');
    expect(service.getMacKey().material).toHaveLength(32);
    expect(service.getEnvelopeKey().material).toHaveLength(32);
    expect(existsSync(join(keysPath, 'mac.key'))).toBe(true);
    expect(existsSync(join(keysPath, 'envelope.key'))).toBe(true);
    expect(statSync(join(keysPath, 'mac.key')).mode & 0o777).toBe(0o600);
  });

  it('generates distinct MAC and envelope keys', async () => {
    const service = await createService();

    expect(Buffer.from(service.getMacKey().material).equals(Buffer.from(service.getEnvelopeKey().material))).toBe(false);
  });

  it('reloads the same keys on restart', async () => {
    const first = await createService();
    const second = await createService();

    expect(second.getMacKey().material).toEqual(first.getMacKey().material);
    expect(second.getEnvelopeKey().material).toEqual(first.getEnvelopeKey().material);
  });

  it('loads an existing key file', async () => {
    const material = Buffer.alloc(32, 7);
    mkdirSync(keysPath, { recursive: true });
    writeFileSync(join(keysPath, 'mac.key'), `${material.toString('base64url')}\n`);

    const service = await createService();

    expect(Buffer.from(service.getMacKey().material).equals(material)).toBe(true);
    expect(readFileSync(join(keysPath, 'mac.key'), 'utf-8').trim()).toBe(material.toString('base64url'));
  });

  it('refuses a key file with the wrong length', async () => {
    mkdirSync(keysPath, { recursive: true });
    writeFileSync(join(keysPath, 'envelope.key'), Buffer.alloc(16).toString('base64url'));

    await expect(createService()).rejects.toThrow('Failed to load key envelope.key: expected 32 bytes, found 16');
  });

  it('requires a configured key directory', async () => {
    await expect(createService({})).rejects.toThrow('Key directory not configured');
  });
});
