import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';
import { ProfilePictureStore, sanitizeKey } from './profilePictures.js';

function solidImage(width: number, height: number, format: 'png' | 'jpeg') {
  const image = sharp({ create: { width, height, channels: 3, background: { r: 40, g: 120, b: 200 } } });
  return format === 'png' ? image.png().toBuffer() : image.jpeg().toBuffer();
}

describe('sanitizeKey', () => {
  it('reduces an email to lowercase words joined by underscores', () => {
    expect(sanitizeKey('  Alice.Ng+test@Example.org ')).toBe('alice_ng_test_example_org');
  });

  it('falls back to "user"', () => {
    expect(sanitizeKey('@@@')).toBe('user');
  });
});

describe('ProfilePictureStore', () => {
  let dir: string;
  let store: ProfilePictureStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'profile-pics-'));
    store = new ProfilePictureStore(join(dir, 'pics'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('stores uploads as PNG no wider than 512px', async () => {
    const path = await store.save('alice@example.org', await solidImage(1024, 256, 'jpeg'));
    expect(path).toBe(join(dir, 'pics', 'alice_example_org.png'));

    const saved = await store.load('Alice@Example.org');
    expect(saved).not.toBeNull();
    const metadata = await sharp(saved ?? Buffer.alloc(0)).metadata();
    expect(metadata).toMatchObject({ format: 'png', width: 512, height: 128 });
  });

  it('keeps small images at their size', async () => {
    await store.save('alice@example.org', await solidImage(100, 80, 'png'));
    const metadata = await sharp((await store.load('alice@example.org')) ?? Buffer.alloc(0)).metadata();
    expect(metadata).toMatchObject({ width: 100, height: 80 });
  });

  it('rejects files that are not images', async () => {
    await expect(store.save('alice@example.org', Buffer.from('not an image'))).rejects.toMatchObject({
      code: 'INVALID_INPUT',
    });
  });

  it('returns null when no picture was uploaded', async () => {
    expect(await store.load('nobody@example.org')).toBeNull();
  });
});
