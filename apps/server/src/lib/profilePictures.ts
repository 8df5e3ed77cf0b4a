import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import sharp from 'sharp';
import { PortalError } from './errors.js';

const MAX_WIDTH = 512;

export function sanitizeKey(value: string): string {
  const key = value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return key || 'user';
}

/**
 * Profile pictures on local disk, one `<sanitized email>.png` per account
 */
export class ProfilePictureStore {
  constructor(private readonly dir: string) {}

  pathFor(email: string): string {
    return join(this.dir, `${sanitizeKey(email)}.png`);
  }

  /** Normalizes the upload to a PNG no wider than 512px and stores it */
  async save(email: string, upload: Buffer): Promise<string> {
    const png = await toPng(upload);

    await mkdir(this.dir, { recursive: true });
    const path = this.pathFor(email);
    await writeFile(path, png);
    return path;
  }

  async load(email: string): Promise<Buffer | null> {
    try {
      return await readFile(this.pathFor(email));
    } catch (e) {
      if (isMissingFile(e)) return null;
      throw e;
    }
  }
}

async function toPng(upload: Buffer): Promise<Buffer> {
  try {
    let image = sharp(upload);
    const metadata = await image.metadata();
    if (metadata.width && metadata.width > MAX_WIDTH) {
      image = image.resize(MAX_WIDTH);
    }
    return await image.png().toBuffer();
  } catch (e) {
    throw new PortalError('INVALID_INPUT', 'That file is not a readable image.', { cause: e });
  }
}

function isMissingFile(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}
