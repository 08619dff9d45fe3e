import { createHash } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

const JPEG_MAGIC = Buffer.from([0xff, 0xd8, 0xff]);
const PNG_MAGIC = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/**
 * Content-addressed store for notification icons. Notification servers take an
 * image path, so mirrored icon bytes are written once per distinct image.
 */
export class IconCache {
  private readonly dir: string;
  private readonly known = new Set<string>();
  private ready: Promise<void> | null = null;

  constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  async store(bytes: Buffer): Promise<string> {
    const digest = createHash('sha256').update(bytes).digest('hex');
    const filePath = path.join(this.dir, `${digest}${imageExtension(bytes)}`);

    if (this.known.has(digest)) {
      return filePath;
    }

    this.ready ??= fs.mkdir(this.dir, { recursive: true }).then(() => undefined);
    await this.ready;

    // wx: another process may have written the same digest already
    await fs.writeFile(filePath, bytes, { flag: 'wx' }).catch((error: unknown) => {
      if (!isFileExistsError(error)) {
        throw error;
      }
    });
    this.known.add(digest);
    return filePath;
  }
}

/** Phones send JPEG or PNG; anything unrecognized keeps a neutral extension. */
export function imageExtension(bytes: Buffer): string {
  if (bytes.subarray(0, 3).equals(JPEG_MAGIC)) {
    return '.jpg';
  }
  if (bytes.subarray(0, 8).equals(PNG_MAGIC)) {
    return '.png';
  }
  if (bytes.subarray(0, 4).toString('latin1') === 'GIF8') {
    return '.gif';
  }
  if (bytes.subarray(0, 4).toString('latin1') === 'RIFF' && bytes.subarray(8, 12).toString('latin1') === 'WEBP') {
    return '.webp';
  }
  return '.img';
}

function isFileExistsError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}
