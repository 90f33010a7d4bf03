import path from 'path';
import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import { tempRoot } from '../test/fakes';
import { qualityFromCompression, SharpFramePersister } from './SharpFramePersister';

const region = { x: 0, y: 0, width: 2, height: 1 };
const pixels = Buffer.from([255, 0, 0, 0, 0, 255]);

describe('SharpFramePersister', () => {
  it.each([
    ['png', 'png'],
    ['jpg', 'jpeg'],
    ['webp', 'webp'],
  ] as const)('encodes raw RGB frames as %s', async (format, sharpFormat) => {
    const destinationPath = path.join(tempRoot(), `file_0.${format}`);
    await new SharpFramePersister().persist({ pixels, channels: 3, region, destinationPath, format, compression: 6 });
    const metadata = await sharp(destinationPath).metadata();
    expect(metadata.format).toBe(sharpFormat);
    expect([metadata.width, metadata.height]).toEqual([2, 1]);
  });

  it('derives lossy quality from the compression level', () => {
    expect(qualityFromCompression(0)).toBe(100);
    expect(qualityFromCompression(6)).toBe(70);
    expect(qualityFromCompression(9)).toBe(55);
  });
});
