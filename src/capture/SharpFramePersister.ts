import sharp from 'sharp';
import type { FramePersister, PersistRequest } from '../recording/types';

/** Quality used for jpg and webp: compression 0 keeps full quality, 9 gives 55. */
export const qualityFromCompression = (compression: number) => 100 - compression * 5;

/** Encodes raw RGB(A) frames with sharp, which runs the encode on libuv's thread pool. */
export class SharpFramePersister implements FramePersister {
  async persist({ pixels, channels, region, destinationPath, format, compression }: PersistRequest) {
    const image = sharp(pixels, { raw: { width: region.width, height: region.height, channels } });
    switch (format) {
      case 'png':
        await image.png({ compressionLevel: compression }).toFile(destinationPath);
        return;
      case 'jpg':
        await image.jpeg({ quality: qualityFromCompression(compression) }).toFile(destinationPath);
        return;
      case 'webp':
        await image.webp({ quality: qualityFromCompression(compression) }).toFile(destinationPath);
        return;
    }
  }
}
