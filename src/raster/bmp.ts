// Minimal BMP writer (BITMAPINFOHEADER, uncompressed). libvips ships no BMP saver.

const FILE_HEADER_SIZE = 14;
const INFO_HEADER_SIZE = 40;
const PIXELS_PER_METER_72_DPI = 2835;

/**
 * Encodes interleaved RGB or RGBA pixels as a bottom-up 24/32-bit BMP.
 */
export function encodeBmp(pixels: Uint8Array, width: number, height: number, channels: 3 | 4): Buffer {
  if (pixels.length < width * height * channels) {
    throw new Error(`BMP encode: expected ${width * height * channels} bytes, got ${pixels.length}`);
  }

  const rowSize = Math.ceil((width * channels) / 4) * 4;
  const imageSize = rowSize * height;
  const offset = FILE_HEADER_SIZE + INFO_HEADER_SIZE;
  const out = Buffer.alloc(offset + imageSize);

  out.write('BM', 0, 'ascii');
  out.writeUInt32LE(offset + imageSize, 2);
  out.writeUInt32LE(offset, 10);

  out.writeUInt32LE(INFO_HEADER_SIZE, 14);
  out.writeInt32LE(width, 18);
  out.writeInt32LE(height, 22);
  out.writeUInt16LE(1, 26);
  out.writeUInt16LE(channels * 8, 28);
  out.writeUInt32LE(0, 30); // BI_RGB
  out.writeUInt32LE(imageSize, 34);
  out.writeInt32LE(PIXELS_PER_METER_72_DPI, 38);
  out.writeInt32LE(PIXELS_PER_METER_72_DPI, 42);

  for (let y = 0; y < height; y++) {
    const srcRow = (height - 1 - y) * width * channels;
    const dstRow = offset + y * rowSize;
    for (let x = 0; x < width; x++) {
      const s = srcRow + x * channels;
      const d = dstRow + x * channels;
      out[d] = pixels[s + 2];
      out[d + 1] = pixels[s + 1];
      out[d + 2] = pixels[s];
      if (channels === 4) out[d + 3] = pixels[s + 3];
    }
  }

  return out;
}
