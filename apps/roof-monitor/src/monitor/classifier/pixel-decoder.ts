import sharp from "sharp";

/**
 * Decodes an encoded image into `size * size` 8-bit grayscale pixels,
 * row-major.
 */
export type PixelDecoder = (data: Buffer, size: number) => Promise<Uint8Array>;

export const decodeGrayscalePixels: PixelDecoder = async (data, size) => {
  const { data: raw, info } = await sharp(data)
    .flatten({ background: "#000000" })
    .grayscale()
    .resize(size, size, { fit: "fill" })
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels === 1) {
    return new Uint8Array(raw);
  }

  const pixels = new Uint8Array(info.width * info.height);
  for (let index = 0; index < pixels.length; index += 1) {
    pixels[index] = raw[index * info.channels];
  }
  return pixels;
};
