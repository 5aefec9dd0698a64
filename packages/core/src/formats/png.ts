import { PNG } from "pngjs";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export function isPng(bytes: Uint8Array): boolean {
  return bytes.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((value, idx) => bytes[idx] === value);
}

/** Width and height from the IHDR chunk, without decoding pixel data. */
export function readPngSize(bytes: Uint8Array): { width: number; height: number } | null {
  if (!isPng(bytes) || bytes.length < 24) return null;
  const view = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (view.toString("latin1", 12, 16) !== "IHDR") return null;
  return { width: view.readUInt32BE(16), height: view.readUInt32BE(20) };
}

/** Sniffs a content type for an encoded image blob. */
export function imageContentType(bytes: Uint8Array): string {
  if (isPng(bytes)) return "image/png";
  if (bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) return "image/jpeg";
  if (bytes[0] === 0x47 && bytes[1] === 0x49 && bytes[2] === 0x46) return "image/gif";
  return "application/octet-stream";
}

export interface GrayImage {
  width: number;
  height: number;
  /** One byte per pixel, row-major. */
  pixels: Uint8Array;
}

/** Decodes an 8-bit grayscale PNG. Any other colour type returns null. */
export function decodeGrayPng(bytes: Uint8Array): GrayImage | null {
  const png = PNG.sync.read(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  if (png.color || png.alpha || png.palette || png.depth !== 8) return null;
  const pixels = new Uint8Array(png.width * png.height);
  for (let idx = 0; idx < pixels.length; idx += 1) {
    pixels[idx] = png.data[idx * 4] ?? 0;
  }
  return { width: png.width, height: png.height, pixels };
}

/** Encodes an 8-bit grayscale PNG from one byte per pixel. */
export function encodeGrayPng(image: GrayImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(image.pixels);
  return PNG.sync.write(png, { colorType: 0, inputColorType: 0, inputHasAlpha: false });
}

const MASK_PALETTE: ReadonlyArray<readonly [number, number, number]> = [
  [141, 211, 199],
  [255, 255, 179],
  [190, 186, 218],
  [251, 128, 114],
  [128, 177, 211],
  [253, 180, 98],
  [179, 222, 105],
  [252, 205, 229],
  [217, 217, 217],
  [188, 128, 189],
  [204, 235, 197],
  [255, 237, 111],
];

const WHITE = [255, 255, 255] as const;

/** RGB colour for a mask class value; classes past the palette are white. */
export function maskColor(classValue: number): readonly [number, number, number] {
  return MASK_PALETTE[classValue] ?? WHITE;
}
