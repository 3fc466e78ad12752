/**
 * @module png-codec
 * PNG encoder/decoder on top of fflate's zlib streams.
 *
 * Decodes 8-bit grayscale, gray+alpha, RGB and RGBA (non-interlaced, filters 0-4)
 * into straight RGBA. Always encodes 8-bit RGBA with filter 0.
 */

import { unzlibSync, zlibSync } from 'fflate';
import type { RgbaImage } from '@cutout/types';

const SIGNATURE = Uint8Array.of(137, 80, 78, 71, 13, 10, 26, 10);

const CRC_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/** Samples per pixel of each supported 8-bit color type. */
const CHANNELS_BY_COLOR_TYPE: Record<number, number> = {
  0: 1,
  2: 3,
  4: 2,
  6: 4,
};

interface Chunk {
  type: string;
  data: Uint8Array;
}

/** Serialize one chunk: length, type, payload, CRC over type + payload. */
function encodeChunk(type: string, data: Uint8Array): Uint8Array {
  const out = new Uint8Array(12 + data.length);
  const view = new DataView(out.buffer);
  view.setUint32(0, data.length);
  for (let i = 0; i < 4; i++) out[4 + i] = type.charCodeAt(i);
  out.set(data, 8);
  view.setUint32(8 + data.length, crc32(out.subarray(4, 8 + data.length)));
  return out;
}

function* readChunks(png: Uint8Array): Generator<Chunk> {
  const view = new DataView(png.buffer, png.byteOffset, png.byteLength);
  let offset = SIGNATURE.length;
  while (offset + 8 <= png.length) {
    const length = view.getUint32(offset);
    const type = String.fromCharCode(...png.subarray(offset + 4, offset + 8));
    const start = offset + 8;
    if (start + length > png.length) {
      throw new Error(`PNG chunk ${type} is truncated`);
    }
    yield { type, data: png.subarray(start, start + length) };
    offset = start + length + 4;
  }
}

function concat(parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let pos = 0;
  for (const part of parts) {
    out.set(part, pos);
    pos += part.length;
  }
  return out;
}

/**
 * Encode a tightly packed RGBA image as PNG.
 * @throws Error when the buffer length does not match the dimensions.
 */
export function encodePng(image: RgbaImage): Uint8Array {
  const { data, width, height } = image;
  if (data.length !== width * height * 4) {
    throw new Error(`Image data length (${data.length}) does not match dimensions (${width}x${height}x4)`);
  }

  const header = new Uint8Array(13);
  const headerView = new DataView(header.buffer);
  headerView.setUint32(0, width);
  headerView.setUint32(4, height);
  header[8] = 8; // bit depth
  header[9] = 6; // RGBA

  const rowBytes = width * 4;
  const scanlines = new Uint8Array(height * (rowBytes + 1));
  for (let y = 0; y < height; y++) {
    scanlines.set(data.subarray(y * rowBytes, (y + 1) * rowBytes), y * (rowBytes + 1) + 1);
  }

  return concat([
    SIGNATURE,
    encodeChunk('IHDR', header),
    encodeChunk('IDAT', zlibSync(scanlines)),
    encodeChunk('IEND', new Uint8Array(0)),
  ]);
}

function paeth(left: number, up: number, upLeft: number): number {
  const p = left + up - upLeft;
  const pa = Math.abs(p - left);
  const pb = Math.abs(p - up);
  const pc = Math.abs(p - upLeft);
  if (pa <= pb && pa <= pc) return left;
  return pb <= pc ? up : upLeft;
}

/** Reverse the per-row filters, returning the packed samples. */
function unfilter(raw: Uint8Array, rowBytes: number, height: number, channels: number): Uint8Array {
  const samples = new Uint8Array(rowBytes * height);

  for (let y = 0; y < height; y++) {
    const filter = raw[y * (rowBytes + 1)];
    const inRow = y * (rowBytes + 1) + 1;
    const outRow = y * rowBytes;
    const prevRow = outRow - rowBytes;

    for (let x = 0; x < rowBytes; x++) {
      const left = x >= channels ? samples[outRow + x - channels] : 0;
      const up = y > 0 ? samples[prevRow + x] : 0;
      const upLeft = x >= channels && y > 0 ? samples[prevRow + x - channels] : 0;

      let predicted: number;
      switch (filter) {
        case 0:
          predicted = 0;
          break;
        case 1:
          predicted = left;
          break;
        case 2:
          predicted = up;
          break;
        case 3:
          predicted = (left + up) >> 1;
          break;
        case 4:
          predicted = paeth(left, up, upLeft);
          break;
        default:
          throw new Error(`Unsupported PNG filter type: ${filter}`);
      }
      samples[outRow + x] = (raw[inRow + x] + predicted) & 0xff;
    }
  }
  return samples;
}

/** Widen packed samples to RGBA. */
function expandToRgba(samples: Uint8Array, pixelCount: number, channels: number): Uint8Array {
  if (channels === 4) return samples;

  const data = new Uint8Array(pixelCount * 4);
  for (let i = 0, s = 0, d = 0; i < pixelCount; i++, s += channels, d += 4) {
    if (channels >= 3) {
      data[d] = samples[s];
      data[d + 1] = samples[s + 1];
      data[d + 2] = samples[s + 2];
      data[d + 3] = 255;
    } else {
      data[d] = data[d + 1] = data[d + 2] = samples[s];
      data[d + 3] = channels === 2 ? samples[s + 1] : 255;
    }
  }
  return data;
}

/**
 * Decode a PNG file into straight RGBA.
 * @throws Error on a bad signature, an unsupported format, or truncated data.
 */
export function decodePng(png: Uint8Array): RgbaImage {
  if (png.length < SIGNATURE.length || SIGNATURE.some((byte, i) => png[i] !== byte)) {
    throw new Error('Invalid PNG signature');
  }

  let width = 0;
  let height = 0;
  let channels = 0;
  const idat: Uint8Array[] = [];

  for (const { type, data } of readChunks(png)) {
    if (type === 'IHDR') {
      const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
      width = view.getUint32(0);
      height = view.getUint32(4);
      const bitDepth = data[8];
      const colorType = data[9];
      channels = CHANNELS_BY_COLOR_TYPE[colorType] ?? 0;
      if (bitDepth !== 8 || channels === 0) {
        throw new Error(`Unsupported PNG format: bitDepth=${bitDepth}, colorType=${colorType}`);
      }
      if (data[12] !== 0) {
        throw new Error('Interlaced PNG images are not supported');
      }
    } else if (type === 'IDAT') {
      idat.push(data);
    } else if (type === 'IEND') {
      break;
    }
  }

  if (width === 0 || height === 0) {
    throw new Error('PNG missing IHDR chunk');
  }

  const raw = unzlibSync(concat(idat));
  const rowBytes = width * channels;
  if (raw.length < height * (rowBytes + 1)) {
    throw new Error('PNG image data is truncated');
  }

  const samples = unfilter(raw, rowBytes, height, channels);
  return { data: expandToRgba(samples, width * height, channels), width, height };
}
