/**
 * Image XObject walker.
 *
 * Collects every image a page references, in page order and then in the
 * order of the page's XObject dictionary, descending into form XObjects.
 * - DCTDecode / JPXDecode streams: the raw bytes are the file, written as-is
 * - everything pdf-lib can decode (Flate, LZW, RunLength, ASCII85, hex or no
 *   filter): decoded and wrapped as PNG
 *
 * The encoded stream bytes are what gets hashed, so two copies of the same
 * embedded stream always collide, and nothing is decoded until the image is
 * known to be new.
 */

import {
  PDFArray,
  PDFDict,
  PDFDocument,
  PDFName,
  PDFNumber,
  PDFRawStream,
  PDFRef,
  PDFStream,
  decodePDFRawStream,
} from 'pdf-lib';
import type { PDFObject } from 'pdf-lib';
import { deflate } from 'pako';
import type { EmbeddedImage } from '../parser/image-extractor.js';
import { ImageExtractionError, errorMessage } from '../shared/errors.js';

const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

const PASSTHROUGH_FILTERS: Record<string, string> = {
  DCTDecode: 'jpeg',
  JPXDecode: 'jpx',
};

const CRC_TABLE: Uint32Array = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c;
  }
  return table;
})();

function crc32(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (let i = 0; i < data.length; i++) {
    crc = CRC_TABLE[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function pngChunk(type: string, data: Uint8Array): Uint8Array {
  const chunk = new Uint8Array(12 + data.length);
  const view = new DataView(chunk.buffer);
  view.setUint32(0, data.length);
  for (let i = 0; i < 4; i++) {
    chunk[4 + i] = type.charCodeAt(i);
  }
  chunk.set(data, 8);
  view.setUint32(8 + data.length, crc32(chunk.subarray(4, 8 + data.length)));
  return chunk;
}

/** PNG colour type: 0 = greyscale, 2 = RGB */
export type PngColorType = 0 | 2;

export interface RasterLayout {
  width: number;
  height: number;
  colorType: PngColorType;
  bitsPerComponent: number;
}

/**
 * Wraps greyscale or RGB samples into a PNG file.
 *
 * `prefiltered` samples already carry a filter-type byte per scanline, which
 * is what a Flate stream with a PNG predictor (>= 10) inflates to.
 */
export function encodePng(samples: Uint8Array, layout: RasterLayout, prefiltered = false): Uint8Array {
  const { width, height, colorType, bitsPerComponent } = layout;
  const channels = colorType === 0 ? 1 : 3;
  const rowBytes = Math.ceil((width * channels * bitsPerComponent) / 8);
  const expected = (prefiltered ? rowBytes + 1 : rowBytes) * height;

  if (samples.length < expected) {
    throw new ImageExtractionError(
      `Image data too short: expected ${expected} bytes for ${width}x${height}, got ${samples.length}`,
    );
  }

  let scanlines: Uint8Array;
  if (prefiltered) {
    scanlines = samples.subarray(0, expected);
  } else {
    // Every scanline starts with filter type 0 (None)
    scanlines = new Uint8Array(height * (rowBytes + 1));
    for (let row = 0; row < height; row++) {
      scanlines.set(samples.subarray(row * rowBytes, (row + 1) * rowBytes), row * (rowBytes + 1) + 1);
    }
  }

  const header = new Uint8Array(13);
  const view = new DataView(header.buffer);
  view.setUint32(0, width);
  view.setUint32(4, height);
  header[8] = bitsPerComponent;
  header[9] = colorType;

  const parts = [
    PNG_SIGNATURE,
    pngChunk('IHDR', header),
    pngChunk('IDAT', deflate(scanlines)),
    pngChunk('IEND', new Uint8Array(0)),
  ];
  const png = new Uint8Array(parts.reduce((sum, p) => sum + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    png.set(part, offset);
    offset += part.length;
  }
  return png;
}

function cmykToRgb(cmyk: Uint8Array, pixelCount: number): Uint8Array {
  const rgb = new Uint8Array(pixelCount * 3);
  for (let i = 0; i < pixelCount; i++) {
    const k = 1 - cmyk[i * 4 + 3] / 255;
    rgb[i * 3] = Math.round(255 * (1 - cmyk[i * 4] / 255) * k);
    rgb[i * 3 + 1] = Math.round(255 * (1 - cmyk[i * 4 + 1] / 255) * k);
    rgb[i * 3 + 2] = Math.round(255 * (1 - cmyk[i * 4 + 2] / 255) * k);
  }
  return rgb;
}

function resolve(doc: PDFDocument, obj: PDFObject | undefined): PDFObject | undefined {
  return obj instanceof PDFRef ? doc.context.lookup(obj) : obj;
}

function nameOf(obj: PDFObject | undefined): string | undefined {
  return obj instanceof PDFName ? obj.decodeText() : undefined;
}

function numberOf(obj: PDFObject | undefined): number | undefined {
  return obj instanceof PDFNumber ? obj.asNumber() : undefined;
}

function filterNames(doc: PDFDocument, dict: PDFDict): string[] {
  const filter = resolve(doc, dict.get(PDFName.of('Filter')));
  if (filter instanceof PDFName) return [filter.decodeText()];
  if (filter instanceof PDFArray) {
    return filter.asArray().flatMap((f) => {
      const name = nameOf(resolve(doc, f));
      return name ? [name] : [];
    });
  }
  return [];
}

type ColorModel = 'gray' | 'rgb' | 'cmyk';

function colorModel(doc: PDFDocument, dict: PDFDict): ColorModel {
  if (dict.get(PDFName.of('ImageMask'))?.toString() === 'true') return 'gray';

  const space = resolve(doc, dict.get(PDFName.of('ColorSpace')));
  if (space === undefined) return 'gray';

  let components: number | undefined;
  const name = nameOf(space);
  if (name === 'DeviceGray' || name === 'CalGray') components = 1;
  else if (name === 'DeviceRGB' || name === 'CalRGB') components = 3;
  else if (name === 'DeviceCMYK') components = 4;
  else if (space instanceof PDFArray && nameOf(resolve(doc, space.get(0))) === 'ICCBased') {
    const profile = resolve(doc, space.get(1));
    if (profile instanceof PDFStream) {
      components = numberOf(resolve(doc, profile.dict.get(PDFName.of('N'))));
    }
  }

  switch (components) {
    case 1:
      return 'gray';
    case 3:
      return 'rgb';
    case 4:
      return 'cmyk';
    default:
      throw new ImageExtractionError(`Unsupported image colour space ${space.toString()}`);
  }
}

function toPng(doc: PDFDocument, stream: PDFRawStream): Uint8Array {
  const dict = stream.dict;
  const width = numberOf(resolve(doc, dict.get(PDFName.of('Width')))) ?? 0;
  const height = numberOf(resolve(doc, dict.get(PDFName.of('Height')))) ?? 0;
  const isMask = dict.get(PDFName.of('ImageMask'))?.toString() === 'true';
  const bitsPerComponent = isMask ? 1 : (numberOf(resolve(doc, dict.get(PDFName.of('BitsPerComponent')))) ?? 8);

  if (width <= 0 || height <= 0) {
    throw new ImageExtractionError(`Image has invalid dimensions ${width}x${height}`);
  }

  const model = colorModel(doc, dict);
  const predictor = predictorOf(doc, dict);
  if (predictor > 1 && (predictor < 10 || model === 'cmyk')) {
    throw new ImageExtractionError(`Unsupported predictor ${predictor} for ${model} image`);
  }

  let samples = decodePDFRawStream(stream).decode();

  if (model === 'cmyk') {
    if (bitsPerComponent !== 8) {
      throw new ImageExtractionError(`Unsupported CMYK image depth ${bitsPerComponent}`);
    }
    samples = cmykToRgb(samples, width * height);
    return encodePng(samples, { width, height, colorType: 2, bitsPerComponent: 8 });
  }

  return encodePng(
    samples,
    { width, height, colorType: model === 'gray' ? 0 : 2, bitsPerComponent },
    predictor >= 10,
  );
}

function predictorOf(doc: PDFDocument, dict: PDFDict): number {
  let params = resolve(doc, dict.get(PDFName.of('DecodeParms')));
  if (params instanceof PDFArray) params = resolve(doc, params.get(0));
  if (!(params instanceof PDFDict)) return 1;
  return numberOf(resolve(doc, params.get(PDFName.of('Predictor')))) ?? 1;
}

function describeImage(doc: PDFDocument, stream: PDFRawStream, pageIndex: number, name: string): EmbeddedImage {
  const filters = filterNames(doc, stream.dict);
  const encoded = stream.contents;

  const passthrough = filters.length === 1 ? PASSTHROUGH_FILTERS[filters[0]] : undefined;
  if (passthrough) {
    return { pageIndex, name, encoded, extension: passthrough, toFileBytes: () => encoded };
  }
  if (filters.some((f) => f in PASSTHROUGH_FILTERS)) {
    throw new ImageExtractionError(`Unsupported filter chain [${filters.join(', ')}] on image '${name}'`);
  }

  return {
    pageIndex,
    name,
    encoded,
    extension: 'png',
    toFileBytes: () => {
      try {
        return toPng(doc, stream);
      } catch (err) {
        if (err instanceof ImageExtractionError) throw err;
        throw new ImageExtractionError(
          `Failed to decode image '${name}' on page ${pageIndex + 1}: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    },
  };
}

function* walkXObjects(
  doc: PDFDocument,
  resources: PDFDict | undefined,
  pageIndex: number,
  visited: Set<PDFObject>,
): Generator<EmbeddedImage> {
  if (!resources) return;
  const xObjects = resolve(doc, resources.get(PDFName.of('XObject')));
  if (!(xObjects instanceof PDFDict)) return;

  for (const [key, value] of xObjects.entries()) {
    const stream = resolve(doc, value);
    if (!(stream instanceof PDFStream) || visited.has(stream)) continue;
    visited.add(stream);

    const subtype = nameOf(stream.dict.get(PDFName.of('Subtype')));
    if (subtype === 'Image') {
      if (!(stream instanceof PDFRawStream)) {
        throw new ImageExtractionError(`Image '${key.decodeText()}' on page ${pageIndex + 1} has no raw stream data`);
      }
      yield describeImage(doc, stream, pageIndex, key.decodeText());
    } else if (subtype === 'Form') {
      const formResources = resolve(doc, stream.dict.get(PDFName.of('Resources')));
      yield* walkXObjects(doc, formResources instanceof PDFDict ? formResources : undefined, pageIndex, visited);
    }
  }
}

/** Every image resource of the document, in page order */
export function* collectEmbeddedImages(doc: PDFDocument): Generator<EmbeddedImage> {
  const pages = doc.getPages();
  for (let pageIndex = 0; pageIndex < pages.length; pageIndex++) {
    // Streams shared between pages are listed again on each page; the
    // content hash takes care of those repeats.
    yield* walkXObjects(doc, pages[pageIndex].node.Resources(), pageIndex, new Set());
  }
}
