import type { MaterializedPayload } from "@steplog/contracts";
import { decodeGrayPng, maskColor, readPngSize } from "./png.js";
import type { ExampleMessage, FeatureValue } from "./proto.js";
import { decodeExample } from "./proto.js";
import type { DecodedRecord, DecodedValue, PayloadRef, RecordFormat } from "./types.js";

const RAW_MASK_SCALE = Math.floor(255 / 8);

function firstBytes(feature: FeatureValue | undefined): Uint8Array | null {
  return feature?.kind === "bytes" ? (feature.values[0] ?? null) : null;
}

function firstInt(feature: FeatureValue | undefined): number | null {
  return feature?.kind === "int64" ? (feature.values[0] ?? null) : null;
}

interface ExampleFields {
  height: number;
  width: number;
  name: string | null;
  label: number | null;
  imageRaw: Uint8Array | null;
  imageCompressed: Uint8Array | null;
  maskRaw: Uint8Array | null;
  maskCompressed: Uint8Array | null;
}

function readFields(message: ExampleMessage): ExampleFields | null {
  const { features } = message;
  const height = firstInt(features.get("height"));
  const width = firstInt(features.get("width"));
  if (height === null || width === null || height <= 0 || width <= 0) return null;
  const identifier = firstBytes(features.get("identifier"));
  return {
    height,
    width,
    name: identifier ? Buffer.from(identifier).toString("utf8") : null,
    label: firstInt(features.get("label")),
    imageRaw: firstBytes(features.get("image_raw")),
    imageCompressed: firstBytes(features.get("image_compressed")),
    maskRaw: firstBytes(features.get("mask_raw")),
    maskCompressed: firstBytes(features.get("mask_compressed")),
  };
}

function maskChannelCount(fields: ExampleFields): number {
  if (fields.maskRaw) {
    return Math.floor(fields.maskRaw.length / (fields.width * fields.height));
  }
  if (fields.maskCompressed) {
    const size = readPngSize(fields.maskCompressed);
    return size ? Math.floor(size.height / fields.height) : 0;
  }
  return 0;
}

function header(description: string, fields: ExampleFields, compressed: boolean): string {
  let text = `${description}\nName: ${fields.name ?? "None"}`;
  if (fields.label !== null) text += `\nLabel: ${fields.label}`;
  return `${text}\nCompressed: ${compressed}`;
}

function rawImage(bytes: Uint8Array, fields: ExampleFields, description: string): MaterializedPayload {
  const area = fields.width * fields.height;
  const channels = Math.floor(bytes.length / area);
  if (bytes.length !== area * channels || (channels !== 1 && channels !== 3)) {
    return { kind: "unavailable" };
  }
  return {
    kind: "raw",
    bytes,
    width: fields.width,
    height: fields.height,
    isColor: channels === 3,
    description: `${description}\nSize: ${fields.height}x${fields.width}x${channels}`,
  };
}

function rawMask(bytes: Uint8Array, channel: number, fields: ExampleFields, description: string): MaterializedPayload {
  const area = fields.width * fields.height;
  const slice = bytes.subarray(channel * area, (channel + 1) * area);
  if (slice.length !== area) return { kind: "unavailable" };
  const scaled = new Uint8Array(area);
  for (let idx = 0; idx < area; idx += 1) {
    scaled[idx] = Math.min(255, (slice[idx] ?? 0) * RAW_MASK_SCALE);
  }
  return {
    kind: "raw",
    bytes: scaled,
    width: fields.width,
    height: fields.height,
    isColor: false,
    description: `${description}\nSize: ${fields.height}x${fields.width}x1`,
  };
}

function compressedMask(
  bytes: Uint8Array,
  channel: number,
  fields: ExampleFields,
  description: string,
): MaterializedPayload {
  const image = decodeGrayPng(bytes);
  if (!image || image.width < fields.width) return { kind: "unavailable" };
  const top = channel * fields.height;
  if (top + fields.height > image.height) return { kind: "unavailable" };

  const rgb = new Uint8Array(fields.width * fields.height * 3);
  for (let row = 0; row < fields.height; row += 1) {
    for (let col = 0; col < fields.width; col += 1) {
      const classValue = image.pixels[(top + row) * image.width + col] ?? 0;
      const [red, green, blue] = maskColor(classValue);
      const out = (row * fields.width + col) * 3;
      rgb[out] = red;
      rgb[out + 1] = green;
      rgb[out + 2] = blue;
    }
  }
  return {
    kind: "raw",
    bytes: rgb,
    width: fields.width,
    height: fields.height,
    isColor: true,
    description: `${description}\nSize: ${fields.height}x${fields.width}x3`,
  };
}

/**
 * `tensorflow.Example` records holding an image and optional packed masks.
 * The step of each record is its position in the file.
 */
export const exampleFormat: RecordFormat<ExampleMessage> = {
  name: "example",

  parse(payload) {
    return decodeExample(payload);
  },

  describe(message, recordIndex): DecodedRecord {
    const values: DecodedValue[] = [];
    const fields = readFields(message);
    if (fields) {
      if (fields.imageRaw || fields.imageCompressed) {
        values.push({ kind: "payload", tag: "image", type: "image", ref: { index: 0, role: "image" } });
      }
      const channels = maskChannelCount(fields);
      for (let channel = 0; channel < channels; channel += 1) {
        values.push({
          kind: "payload",
          tag: `mask/${channel}`,
          type: "image",
          ref: { index: channel, role: "mask" },
        });
      }
    }
    return { step: recordIndex, values };
  },

  materialize(message, ref: PayloadRef, description): MaterializedPayload {
    const fields = readFields(message);
    if (!fields) return { kind: "unavailable" };

    if (ref.role === "image") {
      if (fields.imageRaw) return rawImage(fields.imageRaw, fields, header(description, fields, false));
      if (fields.imageCompressed) {
        return { kind: "compressed", bytes: fields.imageCompressed, description: header(description, fields, true) };
      }
      return { kind: "unavailable" };
    }

    if (fields.maskRaw) return rawMask(fields.maskRaw, ref.index, fields, header(description, fields, false));
    if (fields.maskCompressed) {
      return compressedMask(fields.maskCompressed, ref.index, fields, header(description, fields, true));
    }
    return { kind: "unavailable" };
  },
};
