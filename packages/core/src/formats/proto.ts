import { fileURLToPath } from "node:url";
import protobuf, { type Type } from "protobufjs";
import { asArray, asBytes, asNumber, asRecord } from "../utils.js";

export const RECORDS_PROTO_PATH = fileURLToPath(new URL("../../proto/records.proto", import.meta.url));

export interface RecordTypes {
  event: Type;
  example: Type;
}

let cached: RecordTypes | null = null;

/** Loads the record schema once per process. */
export function recordTypes(): RecordTypes {
  if (!cached) {
    const root = protobuf.loadSync(RECORDS_PROTO_PATH);
    cached = {
      event: root.lookupType("tensorflow.Event"),
      example: root.lookupType("tensorflow.Example"),
    };
  }
  return cached;
}

const TO_OBJECT_OPTIONS = { longs: Number, oneofs: true } as const;

export interface SummaryImage {
  height: number;
  width: number;
  colorspace: number;
  encoded: Uint8Array;
}

export interface SummaryValue {
  tag: string;
  simpleValue: number | null;
  image: SummaryImage | null;
}

export interface EventMessage {
  step: number;
  wallTime: number;
  values: SummaryValue[];
}

export function decodeEvent(payload: Uint8Array): EventMessage {
  const type = recordTypes().event;
  const raw = asRecord(type.toObject(type.decode(payload), TO_OBJECT_OPTIONS));
  const summary = asRecord(raw.summary);
  return {
    step: asNumber(raw.step) ?? 0,
    wallTime: asNumber(raw.wallTime) ?? 0,
    values: asArray(summary.value).map((item) => {
      const value = asRecord(item);
      const image = value.image === undefined ? null : asRecord(value.image);
      return {
        tag: typeof value.tag === "string" ? value.tag : "",
        simpleValue: asNumber(value.simpleValue),
        image: image
          ? {
              height: asNumber(image.height) ?? 0,
              width: asNumber(image.width) ?? 0,
              colorspace: asNumber(image.colorspace) ?? 0,
              encoded: asBytes(image.encodedImageString) ?? new Uint8Array(0),
            }
          : null,
      };
    }),
  };
}

export type FeatureValue =
  | { kind: "bytes"; values: Uint8Array[] }
  | { kind: "float"; values: number[] }
  | { kind: "int64"; values: number[] };

export interface ExampleMessage {
  features: Map<string, FeatureValue>;
}

function toFeature(input: unknown): FeatureValue | null {
  const feature = asRecord(input);
  if (feature.bytesList !== undefined) {
    const values = asArray(asRecord(feature.bytesList).value)
      .map(asBytes)
      .filter((item): item is Uint8Array => item !== null);
    return { kind: "bytes", values };
  }
  if (feature.int64List !== undefined) {
    const values = asArray(asRecord(feature.int64List).value)
      .map(asNumber)
      .filter((item): item is number => item !== null);
    return { kind: "int64", values };
  }
  if (feature.floatList !== undefined) {
    const values = asArray(asRecord(feature.floatList).value)
      .map(asNumber)
      .filter((item): item is number => item !== null);
    return { kind: "float", values };
  }
  return null;
}

export function decodeExample(payload: Uint8Array): ExampleMessage {
  const type = recordTypes().example;
  const raw = asRecord(type.toObject(type.decode(payload), TO_OBJECT_OPTIONS));
  const features = new Map<string, FeatureValue>();
  for (const [name, value] of Object.entries(asRecord(asRecord(raw.features).feature))) {
    const feature = toFeature(value);
    if (feature) features.set(name, feature);
  }
  return { features };
}

/** Encodes an event from plain fields; used by tooling and tests to write fixtures. */
export function encodeEvent(input: {
  step: number;
  wallTime?: number;
  values: Array<{ tag: string; simpleValue?: number; image?: { height: number; width: number; encoded: Uint8Array } }>;
}): Uint8Array {
  const type = recordTypes().event;
  const message = type.fromObject({
    step: input.step,
    wallTime: input.wallTime ?? 0,
    summary: {
      value: input.values.map((value) => ({
        tag: value.tag,
        ...(value.simpleValue !== undefined ? { simpleValue: value.simpleValue } : {}),
        ...(value.image
          ? {
              image: {
                height: value.image.height,
                width: value.image.width,
                colorspace: 0,
                encodedImageString: value.image.encoded,
              },
            }
          : {}),
      })),
    },
  });
  return type.encode(message).finish();
}

export type FeatureInput = Uint8Array | string | number | number[];

/**
 * Encodes an example. Strings and byte arrays become bytes lists, integers and
 * integer arrays become int64 lists.
 */
export function encodeExample(features: Record<string, FeatureInput>): Uint8Array {
  const type = recordTypes().example;
  const feature: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(features)) {
    if (typeof value === "string") {
      feature[name] = { bytesList: { value: [Buffer.from(value, "utf8")] } };
    } else if (value instanceof Uint8Array) {
      feature[name] = { bytesList: { value: [value] } };
    } else {
      feature[name] = { int64List: { value: Array.isArray(value) ? value : [value] } };
    }
  }
  const message = type.fromObject({ features: { feature } });
  return type.encode(message).finish();
}
