import { describe, expect, it } from "vitest";
import { eventFormat } from "../formats/eventFormat.js";
import { exampleFormat } from "../formats/exampleFormat.js";
import { decodeGrayPng, encodeGrayPng, imageContentType, maskColor, readPngSize } from "../formats/png.js";
import { encodeEvent, encodeExample } from "../formats/proto.js";

describe("event format", () => {
  const payload = encodeEvent({
    step: 7,
    wallTime: 1700000000,
    values: [
      { tag: "loss", simpleValue: 0.25 },
      { tag: "input/2/image", image: { height: 1, width: 1, encoded: Buffer.from("png-bytes") } },
    ],
  });

  it("splits summaries into scalars and image payload refs", () => {
    const message = eventFormat.parse(payload);
    expect(message.wallTime).toBe(1700000000);
    expect(eventFormat.describe(message, 0)).toEqual({
      step: 7,
      values: [
        { kind: "scalar", tag: "loss", type: "scalar", value: 0.25 },
        { kind: "payload", tag: "input/2/image", type: "image", ref: { index: 1, role: "image" } },
      ],
    });
  });

  it("materializes the encoded image bytes", () => {
    const message = eventFormat.parse(payload);
    const result = eventFormat.materialize(message, { index: 1, role: "image" }, "input/2");
    expect(result.kind).toBe("compressed");
    if (result.kind !== "compressed") return;
    expect(Buffer.from(result.bytes).toString()).toBe("png-bytes");
    expect(result.description).toBe("input/2");
  });

  it("reports refs that do not point at an image as unavailable", () => {
    const message = eventFormat.parse(payload);
    expect(eventFormat.materialize(message, { index: 0, role: "image" }, "loss")).toEqual({ kind: "unavailable" });
    expect(eventFormat.materialize(message, { index: 9, role: "image" }, "none")).toEqual({ kind: "unavailable" });
  });

  it("treats a missing step as step zero", () => {
    const message = eventFormat.parse(encodeEvent({ step: 0, values: [{ tag: "loss", simpleValue: 1 }] }));
    expect(eventFormat.describe(message, 5).step).toBe(0);
  });
});

describe("example format", () => {
  const rawPayload = encodeExample({
    height: 2,
    width: 2,
    identifier: "sample-1",
    label: 3,
    image_raw: new Uint8Array([10, 20, 30, 40]),
    mask_raw: new Uint8Array([0, 1, 2, 3, 4, 5, 6, 7]),
  });

  it("uses the record position as step and lists one tag per mask channel", () => {
    const message = exampleFormat.parse(rawPayload);
    expect(exampleFormat.describe(message, 4)).toEqual({
      step: 4,
      values: [
        { kind: "payload", tag: "image", type: "image", ref: { index: 0, role: "image" } },
        { kind: "payload", tag: "mask/0", type: "image", ref: { index: 0, role: "mask" } },
        { kind: "payload", tag: "mask/1", type: "image", ref: { index: 1, role: "mask" } },
      ],
    });
  });

  it("materializes a raw grayscale image with its metadata", () => {
    const message = exampleFormat.parse(rawPayload);
    const result = exampleFormat.materialize(message, { index: 0, role: "image" }, "image");
    expect(result.kind).toBe("raw");
    if (result.kind !== "raw") return;
    expect(Array.from(result.bytes)).toEqual([10, 20, 30, 40]);
    expect(result.isColor).toBe(false);
    expect(result.description).toBe("image\nName: sample-1\nLabel: 3\nCompressed: false\nSize: 2x2x1");
  });

  it("scales the selected raw mask channel", () => {
    const message = exampleFormat.parse(rawPayload);
    const result = exampleFormat.materialize(message, { index: 1, role: "mask" }, "mask/1");
    expect(result.kind).toBe("raw");
    if (result.kind !== "raw") return;
    expect(Array.from(result.bytes)).toEqual([124, 155, 186, 217]);
    expect(result.description).toBe("mask/1\nName: sample-1\nLabel: 3\nCompressed: false\nSize: 2x2x1");
  });

  it("rejects raw images whose size does not divide into 1 or 3 channels", () => {
    const message = exampleFormat.parse(encodeExample({ height: 2, width: 2, image_raw: new Uint8Array(8) }));
    expect(exampleFormat.materialize(message, { index: 0, role: "image" }, "image")).toEqual({ kind: "unavailable" });
  });

  it("crops and colours one channel of a compressed mask", () => {
    const stacked = encodeGrayPng({ width: 2, height: 4, pixels: new Uint8Array([0, 1, 2, 3, 11, 12, 1, 0]) });
    const message = exampleFormat.parse(encodeExample({ height: 2, width: 2, mask_compressed: stacked }));

    expect(exampleFormat.describe(message, 0).values.map((value) => value.tag)).toEqual(["mask/0", "mask/1"]);

    const result = exampleFormat.materialize(message, { index: 1, role: "mask" }, "mask/1");
    expect(result.kind).toBe("raw");
    if (result.kind !== "raw") return;
    expect(result.isColor).toBe(true);
    expect(Array.from(result.bytes)).toEqual([255, 237, 111, 255, 255, 255, 255, 255, 179, 141, 211, 199]);
    expect(result.description).toBe("mask/1\nName: None\nCompressed: true\nSize: 2x2x3");
  });

  it("passes a compressed image through", () => {
    const encoded = encodeGrayPng({ width: 1, height: 1, pixels: new Uint8Array([9]) });
    const message = exampleFormat.parse(encodeExample({ height: 1, width: 1, image_compressed: encoded }));
    const result = exampleFormat.materialize(message, { index: 0, role: "image" }, "image");
    expect(result.kind).toBe("compressed");
    if (result.kind !== "compressed") return;
    expect(Array.from(result.bytes)).toEqual(Array.from(encoded));
    expect(result.description).toBe("image\nName: None\nCompressed: true");
  });

  it("yields no values without usable dimensions", () => {
    const message = exampleFormat.parse(encodeExample({ image_raw: new Uint8Array(4) }));
    expect(exampleFormat.describe(message, 2)).toEqual({ step: 2, values: [] });
  });
});

describe("png helpers", () => {
  it("round-trips grayscale pixels and reads the header size", () => {
    const encoded = encodeGrayPng({ width: 3, height: 2, pixels: new Uint8Array([0, 50, 100, 150, 200, 250]) });
    expect(imageContentType(encoded)).toBe("image/png");
    expect(readPngSize(encoded)).toEqual({ width: 3, height: 2 });
    expect(Array.from(decodeGrayPng(encoded)?.pixels ?? [])).toEqual([0, 50, 100, 150, 200, 250]);
  });

  it("sniffs other image signatures", () => {
    expect(imageContentType(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe("image/jpeg");
    expect(imageContentType(Buffer.from("GIF89a"))).toBe("image/gif");
    expect(imageContentType(Buffer.from("text"))).toBe("application/octet-stream");
    expect(readPngSize(Buffer.from("text"))).toBeNull();
  });

  it("maps classes past the palette to white", () => {
    expect(maskColor(0)).toEqual([141, 211, 199]);
    expect(maskColor(40)).toEqual([255, 255, 255]);
  });
});
