import type { MaterializedPayload } from "@steplog/contracts";
import { decodeEvent, type EventMessage } from "./proto.js";
import type { DecodedRecord, DecodedValue, PayloadRef, RecordFormat } from "./types.js";

/** `tensorflow.Event` summaries: images become per-step entries, simple values scalars. */
export const eventFormat: RecordFormat<EventMessage> = {
  name: "event",

  parse(payload) {
    return decodeEvent(payload);
  },

  describe(message): DecodedRecord {
    const values: DecodedValue[] = [];
    message.values.forEach((value, index) => {
      if (value.image) {
        values.push({ kind: "payload", tag: value.tag, type: "image", ref: { index, role: "image" } });
      } else if (value.simpleValue !== null) {
        values.push({ kind: "scalar", tag: value.tag, type: "scalar", value: value.simpleValue });
      }
    });
    return { step: message.step, values };
  },

  materialize(message, ref: PayloadRef, description): MaterializedPayload {
    const image = message.values[ref.index]?.image;
    if (ref.role !== "image" || !image) return { kind: "unavailable" };
    return { kind: "compressed", bytes: image.encoded, description };
  },
};
