import type { MaterializedPayload } from "@steplog/contracts";

export type PayloadRole = "image" | "mask";

/** Where inside one record a heavy payload lives; stored instead of the bytes. */
export interface PayloadRef {
  index: number;
  role: PayloadRole;
}

export type DecodedValue =
  | { kind: "payload"; tag: string; type: "image"; ref: PayloadRef }
  | { kind: "scalar"; tag: string; type: "scalar"; value: number };

export interface DecodedRecord {
  step: number;
  values: DecodedValue[];
}

/** Decode and heavy-decode capabilities for one on-disk record format. */
export interface RecordFormat<TMessage> {
  readonly name: string;
  parse(payload: Uint8Array): TMessage;
  describe(message: TMessage, recordIndex: number): DecodedRecord;
  /** Must not touch engine state; runs inside a decode future. */
  materialize(message: TMessage, ref: PayloadRef, description: string): MaterializedPayload;
}
