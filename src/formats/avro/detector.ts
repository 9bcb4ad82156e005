import { hasMagic } from "../sniff.js";
import type { Detector } from "../types.js";

/** Object container files open with "Obj" followed by version byte 1. */
export const AVRO_MAGIC = [0x4f, 0x62, 0x6a, 0x01] as const;

export const avroDetector: Detector = {
  detect(prefix) {
    return hasMagic(prefix, AVRO_MAGIC) ? 100 : 0;
  },
};
