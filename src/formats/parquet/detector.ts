import { hasMagic } from "../sniff.js";
import type { Detector } from "../types.js";

export const PARQUET_MAGIC = [0x50, 0x41, 0x52, 0x31] as const;

export const parquetDetector: Detector = {
  detect(prefix) {
    return hasMagic(prefix, PARQUET_MAGIC) ? 100 : 0;
  },
};
