import { leadingText, looksLikeYaml } from "../sniff.js";
import type { Detector } from "../types.js";

/**
 * Scores: 100 for a leading `{` or `[`, 80 for empty input, 0 when the text
 * looks like YAML, 50 for anything else (a bare JSON scalar).
 */
export const jsonDetector: Detector = {
  detect(prefix) {
    const head = leadingText(prefix);
    if (head === "") return 80;

    const first = head[0];
    if (first === "{" || first === "[") return 100;
    if (first === "%" || head.startsWith("---")) return 0;
    if (looksLikeYaml(head)) return 0;
    return 50;
  },
};
