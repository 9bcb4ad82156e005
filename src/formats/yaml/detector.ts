import { leadingText, looksLikeYaml } from "../sniff.js";
import type { Detector } from "../types.js";

/**
 * Scores: 100 for a `%` directive or a `---` marker, 90 for a `key: value`
 * first line, 0 otherwise (including empty input, left to JSON).
 */
export const yamlDetector: Detector = {
  detect(prefix) {
    const head = leadingText(prefix);
    if (head === "") return 0;
    if (head[0] === "%" || head.startsWith("---")) return 100;
    if (head[0] === "{" || head[0] === "[") return 0;
    return looksLikeYaml(head) ? 90 : 0;
  },
};
