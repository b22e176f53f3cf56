import { createHash } from "node:crypto";

/**
 * Serializes JSON-like data with sorted object keys and without undefined members,
 * so logically equal requests produce the same text.
 */
export const canonicalJson = (value: unknown): string => {
  if (value === undefined) {
    return "null";
  }

  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(",")}]`;
  }

  if (value !== null && typeof value === "object") {
    const members = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
      .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`);
    return `{${members.join(",")}}`;
  }

  return JSON.stringify(value);
};

/**
 * Content-addressed cache key for one stage request.
 */
export const stageFingerprint = (stage: string, input: unknown): string => {
  const digest = createHash("sha256")
    .update(stage)
    .update("\n")
    .update(canonicalJson(input))
    .digest("hex");
  return `stage-cache:${stage}:${digest}`;
};
