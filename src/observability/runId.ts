import crypto from "node:crypto";

export function createRunId(now = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}Z$/, "Z");
  return `run_${stamp}_${crypto.randomBytes(3).toString("hex")}`;
}
