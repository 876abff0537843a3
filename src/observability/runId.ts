import crypto from "node:crypto";

export function createRunId(now = new Date(), command = "run"): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
  return `${command}_${stamp}_${crypto.randomBytes(3).toString("hex")}`;
}
