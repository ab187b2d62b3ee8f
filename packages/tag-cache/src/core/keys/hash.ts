import { createHash } from "node:crypto"

/**
 * 128-bit MD5 digest as lowercase hex. Used for key spreading only.
 */
export function md5Hex(input: string): string {
  return createHash("md5").update(input, "utf8").digest("hex")
}
