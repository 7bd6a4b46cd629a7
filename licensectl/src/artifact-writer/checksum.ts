import { createHash } from "node:crypto";
import fs from "node:fs";

export type FileDigest = { sha256: string; bytes: number };

/** SHA-256 and size of a file on disk. */
export function fileDigest(filePath: string): FileDigest {
  const content = fs.readFileSync(filePath);
  return { sha256: createHash("sha256").update(content).digest("hex"), bytes: content.length };
}
