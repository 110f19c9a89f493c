/**
 * Output naming — derives one file base name per record.
 */

import { OutputWriteError } from "../shared/errors.js";
import type { CollisionPolicy, FieldRecord } from "../shared/types.js";

export const DEFAULT_NAME_FIELDS = ["name", "surname"];

const UNSAFE_CHARS = /[\/\\:*?"<>|\x00-\x1f]/g;

export function sanitizeFileName(name: string): string {
  return name.replace(UNSAFE_CHARS, "_").replace(/\s+/g, " ").trim();
}

/**
 * Base name for a record: the designated fields joined with "_", an empty
 * value standing in as "no<field>" ({name: "Ana"} → "Ana_nosurname").
 * When the record has none of the fields the 1-based index is used.
 */
export function buildOutputName(
  record: FieldRecord,
  index: number,
  nameFields: string[] = DEFAULT_NAME_FIELDS,
): string {
  const present = nameFields.filter((f) => Object.hasOwn(record, f));
  if (present.length === 0) return `record_${index + 1}`;

  const parts = nameFields.map((f) => {
    const value = sanitizeFileName(record[f] ?? "");
    return value || `no${f}`;
  });
  return parts.join("_");
}

/**
 * Tracks names handed out during one run and applies the collision policy.
 * Names are compared case-insensitively, as on Windows and macOS file systems.
 */
export class OutputNamer {
  private readonly used = new Set<string>();

  constructor(private readonly policy: CollisionPolicy = "suffix") {}

  claim(baseName: string): string {
    let name = baseName;
    if (this.used.has(name.toLowerCase())) {
      if (this.policy === "fail") {
        throw new OutputWriteError(`Output name "${baseName}" is already used by an earlier record`);
      }
      if (this.policy === "suffix") {
        let n = 2;
        while (this.used.has(`${baseName}_${n}`.toLowerCase())) n++;
        name = `${baseName}_${n}`;
      }
    }
    this.used.add(name.toLowerCase());
    return name;
  }
}
