/**
 * Run Configuration
 *
 * Merges command-line flags with environment fallbacks and validates the
 * result. Flags take priority over environment variables:
 *
 *   --template / FILLER_TEMPLATE
 *   --data     / FILLER_DATA
 *   --out      / FILLER_OUT
 *   --logo     / FILLER_LOGO
 *   --soffice  / FILLER_SOFFICE
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

export const FillerConfigSchema = z.object({
  template: z.string({ required_error: "is required" }).min(1),
  data: z.string({ required_error: "is required" }).min(1),
  out: z.string({ required_error: "is required" }).min(1),
  logo: z.string().min(1).optional(),
  nameFields: z.array(z.string().min(1)).min(1).default(["name", "surname"]),
  onCollision: z.enum(["suffix", "overwrite", "fail"]).default("suffix"),
  mergeRuns: z.boolean().default(false),
  pdf: z.boolean().default(true),
  keepPdf: z.boolean().default(false),
  strict: z.boolean().default(false),
  requiredFields: z.array(z.string().min(1)).default([]),
  dateFields: z.array(z.string().min(1)).default([]),
  delimiter: z.string().length(1, "must be a single character").default(","),
  rawHeaders: z.boolean().default(false),
  soffice: z.string().min(1).default("soffice"),
});

export type FillerConfig = z.infer<typeof FillerConfigSchema>;

export const USAGE = `Usage: contract-fill --template <docx> --data <xlsx|csv|json|jsonl> --out <dir> [options]

Options:
  -t, --template <path>      DOCX template with {field} placeholders
  -d, --data <path>          Client records (.xlsx, .xls, .csv, .json, .jsonl)
  -o, --out <dir>            Output directory (created if missing)
  -l, --logo <path>          PNG/JPEG stamped on the first PDF page
      --name-fields <a,b>    Fields that build output file names (default: name,surname)
      --on-collision <mode>  suffix | overwrite | fail (default: suffix)
      --merge-runs           Join formatting runs so split placeholders are filled
      --no-pdf               Write DOCX files only
      --keep-pdf             Keep the unstamped PDF next to the stamped one
      --strict               Exit non-zero if any record fails
      --require <a,b>        Skip rows with an empty value in these fields
      --date-fields <a,b>    Reformat YYYY-MM-DD values of these fields as DD/MM/YYYY
      --delimiter <char>     CSV delimiter (default: ,)
      --raw-headers          Use data headers as-is (no lower-casing or ASCII folding)
      --soffice <path>       LibreOffice binary (default: soffice)
  -h, --help                 Show this help`;

const VALUE_FLAGS: Record<string, keyof FillerConfig> = {
  "--template": "template",
  "-t": "template",
  "--data": "data",
  "-d": "data",
  "--out": "out",
  "-o": "out",
  "--logo": "logo",
  "-l": "logo",
  "--name-fields": "nameFields",
  "--on-collision": "onCollision",
  "--require": "requiredFields",
  "--date-fields": "dateFields",
  "--delimiter": "delimiter",
  "--soffice": "soffice",
};

const BOOLEAN_FLAGS: Record<string, [keyof FillerConfig, boolean]> = {
  "--merge-runs": ["mergeRuns", true],
  "--no-pdf": ["pdf", false],
  "--keep-pdf": ["keepPdf", true],
  "--strict": ["strict", true],
  "--raw-headers": ["rawHeaders", true],
};

const LIST_KEYS = new Set<keyof FillerConfig>(["nameFields", "requiredFields", "dateFields"]);

/** Option name shown in messages for a config key. */
function flagFor(key: string): string {
  const flag = Object.keys(VALUE_FLAGS).find((f) => f.startsWith("--") && VALUE_FLAGS[f] === key);
  return flag ?? key;
}

export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function wantsHelp(argv: string[]): boolean {
  return argv.includes("--help") || argv.includes("-h");
}

/**
 * Parse CLI arguments (without the node/script prefix) and environment
 * fallbacks into a validated FillerConfig. Throws ConfigError.
 */
export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = {}): FillerConfig {
  const raw: Record<string, unknown> = {
    template: env.FILLER_TEMPLATE || undefined,
    data: env.FILLER_DATA || undefined,
    out: env.FILLER_OUT || undefined,
    logo: env.FILLER_LOGO || undefined,
    soffice: env.FILLER_SOFFICE || undefined,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    const valueKey = Object.hasOwn(VALUE_FLAGS, arg) ? VALUE_FLAGS[arg] : undefined;
    if (valueKey) {
      const value = argv[i + 1];
      if (value === undefined || (value.startsWith("-") && value.length > 1)) {
        throw new ConfigError(`${arg} requires a value\n\n${USAGE}`);
      }
      raw[valueKey] = LIST_KEYS.has(valueKey) ? parseList(value) : value;
      i++;
      continue;
    }
    const booleanFlag = Object.hasOwn(BOOLEAN_FLAGS, arg) ? BOOLEAN_FLAGS[arg] : undefined;
    if (booleanFlag) {
      const [key, value] = booleanFlag;
      raw[key] = value;
      continue;
    }
    throw new ConfigError(`Unknown argument: ${arg}\n\n${USAGE}`);
  }

  const parsed = FillerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const key = String(issue.path[0] ?? "");
      return `${flagFor(key)} ${issue.message}`;
    });
    throw new ConfigError(`${problems.join("\n")}\n\n${USAGE}`);
  }
  return parsed.data;
}
