import { z } from "zod";
import { isValidProtocolName } from "./jail/path.js";

export const jailFsConfigSchema = z.object({
  protocol: z
    .string()
    .refine(isValidProtocolName, "must be a single path segment")
    .default("ftp"),
  /** Host directory mirrored into every new jail; needed to open a jail. */
  sourceDir: z.string().min(1).optional(),
  /** Host directory receiving captured uploads; needed to capture. */
  dataDir: z.string().min(1).optional(),
  /** Host directory holding the jails; in memory when omitted. */
  jailRootDir: z.string().min(1).optional(),
  /** Largest source file mirrored, in bytes. 0 = unlimited */
  maxMirrorFileSize: z.number().int().nonnegative().default(0),
  /** Directory inside the data store that uploads land in. */
  uploadDirectory: z.string().startsWith("/").default("/"),
});

export type JailFsConfig = z.infer<typeof jailFsConfigSchema>;
export type JailFsConfigInput = z.input<typeof jailFsConfigSchema>;

/**
 * Validate raw configuration and fill in defaults.
 *
 * @throws Error listing every problem, one per line
 */
export function parseConfig(input: unknown): JailFsConfig {
  const result = jailFsConfigSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const lines = result.error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "config";
    return `  ${where}: ${issue.message}`;
  });
  throw new Error(`Invalid configuration:\n${lines.join("\n")}`);
}

type OptionalSetting = "sourceDir" | "dataDir";

/**
 * Read a setting that only some operations need.
 * @throws Error in the same form as parseConfig when it is missing
 */
export function requireSetting(
  config: JailFsConfig,
  key: OptionalSetting,
): string {
  const value = config[key];
  if (value === undefined) {
    throw new Error(`Invalid configuration:\n  ${key}: Required`);
  }
  return value;
}
