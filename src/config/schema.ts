// Configuration schema for provision.config.yaml.
// Every section has defaults so a minimal file (even `{}`) yields a full config;
// add new fields here and the inferred ProvisionConfig type follows.
import { z } from "zod";
import { isSafeRelativePath } from "../shared/paths.js";

const relativePath = z
  .string()
  .min(1)
  .refine(isSafeRelativePath, { message: "must be a relative path without '..' segments" });

const packageList = z.array(z.string().min(1)).default([]);

/** Lists may also be keyed by executable name: `apt-get` means `apt`. */
function normalizePackageKeys(value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return value;
  const entries = Object.entries(value).map(([key, list]) => [key === "apt-get" ? "apt" : key, list] as const);
  return Object.fromEntries(entries);
}

/** A bare list of file names is shorthand for empty files. */
function normalizeFiles(value: unknown): unknown {
  if (!Array.isArray(value)) return value;
  return Object.fromEntries(value.map((name: unknown) => [String(name), ""]));
}

const packagesSchema = z
  .object({
    apt: packageList,
    dnf: packageList,
    yum: packageList,
    pacman: packageList,
    brew: packageList,
    winget: packageList,
  })
  .strict();

export const ProvisionConfigSchema = z.object({
  packages: z.preprocess(normalizePackageKeys, packagesSchema).default({}),
  project: z
    .object({
      path: z.string().min(1).default("my-project"),
      directories: z.array(relativePath).default([]),
      files: z.preprocess(normalizeFiles, z.record(relativePath, z.string())).default({}),
      commitMessage: z.string().min(1).default("Initial project setup via provisioner"),
    })
    .default({}),
  environment: z
    .object({
      file: relativePath.default(".env"),
      project: z.record(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "invalid variable name"), z.string()).default({}),
      shell: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  runtime: z
    .object({
      enabled: z.boolean().default(true),
      name: relativePath.default("venv"),
      packages: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  hooks: z.array(z.string().min(1)).default([]),
  logging: z
    .object({
      level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
      file: z.string().min(1).nullable().default("provision.log"),
    })
    .default({}),
  timeouts: z
    .object({
      quickMs: z.number().int().positive().default(15_000),
      slowMs: z.number().int().positive().default(600_000),
    })
    .default({}),
});

export type ProvisionConfig = z.infer<typeof ProvisionConfigSchema>;
export type Timeouts = ProvisionConfig["timeouts"];
