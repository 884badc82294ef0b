import { z } from "zod";
import { FileModeSchema, JsonRecordSchema, NonEmptyStringSchema, PositiveIntegerSchema } from "../common/scalars";
import { NotifierSpecSchema } from "./notifier";

export const DEFAULT_FILE_MODE = 0o600;
export const DEFAULT_RETRY_PERIOD_MS = 5_000;
export const DEFAULT_RENEW_FRACTION = 0.75;
export const DEFAULT_STATE_PATH = "./var/satchel-state.db";

export const SecretSpecSchema = z.object({
  vaultUrl: NonEmptyStringSchema,
  httpMethod: z
    .string()
    .min(1)
    .transform((method) => method.toUpperCase())
    .default("GET"),
  data: JsonRecordSchema.optional()
});

export const FileSpecSchema = z.object({
  path: NonEmptyStringSchema,
  template: z.string().optional(),
  templateFile: z.string().optional(),
  mode: FileModeSchema.optional(),
  notify: z.array(NonEmptyStringSchema).default([]),
  priority: z.number().int().default(0)
});

export const VaultConfigSchema = z.object({
  address: z.string().url().default("http://127.0.0.1:8200"),
  token: z.string().optional(),
  namespace: z.string().optional(),
  roleId: z.string().optional(),
  secretId: z.string().optional(),
  secretIdFile: z.string().optional(),
  wrappedSecretIdFile: z.string().optional(),
  timeoutMs: PositiveIntegerSchema.default(30_000)
});

export const StatusServerConfigSchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().default("127.0.0.1"),
  port: z.number().int().min(0).max(65_535).default(4100)
});

export const AgentConfigSchema = z
  .object({
    vault: VaultConfigSchema.default({}),
    statePath: NonEmptyStringSchema.default(DEFAULT_STATE_PATH),
    retryPeriodMs: PositiveIntegerSchema.default(DEFAULT_RETRY_PERIOD_MS),
    renewFraction: z.number().gt(0).max(1).default(DEFAULT_RENEW_FRACTION),
    status: StatusServerConfigSchema.default({}),
    secrets: z.record(NonEmptyStringSchema, SecretSpecSchema).default({}),
    files: z.array(FileSpecSchema).default([]),
    notifiers: z.record(NonEmptyStringSchema, NotifierSpecSchema).default({})
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.files.forEach((file, index) => {
      if (seen.has(file.path)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["files", index, "path"],
          message: `duplicate file path: ${file.path}`
        });
      }
      seen.add(file.path);
      file.notify.forEach((name, notifyIndex) => {
        if (!Object.hasOwn(config.notifiers, name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["files", index, "notify", notifyIndex],
            message: `unknown notifier: ${name}`
          });
        }
      });
    });
  });

export type SecretSpec = z.infer<typeof SecretSpecSchema>;
export type FileSpec = z.infer<typeof FileSpecSchema>;
export type VaultConfig = z.infer<typeof VaultConfigSchema>;
export type StatusServerConfig = z.infer<typeof StatusServerConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;
