import { z } from "zod";
import { IsoDateTimeSchema, JsonRecordSchema, NonEmptyStringSchema, NonNegativeNumberSchema } from "../common/scalars";

export const FileUsageSchema = z.object({
  path: NonEmptyStringSchema,
  priority: z.number().int()
});

export const SecretRecordSchema = z.object({
  name: NonEmptyStringSchema,
  data: JsonRecordSchema,
  leaseId: z.string().optional(),
  renewable: z.boolean(),
  leaseDurationSeconds: NonNegativeNumberSchema,
  resolvedAt: IsoDateTimeSchema,
  expiresAt: IsoDateTimeSchema.nullable(),
  filesUsing: z.array(FileUsageSchema)
});

export const LifecycleSnapshotSchema = z.object({
  token: z.string().nullable(),
  secrets: z.array(SecretRecordSchema)
});

export type FileUsage = z.infer<typeof FileUsageSchema>;
export type SecretRecord = z.infer<typeof SecretRecordSchema>;
export type LifecycleSnapshot = z.infer<typeof LifecycleSnapshotSchema>;
