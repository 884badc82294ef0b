import { z } from "zod";
import { NonEmptyStringSchema } from "../common/scalars";

export const SystemdNotifierSchema = z.object({
  type: z.literal("systemd"),
  unit: NonEmptyStringSchema,
  action: z.enum(["reload", "restart", "reload-or-restart", "try-reload-or-restart"]).default("reload-or-restart")
});

export const CommandNotifierSchema = z.object({
  type: z.literal("command"),
  command: z.array(NonEmptyStringSchema).min(1),
  timeoutMs: z.number().int().positive().optional()
});

export const HttpNotifierSchema = z.object({
  type: z.literal("http"),
  url: z.string().url(),
  method: z.enum(["GET", "POST", "PUT"]).default("POST"),
  headers: z.record(z.string(), z.string()).optional()
});

export const NotifierSpecSchema = z.discriminatedUnion("type", [
  SystemdNotifierSchema,
  CommandNotifierSchema,
  HttpNotifierSchema
]);

export type SystemdNotifier = z.infer<typeof SystemdNotifierSchema>;
export type CommandNotifier = z.infer<typeof CommandNotifierSchema>;
export type HttpNotifier = z.infer<typeof HttpNotifierSchema>;
export type NotifierSpec = z.infer<typeof NotifierSpecSchema>;
