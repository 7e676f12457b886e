import { z } from "zod";

// Pebble service definition (only the fields this charm reads or writes)
export const ServiceSchema = z.object({
  override: z.enum(["merge", "replace"]),
  summary: z.string().optional(),
  description: z.string().optional(),
  startup: z.enum(["enabled", "disabled"]).optional(),
  command: z.string().optional(),
  environment: z.record(z.string()).optional(),
  after: z.array(z.string()).optional(),
  before: z.array(z.string()).optional(),
  requires: z.array(z.string()).optional(),
});

export type Service = z.infer<typeof ServiceSchema>;

export const LayerSchema = z.object({
  summary: z.string().optional(),
  description: z.string().optional(),
  services: z.record(ServiceSchema).default({}),
});

export type Layer = z.infer<typeof LayerSchema>;

// A plan is the combination of every layer in the container
export const PlanSchema = z
  .object({
    services: z.record(ServiceSchema).default({}),
  })
  .passthrough();

export type Plan = z.infer<typeof PlanSchema>;

export const ServiceInfoSchema = z.object({
  name: z.string(),
  startup: z.enum(["enabled", "disabled"]),
  current: z.enum(["active", "inactive", "error", "backoff"]),
});

export type ServiceInfo = z.infer<typeof ServiceInfoSchema>;
