import { z } from "zod";

export const EventSnapshotSchema = z.object({
  name: z.string().min(1),
  relationName: z.string().optional(),
  relationId: z.number().int().nonnegative().optional(),
  remoteApp: z.string().optional(),
  remoteUnit: z.string().optional(),
  workloadName: z.string().optional(),
});

export type EventSnapshot = z.infer<typeof EventSnapshotSchema>;

// An event one observer asked to see again on the next dispatch
export const DeferredNoticeSchema = z.object({
  event: EventSnapshotSchema,
  observer: z.string(),
});

export type DeferredNotice = z.infer<typeof DeferredNoticeSchema>;
