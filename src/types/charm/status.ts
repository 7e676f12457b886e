import { z } from "zod";

export const StatusNameSchema = z.enum([
  "active",
  "blocked",
  "waiting",
  "maintenance",
  "unknown",
]);

export type StatusName = z.infer<typeof StatusNameSchema>;

export interface UnitStatus {
  name: StatusName;
  message: string;
}

export const activeStatus = (message = ""): UnitStatus => ({
  name: "active",
  message,
});

export const blockedStatus = (message: string): UnitStatus => ({
  name: "blocked",
  message,
});

export const waitingStatus = (message: string): UnitStatus => ({
  name: "waiting",
  message,
});

export const maintenanceStatus = (message: string): UnitStatus => ({
  name: "maintenance",
  message,
});

export const unknownStatus = (): UnitStatus => ({
  name: "unknown",
  message: "",
});
