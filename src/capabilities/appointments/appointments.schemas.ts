import { z } from "zod";

import type { AppointmentRecord } from "./appointments.dto";

const UpstreamId = z.union([z.string(), z.number()]).transform(String);

export const AppointmentCompleteResponseSchema = z.object({
  id: UpstreamId,
  status: z.string(),
});

export const AppointmentResponseSchema = z
  .object({
    id: UpstreamId,
    studentId: UpstreamId,
    counselorId: UpstreamId,
    sessionType: z.string().nullish(),
    scheduledStart: z.coerce.date(),
    observerIds: z.array(UpstreamId).nullish(),
  })
  .transform(
    (a): AppointmentRecord => ({
      id: a.id,
      studentId: a.studentId,
      counselorId: a.counselorId,
      sessionType: a.sessionType ?? null,
      scheduledStart: a.scheduledStart,
      observerIds: a.observerIds ?? [],
    }),
  );

export type AppointmentCompleteResponse = z.infer<
  typeof AppointmentCompleteResponseSchema
>;
