import { z } from "zod";

export const PatientRecordSchema = z.object({
  patient_name: z.string().min(1),
  discharge_date: z.string(),
  primary_diagnosis: z.string(),
  medications: z.array(z.string()).default([]),
  dietary_restrictions: z.string().default(""),
  follow_up: z.string().default(""),
  warning_signs: z.string().default(""),
  discharge_instructions: z.string().default(""),
});

export const PatientRecordsSchema = z.array(PatientRecordSchema);

export type IPatientRecord = z.infer<typeof PatientRecordSchema>;
