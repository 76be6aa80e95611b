import { readFile } from "node:fs/promises";
import { InvalidConfigurationError } from "../../errors";
import type { IPatientMatch } from "../../interfaces";
import { type IPatientRecord, PatientRecordsSchema } from "../../schemas/patient";
import { createLogger } from "../../utils/logger";

const log = createLogger("patients");

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

function formatList(items: string[]): string {
  if (items.length === 0) return "• None specified";
  return items.map((item) => `• ${item}`).join("\n");
}

export class PatientRepository {
  private readonly records: readonly IPatientRecord[];

  constructor(records: IPatientRecord[] = []) {
    this.records = records;
  }

  /** A missing file yields an empty repository; a malformed one is rejected. */
  static async fromFile(path: string): Promise<PatientRepository> {
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      if (isMissing(error)) {
        log.warn(`Patient file ${path} not found; starting with no records`);
        return new PatientRepository();
      }
      throw error;
    }
    return PatientRepository.fromJson(raw, path);
  }

  static fromJson(raw: string, origin = "patient data"): PatientRepository {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new InvalidConfigurationError(`${origin} is not valid JSON`, {
        cause: error,
      });
    }

    const parsed = PatientRecordsSchema.safeParse(json);
    if (!parsed.success) {
      throw InvalidConfigurationError.fromZod(parsed.error, `Invalid ${origin}`);
    }

    log.info(`Loaded ${parsed.data.length} patient records`);
    return new PatientRepository(parsed.data);
  }

  get size(): number {
    return this.records.length;
  }

  all(): IPatientRecord[] {
    return [...this.records];
  }

  /** Case-insensitive exact match on the trimmed name. */
  findByName(name: string): IPatientMatch | null {
    const needle = name.trim().toLowerCase();
    if (!needle) return null;

    const matches = this.records.filter(
      (p) => p.patient_name.toLowerCase() === needle,
    );
    if (matches.length === 0) {
      log.debug(`No patient named "${name}"`);
      return null;
    }
    if (matches.length > 1) {
      log.warn(`${matches.length} patients named "${name}"; using the first`);
      return {
        patient: matches[0],
        warning: `Multiple patients found with name '${name.trim()}'`,
      };
    }
    return { patient: matches[0] };
  }

  search(query: string): IPatientRecord[] {
    const needle = query.trim().toLowerCase();
    return this.records.filter((p) =>
      p.patient_name.toLowerCase().includes(needle),
    );
  }

  summarize(name: string): string {
    const match = this.findByName(name);
    if (!match) return `No discharge report found for patient '${name}'.`;

    const { patient } = match;
    return [
      `Found discharge report for ${patient.patient_name} from ${patient.discharge_date}.`,
      `Diagnosis: ${patient.primary_diagnosis}`,
      `Medications: ${patient.medications.length} prescribed`,
      `Follow-up: ${patient.follow_up}`,
    ].join("\n");
  }
}

export function formatPatientInfo(match: IPatientMatch): string {
  const p = match.patient;
  const lines = [
    "**Patient Discharge Report**",
    "",
    `**Name:** ${p.patient_name}`,
    `**Discharge Date:** ${p.discharge_date}`,
    `**Primary Diagnosis:** ${p.primary_diagnosis}`,
    "",
    "**Medications:**",
    formatList(p.medications),
    "",
    `**Dietary Restrictions:** ${p.dietary_restrictions || "N/A"}`,
    "",
    `**Follow-up:** ${p.follow_up || "N/A"}`,
    "",
    "**Warning Signs to Watch For:**",
    p.warning_signs || "N/A",
    "",
    "**Discharge Instructions:**",
    p.discharge_instructions || "N/A",
  ];
  const body = lines.join("\n");
  return match.warning ? `⚠️ ${match.warning}\n\n${body}` : body;
}

/** Short patient context for prompts. */
export function patientContext(patient: IPatientRecord): string {
  return [
    `Name: ${patient.patient_name}`,
    `Diagnosis: ${patient.primary_diagnosis}`,
    `Medications: ${patient.medications.join(", ") || "None"}`,
    `Dietary Restrictions: ${patient.dietary_restrictions || "N/A"}`,
  ].join("\n");
}
