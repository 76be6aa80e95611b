import { errorMessage } from "../../errors";
import type {
  IChatMessage,
  ILanguageModel,
  IPatientMatch,
  IReceptionistReply,
} from "../../interfaces";
import { createLogger } from "../../utils/logger";
import { type PatientRepository, formatPatientInfo } from "../patients";
import { systemMessage, userMessage } from "./llm";
import {
  INITIAL_GREETING,
  MEDICAL_KEYWORDS,
  RECEPTIONIST_INSTRUCTIONS,
  greetingPrompt,
  nameExtractionPrompt,
} from "./prompts";

export interface ReceptionistAgentOptions {
  llm: ILanguageModel;
  patients: PatientRepository;
  historyWindow?: number;
}

const MAX_NAME_LENGTH = 50;

const log = createLogger("receptionist");

export function isMedicalQuery(message: string): boolean {
  const lowered = message.toLowerCase();
  return MEDICAL_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

/** Normalises the model's answer to the name-extraction prompt. */
export function parseExtractedName(raw: string): string | null {
  const name = raw.trim().replace(/^["']+|["'.]+$/g, "").trim();
  if (!name || name.toUpperCase() === "NONE" || name.length > MAX_NAME_LENGTH) {
    return null;
  }
  return name;
}

/**
 * Patient intake: identifies the patient by name, pulls their discharge
 * report and hands medical questions over to the clinical agent.
 */
export class ReceptionistAgent {
  private llm: ILanguageModel;
  private patients: PatientRepository;
  private historyWindow: number;
  private current: IPatientMatch | null = null;
  private history: IChatMessage[] = [];

  constructor(options: ReceptionistAgentOptions) {
    this.llm = options.llm;
    this.patients = options.patients;
    this.historyWindow = options.historyWindow ?? 5;
  }

  get patient(): IPatientMatch | null {
    return this.current;
  }

  getInitialGreeting(): string {
    return INITIAL_GREETING;
  }

  async extractName(message: string): Promise<string | null> {
    try {
      const raw = await this.llm.complete(
        [userMessage(nameExtractionPrompt(message))],
        { temperature: 0 },
      );
      return parseExtractedName(raw);
    } catch (error) {
      log.error(`Name extraction failed: ${errorMessage(error)}`);
      return null;
    }
  }

  async processMessage(message: string): Promise<IReceptionistReply> {
    this.history.push({ role: "user", content: message });

    try {
      if (this.current && isMedicalQuery(message)) {
        log.info("Medical query detected, routing to clinical agent");
        return {
          response:
            "I understand you have a medical question. Let me connect you with our clinical assistant who can provide detailed medical information.",
          action: "route_to_clinical",
          patient: this.current,
          originalQuery: message,
        };
      }

      if (!this.current) {
        const name = await this.extractName(message);
        if (name) return await this.identify(name);
      }

      const response = await this.llm.complete([
        systemMessage(RECEPTIONIST_INSTRUCTIONS),
        ...this.contextMessages(),
      ]);
      return this.reply({ response, action: "conversation" });
    } catch (error) {
      log.error(`Failed to process message: ${errorMessage(error)}`);
      return {
        response: "I apologize, I encountered an error. Could you please repeat that?",
        action: "error",
        error: errorMessage(error),
      };
    }
  }

  reset(): void {
    this.current = null;
    this.history = [];
  }

  private async identify(name: string): Promise<IReceptionistReply> {
    const match = this.patients.findByName(name);
    if (!match) {
      return this.reply({
        response: `I couldn't find a discharge report for '${name}'. Could you please verify the spelling of your name?`,
        action: "patient_not_found",
      });
    }

    this.current = match;
    log.info(`Identified patient ${match.patient.patient_name}`);
    const greeting = await this.llm.complete([
      userMessage(greetingPrompt(formatPatientInfo(match))),
    ]);
    return this.reply({
      response: greeting,
      action: "patient_retrieved",
      patient: match,
    });
  }

  private contextMessages(): IChatMessage[] {
    const messages: IChatMessage[] = [];
    if (this.current) {
      messages.push(
        systemMessage(
          `Current patient information:\n${formatPatientInfo(this.current)}`,
        ),
      );
    }
    messages.push(...this.history.slice(-this.historyWindow));
    return messages;
  }

  private reply(reply: IReceptionistReply): IReceptionistReply {
    this.history.push({ role: "assistant", content: reply.response });
    return reply;
  }
}
