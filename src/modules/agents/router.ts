import { errorMessage } from "../../errors";
import type {
  AgentName,
  IInteraction,
  IRouterReply,
} from "../../interfaces";
import type { IPatientRecord } from "../../schemas/patient";
import { type Logger, createLogger } from "../../utils/logger";
import type { ClinicalAgent } from "./clinical";
import { RETURN_PHRASES } from "./prompts";
import type { ReceptionistAgent } from "./receptionist";

export interface AgentRouterOptions {
  receptionist: ReceptionistAgent;
  clinical: ClinicalAgent;
  sessionId?: string;
}

export interface RouterStatus {
  sessionId: string;
  sessionActive: boolean;
  currentAgent: AgentName;
  patientIdentified: boolean;
  patientName: string | null;
  conversationLength: number;
}

export function wantsReception(message: string): boolean {
  const lowered = message.toLowerCase();
  return RETURN_PHRASES.some((phrase) => lowered.includes(phrase));
}

/**
 * One conversation: starts at the receptionist, moves to the clinical agent
 * when a medical question comes in and back on request.
 */
export class AgentRouter {
  readonly sessionId: string;
  private receptionist: ReceptionistAgent;
  private clinical: ClinicalAgent;
  private currentAgent: AgentName = "receptionist";
  private active = false;
  private patient: IPatientRecord | null = null;
  private log: IInteraction[] = [];
  private logger: Logger;

  constructor(options: AgentRouterOptions) {
    this.receptionist = options.receptionist;
    this.clinical = options.clinical;
    this.sessionId = options.sessionId ?? `session-${Date.now().toString(36)}`;
    this.logger = createLogger(`router:${this.sessionId}`);
  }

  startSession(): string {
    this.active = true;
    this.currentAgent = "receptionist";
    this.logger.info("Session started");
    const greeting = this.receptionist.getInitialGreeting();
    this.record("receptionist", "greeting", greeting);
    return greeting;
  }

  async processMessage(message: string): Promise<IRouterReply> {
    if (!this.active) {
      return {
        response: "Please start a new session first.",
        currentAgent: null,
        action: "session_inactive",
      };
    }

    this.record(this.currentAgent, "user_input", message);
    try {
      return this.currentAgent === "receptionist"
        ? await this.handleReception(message)
        : await this.handleClinical(message);
    } catch (error) {
      this.logger.error(`Message processing failed: ${errorMessage(error)}`);
      return {
        response: "I apologize, I encountered an error. Please try again.",
        currentAgent: this.currentAgent,
        action: "error",
      };
    }
  }

  private async handleReception(message: string): Promise<IRouterReply> {
    const reply = await this.receptionist.processMessage(message);

    if (reply.action === "route_to_clinical") {
      this.currentAgent = "clinical";
      this.patient = reply.patient?.patient ?? this.patient;
      this.logger.info("Handoff receptionist -> clinical");

      const clinical = await this.clinical.answer(
        reply.originalQuery ?? message,
        this.patient ?? undefined,
      );
      const response = `${reply.response}\n\n---\n\n${clinical.answer}`;
      this.record("clinical", "response", response, {
        sourceType: clinical.sourceType,
      });
      return {
        response,
        currentAgent: "clinical",
        action: "clinical_response",
        clinical,
        patient: this.patient ?? undefined,
      };
    }

    if (reply.action === "patient_retrieved" && reply.patient) {
      this.patient = reply.patient.patient;
    }

    this.record("receptionist", "response", reply.response, {
      action: reply.action,
    });
    return {
      response: reply.response,
      currentAgent: "receptionist",
      action: reply.action,
      patient: this.patient ?? undefined,
    };
  }

  private async handleClinical(message: string): Promise<IRouterReply> {
    if (wantsReception(message)) {
      this.currentAgent = "receptionist";
      this.patient = null;
      this.receptionist.reset();
      this.logger.info("Handoff clinical -> receptionist");
      const response = "Returning to reception. How can I help you?";
      this.record("receptionist", "response", response, {
        action: "return_to_receptionist",
      });
      return {
        response,
        currentAgent: "receptionist",
        action: "return_to_receptionist",
      };
    }

    const clinical = await this.clinical.answer(message, this.patient ?? undefined);
    this.record("clinical", "response", clinical.answer, {
      sourceType: clinical.sourceType,
    });
    return {
      response: clinical.answer,
      currentAgent: "clinical",
      action: "clinical_response",
      clinical,
      patient: this.patient ?? undefined,
    };
  }

  getConversationLog(): IInteraction[] {
    return [...this.log];
  }

  getCurrentAgent(): AgentName {
    return this.currentAgent;
  }

  getPatient(): IPatientRecord | null {
    return this.patient;
  }

  resetSession(): void {
    this.logger.info("Session reset");
    this.active = false;
    this.currentAgent = "receptionist";
    this.patient = null;
    this.log = [];
    this.receptionist.reset();
  }

  getStatus(): RouterStatus {
    return {
      sessionId: this.sessionId,
      sessionActive: this.active,
      currentAgent: this.currentAgent,
      patientIdentified: this.patient !== null,
      patientName: this.patient?.patient_name ?? null,
      conversationLength: this.log.length,
    };
  }

  private record(
    agent: AgentName,
    messageType: IInteraction["messageType"],
    content: string,
    metadata: Record<string, unknown> = {},
  ): void {
    this.log.push({
      agent,
      messageType,
      content,
      metadata,
      timestamp: new Date().toISOString(),
    });
  }
}
