import { beforeEach, describe, expect, it, vi } from "vitest";
import { MEDICAL_DISCLAIMER } from "../../src/config";
import { IndexNotReadyError } from "../../src/errors";
import type { IHybridRetrievalResult, IKnowledgeBase, RetrievalResult } from "../../src/interfaces";
import {
  AgentRouter,
  ClinicalAgent,
  DuckDuckGoSearchProvider,
  InstantAnswerSchema,
  ReceptionistAgent,
  WebSearchAgent,
  hitsFromInstantAnswer,
  isMedicalQuery,
  parseExtractedName,
  withDisclaimer,
} from "../../src/modules/agents";
import { INITIAL_GREETING } from "../../src/modules/agents/prompts";
import { isSufficient, selectContext } from "../../src/modules/retrieval";
import { PatientRepository } from "../../src/modules/patients";
import {
  FakeSearchProvider,
  ScriptedLanguageModel,
  createPatients,
  webHits,
} from "../mocks";

function passage(fusedScore: number): IHybridRetrievalResult {
  return {
    method: "hybrid",
    chunkId: "ref:0",
    text: "Limit potassium to 2g daily.",
    source: "ref.pdf",
    page: 4,
    offset: 0,
    denseScore: 1,
    sparseScore: 1,
    fusedScore,
  };
}

function stubKnowledgeBase(results: RetrievalResult[] | Error): IKnowledgeBase {
  return {
    retrieve: vi.fn(async () => {
      if (results instanceof Error) throw results;
      return results;
    }),
    isSufficient,
    selectContext,
  };
}

function createWebSearch(
  provider: FakeSearchProvider,
  llm: ScriptedLanguageModel,
): WebSearchAgent {
  return new WebSearchAgent({ provider, llm, retries: 2, retryBaseDelayMs: 0 });
}

const [jane] = createPatients();

describe("WebSearchAgent", () => {
  it("should answer from the search hits and add the disclaimer", async () => {
    const provider = new FakeSearchProvider([webHits(2)]);
    const llm = new ScriptedLanguageModel(["Answer text"]);

    const result = await createWebSearch(provider, llm).answer("kidney diet");

    expect(result).toEqual({
      answer: `Answer text\n\n${MEDICAL_DISCLAIMER}`,
      sources: webHits(2),
      success: true,
    });
    expect(llm.calls[0].messages[1].content).toContain(
      "1. Result 1\nhttps://example.org/1\nSnippet 1",
    );
  });

  it("should retry empty results before giving up", async () => {
    const provider = new FakeSearchProvider([[], [], []]);
    const result = await createWebSearch(provider, new ScriptedLanguageModel()).answer("rare question");

    expect(provider.queries).toHaveLength(3);
    expect(result.success).toBe(false);
    expect(result.answer).toBe(
      withDisclaimer(
        "I couldn't find relevant information online for your question. Please consult your healthcare provider.",
      ),
    );
  });

  it("should succeed when a retry finds results", async () => {
    const provider = new FakeSearchProvider([[], webHits(1)]);
    const result = await createWebSearch(provider, new ScriptedLanguageModel(["Found it"])).answer("q");

    expect(provider.queries).toHaveLength(2);
    expect(result.success).toBe(true);
  });

  it("should not retry a failed request", async () => {
    const provider = new FakeSearchProvider([new Error("HTTP 500")]);
    const result = await createWebSearch(provider, new ScriptedLanguageModel()).answer("q");

    expect(provider.queries).toHaveLength(1);
    expect(result).toEqual({
      answer:
        "An error occurred while searching: HTTP 500. Please try rephrasing your question or consult a healthcare professional.",
      sources: [],
      success: false,
    });
  });

  it("should not add the disclaimer twice", () => {
    const once = withDisclaimer("Answer");
    expect(withDisclaimer(once)).toBe(once);
  });
});

describe("DuckDuckGoSearchProvider", () => {
  const payload = {
    Heading: "Kidney",
    AbstractText: "Kidneys filter blood.",
    AbstractURL: "https://example.org/kidney",
    RelatedTopics: [
      { Text: "Dialysis - a treatment for kidney failure", FirstURL: "https://example.org/dialysis" },
      { Topics: [{ Text: "Nephron", FirstURL: "https://example.org/nephron" }] },
      { Text: "No link" },
    ],
  };

  it("should turn an instant answer into hits", () => {
    expect(hitsFromInstantAnswer(InstantAnswerSchema.parse(payload), 5)).toEqual([
      { title: "Kidney", url: "https://example.org/kidney", snippet: "Kidneys filter blood." },
      {
        title: "Dialysis",
        url: "https://example.org/dialysis",
        snippet: "Dialysis - a treatment for kidney failure",
      },
      { title: "Nephron", url: "https://example.org/nephron", snippet: "Nephron" },
    ]);
  });

  it("should query the endpoint and limit the hits", async () => {
    const fetchImpl = vi.fn(
      async (_input: RequestInfo | URL, _init?: RequestInit) => new Response(JSON.stringify(payload)),
    );
    const provider = new DuckDuckGoSearchProvider({ endpoint: "https://search.test/", fetchImpl });

    const hits = await provider.search("kidney diet", 2);

    expect(hits.map((h) => h.title)).toEqual(["Kidney", "Dialysis"]);
    const url = String(fetchImpl.mock.calls[0][0]);
    expect(url).toBe("https://search.test/?q=kidney+diet&format=json&no_html=1&skip_disambig=1");
  });

  it("should reject an HTTP error", async () => {
    const fetchImpl = vi.fn(async () => new Response("unavailable", { status: 503 }));
    const provider = new DuckDuckGoSearchProvider({ fetchImpl });

    await expect(provider.search("q", 5)).rejects.toThrow("Search request failed with HTTP 503");
  });
});

describe("ClinicalAgent", () => {
  let provider: FakeSearchProvider;
  let llm: ScriptedLanguageModel;

  beforeEach(() => {
    provider = new FakeSearchProvider([], webHits(2));
    llm = new ScriptedLanguageModel();
  });

  function createAgent(knowledgeBase: IKnowledgeBase): ClinicalAgent {
    return new ClinicalAgent({ knowledgeBase, llm, webSearch: createWebSearch(provider, llm) });
  }

  it("should answer from the knowledge base when retrieval is sufficient", async () => {
    llm.enqueue("Eat less potassium.");
    const answer = await createAgent(stubKnowledgeBase([passage(0.8)])).answer("potassium?", jane);

    expect(answer).toEqual({
      answer: `Eat less potassium.\n\n${MEDICAL_DISCLAIMER}`,
      sourceType: "knowledge_base",
      knowledgeSources: [
        { index: 1, chunkId: "ref:0", source: "ref.pdf", page: 4, relevance: 0.8, method: "hybrid" },
      ],
      webSources: [],
      success: true,
    });
    expect(provider.queries).toHaveLength(0);

    const prompt = llm.calls[0].messages[1].content;
    expect(prompt).toContain("[Source 1 - Page 4, Relevance: 0.80, Method: hybrid]\nLimit potassium to 2g daily.");
    expect(prompt).toContain("Patient Context: Name: Jane Doe");
  });

  it("should fall back to web search below the threshold", async () => {
    llm.enqueue("Web answer");
    const answer = await createAgent(stubKnowledgeBase([passage(0.2)])).answer("potassium?");

    expect(answer.sourceType).toBe("web_search");
    expect(answer.answer).toBe(`Web answer\n\n${MEDICAL_DISCLAIMER}`);
    expect(answer.webSources).toEqual(webHits(2));
    expect(provider.queries).toEqual(["potassium?"]);
  });

  it("should fall back to web search when nothing was retrieved", async () => {
    const answer = await createAgent(stubKnowledgeBase([])).answer("potassium?");
    expect(answer.sourceType).toBe("web_search");
  });

  it("should personalise a web answer for a known patient", async () => {
    llm.enqueue("Web answer", "Personalised answer");
    const answer = await createAgent(stubKnowledgeBase([passage(0.1)])).answer("potassium?", jane);

    expect(answer.answer).toBe(`Personalised answer\n\n${MEDICAL_DISCLAIMER}`);
    expect(llm.calls).toHaveLength(2);
    expect(llm.calls[1].messages[0].content).toContain("Name: Jane Doe");
  });

  it("should report an unavailable knowledge base separately from a miss", async () => {
    llm.enqueue("Web answer");
    const answer = await createAgent(
      stubKnowledgeBase(new IndexNotReadyError("No index found")),
    ).answer("potassium?");

    expect(answer.sourceType).toBe("knowledge_base_unavailable");
    expect(answer.success).toBe(true);
    expect(answer.error).toBe("No index found");
    expect(answer.answer).toBe(
      `The reference knowledge base is currently unavailable, so this answer comes from a web search.\n\nWeb answer\n\n${MEDICAL_DISCLAIMER}`,
    );
  });

  it("should still mention the unavailable knowledge base when the web search finds nothing", async () => {
    provider = new FakeSearchProvider([], []);
    const answer = await createAgent(
      stubKnowledgeBase(new IndexNotReadyError("No index found")),
    ).answer("potassium?");

    expect(answer.sourceType).toBe("knowledge_base_unavailable");
    expect(answer.success).toBe(false);
    expect(answer.error).toBe("No index found");
    expect(answer.answer).toBe(
      `The reference knowledge base is currently unavailable, and a web search could not answer your question either.\n\n${withDisclaimer(
        "I couldn't find relevant information online for your question. Please consult your healthcare provider.",
      )}`,
    );
    expect(provider.queries).toHaveLength(3);
  });

  it("should rethrow errors that are not retrieval errors", async () => {
    await expect(
      createAgent(stubKnowledgeBase(new TypeError("bug"))).answer("q"),
    ).rejects.toBeInstanceOf(TypeError);
  });

  it("should report a failed synthesis", async () => {
    llm.enqueue(new Error("model down"));
    const answer = await createAgent(stubKnowledgeBase([passage(0.9)])).answer("q");

    expect(answer.sourceType).toBe("error");
    expect(answer.success).toBe(false);
    expect(answer.error).toBe("model down");
  });

  it("should report a failed web search", async () => {
    provider = new FakeSearchProvider([new Error("offline")]);
    const answer = await createAgent(stubKnowledgeBase([passage(0.1)])).answer("q");

    expect(answer.sourceType).toBe("web_search_failed");
    expect(answer.success).toBe(false);
  });
});

describe("ReceptionistAgent", () => {
  let llm: ScriptedLanguageModel;
  let receptionist: ReceptionistAgent;

  beforeEach(() => {
    llm = new ScriptedLanguageModel();
    receptionist = new ReceptionistAgent({
      llm,
      patients: new PatientRepository(createPatients()),
    });
  });

  it("should greet with the intake question", () => {
    expect(receptionist.getInitialGreeting()).toBe(INITIAL_GREETING);
  });

  it("should identify the patient and greet them", async () => {
    llm.enqueue("Jane Doe", "Welcome back, Jane!");
    const reply = await receptionist.processMessage("Hi, I'm Jane Doe");

    expect(reply.action).toBe("patient_retrieved");
    expect(reply.response).toBe("Welcome back, Jane!");
    expect(reply.patient?.patient.patient_name).toBe("Jane Doe");
    expect(receptionist.patient?.patient.discharge_date).toBe("2024-03-01");
    expect(llm.calls[0].options).toEqual({ temperature: 0 });
    expect(llm.calls[1].messages[0].content).toContain("**Name:** Jane Doe");
  });

  it("should ask again when no record matches", async () => {
    llm.enqueue("Janet Smith");
    const reply = await receptionist.processMessage("I'm Janet Smith");

    expect(reply).toEqual({
      response:
        "I couldn't find a discharge report for 'Janet Smith'. Could you please verify the spelling of your name?",
      action: "patient_not_found",
    });
    expect(receptionist.patient).toBeNull();
  });

  it("should converse when the message has no name", async () => {
    llm.enqueue("NONE", "Could you tell me your name?");
    const reply = await receptionist.processMessage("Hello there");

    expect(reply).toEqual({ response: "Could you tell me your name?", action: "conversation" });
  });

  it("should route medical questions once the patient is known", async () => {
    llm.enqueue("Jane Doe", "Welcome back, Jane!");
    await receptionist.processMessage("Hi, I'm Jane Doe");

    const reply = await receptionist.processMessage("Is this leg swelling normal?");

    expect(reply.action).toBe("route_to_clinical");
    expect(reply.originalQuery).toBe("Is this leg swelling normal?");
    expect(llm.calls).toHaveLength(2);
  });

  it("should include the patient report in later conversation", async () => {
    llm.enqueue("Jane Doe", "Welcome back, Jane!", "Glad to hear it.");
    await receptionist.processMessage("Hi, I'm Jane Doe");

    const reply = await receptionist.processMessage("I'm feeling fine today");

    expect(reply.response).toBe("Glad to hear it.");
    expect(llm.calls[2].messages[1].content).toContain("Current patient information:");
  });

  it("should report failures as an error reply", async () => {
    llm.enqueue("NONE", new Error("rate limited"));
    const reply = await receptionist.processMessage("hello");

    expect(reply.action).toBe("error");
    expect(reply.error).toBe("rate limited");
  });

  it("should forget the patient on reset", async () => {
    llm.enqueue("Jane Doe", "Welcome back, Jane!");
    await receptionist.processMessage("Hi, I'm Jane Doe");
    receptionist.reset();
    expect(receptionist.patient).toBeNull();
  });

  describe("parseExtractedName", () => {
    it("should strip quotes and punctuation", () => {
      expect(parseExtractedName(' "Jane Doe." ')).toBe("Jane Doe");
    });

    it("should treat NONE, blanks and long answers as no name", () => {
      expect(parseExtractedName("NONE")).toBeNull();
      expect(parseExtractedName("none")).toBeNull();
      expect(parseExtractedName("   ")).toBeNull();
      expect(parseExtractedName("x".repeat(51))).toBeNull();
    });
  });

  describe("isMedicalQuery", () => {
    it("should detect medical keywords", () => {
      expect(isMedicalQuery("I have PAIN in my side")).toBe(true);
      expect(isMedicalQuery("Should I take my pills with food?")).toBe(true);
      expect(isMedicalQuery("Thanks, see you")).toBe(false);
    });
  });
});

describe("AgentRouter", () => {
  let llm: ScriptedLanguageModel;
  let knowledgeBase: IKnowledgeBase;
  let router: AgentRouter;

  beforeEach(() => {
    llm = new ScriptedLanguageModel();
    knowledgeBase = stubKnowledgeBase([passage(0.9)]);
    const provider = new FakeSearchProvider([], webHits(1));
    router = new AgentRouter({
      sessionId: "test-session",
      receptionist: new ReceptionistAgent({ llm, patients: new PatientRepository(createPatients()) }),
      clinical: new ClinicalAgent({ knowledgeBase, llm, webSearch: createWebSearch(provider, llm) }),
    });
  });

  it("should refuse messages before the session starts", async () => {
    expect(await router.processMessage("hello")).toEqual({
      response: "Please start a new session first.",
      currentAgent: null,
      action: "session_inactive",
    });
  });

  it("should start at the receptionist", () => {
    expect(router.startSession()).toBe(INITIAL_GREETING);
    expect(router.getCurrentAgent()).toBe("receptionist");
    expect(router.getConversationLog()).toHaveLength(1);
  });

  it("should hand a medical question to the clinical agent and back", async () => {
    router.startSession();
    llm.enqueue("Jane Doe", "Hello Jane", "Rest and elevate your legs.");

    const intake = await router.processMessage("Hi, I'm Jane Doe");
    expect(intake.action).toBe("patient_retrieved");
    expect(intake.patient?.patient_name).toBe("Jane Doe");

    const clinical = await router.processMessage("I have pain in my leg");
    expect(clinical.action).toBe("clinical_response");
    expect(clinical.currentAgent).toBe("clinical");
    expect(clinical.clinical?.sourceType).toBe("knowledge_base");
    expect(clinical.response).toBe(
      `I understand you have a medical question. Let me connect you with our clinical assistant who can provide detailed medical information.\n\n---\n\nRest and elevate your legs.\n\n${MEDICAL_DISCLAIMER}`,
    );

    const back = await router.processMessage("go back please");
    expect(back).toEqual({
      response: "Returning to reception. How can I help you?",
      currentAgent: "receptionist",
      action: "return_to_receptionist",
    });
    expect(router.getPatient()).toBeNull();
    expect(router.getStatus()).toEqual({
      sessionId: "test-session",
      sessionActive: true,
      currentAgent: "receptionist",
      patientIdentified: false,
      patientName: null,
      conversationLength: 7,
    });
  });

  it("should keep answering in the clinical agent", async () => {
    router.startSession();
    llm.enqueue("Jane Doe", "Hello Jane", "First answer", "Second answer");
    await router.processMessage("Hi, I'm Jane Doe");
    await router.processMessage("I have pain in my leg");

    const followUp = await router.processMessage("And what about my diet?");

    expect(followUp.currentAgent).toBe("clinical");
    expect(followUp.response).toBe(`Second answer\n\n${MEDICAL_DISCLAIMER}`);
    expect(knowledgeBase.retrieve).toHaveBeenLastCalledWith("And what about my diet?", undefined, undefined);
  });

  it("should turn unexpected failures into an error reply", async () => {
    const broken = new AgentRouter({
      receptionist: new ReceptionistAgent({ llm, patients: new PatientRepository(createPatients()) }),
      clinical: new ClinicalAgent({
        knowledgeBase: stubKnowledgeBase(new TypeError("bug")),
        llm,
        webSearch: createWebSearch(new FakeSearchProvider(), llm),
      }),
    });
    broken.startSession();
    llm.enqueue("Jane Doe", "Hello Jane");
    await broken.processMessage("Hi, I'm Jane Doe");

    const reply = await broken.processMessage("I have pain");
    expect(reply.action).toBe("error");
    expect(reply.currentAgent).toBe("clinical");
  });

  it("should clear everything on reset", async () => {
    router.startSession();
    router.resetSession();

    expect(router.getStatus().sessionActive).toBe(false);
    expect(router.getConversationLog()).toEqual([]);
  });
});
