import axios from "axios";
import { z } from "zod";
import { ScoringError, errorMessage } from "../errors";
import { ENTITY_KINDS } from "../types/entities";
import type { ScoreRequest, ScoreResult } from "../types/signals";
import type { SignalScorer } from "./port";
import { enforceScoringPolicy } from "./policy";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  response_format: { type: "json_object" };
}

/** Sends a chat completion request and resolves with the raw response body. */
export type ChatTransport = (request: ChatRequest) => Promise<unknown>;

export interface RemoteScorerOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  transport?: ChatTransport;
}

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const scoreSchema = z.object({
  confidence: z.number().min(0).max(1),
  entities: z
    .record(
      z.object({
        sentiment: z.number(),
        confidence: z.number().min(0).max(1).optional(),
        stance: z.enum(["support", "oppose", "neutral"]).optional(),
        emotion: z.string().min(1).optional(),
        mentioned: z.boolean(),
      })
    )
    .default({}),
  overallSentiment: z.number(),
  emotion: z.string().min(1).optional(),
  topics: z.array(z.string()).default([]),
  toxicity: z.number().min(0).max(1).optional(),
  sarcasm: z.boolean().default(false),
  discoveries: z
    .array(z.object({ name: z.string().min(1), kind: z.enum(ENTITY_KINDS).catch("person") }))
    .default([]),
});

const SYSTEM_PROMPT = `You score social media comments about entertainment news.
Understand stan culture, sarcasm and entertainment slang.

Rules:
- Score each listed entity from -1.0 (very negative) to 1.0 (very positive).
- An entity that is listed but not actually mentioned in the comment scores 0.0 with "mentioned": false.
- A question asking whether something is true is neutral (0.0) unless it is clearly rhetorical.
- An ironic emoji or phrase over a positive surface (for example "Great job 🙄") is negative.
- Sympathy for someone's misfortune ("I feel bad for X") is positive toward X.
- List people, shows or brands you notice that are not in the entity list under "discoveries".

Respond with JSON only:
{"confidence": number, "entities": {"<entity name>": {"sentiment": number, "confidence": number, "stance": "support"|"oppose"|"neutral", "emotion": string, "mentioned": boolean}}, "overallSentiment": number, "emotion": string, "topics": string[], "toxicity": number, "sarcasm": boolean, "discoveries": [{"name": string, "kind": "person"|"show"|"couple"|"brand"}]}`;

function buildUserPrompt(request: ScoreRequest): string {
  const entities = request.candidates.map((c) => `- ${c.entityName} (written as "${c.matchedString}")`);
  return [
    `Post caption: ${request.postContext.caption || "(none)"}`,
    `Platform: ${request.postContext.platform}`,
    `Likes: ${request.engagement.likeCount}`,
    "",
    "Entities:",
    entities.length > 0 ? entities.join("\n") : "- (none)",
    "",
    `Comment: ${request.text}`,
  ].join("\n");
}

function toScoringError(error: unknown): ScoringError {
  if (error instanceof ScoringError) return error;

  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return new ScoringError(`Model request timed out: ${error.message}`, "timeout", true, error);
    }
    const status = error.response?.status;
    if (status === 429) {
      return new ScoringError("Model quota exceeded (429)", "quota", true, error);
    }
    if (status !== undefined && status < 500) {
      return new ScoringError(`Model request rejected (${status})`, "unavailable", false, error);
    }
    return new ScoringError(`Model unavailable: ${error.message}`, "unavailable", true, error);
  }

  return new ScoringError(`Model request failed: ${errorMessage(error)}`, "unavailable", true, error);
}

export function axiosTransport(options: Omit<RemoteScorerOptions, "transport">): ChatTransport {
  const client = axios.create({
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    headers: {
      Authorization: `Bearer ${options.apiKey}`,
      "Content-Type": "application/json",
    },
  });

  return async (request) => {
    const response = await client.post<unknown>("/chat/completions", request);
    return response.data;
  };
}

/**
 * Scorer backed by an OpenAI-compatible chat completion endpoint. The model's
 * JSON is validated before use and then held to the shared scoring policy.
 */
export class RemoteModelScorer implements SignalScorer {
  readonly name: string;
  private readonly transport: ChatTransport;

  constructor(private readonly options: RemoteScorerOptions) {
    this.name = `remote:${options.model}`;
    this.transport = options.transport ?? axiosTransport(options);
  }

  async score(request: ScoreRequest): Promise<ScoreResult> {
    let body: unknown;
    try {
      body = await this.transport({
        model: this.options.model,
        temperature: 0.2,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: buildUserPrompt(request) },
        ],
      });
    } catch (error) {
      throw toScoringError(error);
    }

    const completion = completionSchema.safeParse(body);
    const content = completion.success ? completion.data.choices[0]?.message.content : null;
    if (!content) {
      throw new ScoringError("Model returned an empty completion", "malformed");
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new ScoringError("Model returned invalid JSON", "malformed", true, error);
    }

    const parsed = scoreSchema.safeParse(json);
    if (!parsed.success) {
      throw new ScoringError(
        `Model response failed validation: ${parsed.error.issues
          .map((i) => `${i.path.join(".")} ${i.message}`)
          .join("; ")}`,
        "malformed"
      );
    }

    return enforceScoringPolicy(request, { source: this.name, ...parsed.data });
  }
}
