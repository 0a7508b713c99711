import { sleep, type Sleeper } from "./types";

export const AFFILIATION_LABELS = [
  "israel",
  "palestine",
  "blm",
  "ukraine",
  "climate",
  "feminism",
  "lgbtq",
  "none",
] as const;

export const UNCLASSIFIED = "none";

const SYSTEM_INSTRUCTION = `Classify the activism or political affiliation expressed by a GitHub repository.
Answer with exactly one lowercase word from this list: ${AFFILIATION_LABELS.join(", ")}.
Answer "none" when the text shows no clear affiliation. No punctuation, no explanation.`;

export interface ClassificationRequest {
  systemInstruction: string;
  userText: string;
}

export interface ClassificationChannel {
  complete(request: ClassificationRequest, signal: AbortSignal): Promise<string>;
}

/**
 * Lowercases and strips punctuation from a model reply, then returns the
 * first vocabulary term it contains, or `fallback`.
 */
export function normalizeLabel(
  raw: string,
  vocabulary: readonly string[] = AFFILIATION_LABELS,
  fallback: string = UNCLASSIFIED
): string {
  const cleaned = raw
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .trim();
  return vocabulary.find((term) => cleaned.includes(term)) ?? fallback;
}

export interface ChatCompletionsChannelOptions {
  url: string;
  apiKey?: string;
  model: string;
  maxTokens?: number;
  fetchImpl?: typeof fetch;
}

function readCompletionContent(body: unknown): string {
  if (typeof body !== "object" || body === null || !("choices" in body) || !Array.isArray(body.choices)) {
    throw new Error("Classifier response has no choices");
  }
  const [first]: unknown[] = body.choices;
  if (
    typeof first === "object" &&
    first !== null &&
    "message" in first &&
    typeof first.message === "object" &&
    first.message !== null &&
    "content" in first.message &&
    typeof first.message.content === "string"
  ) {
    return first.message.content;
  }
  throw new Error("Classifier response has no message content");
}

/** OpenAI-compatible `/chat/completions` endpoint. */
export class ChatCompletionsChannel implements ClassificationChannel {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: ChatCompletionsChannelOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async complete(request: ClassificationRequest, signal: AbortSignal): Promise<string> {
    const response = await this.fetchImpl(this.options.url, {
      method: "POST",
      signal,
      headers: {
        "Content-Type": "application/json",
        ...(this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : {}),
      },
      body: JSON.stringify({
        model: this.options.model,
        messages: [
          { role: "system", content: request.systemInstruction },
          { role: "user", content: request.userText },
        ],
        temperature: 0,
        max_tokens: this.options.maxTokens ?? 10,
        stream: false,
      }),
    });
    if (!response.ok) {
      throw new Error(`Classifier responded ${response.status}`);
    }
    return readCompletionContent(await response.json());
  }
}

export interface ClassifierOptions {
  maxRetries?: number;
  timeoutMs?: number;
  maxInputChars?: number;
  sleeper?: Sleeper;
}

export class Classifier {
  private readonly maxRetries: number;
  private readonly timeoutMs: number;
  private readonly maxInputChars: number;
  private readonly sleeper: Sleeper;

  constructor(private readonly channel: ClassificationChannel, options: ClassifierOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxInputChars = options.maxInputChars ?? 3000;
    this.sleeper = options.sleeper ?? sleep;
  }

  async classify(text: string): Promise<string> {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      return UNCLASSIFIED;
    }
    const request: ClassificationRequest = {
      systemInstruction: SYSTEM_INSTRUCTION,
      userText: `${trimmed.slice(0, this.maxInputChars)}\n\nClassification:`,
    };

    for (let attempt = 0; attempt < this.maxRetries; attempt += 1) {
      try {
        const reply = await this.channel.complete(request, AbortSignal.timeout(this.timeoutMs));
        return normalizeLabel(reply);
      } catch (error) {
        console.warn(
          `   ⚠️  Classification attempt ${attempt + 1}/${this.maxRetries} failed: ${
            error instanceof Error ? error.message : String(error)
          }`
        );
        if (attempt < this.maxRetries - 1) {
          await this.sleeper(1000 * 2 ** attempt);
        }
      }
    }

    console.error(`   ❌ All classification attempts failed; using '${UNCLASSIFIED}'`);
    return UNCLASSIFIED;
  }
}
