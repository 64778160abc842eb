// src/lib/llmClient.ts
import OpenAI from "openai";
import { z } from "zod";
import { ModelResponseError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import type { ToolPlan } from "./types.js";

const log = createLogger("llm");

/** プロンプトからツール呼び出し列を得る（テストでは fake に差し替え） */
export interface ToolPlanner {
  plan(systemPrompt: string, userPrompt: string): Promise<ToolPlan>;
}

const PlanSchema = z.object({
  reasoning: z.string().optional().default(""),
  tool_calls: z.array(z.unknown()).optional().default([]),
});

/** ```json フェンスや前置きの説明文を剥がして JSON 部分だけ取り出す */
export function extractJsonBlock(text: string): string {
  let body = text;
  const fence = body.indexOf("```json");
  if (fence >= 0) {
    const start = fence + "```json".length;
    const end = body.indexOf("```", start);
    body = end >= 0 ? body.slice(start, end) : body.slice(start);
  }
  body = body.replace(/```/g, "").trim();

  if (!body.startsWith("{")) {
    const i = body.indexOf("{");
    const j = body.lastIndexOf("}");
    if (i >= 0 && j > i) body = body.slice(i, j + 1);
  }
  return body;
}

export function parseToolPlan(text: string): ToolPlan {
  const body = extractJsonBlock(text);
  let obj: unknown;
  try {
    obj = JSON.parse(body);
  } catch (e) {
    throw new ModelResponseError(`Invalid JSON response from model: ${errorMessage(e)}`, text);
  }
  const parsed = PlanSchema.safeParse(obj);
  if (!parsed.success) {
    throw new ModelResponseError(
      `Unexpected response shape from model: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      text
    );
  }
  return { reasoning: parsed.data.reasoning, toolCalls: parsed.data.tool_calls };
}

export type OpenAIPlannerOptions = {
  apiKey: string;
  model: string;
  timeoutMs?: number;
  maxRetries?: number;
  maxTokens?: number;
};

/**
 * OpenAI Chat Completions で JSON のみを返させる。
 * リトライは SDK 組み込み（maxRetries）に任せる
 */
export class OpenAIToolPlanner implements ToolPlanner {
  private readonly client: OpenAI;

  constructor(private readonly opts: OpenAIPlannerOptions) {
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      timeout: opts.timeoutMs ?? 60_000,
      maxRetries: opts.maxRetries ?? 3,
    });
  }

  async plan(systemPrompt: string, userPrompt: string): Promise<ToolPlan> {
    const chat = await this.client.chat.completions.create({
      model: this.opts.model,
      // temperature は指定しない（非対応モデル対策）
      max_tokens: this.opts.maxTokens ?? 2000,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
    });

    const raw = chat.choices[0]?.message?.content ?? "";
    if (!raw.trim()) throw new ModelResponseError("Empty response from model");
    log.debug(`model response (${raw.length} chars)`);
    return parseToolPlan(raw);
  }
}
