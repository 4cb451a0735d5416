// ──────────────────────────────────────────────
// Weft - Generate component
// Resolves prompt placeholders from the graph, fits history into the
// backend budget, then answers synchronously or as a stream
// ──────────────────────────────────────────────

import { z } from "zod";
import type {
  ComponentType,
  GenerationBackend,
  GenerationConfig,
  HistoryEntry,
  PromptInputElement,
  Reference,
  ResultRow,
} from "@weft/types";
import { DEFAULT_EMPTY_RESPONSE } from "@weft/types";
import { stripReasoning } from "@weft/utils";
import { citeAnswer, readCitableChunks } from "../citation/cite.js";
import { extractDependencies, schedulingDependencies } from "../prompt/dependencies.js";
import { prepareMessages, type PreparedMessages } from "../prompt/message-fit.js";
import { substitutePlaceholders, toBulletList } from "../prompt/substitution.js";
import { StageStream } from "../stream.js";
import {
  baseParamsSchema,
  beOutput,
  ComponentBase,
  rowsResult,
  type DebugKwargs,
  type StageKwargs,
  type StageResult,
} from "./base.js";
import { BeginComponent } from "./begin.js";
import { GenerationStreamSource } from "./generation-stream.js";
import { checkDecimalFloat, checkEmpty, checkNonnegativeNumber } from "./param-checks.js";

export const DEBUG_USER_INPUT = "Debug input: Output please.";

export const generateParamsSchema = baseParamsSchema.extend({
  llmId: z.string().default(""),
  prompt: z.string().default(""),
  maxTokens: z.number().default(0),
  temperature: z.number().default(0),
  topP: z.number().default(0),
  presencePenalty: z.number().default(0),
  frequencyPenalty: z.number().default(0),
  cite: z.boolean().default(true),
  debugInputs: z
    .array(z.object({ key: z.string(), value: z.string().default("") }))
    .default([]),
});

export type GenerateParams = z.infer<typeof generateParamsSchema>;

export interface ResolvedPrompt {
  prompt: string;
  // One entry per retrieval-type dependency, in template order
  retrievals: ResultRow[][];
}

// Rows from a retrieval stage that found nothing
export function isRetrievalEmpty(rows: ResultRow[]): boolean {
  return rows.every((row) => row.emptyResponse !== undefined || row.content.trim() === "");
}

export function emptyRetrievalMessage(rows: ResultRow[]): string {
  const configured = rows[0]?.emptyResponse;
  return configured && configured.trim() ? configured : DEFAULT_EMPTY_RESPONSE;
}

export class GenerateComponent<P extends GenerateParams = GenerateParams> extends ComponentBase<P> {
  readonly componentName: ComponentType = "Generate";

  override check(): void {
    super.check();
    checkDecimalFloat(this.params.temperature, "[Generate] Temperature");
    checkDecimalFloat(this.params.presencePenalty, "[Generate] Presence penalty");
    checkDecimalFloat(this.params.frequencyPenalty, "[Generate] Frequency penalty");
    checkNonnegativeNumber(this.params.maxTokens, "[Generate] Max tokens");
    checkDecimalFloat(this.params.topP, "[Generate] Top P");
    checkEmpty(this.params.llmId, "[Generate] LLM");
  }

  // Only settings above zero are sent to the backend
  generationConfig(): GenerationConfig {
    const config: GenerationConfig = {};
    if (this.params.maxTokens > 0) config.maxTokens = this.params.maxTokens;
    if (this.params.temperature > 0) config.temperature = this.params.temperature;
    if (this.params.topP > 0) config.topP = this.params.topP;
    if (this.params.presencePenalty > 0) config.presencePenalty = this.params.presencePenalty;
    if (this.params.frequencyPenalty > 0) config.frequencyPenalty = this.params.frequencyPenalty;
    return config;
  }

  getInputElements(): PromptInputElement[] {
    return extractDependencies(this.params.prompt).map((element) => {
      if (element.kind === "node") {
        return { ...element, name: this.runtime.getComponentName(element.key) || element.key };
      }
      if (element.kind === "begin-param") {
        const entry = this.runtime.getComponent(element.entryNodeId);
        const param =
          entry instanceof BeginComponent
            ? entry.queryParams.find((query) => query.key === element.paramKey)
            : undefined;
        return { ...element, name: param?.name || element.paramKey };
      }
      return element;
    });
  }

  getDependentComponents(): string[] {
    return schedulingDependencies(extractDependencies(this.params.prompt));
  }

  resolvePrompt(): ResolvedPrompt {
    const values = new Map<string, string>();
    const retrievals: ResultRow[][] = [];

    for (const element of this.getInputElements().slice(1)) {
      if (element.kind === "begin-param") {
        const entry = this.runtime.getComponent(element.entryNodeId);
        const value =
          entry instanceof BeginComponent ? entry.getQueryValue(element.paramKey) : undefined;
        if (value === undefined) {
          this.logger.warn("Begin parameter not found, substituting empty text", {
            placeholder: element.key,
          });
        }
        values.set(element.key, value ?? "");
        continue;
      }
      if (element.kind !== "node") continue;

      const component = this.runtime.getComponent(element.key);
      if (!component) {
        this.logger.warn("Prompt references a node that is not in the workflow", {
          placeholder: element.key,
        });
        continue;
      }

      if (component.componentName === "Answer") {
        values.set(element.key, this.runtime.getHistory(1)[0]?.content ?? "");
        continue;
      }

      const rows = component.output(false);
      values.set(element.key, toBulletList(nonBlankContents(rows)));
      if (component.componentName === "Retrieval") {
        retrievals.push(rows);
      }
    }

    const prompt = substitutePlaceholders(this.params.prompt, values, () =>
      toBulletList(nonBlankContents(this.getInput()))
    );
    return { prompt, retrievals };
  }

  // Stream only into a lone answer node
  shouldStream(kwargs: StageKwargs): boolean {
    const downstream = this.downstream;
    const [only] = downstream;
    return (
      kwargs.stream === true &&
      downstream.length === 1 &&
      only !== undefined &&
      this.runtime.getComponentName(only) === "Answer"
    );
  }

  protected async invoke(history: HistoryEntry[], kwargs: StageKwargs): Promise<StageResult> {
    void history;
    const { prompt, retrievals } = this.resolvePrompt();
    const retrievalRows = retrievals.flat();
    const emptyMessage =
      retrievals.length > 0 && isRetrievalEmpty(retrievalRows)
        ? emptyRetrievalMessage(retrievalRows)
        : null;

    if (this.shouldStream(kwargs)) {
      return { kind: "stream", stream: this.streamAnswer(prompt, retrievalRows, emptyMessage) };
    }

    if (emptyMessage !== null) {
      this.logger.info("Retrieval context is empty, skipping generation", { emptyMessage });
      return rowsResult(beOutput(emptyMessage));
    }

    const backend = this.chatBackend();
    const prepared = this.prepare(prompt, backend);
    const config = this.generationConfig();

    const raw = await backend.chat(prepared.systemPrompt, prepared.messages, config);
    const answer = stripReasoning(raw);
    this.runtime.setComponentInfo(this.id, {
      prompt: prepared.systemPrompt,
      messages: prepared.messages,
      config,
    });

    const final = await this.finalizeAnswer(answer, retrievalRows);
    return rowsResult([{ content: final.content, reference: final.reference }]);
  }

  override async debug(kwargs: DebugKwargs = {}): Promise<ResultRow[]> {
    const inputs = new Map<string, string>();
    for (const { key, value } of this.params.debugInputs) {
      inputs.set(key, value);
    }
    for (const [key, value] of Object.entries(kwargs)) {
      inputs.set(key, value);
    }

    let prompt = this.params.prompt;
    for (const [key, value] of inputs) {
      prompt = prompt.replaceAll(`{${key}}`, () => value);
    }

    const answer = await this.chatBackend().chat(
      prompt,
      [{ role: "user", content: inputs.get("user") ?? DEBUG_USER_INPUT }],
      this.generationConfig()
    );
    return [{ content: answer }];
  }

  protected chatBackend(): GenerationBackend {
    return this.runtime.services.getChatBackend(this.params.llmId);
  }

  protected prepare(prompt: string, backend: GenerationBackend): PreparedMessages {
    return prepareMessages(
      prompt,
      this.runtime.getHistory(this.params.messageHistoryWindowSize),
      backend.maxLength,
      backend.lengthUnit
    );
  }

  private async finalizeAnswer(
    answer: string,
    retrievalRows: ResultRow[]
  ): Promise<{ content: string; reference: Reference }> {
    if (this.params.cite && retrievalRows.length > 0) {
      const decoded = readCitableChunks(retrievalRows, this.logger);
      if (decoded.length > 0) {
        return citeAnswer(decoded, answer, {
          citation: this.runtime.services.citation,
          embeddingModel: this.runtime.getEmbeddingModel(),
          logger: this.logger,
        });
      }
    }
    return { content: answer, reference: [] };
  }

  private streamAnswer(prompt: string, retrievalRows: ResultRow[], emptyMessage: string | null): StageStream {
    const source = new GenerationStreamSource({
      emptyMessage,
      open: () => {
        const backend = this.chatBackend();
        const prepared = this.prepare(prompt, backend);
        const config = this.generationConfig();
        const deltas = backend.chatStreaming(prepared.systemPrompt, prepared.messages, config);
        this.runtime.setComponentInfo(this.id, {
          prompt: prepared.systemPrompt,
          messages: prepared.messages,
          config,
        });
        return deltas;
      },
      finalize: (answer) => this.finalizeAnswer(answer, retrievalRows),
    });
    return new StageStream(source);
  }
}

function nonBlankContents(rows: ResultRow[]): string[] {
  return rows.map((row) => row.content).filter((content) => content.trim() !== "");
}
