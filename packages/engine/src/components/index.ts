// ──────────────────────────────────────────────
// Weft - Component Registrations
// Registers all built-in stage types with the registry
// ──────────────────────────────────────────────

import { isComponentRegistered, registerComponent } from "../registry.js";
import { AnswerComponent } from "./answer.js";
import { baseParamsSchema, parseParams, type ComponentDefinition } from "./base.js";
import { BeginComponent, beginParamsSchema } from "./begin.js";
import { ExeSqlComponent, exeSqlParamsSchema } from "./exesql.js";
import { GenerateComponent, generateParamsSchema } from "./generate.js";
import { MessageComponent, messageParamsSchema } from "./message.js";
import { RelevantComponent, relevantParamsSchema } from "./relevant.js";
import { RetrievalComponent, retrievalParamsSchema } from "./retrieval.js";
import { RewriteQuestionComponent, rewriteParamsSchema } from "./rewrite.js";

export const BUILTIN_COMPONENTS: ComponentDefinition[] = [
  {
    name: "Begin",
    create: (id, params, runtime) =>
      new BeginComponent(id, parseParams(beginParamsSchema, params, "Begin"), runtime),
  },
  {
    name: "Answer",
    create: (id, params, runtime) =>
      new AnswerComponent(id, parseParams(baseParamsSchema, params, "Answer"), runtime),
  },
  {
    name: "Generate",
    create: (id, params, runtime) =>
      new GenerateComponent(id, parseParams(generateParamsSchema, params, "Generate"), runtime),
  },
  {
    name: "Retrieval",
    create: (id, params, runtime) =>
      new RetrievalComponent(id, parseParams(retrievalParamsSchema, params, "Retrieval"), runtime),
  },
  {
    name: "Relevant",
    create: (id, params, runtime) =>
      new RelevantComponent(id, parseParams(relevantParamsSchema, params, "Relevant"), runtime),
  },
  {
    name: "RewriteQuestion",
    create: (id, params, runtime) =>
      new RewriteQuestionComponent(
        id,
        parseParams(rewriteParamsSchema, params, "RewriteQuestion"),
        runtime
      ),
  },
  {
    name: "ExeSQL",
    create: (id, params, runtime) =>
      new ExeSqlComponent(id, parseParams(exeSqlParamsSchema, params, "ExeSQL"), runtime),
  },
  {
    name: "Message",
    create: (id, params, runtime) =>
      new MessageComponent(id, parseParams(messageParamsSchema, params, "Message"), runtime),
  },
];

// Safe to call repeatedly; only missing types are registered
export function registerAllComponents(): void {
  for (const definition of BUILTIN_COMPONENTS) {
    if (!isComponentRegistered(definition.name)) {
      registerComponent(definition);
    }
  }
}

export {
  AnswerComponent,
  BeginComponent,
  ExeSqlComponent,
  GenerateComponent,
  MessageComponent,
  RelevantComponent,
  RetrievalComponent,
  RewriteQuestionComponent,
};
