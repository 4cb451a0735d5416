// ──────────────────────────────────────────────
// Weft - Prompt dependency scanner
// ──────────────────────────────────────────────

import type { PromptInputElement } from "@weft/types";
import { USER_INPUT_ELEMENT_NAME } from "@weft/types";

// {node_id}, {Type:node_id} or {begin@param}
const PLACEHOLDER_PATTERN = /\{([a-z][a-z0-9_-]*(?:[:@][a-z0-9_-]+)?)\}/gi;

// Resolved outside the dependency list
const RESERVED_KEYS = new Set(["user", "input"]);

const BEGIN_PREFIX = "begin@";

export function extractDependencies(template: string): PromptInputElement[] {
  const elements: PromptInputElement[] = [
    { kind: "literal", key: "user", name: USER_INPUT_ELEMENT_NAME },
  ];
  const seen = new Set<string>();

  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const key = match[1];
    if (key === undefined || seen.has(key) || RESERVED_KEYS.has(key.toLowerCase())) continue;
    seen.add(key);

    if (key.toLowerCase().startsWith(BEGIN_PREFIX)) {
      const separator = key.indexOf("@");
      const paramKey = key.slice(separator + 1);
      elements.push({
        kind: "begin-param",
        key,
        entryNodeId: key.slice(0, separator),
        paramKey,
        name: paramKey,
      });
      continue;
    }

    elements.push({ kind: "node", key, name: key });
  }

  return elements;
}

// Ids a stage waits on; answer and begin nodes are conversational anchors
export function schedulingDependencies(elements: PromptInputElement[]): string[] {
  const ids: string[] = [];
  for (const element of elements.slice(1)) {
    const lowered = element.key.toLowerCase();
    if (lowered.includes("answer") || lowered.includes("begin")) continue;
    if (!ids.includes(element.key)) ids.push(element.key);
  }
  return ids;
}
