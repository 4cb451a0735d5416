// ──────────────────────────────────────────────
// Weft - Placeholder substitution
// ──────────────────────────────────────────────

const INPUT_PLACEHOLDER = "{input}";

export function toBulletList(values: string[]): string {
  if (values.length === 0) return "";
  return "  - " + values.join("\n  - ");
}

// Literal replacement; replacer functions keep `$` sequences in values inert
export function substitutePlaceholders(
  template: string,
  values: ReadonlyMap<string, string>,
  resolveInput: () => string
): string {
  let prompt = template;
  for (const [key, value] of values) {
    prompt = prompt.replaceAll(`{${key}}`, () => value);
  }

  if (prompt.includes(INPUT_PLACEHOLDER) && !values.has("input")) {
    const input = resolveInput();
    prompt = prompt.replaceAll(INPUT_PLACEHOLDER, () => input);
  }
  return prompt;
}
