import test from "node:test";
import assert from "node:assert/strict";
import { DuplicateComponentTypeError, UnknownComponentTypeError } from "@weft/utils";
import { BUILTIN_COMPONENTS, registerAllComponents } from "./components/index.js";
import { listAvailableComponents, registerComponent, resolveComponent } from "./registry.js";

test("built-in components register once and resolve by name", () => {
  registerAllComponents();
  registerAllComponents();

  assert.deepEqual(
    listAvailableComponents(),
    BUILTIN_COMPONENTS.map((definition) => definition.name)
  );
  assert.equal(resolveComponent("Generate").name, "Generate");
  assert.throws(() => resolveComponent("Teleport"), UnknownComponentTypeError);
});

test("registering a type twice raises a typed error", () => {
  registerAllComponents();
  const [begin] = BUILTIN_COMPONENTS;
  assert.ok(begin);

  assert.throws(
    () => registerComponent(begin),
    (error: unknown) =>
      error instanceof DuplicateComponentTypeError &&
      error.code === "DUPLICATE_COMPONENT_TYPE" &&
      error.message === 'Component type "Begin" is already registered'
  );
});
