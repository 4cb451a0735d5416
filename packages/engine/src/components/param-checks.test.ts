import test from "node:test";
import assert from "node:assert/strict";
import { ConfigurationError } from "@weft/utils";
import {
  checkDecimalFloat,
  checkEmpty,
  checkNonnegativeNumber,
  checkPositiveInteger,
  checkPositiveNumber,
  checkValidValue,
} from "./param-checks.js";

function messageOf(fn: () => void): string {
  try {
    fn();
  } catch (error) {
    assert.ok(error instanceof ConfigurationError);
    return error.message;
  }
  assert.fail("expected a ConfigurationError");
}

test("each primitive names the field and the offending value", () => {
  assert.equal(messageOf(() => checkEmpty("  ", "[Message] Message 1")), "[Message] Message 1 should not be empty");
  assert.equal(messageOf(() => checkPositiveNumber(0, "[Retrieval] Top N")), "[Retrieval] Top N 0 should be a positive number");
  assert.equal(
    messageOf(() => checkNonnegativeNumber(-1, "[Generate] Max tokens")),
    "[Generate] Max tokens -1 should be a non-negative number"
  );
  assert.equal(
    messageOf(() => checkPositiveInteger(1.5, "[Answer] Message window size")),
    "[Answer] Message window size 1.5 should be a positive integer"
  );
  assert.equal(
    messageOf(() => checkValidValue("sqlite", "[ExeSQL] Choose DB type", ["mysql", "mssql"])),
    "[ExeSQL] Choose DB type sqlite not supported, should be one of: mysql, mssql"
  );
  assert.equal(
    messageOf(() => checkDecimalFloat(1.2, "[Generate] Top P")),
    "[Generate] Top P 1.2 not supported, should be a float number in range [0, 1]"
  );
});

test("valid values pass every primitive", () => {
  checkEmpty("x", "f");
  checkPositiveNumber(0.5, "f");
  checkNonnegativeNumber(0, "f");
  checkPositiveInteger(3, "f");
  checkValidValue("mysql", "f", ["mysql"]);
  checkDecimalFloat(0, "f");
  checkDecimalFloat(1, "f");
});
