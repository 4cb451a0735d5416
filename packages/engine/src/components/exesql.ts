// ──────────────────────────────────────────────
// Weft - ExeSQL component
// Database access is disabled: SQL is extracted and reported, never run
// ──────────────────────────────────────────────

import { z } from "zod";
import type { ComponentType, ResultRow } from "@weft/types";
import { stripReasoning } from "@weft/utils";
import { beOutput, rowsResult, type StageResult } from "./base.js";
import { GenerateComponent, generateParamsSchema } from "./generate.js";
import { checkEmpty, checkPositiveInteger, checkValidValue } from "./param-checks.js";

export const DB_TYPES = ["mysql", "postgresql", "mariadb", "mssql"] as const;

export const exeSqlParamsSchema = generateParamsSchema.extend({
  dbType: z.string().default("mysql"),
  database: z.string().default(""),
  username: z.string().default(""),
  host: z.string().default(""),
  port: z.number().default(3306),
  password: z.string().default(""),
  topN: z.number().default(30),
});

export type ExeSqlParams = z.infer<typeof exeSqlParamsSchema>;

const FENCED_SQL = /```sql\s*([\s\S]*?)\s*```/;

export function extractSql(text: string): string {
  const answer = stripReasoning(text);
  const fenced = FENCED_SQL.exec(answer);
  if (fenced) {
    return fenced[1] ?? "";
  }

  const sql = answer
    .replace(/^[\s\S]*?SELECT /i, "SELECT ")
    .replace(/;[\s\S]*?SELECT /gi, "; SELECT ")
    .replace(/;[^;]*$/, ";");
  if (!sql) {
    throw new Error("SQL statement not found!");
  }
  return sql;
}

export class ExeSqlComponent extends GenerateComponent<ExeSqlParams> {
  override readonly componentName: ComponentType = "ExeSQL";

  override check(): void {
    super.check();
    checkValidValue(this.params.dbType, "[ExeSQL] Choose DB type", DB_TYPES);
    checkEmpty(this.params.database, "[ExeSQL] Database name");
    checkEmpty(this.params.username, "[ExeSQL] database username");
    checkEmpty(this.params.host, "[ExeSQL] IP Address");
    checkPositiveInteger(this.params.port, "[ExeSQL] IP Port");
    checkEmpty(this.params.password, "[ExeSQL] Database password");
    checkPositiveInteger(this.params.topN, "[ExeSQL] Number of records");
  }

  protected override async invoke(): Promise<StageResult> {
    const input = this.getInput()
      .map((row) => row.content)
      .join("");

    let sql: string;
    try {
      sql = extractSql(input);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn("Could not extract SQL from input", { reason });
      return rowsResult(beOutput(`Error processing SQL input or component disabled: ${reason}`));
    }

    this.logger.info("SQL extracted, execution skipped", { dbType: this.params.dbType, sql });
    return rowsResult(
      beOutput(
        `ExeSQL component is configured for '${this.params.dbType}' but is non-functional ` +
          `as database access is disabled in this environment. Received SQL (not executed): ${sql}`
      )
    );
  }

  override async debug(): Promise<ResultRow[]> {
    const result = await this.invoke();
    return result.kind === "rows" ? result.rows : [];
  }
}
