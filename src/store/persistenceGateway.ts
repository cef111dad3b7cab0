import type { Kysely, Transaction } from "kysely";
import { PersistenceError, errorMessage } from "../core/errors.js";
import type { FindingKey } from "../core/ids.js";
import type { FindingRow, ScanMetadata } from "../core/scan.js";
import type { DB, FindingTableName } from "../db/types.js";
import { FINDING_TABLES, findingKey } from "./findingKeys.js";

const KEY_LOOKUP_CHUNK = 1000;

export interface PersistResult {
  /** Rows handed in for the scan. */
  submitted: number;
  /** Rows that were not stored by any earlier scan. */
  newlyPersisted: number;
}

function commonColumns(key: FindingKey, scanId: string, row: FindingRow) {
  return {
    pk: key,
    scan_id: scanId,
    tool: row.toolId,
    root: row.root,
    file_path: row.filePath,
    line_number: row.line,
    end_line_number: row.endLine,
    col_offset: row.column,
    end_col_offset: row.endColumn,
    message: row.message,
    rule: row.rule
  };
}

async function insertFinding(trx: Transaction<DB>, key: FindingKey, scanId: string, row: FindingRow): Promise<void> {
  const common = commonColumns(key, scanId, row);
  switch (row.kind) {
    case "security":
      await trx
        .insertInto("security_findings")
        .values({ ...common, severity: row.severity, confidence: row.confidence, code: row.code, cwe_id: row.cweId })
        .onConflict((oc) => oc.column("pk").doNothing())
        .execute();
      return;
    case "type-check":
      await trx
        .insertInto("type_check_findings")
        .values({ ...common, severity: row.severity, hint: row.hint })
        .onConflict((oc) => oc.column("pk").doNothing())
        .execute();
      return;
    case "complexity":
      await trx
        .insertInto("complexity_findings")
        .values({ ...common, metric: row.metric, score: row.score, rank: row.rank, details: row.details })
        .onConflict((oc) => oc.column("pk").doNothing())
        .execute();
      return;
    case "dead-code":
      await trx
        .insertInto("dead_code_findings")
        .values({ ...common, confidence: row.confidence, symbol_kind: row.symbolKind })
        .onConflict((oc) => oc.column("pk").doNothing())
        .execute();
      return;
    case "lint":
      await trx
        .insertInto("lint_findings")
        .values({ ...common, severity: row.severity, fatal: row.fatal, fixable: row.fixable })
        .onConflict((oc) => oc.column("pk").doNothing())
        .execute();
      return;
  }
}

async function selectKeys(trx: Transaction<DB>, table: FindingTableName, keys: string[]): Promise<Array<{ pk: string }>> {
  switch (table) {
    case "security_findings":
      return trx.selectFrom("security_findings").select("pk").where("pk", "in", keys).execute();
    case "type_check_findings":
      return trx.selectFrom("type_check_findings").select("pk").where("pk", "in", keys).execute();
    case "complexity_findings":
      return trx.selectFrom("complexity_findings").select("pk").where("pk", "in", keys).execute();
    case "dead_code_findings":
      return trx.selectFrom("dead_code_findings").select("pk").where("pk", "in", keys).execute();
    case "lint_findings":
      return trx.selectFrom("lint_findings").select("pk").where("pk", "in", keys).execute();
  }
}

async function deleteOwnKeys(db: Kysely<DB>, table: FindingTableName, scanId: string, keys: string[]): Promise<void> {
  switch (table) {
    case "security_findings":
      await db.deleteFrom("security_findings").where("scan_id", "=", scanId).where("pk", "in", keys).execute();
      return;
    case "type_check_findings":
      await db.deleteFrom("type_check_findings").where("scan_id", "=", scanId).where("pk", "in", keys).execute();
      return;
    case "complexity_findings":
      await db.deleteFrom("complexity_findings").where("scan_id", "=", scanId).where("pk", "in", keys).execute();
      return;
    case "dead_code_findings":
      await db.deleteFrom("dead_code_findings").where("scan_id", "=", scanId).where("pk", "in", keys).execute();
      return;
    case "lint_findings":
      await db.deleteFrom("lint_findings").where("scan_id", "=", scanId).where("pk", "in", keys).execute();
      return;
  }
}

async function existingKeys(trx: Transaction<DB>, table: FindingTableName, keys: string[]): Promise<Set<string>> {
  const found = new Set<string>();
  for (let i = 0; i < keys.length; i += KEY_LOOKUP_CHUNK) {
    const chunk = keys.slice(i, i + KEY_LOOKUP_CHUNK);
    for (const r of await selectKeys(trx, table, chunk)) found.add(r.pk);
  }
  return found;
}

/** What one call wrote before it failed. */
interface WriteLog {
  scanInserted: boolean;
  keys: FindingKey[];
}

/**
 * Writes one scan and its findings in a single transaction. Calls are queued, so only one
 * transaction is open at a time; a finding already stored by an earlier scan is skipped.
 *
 * pg-mem keeps rows written before a failed statement even after ROLLBACK, so a failed call
 * also deletes what it wrote itself. On PostgreSQL those deletes match nothing.
 */
export class PersistenceGateway {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly db: Kysely<DB>) {}

  persist(scan: ScanMetadata, rows: readonly FindingRow[]): Promise<PersistResult> {
    const next = this.tail.then(() => this.persistNow(scan, rows));
    // the caller observes the rejection through `next`; the queue itself keeps going
    this.tail = next.catch(() => undefined);
    return next;
  }

  private async persistNow(scan: ScanMetadata, rows: readonly FindingRow[]): Promise<PersistResult> {
    for (const row of rows) {
      if (row.kind !== scan.kind || row.toolId !== scan.toolId) {
        throw new PersistenceError(`scan ${scan.scanId} (${scan.toolId}) was handed a ${row.kind} row from ${row.toolId}`);
      }
    }

    const byKey = new Map<FindingKey, FindingRow>();
    for (const row of rows) {
      const key = findingKey(row);
      if (!byKey.has(key)) byKey.set(key, row);
    }
    const table = FINDING_TABLES[scan.kind];

    const written: WriteLog = { scanInserted: false, keys: [] };
    try {
      return await this.db.transaction().execute(async (trx) => {
        const existing = byKey.size ? await existingKeys(trx, table, [...byKey.keys()]) : new Set<string>();
        const known = await trx.selectFrom("scan_metadata").select("scan_id").where("scan_id", "=", scan.scanId).executeTakeFirst();

        written.scanInserted = known === undefined;
        await trx
          .insertInto("scan_metadata")
          .values({
            scan_id: scan.scanId,
            tool: scan.toolId,
            tool_kind: scan.kind,
            root: scan.root,
            project_path: scan.projectPath,
            scan_timestamp: scan.scanTimestamp,
            command: scan.command,
            exit_code: scan.exitCode,
            duration_ms: scan.durationMs,
            state: scan.state,
            stderr: scan.stderr,
            failure: scan.failure,
            finding_count: scan.findingCount
          })
          .onConflict((oc) => oc.column("scan_id").doNothing())
          .execute();

        let newlyPersisted = 0;
        for (const [key, row] of byKey) {
          if (existing.has(key)) continue;
          written.keys.push(key);
          await insertFinding(trx, key, scan.scanId, row);
          newlyPersisted++;
        }

        return { submitted: rows.length, newlyPersisted };
      });
    } catch (err) {
      const reason = `failed to persist scan ${scan.scanId} (${scan.toolId}): ${errorMessage(err)}`;
      try {
        await this.undo(scan, table, written);
      } catch (undoErr) {
        throw new PersistenceError(`${reason}; cleanup also failed: ${errorMessage(undoErr)}`, { cause: err });
      }
      throw new PersistenceError(reason, { cause: err });
    }
  }

  private async undo(scan: ScanMetadata, table: FindingTableName, written: WriteLog): Promise<void> {
    for (let i = 0; i < written.keys.length; i += KEY_LOOKUP_CHUNK) {
      await deleteOwnKeys(this.db, table, scan.scanId, written.keys.slice(i, i + KEY_LOOKUP_CHUNK));
    }
    if (written.scanInserted) {
      await this.db.deleteFrom("scan_metadata").where("scan_id", "=", scan.scanId).execute();
    }
  }
}
