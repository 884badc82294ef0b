import Database from "better-sqlite3";
import { LifecycleSnapshotSchema, type LifecycleSnapshot } from "@satchel/schemas";
import type { IStateStore } from "../core/state-store";

interface SecretRow {
  name: string;
  data_json: string;
  lease_id: string | null;
  renewable: number;
  lease_duration_seconds: number;
  resolved_at: string;
  expires_at: string | null;
}

interface UsageRow {
  secret_name: string;
  path: string;
  priority: number;
}

interface MetaRow {
  value: string | null;
}

/**
 * Lifecycle snapshot persisted in SQLite. Every save rewrites all rows in a
 * single transaction.
 */
export class SqliteStateStore implements IStateStore {
  constructor(private readonly db: Database.Database) {}

  load(): LifecycleSnapshot | null {
    const meta = this.db.prepare<[string], MetaRow>("SELECT value FROM agent_meta WHERE key = ?").get("token");
    const rows = this.db.prepare<[], SecretRow>("SELECT * FROM secrets ORDER BY name").all();
    if (!meta && rows.length === 0) {
      return null;
    }

    const usages = this.db
      .prepare<[], UsageRow>("SELECT secret_name, path, priority FROM secret_usages ORDER BY priority DESC, path")
      .all();

    return LifecycleSnapshotSchema.parse({
      token: meta?.value ?? null,
      secrets: rows.map((row) => ({
        name: row.name,
        data: JSON.parse(row.data_json),
        leaseId: row.lease_id ?? undefined,
        renewable: row.renewable === 1,
        leaseDurationSeconds: row.lease_duration_seconds,
        resolvedAt: row.resolved_at,
        expiresAt: row.expires_at,
        filesUsing: usages
          .filter((usage) => usage.secret_name === row.name)
          .map((usage) => ({ path: usage.path, priority: usage.priority }))
      }))
    });
  }

  save(snapshot: LifecycleSnapshot): void {
    const insertSecret = this.db.prepare(
      `INSERT INTO secrets (name, data_json, lease_id, renewable, lease_duration_seconds, resolved_at, expires_at)
       VALUES (@name, @dataJson, @leaseId, @renewable, @leaseDurationSeconds, @resolvedAt, @expiresAt)`
    );
    const insertUsage = this.db.prepare(
      "INSERT INTO secret_usages (secret_name, path, priority) VALUES (?, ?, ?)"
    );
    const upsertMeta = this.db.prepare(
      "INSERT INTO agent_meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value"
    );

    const write = this.db.transaction((next: LifecycleSnapshot) => {
      this.db.prepare("DELETE FROM secret_usages").run();
      this.db.prepare("DELETE FROM secrets").run();
      upsertMeta.run("token", next.token);

      for (const secret of next.secrets) {
        insertSecret.run({
          name: secret.name,
          dataJson: JSON.stringify(secret.data),
          leaseId: secret.leaseId ?? null,
          renewable: secret.renewable ? 1 : 0,
          leaseDurationSeconds: secret.leaseDurationSeconds,
          resolvedAt: secret.resolvedAt,
          expiresAt: secret.expiresAt
        });
        for (const usage of secret.filesUsing) {
          insertUsage.run(secret.name, usage.path, usage.priority);
        }
      }
    });

    write(snapshot);
  }

  close(): void {
    this.db.close();
  }
}
