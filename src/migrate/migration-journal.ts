import { access, readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

/**
 * drizzle-kit's `meta/_journal.json`: the ordered list of generated
 * migrations. Each entry `tag` names `<tag>.sql` beside the meta directory.
 */
const journalSchema = z.object({
  version: z.string(),
  dialect: z.string(),
  entries: z.array(
    z.object({
      idx: z.number().int().min(0),
      version: z.string(),
      when: z.number(),
      tag: z.string().min(1),
      breakpoints: z.boolean(),
    }),
  ),
});

export interface MigrationEntry {
  idx: number;
  tag: string;
  file: string;
  createdAt: string;
}

export class MigrationJournalError extends Error {
  constructor(
    public readonly dir: string,
    reason: string,
  ) {
    super(`Migration journal in ${dir}: ${reason}`);
    this.name = "MigrationJournalError";
  }
}

/**
 * Read the journal of `dir` and return its migrations in version order.
 *
 * drizzle's migrator applies entries in array order and skips any entry whose
 * `when` is not newer than the last applied one, so the array must already be
 * in ascending `idx` with strictly increasing `when`.
 */
export async function readMigrationJournal(dir: string): Promise<MigrationEntry[]> {
  const journalPath = path.join(dir, "meta", "_journal.json");

  let raw: string;
  try {
    raw = await readFile(journalPath, "utf-8");
  } catch {
    throw new MigrationJournalError(dir, "meta/_journal.json not found");
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new MigrationJournalError(dir, "meta/_journal.json is not valid JSON");
  }

  const parsed = journalSchema.safeParse(data);
  if (!parsed.success) {
    throw new MigrationJournalError(dir, `malformed journal (${parsed.error.issues[0]?.message ?? "invalid"})`);
  }
  if (parsed.data.dialect !== "mysql") {
    throw new MigrationJournalError(dir, `expected mysql migrations, found ${parsed.data.dialect}`);
  }

  const entries = parsed.data.entries;
  for (let i = 1; i < entries.length; i++) {
    const prev = entries[i - 1];
    const entry = entries[i];
    if (!prev || !entry) continue;
    if (entry.idx <= prev.idx) {
      throw new MigrationJournalError(
        dir,
        `${entry.tag} (idx ${entry.idx}) is listed after ${prev.tag} (idx ${prev.idx})`,
      );
    }
    if (entry.when <= prev.when) {
      throw new MigrationJournalError(dir, `${entry.tag} is not newer than ${prev.tag}`);
    }
  }

  const result: MigrationEntry[] = [];
  for (const entry of entries) {
    const file = path.join(dir, `${entry.tag}.sql`);
    try {
      await access(file);
    } catch {
      throw new MigrationJournalError(dir, `${entry.tag}.sql is listed but missing`);
    }
    result.push({ idx: entry.idx, tag: entry.tag, file, createdAt: new Date(entry.when).toISOString() });
  }
  return result;
}
