import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { PipelineProfile, SourceColumns } from "../config/types.pipeline.js";
import type { NewsTables } from "./tables.js";
import type { Candidate, StoredRecordRow } from "./types.js";
import { asRecord } from "../llm/json.js";

export function createSupabaseClient(params: {
  url: string;
  key: string;
  fetch?: typeof fetch;
}): SupabaseClient {
  return createClient(params.url, params.key, {
    auth: { persistSession: false, autoRefreshToken: false },
    ...(params.fetch ? { global: { fetch: params.fetch } } : {}),
  });
}

/**
 * Source ids are also selected cast to text under this alias, so bigint
 * keys above 2^53 survive JSON decoding.
 */
export const ID_TEXT_ALIAS = "id_text";

function readString(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  return "";
}

function readOptionalString(row: Record<string, unknown>, key: string): string | null {
  const value = readString(row, key);
  return value ? value : null;
}

export function mapCandidateRow(raw: unknown, columns: SourceColumns): Candidate | null {
  const row = asRecord(raw);
  if (!row) {
    return null;
  }
  return {
    id: readString(row, ID_TEXT_ALIAS) || readString(row, columns.id),
    headline: readString(row, columns.headline),
    description: readString(row, columns.description),
    sourceName: readString(row, columns.source),
    publishedAt: readOptionalString(row, columns.publishedAt),
    link: readString(row, columns.link),
    ingestedAt: readOptionalString(row, columns.ingestedAt),
    processed: row[columns.processed] === true,
  };
}

function mapCandidateRows(rows: unknown[] | null, columns: SourceColumns): Candidate[] {
  const candidates: Candidate[] = [];
  for (const row of rows ?? []) {
    const candidate = mapCandidateRow(row, columns);
    if (candidate) {
      candidates.push(candidate);
    }
  }
  return candidates;
}

function readIds(rows: unknown[] | null): string[] {
  const ids: string[] = [];
  for (const row of rows ?? []) {
    const id = readString(asRecord(row) ?? {}, "id");
    if (id) {
      ids.push(id);
    }
  }
  return ids;
}

function raise(table: string, op: string, error: { message: string }): never {
  throw new Error(`${table} ${op} failed: ${error.message}`);
}

export function createSupabaseNewsTables(params: {
  client: SupabaseClient;
  profile: PipelineProfile;
}): NewsTables {
  const { client, profile } = params;
  const { columns, sourceTable, destinationTable } = profile;
  const sourceSelect = `*,${ID_TEXT_ALIAS}:${columns.id}::text`;

  const found = (
    op: string,
    result: { data: unknown[] | null; error: { message: string } | null },
  ): boolean => {
    if (result.error) {
      raise(destinationTable, op, result.error);
    }
    return (result.data ?? []).length > 0;
  };

  return {
    async fetchLatest(limit) {
      const { data, error } = await client
        .from(sourceTable)
        .select(sourceSelect)
        .order(columns.publishedAt, { ascending: false })
        .limit(limit);
      if (error) {
        raise(sourceTable, "select latest", error);
      }
      return mapCandidateRows(data, columns);
    },
    async fetchUnprocessed({ limit, sinceIso }) {
      const { data, error } = await client
        .from(sourceTable)
        .select(sourceSelect)
        .not(columns.processed, "is", true)
        .gte(columns.ingestedAt, sinceIso)
        .order(columns.ingestedAt, { ascending: false })
        .limit(limit);
      if (error) {
        raise(sourceTable, "select unprocessed", error);
      }
      return mapCandidateRows(data, columns);
    },
    async markProcessed(candidateId) {
      const { error } = await client
        .from(sourceTable)
        .update({ [columns.processed]: true })
        .eq(columns.id, candidateId);
      if (error) {
        raise(sourceTable, "mark processed", error);
      }
    },
    async existsByLink(link) {
      const result = await client
        .from(destinationTable)
        .select("id")
        .eq("original_link", link)
        .limit(1);
      return found("lookup by link", result);
    },
    async existsByHeadlineSince({ headline, sinceIso }) {
      const result = await client
        .from(destinationTable)
        .select("id")
        .eq("original_headline", headline)
        .gte("processed_at", sinceIso)
        .limit(1);
      return found("lookup by headline", result);
    },
    async existsByOriginalId(originalId) {
      const result = await client
        .from(destinationTable)
        .select("id")
        .eq("original_id", originalId)
        .limit(1);
      return found("lookup by original id", result);
    },
    async countStored() {
      const { count, error } = await client
        .from(destinationTable)
        .select("id", { count: "exact", head: true });
      if (error) {
        raise(destinationTable, "count", error);
      }
      return count ?? 0;
    },
    async listOldestStoredIds({ limit, orderBy }) {
      const { data, error } = await client
        .from(destinationTable)
        .select("id::text")
        .order(orderBy, { ascending: true })
        .limit(limit);
      if (error) {
        raise(destinationTable, "select oldest", error);
      }
      return readIds(data);
    },
    async deleteStored(id) {
      const { error } = await client.from(destinationTable).delete().eq("id", id);
      if (error) {
        raise(destinationTable, "delete", error);
      }
    },
    async insertStored(row: StoredRecordRow) {
      const { error } = await client.from(destinationTable).insert(row);
      if (error) {
        raise(destinationTable, "insert", error);
      }
    },
  };
}
