/**
 * Job Repository
 * Database access layer for the jobs table. Sole source of truth for job state.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { JOB_STATUSES, statusFields, type JobStatus } from "../services/business/jobStateMachine.js";
import { ConflictError, NotFoundError, PersistenceError } from "../utils/errors.js";

export interface Job {
  id: string;
  source_url: string;
  platform: string;
  status: JobStatus;
  error: string | null;
  result_ref: string | null;
  created_at: string;
  updated_at: string;
}

export interface CreateJobInput {
  id: string;
  source_url: string;
  platform: string;
}

export interface JobRepository {
  /** Inserts a queued job. Throws ConflictError when the id is taken. */
  create(input: CreateJobInput): Promise<Job>;
  /** Throws NotFoundError when absent. */
  get(id: string): Promise<Job>;
  /** Most recent first. */
  list(limit?: number): Promise<Job[]>;
  /** Oldest first, rows with created_at < cutoff. */
  listBefore(cutoff: Date, pageSize?: number, offset?: number): Promise<Job[]>;
  /** Oldest update first, rows in `status` with updated_at < before. */
  listByStatus(status: JobStatus, before: Date, limit?: number): Promise<Job[]>;
  /** Deletes rows with created_at < cutoff and returns how many went. */
  deleteBefore(cutoff: Date): Promise<number>;
  /** Overwrites status, error and result reference and refreshes updated_at in one statement. */
  updateStatus(id: string, status: JobStatus, error?: string | null, resultRef?: string | null): Promise<void>;
  /**
   * Writes `status` only while the row is still in one of `from`.
   * Returns false when the row is gone or has moved on.
   */
  transitionStatus(id: string, from: readonly JobStatus[], status: JobStatus): Promise<boolean>;
}

export const DEFAULT_LIST_LIMIT = 20;
export const MAX_LIST_LIMIT = 100;
export const DEFAULT_PAGE_SIZE = 200;

const TABLE = "jobs";

const jobRowSchema = z.object({
  id: z.string(),
  source_url: z.string(),
  platform: z.string(),
  status: z.enum(JOB_STATUSES),
  error: z.string().nullable(),
  result_ref: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const jobRowsSchema = z.array(jobRowSchema);

/** Applies the default of 20 and the hard cap of 100. */
export function clampListLimit(limit?: number): number {
  if (limit === undefined || !Number.isFinite(limit) || limit <= 0) {
    return DEFAULT_LIST_LIMIT;
  }
  return Math.min(Math.floor(limit), MAX_LIST_LIMIT);
}

function parseJob(data: unknown): Job {
  const parsed = jobRowSchema.safeParse(data);
  if (!parsed.success) {
    throw new PersistenceError("read job", "malformed row");
  }
  return parsed.data;
}

function parseJobs(data: unknown): Job[] {
  const parsed = jobRowsSchema.safeParse(data ?? []);
  if (!parsed.success) {
    throw new PersistenceError("read jobs", "malformed rows");
  }
  return parsed.data;
}

/**
 * Creates the Supabase-backed repository.
 */
export function createJobRepository(supabase: SupabaseClient): JobRepository {
  return {
    async create(input) {
      const now = new Date().toISOString();
      const { data, error } = await supabase
        .from(TABLE)
        .insert({
          id: input.id,
          source_url: input.source_url,
          platform: input.platform,
          status: "queued",
          error: null,
          result_ref: null,
          created_at: now,
          updated_at: now,
        })
        .select()
        .single();

      if (error) {
        // 23505 = unique_violation
        if (error.code === "23505") {
          throw new ConflictError(`Job ${input.id} already exists`);
        }
        throw new PersistenceError("create job", error.message);
      }

      return parseJob(data);
    },

    async get(id) {
      const { data, error } = await supabase.from(TABLE).select().eq("id", id).single();

      if (error) {
        // PGRST116 = no rows
        if (error.code === "PGRST116") {
          throw new NotFoundError("Job", id);
        }
        throw new PersistenceError("load job", error.message);
      }

      return parseJob(data);
    },

    async list(limit) {
      const { data, error } = await supabase
        .from(TABLE)
        .select()
        .order("created_at", { ascending: false })
        .limit(clampListLimit(limit));

      if (error) {
        throw new PersistenceError("list jobs", error.message);
      }

      return parseJobs(data);
    },

    async listBefore(cutoff, pageSize = DEFAULT_PAGE_SIZE, offset = 0) {
      const { data, error } = await supabase
        .from(TABLE)
        .select()
        .lt("created_at", cutoff.toISOString())
        .order("created_at", { ascending: true })
        .range(offset, offset + pageSize - 1);

      if (error) {
        throw new PersistenceError("list jobs", error.message);
      }

      return parseJobs(data);
    },

    async listByStatus(status, before, limit = DEFAULT_PAGE_SIZE) {
      const { data, error } = await supabase
        .from(TABLE)
        .select()
        .eq("status", status)
        .lt("updated_at", before.toISOString())
        .order("updated_at", { ascending: true })
        .limit(limit);

      if (error) {
        throw new PersistenceError("list jobs", error.message);
      }

      return parseJobs(data);
    },

    async deleteBefore(cutoff) {
      const { count, error } = await supabase
        .from(TABLE)
        .delete({ count: "exact" })
        .lt("created_at", cutoff.toISOString());

      if (error) {
        throw new PersistenceError("delete jobs", error.message);
      }

      return count ?? 0;
    },

    async updateStatus(id, status, error, resultRef) {
      const fields = statusFields(status, error, resultRef);
      const { data, error: dbError } = await supabase
        .from(TABLE)
        .update({
          status,
          error: fields.error,
          result_ref: fields.resultRef,
          updated_at: new Date().toISOString(),
        })
        .eq("id", id)
        .select("id");

      if (dbError) {
        throw new PersistenceError("update job", dbError.message);
      }
      if (!data || data.length === 0) {
        throw new NotFoundError("Job", id);
      }
    },

    async transitionStatus(id, from, status) {
      const fields = statusFields(status);
      const { data, error: dbError } = await supabase
        .from(TABLE)
        .update({
          status,
          error: fields.error,
          result_ref: fields.resultRef,
          updated_at: new Date().toISOString(),
        })
        .eq("id", id)
        .in("status", [...from])
        .select("id");

      if (dbError) {
        throw new PersistenceError("update job", dbError.message);
      }
      return (data ?? []).length > 0;
    },
  };
}
