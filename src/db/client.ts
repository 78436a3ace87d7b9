/**
 * RepoPulse — Supabase Client
 *
 * Service-role client for pipeline writes. Bypasses Row Level Security,
 * so it is only ever created inside the pipeline process.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { StoreError } from '../lib/errors';

export interface SupabaseSettings {
  url: string;
  serviceRoleKey: string;
  /** HTTP implementation for PostgREST calls; the global fetch when omitted */
  fetch?: typeof fetch;
}

export function createSupabase(settings: SupabaseSettings): SupabaseClient {
  return createClient(settings.url, settings.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    global: settings.fetch ? { fetch: settings.fetch } : undefined,
  });
}

/**
 * Normalize a PostgREST error into a StoreError.
 * `status` is the HTTP status of the response when the caller has it.
 */
export function handleSupabaseError(error: unknown, status?: number): StoreError {
  if (error instanceof StoreError) return error;

  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    const code = 'code' in error && typeof error.code === 'string' && error.code !== '' ? error.code : undefined;
    return new StoreError(
      `Supabase error: ${error.message}${code ? ` (code: ${code})` : ''}`,
      { code, status }
    );
  }

  if (error instanceof Error) {
    return new StoreError(`Supabase error: ${error.message}`, { status });
  }

  return new StoreError('Unknown Supabase error', { status });
}
