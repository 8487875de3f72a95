import type { CommitmentErrorCode, CommitmentFailure, Result, VerifyResult } from "./types.ts";

export const verified: VerifyResult = { ok: true } as const;

export function fail(code: CommitmentErrorCode, message: string): CommitmentFailure {
  return { ok: false, code, message };
}

export function succeed<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
