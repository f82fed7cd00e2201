/**
 * Typed error catalog for the build → validate → shard → upload pipeline.
 *
 * Run-level errors (ScanError, ValidationBlockedError, ManifestCorruptionError)
 * abort the run. Shard-level errors (EncodingError, TransferError) are retried
 * per shard and escalate to ShardFailedError once attempts are exhausted.
 */

import type { ValidationReport } from "../validate/types.js";

export class PipelineError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  /** Whether retrying the failed step may succeed. */
  get transient(): boolean {
    return false;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

// Run-level errors

export class ScanError extends PipelineError {
  constructor(
    public readonly root: string,
    reason: string,
    cause?: unknown,
  ) {
    super("SCAN_FAILED", `Cannot scan dataset root ${root}: ${reason}`, { root }, { cause });
  }
}

export class ValidationBlockedError extends PipelineError {
  constructor(public readonly report: ValidationReport) {
    const fatal = report.checks.filter((c) => c.fatal && c.status === "fail");
    super(
      "VALIDATION_BLOCKED",
      `Validation blocked by ${fatal.length} fatal finding(s): ${fatal.map((c) => c.name).join(", ")}`,
      { checks: fatal.map((c) => ({ name: c.name, group: c.group, offendingPaths: c.offendingPaths })) },
    );
  }
}

export class ManifestCorruptionError extends PipelineError {
  constructor(
    public readonly datasetId: string,
    reason: string,
    cause?: unknown,
  ) {
    super(
      "MANIFEST_CORRUPTION",
      `Upload manifest for ${datasetId} is corrupt: ${reason}`,
      { datasetId },
      { cause },
    );
  }
}

// Shard-level errors

export class EncodingError extends PipelineError {
  constructor(
    public readonly recordPath: string,
    cause: unknown,
  ) {
    super(
      "ENCODING_FAILED",
      `Failed to encode ${recordPath}: ${causeMessage(cause)}`,
      { recordPath },
      { cause },
    );
  }

  override get transient(): boolean {
    return true;
  }
}

export interface TransferErrorOptions {
  retryable: boolean;
  shardId?: string;
  status?: number;
  retryAfterMs?: number;
  cause?: unknown;
}

export class TransferError extends PipelineError {
  public readonly retryable: boolean;
  public readonly retryAfterMs?: number;

  constructor(message: string, options: TransferErrorOptions) {
    super(
      "TRANSFER_FAILED",
      message,
      {
        ...(options.shardId !== undefined && { shardId: options.shardId }),
        ...(options.status !== undefined && { status: options.status }),
        retryable: options.retryable,
      },
      { cause: options.cause },
    );
    this.retryable = options.retryable;
    this.retryAfterMs = options.retryAfterMs;
  }

  override get transient(): boolean {
    return this.retryable;
  }
}

export class ShardFailedError extends PipelineError {
  constructor(
    public readonly shardIndex: number,
    public readonly attempts: number,
    cause: unknown,
  ) {
    super(
      "SHARD_FAILED",
      `Shard ${shardIndex} failed after ${attempts} attempt(s): ${causeMessage(cause)}`,
      { shardIndex, attempts },
      { cause },
    );
  }
}
