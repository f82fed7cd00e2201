import { describe, it, expect } from 'vitest'
import {
  PipelineError,
  ScanError,
  ValidationBlockedError,
  ManifestCorruptionError,
  EncodingError,
  TransferError,
  ShardFailedError,
} from './catalog.js'
import type { ValidationReport } from '../validate/types.js'

describe('PipelineError', () => {
  it('has correct errorCode, message, and details', () => {
    const err = new PipelineError('BAD_INPUT', 'Bad input', { reason: 'test' })

    expect(err.errorCode).toBe('BAD_INPUT')
    expect(err.message).toBe('Bad input')
    expect(err.details).toEqual({ reason: 'test' })
    expect(err.name).toBe('PipelineError')
    expect(err.transient).toBe(false)
  })

  it('toJSON() omits details when undefined', () => {
    expect(new PipelineError('BAD_INPUT', 'Bad input').toJSON()).toEqual({
      error: { errorCode: 'BAD_INPUT', message: 'Bad input' },
    })
  })
})

describe('run-level errors', () => {
  it('ScanError names the root and keeps the cause', () => {
    const cause = new Error('ENOENT')
    const err = new ScanError('/data/ds', 'root does not exist', cause)

    expect(err).toBeInstanceOf(PipelineError)
    expect(err.name).toBe('ScanError')
    expect(err.errorCode).toBe('SCAN_FAILED')
    expect(err.message).toBe('Cannot scan dataset root /data/ds: root does not exist')
    expect(err.cause).toBe(cause)
    expect(err.root).toBe('/data/ds')
  })

  it('ValidationBlockedError carries the report and lists fatal checks', () => {
    const report: ValidationReport = {
      status: 'blocked',
      recordCount: 2,
      generatedAt: '2026-01-01T00:00:00.000Z',
      checks: [
        {
          name: 'zero-byte',
          status: 'fail',
          fatal: true,
          observed: 1,
          expected: 0,
          tolerance: null,
          offendingPaths: ['/data/sub-01/anat/sub-01_T1w.nii.gz'],
          message: '1 zero-byte file(s)',
        },
        {
          name: 'path-shape',
          status: 'pass',
          fatal: true,
          observed: 0,
          expected: 0,
          tolerance: null,
          offendingPaths: [],
          message: 'All paths match the naming convention',
        },
      ],
    }
    const err = new ValidationBlockedError(report)

    expect(err.report).toBe(report)
    expect(err.message).toBe('Validation blocked by 1 fatal finding(s): zero-byte')
    expect(err.details).toEqual({
      checks: [
        {
          name: 'zero-byte',
          group: undefined,
          offendingPaths: ['/data/sub-01/anat/sub-01_T1w.nii.gz'],
        },
      ],
    })
  })

  it('ManifestCorruptionError is not transient', () => {
    const err = new ManifestCorruptionError('arc', 'plan fingerprint changed')
    expect(err.message).toBe('Upload manifest for arc is corrupt: plan fingerprint changed')
    expect(err.transient).toBe(false)
  })
})

describe('shard-level errors', () => {
  it('EncodingError names the record and is transient', () => {
    const err = new EncodingError('/data/sub-01/anat/x.nii.gz', new Error('EIO: i/o error'))
    expect(err.message).toBe('Failed to encode /data/sub-01/anat/x.nii.gz: EIO: i/o error')
    expect(err.transient).toBe(true)
  })

  it('TransferError transient follows retryable', () => {
    const retryable = new TransferError('rate limited', { retryable: true, status: 429, retryAfterMs: 2000 })
    const fatal = new TransferError('forbidden', { retryable: false, status: 403 })

    expect(retryable.transient).toBe(true)
    expect(retryable.retryAfterMs).toBe(2000)
    expect(retryable.details).toEqual({ status: 429, retryable: true })
    expect(fatal.transient).toBe(false)
  })

  it('ShardFailedError records index and attempts', () => {
    const err = new ShardFailedError(3, 5, new Error('timeout'))
    expect(err.shardIndex).toBe(3)
    expect(err.attempts).toBe(5)
    expect(err.message).toBe('Shard 3 failed after 5 attempt(s): timeout')
    expect(err.toJSON()).toEqual({
      error: {
        errorCode: 'SHARD_FAILED',
        message: 'Shard 3 failed after 5 attempt(s): timeout',
        details: { shardIndex: 3, attempts: 5 },
      },
    })
  })
})
