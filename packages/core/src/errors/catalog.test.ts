import { describe, it, expect } from 'vitest'
import {
  StorageError,
  ConfigurationError,
  ProbeError,
  NotFoundError,
  AlreadyExistsError,
  BucketNotEmptyError,
  BackendError,
  LocalIOError,
  DecodeError,
  AccessDeniedError,
} from './catalog.js'

describe('StorageError', () => {
  it('has correct errorCode, message, and details', () => {
    const err = new StorageError('SOMETHING', 'Something failed', { reason: 'test' })

    expect(err.errorCode).toBe('SOMETHING')
    expect(err.message).toBe('Something failed')
    expect(err.details).toEqual({ reason: 'test' })
    expect(err.name).toBe('StorageError')
  })

  it('toJSON() returns serializable object', () => {
    const err = new StorageError('SOMETHING', 'Something failed', { field: 'name' })

    expect(err.toJSON()).toEqual({
      error: {
        errorCode: 'SOMETHING',
        message: 'Something failed',
        details: { field: 'name' },
      },
    })
  })

  it('toJSON() omits details when undefined', () => {
    const err = new StorageError('SOMETHING', 'Something failed')

    expect(err.toJSON()).toEqual({
      error: { errorCode: 'SOMETHING', message: 'Something failed' },
    })
  })

  it('keeps the cause', () => {
    const cause = new Error('socket hang up')
    const err = new BackendError('PutObject failed', undefined, cause)

    expect(err.cause).toBe(cause)
  })
})

describe('subclasses', () => {
  const cases: Array<[StorageError, string, string]> = [
    [new ConfigurationError('No credentials'), 'CONFIGURATION_ERROR', 'ConfigurationError'],
    [new ProbeError('Probe failed'), 'PROBE_ERROR', 'ProbeError'],
    [new NotFoundError('Missing'), 'NOT_FOUND', 'NotFoundError'],
    [new AlreadyExistsError('Exists', true), 'ALREADY_EXISTS', 'AlreadyExistsError'],
    [new BucketNotEmptyError('b1'), 'BUCKET_NOT_EMPTY', 'BucketNotEmptyError'],
    [new BackendError('Boom'), 'BACKEND_ERROR', 'BackendError'],
    [new LocalIOError('Cannot write', '/tmp/x'), 'LOCAL_IO_ERROR', 'LocalIOError'],
    [new DecodeError('b1', 'bin'), 'DECODE_ERROR', 'DecodeError'],
  ]

  it.each(cases)('%s carries its code and name', (err, code, name) => {
    expect(err).toBeInstanceOf(StorageError)
    expect(err).toBeInstanceOf(Error)
    expect(err.errorCode).toBe(code)
    expect(err.name).toBe(name)
  })

  it('AlreadyExistsError records ownership', () => {
    const err = new AlreadyExistsError('Bucket exists', false, { bucket: 'b1' })

    expect(err.ownedByCaller).toBe(false)
    expect(err.details).toEqual({ bucket: 'b1', ownedByCaller: false })
  })

  it('BucketNotEmptyError names the bucket', () => {
    expect(new BucketNotEmptyError('b1').message).toBe("Bucket 'b1' is not empty")
  })

  it('DecodeError names bucket and key', () => {
    expect(new DecodeError('b1', 'image.bin').message).toBe(
      "Object 'image.bin' in bucket 'b1' is not valid UTF-8 text",
    )
  })

  it('AccessDeniedError describes object targets', () => {
    const err = new AccessDeniedError({
      bucket: 'b1',
      key: 'secret.txt',
      userId: 'user2',
      required: 'read',
    })

    expect(err.message).toBe("User 'user2' lacks read permission on 'secret.txt' in bucket 'b1'")
    expect(err.errorCode).toBe('ACCESS_DENIED')
  })

  it('AccessDeniedError describes bucket targets', () => {
    const err = new AccessDeniedError({ bucket: 'b1', userId: 'user2', required: 'write' })

    expect(err.message).toBe("User 'user2' lacks write permission on bucket 'b1'")
  })
})
